// Loaded before any module under test so config picks these up
process.env.NODE_ENV = 'test';
process.env.JWT_SECRET = 'test-secret';
process.env.JWT_ISSUER = 'reservemint-test';
process.env.EVENT_RELAY_ENABLED = 'false';
process.env.REDIS_HOST = 'localhost';
process.env.REDIS_PORT = '6380';
