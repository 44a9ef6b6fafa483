/**
 * E2E Tests: Role and admin transfer routes
 */

import request from 'supertest';
import { Application } from 'express';
import { Role } from '../../src/services/permission/permission.service';
import { ErrorCode } from '../../src/types/errors';
import { ADMIN, ALICE, BOB, EXCHANGE, MINTER, START_TIME_MS, TestSystem, bearer, createTestApp } from '../helpers';

const START_SECONDS = START_TIME_MS / 1000;

describe('Role routes', () => {
  let app: Application;
  let system: TestSystem;

  beforeEach(() => {
    ({ app, system } = createTestApp({ adminDelay: 3600 }));
  });

  it('should list the admin and role members', async () => {
    const response = await request(app).get('/roles');

    expect(response.status).toBe(200);
    expect(response.body.data).toEqual({
      admin: ADMIN,
      pendingAdmin: null,
      adminDelay: 3600,
      members: {
        DEFAULT_ADMIN: [ADMIN],
        MINTER: [MINTER, EXCHANGE].sort(),
        PAUSER: [MINTER],
      },
    });
  });

  it('should answer role checks', async () => {
    const response = await request(app).get(`/roles/MINTER/${EXCHANGE}`);

    expect(response.body.data).toEqual({ role: 'MINTER', address: EXCHANGE, hasRole: true });
  });

  it('should reject an unknown role', async () => {
    const response = await request(app).get(`/roles/BURNER/${ALICE}`);

    expect(response.status).toBe(400);
    expect(response.body.error.details.role).toEqual(['role must be one of DEFAULT_ADMIN, MINTER, PAUSER']);
  });

  it('should grant and revoke, reporting whether anything changed', async () => {
    const granted = await request(app)
      .post('/roles/grant')
      .set('Authorization', bearer(ADMIN))
      .send({ role: 'PAUSER', account: ALICE });
    expect(granted.body.data).toEqual({ role: 'PAUSER', account: ALICE, changed: true });

    const repeated = await request(app)
      .post('/roles/grant')
      .set('Authorization', bearer(ADMIN))
      .send({ role: 'PAUSER', account: ALICE });
    expect(repeated.body.data.changed).toBe(false);

    const revoked = await request(app)
      .post('/roles/revoke')
      .set('Authorization', bearer(ADMIN))
      .send({ role: 'PAUSER', account: ALICE });
    expect(revoked.body.data.changed).toBe(true);
    expect(system.permissions.hasRole(Role.PAUSER, ALICE)).toBe(false);
  });

  it('should refuse grants from non-admins', async () => {
    const response = await request(app)
      .post('/roles/grant')
      .set('Authorization', bearer(MINTER))
      .send({ role: 'MINTER', account: BOB });

    expect(response.status).toBe(403);
    expect(response.body.error.code).toBe(ErrorCode.UNAUTHORIZED);
  });

  it('should let a holder renounce its own role', async () => {
    const response = await request(app)
      .post('/roles/renounce')
      .set('Authorization', bearer(MINTER))
      .send({ role: 'PAUSER' });

    expect(response.body.data).toEqual({ role: 'PAUSER', account: MINTER, changed: true });
  });

  describe('admin transfer', () => {
    it('should enforce the delay before the candidate can accept', async () => {
      const proposed = await request(app)
        .post('/roles/admin/propose')
        .set('Authorization', bearer(ADMIN))
        .send({ candidate: BOB });
      expect(proposed.status).toBe(200);
      expect(proposed.body.data.pendingAdmin).toEqual({ candidate: BOB, notBefore: START_SECONDS + 3600 });

      const early = await request(app).post('/roles/admin/accept').set('Authorization', bearer(BOB));
      expect(early.status).toBe(425);
      expect(early.body.error.code).toBe(ErrorCode.TOO_EARLY);

      system.clock.advanceSeconds(3600);

      const accepted = await request(app).post('/roles/admin/accept').set('Authorization', bearer(BOB));
      expect(accepted.status).toBe(200);
      expect(accepted.body.data).toEqual({ admin: BOB });
      expect(system.permissions.admin()).toBe(BOB);
    });

    it('should honour a later notBefore', async () => {
      const proposed = await request(app)
        .post('/roles/admin/propose')
        .set('Authorization', bearer(ADMIN))
        .send({ candidate: BOB, notBefore: START_SECONDS + 7200 });

      expect(proposed.body.data.pendingAdmin.notBefore).toBe(START_SECONDS + 7200);
    });

    it('should refuse acceptance from anyone but the candidate', async () => {
      await request(app)
        .post('/roles/admin/propose')
        .set('Authorization', bearer(ADMIN))
        .send({ candidate: BOB })
        .expect(200);

      const response = await request(app).post('/roles/admin/accept').set('Authorization', bearer(ALICE));
      expect(response.status).toBe(403);
    });

    it('should cancel a pending transfer and 409 when there is none', async () => {
      await request(app)
        .post('/roles/admin/propose')
        .set('Authorization', bearer(ADMIN))
        .send({ candidate: BOB })
        .expect(200);

      const canceled = await request(app).post('/roles/admin/cancel').set('Authorization', bearer(ADMIN));
      expect(canceled.body.data).toEqual({ pendingAdmin: null });

      const again = await request(app).post('/roles/admin/cancel').set('Authorization', bearer(ADMIN));
      expect(again.status).toBe(409);
      expect(again.body.error.code).toBe(ErrorCode.NO_PENDING_TRANSFER);
    });
  });
});
