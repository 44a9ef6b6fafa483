import { resetMetrics } from '../src/observability';

// Increase test timeout
jest.setTimeout(10000);

beforeEach(() => {
  resetMetrics();
});
