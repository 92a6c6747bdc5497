import { checkDatabaseHealth } from '../connection';
import { FakePool } from '../../__tests__/fakes';

describe('checkDatabaseHealth', () => {
  it('should report a working connection', async () => {
    await expect(checkDatabaseHealth(new FakePool(() => [{ test: 1 }]))).resolves.toEqual({
      status: 'healthy',
      message: 'Database connection is working'
    });
  });

  it('should report an unexpected result', async () => {
    await expect(checkDatabaseHealth(new FakePool(() => []))).resolves.toEqual({
      status: 'error',
      message: 'Database query returned unexpected result'
    });
  });

  it('should report a failing connection', async () => {
    await expect(checkDatabaseHealth(new FakePool(() => new Error('ECONNREFUSED')))).resolves.toEqual({
      status: 'error',
      message: 'Database health check failed: ECONNREFUSED'
    });
  });
});
