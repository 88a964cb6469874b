import { NotFoundError } from '@/lib/error-handling';
import { OptimisticLockError, updateWithRetry } from '@/lib/optimistic-locking';

const noDelay = { baseDelay: 0, maxDelay: 0 };

describe('OptimisticLockError', () => {
  it('should create an error with message and version', () => {
    const error = new OptimisticLockError('Test error', 5);

    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('Test error');
    expect(error.name).toBe('OptimisticLockError');
    expect(error.currentVersion).toBe(5);
    expect(error.code).toBe('OPTIMISTIC_LOCK');
    expect(error.category).toBe('conflict');
  });
});

describe('updateWithRetry', () => {
  it('should return the result of a successful unit', async () => {
    const unit = jest.fn().mockReturnValue('done');

    await expect(updateWithRetry(unit, noDelay)).resolves.toBe('done');
    expect(unit).toHaveBeenCalledTimes(1);
  });

  it('should retry after a lock conflict', async () => {
    const unit = jest
      .fn()
      .mockImplementationOnce(() => {
        throw new OptimisticLockError('Version mismatch', 1);
      })
      .mockResolvedValueOnce('second try');

    await expect(updateWithRetry(unit, { ...noDelay, maxRetries: 3 })).resolves.toBe('second try');
    expect(unit).toHaveBeenCalledTimes(2);
  });

  it('should rethrow once the retries are spent', async () => {
    const unit = jest.fn().mockImplementation(() => {
      throw new OptimisticLockError('Version mismatch', 4);
    });

    await expect(updateWithRetry(unit, { ...noDelay, maxRetries: 2 })).rejects.toBeInstanceOf(OptimisticLockError);
    expect(unit).toHaveBeenCalledTimes(3);
  });

  it('should not retry other errors', async () => {
    const unit = jest.fn().mockRejectedValue(new NotFoundError('Allocation 1 not found'));

    await expect(updateWithRetry(unit, noDelay)).rejects.toThrow('Allocation 1 not found');
    expect(unit).toHaveBeenCalledTimes(1);
  });
});
