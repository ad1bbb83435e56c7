import { describe, it, expect, beforeEach, vi } from 'vitest';
import { runInTransaction } from '../transaction';

const { startSession } = vi.hoisted(() => ({ startSession: vi.fn() }));

vi.mock('mongoose', () => ({ default: { startSession } }));

const makeSession = () => ({
  startTransaction: vi.fn(),
  commitTransaction: vi.fn().mockResolvedValue(undefined),
  abortTransaction: vi.fn().mockResolvedValue(undefined),
  endSession: vi.fn().mockResolvedValue(undefined),
  inTransaction: vi.fn().mockReturnValue(true),
});

describe('runInTransaction', () => {
  let session: ReturnType<typeof makeSession>;

  beforeEach(() => {
    vi.clearAllMocks();
    session = makeSession();
    startSession.mockResolvedValue(session);
  });

  it('commits and returns the callback result', async () => {
    const callback = vi.fn().mockResolvedValue(3);

    await expect(runInTransaction(callback)).resolves.toBe(3);
    expect(callback).toHaveBeenCalledWith(session);
    expect(session.startTransaction).toHaveBeenCalledTimes(1);
    expect(session.commitTransaction).toHaveBeenCalledTimes(1);
    expect(session.abortTransaction).not.toHaveBeenCalled();
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });

  it('aborts and rethrows on failure', async () => {
    const callback = vi.fn().mockRejectedValue(new Error('WriteConflict'));

    await expect(runInTransaction(callback)).rejects.toThrow('WriteConflict');
    expect(callback).toHaveBeenCalledTimes(1);
    expect(session.commitTransaction).not.toHaveBeenCalled();
    expect(session.abortTransaction).toHaveBeenCalledTimes(1);
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });

  it('does not abort a transaction that is no longer open', async () => {
    session.inTransaction.mockReturnValue(false);
    const callback = vi.fn().mockRejectedValue(new Error('connection reset'));

    await expect(runInTransaction(callback)).rejects.toThrow('connection reset');
    expect(session.abortTransaction).not.toHaveBeenCalled();
  });

  it('retries once without a session on a standalone server', async () => {
    const callback = vi
      .fn()
      .mockRejectedValueOnce(new Error('Transaction numbers are only allowed on a replica set member or mongos'))
      .mockResolvedValueOnce(2);

    await expect(runInTransaction(callback)).resolves.toBe(2);
    expect(callback).toHaveBeenCalledTimes(2);
    expect(callback.mock.calls[0][0]).toBe(session);
    expect(callback.mock.calls[1][0]).toBeNull();
    expect(session.abortTransaction).toHaveBeenCalledTimes(1);
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });
});
