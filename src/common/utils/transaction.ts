import mongoose, { ClientSession } from 'mongoose';
import logger from './logger';

const STANDALONE_MESSAGES = [
  'Transaction numbers are only allowed on a replica set',
  'This MongoDB deployment does not support retryable writes',
];

const isStandaloneDeployment = (error: unknown) =>
  error instanceof Error && STANDALONE_MESSAGES.some((m) => error.message.includes(m));

/**
 * Runs `callback` inside a MongoDB transaction and commits it. Any error
 * aborts the transaction and is rethrown. A standalone server (local dev)
 * cannot run transactions, so the callback is retried once without a session.
 */
export const runInTransaction = async <T>(
  callback: (session: ClientSession | null) => Promise<T>
): Promise<T> => {
  const session = await mongoose.startSession();
  try {
    session.startTransaction();
    const result = await callback(session);
    await session.commitTransaction();
    return result;
  } catch (error) {
    if (session.inTransaction()) await session.abortTransaction();

    if (isStandaloneDeployment(error)) {
      logger.warn('MongoDB is not a Replica Set. Retrying operation WITHOUT transaction safety.');
      return callback(null);
    }
    throw error;
  } finally {
    await session.endSession();
  }
};
