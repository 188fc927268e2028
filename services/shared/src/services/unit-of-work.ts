import type { TransactionRunner } from '../db/client';
import { asStorageFailure, StorageFailureError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Run `fn` as one transaction. Domain errors reach the caller as thrown;
 * anything else is logged and surfaced as a StorageFailureError after the
 * runner has rolled back.
 */
export async function runUnitOfWork<Tx, T>(
     transact: TransactionRunner<Tx>,
     action: string,
     fn: (tx: Tx) => Promise<T>
): Promise<T> {
     try {
          return await transact(fn);
     } catch (error) {
          const failure = asStorageFailure(error, action);
          if (failure instanceof StorageFailureError) {
               logger.error({ err: error }, `Failed to ${action}`);
          }
          throw failure;
     }
}
