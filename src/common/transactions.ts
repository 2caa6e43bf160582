import { HttpException, Logger } from '@nestjs/common';
import { Mutex } from 'async-mutex';
import { DataSource, EntityManager } from 'typeorm';
import { PersistenceError } from './errors';

// SQLite runs every transaction on one shared connection, so writers queue.
const writeLocks = new WeakMap<DataSource, Mutex>();

function writeLockFor(dataSource: DataSource) {
  let lock = writeLocks.get(dataSource);
  if (!lock) {
    lock = new Mutex();
    writeLocks.set(dataSource, lock);
  }
  return lock;
}

/**
 * Runs `work` in one database transaction, after any transaction already
 * running on the same data source has finished. Domain errors pass through
 * untouched; anything else is logged and reported as a PersistenceError
 * after the rollback.
 *
 * Never call this from inside `work`: pass the manager down instead.
 */
export function runInTransaction<T>(
  dataSource: DataSource,
  operation: string,
  logger: Logger,
  work: (manager: EntityManager) => Promise<T>,
): Promise<T> {
  return writeLockFor(dataSource).runExclusive(async () => {
    try {
      return await dataSource.transaction(work);
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }
      logger.error(
        `${operation} rolled back`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new PersistenceError(operation, error);
    }
  });
}
