import { withTransaction } from '../config/database';
import { PersistenceError, RequestAbortedError } from '../errors';
import type { ActivityRecord } from '../types';

export interface ActivityStore {
  /**
   * Write every record in one transaction. Either all of them are committed
   * or none are. An aborted signal rolls the transaction back before COMMIT.
   */
  insertMany(records: readonly ActivityRecord[], options?: { signal?: AbortSignal }): Promise<number>;
}

/** The part of a pg client the store needs. */
export interface QueryClient {
  query(text: string, params?: unknown[]): Promise<unknown>;
}

export type TransactionRunner = <T>(work: (client: QueryClient) => Promise<T>) => Promise<T>;

// Keeps each statement well under Postgres' 65535 bind parameter limit
const INSERT_CHUNK_SIZE = 1000;
const COLUMNS_PER_ROW = 5;

export function buildInsertStatement(chunk: readonly ActivityRecord[]): { text: string; params: unknown[] } {
  const params: unknown[] = [];
  const rows = chunk.map((record, i) => {
    const base = i * COLUMNS_PER_ROW;
    params.push(record.userId, record.startTime, record.durationSeconds, record.category, record.details);
    return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5})`;
  });

  return {
    text: `INSERT INTO activity_logs (user_id, start_time, duration_seconds, category, details) VALUES ${rows.join(', ')}`,
    params,
  };
}

export function createPgActivityStore(runInTransaction: TransactionRunner = withTransaction): ActivityStore {
  return {
    async insertMany(records, options) {
      if (records.length === 0) {
        return 0;
      }

      try {
        return await runInTransaction(async (client) => {
          for (let offset = 0; offset < records.length; offset += INSERT_CHUNK_SIZE) {
            const { text, params } = buildInsertStatement(records.slice(offset, offset + INSERT_CHUNK_SIZE));
            await client.query(text, params);
          }

          if (options?.signal?.aborted) {
            throw new RequestAbortedError();
          }

          return records.length;
        });
      } catch (error) {
        if (error instanceof RequestAbortedError) {
          throw error;
        }
        throw new PersistenceError('Failed to persist activity batch', error);
      }
    },
  };
}
