import { describe, expect, it } from 'vitest';
import { PersistenceError, RequestAbortedError } from '../errors';
import type { ActivityRecord } from '../types';
import { buildInsertStatement, createPgActivityStore } from './activityStore';
import type { QueryClient, TransactionRunner } from './activityStore';

function record(overrides: Partial<ActivityRecord> = {}): ActivityRecord {
  return {
    userId: 7,
    startTime: new Date('2024-05-01T09:00:00Z'),
    durationSeconds: 5,
    category: 'Private',
    details: null,
    ...overrides,
  };
}

/** Runs work against a recording client and reports whether it committed. */
function fakeTransaction(failOnStatement?: number) {
  const statements: Array<{ text: string; params?: unknown[] }> = [];
  let committed = false;
  let rolledBack = false;

  const client: QueryClient = {
    async query(text, params) {
      if (failOnStatement !== undefined && statements.length === failOnStatement) {
        throw new Error('connection reset');
      }
      statements.push({ text, params });
      return { rowCount: 0 };
    },
  };

  const runInTransaction: TransactionRunner = async (work) => {
    try {
      const result = await work(client);
      committed = true;
      return result;
    } catch (error) {
      rolledBack = true;
      throw error;
    }
  };

  return {
    runInTransaction,
    statements,
    committed: () => committed,
    rolledBack: () => rolledBack,
  };
}

describe('buildInsertStatement', () => {
  it('numbers placeholders row by row', () => {
    const first = record({ category: 'Work', details: 'Code - main.ts', durationSeconds: 42 });
    const second = record({ userId: 8 });

    const { text, params } = buildInsertStatement([first, second]);

    expect(text).toBe(
      'INSERT INTO activity_logs (user_id, start_time, duration_seconds, category, details) VALUES ($1, $2, $3, $4, $5), ($6, $7, $8, $9, $10)'
    );
    expect(params).toEqual([7, first.startTime, 42, 'Work', 'Code - main.ts', 8, second.startTime, 5, 'Private', null]);
  });
});

describe('createPgActivityStore', () => {
  it('returns zero without opening a transaction for no records', async () => {
    const tx = fakeTransaction();
    const store = createPgActivityStore(tx.runInTransaction);

    expect(await store.insertMany([])).toBe(0);
    expect(tx.statements).toHaveLength(0);
    expect(tx.committed()).toBe(false);
  });

  it('writes every record in one transaction', async () => {
    const tx = fakeTransaction();
    const store = createPgActivityStore(tx.runInTransaction);

    expect(await store.insertMany([record(), record(), record()])).toBe(3);
    expect(tx.statements).toHaveLength(1);
    expect(tx.statements[0].params).toHaveLength(15);
    expect(tx.committed()).toBe(true);
  });

  it('splits large batches into chunks of 1000 rows', async () => {
    const tx = fakeTransaction();
    const store = createPgActivityStore(tx.runInTransaction);

    const count = await store.insertMany(Array.from({ length: 2500 }, () => record()));

    expect(count).toBe(2500);
    expect(tx.statements.map((statement) => statement.params?.length)).toEqual([5000, 5000, 2500]);
  });

  it('rolls back and wraps database failures', async () => {
    const tx = fakeTransaction(1);
    const store = createPgActivityStore(tx.runInTransaction);

    const attempt = store.insertMany(Array.from({ length: 1500 }, () => record()));

    await expect(attempt).rejects.toBeInstanceOf(PersistenceError);
    await expect(attempt).rejects.toThrow('Failed to persist activity batch');
    expect(tx.rolledBack()).toBe(true);
    expect(tx.committed()).toBe(false);
  });

  it('keeps the underlying error as the cause', async () => {
    const tx = fakeTransaction(0);
    const store = createPgActivityStore(tx.runInTransaction);

    const error = await store.insertMany([record()]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toHaveProperty('cause', expect.objectContaining({ message: 'connection reset' }));
  });

  it('rolls back when the request is aborted before commit', async () => {
    const tx = fakeTransaction();
    const store = createPgActivityStore(tx.runInTransaction);
    const controller = new AbortController();
    controller.abort();

    await expect(store.insertMany([record()], { signal: controller.signal })).rejects.toBeInstanceOf(
      RequestAbortedError
    );
    expect(tx.rolledBack()).toBe(true);
    expect(tx.committed()).toBe(false);
  });
});
