import { timingSafeEqual } from 'node:crypto';
import type { ActivityClassifier } from '../agents/classification';
import { AuthenticationError, NotFoundError, RequestAbortedError } from '../errors';
import type { ActivityBatch, ActivityRecord, IngestionResult, RawActivitySample } from '../types';
import type { ActivityStore } from './activityStore';
import type { UserDirectory } from './userDirectory';
import { runWorkerPool } from './workerPool';

export interface IngestionConfig {
  daemonApiKey: string;
  defaultSampleDurationSeconds: number;
  /** Upper bound on samples classified at once within one batch. */
  concurrency: number;
}

export interface IngestionDependencies {
  config: IngestionConfig;
  classifier: ActivityClassifier;
  users: UserDirectory;
  store: ActivityStore;
}

export interface IngestionService {
  /** Throws AuthenticationError unless the credential is the daemon secret. */
  authenticate(credential: string | undefined): void;
  ingest(
    batch: ActivityBatch,
    credential: string | undefined,
    options?: { signal?: AbortSignal }
  ): Promise<IngestionResult>;
}

export function matchesSecret(expected: string, provided: string | undefined): boolean {
  if (!provided) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Seconds a sample covers: the daemon-reported duration when present,
 * rounded to a whole second (minimum 1), otherwise the configured interval.
 */
export function resolveSampleDuration(sample: RawActivitySample, defaultSeconds: number): number {
  if (sample.duration != null && Number.isFinite(sample.duration) && sample.duration > 0) {
    return Math.max(1, Math.round(sample.duration));
  }
  return defaultSeconds;
}

export function createIngestionService({ config, classifier, users, store }: IngestionDependencies): IngestionService {
  function authenticate(credential: string | undefined): void {
    if (!matchesSecret(config.daemonApiKey, credential)) {
      throw new AuthenticationError('Invalid or missing API key');
    }
  }

  return {
    authenticate,

    async ingest(batch, credential, options) {
      const signal = options?.signal;
      authenticate(credential);

      const user = await users.findByEmployeeId(batch.employee_id);
      if (!user) {
        throw new NotFoundError(`Employee ID '${batch.employee_id}' not found`);
      }

      const results = await runWorkerPool(batch.logs, (sample) => classifier.classify(sample, { signal }), {
        concurrency: config.concurrency,
      });

      if (signal?.aborted) {
        throw new RequestAbortedError();
      }

      const records: ActivityRecord[] = batch.logs.map((sample, index) => ({
        userId: user.id,
        startTime: sample.timestamp,
        durationSeconds: resolveSampleDuration(sample, config.defaultSampleDurationSeconds),
        category: results[index].category,
        details: results[index].details,
      }));

      if (records.length === 0) {
        return { recordsPersisted: 0 };
      }

      const recordsPersisted = await store.insertMany(records, { signal });
      console.log(`Persisted ${recordsPersisted} activity records for ${batch.employee_id}`);

      return { recordsPersisted };
    },
  };
}
