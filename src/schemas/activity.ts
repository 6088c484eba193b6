import { z } from 'zod';
import { ValidationError } from '../errors';
import type { ActivityBatch } from '../types';

// duration_seconds is a Postgres INTEGER
const MAX_SAMPLE_DURATION_SECONDS = 2_147_483_647;

export const activitySampleSchema = z.object({
  timestamp: z.union([z.string(), z.number()]).pipe(z.coerce.date()),
  state: z.enum(['active', 'idle']),
  app: z.string().nullish(),
  title: z.string().nullish(),
  duration: z.number().positive().max(MAX_SAMPLE_DURATION_SECONDS).nullish(),
});

export const activityBatchSchema = z.object({
  employee_id: z.string().trim().min(1, 'employee_id is required'),
  logs: z.array(activitySampleSchema),
});

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

export function parseActivityBatch(body: unknown): ActivityBatch {
  const parsed = activityBatchSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('Invalid activity payload', { issues: formatIssues(parsed.error) });
  }
  return parsed.data;
}
