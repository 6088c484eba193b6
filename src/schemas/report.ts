import { z } from 'zod';
import { ValidationError } from '../errors';
import type { DateRange } from '../types';
import { formatIssues } from './activity';

/** Rejects impossible days such as 2024-02-31, which Date.parse rolls into March. */
function isCalendarDate(value: string): boolean {
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format')
  .refine(isCalendarDate, 'Invalid calendar date');

export const dateRangeSchema = z
  .object({
    startDate: isoDate,
    endDate: isoDate,
  })
  .refine((range) => range.startDate <= range.endDate, {
    message: 'startDate must not be after endDate',
    path: ['startDate'],
  });

export function parseDateRange(input: unknown): DateRange {
  const parsed = dateRangeSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid date range', { issues: formatIssues(parsed.error) });
  }
  return parsed.data;
}
