import { z } from 'zod';
import { ValidationError } from '../errors';
import { formatIssues } from './activity';

const role = z.enum(['employee', 'manager', 'hr', 'ceo']);
const password = z.string().min(8, 'Password must be at least 8 characters');

export const loginSchema = z.object({
  email: z.string().trim().toLowerCase().email(),
  password: z.string().min(1, 'Password is required'),
});

export const createUserSchema = z.object({
  email: z.string().trim().toLowerCase().email(),
  password,
  role,
  fullName: z.string().trim().min(1).max(100).nullish(),
  title: z.string().trim().max(100).nullish(),
  managerId: z.number().int().positive().nullish(),
});

export const updateUserSchema = z
  .object({
    role: role.optional(),
    managerId: z.number().int().positive().nullable().optional(),
    title: z.string().trim().max(100).nullable().optional(),
  })
  .strict();

export const passwordResetSchema = z.object({
  newPassword: password,
});

export const passwordChangeSchema = z.object({
  currentPassword: z.string().min(1, 'Current password is required'),
  newPassword: password,
});

export const userIdSchema = z.coerce.number().int().positive();

/** Validate `input` against `schema`, turning failures into a 400. */
export function parseBody<T extends z.ZodTypeAny>(schema: T, input: unknown, message = 'Invalid request body'): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(message, { issues: formatIssues(parsed.error) });
  }
  return parsed.data;
}
