import bcrypt from 'bcryptjs';
import { v4 as uuidv4 } from 'uuid';
import { query } from '../config/database';
import { ConflictError, NotFoundError, ValidationError } from '../errors';
import type { TeamDetail, User, UserRole, UserRow } from '../types';

const SALT_ROUNDS = 10;

const USER_COLUMNS = 'id, employee_id, email, full_name, title, role, manager_id, created_at';

export interface CreateUserInput {
  email: string;
  password: string;
  role: UserRole;
  fullName?: string | null;
  title?: string | null;
  managerId?: number | null;
}

export interface UpdateUserInput {
  role?: UserRole;
  managerId?: number | null;
  title?: string | null;
}

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    employeeId: row.employee_id,
    email: row.email,
    fullName: row.full_name,
    title: row.title,
    role: row.role,
    managerId: row.manager_id,
    createdAt: row.created_at,
  };
}

export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, SALT_ROUNDS);
}

export async function findUserById(id: number): Promise<User | null> {
  const result = await query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
  const row = result.rows[0];
  return row ? toUser(row) : null;
}

export async function findUserByEmployeeId(employeeId: string): Promise<User | null> {
  const result = await query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE employee_id = $1`, [employeeId]);
  const row = result.rows[0];
  return row ? toUser(row) : null;
}

/**
 * Check an email/password pair. Returns null for an unknown email or a wrong
 * password alike.
 */
export async function verifyCredentials(email: string, password: string): Promise<User | null> {
  const result = await query<UserRow & { password_hash: string }>(
    `SELECT ${USER_COLUMNS}, password_hash FROM users WHERE email = $1`,
    [email]
  );

  const row = result.rows[0];
  if (!row) {
    return null;
  }

  const validPassword = await bcrypt.compare(password, row.password_hash);
  return validPassword ? toUser(row) : null;
}

async function assertManagerExists(managerId: number): Promise<void> {
  const manager = await findUserById(managerId);
  if (!manager) {
    throw new ValidationError(`Manager with id ${managerId} not found`);
  }
}

export async function createUser(input: CreateUserInput): Promise<User> {
  const existing = await query('SELECT 1 FROM users WHERE email = $1', [input.email]);
  if (existing.rows.length > 0) {
    throw new ConflictError('Email already registered');
  }

  if (input.managerId != null) {
    await assertManagerExists(input.managerId);
  }

  const passwordHash = await hashPassword(input.password);
  const result = await query<UserRow>(
    `INSERT INTO users (employee_id, email, full_name, title, password_hash, role, manager_id)
     VALUES ($1, $2, $3, $4, $5, $6, $7)
     RETURNING ${USER_COLUMNS}`,
    [
      `emp_${uuidv4()}`,
      input.email,
      input.fullName ?? null,
      input.title ?? null,
      passwordHash,
      input.role,
      input.managerId ?? null,
    ]
  );

  return toUser(result.rows[0]);
}

export async function listUsers(): Promise<User[]> {
  const result = await query<UserRow>(`SELECT ${USER_COLUMNS} FROM users ORDER BY id`);
  return result.rows.map(toUser);
}

export async function updateUser(id: number, updates: UpdateUserInput): Promise<User> {
  const assignments: string[] = [];
  const params: unknown[] = [];
  let paramIndex = 1;

  if (updates.role !== undefined) {
    assignments.push(`role = $${paramIndex++}`);
    params.push(updates.role);
  }

  if (updates.managerId !== undefined) {
    if (updates.managerId === id) {
      throw new ValidationError('A user cannot be their own manager');
    }
    if (updates.managerId !== null) {
      await assertManagerExists(updates.managerId);
    }
    assignments.push(`manager_id = $${paramIndex++}`);
    params.push(updates.managerId);
  }

  if (updates.title !== undefined) {
    assignments.push(`title = $${paramIndex++}`);
    params.push(updates.title);
  }

  if (assignments.length === 0) {
    const user = await findUserById(id);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return user;
  }

  const result = await query<UserRow>(
    `UPDATE users SET ${assignments.join(', ')}
     WHERE id = $${paramIndex}
     RETURNING ${USER_COLUMNS}`,
    [...params, id]
  );

  const row = result.rows[0];
  if (!row) {
    throw new NotFoundError('User not found');
  }
  return toUser(row);
}

/** Removes the user; their activity logs go with them via ON DELETE CASCADE. */
export async function deleteUser(id: number): Promise<void> {
  const result = await query('DELETE FROM users WHERE id = $1', [id]);
  if (result.rowCount === 0) {
    throw new NotFoundError('User not found');
  }
}

export async function resetPassword(id: number, newPassword: string): Promise<void> {
  const passwordHash = await hashPassword(newPassword);
  const result = await query('UPDATE users SET password_hash = $1 WHERE id = $2', [passwordHash, id]);
  if (result.rowCount === 0) {
    throw new NotFoundError('User not found');
  }
}

export async function changeOwnPassword(user: User, currentPassword: string, newPassword: string): Promise<void> {
  const verified = await verifyCredentials(user.email, currentPassword);
  if (!verified) {
    throw new ValidationError('Incorrect current password');
  }
  await resetPassword(user.id, newPassword);
}

/**
 * Confirms an installer may be generated for the employee. Packaging the
 * daemon itself happens outside this service.
 */
export async function authorizeInstaller(employeeId: string): Promise<{ status: string; forEmployee: string }> {
  const user = await findUserByEmployeeId(employeeId);
  if (!user) {
    throw new NotFoundError(`Employee ID '${employeeId}' not found`);
  }
  return { status: 'installer_generation_authorized', forEmployee: user.employeeId };
}

export async function listTeams(): Promise<TeamDetail[]> {
  const managers = await query<{ id: number; full_name: string | null }>(
    `SELECT id, full_name FROM users WHERE role = 'manager' ORDER BY id`
  );

  const members = await query<{ manager_id: number; full_name: string | null; email: string }>(
    `SELECT manager_id, full_name, email
     FROM users
     WHERE manager_id IN (SELECT id FROM users WHERE role = 'manager')
     ORDER BY id`
  );

  return managers.rows.map((manager) => {
    const team = members.rows
      .filter((member) => member.manager_id === manager.id)
      .map((member) => ({ name: member.full_name, email: member.email }));

    return {
      managerId: manager.id,
      managerName: manager.full_name,
      memberCount: team.length,
      members: team,
    };
  });
}
