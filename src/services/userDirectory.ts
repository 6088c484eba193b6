import { query } from '../config/database';

export interface UserDirectory {
  /** Internal id for an external employee identifier, or null when unknown. */
  findByEmployeeId(employeeId: string): Promise<{ id: number } | null>;
}

export function createPgUserDirectory(): UserDirectory {
  return {
    async findByEmployeeId(employeeId) {
      const result = await query<{ id: number }>('SELECT id FROM users WHERE employee_id = $1 LIMIT 1', [
        employeeId,
      ]);
      return result.rows[0] ?? null;
    },
  };
}
