import type { QueryResult, QueryResultRow } from 'pg';
import type { User, UserRow } from '../types';
import type { AppConfig } from '../config/settings';

export function queryResult(rows: QueryResultRow[]): QueryResult<QueryResultRow> {
  return { command: 'SELECT', rowCount: rows.length, oid: 0, fields: [], rows };
}

export function testUser(overrides: Partial<User> = {}): User {
  return {
    id: 3,
    employeeId: 'emp_manager',
    email: 'manager@example.com',
    fullName: 'Morgan Manager',
    title: null,
    role: 'manager',
    managerId: null,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function testUserRow(overrides: Partial<UserRow> = {}): UserRow {
  return {
    id: 11,
    employee_id: 'emp_ada',
    email: 'ada@example.com',
    full_name: 'Ada',
    title: 'Engineer',
    role: 'employee',
    manager_id: 3,
    created_at: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function testConfig(): AppConfig {
  return {
    port: 0,
    nodeEnv: 'test',
    databaseUrl: 'postgresql://localhost:5432/activity_test',
    daemonApiKey: 'test-secret',
    ai: { apiKey: '', model: 'test-model', timeoutMs: 100 },
    classification: {
      rules: { workApps: ['code', 'slack'], privateApps: ['spotify'], browsers: ['chrome'] },
      concurrency: 2,
      defaultSampleDurationSeconds: 5,
    },
    auth: { jwtSecret: 'test-jwt-secret', accessTokenExpireMinutes: 60 },
  };
}
