import { query } from '../config/database';
import { ForbiddenError } from '../errors';
import type {
  ActivityCategory,
  CategorySummary,
  CompanyReport,
  DateRange,
  EmployeeReport,
  TeamReport,
  User,
  WorkDetail,
} from '../types';
import { findUserByEmployeeId } from './users';

interface CategoryTotalRow {
  category: string;
  total_duration: string | number;
}

// Both ends of the range are inclusive calendar days
const RANGE_FILTER = `start_time >= $1::date AND start_time < ($2::date + INTERVAL '1 day')`;

const CATEGORIES: readonly ActivityCategory[] = ['Work', 'Private', 'Idle'];

function isCategory(value: string): value is ActivityCategory {
  return CATEGORIES.some((category) => category === value);
}

export function emptySummary(): CategorySummary {
  return { Work: 0, Private: 0, Idle: 0 };
}

/** Fold `category, SUM(duration_seconds)` rows into a summary. pg returns SUM as a string. */
export function toSummary(rows: readonly CategoryTotalRow[]): CategorySummary {
  const summary = emptySummary();
  for (const row of rows) {
    if (isCategory(row.category)) {
      summary[row.category] += Number(row.total_duration) || 0;
    }
  }
  return summary;
}

export async function getEmployeeReport(userId: number, range: DateRange): Promise<EmployeeReport> {
  const summaryResult = await query<CategoryTotalRow>(
    `SELECT category, SUM(duration_seconds) AS total_duration
     FROM activity_logs
     WHERE user_id = $3 AND ${RANGE_FILTER}
     GROUP BY category`,
    [range.startDate, range.endDate, userId]
  );

  const detailsResult = await query<{ details: string | null; total_duration: string | number }>(
    `SELECT details, SUM(duration_seconds) AS total_duration
     FROM activity_logs
     WHERE user_id = $3 AND category = 'Work' AND ${RANGE_FILTER}
     GROUP BY details
     ORDER BY total_duration DESC`,
    [range.startDate, range.endDate, userId]
  );

  const workDetails: WorkDetail[] = detailsResult.rows.map((row) => ({
    app: row.details ?? 'Unknown',
    duration: Number(row.total_duration) || 0,
  }));

  return { summary: toSummary(summaryResult.rows), workDetails };
}

/**
 * Aggregate report over a manager's direct reports.
 */
export async function getTeamReport(manager: User, range: DateRange): Promise<TeamReport> {
  const members = await query<{ id: number; employee_id: string; full_name: string | null }>(
    `SELECT id, employee_id, full_name FROM users WHERE manager_id = $1 ORDER BY id`,
    [manager.id]
  );

  if (members.rows.length === 0) {
    return { teamSummary: emptySummary(), members: [] };
  }

  const totals = await query<CategoryTotalRow & { user_id: number }>(
    `SELECT user_id, category, SUM(duration_seconds) AS total_duration
     FROM activity_logs
     WHERE user_id = ANY($3::int[]) AND ${RANGE_FILTER}
     GROUP BY user_id, category`,
    [range.startDate, range.endDate, members.rows.map((member) => member.id)]
  );

  return {
    teamSummary: toSummary(totals.rows),
    members: members.rows.map((member) => ({
      employeeId: member.employee_id,
      name: member.full_name,
      summary: toSummary(totals.rows.filter((row) => row.user_id === member.id)),
    })),
  };
}

/** Drill-down into one direct report of the requesting manager. */
export async function getTeamMemberReport(manager: User, employeeId: string, range: DateRange): Promise<EmployeeReport> {
  const member = await findUserByEmployeeId(employeeId);

  if (!member || member.managerId !== manager.id) {
    throw new ForbiddenError('You can only view reports for your direct reports.');
  }

  return getEmployeeReport(member.id, range);
}

export async function getCompanyReport(range: DateRange): Promise<CompanyReport> {
  const companyTotals = await query<CategoryTotalRow>(
    `SELECT category, SUM(duration_seconds) AS total_duration
     FROM activity_logs
     WHERE ${RANGE_FILTER}
     GROUP BY category`,
    [range.startDate, range.endDate]
  );

  // Managers without any direct reports are left out of the breakdown
  const managers = await query<{ id: number; full_name: string | null }>(
    `SELECT m.id, m.full_name
     FROM users m
     WHERE m.role = 'manager'
       AND EXISTS (SELECT 1 FROM users u WHERE u.manager_id = m.id)
     ORDER BY m.id`
  );

  const departmentTotals = await query<CategoryTotalRow & { manager_id: number }>(
    `SELECT u.manager_id, a.category, SUM(a.duration_seconds) AS total_duration
     FROM activity_logs a
     JOIN users u ON u.id = a.user_id
     WHERE u.manager_id IS NOT NULL AND a.start_time >= $1::date AND a.start_time < ($2::date + INTERVAL '1 day')
     GROUP BY u.manager_id, a.category`,
    [range.startDate, range.endDate]
  );

  return {
    companySummary: toSummary(companyTotals.rows),
    byDepartment: managers.rows.map((manager) => ({
      departmentManagerId: manager.id,
      departmentManagerName: manager.full_name,
      summary: toSummary(departmentTotals.rows.filter((row) => row.manager_id === manager.id)),
    })),
  };
}
