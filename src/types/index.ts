export type UserRole = 'employee' | 'manager' | 'hr' | 'ceo';

export const ADMIN_ROLES: readonly UserRole[] = ['hr', 'ceo'];

export type ActivityState = 'active' | 'idle';

export type ActivityCategory = 'Work' | 'Private' | 'Idle';

/** Label returned by the AI fallback; it never answers Idle. */
export type AiLabel = 'Work' | 'Private';

export interface RawActivitySample {
  timestamp: Date;
  state: ActivityState;
  app?: string | null;
  title?: string | null;
  /** Seconds covered by this sample, when the daemon reports it. */
  duration?: number | null;
}

export interface ActivityBatch {
  employee_id: string;
  logs: RawActivitySample[];
}

/**
 * Details are only ever attached to Work. Private and Idle results carry
 * null so that window titles of personal activity cannot be stored.
 */
export type ClassificationResult =
  | { category: 'Work'; details: string }
  | { category: 'Private' | 'Idle'; details: null };

export interface ActivityRecord {
  userId: number;
  startTime: Date;
  durationSeconds: number;
  category: ActivityCategory;
  details: string | null;
}

export interface IngestionResult {
  recordsPersisted: number;
}

export interface User {
  id: number;
  employeeId: string;
  email: string;
  fullName: string | null;
  title: string | null;
  role: UserRole;
  managerId: number | null;
  createdAt: Date;
}

export interface UserRow {
  id: number;
  employee_id: string;
  email: string;
  full_name: string | null;
  title: string | null;
  role: UserRole;
  manager_id: number | null;
  created_at: Date;
}

export type CategorySummary = Record<ActivityCategory, number>;

export interface WorkDetail {
  app: string;
  duration: number;
}

export interface EmployeeReport {
  summary: CategorySummary;
  workDetails: WorkDetail[];
}

export interface TeamMemberSummary {
  employeeId: string;
  name: string | null;
  summary: CategorySummary;
}

export interface TeamReport {
  teamSummary: CategorySummary;
  members: TeamMemberSummary[];
}

export interface DepartmentSummary {
  departmentManagerId: number;
  departmentManagerName: string | null;
  summary: CategorySummary;
}

export interface CompanyReport {
  companySummary: CategorySummary;
  byDepartment: DepartmentSummary[];
}

export interface TeamDetail {
  managerId: number;
  managerName: string | null;
  memberCount: number;
  members: Array<{ name: string | null; email: string }>;
}

export interface DateRange {
  startDate: string;
  endDate: string;
}
