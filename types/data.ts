// types/data.ts
// Core domain models used throughout Chronolog.

export const TASK_SCOPES = [
  'epic-planning',
  'feature-implementation',
  'component-implementation',
  'debugging',
  'integration-tasks',
  'optimization-tasks',
  'setup-tasks',
  'testing-tasks',
] as const;

export type TaskScope = (typeof TASK_SCOPES)[number];
export type ActivityStatus = 'ongoing' | 'completed';
export type SortOrder = 'asc' | 'desc';

export interface Activity {
  id: string;
  activityType: string;
  taskScope: TaskScope;
  description: string;
  tags: string[];
  startedAt: string;
  endedAt: string | null;
  durationSeconds: number | null;
  result: string | null;
  notes: string | null;
}

export interface ActivityView extends Activity {
  status: ActivityStatus;
  duration: string | null;
}

export interface Reminder {
  id: string;
  reminderTime: string;
  message: string;
  relatedTaskId: string | null;
  createdAt: string;
}

export interface StoreDocument {
  version: 2;
  activities: Record<string, Activity>;
  reminders: Record<string, Reminder>;
}

export interface StartActivityInput {
  activityType: string;
  taskScope: string;
  description: string;
  tags?: string[];
}

export interface EndActivityInput {
  result?: string;
  notes?: string;
}

export interface ActivityUpdates {
  activityType?: string;
  taskScope?: string;
  description?: string;
  tags?: string[];
  result?: string | null;
  notes?: string | null;
}

export interface ActivityFilters {
  activityType?: string;
  taskScope?: string;
  status?: ActivityStatus;
  startDate?: string;
  endDate?: string;
  limit?: number;
  order?: SortOrder;
}

export interface ElapsedTime {
  id: string;
  status: ActivityStatus;
  startedAt: string;
  endedAt: string | null;
  currentTime: string;
  elapsedSeconds: number;
  elapsed: string;
}

export interface CreateReminderInput {
  reminderTime: string;
  message: string;
  relatedTaskId?: string | null;
}

export interface ReminderCheck {
  checkedAt: string;
  upcomingMinutes: number;
  due: Reminder[];
  upcoming: Reminder[];
}

export interface TimeResult {
  timezone: string;
  datetime: string;
  formattedTime: string;
  dayOfWeek: string;
  isDst: boolean;
}

export interface TimeConversionResult {
  source: TimeResult;
  target: TimeResult;
  timeDifference: string;
}

export type Clock = () => Date;
