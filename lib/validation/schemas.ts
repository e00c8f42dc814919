import { z } from 'zod';
import { TASK_SCOPES } from '@/types/data';

export const TimeOfDaySchema = z
  .string()
  .regex(/^([0-1][0-9]|2[0-3]):([0-5][0-9])$/, 'Must be HH:MM (24-hour)');

export const TimestampSchema = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'Must be an ISO-8601 timestamp',
});

export const IdSchema = z.string().min(1);

export const ActivitySchemaV2 = z
  .object({
    id: IdSchema,
    activityType: z.string().min(1),
    taskScope: z.enum(TASK_SCOPES),
    description: z.string(),
    tags: z.array(z.string()),
    startedAt: TimestampSchema,
    endedAt: TimestampSchema.nullable(),
    durationSeconds: z.number().nonnegative().nullable(),
    result: z.string().nullable(),
    notes: z.string().nullable(),
  })
  .refine((data) => (data.endedAt === null) === (data.durationSeconds === null), {
    message: 'endedAt and durationSeconds must be set together',
  })
  .refine((data) => data.endedAt === null || Date.parse(data.endedAt) >= Date.parse(data.startedAt), {
    message: 'endedAt must not be before startedAt',
  });

export const ReminderSchemaV2 = z.object({
  id: IdSchema,
  reminderTime: TimestampSchema,
  message: z.string(),
  relatedTaskId: z.string().nullable(),
  createdAt: TimestampSchema,
});

export const StoreFileSchemaV2 = z
  .object({
    version: z.literal(2),
    activities: z.record(IdSchema, ActivitySchemaV2),
    reminders: z.record(IdSchema, ReminderSchemaV2),
  })
  .refine(
    (data) =>
      Object.entries(data.activities).every(([key, activity]) => key === activity.id) &&
      Object.entries(data.reminders).every(([key, reminder]) => key === reminder.id),
    'Record keys must match record ids'
  );

// Legacy list layout written before the store carried a version field.
export const LegacyActivityLogSchema = z
  .object({
    activityId: IdSchema,
    activityType: z.string(),
    task_scope: z.enum(TASK_SCOPES),
    description: z.string().nullable().optional(),
    tags: z.array(z.string()).nullable().optional(),
    startTime: TimestampSchema,
    endTime: TimestampSchema.nullable().optional(),
    durationSeconds: z.number().nullable().optional(),
    result: z.string().nullable().optional(),
    notes: z.string().nullable().optional(),
    status: z.string().optional(),
  })
  .passthrough();

export const LegacyReminderSchema = z
  .object({
    reminderId: IdSchema,
    reminderTime: TimestampSchema,
    message: z.string(),
    relatedTaskId: z.string().nullable().optional(),
    status: z.string().optional(),
    createdTime: TimestampSchema.optional(),
  })
  .passthrough();

export const StoreFileSchemaV1 = z.object({
  activityLogs: z.array(LegacyActivityLogSchema).default([]),
  reminders: z.array(LegacyReminderSchema).default([]),
});

export const CURRENT_STORE_VERSION = 2;
