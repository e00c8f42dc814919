import { z } from 'zod';
import { TASK_SCOPES } from '@/types/data';
import { defineTool } from '@/app/tools/types';

const activityId = z.string().min(1).describe('ID returned by start_activity_log');
const taskScope = z.enum(TASK_SCOPES);

export const startActivityTool = defineTool({
  name: 'start_activity_log',
  title: 'Start Activity',
  description:
    'Start tracking an activity. The start time is recorded by the server; keep the returned activityId to end it later.',
  inputSchema: {
    activityType: z.string().min(1).describe("Kind of work, e.g. 'coding', 'research', 'debugging'"),
    task_scope: taskScope.describe('Size and nature of the task'),
    description: z.string().min(1).describe('What is being done'),
    tags: z.array(z.string()).optional().describe('Optional labels for categorisation'),
  },
  handler: async (args, { activities }) => {
    const activity = await activities.start({
      activityType: args.activityType,
      taskScope: args.task_scope,
      description: args.description,
      tags: args.tags,
    });
    return { activityId: activity.id, activity };
  },
});

export const endActivityTool = defineTool({
  name: 'end_activity_log',
  title: 'End Activity',
  description: 'Finish an ongoing activity. Duration is computed from the recorded start time.',
  inputSchema: {
    activityId,
    result: z.string().optional().describe('Outcome of the activity'),
    notes: z.string().optional().describe('Anything worth remembering about it'),
  },
  handler: (args, { activities }) =>
    activities.end(args.activityId, { result: args.result, notes: args.notes }),
});

export const getElapsedTimeTool = defineTool({
  name: 'get_elapsed_time',
  title: 'Elapsed Time',
  description: 'Time spent on an activity so far, or its final duration once completed.',
  inputSchema: { activityId },
  handler: (args, { activities }) => activities.getElapsed(args.activityId),
});

export const getActivityLogsTool = defineTool({
  name: 'get_activity_logs',
  title: 'Activity Logs',
  description: 'List recorded activities, optionally filtered. Dates bound the start time and are inclusive.',
  inputSchema: {
    activityType: z.string().min(1).optional(),
    task_scope: taskScope.optional(),
    status: z.enum(['ongoing', 'completed']).optional(),
    startDate: z.string().optional().describe("ISO 8601 date or timestamp, e.g. '2025-01-01'"),
    endDate: z.string().optional().describe("ISO 8601 date or timestamp; a bare date covers that whole day"),
    limit: z.number().int().positive().optional(),
    order: z.enum(['asc', 'desc']).default('asc').describe('Sort by start time'),
  },
  handler: async (args, { activities }) => {
    const sequence = await activities.list({
      activityType: args.activityType,
      taskScope: args.task_scope,
      status: args.status,
      startDate: args.startDate,
      endDate: args.endDate,
      limit: args.limit,
      order: args.order,
    });
    const logs = sequence.toArray();
    return { count: logs.length, activities: logs };
  },
});

const ActivityUpdatesSchema = z
  .object({
    activityType: z.string().min(1).optional(),
    task_scope: taskScope.optional(),
    description: z.string().min(1).optional(),
    tags: z.array(z.string()).optional(),
    result: z.string().nullable().optional(),
    notes: z.string().nullable().optional(),
  })
  .strict();

export const updateActivityTool = defineTool({
  name: 'update_activity_log',
  title: 'Update Activity',
  description:
    'Change descriptive fields of an activity. Identity and timing (id, start, end, duration) cannot be changed.',
  inputSchema: {
    activityId,
    updates: ActivityUpdatesSchema.describe('Fields to change; pass null to clear result or notes'),
  },
  handler: (args, { activities }) => {
    const { task_scope, ...rest } = args.updates;
    return activities.update(args.activityId, task_scope === undefined ? rest : { ...rest, taskScope: task_scope });
  },
});
