import { z } from 'zod';
import { DEFAULT_UPCOMING_MINUTES } from '@/lib/data';
import { defineTool } from '@/app/tools/types';

export const createReminderTool = defineTool({
  name: 'create_time_reminder',
  title: 'Create Reminder',
  description:
    "Schedule a reminder. The time must carry an explicit offset, e.g. '2025-09-11T14:00:00+08:00' or '2025-09-11T06:00:00Z'.",
  inputSchema: {
    reminderTime: z.string().min(1).describe('ISO 8601 timestamp with offset'),
    message: z.string().min(1).describe('What to be reminded of'),
    relatedTaskId: z.string().optional().describe('Activity or task this reminder belongs to'),
  },
  handler: (args, { reminders }) => reminders.create(args),
});

export const checkRemindersTool = defineTool({
  name: 'check_time_reminders',
  title: 'Check Reminders',
  description:
    'List reminders that are due now and those coming up within the window. Checking does not dismiss anything.',
  inputSchema: {
    upcomingMinutes: z
      .number()
      .nonnegative()
      .default(DEFAULT_UPCOMING_MINUTES)
      .describe('How far ahead to look for upcoming reminders'),
  },
  handler: (args, { reminders }) => reminders.checkDue(args.upcomingMinutes),
});

export const deleteReminderTool = defineTool({
  name: 'delete_time_reminder',
  title: 'Delete Reminder',
  description: 'Remove a reminder once it has been handled.',
  inputSchema: {
    reminderId: z.string().min(1),
  },
  handler: async (args, { reminders }) => {
    const deleted = await reminders.delete(args.reminderId);
    return { deleted: true, reminder: deleted };
  },
});
