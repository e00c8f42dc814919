import type { ToolDefinition } from '@/app/tools/types';
import { convertTimeTool, getCurrentTimeTool } from '@/app/tools/time';
import {
  endActivityTool,
  getActivityLogsTool,
  getElapsedTimeTool,
  startActivityTool,
  updateActivityTool,
} from '@/app/tools/activities';
import { checkRemindersTool, createReminderTool, deleteReminderTool } from '@/app/tools/reminders';

export type { ToolContext, ToolDefinition } from '@/app/tools/types';

export const TOOLS: readonly ToolDefinition[] = [
  getCurrentTimeTool,
  convertTimeTool,
  startActivityTool,
  endActivityTool,
  getElapsedTimeTool,
  getActivityLogsTool,
  updateActivityTool,
  createReminderTool,
  checkRemindersTool,
  deleteReminderTool,
];
