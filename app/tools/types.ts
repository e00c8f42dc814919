import { z } from 'zod';
import type { ActivityManager, ReminderManager } from '@/lib/data';
import type { TimeService } from '@/lib/time';
import { ValidationError } from '@/lib/errors';

export interface ToolContext {
  activities: ActivityManager;
  reminders: ReminderManager;
  time: TimeService;
}

export interface ToolDefinition {
  name: string;
  title: string;
  description: string;
  inputSchema: z.ZodRawShape;
  run(args: unknown, context: ToolContext): Promise<unknown>;
}

export type ToolArgs<Shape extends z.ZodRawShape> = z.objectOutputType<Shape, z.ZodTypeAny, 'strip'>;

interface ToolOptions<Shape extends z.ZodRawShape> {
  name: string;
  title: string;
  description: string;
  inputSchema: Shape;
  handler: (args: ToolArgs<Shape>, context: ToolContext) => Promise<unknown> | unknown;
}

export function defineTool<Shape extends z.ZodRawShape>(options: ToolOptions<Shape>): ToolDefinition {
  const schema = z.object(options.inputSchema);
  return {
    name: options.name,
    title: options.title,
    description: options.description,
    inputSchema: options.inputSchema,
    run: async (args, context) => {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        throw ValidationError.fromZod(parsed.error, `Invalid arguments for ${options.name}`);
      }
      return options.handler(parsed.data, context);
    },
  };
}
