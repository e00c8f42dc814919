import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ZodRawShape } from 'zod';
import { TOOLS } from '@/app/tools';
import type { ToolContext, ToolDefinition } from '@/app/tools';
import { failure, success } from '@/app/response';
import { TimeoutError, normalizeError } from '@/lib/errors';

export const SERVER_NAME = 'chronolog';
export const SERVER_VERSION = '0.1.0';

export interface ServerOptions {
  timeoutMs: number;
  tools?: readonly ToolDefinition[];
}

export function withTimeout<T>(work: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });
  return Promise.race([work, expiry]).finally(() => clearTimeout(timer));
}

/**
 * The SDK answers arguments that fail the registered shape with a plain-text
 * error before the tool runs. Registered fields therefore accept any value and
 * `defineTool` does the strict parse, so failures come back as a validation
 * error body. `isOptional` is kept so the advertised `required` list is intact.
 */
export function registrationShape(shape: ZodRawShape): ZodRawShape {
  return Object.fromEntries(
    Object.entries(shape).map(([key, field]) => [
      key,
      Object.assign(
        field.catch((ctx: { input: unknown }) => ctx.input),
        { isOptional: () => field.isOptional() }
      ),
    ])
  );
}

export function createServer(context: ToolContext, options: ServerOptions): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  for (const tool of options.tools ?? TOOLS) {
    server.registerTool(
      tool.name,
      { title: tool.title, description: tool.description, inputSchema: registrationShape(tool.inputSchema) },
      async (args: unknown) => {
        try {
          const result = await withTimeout(tool.run(args, context), options.timeoutMs, tool.name);
          return success(result);
        } catch (error) {
          const normalized = normalizeError(error);
          console.error(`[${tool.name}] ${normalized.kind}: ${normalized.message}`);
          return failure(normalized);
        }
      }
    );
  }

  return server;
}
