import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createServer, withTimeout } from '@/app/server';
import { TOOLS } from '@/app/tools';
import type { ToolContext } from '@/app/tools';
import { defineTool } from '@/app/tools/types';
import { startActivityTool } from '@/app/tools/activities';
import { ActivityManager, RecordStore, ReminderManager } from '@/lib/data';
import { createIdGenerator } from '@/lib/ids';
import { TimeService } from '@/lib/time';
import { TimeoutError, ValidationError } from '@/lib/errors';
import { makeTempDir, manualClock, removeTempDir } from '@/lib/data/tests/fixtures';
import type { ManualClock } from '@/lib/data/tests/fixtures';

const ToolResultSchema = z.object({
  isError: z.boolean().optional(),
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })).min(1),
});

const StartedSchema = z.object({ activityId: z.string(), activity: z.object({ status: z.literal('ongoing') }) });
const ReminderBodySchema = z.object({ id: z.string() });

describe('MCP server', () => {
  let dir: string;
  let time: ManualClock;
  let context: ToolContext;
  let server: McpServer;
  let client: Client;

  async function connect(options: Parameters<typeof createServer>[1]): Promise<void> {
    server = createServer(context, options);
    client = new Client({ name: 'test-client', version: '1.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  }

  async function call(name: string, args: Record<string, unknown> = {}) {
    const result = ToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const body: unknown = JSON.parse(result.content[0].text);
    return { isError: result.isError ?? false, body };
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    time = manualClock('2025-01-15T09:00:00.000Z');
    const store = new RecordStore({ dataDir: dir });
    const ids = createIdGenerator('custom');
    context = {
      activities: new ActivityManager(store, ids, { clock: time.clock }),
      reminders: new ReminderManager(store, ids, { clock: time.clock }),
      time: new TimeService({ localTimezone: 'UTC', clock: time.clock }),
    };
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it('lists every tool', async () => {
    await connect({ timeoutMs: 1000 });

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual(
      [
        'check_time_reminders',
        'convert_time',
        'create_time_reminder',
        'delete_time_reminder',
        'end_activity_log',
        'get_activity_logs',
        'get_current_time',
        'get_elapsed_time',
        'start_activity_log',
        'update_activity_log',
      ].sort()
    );
    expect(TOOLS).toHaveLength(10);
  });

  it('runs an activity from start to finish', async () => {
    await connect({ timeoutMs: 1000 });

    const started = await call('start_activity_log', {
      activityType: 'coding',
      task_scope: 'feature-implementation',
      description: 'Wire up the settings page',
      tags: ['ui'],
    });
    expect(started.isError).toBe(false);
    const { activityId } = StartedSchema.parse(started.body);

    time.advance(300);
    const elapsed = await call('get_elapsed_time', { activityId });
    expect(elapsed.body).toMatchObject({ status: 'ongoing', elapsedSeconds: 300, elapsed: '5m 0s' });

    const ended = await call('end_activity_log', { activityId, result: 'Shipped' });
    expect(ended.body).toMatchObject({
      id: activityId,
      status: 'completed',
      endedAt: '2025-01-15T09:05:00.000Z',
      durationSeconds: 300,
      result: 'Shipped',
    });

    const updated = await call('update_activity_log', {
      activityId,
      updates: { notes: 'Follow-up needed', task_scope: 'component-implementation' },
    });
    expect(updated.body).toMatchObject({
      notes: 'Follow-up needed',
      taskScope: 'component-implementation',
      result: 'Shipped',
    });

    const logs = await call('get_activity_logs', { status: 'completed' });
    expect(logs.body).toMatchObject({ count: 1, activities: [{ id: activityId, duration: '5m 0s' }] });
  });

  it('returns structured errors for failed operations', async () => {
    await connect({ timeoutMs: 1000 });

    const missing = await call('end_activity_log', { activityId: 'nope' });
    expect(missing).toEqual({
      isError: true,
      body: {
        error: {
          kind: 'not_found',
          message: 'Activity with ID nope not found',
          details: { entity: 'Activity', id: 'nope' },
        },
      },
    });

    const { activityId } = StartedSchema.parse(
      (await call('start_activity_log', { activityType: 'coding', task_scope: 'debugging', description: 'Bug' }))
        .body
    );
    await call('end_activity_log', { activityId });
    const again = await call('end_activity_log', { activityId });
    expect(again.isError).toBe(true);
    expect(again.body).toMatchObject({ error: { kind: 'conflict' } });

    const badReminder = await call('create_time_reminder', {
      reminderTime: '2025-01-15T10:00:00',
      message: 'No offset',
    });
    expect(badReminder.isError).toBe(true);
    expect(badReminder.body).toMatchObject({ error: { kind: 'validation' } });
  });

  it('does not let updates touch timing fields', async () => {
    await connect({ timeoutMs: 1000 });
    const { activityId } = StartedSchema.parse(
      (await call('start_activity_log', { activityType: 'coding', task_scope: 'debugging', description: 'Bug' }))
        .body
    );

    const rejected = await call('update_activity_log', {
      activityId,
      updates: { startedAt: '2020-01-01T00:00:00Z' },
    });

    expect(rejected).toEqual({
      isError: true,
      body: {
        error: {
          kind: 'validation',
          message: 'Invalid arguments for update_activity_log',
          details: [{ path: 'updates', message: "Unrecognized key(s) in object: 'startedAt'" }],
        },
      },
    });
    const stored = await context.activities.get(activityId);
    expect(stored.startedAt).toBe('2025-01-15T09:00:00.000Z');
  });

  it('reports bad arguments as validation errors', async () => {
    await connect({ timeoutMs: 1000 });

    const unknownScope = await call('start_activity_log', {
      activityType: 'coding',
      task_scope: 'gardening',
      description: 'Weeding',
    });
    expect(unknownScope.isError).toBe(true);
    expect(unknownScope.body).toMatchObject({
      error: {
        kind: 'validation',
        message: 'Invalid arguments for start_activity_log',
        details: [{ path: 'task_scope' }],
      },
    });

    const missing = await call('start_activity_log', { task_scope: 'debugging', description: 'Bug' });
    expect(missing).toEqual({
      isError: true,
      body: {
        error: {
          kind: 'validation',
          message: 'Invalid arguments for start_activity_log',
          details: [{ path: 'activityType', message: 'Required' }],
        },
      },
    });

    const logs = await call('get_activity_logs', {});
    expect(logs.body).toEqual({ count: 0, activities: [] });
  });

  it('advertises argument types and required fields', async () => {
    await connect({ timeoutMs: 1000 });

    const { tools } = await client.listTools();
    const start = tools.find((tool) => tool.name === 'start_activity_log');

    expect(start?.inputSchema.required?.slice().sort()).toEqual(['activityType', 'description', 'task_scope']);
    expect(start?.inputSchema.properties).toMatchObject({
      activityType: { type: 'string' },
      task_scope: { type: 'string', enum: expect.arrayContaining(['debugging', 'feature-implementation']) },
      tags: { type: 'array' },
    });
  });

  it('schedules, reports and deletes reminders', async () => {
    await connect({ timeoutMs: 1000 });

    const created = await call('create_time_reminder', {
      reminderTime: '2025-01-15T18:30:00+09:00',
      message: 'Check deploy',
    });
    const { id } = ReminderBodySchema.parse(created.body);

    const before = await call('check_time_reminders', {});
    expect(before.body).toMatchObject({ upcomingMinutes: 60, due: [], upcoming: [{ id }] });

    time.advance(1800);
    const after = await call('check_time_reminders', { upcomingMinutes: 5 });
    expect(after.body).toMatchObject({ due: [{ id, message: 'Check deploy' }], upcoming: [] });

    const deleted = await call('delete_time_reminder', { reminderId: id });
    expect(deleted.body).toMatchObject({ deleted: true, reminder: { id } });
    const empty = await call('check_time_reminders', {});
    expect(empty.body).toMatchObject({ due: [], upcoming: [] });
  });

  it('answers time queries', async () => {
    await connect({ timeoutMs: 1000 });

    const now = await call('get_current_time', {});
    expect(now.body).toEqual({
      timezone: 'System (UTC)',
      datetime: '2025-01-15T09:00:00+00:00',
      formattedTime: 'January 15, 2025 at 09:00:00 AM (System Time - UTC)',
      dayOfWeek: 'Wednesday',
      isDst: false,
    });

    const converted = await call('convert_time', {
      source_timezone: 'UTC',
      time: '12:00',
      target_timezone: 'Asia/Tokyo',
    });
    expect(converted.body).toMatchObject({ timeDifference: '+9.0h', target: { datetime: '2025-01-15T21:00:00+09:00' } });
  });

  it('turns slow and crashing tools into error results', async () => {
    const slow = defineTool({
      name: 'slow',
      title: 'Slow',
      description: 'Never finishes in time',
      inputSchema: {},
      handler: () => new Promise((resolve) => setTimeout(resolve, 200)),
    });
    const broken = defineTool({
      name: 'broken',
      title: 'Broken',
      description: 'Always throws',
      inputSchema: {},
      handler: () => {
        throw new Error('kaboom');
      },
    });
    await connect({ timeoutMs: 20, tools: [slow, broken] });

    await expect(call('slow')).resolves.toEqual({
      isError: true,
      body: {
        error: {
          kind: 'timeout',
          message: 'slow timed out after 0.02 seconds',
          details: { operation: 'slow', timeoutMs: 20 },
        },
      },
    });
    await expect(call('broken')).resolves.toEqual({
      isError: true,
      body: { error: { kind: 'internal', message: 'kaboom' } },
    });
    expect(console.error).toHaveBeenCalledWith('[broken] internal: kaboom');
  });
});

describe('tool definitions', () => {
  it('validate their arguments before running', async () => {
    const unused: ToolContext = {
      activities: new ActivityManager(new RecordStore({ dataDir: 'unused' }), createIdGenerator('uuid')),
      reminders: new ReminderManager(new RecordStore({ dataDir: 'unused' }), createIdGenerator('uuid')),
      time: new TimeService({ localTimezone: 'UTC' }),
    };

    await expect(startActivityTool.run({ activityType: 'coding' }, unused)).rejects.toBeInstanceOf(ValidationError);
    await expect(startActivityTool.run(undefined, unused)).rejects.toThrow('Invalid arguments for start_activity_log');
  });
});

describe('withTimeout', () => {
  it('passes through results that arrive in time', async () => {
    await expect(withTimeout(Promise.resolve('done'), 50, 'quick')).resolves.toBe('done');
  });

  it('rejects with a timeout error otherwise', async () => {
    const never = new Promise<string>(() => undefined);
    await expect(withTimeout(never, 10, 'stuck')).rejects.toBeInstanceOf(TimeoutError);
  });
});
