import type {
  Activity,
  ActivityFilters,
  ActivityUpdates,
  ActivityView,
  Clock,
  ElapsedTime,
  EndActivityInput,
  StartActivityInput,
  StoreDocument,
  TaskScope,
} from '@/types/data';
import { TASK_SCOPES } from '@/types/data';
import type { IdGenerator } from '@/lib/ids';
import type { RecordStore } from '@/lib/data/store';
import { ConflictError, NotFoundError, ValidationError } from '@/lib/errors';
import { formatDuration, parseDateBound, secondsBetween } from '@/lib/utils/date';

const IMMUTABLE_FIELDS = ['id', 'startedAt', 'endedAt', 'durationSeconds', 'status'] as const;
const UPDATABLE_FIELDS = ['activityType', 'taskScope', 'description', 'tags', 'result', 'notes'] as const;

type ActivityPatch = Partial<Pick<Activity, (typeof UPDATABLE_FIELDS)[number]>>;

export interface ActivityManagerOptions {
  clock?: Clock;
}

function isTaskScope(value: string): value is TaskScope {
  return (TASK_SCOPES as readonly string[]).includes(value);
}

export function toActivityView(activity: Activity): ActivityView {
  return {
    ...activity,
    status: activity.endedAt === null ? 'ongoing' : 'completed',
    duration: activity.durationSeconds === null ? null : formatDuration(activity.durationSeconds),
  };
}

export function allocateId(ids: IdGenerator, taken: Record<string, unknown>): string {
  let id = ids.newId();
  while (Object.prototype.hasOwnProperty.call(taken, id)) {
    console.warn(`Generated ID ${id} collided with an existing record, regenerating`);
    id = ids.newId();
  }
  return id;
}

function requireText(value: string | undefined, field: string): string {
  const trimmed = value?.trim() ?? '';
  if (!trimmed) {
    throw new ValidationError(`${field} must be a non-empty string`, { field });
  }
  return trimmed;
}

function normalizeTags(tags: string[] | undefined): string[] {
  return (tags ?? []).map((tag) => tag.trim()).filter(Boolean);
}

/**
 * A snapshot of matching activities, filtered and ordered lazily on each pass.
 * Iterating twice yields the same records.
 */
export class ActivitySequence implements Iterable<ActivityView> {
  constructor(
    private readonly activities: readonly Activity[],
    private readonly filters: ActivityFilters,
    private readonly bounds: { start: number | null; end: number | null }
  ) {}

  *[Symbol.iterator](): Iterator<ActivityView> {
    const { activityType, taskScope, status, limit, order = 'asc' } = this.filters;
    const direction = order === 'desc' ? -1 : 1;
    const sorted = [...this.activities].sort(
      (a, b) => direction * (Date.parse(a.startedAt) - Date.parse(b.startedAt)) || a.id.localeCompare(b.id)
    );

    let yielded = 0;
    for (const activity of sorted) {
      if (limit !== undefined && yielded >= limit) return;
      if (activityType !== undefined && activity.activityType !== activityType) continue;
      if (taskScope !== undefined && activity.taskScope !== taskScope) continue;
      if (status === 'ongoing' && activity.endedAt !== null) continue;
      if (status === 'completed' && activity.endedAt === null) continue;
      const started = Date.parse(activity.startedAt);
      if (this.bounds.start !== null && started < this.bounds.start) continue;
      if (this.bounds.end !== null && started > this.bounds.end) continue;
      yielded += 1;
      yield toActivityView(activity);
    }
  }

  toArray(): ActivityView[] {
    return [...this];
  }
}

export class ActivityManager {
  private readonly clock: Clock;

  constructor(
    private readonly store: RecordStore,
    private readonly ids: IdGenerator,
    options: ActivityManagerOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async start(input: StartActivityInput): Promise<ActivityView> {
    const activityType = requireText(input.activityType, 'activityType');
    const description = requireText(input.description, 'description');
    const taskScope = this.requireTaskScope(input.taskScope);

    return this.store.mutate((doc) => {
      const activity: Activity = {
        id: allocateId(this.ids, doc.activities),
        activityType,
        taskScope,
        description,
        tags: normalizeTags(input.tags),
        startedAt: this.clock().toISOString(),
        endedAt: null,
        durationSeconds: null,
        result: null,
        notes: null,
      };
      doc.activities[activity.id] = activity;
      return toActivityView(activity);
    });
  }

  async get(id: string): Promise<ActivityView> {
    const doc = await this.store.read();
    return toActivityView(this.require(doc, id));
  }

  async getElapsed(id: string): Promise<ElapsedTime> {
    const doc = await this.store.read();
    const activity = this.require(doc, id);
    const now = this.clock().toISOString();

    const elapsedSeconds =
      activity.durationSeconds !== null ? activity.durationSeconds : secondsBetween(activity.startedAt, now);

    return {
      id: activity.id,
      status: activity.endedAt === null ? 'ongoing' : 'completed',
      startedAt: activity.startedAt,
      endedAt: activity.endedAt,
      currentTime: now,
      elapsedSeconds,
      elapsed: formatDuration(elapsedSeconds),
    };
  }

  async end(id: string, input: EndActivityInput = {}): Promise<ActivityView> {
    return this.store.mutate((doc) => {
      const activity = this.require(doc, id);
      if (activity.endedAt !== null) {
        throw new ConflictError(`Activity with ID ${id} is already completed`, {
          id,
          endedAt: activity.endedAt,
        });
      }

      const now = this.clock();
      const endedAt =
        now.getTime() < Date.parse(activity.startedAt) ? activity.startedAt : now.toISOString();

      const ended: Activity = {
        ...activity,
        endedAt,
        durationSeconds: secondsBetween(activity.startedAt, endedAt),
        result: input.result ?? activity.result,
        notes: input.notes ?? activity.notes,
      };
      doc.activities[id] = ended;
      return toActivityView(ended);
    });
  }

  async update(id: string, updates: ActivityUpdates): Promise<ActivityView> {
    const patch = this.validateUpdates(updates);

    return this.store.mutate((doc) => {
      const activity = this.require(doc, id);
      const updated: Activity = { ...activity, ...patch };
      doc.activities[id] = updated;
      return toActivityView(updated);
    });
  }

  async list(filters: ActivityFilters = {}): Promise<ActivitySequence> {
    const bounds = this.validateFilters(filters);
    const doc = await this.store.read();
    return new ActivitySequence(Object.values(doc.activities), filters, bounds);
  }

  private require(doc: StoreDocument, id: string): Activity {
    const activity = Object.prototype.hasOwnProperty.call(doc.activities, id) ? doc.activities[id] : undefined;
    if (!activity) {
      throw new NotFoundError('Activity', id);
    }
    return activity;
  }

  private requireTaskScope(taskScope: string): TaskScope {
    if (!isTaskScope(taskScope)) {
      throw new ValidationError(`Invalid taskScope '${taskScope}'. Must be one of: ${TASK_SCOPES.join(', ')}`, {
        field: 'taskScope',
        allowed: TASK_SCOPES,
      });
    }
    return taskScope;
  }

  private validateUpdates(updates: ActivityUpdates): ActivityPatch {
    const forbidden = IMMUTABLE_FIELDS.filter((field) => field in updates);
    if (forbidden.length > 0) {
      throw new ValidationError(`Cannot update immutable field(s): ${forbidden.join(', ')}`, {
        fields: forbidden,
      });
    }
    const unknown = Object.keys(updates).filter(
      (key) => !(UPDATABLE_FIELDS as readonly string[]).includes(key)
    );
    if (unknown.length > 0) {
      throw new ValidationError(`Unknown field(s): ${unknown.join(', ')}`, { fields: unknown });
    }

    const patch: ActivityPatch = {};
    if (updates.activityType !== undefined) {
      patch.activityType = requireText(updates.activityType, 'activityType');
    }
    if (updates.taskScope !== undefined) {
      patch.taskScope = this.requireTaskScope(updates.taskScope);
    }
    if (updates.description !== undefined) {
      patch.description = requireText(updates.description, 'description');
    }
    if (updates.tags !== undefined) {
      patch.tags = normalizeTags(updates.tags);
    }
    if (updates.result !== undefined) {
      patch.result = updates.result;
    }
    if (updates.notes !== undefined) {
      patch.notes = updates.notes;
    }

    if (Object.keys(patch).length === 0) {
      throw new ValidationError('No updates provided');
    }
    return patch;
  }

  private validateFilters(filters: ActivityFilters): { start: number | null; end: number | null } {
    if (filters.limit !== undefined && (!Number.isInteger(filters.limit) || filters.limit < 1)) {
      throw new ValidationError(`limit must be a positive integer, got ${filters.limit}`, { field: 'limit' });
    }
    if (filters.taskScope !== undefined) {
      this.requireTaskScope(filters.taskScope);
    }
    const start = filters.startDate !== undefined ? parseDateBound(filters.startDate) : null;
    if (filters.startDate !== undefined && start === null) {
      throw new ValidationError(`Invalid startDate '${filters.startDate}'. Expected ISO 8601`, {
        field: 'startDate',
      });
    }
    const end = filters.endDate !== undefined ? parseDateBound(filters.endDate, 'end') : null;
    if (filters.endDate !== undefined && end === null) {
      throw new ValidationError(`Invalid endDate '${filters.endDate}'. Expected ISO 8601`, { field: 'endDate' });
    }
    return { start, end };
  }
}
