import type { Clock, CreateReminderInput, Reminder, ReminderCheck } from '@/types/data';
import type { IdGenerator } from '@/lib/ids';
import type { RecordStore } from '@/lib/data/store';
import { allocateId } from '@/lib/data/activities';
import { NotFoundError, ValidationError } from '@/lib/errors';
import { parseOffsetTimestamp } from '@/lib/utils/date';

export const DEFAULT_UPCOMING_MINUTES = 60;

export interface ReminderManagerOptions {
  clock?: Clock;
}

function byReminderTime(a: Reminder, b: Reminder): number {
  return Date.parse(a.reminderTime) - Date.parse(b.reminderTime) || a.id.localeCompare(b.id);
}

export class ReminderManager {
  private readonly clock: Clock;

  constructor(
    private readonly store: RecordStore,
    private readonly ids: IdGenerator,
    options: ReminderManagerOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async create(input: CreateReminderInput): Promise<Reminder> {
    const reminderTime = input.reminderTime.trim();
    if (parseOffsetTimestamp(reminderTime) === null) {
      throw new ValidationError(
        `Invalid reminder time '${input.reminderTime}'. Expected ISO 8601 with an explicit offset, ` +
          `e.g. '2025-09-11T14:00:00+08:00' or '2025-09-11T06:00:00Z'`,
        { field: 'reminderTime' }
      );
    }
    const message = input.message.trim();
    if (!message) {
      throw new ValidationError('message must be a non-empty string', { field: 'message' });
    }
    const relatedTaskId = input.relatedTaskId?.trim() || null;

    return this.store.mutate((doc) => {
      const reminder: Reminder = {
        id: allocateId(this.ids, doc.reminders),
        reminderTime,
        message,
        relatedTaskId,
        createdAt: this.clock().toISOString(),
      };
      doc.reminders[reminder.id] = reminder;
      return reminder;
    });
  }

  /**
   * Splits reminders into due (at or before now) and upcoming (within the
   * window). Polling never changes a reminder; due ones stay due until deleted.
   */
  async checkDue(upcomingMinutes: number = DEFAULT_UPCOMING_MINUTES): Promise<ReminderCheck> {
    if (!Number.isFinite(upcomingMinutes) || upcomingMinutes < 0) {
      throw new ValidationError(`upcomingMinutes must be a non-negative number, got ${upcomingMinutes}`, {
        field: 'upcomingMinutes',
      });
    }

    const doc = await this.store.read();
    const now = this.clock().getTime();
    const cutoff = now + upcomingMinutes * 60_000;

    const due: Reminder[] = [];
    const upcoming: Reminder[] = [];
    for (const reminder of Object.values(doc.reminders)) {
      const at = Date.parse(reminder.reminderTime);
      if (at <= now) {
        due.push(reminder);
      } else if (at <= cutoff) {
        upcoming.push(reminder);
      }
    }

    return {
      checkedAt: new Date(now).toISOString(),
      upcomingMinutes,
      due: due.sort(byReminderTime),
      upcoming: upcoming.sort(byReminderTime),
    };
  }

  async delete(id: string): Promise<Reminder> {
    return this.store.mutate((doc) => {
      const reminder = Object.prototype.hasOwnProperty.call(doc.reminders, id) ? doc.reminders[id] : undefined;
      if (!reminder) {
        throw new NotFoundError('Reminder', id);
      }
      delete doc.reminders[id];
      return reminder;
    });
  }
}
