import { z } from 'zod';
import type { Activity, Reminder, StoreDocument } from '@/types/data';
import { StorageError } from '@/lib/errors';
import { CURRENT_STORE_VERSION, StoreFileSchemaV1, StoreFileSchemaV2 } from '@/lib/validation/schemas';
import { hasExplicitOffset, secondsBetween, toUtcIso } from '@/lib/utils/date';

const VersionProbeSchema = z.object({ version: z.number().int().positive().optional() }).passthrough();

export function emptyDocument(): StoreDocument {
  return { version: 2, activities: {}, reminders: {} };
}

export function migrateDocument(
  raw: unknown,
  filepath: string
): { document: StoreDocument; migrated: boolean } {
  const probe = VersionProbeSchema.safeParse(raw);
  if (!probe.success) {
    throw new StorageError(`Store file is corrupted: expected a JSON object in ${filepath}`, filepath);
  }

  let version = probe.data.version ?? 1;
  if (version > CURRENT_STORE_VERSION) {
    throw new StorageError(
      `Store file version ${version} is newer than supported ${CURRENT_STORE_VERSION}. Please update Chronolog.`,
      filepath
    );
  }

  let data: unknown = raw;
  const migrated = version < CURRENT_STORE_VERSION;
  if (migrated) {
    console.warn(`Migrating ${filepath} from v${version} to v${CURRENT_STORE_VERSION}`);
  }
  while (version < CURRENT_STORE_VERSION) {
    data = migrateOneStep(data, version, filepath);
    version += 1;
  }

  const result = StoreFileSchemaV2.safeParse(data);
  if (!result.success) {
    console.error(`Validation failed for ${filepath}:`, result.error.message);
    throw new StorageError(`Store file is corrupted: invalid structure in ${filepath}`, filepath, result.error);
  }
  return { document: result.data, migrated };
}

function migrateOneStep(data: unknown, fromVersion: number, filepath: string): unknown {
  console.warn(`  Migrating store v${fromVersion} → v${fromVersion + 1}`);
  if (fromVersion === 1) {
    return migrateV1ToV2(data, filepath);
  }
  throw new StorageError(`No migration path from store version ${fromVersion}`, filepath);
}

function toIso(value: string, filepath: string): string {
  const iso = toUtcIso(value);
  if (iso === null) {
    throw new StorageError(`Store file is corrupted: invalid timestamp '${value}' in ${filepath}`, filepath);
  }
  return iso;
}

function migrateV1ToV2(data: unknown, filepath: string): StoreDocument {
  const legacy = StoreFileSchemaV1.safeParse(data);
  if (!legacy.success) {
    throw new StorageError(`Store file is corrupted: invalid legacy structure in ${filepath}`, filepath, legacy.error);
  }

  const document = emptyDocument();

  for (const log of legacy.data.activityLogs) {
    if (document.activities[log.activityId]) {
      console.warn(`  Duplicate legacy activity ${log.activityId}, keeping the later entry`);
    }
    const startedAt = toIso(log.startTime, filepath);
    let endedAt: string | null = log.endTime ? toIso(log.endTime, filepath) : null;
    if (endedAt !== null && Date.parse(endedAt) < Date.parse(startedAt)) {
      endedAt = startedAt;
    }
    const activity: Activity = {
      id: log.activityId,
      activityType: log.activityType,
      taskScope: log.task_scope,
      description: log.description ?? '',
      tags: log.tags ?? [],
      startedAt,
      endedAt,
      durationSeconds: endedAt === null ? null : secondsBetween(startedAt, endedAt),
      result: log.result ?? null,
      notes: log.notes ?? null,
    };
    document.activities[activity.id] = activity;
  }

  let dropped = 0;
  let normalized = 0;
  for (const entry of legacy.data.reminders) {
    if (entry.status && entry.status !== 'pending') {
      dropped += 1;
      continue;
    }
    let reminderTime = entry.reminderTime;
    if (!hasExplicitOffset(reminderTime)) {
      reminderTime = toIso(reminderTime, filepath);
      normalized += 1;
    }
    const reminder: Reminder = {
      id: entry.reminderId,
      reminderTime,
      message: entry.message,
      relatedTaskId: entry.relatedTaskId ?? null,
      createdAt: toIso(entry.createdTime ?? reminderTime, filepath),
    };
    document.reminders[reminder.id] = reminder;
  }
  if (normalized > 0) {
    console.warn(`  Read ${normalized} legacy reminder time(s) without an offset as UTC`);
  }
  if (dropped > 0) {
    console.warn(`  Dropped ${dropped} non-pending legacy reminder(s)`);
  }

  return document;
}
