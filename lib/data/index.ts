export { RecordStore, DEFAULT_STORE_FILE } from '@/lib/data/store';
export type { RecordStoreOptions } from '@/lib/data/store';
export { ActivityManager, ActivitySequence, toActivityView } from '@/lib/data/activities';
export type { ActivityManagerOptions } from '@/lib/data/activities';
export { ReminderManager, DEFAULT_UPCOMING_MINUTES } from '@/lib/data/reminders';
export type { ReminderManagerOptions } from '@/lib/data/reminders';
export { emptyDocument } from '@/lib/data/migrations';
