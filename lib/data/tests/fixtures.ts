import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Clock } from '@/types/data';

export interface ManualClock {
  clock: Clock;
  advance(seconds: number): void;
  set(iso: string): void;
}

export function manualClock(startIso: string): ManualClock {
  let now = Date.parse(startIso);
  return {
    clock: () => new Date(now),
    advance: (seconds) => {
      now += seconds * 1000;
    },
    set: (iso) => {
      now = Date.parse(iso);
    },
  };
}

export async function makeTempDir(prefix = 'chronolog-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
