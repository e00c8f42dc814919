import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from '@/app/server';
import { loadConfig } from '@/lib/config';
import { ActivityManager, RecordStore, ReminderManager } from '@/lib/data';
import { createIdGenerator } from '@/lib/ids';
import { TimeService } from '@/lib/time';
import { legacyStoreCandidates, locateStorage } from '@/lib/utils/paths';
import { normalizeError } from '@/lib/errors';

// stdout carries the protocol; all diagnostics go to stderr.
async function main(): Promise<void> {
  const config = loadConfig();
  const ids = createIdGenerator(config.idFormat, { customLength: config.customIdLength });
  const location = await locateStorage({
    storageMode: config.storageMode,
    dataDir: config.dataDir,
    projectRoot: config.projectRoot,
  });

  const store = new RecordStore({ dataDir: location.dataDir, legacyFiles: legacyStoreCandidates(location) });
  const server = createServer(
    {
      activities: new ActivityManager(store, ids),
      reminders: new ReminderManager(store, ids),
      time: new TimeService({ localTimezone: config.localTimezone }),
    },
    { timeoutMs: config.timeoutSeconds * 1000 }
  );

  console.error(
    `Chronolog starting: mode=${location.mode} dataDir=${location.dataDir} (${location.source}) ids=${ids.format}`
  );
  await server.connect(new StdioServerTransport());
}

main().catch((error: unknown) => {
  const normalized = normalizeError(error);
  console.error(`Chronolog failed to start: ${normalized.kind}: ${normalized.message}`);
  process.exit(1);
});
