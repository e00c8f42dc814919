import { parseArgs } from 'util';
import { z } from 'zod';
import { ConfigurationError } from '@/lib/errors';
import { DEFAULT_CUSTOM_LENGTH, ID_FORMATS } from '@/lib/ids';
import type { IdFormat } from '@/lib/ids';
import { normalizeStorageMode } from '@/lib/utils/paths';
import type { StorageMode } from '@/lib/utils/paths';
import { isValidTimezone } from '@/lib/time';

export interface ServerConfig {
  storageMode: StorageMode;
  dataDir?: string;
  projectRoot?: string;
  idFormat: IdFormat;
  customIdLength: number;
  localTimezone?: string;
  timeoutSeconds: number;
}

const numeric = (field: string) =>
  z
    .string()
    .regex(/^\d+$/, `${field} must be a positive integer`)
    .transform((value) => Number(value));

const ConfigSchema = z.object({
  storageMode: z.string().default('centralized').transform((value) => normalizeStorageMode(value)),
  dataDir: z.string().min(1).optional(),
  projectRoot: z.string().min(1).optional(),
  idFormat: z.enum(ID_FORMATS).default('short'),
  customIdLength: numeric('--custom-id-length')
    .pipe(z.number().int().min(6).max(32))
    .default(String(DEFAULT_CUSTOM_LENGTH)),
  localTimezone: z
    .string()
    .refine((value) => isValidTimezone(value), 'Unknown IANA timezone')
    .optional(),
  timeoutSeconds: numeric('--timeout').pipe(z.number().int().positive()).default('60'),
});

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        'storage-mode': { type: 'string' },
        'data-dir': { type: 'string' },
        'project-root': { type: 'string' },
        'id-format': { type: 'string' },
        'custom-id-length': { type: 'string' },
        'local-timezone': { type: 'string' },
        timeout: { type: 'string' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }
}

/** Reads server flags; invalid values fail before any storage is touched. */
export function loadConfig(argv: string[] = process.argv.slice(2)): ServerConfig {
  const values = parseFlags(argv);
  const result = ConfigSchema.safeParse({
    storageMode: values['storage-mode'],
    dataDir: values['data-dir'],
    projectRoot: values['project-root'],
    idFormat: values['id-format'],
    customIdLength: values['custom-id-length'],
    localTimezone: values['local-timezone'],
    timeoutSeconds: values.timeout,
  });
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${summary}`, result.error.issues);
  }
  return result.data;
}
