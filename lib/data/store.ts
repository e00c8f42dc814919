import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import lockfile from 'proper-lockfile';
import type { StoreDocument } from '@/types/data';
import { StoreFileSchemaV2 } from '@/lib/validation/schemas';
import { StorageError, errorCode } from '@/lib/errors';
import { emptyDocument, migrateDocument } from '@/lib/data/migrations';

export const DEFAULT_STORE_FILE = 'chronolog.json';
const GLOBAL_LOCK_FILE = 'store.global.lock';

const LOCK_CONFIG = {
  stale: 15000,
  retries: {
    retries: 20,
    minTimeout: 100,
    maxTimeout: 1000,
  },
  onCompromised: (err: Error) => {
    console.error('CRITICAL: Store lock was compromised!', err);
    console.error(
      'This typically indicates: stale lock, process crash during write, or a second server on the same directory'
    );
    throw new Error('Data integrity cannot be guaranteed - lock was compromised. Check logs.');
  },
};

interface LockContext {
  depth: number;
}

export interface RecordStoreOptions {
  dataDir: string;
  fileName?: string;
  /** Older store files imported, first match wins, when the store file does not exist yet. */
  legacyFiles?: readonly string[];
}

/**
 * Owns the on-disk store document.
 *
 * Every public call reloads the file, so nothing outside the store keeps a
 * mutable document between operations. Calls on one instance run one at a
 * time; each also holds an advisory lock file in the data directory.
 */
export class RecordStore {
  readonly dataDir: string;
  readonly filePath: string;
  private readonly lockPath: string;
  private readonly legacyFiles: readonly string[];
  private readonly lockStorage = new AsyncLocalStorage<LockContext>();
  private queue: Promise<void> = Promise.resolve();

  constructor(options: RecordStoreOptions) {
    this.dataDir = path.resolve(options.dataDir);
    this.filePath = path.join(this.dataDir, options.fileName ?? DEFAULT_STORE_FILE);
    this.lockPath = path.join(this.dataDir, GLOBAL_LOCK_FILE);
    this.legacyFiles = (options.legacyFiles ?? []).filter((file) => path.resolve(file) !== this.filePath);
  }

  async read(): Promise<StoreDocument> {
    return this.exclusive(() => this.readUnlocked());
  }

  async write(document: StoreDocument): Promise<void> {
    return this.exclusive(() => this.writeValidated(document));
  }

  /**
   * Read-modify-write as one unit. The updater mutates the loaded document in
   * place; the document is persisted only if the updater returns normally.
   */
  async mutate<TResult>(updater: (document: StoreDocument) => Promise<TResult> | TResult): Promise<TResult> {
    return this.exclusive(async () => {
      const current = await this.readUnlocked();
      const result = await updater(current);
      await this.writeValidated(current);
      return result;
    });
  }

  private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const existingContext = this.lockStorage.getStore();
    if (existingContext && existingContext.depth > 0) {
      existingContext.depth += 1;
      try {
        return await fn();
      } finally {
        existingContext.depth -= 1;
      }
    }

    const turn = this.queue.then(() => this.withFileLock(fn));
    this.queue = turn.then(
      () => undefined,
      () => undefined
    );
    return turn;
  }

  private async withFileLock<T>(fn: () => Promise<T>): Promise<T> {
    try {
      await fs.mkdir(this.dataDir, { recursive: true });
      await fs.writeFile(this.lockPath, '', { flag: 'wx' });
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        throw new StorageError(`Failed to prepare lock file in ${this.dataDir}`, this.lockPath, error);
      }
    }

    const release = await lockfile.lock(this.lockPath, LOCK_CONFIG).catch((error: unknown) => {
      console.error('Failed to acquire store lock:', error);
      throw new StorageError('Store is busy. Please try again in a moment.', this.lockPath, error);
    });

    const context: LockContext = { depth: 1 };
    try {
      return await this.lockStorage.run(context, fn);
    } finally {
      await release();
    }
  }

  private async readUnlocked(): Promise<StoreDocument> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return this.importLegacy();
      }
      throw new StorageError(`Failed to read store file ${this.filePath}`, this.filePath, error);
    }

    const { document, migrated } = migrateDocument(parseJson(content, this.filePath), this.filePath);
    if (migrated) {
      console.warn(`Writing migrated ${this.filePath}`);
      await this.writeUnsafe(document);
    }
    return document;
  }

  private async importLegacy(): Promise<StoreDocument> {
    for (const legacyPath of this.legacyFiles) {
      let content: string;
      try {
        content = await fs.readFile(legacyPath, 'utf-8');
      } catch (error) {
        if (errorCode(error) === 'ENOENT') continue;
        throw new StorageError(`Failed to read legacy store file ${legacyPath}`, legacyPath, error);
      }

      const { document } = migrateDocument(parseJson(content, legacyPath), legacyPath);
      console.warn(`Imported legacy store ${legacyPath} into ${this.filePath}`);
      await this.writeUnsafe(document);
      return document;
    }
    return emptyDocument();
  }

  private async writeValidated(document: StoreDocument): Promise<void> {
    const validation = StoreFileSchemaV2.safeParse(document);
    if (!validation.success) {
      console.error(`Validation failed before write for ${this.filePath}:`, validation.error.message);
      throw new StorageError(
        `Refusing to write invalid store document: ${validation.error.message}`,
        this.filePath,
        validation.error
      );
    }
    await this.writeUnsafe(validation.data);
  }

  private async writeUnsafe(document: StoreDocument): Promise<void> {
    const tempPath = `${this.filePath}.tmp.${crypto.randomUUID()}`;
    try {
      await fs.mkdir(this.dataDir, { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(document, null, 2), 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        console.warn(`Failed to remove temp file ${tempPath}:`, cleanupError);
      });
      throw new StorageError(`Failed to write store file ${this.filePath}`, this.filePath, error);
    }
  }
}

function parseJson(content: string, filepath: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    console.error(`Corrupted store file: ${filepath}`, error instanceof Error ? error.message : error);
    throw new StorageError(`Store file is corrupted: invalid JSON in ${filepath}`, filepath, error);
  }
}
