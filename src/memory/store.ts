import * as path from 'node:path';
import { z } from 'zod';
import type { JsonValue, MemoryEntry } from './types.js';
import { MemoryKeyNotFoundError, MemoryValidationError } from './errors.js';
import { createJsonFile, type JsonFile } from '../storage/storage.js';
import { isValidMemoryKey, MAX_MEMORY_KEY_LENGTH } from '../utils/validation.js';
import type { FsModule } from '../utils/fs.js';

export const CONTEXT_FILE_NAME = 'context.json';

interface StoredEntry {
  value: JsonValue;
  updatedAt: string;
}

interface ContextFile {
  version: number;
  entries: Record<string, StoredEntry>;
}

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const contextFileSchema: z.ZodType<ContextFile, z.ZodTypeDef, unknown> = z.object({
  version: z.number().int(),
  entries: z.record(z.object({ value: jsonValueSchema, updatedAt: z.string() })),
});

/**
 * Плоское key-value хранилище. Последняя запись побеждает.
 */
export interface MemoryStore {
  initialize(): Promise<boolean>;
  store(key: string, value: JsonValue): Promise<MemoryEntry>;
  retrieve(key: string): Promise<MemoryEntry>;
  /** Все записи, отсортированные по ключу */
  list(): Promise<MemoryEntry[]>;
  remove(key: string): Promise<boolean>;
}

export interface MemoryStoreOptions {
  fs?: FsModule;
  now?: () => Date;
}

function validateKey(key: string): void {
  if (!isValidMemoryKey(key)) {
    throw new MemoryValidationError(
      `Invalid memory key '${key}': keys must be 1-${MAX_MEMORY_KEY_LENGTH} characters without whitespace`,
    );
  }
}

class MemoryStoreImpl implements MemoryStore {
  private readonly file: JsonFile<ContextFile>;

  constructor(
    memoryDir: string,
    fs: FsModule | undefined,
    private readonly now: () => Date,
  ) {
    this.file = createJsonFile(
      path.join(memoryDir, CONTEXT_FILE_NAME),
      contextFileSchema,
      () => ({ version: 1, entries: {} }),
      fs,
    );
  }

  async initialize(): Promise<boolean> {
    return this.file.initialize();
  }

  async store(key: string, value: JsonValue): Promise<MemoryEntry> {
    validateKey(key);
    const data = await this.file.read();
    const entry: StoredEntry = { value, updatedAt: this.now().toISOString() };
    await this.file.write({ ...data, entries: { ...data.entries, [key]: entry } });
    return { key, ...entry };
  }

  async retrieve(key: string): Promise<MemoryEntry> {
    const { entries } = await this.file.read();
    const entry = Object.prototype.hasOwnProperty.call(entries, key) ? entries[key] : undefined;
    if (!entry) {
      throw new MemoryKeyNotFoundError(key);
    }
    return { key, ...entry };
  }

  async list(): Promise<MemoryEntry[]> {
    const { entries } = await this.file.read();
    return Object.keys(entries)
      .sort()
      .map((key) => ({ key, ...entries[key] }));
  }

  async remove(key: string): Promise<boolean> {
    const data = await this.file.read();
    if (!Object.prototype.hasOwnProperty.call(data.entries, key)) {
      return false;
    }
    const entries = { ...data.entries };
    delete entries[key];
    await this.file.write({ ...data, entries });
    return true;
  }
}

export function createMemoryStore(memoryDir: string, options: MemoryStoreOptions = {}): MemoryStore {
  return new MemoryStoreImpl(memoryDir, options.fs, options.now ?? (() => new Date()));
}
