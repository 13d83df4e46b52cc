import * as defaultFs from 'node:fs/promises';
import * as path from 'node:path';
import type { z } from 'zod';
import { StorageAccessError, StorageParseError, StorageWriteError } from './errors.js';
import { type FsModule, hasErrorCode, isNodeError, pathExists, toError } from '../utils/fs.js';

/**
 * JSON-файл со схемой: читается целиком, пишется атомарно.
 */
export interface JsonFile<T> {
  readonly filePath: string;
  read(): Promise<T>;
  write(data: T): Promise<void>;
  exists(): Promise<boolean>;
  /** Записывает `fallback()`, если файла нет. true, если файл создан */
  initialize(): Promise<boolean>;
}

function mapWriteError(e: unknown, context: string): never {
  if (isNodeError(e)) {
    switch (e.code) {
      case 'EACCES':
        throw new StorageAccessError(`Permission denied: ${context}`, e);
      case 'EISDIR':
        throw new StorageAccessError(`Path is a directory: ${context}`, e);
      case 'EROFS':
        throw new StorageAccessError(`Read-only file system: ${context}`, e);
      case 'ENOSPC':
        throw new StorageWriteError(`No space left on device: ${context}`, e);
      default:
        throw new StorageWriteError(`Write failed: ${context}`, e);
    }
  }
  throw new StorageWriteError(`Unknown error: ${context}`, toError(e));
}

async function ensureDirectoryExists(dir: string, fs: FsModule): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (e) {
    if (hasErrorCode(e, 'EEXIST')) {
      return;
    }
    if (hasErrorCode(e, 'EACCES', 'EROFS', 'EISDIR', 'ENOTDIR')) {
      throw new StorageAccessError(`Cannot create directory: ${dir}`, toError(e));
    }
    throw new StorageWriteError(`Cannot create directory: ${dir}`, toError(e));
  }
}

/**
 * Пишет файл через `<file>.tmp` + rename. Родительская директория создаётся.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string,
  fs: FsModule = defaultFs,
): Promise<void> {
  await ensureDirectoryExists(path.dirname(filePath), fs);

  const tempPath = `${filePath}.tmp`;

  // Cleanup старый .tmp если есть
  try {
    await fs.unlink(tempPath);
  } catch (e) {
    if (!hasErrorCode(e, 'ENOENT')) {
      mapWriteError(e, filePath);
    }
  }

  let tempFileCreated = false;

  try {
    await fs.writeFile(tempPath, content, 'utf8');
    tempFileCreated = true;
    await fs.rename(tempPath, filePath);
  } catch (e) {
    if (tempFileCreated) {
      await fs.unlink(tempPath).catch(() => undefined);
    }
    mapWriteError(e, filePath);
  }
}

/**
 * Читает текстовый файл. Отсутствующий файл → null.
 */
export async function readTextFile(
  filePath: string,
  fs: FsModule = defaultFs,
): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (e) {
    if (hasErrorCode(e, 'ENOENT')) {
      return null;
    }
    if (hasErrorCode(e, 'EACCES')) {
      throw new StorageAccessError(`Permission denied: ${filePath}`, toError(e));
    }
    if (hasErrorCode(e, 'EISDIR')) {
      throw new StorageAccessError(`Path is a directory: ${filePath}`, toError(e));
    }
    throw new StorageAccessError(`Read failed: ${filePath}`, toError(e));
  }
}

/**
 * Извлекает позицию из сообщения SyntaxError.
 * V8 formats: "Unexpected token } in JSON at position 42"
 *             "... is not valid JSON" (Node 20, без позиции)
 */
function extractPosition(message: string): string | undefined {
  const posMatch = message.match(/at position (\d+)/);
  if (posMatch) {
    return posMatch[1];
  }
  const colMatch = message.match(/at line \d+ column (\d+)/);
  return colMatch ? colMatch[1] : undefined;
}

export function parseJson(content: string, filePath: string): unknown {
  try {
    return JSON.parse(content);
  } catch (e) {
    if (e instanceof SyntaxError) {
      throw new StorageParseError(
        `Invalid JSON in ${filePath}`,
        filePath,
        e.message,
        extractPosition(e.message),
        e,
      );
    }
    throw e;
  }
}

export function serializeJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

class JsonFileImpl<T> implements JsonFile<T> {
  constructor(
    readonly filePath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly fallback: () => T,
    private readonly fs: FsModule = defaultFs,
  ) {}

  async read(): Promise<T> {
    const content = await readTextFile(this.filePath, this.fs);
    if (content === null) {
      return this.fallback();
    }

    const raw = parseJson(content, this.filePath);
    const result = this.schema.safeParse(raw);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new StorageParseError(
        `Unexpected data in ${this.filePath}: ${details}`,
        this.filePath,
        details,
        undefined,
        result.error,
      );
    }
    return result.data;
  }

  async write(data: T): Promise<void> {
    await writeFileAtomic(this.filePath, serializeJson(data), this.fs);
  }

  async exists(): Promise<boolean> {
    return pathExists(this.filePath, this.fs);
  }

  async initialize(): Promise<boolean> {
    if (await this.exists()) {
      return false;
    }
    await this.write(this.fallback());
    return true;
  }
}

export function createJsonFile<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: () => T,
  fs?: FsModule,
): JsonFile<T> {
  return new JsonFileImpl(filePath, schema, fallback, fs);
}

// Экспорт для тестов
export { JsonFileImpl };
