import type * as defaultFs from 'node:fs/promises';

export type FsModule = typeof defaultFs;

export interface NodeError extends Error {
  code?: string;
}

export function isNodeError(e: unknown): e is NodeError {
  return e instanceof Error;
}

export function hasErrorCode(e: unknown, ...codes: string[]): boolean {
  return isNodeError(e) && e.code !== undefined && codes.includes(e.code);
}

/**
 * Приводит произвольное значение из catch к Error.
 */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

export async function pathExists(filePath: string, fs: FsModule): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
