import * as defaultFs from 'node:fs/promises';
import * as path from 'node:path';
import type { BackupResult } from './types.js';
import { MemoryBankError } from './errors.js';
import { writeFileAtomic } from '../storage/storage.js';
import { type FsModule, hasErrorCode, pathExists, toError } from '../utils/fs.js';

export const BACKUPS_DIR_NAME = 'backups';

/**
 * Снимки memory директории в `<memoryDir>/backups/<id>/`.
 */
const BACKUP_ID_REGEX = /^(\d{8}-\d{6})(?:-(\d+))?$/;

/**
 * `<id>`, `<id>-2`, ..., `<id>-10`: по времени, затем по номеру суффикса.
 */
export function compareBackupIds(a: string, b: string): number {
  const ma = BACKUP_ID_REGEX.exec(a);
  const mb = BACKUP_ID_REGEX.exec(b);
  if (!ma || !mb || ma[1] !== mb[1]) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return Number(ma[2] ?? 1) - Number(mb[2] ?? 1);
}

export interface BackupService {
  backup(): Promise<BackupResult>;
  /** Идентификаторы в хронологическом порядке */
  listBackups(): Promise<string[]>;
  /** `latest` означает последний бэкап */
  restore(id: string): Promise<BackupResult>;
}

/**
 * 2026-03-01T10:04:05.123Z → 20260301-100405
 */
export function backupIdFromDate(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace('T', '-').slice(0, 15);
}

class BackupServiceImpl implements BackupService {
  constructor(
    private readonly memoryDir: string,
    private readonly fs: FsModule,
    private readonly now: () => Date,
  ) {}

  private get backupsDir(): string {
    return path.join(this.memoryDir, BACKUPS_DIR_NAME);
  }

  private async listFiles(dir: string): Promise<string[]> {
    let entries: string[];
    try {
      entries = await this.fs.readdir(dir);
    } catch (e) {
      if (hasErrorCode(e, 'ENOENT')) {
        return [];
      }
      throw new MemoryBankError(`Cannot read directory ${dir}`, toError(e));
    }

    const files: string[] = [];
    for (const entry of entries.sort()) {
      if (entry.endsWith('.tmp')) {
        continue;
      }
      const stat = await this.fs.stat(path.join(dir, entry));
      if (stat.isFile()) {
        files.push(entry);
      }
    }
    return files;
  }

  private async copyFiles(from: string, to: string, files: string[]): Promise<void> {
    for (const file of files) {
      const content = await this.fs.readFile(path.join(from, file), 'utf8');
      await writeFileAtomic(path.join(to, file), content, this.fs);
    }
  }

  async backup(): Promise<BackupResult> {
    const files = await this.listFiles(this.memoryDir);
    if (files.length === 0) {
      throw new MemoryBankError(`Nothing to back up in ${this.memoryDir}`);
    }

    const baseId = backupIdFromDate(this.now());
    let id = baseId;
    for (let suffix = 2; await pathExists(path.join(this.backupsDir, id), this.fs); suffix++) {
      id = `${baseId}-${suffix}`;
    }

    await this.copyFiles(this.memoryDir, path.join(this.backupsDir, id), files);
    return { id, files };
  }

  async listBackups(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await this.fs.readdir(this.backupsDir);
    } catch (e) {
      if (hasErrorCode(e, 'ENOENT')) {
        return [];
      }
      throw new MemoryBankError(`Cannot read backups in ${this.backupsDir}`, toError(e));
    }
    return entries.sort(compareBackupIds);
  }

  async restore(id: string): Promise<BackupResult> {
    const backups = await this.listBackups();
    if (backups.length === 0) {
      throw new MemoryBankError('No backups found');
    }

    const resolvedId = id === 'latest' ? backups[backups.length - 1] : id;
    if (!backups.includes(resolvedId)) {
      throw new MemoryBankError(`Backup not found: ${id}`);
    }

    const backupDir = path.join(this.backupsDir, resolvedId);
    const files = await this.listFiles(backupDir);
    await this.copyFiles(backupDir, this.memoryDir, files);
    return { id: resolvedId, files };
  }
}

export function createBackupService(
  memoryDir: string,
  options: { fs?: FsModule; now?: () => Date } = {},
): BackupService {
  return new BackupServiceImpl(memoryDir, options.fs ?? defaultFs, options.now ?? (() => new Date()));
}
