import * as path from 'node:path';
import type { Services } from './services.js';
import type { Task, StatusCounts } from '../tasks/index.js';
import { MemoryBankError, type MemoryBankFile, type PromptHistoryEntry, type UpdateMode } from '../memory/index.js';
import { createGitService, readSourceFile, walkFiles } from '../repo/index.js';
import { CliValidationError } from './errors.js';
import { type FsModule, hasErrorCode, toError } from '../utils/fs.js';

export const NONE = 'None';

const SUMMARY_LENGTH = 300;

export function formatTaskLine(task: Task): string {
  const deps = task.dependencies.length > 0 ? ` depends on: ${task.dependencies.join(', ')}` : '';
  return `- ${task.name} [${task.status}] (${task.priority})${deps}`;
}

export function formatTaskLines(tasks: Task[]): string {
  return tasks.length > 0 ? tasks.map(formatTaskLine).join('\n') : NONE;
}

export function formatCounts(counts: StatusCounts): string {
  const total = Object.values(counts).reduce((sum, n) => sum + n, 0);
  const lines = Object.entries(counts).map(([status, n]) => `${status}: ${n}`);
  return [`total: ${total}`, ...lines].join('\n');
}

function summarize(text: string): string {
  const flat = text.trim().replace(/\s+/g, ' ');
  return flat.length > SUMMARY_LENGTH ? `${flat.slice(0, SUMMARY_LENGTH)}...` : flat;
}

/**
 * Предыдущие записи истории как контекст промпта.
 */
export function formatHistory(entries: PromptHistoryEntry[]): string {
  if (entries.length === 0) {
    return NONE;
  }
  return entries
    .map((e) => `- ${e.timestamp}: ${e.response ? summarize(e.response) : `prompt prepared (${e.template})`}`)
    .join('\n');
}

export function formatList(items: string[]): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : NONE;
}

export async function projectContext(services: Services): Promise<string> {
  if (services.config.mode === 'hybrid') {
    const sections = await services.bank.sections('productContext.md');
    if (sections.length > 0) {
      return sections.map((s) => `${s.title}: ${s.content}`).join('\n');
    }
  }
  return `Project root: ${services.config.rootDir}`;
}

export function isHybrid(services: Services): boolean {
  return services.config.mode === 'hybrid';
}

/**
 * @throws {MemoryBankError} в режиме json
 */
export function requireBank(services: Services): void {
  if (!isHybrid(services)) {
    throw new MemoryBankError(
      'The markdown memory bank is disabled in json mode. Set mode: hybrid in prompt-manager.config.yml',
    );
  }
}

/** Пишет секцию в memory bank только в режиме hybrid */
export async function recordInBank(
  services: Services,
  file: MemoryBankFile,
  section: string,
  content: string,
  mode: UpdateMode,
): Promise<void> {
  if (isHybrid(services)) {
    await services.bank.updateSection(file, section, content, mode);
  }
}

export interface SourceFile {
  /** Путь как его передал пользователь */
  path: string;
  absolutePath: string;
  content: string;
}

export async function readTarget(services: Services, file: string): Promise<SourceFile> {
  const absolutePath = path.resolve(services.cwd, file);
  return { path: file, absolutePath, content: await readSourceFile(absolutePath, services.fs) };
}

/**
 * Файлы проекта: из git, а вне репозитория обходом директории.
 */
export async function projectFiles(services: Services, root = services.cwd): Promise<string[]> {
  const git = root === services.cwd ? services.git : createGitService(root, services.gitRunner);
  if (git.isRepository()) {
    return git.trackedFiles();
  }
  return walkFiles(root, services.fs);
}

/**
 * @throws {CliValidationError} если директории нет
 */
export async function assertDirectory(fs: FsModule, dir: string, display: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(dir)).isDirectory();
  } catch (e) {
    if (!hasErrorCode(e, 'ENOENT', 'ENOTDIR')) {
      throw toError(e);
    }
    isDirectory = false;
  }
  if (!isDirectory) {
    throw new CliValidationError(`Path '${display}' does not exist`);
  }
}
