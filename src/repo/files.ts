import * as defaultFs from 'node:fs/promises';
import * as path from 'node:path';
import { SourceFileNotFoundError, SourceFileReadError } from './errors.js';
import { type FsModule, hasErrorCode, toError } from '../utils/fs.js';

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  '.ts': 'TypeScript',
  '.tsx': 'TypeScript',
  '.mts': 'TypeScript',
  '.cts': 'TypeScript',
  '.js': 'JavaScript',
  '.jsx': 'JavaScript',
  '.mjs': 'JavaScript',
  '.cjs': 'JavaScript',
  '.py': 'Python',
  '.rb': 'Ruby',
  '.go': 'Go',
  '.rs': 'Rust',
  '.java': 'Java',
  '.kt': 'Kotlin',
  '.swift': 'Swift',
  '.c': 'C',
  '.h': 'C',
  '.cpp': 'C++',
  '.hpp': 'C++',
  '.cs': 'C#',
  '.php': 'PHP',
  '.sh': 'Shell',
  '.css': 'CSS',
  '.scss': 'CSS',
  '.html': 'HTML',
  '.vue': 'Vue',
  '.md': 'Markdown',
  '.yml': 'YAML',
  '.yaml': 'YAML',
  '.json': 'JSON',
  '.sql': 'SQL',
};

const IGNORED_DIRS = new Set(['node_modules', '.git', 'dist', 'coverage']);

export const MAX_WALK_FILES = 5000;

export interface FileSummary {
  fileCount: number;
  /** До пяти языков, самые частые первыми */
  languages: string[];
}

export function languageOf(filePath: string): string | undefined {
  return LANGUAGE_BY_EXTENSION[path.extname(filePath).toLowerCase()];
}

export function summarizeFiles(paths: string[]): FileSummary {
  const counts = new Map<string, number>();
  for (const file of paths) {
    const language = languageOf(file);
    if (language) {
      counts.set(language, (counts.get(language) ?? 0) + 1);
    }
  }
  const languages = [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, 5)
    .map(([language]) => language);
  return { fileCount: paths.length, languages };
}

/**
 * @throws {SourceFileNotFoundError} если файла нет или это не файл
 */
export async function readSourceFile(filePath: string, fs: FsModule = defaultFs): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (e) {
    if (hasErrorCode(e, 'ENOENT', 'EISDIR', 'ENOTDIR')) {
      throw new SourceFileNotFoundError(filePath);
    }
    throw new SourceFileReadError(`Cannot read ${filePath}`, filePath, toError(e));
  }
}

/**
 * Обход директории для проектов без git. Пути относительны `root`.
 */
export async function walkFiles(root: string, fs: FsModule = defaultFs): Promise<string[]> {
  const files: string[] = [];
  const pending = [''];

  while (pending.length > 0 && files.length < MAX_WALK_FILES) {
    const relative = pending.shift() ?? '';
    const entries = await fs.readdir(path.join(root, relative), { withFileTypes: true });
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      const entryPath = relative ? `${relative}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        if (!IGNORED_DIRS.has(entry.name)) {
          pending.push(entryPath);
        }
      } else if (entry.isFile() && files.length < MAX_WALK_FILES) {
        files.push(entryPath);
      }
    }
  }
  return files;
}
