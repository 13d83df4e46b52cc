import * as path from 'node:path';
import { parse, stringify } from 'yaml';
import type { ExportFormat, Task } from './types.js';
import { TASKS_FILE_VERSION, taskExportSchema, type ImportedTask } from './schema.js';
import { TaskImportError } from './errors.js';
import { serializeJson } from '../storage/storage.js';
import { toError } from '../utils/fs.js';

/**
 * Формат по расширению: .md → markdown, .yml/.yaml → yaml, иначе json.
 */
export function formatFromPath(filePath: string): ExportFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.md' || ext === '.markdown') {
    return 'markdown';
  }
  if (ext === '.yml' || ext === '.yaml') {
    return 'yaml';
  }
  return 'json';
}

function taskToMarkdown(task: Task): string[] {
  const lines = [`## ${task.name}`, '', `- Status: ${task.status}`, `- Priority: ${task.priority}`];
  if (task.template) {
    lines.push(`- Template: ${task.template}`);
  }
  if (task.tags.length > 0) {
    lines.push(`- Tags: ${task.tags.join(', ')}`);
  }
  if (task.dependencies.length > 0) {
    lines.push(`- Depends on: ${task.dependencies.join(', ')}`);
  }
  lines.push(`- Created: ${task.createdAt}`, `- Updated: ${task.updatedAt}`);
  if (task.completedAt) {
    lines.push(`- Completed: ${task.completedAt}`);
  }
  if (task.description) {
    lines.push('', task.description);
  }
  if (task.notes.length > 0) {
    lines.push('', '### Notes', '');
    for (const note of task.notes) {
      lines.push(`- ${note.timestamp} [${note.status}] ${note.text}`);
    }
  }
  return lines;
}

export function tasksToMarkdown(tasks: Task[], exportedAt: string): string {
  const lines = ['# Tasks', '', `Exported: ${exportedAt}`];
  if (tasks.length === 0) {
    lines.push('', 'No tasks.');
  }
  for (const task of tasks) {
    lines.push('', ...taskToMarkdown(task));
  }
  return `${lines.join('\n')}\n`;
}

export function serializeTasks(tasks: Task[], format: ExportFormat, exportedAt: string): string {
  switch (format) {
    case 'json':
      return serializeJson({ version: TASKS_FILE_VERSION, exportedAt, tasks });
    case 'yaml':
      return stringify({ version: TASKS_FILE_VERSION, exportedAt, tasks });
    case 'markdown':
      return tasksToMarkdown(tasks, exportedAt);
  }
}

/**
 * Разбирает файл экспорта (json или yaml). Голый массив задач тоже принимается.
 * @throws {TaskImportError} для markdown, невалидного синтаксиса или данных
 */
export function parseTaskExport(
  content: string,
  format: ExportFormat,
  filePath: string,
): ImportedTask[] {
  if (format === 'markdown') {
    throw new TaskImportError(
      `Cannot import ${filePath}: markdown exports are read-only, use json or yaml`,
    );
  }

  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(content) : parse(content);
  } catch (e) {
    throw new TaskImportError(`Invalid ${format} in ${filePath}`, toError(e));
  }

  const result = taskExportSchema.safeParse(Array.isArray(raw) ? { tasks: raw } : raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new TaskImportError(`Invalid task export ${filePath}: ${details}`, result.error);
  }
  return result.data.tasks;
}
