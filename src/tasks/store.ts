import * as defaultFs from 'node:fs/promises';
import * as path from 'node:path';
import type {
  DependencyInfo,
  ExportFormat,
  ExportResult,
  ImportResult,
  ListTasksOptions,
  NewTaskInput,
  ProgressUpdate,
  StatusCounts,
  Task,
  TaskStatus,
} from './types.js';
import { TASKS_FILE_VERSION, tasksFileSchema, type ImportedTask, type TasksFile } from './schema.js';
import {
  TaskAlreadyExistsError,
  TaskImportError,
  TaskNotFoundError,
  TaskValidationError,
  CircularDependencyError,
} from './errors.js';
import { checkCircularDependencies, findCycle, type DependencyGraph } from './graph.js';
import { formatFromPath, parseTaskExport, serializeTasks } from './export.js';
import { createJsonFile, readTextFile, writeFileAtomic, type JsonFile } from '../storage/storage.js';
import { sortTasks } from '../utils/sort.js';
import { MAX_TASK_NAME_LENGTH, normalizeTaskName } from '../utils/validation.js';
import type { FsModule } from '../utils/fs.js';

export const TASKS_FILE_NAME = 'tasks.json';

export interface TaskStore {
  /** Создаёт пустой tasks.json, если его нет */
  initialize(): Promise<boolean>;
  add(input: NewTaskInput): Promise<Task>;
  get(name: string): Promise<Task>;
  /** Перезаписывает статус и всегда добавляет заметку */
  updateProgress(name: string, status: TaskStatus, note?: string): Promise<ProgressUpdate>;
  list(options?: ListTasksOptions): Promise<Task[]>;
  addDependency(name: string, dependsOn: string): Promise<Task>;
  removeDependency(name: string, dependsOn: string): Promise<Task>;
  listDependencies(name: string): Promise<DependencyInfo>;
  /** Задачи, связанные зависимостью в любую сторону */
  relatedTasks(name: string): Promise<Task[]>;
  stats(): Promise<StatusCounts>;
  exportTo(filePath: string, format?: ExportFormat): Promise<ExportResult>;
  importFrom(filePath: string, options?: { replace?: boolean }): Promise<ImportResult>;
}

export interface TaskStoreOptions {
  fs?: FsModule;
  now?: () => Date;
}

function uniqueTrimmed(values: string[]): string[] {
  return [...new Set(values.map((v) => v.trim()).filter((v) => v !== ''))];
}

function buildGraph(tasks: Task[]): DependencyGraph {
  const graph: DependencyGraph = {};
  for (const task of tasks) {
    graph[task.name] = task.dependencies;
  }
  return graph;
}

function emptyCounts(): StatusCounts {
  return { not_started: 0, in_progress: 0, completed: 0, blocked: 0, cancelled: 0 };
}

function fromImported(imported: ImportedTask, timestamp: string): Task {
  const { createdAt, updatedAt, template, completedAt, dependencies, tags, ...rest } = imported;
  const task: Task = {
    ...rest,
    tags: uniqueTrimmed(tags),
    dependencies: uniqueTrimmed(dependencies),
    createdAt: createdAt ?? timestamp,
    updatedAt: updatedAt ?? createdAt ?? timestamp,
  };
  if (template !== undefined) {
    task.template = template;
  }
  if (completedAt !== undefined) {
    task.completedAt = completedAt;
  }
  return task;
}

class TaskStoreImpl implements TaskStore {
  private readonly file: JsonFile<TasksFile>;

  constructor(
    memoryDir: string,
    private readonly fs: FsModule = defaultFs,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.file = createJsonFile(
      path.join(memoryDir, TASKS_FILE_NAME),
      tasksFileSchema,
      () => ({ version: TASKS_FILE_VERSION, tasks: [] }),
      fs,
    );
  }

  async initialize(): Promise<boolean> {
    return this.file.initialize();
  }

  private async load(): Promise<Task[]> {
    const data = await this.file.read();
    return data.tasks;
  }

  private async save(tasks: Task[]): Promise<void> {
    await this.file.write({ version: TASKS_FILE_VERSION, tasks });
  }

  private indexOf(tasks: Task[], name: string): number {
    const index = tasks.findIndex((t) => t.name === name);
    if (index === -1) {
      throw new TaskNotFoundError(name);
    }
    return index;
  }

  private find(tasks: Task[], name: string): Task {
    return tasks[this.indexOf(tasks, name)];
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  async add(input: NewTaskInput): Promise<Task> {
    const name = normalizeTaskName(input.name);
    if (name === null) {
      throw new TaskValidationError(
        input.name.trim() === ''
          ? 'Task name cannot be empty'
          : `Task name exceeds ${MAX_TASK_NAME_LENGTH} characters`,
      );
    }

    const tasks = await this.load();
    if (tasks.some((t) => t.name === name)) {
      throw new TaskAlreadyExistsError(name);
    }

    const dependencies = uniqueTrimmed(input.dependencies ?? []);
    checkCircularDependencies(name, dependencies, buildGraph(tasks));
    for (const dep of dependencies) {
      this.find(tasks, dep);
    }

    const timestamp = this.timestamp();
    const task: Task = {
      name,
      description: input.description?.trim() ?? '',
      status: 'not_started',
      priority: input.priority ?? 'medium',
      tags: uniqueTrimmed(input.tags ?? []),
      dependencies,
      notes: [],
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    if (input.template) {
      task.template = input.template;
    }

    await this.save([...tasks, task]);
    return task;
  }

  async get(name: string): Promise<Task> {
    return this.find(await this.load(), name);
  }

  async updateProgress(name: string, status: TaskStatus, note?: string): Promise<ProgressUpdate> {
    const tasks = await this.load();
    const index = this.indexOf(tasks, name);
    const current = tasks[index];
    const timestamp = this.timestamp();

    const text = note?.trim() || `Status changed from ${current.status} to ${status}`;
    const updated: Task = {
      ...current,
      status,
      updatedAt: timestamp,
      notes: [...current.notes, { timestamp, status, text }],
    };

    if (status === 'completed') {
      updated.completedAt = current.status === 'completed' ? current.completedAt : timestamp;
    } else {
      delete updated.completedAt;
    }

    tasks[index] = updated;
    await this.save(tasks);
    return { task: updated, previousStatus: current.status };
  }

  async list(options: ListTasksOptions = {}): Promise<Task[]> {
    const tasks = (await this.load()).filter(
      (t) =>
        (options.status === undefined || t.status === options.status) &&
        (options.priority === undefined || t.priority === options.priority) &&
        (options.tag === undefined || t.tags.includes(options.tag)),
    );
    return options.sortBy ? sortTasks(tasks, options.sortBy) : tasks;
  }

  async addDependency(name: string, dependsOn: string): Promise<Task> {
    const tasks = await this.load();
    const index = this.indexOf(tasks, name);
    this.find(tasks, dependsOn);

    const task = tasks[index];
    if (task.dependencies.includes(dependsOn)) {
      return task;
    }

    const dependencies = [...task.dependencies, dependsOn];
    checkCircularDependencies(name, dependencies, buildGraph(tasks));

    const updated: Task = { ...task, dependencies, updatedAt: this.timestamp() };
    tasks[index] = updated;
    await this.save(tasks);
    return updated;
  }

  async removeDependency(name: string, dependsOn: string): Promise<Task> {
    const tasks = await this.load();
    const index = this.indexOf(tasks, name);
    const task = tasks[index];

    if (!task.dependencies.includes(dependsOn)) {
      throw new TaskValidationError(`Task '${name}' does not depend on '${dependsOn}'`);
    }

    const updated: Task = {
      ...task,
      dependencies: task.dependencies.filter((d) => d !== dependsOn),
      updatedAt: this.timestamp(),
    };
    tasks[index] = updated;
    await this.save(tasks);
    return updated;
  }

  async listDependencies(name: string): Promise<DependencyInfo> {
    const tasks = await this.load();
    const task = this.find(tasks, name);
    return {
      name,
      dependsOn: [...task.dependencies],
      dependents: tasks.filter((t) => t.dependencies.includes(name)).map((t) => t.name),
    };
  }

  async relatedTasks(name: string): Promise<Task[]> {
    const tasks = await this.load();
    const task = this.find(tasks, name);
    return tasks.filter(
      (t) => task.dependencies.includes(t.name) || t.dependencies.includes(name),
    );
  }

  async stats(): Promise<StatusCounts> {
    const counts = emptyCounts();
    for (const task of await this.load()) {
      counts[task.status] += 1;
    }
    return counts;
  }

  async exportTo(filePath: string, format?: ExportFormat): Promise<ExportResult> {
    const tasks = await this.load();
    const resolvedFormat = format ?? formatFromPath(filePath);
    await writeFileAtomic(filePath, serializeTasks(tasks, resolvedFormat, this.timestamp()), this.fs);
    return { path: filePath, format: resolvedFormat, count: tasks.length };
  }

  async importFrom(filePath: string, options: { replace?: boolean } = {}): Promise<ImportResult> {
    const content = await readTextFile(filePath, this.fs);
    if (content === null) {
      throw new TaskImportError(`Import file not found: ${filePath}`);
    }

    const timestamp = this.timestamp();
    const imported = parseTaskExport(content, formatFromPath(filePath), filePath).map((t) =>
      fromImported(t, timestamp),
    );

    const seen = new Set<string>();
    for (const task of imported) {
      if (seen.has(task.name)) {
        throw new TaskImportError(`Duplicate task in ${filePath}: ${task.name}`);
      }
      seen.add(task.name);
    }

    const existing = await this.load();
    // С replace старая коллекция отбрасывается: все задачи считаются добавленными
    const existingNames = new Set(options.replace ? [] : existing.map((t) => t.name));
    const merged = options.replace ? [] : [...existing];
    const added: string[] = [];
    const updated: string[] = [];

    for (const task of imported) {
      const index = merged.findIndex((t) => t.name === task.name);
      if (index === -1) {
        merged.push(task);
      } else {
        merged[index] = task;
      }
      (existingNames.has(task.name) ? updated : added).push(task.name);
    }

    const names = new Set(merged.map((t) => t.name));
    for (const task of merged) {
      const unknown = task.dependencies.find((dep) => !names.has(dep));
      if (unknown !== undefined) {
        throw new TaskImportError(`Task '${task.name}' depends on unknown task '${unknown}'`);
      }
    }

    const cycle = findCycle(buildGraph(merged));
    if (cycle) {
      throw new CircularDependencyError(`Circular dependency detected: ${cycle.join(' -> ')}`, cycle);
    }

    await this.save(merged);
    return { added, updated, total: merged.length };
  }
}

export function createTaskStore(memoryDir: string, options: TaskStoreOptions = {}): TaskStore {
  return new TaskStoreImpl(memoryDir, options.fs, options.now);
}
