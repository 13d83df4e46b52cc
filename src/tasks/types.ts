export const TASK_STATUSES = [
  'not_started',
  'in_progress',
  'completed',
  'blocked',
  'cancelled',
] as const;

/**
 * Плоский набор статусов: переход возможен из любого в любой.
 */
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TASK_PRIORITIES = ['low', 'medium', 'high'] as const;

export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export const TASK_SORT_FIELDS = ['name', 'priority', 'status', 'created', 'updated'] as const;

export type TaskSortField = (typeof TASK_SORT_FIELDS)[number];

export const EXPORT_FORMATS = ['json', 'yaml', 'markdown'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface TaskNote {
  timestamp: string;
  status: TaskStatus;
  text: string;
}

export interface Task {
  /** Уникальный идентификатор задачи */
  name: string;
  description: string;
  status: TaskStatus;
  priority: TaskPriority;
  /** Шаблон или свободный текст, связанный с задачей */
  template?: string;
  tags: string[];
  /** Имена задач, от которых зависит эта */
  dependencies: string[];
  notes: TaskNote[];
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
}

export interface NewTaskInput {
  name: string;
  description?: string;
  priority?: TaskPriority;
  template?: string;
  tags?: string[];
  dependencies?: string[];
}

export interface ListTasksOptions {
  status?: TaskStatus;
  priority?: TaskPriority;
  tag?: string;
  sortBy?: TaskSortField;
}

export interface ProgressUpdate {
  task: Task;
  previousStatus: TaskStatus;
}

export interface DependencyInfo {
  name: string;
  dependsOn: string[];
  dependents: string[];
}

export interface ExportResult {
  path: string;
  format: ExportFormat;
  count: number;
}

export interface ImportResult {
  added: string[];
  updated: string[];
  total: number;
}

export type StatusCounts = Record<TaskStatus, number>;
