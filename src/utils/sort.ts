import {
  TASK_PRIORITIES,
  TASK_STATUSES,
  type Task,
  type TaskSortField,
} from '../tasks/types.js';

type Comparator = (a: Task, b: Task) => number;

// ISO-8601 timestamps сравниваются как строки
function compareTimestamps(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

const comparators: Record<TaskSortField, Comparator> = {
  name: (a, b) => a.name.localeCompare(b.name),
  // high → medium → low
  priority: (a, b) => TASK_PRIORITIES.indexOf(b.priority) - TASK_PRIORITIES.indexOf(a.priority),
  status: (a, b) => TASK_STATUSES.indexOf(a.status) - TASK_STATUSES.indexOf(b.status),
  created: (a, b) => compareTimestamps(a.createdAt, b.createdAt),
  // Последние изменённые первыми
  updated: (a, b) => compareTimestamps(b.updatedAt, a.updatedAt),
};

/**
 * Сортирует задачи по полю. Сортировка стабильная: при равенстве
 * сохраняется порядок добавления.
 *
 * @example
 * sortTasks(tasks, 'priority') // high, high, medium, low
 */
export function sortTasks(tasks: Task[], field: TaskSortField): Task[] {
  return [...tasks].sort(comparators[field]);
}
