export {
  TaskNotFoundError,
  TaskAlreadyExistsError,
  TaskValidationError,
  CircularDependencyError,
  TaskImportError,
} from './errors.js';
export { createTaskStore, TASKS_FILE_NAME, type TaskStore } from './store.js';
export { formatFromPath, serializeTasks, tasksToMarkdown, parseTaskExport } from './export.js';
export { checkCircularDependencies, findCycle, type DependencyGraph } from './graph.js';
export * from './types.js';
