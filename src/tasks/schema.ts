import { z } from 'zod';
import { TASK_PRIORITIES, TASK_STATUSES, type Task } from './types.js';

export const TASKS_FILE_VERSION = 1;

export interface TasksFile {
  version: number;
  tasks: Task[];
}

const taskNoteSchema = z.object({
  timestamp: z.string(),
  status: z.enum(TASK_STATUSES),
  text: z.string(),
});

const taskSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  status: z.enum(TASK_STATUSES),
  priority: z.enum(TASK_PRIORITIES),
  template: z.string().optional(),
  tags: z.array(z.string()).default([]),
  dependencies: z.array(z.string()).default([]),
  notes: z.array(taskNoteSchema).default([]),
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().optional(),
});

export const tasksFileSchema: z.ZodType<TasksFile, z.ZodTypeDef, unknown> = z.object({
  version: z.number().int(),
  tasks: z.array(taskSchema),
});

/**
 * Задача из файла экспорта: всё, кроме имени, может отсутствовать.
 */
export const importedTaskSchema = z.object({
  name: z.string().trim().min(1, 'task name cannot be empty'),
  description: z.string().default(''),
  status: z.enum(TASK_STATUSES).default('not_started'),
  priority: z.enum(TASK_PRIORITIES).default('medium'),
  template: z.string().optional(),
  tags: z.array(z.string()).default([]),
  dependencies: z.array(z.string()).default([]),
  notes: z.array(taskNoteSchema).default([]),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
  completedAt: z.string().optional(),
});

export type ImportedTask = z.infer<typeof importedTaskSchema>;

export const taskExportSchema = z.object({
  version: z.number().int().optional(),
  exportedAt: z.string().optional(),
  tasks: z.array(importedTaskSchema),
});
