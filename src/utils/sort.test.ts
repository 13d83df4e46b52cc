import { describe, it, expect } from 'vitest';
import { sortTasks } from './sort.js';
import type { Task } from '../tasks/types.js';

function task(name: string, overrides: Partial<Task> = {}): Task {
  return {
    name,
    description: '',
    status: 'not_started',
    priority: 'medium',
    tags: [],
    dependencies: [],
    notes: [],
    createdAt: '2026-03-01T10:00:00.000Z',
    updatedAt: '2026-03-01T10:00:00.000Z',
    ...overrides,
  };
}

const names = (tasks: Task[]): string[] => tasks.map((t) => t.name);

describe('sortTasks', () => {
  it('должен сортировать по имени', () => {
    expect(names(sortTasks([task('b'), task('c'), task('a')], 'name'))).toEqual(['a', 'b', 'c']);
  });

  it('должен ставить high перед medium и low', () => {
    const tasks = [task('low', { priority: 'low' }), task('mid'), task('high', { priority: 'high' })];

    expect(names(sortTasks(tasks, 'priority'))).toEqual(['high', 'mid', 'low']);
  });

  it('должен сортировать по порядку статусов', () => {
    const tasks = [
      task('done', { status: 'completed' }),
      task('new'),
      task('wip', { status: 'in_progress' }),
    ];

    expect(names(sortTasks(tasks, 'status'))).toEqual(['new', 'wip', 'done']);
  });

  it('created: старые первыми, updated: последние изменения первыми', () => {
    const tasks = [
      task('second', { createdAt: '2026-03-01T10:01:00.000Z', updatedAt: '2026-03-01T10:05:00.000Z' }),
      task('first', { createdAt: '2026-03-01T10:00:00.000Z', updatedAt: '2026-03-01T10:02:00.000Z' }),
    ];

    expect(names(sortTasks(tasks, 'created'))).toEqual(['first', 'second']);
    expect(names(sortTasks(tasks, 'updated'))).toEqual(['second', 'first']);
  });

  it('должен сохранять порядок добавления при равенстве', () => {
    const tasks = [task('x'), task('y'), task('z')];

    expect(names(sortTasks(tasks, 'priority'))).toEqual(['x', 'y', 'z']);
  });

  it('не должен мутировать входной массив', () => {
    const tasks = [task('b'), task('a')];

    sortTasks(tasks, 'name');

    expect(names(tasks)).toEqual(['b', 'a']);
  });
});
