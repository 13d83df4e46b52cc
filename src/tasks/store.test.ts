import { describe, it, expect, beforeEach } from 'vitest';
import { Volume } from 'memfs';
import { createTaskStore, type TaskStore } from './store.js';
import {
  CircularDependencyError,
  TaskAlreadyExistsError,
  TaskImportError,
  TaskNotFoundError,
  TaskValidationError,
} from './errors.js';

/**
 * Часы, которые сдвигаются на минуту при каждом вызове.
 */
function createClock(start = '2026-03-01T10:00:00.000Z'): () => Date {
  let current = Date.parse(start);
  return () => {
    const date = new Date(current);
    current += 60_000;
    return date;
  };
}

function minute(n: number): string {
  return `2026-03-01T10:${String(n).padStart(2, '0')}:00.000Z`;
}

describe('TaskStore', () => {
  let vol: InstanceType<typeof Volume>;
  let fs: typeof import('node:fs/promises');
  let store: TaskStore;

  beforeEach(() => {
    vol = Volume.fromJSON({});
    fs = vol.promises as unknown as typeof import('node:fs/promises');
    store = createTaskStore('/project/memory', { fs, now: createClock() });
  });

  describe('add()', () => {
    it('должен создать задачу в статусе not_started', async () => {
      const task = await store.add({ name: '  write-docs ', description: 'Document the CLI' });

      expect(task).toEqual({
        name: 'write-docs',
        description: 'Document the CLI',
        status: 'not_started',
        priority: 'medium',
        tags: [],
        dependencies: [],
        notes: [],
        createdAt: minute(0),
        updatedAt: minute(0),
      });
    });

    it('после add задача видна в list ровно один раз', async () => {
      await store.add({ name: 'other' });
      await store.add({ name: 'new-task' });

      const matches = (await store.list()).filter((t) => t.name === 'new-task');

      expect(matches).toHaveLength(1);
      expect(matches[0]?.status).toBe('not_started');
    });

    it('должен сохранить файл tasks.json с версией', async () => {
      await store.add({ name: 'a', priority: 'high', template: 'add-task', tags: ['x', 'x', ' '] });

      const raw = vol.toJSON()['/project/memory/tasks.json'];
      expect(typeof raw).toBe('string');
      expect(JSON.parse(String(raw))).toEqual({
        version: 1,
        tasks: [
          {
            name: 'a',
            description: '',
            status: 'not_started',
            priority: 'high',
            tags: ['x'],
            dependencies: [],
            notes: [],
            createdAt: minute(0),
            updatedAt: minute(0),
            template: 'add-task',
          },
        ],
      });
    });

    it('должен отклонить дубликат имени', async () => {
      await store.add({ name: 'a' });

      await expect(store.add({ name: 'a' })).rejects.toThrow(TaskAlreadyExistsError);
      await expect(store.add({ name: 'a' })).rejects.toThrow("Task 'a' already exists");
    });

    it('должен отклонить пустое имя', async () => {
      await expect(store.add({ name: '   ' })).rejects.toThrow(
        new TaskValidationError('Task name cannot be empty'),
      );
    });

    it('должен отклонить слишком длинное имя', async () => {
      await expect(store.add({ name: 'x'.repeat(201) })).rejects.toThrow(
        'Task name exceeds 200 characters',
      );
    });

    it('должен отклонить зависимость от несуществующей задачи', async () => {
      await expect(store.add({ name: 'a', dependencies: ['ghost'] })).rejects.toThrow(
        'Task not found: ghost',
      );
    });
  });

  describe('get()', () => {
    it('должен выбросить TaskNotFoundError', async () => {
      await expect(store.get('missing')).rejects.toThrow(TaskNotFoundError);
    });
  });

  describe('updateProgress()', () => {
    it('должен изменить только указанную задачу', async () => {
      await store.add({ name: 'a' });
      await store.add({ name: 'b' });
      const before = await store.get('b');

      const { task, previousStatus } = await store.updateProgress('a', 'in_progress', 'started');

      expect(previousStatus).toBe('not_started');
      expect(task.status).toBe('in_progress');
      expect(task.updatedAt).toBe(minute(2));
      expect(task.notes).toEqual([{ timestamp: minute(2), status: 'in_progress', text: 'started' }]);
      expect(await store.get('b')).toEqual(before);
    });

    it('должен добавить заметку по умолчанию если текст не передан', async () => {
      await store.add({ name: 'a' });

      const { task } = await store.updateProgress('a', 'blocked');

      expect(task.notes[0]?.text).toBe('Status changed from not_started to blocked');
    });

    it('должен ставить completedAt при завершении и убирать при возврате', async () => {
      await store.add({ name: 'a' });

      const done = await store.updateProgress('a', 'completed');
      expect(done.task.completedAt).toBe(minute(1));

      const reopened = await store.updateProgress('a', 'in_progress', 'found a bug');
      expect(reopened.task.completedAt).toBeUndefined();
      expect(reopened.task.notes).toHaveLength(2);
    });

    it('должен разрешать любой переход статусов', async () => {
      await store.add({ name: 'a' });

      await store.updateProgress('a', 'cancelled');
      const { task } = await store.updateProgress('a', 'not_started');

      expect(task.status).toBe('not_started');
    });
  });

  describe('list()', () => {
    beforeEach(async () => {
      await store.add({ name: 'low', priority: 'low', tags: ['docs'] });
      await store.add({ name: 'high', priority: 'high' });
      await store.add({ name: 'medium', priority: 'medium', tags: ['docs'] });
      await store.add({ name: 'high-2', priority: 'high' });
    });

    it('без сортировки должен сохранять порядок добавления', async () => {
      expect((await store.list()).map((t) => t.name)).toEqual(['low', 'high', 'medium', 'high-2']);
    });

    it('должен сортировать по приоритету, high первым', async () => {
      const tasks = await store.list({ sortBy: 'priority' });

      expect(tasks.map((t) => t.name)).toEqual(['high', 'high-2', 'medium', 'low']);
    });

    it('должен фильтровать по статусу', async () => {
      await store.updateProgress('medium', 'in_progress');

      const tasks = await store.list({ status: 'in_progress' });

      expect(tasks.map((t) => t.name)).toEqual(['medium']);
    });

    it('должен фильтровать по тегу и приоритету', async () => {
      expect((await store.list({ tag: 'docs' })).map((t) => t.name)).toEqual(['low', 'medium']);
      expect((await store.list({ priority: 'high' })).map((t) => t.name)).toEqual(['high', 'high-2']);
    });

    it('должен сортировать по updated, последние изменения первыми', async () => {
      await store.updateProgress('low', 'in_progress');

      const tasks = await store.list({ sortBy: 'updated' });

      expect(tasks.map((t) => t.name)).toEqual(['low', 'high-2', 'medium', 'high']);
    });

    it('должен сортировать по имени', async () => {
      const tasks = await store.list({ sortBy: 'name' });

      expect(tasks.map((t) => t.name)).toEqual(['high', 'high-2', 'low', 'medium']);
    });
  });

  describe('зависимости', () => {
    beforeEach(async () => {
      await store.add({ name: 'design' });
      await store.add({ name: 'build' });
      await store.add({ name: 'ship' });
    });

    it('должен добавить зависимость и показать её с обеих сторон', async () => {
      await store.addDependency('build', 'design');
      await store.addDependency('ship', 'build');

      expect(await store.listDependencies('build')).toEqual({
        name: 'build',
        dependsOn: ['design'],
        dependents: ['ship'],
      });
      expect((await store.relatedTasks('build')).map((t) => t.name)).toEqual(['design', 'ship']);
    });

    it('повторное добавление не должно дублировать зависимость', async () => {
      await store.addDependency('build', 'design');
      const task = await store.addDependency('build', 'design');

      expect(task.dependencies).toEqual(['design']);
    });

    it('должен отклонить цикл', async () => {
      await store.addDependency('build', 'design');
      await store.addDependency('ship', 'build');

      await expect(store.addDependency('design', 'ship')).rejects.toThrow(
        'Circular dependency detected: design -> ship -> build -> design',
      );
    });

    it('должен отклонить зависимость от самой себя', async () => {
      await expect(store.addDependency('build', 'build')).rejects.toThrow(CircularDependencyError);
    });

    it('должен удалить зависимость', async () => {
      await store.addDependency('build', 'design');

      const task = await store.removeDependency('build', 'design');

      expect(task.dependencies).toEqual([]);
    });

    it('должен выбросить ошибку при удалении несуществующей зависимости', async () => {
      await expect(store.removeDependency('build', 'ship')).rejects.toThrow(
        "Task 'build' does not depend on 'ship'",
      );
    });
  });

  describe('stats()', () => {
    it('должен посчитать задачи по статусам', async () => {
      await store.add({ name: 'a' });
      await store.add({ name: 'b' });
      await store.updateProgress('b', 'completed');

      expect(await store.stats()).toEqual({
        not_started: 1,
        in_progress: 0,
        completed: 1,
        blocked: 0,
        cancelled: 0,
      });
    });
  });

  describe('export / import', () => {
    beforeEach(async () => {
      await store.add({ name: 'a', description: 'Desc', priority: 'high', tags: ['docs'] });
      await store.add({ name: 'b', dependencies: ['a'] });
      await store.updateProgress('a', 'in_progress', 'go');
    });

    it.each(['json', 'yaml'] as const)(
      'экспорт и импорт в %s сохраняют имена и статусы',
      async (format) => {
        const exported = await store.exportTo(`/out/tasks.${format}`);
        expect(exported).toEqual({ path: `/out/tasks.${format}`, format, count: 2 });

        const fresh = createTaskStore('/other/memory', { fs, now: createClock() });
        const result = await fresh.importFrom(`/out/tasks.${format}`);

        expect(result).toEqual({ added: ['a', 'b'], updated: [], total: 2 });
        expect(await fresh.list()).toEqual(await store.list());
      },
    );

    it('должен экспортировать markdown отчёт', async () => {
      await store.exportTo('/out/report.md');

      expect(vol.readFileSync('/out/report.md', 'utf8')).toBe(
        [
          '# Tasks',
          '',
          `Exported: ${minute(3)}`,
          '',
          '## a',
          '',
          '- Status: in_progress',
          '- Priority: high',
          '- Tags: docs',
          `- Created: ${minute(0)}`,
          `- Updated: ${minute(2)}`,
          '',
          'Desc',
          '',
          '### Notes',
          '',
          `- ${minute(2)} [in_progress] go`,
          '',
          '## b',
          '',
          '- Status: not_started',
          '- Priority: medium',
          '- Depends on: a',
          `- Created: ${minute(1)}`,
          `- Updated: ${minute(1)}`,
          '',
        ].join('\n'),
      );
    });

    it('явный формат должен иметь приоритет над расширением', async () => {
      const result = await store.exportTo('/out/tasks.txt', 'yaml');

      expect(result.format).toBe('yaml');
      expect(vol.readFileSync('/out/tasks.txt', 'utf8')).toContain('version: 1');
    });

    it('должен отказать в импорте markdown', async () => {
      await store.exportTo('/out/report.md');

      await expect(store.importFrom('/out/report.md')).rejects.toThrow(TaskImportError);
    });

    it('должен объединить импорт по имени', async () => {
      vol.fromJSON({
        '/in/tasks.json': JSON.stringify({
          tasks: [
            { name: 'a', status: 'completed' },
            { name: 'c', priority: 'low' },
          ],
        }),
      });

      const result = await store.importFrom('/in/tasks.json');

      expect(result).toEqual({ added: ['c'], updated: ['a'], total: 3 });
      expect((await store.list()).map((t) => `${t.name}:${t.status}`)).toEqual([
        'a:completed',
        'b:not_started',
        'c:not_started',
      ]);
      expect((await store.get('c')).createdAt).toBe(minute(3));
    });

    it('replace должен заменить коллекцию целиком', async () => {
      vol.fromJSON({ '/in/tasks.yaml': 'tasks:\n  - name: only\n' });

      const result = await store.importFrom('/in/tasks.yaml', { replace: true });

      expect(result).toEqual({ added: ['only'], updated: [], total: 1 });
      expect((await store.list()).map((t) => t.name)).toEqual(['only']);
    });

    it('replace должен считать задачи с прежними именами добавленными', async () => {
      vol.fromJSON({ '/in/tasks.yaml': 'tasks:\n  - name: a\n    status: blocked\n' });

      const result = await store.importFrom('/in/tasks.yaml', { replace: true });

      expect(result).toEqual({ added: ['a'], updated: [], total: 1 });
      expect((await store.list()).map((t) => `${t.name}:${t.status}`)).toEqual(['a:blocked']);
    });

    it('должен отклонить зависимость на неизвестную задачу', async () => {
      vol.fromJSON({ '/in/tasks.json': '[{"name": "x", "dependencies": ["nope"]}]' });

      await expect(store.importFrom('/in/tasks.json')).rejects.toThrow(
        "Task 'x' depends on unknown task 'nope'",
      );
    });

    it('должен отклонить дубликаты внутри файла', async () => {
      vol.fromJSON({ '/in/tasks.json': '[{"name": "x"}, {"name": "x"}]' });

      await expect(store.importFrom('/in/tasks.json')).rejects.toThrow(
        'Duplicate task in /in/tasks.json: x',
      );
    });

    it('должен отклонить невалидный статус', async () => {
      vol.fromJSON({ '/in/tasks.json': '[{"name": "x", "status": "done"}]' });

      await expect(store.importFrom('/in/tasks.json')).rejects.toThrow(TaskImportError);
    });

    it('должен выбросить ошибку для отсутствующего файла', async () => {
      await expect(store.importFrom('/in/missing.json')).rejects.toThrow(
        'Import file not found: /in/missing.json',
      );
    });
  });
});
