import { describe, it, expect } from 'vitest';
import {
  CONTEXT_KEY_REGEX,
  MAX_MEMORY_KEY_LENGTH,
  MAX_TASK_NAME_LENGTH,
  TEMPLATE_NAME_REGEX,
  isValidMemoryKey,
  normalizeTaskName,
} from './validation.js';

describe('normalizeTaskName', () => {
  it('должен обрезать пробелы по краям', () => {
    expect(normalizeTaskName('  Write docs \n')).toBe('Write docs');
  });

  it('должен вернуть null для пустого имени', () => {
    expect(normalizeTaskName('')).toBeNull();
    expect(normalizeTaskName('   ')).toBeNull();
  });

  it('должен принимать имя максимальной длины и отклонять длиннее', () => {
    expect(normalizeTaskName('x'.repeat(MAX_TASK_NAME_LENGTH))).toBe('x'.repeat(200));
    expect(normalizeTaskName('x'.repeat(MAX_TASK_NAME_LENGTH + 1))).toBeNull();
  });

  it('длина проверяется после обрезки пробелов', () => {
    expect(normalizeTaskName(` ${'x'.repeat(200)} `)).toBe('x'.repeat(200));
  });
});

describe('isValidMemoryKey', () => {
  it('должен принимать ключи без пробелов', () => {
    expect(isValidMemoryKey('owner')).toBe(true);
    expect(isValidMemoryKey('api.base-url_v2')).toBe(true);
  });

  it('должен отклонять пустой ключ и ключ с пробелами', () => {
    expect(isValidMemoryKey('')).toBe(false);
    expect(isValidMemoryKey('two words')).toBe(false);
    expect(isValidMemoryKey('tab\there')).toBe(false);
  });

  it('должен ограничивать длину', () => {
    expect(isValidMemoryKey('k'.repeat(MAX_MEMORY_KEY_LENGTH))).toBe(true);
    expect(isValidMemoryKey('k'.repeat(MAX_MEMORY_KEY_LENGTH + 1))).toBe(false);
  });

  it('должен отклонять __proto__', () => {
    expect(isValidMemoryKey('__proto__')).toBe(false);
  });
});

describe('TEMPLATE_NAME_REGEX', () => {
  it.each(['add-task', 'review-code', 'v2', 'a-1-b'])('должен принимать %s', (name) => {
    expect(TEMPLATE_NAME_REGEX.test(name)).toBe(true);
  });

  it.each(['Add-Task', 'add_task', '-add', 'add-', 'add--task', ''])('должен отклонять "%s"', (name) => {
    expect(TEMPLATE_NAME_REGEX.test(name)).toBe(false);
  });
});

describe('CONTEXT_KEY_REGEX', () => {
  it.each(['file_path', '_private', 'A1'])('должен принимать %s', (key) => {
    expect(CONTEXT_KEY_REGEX.test(key)).toBe(true);
  });

  it.each(['1st', 'file-path', 'file path', ''])('должен отклонять "%s"', (key) => {
    expect(CONTEXT_KEY_REGEX.test(key)).toBe(false);
  });
});
