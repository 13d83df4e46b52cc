/**
 * Имя шаблона: kebab-case
 */
export const TEMPLATE_NAME_REGEX = /^[a-z0-9]+(-[a-z0-9]+)*$/;

/**
 * Ключ контекста шаблона, он же имя плейсхолдера `{key}`
 */
export const CONTEXT_KEY_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Ключ memory store: без пробелов
 */
export const MEMORY_KEY_REGEX = /^\S+$/;

export const MAX_TASK_NAME_LENGTH = 200;
export const MAX_MEMORY_KEY_LENGTH = 100;

// Ключи, которые JSON.parse и zod record не сохраняют как обычные свойства
const RESERVED_MEMORY_KEYS = new Set(['__proto__']);

/**
 * Проверяет ключ memory store без выбрасывания ошибки.
 */
export function isValidMemoryKey(key: string): boolean {
  if (key.length === 0 || key.length > MAX_MEMORY_KEY_LENGTH) {
    return false;
  }
  return MEMORY_KEY_REGEX.test(key) && !RESERVED_MEMORY_KEYS.has(key);
}

/**
 * Нормализует имя задачи. Возвращает null для пустого или слишком длинного имени.
 */
export function normalizeTaskName(name: string): string | null {
  const trimmed = name.trim();
  if (trimmed.length === 0 || trimmed.length > MAX_TASK_NAME_LENGTH) {
    return null;
  }
  return trimmed;
}
