import type { PromptTemplate, TemplateContext } from './types.js';
import { MissingContextError } from './errors.js';

/**
 * `{{` и `}}` экранируют скобки, `{identifier}` задаёт плейсхолдер.
 * Любая другая скобка остаётся как есть.
 */
const TOKEN_REGEX = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Имена плейсхолдеров в порядке первого появления.
 */
export function scanPlaceholders(body: string): string[] {
  const names: string[] = [];
  for (const match of body.matchAll(TOKEN_REGEX)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

function isPrimitive(value: unknown): value is string | number | boolean | bigint {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'bigint'
  );
}

export function stringifyContextValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (isPrimitive(value)) {
    return String(value);
  }
  if (Array.isArray(value) && value.every((item) => isPrimitive(item))) {
    return value.map((item) => String(item)).join('\n');
  }
  return JSON.stringify(value, null, 2);
}

function isProvided(context: TemplateContext, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(context, key) && context[key] !== undefined;
}

/**
 * Рендерит шаблон за один проход: подставленные значения повторно не сканируются.
 * @throws {MissingContextError} если не хватает обязательных ключей
 */
export function renderTemplate(template: PromptTemplate, context: TemplateContext): string {
  const keys = [...template.requiredContext];
  for (const name of scanPlaceholders(template.body)) {
    if (!keys.includes(name)) {
      keys.push(name);
    }
  }

  const missing = keys.filter((key) => !isProvided(context, key));
  if (missing.length > 0) {
    throw new MissingContextError(template.name, missing);
  }

  return template.body.replace(TOKEN_REGEX, (token: string, name: string | undefined) => {
    if (name === undefined) {
      return token === '{{' ? '{' : '}';
    }
    return stringifyContextValue(context[name]);
  });
}
