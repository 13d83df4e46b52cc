import { describe, it, expect } from 'vitest';
import { renderTemplate, scanPlaceholders, stringifyContextValue } from './renderer.js';
import { MissingContextError } from './errors.js';
import type { PromptTemplate } from './types.js';

function template(body: string, requiredContext: string[]): PromptTemplate {
  return {
    name: 'sample',
    description: '',
    requiredContext,
    body,
    source: 'default',
    filePath: '/templates/sample.yaml',
  };
}

describe('scanPlaceholders()', () => {
  it('должен вернуть имена в порядке появления без повторов', () => {
    expect(scanPlaceholders('{b} and {a}, again {b}')).toEqual(['b', 'a']);
  });

  it('должен игнорировать экранированные скобки и не-идентификаторы', () => {
    expect(scanPlaceholders('{{literal}} {1} { spaced } {"json": 1} {ok_2}')).toEqual(['ok_2']);
  });
});

describe('stringifyContextValue()', () => {
  it('должен оставлять строки как есть', () => {
    expect(stringifyContextValue('text')).toBe('text');
  });

  it('должен приводить числа и boolean через String', () => {
    expect(stringifyContextValue(42)).toBe('42');
    expect(stringifyContextValue(false)).toBe('false');
  });

  it('должен превращать null в пустую строку', () => {
    expect(stringifyContextValue(null)).toBe('');
  });

  it('должен склеивать массив примитивов через перевод строки', () => {
    expect(stringifyContextValue(['a', 1, true])).toBe('a\n1\ntrue');
  });

  it('должен сериализовать объекты в JSON с отступами', () => {
    expect(stringifyContextValue({ a: [1] })).toBe('{\n  "a": [\n    1\n  ]\n}');
  });
});

describe('renderTemplate()', () => {
  it('должен подставить все значения', () => {
    const result = renderTemplate(template('Hello {name}, you have {count} tasks', ['name', 'count']), {
      name: 'Ada',
      count: 3,
    });

    expect(result).toBe('Hello Ada, you have 3 tasks');
  });

  it('должен превращать {{ и }} в литеральные скобки', () => {
    const result = renderTemplate(template('{{"key": "{value}"}}', ['value']), { value: 'x' });

    expect(result).toBe('{"key": "x"}');
  });

  it('не должен повторно сканировать подставленные значения', () => {
    const result = renderTemplate(template('A: {a}', ['a']), { a: '{b}' });

    expect(result).toBe('A: {b}');
  });

  it('должен выбросить MissingContextError со всеми отсутствующими ключами', () => {
    const tpl = template('{a} {b} {c}', ['a', 'b', 'c']);

    expect(() => renderTemplate(tpl, { b: 'ok' })).toThrow(
      "Missing required context variables for template 'sample': a, c",
    );
  });

  it('должен считать undefined отсутствующим значением', () => {
    const tpl = template('{a}', ['a']);

    expect(() => renderTemplate(tpl, { a: undefined })).toThrow(MissingContextError);
  });

  it('должен принимать пустую строку и null как присутствующие значения', () => {
    const tpl = template('[{a}][{b}]', ['a', 'b']);

    expect(renderTemplate(tpl, { a: '', b: null })).toBe('[][]');
  });

  it('должен требовать обязательный ключ даже если его нет в теле шаблона', () => {
    const tpl = template('static text', ['unused']);

    const error = (() => {
      try {
        renderTemplate(tpl, {});
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(MissingContextError);
    expect(error).toMatchObject({ missing: ['unused'] });
  });

  it('должен требовать плейсхолдеры, не объявленные в required_context', () => {
    const tpl = template('{declared} {extra}', ['declared']);

    expect(() => renderTemplate(tpl, { declared: 1 })).toThrow(
      "Missing required context variables for template 'sample': extra",
    );
  });
});
