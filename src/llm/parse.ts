const FENCE_REGEX = /```[A-Za-z0-9_-]*\n([\s\S]*?)```/;
const LIST_MARKER_REGEX = /^(?:[-*+•]|\d+[.)])\s+/;

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    if (e instanceof SyntaxError) {
      return undefined;
    }
    throw e;
  }
}

/**
 * Первое JSON значение ответа: из ```-блока или голый массив/объект.
 * undefined, если JSON не найден.
 */
export function parseJsonBlock(text: string): unknown {
  const fenced = FENCE_REGEX.exec(text);
  if (fenced) {
    const value = tryParseJson(fenced[1].trim());
    if (value !== undefined) {
      return value;
    }
  }

  const trimmed = text.trim();
  const whole = tryParseJson(trimmed);
  if (whole !== undefined) {
    return whole;
  }

  for (const [open, close] of [
    ['[', ']'],
    ['{', '}'],
  ]) {
    const start = trimmed.indexOf(open);
    const end = trimmed.lastIndexOf(close);
    if (start !== -1 && end > start) {
      const value = tryParseJson(trimmed.slice(start, end + 1));
      if (value !== undefined) {
        return value;
      }
    }
  }
  return undefined;
}

/**
 * Список строк из ответа: JSON массив строк, иначе пункты маркированного
 * или нумерованного списка.
 */
export function parseStringList(text: string): string[] {
  const json = parseJsonBlock(text);
  if (Array.isArray(json) && json.every((item): item is string => typeof item === 'string')) {
    return json.map((item) => item.trim()).filter((item) => item !== '');
  }

  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => LIST_MARKER_REGEX.test(line))
    .map((line) => line.replace(LIST_MARKER_REGEX, '').trim())
    .filter((line) => line !== '');
}
