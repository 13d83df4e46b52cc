import { CliValidationError } from './errors.js';

/**
 * Проверяет значение по списку допустимых.
 * @throws {CliValidationError}
 */
export function parseChoice<T extends string>(value: string, choices: readonly T[], label: string): T {
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new CliValidationError(
      `Invalid ${label} '${value}'. Expected one of: ${choices.join(', ')}`,
    );
  }
  return match;
}

export function parsePositiveInt(raw: string, label: string): number {
  const value = Number(raw.trim());
  if (!/^\d+$/.test(raw.trim()) || !Number.isSafeInteger(value) || value <= 0) {
    throw new CliValidationError(`Invalid ${label} '${raw}': expected a positive integer`);
  }
  return value;
}

/**
 * `key=value` → [key, value]. Значение может содержать `=`.
 */
export function parseKeyValue(raw: string): [string, string] {
  const index = raw.indexOf('=');
  if (index <= 0) {
    throw new CliValidationError(`Invalid context value '${raw}': expected key=value`);
  }
  return [raw.slice(0, index).trim(), raw.slice(index + 1)];
}

/** Commander collector для повторяемых опций */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
