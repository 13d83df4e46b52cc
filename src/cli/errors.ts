/**
 * Невалидные аргументы командной строки: статус, приоритет, длительность, формат.
 */
export class CliValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliValidationError';
  }
}
