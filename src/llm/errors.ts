export class LlmNotConfiguredError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LlmNotConfiguredError';
  }
}

/**
 * Ошибка запроса к completion API. `status` отсутствует для сетевых ошибок и таймаутов.
 */
export class LlmRequestError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'LlmRequestError';
  }
}
