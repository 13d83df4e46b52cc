export class MemoryKeyNotFoundError extends Error {
  constructor(public readonly key: string) {
    super(`No memory entry for key: ${key}`);
    this.name = 'MemoryKeyNotFoundError';
  }
}

export class MemoryValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MemoryValidationError';
  }
}

/**
 * Ошибки markdown memory bank: неизвестный файл, режим, бэкап.
 */
export class MemoryBankError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'MemoryBankError';
  }
}
