export class StorageWriteError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'StorageWriteError';
  }
}

export class StorageAccessError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'StorageAccessError';
  }
}

/**
 * Файл существует, но его содержимое не JSON или не проходит схему.
 */
export class StorageParseError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly parseMessage: string,
    public readonly position?: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'StorageParseError';
  }
}
