export class SourceFileNotFoundError extends Error {
  constructor(public readonly filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = 'SourceFileNotFoundError';
  }
}

export class SourceFileReadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'SourceFileReadError';
  }
}
