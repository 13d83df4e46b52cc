import type { ZodIssue } from 'zod';
import { CONFIG_FILE_NAME } from './types.js';

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

export class ConfigNotFoundError extends Error {
  constructor(public readonly configPath: string) {
    super(
      `Configuration file not found: ${configPath}. Run "prompt-manager init" to create ${CONFIG_FILE_NAME}.`,
    );
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigValidationError extends Error {
  constructor(public issues: ZodIssue[]) {
    super(
      `Configuration validation failed: ${issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`,
    );
    this.name = 'ConfigValidationError';
  }
}
