export class TaskNotFoundError extends Error {
  constructor(public readonly taskName: string) {
    super(`Task not found: ${taskName}`);
    this.name = 'TaskNotFoundError';
  }
}

export class TaskAlreadyExistsError extends Error {
  constructor(public readonly taskName: string) {
    super(`Task '${taskName}' already exists`);
    this.name = 'TaskAlreadyExistsError';
  }
}

export class TaskValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaskValidationError';
  }
}

/**
 * Обнаружена циклическая зависимость.
 */
export class CircularDependencyError extends Error {
  /**
   * @param cycle - Имена задач, образующих цикл (первая повторяется в конце)
   */
  constructor(
    message: string,
    public cycle: string[],
  ) {
    super(message);
    this.name = 'CircularDependencyError';
  }
}

export class TaskImportError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'TaskImportError';
  }
}
