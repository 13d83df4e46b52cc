export class TemplateNotFoundError extends Error {
  constructor(
    public readonly templateName: string,
    available: string[],
  ) {
    super(
      available.length > 0
        ? `Template not found: ${templateName}. Available templates: ${available.join(', ')}`
        : `Template not found: ${templateName}`,
    );
    this.name = 'TemplateNotFoundError';
  }
}

/**
 * Рендер без обязательных ключей контекста.
 */
export class MissingContextError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly missing: string[],
  ) {
    super(
      `Missing required context variables for template '${templateName}': ${missing.join(', ')}`,
    );
    this.name = 'MissingContextError';
  }
}

export class TemplateLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'TemplateLoadError';
  }
}
