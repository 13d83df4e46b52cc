/**
 * Откуда загружен шаблон. Порядок важен: более поздний источник
 * переопределяет шаблон с тем же именем.
 */
export const TEMPLATE_SOURCES = ['default', 'custom', 'project'] as const;

export type TemplateSource = (typeof TEMPLATE_SOURCES)[number];

export interface PromptTemplate {
  name: string;
  description: string;
  /** Ключи контекста, которые обязаны присутствовать при рендере */
  requiredContext: string[];
  body: string;
  source: TemplateSource;
  filePath: string;
}

export type TemplateContext = Record<string, unknown>;

export interface TemplateDirectory {
  dir: string;
  source: TemplateSource;
}
