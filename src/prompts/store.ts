import * as defaultFs from 'node:fs/promises';
import type { PromptTemplate, TemplateContext, TemplateDirectory } from './types.js';
import { TemplateLoadError, TemplateNotFoundError } from './errors.js';
import { builtinTemplateDirectories, loadTemplateDirectory } from './loader.js';
import { renderTemplate } from './renderer.js';
import type { FsModule } from '../utils/fs.js';

export interface TemplateStore {
  /** Файлы, пропущенные при загрузке */
  readonly warnings: TemplateLoadError[];
  get(name: string): PromptTemplate;
  has(name: string): boolean;
  /** Все шаблоны, отсортированные по имени */
  list(): PromptTemplate[];
  render(name: string, context: TemplateContext): string;
}

class TemplateStoreImpl implements TemplateStore {
  constructor(
    private readonly templates: Map<string, PromptTemplate>,
    readonly warnings: TemplateLoadError[],
  ) {}

  get(name: string): PromptTemplate {
    const template = this.templates.get(name);
    if (!template) {
      throw new TemplateNotFoundError(
        name,
        this.list().map((t) => t.name),
      );
    }
    return template;
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  list(): PromptTemplate[] {
    return [...this.templates.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  render(name: string, context: TemplateContext): string {
    return renderTemplate(this.get(name), context);
  }
}

export interface LoadTemplateStoreOptions {
  /** Шаблоны проекта (config.templatesDir) */
  projectDir?: string;
  /** По умолчанию шаблоны пакета */
  builtinDirs?: TemplateDirectory[];
  fs?: FsModule;
}

/**
 * Загружает шаблоны: default → custom → project. Более поздний файл
 * с тем же `name` переопределяет предыдущий.
 */
export async function loadTemplateStore(
  options: LoadTemplateStoreOptions = {},
): Promise<TemplateStore> {
  const fs = options.fs ?? defaultFs;
  const directories = [...(options.builtinDirs ?? builtinTemplateDirectories())];
  if (options.projectDir) {
    directories.push({ dir: options.projectDir, source: 'project' });
  }

  const templates = new Map<string, PromptTemplate>();
  const warnings: TemplateLoadError[] = [];

  for (const directory of directories) {
    const result = await loadTemplateDirectory(directory, fs);
    for (const template of result.templates) {
      templates.set(template.name, template);
    }
    warnings.push(...result.errors);
  }

  return new TemplateStoreImpl(templates, warnings);
}

export function createTemplateStore(templates: PromptTemplate[]): TemplateStore {
  return new TemplateStoreImpl(new Map(templates.map((t) => [t.name, t])), []);
}
