import * as defaultFs from 'node:fs/promises';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse } from 'yaml';
import { z } from 'zod';
import type { PromptTemplate, TemplateDirectory, TemplateSource } from './types.js';
import { TemplateLoadError } from './errors.js';
import { scanPlaceholders } from './renderer.js';
import { CONTEXT_KEY_REGEX, TEMPLATE_NAME_REGEX } from '../utils/validation.js';
import { type FsModule, hasErrorCode, toError } from '../utils/fs.js';

/**
 * Шаблоны, поставляемые с пакетом: `<package>/templates/{default,custom}`.
 * Путь одинаков для src/ (vitest) и dist/ (сборка).
 */
export const BUILTIN_TEMPLATES_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));

const templateFileSchema = z
  .object({
    name: z.string().regex(TEMPLATE_NAME_REGEX, 'name must be kebab-case'),
    description: z.string().default(''),
    required_context: z
      .array(z.string().regex(CONTEXT_KEY_REGEX, 'context keys must be identifiers'))
      .default([]),
    template: z.string().min(1, 'template cannot be empty'),
  })
  .strict();

export function builtinTemplateDirectories(baseDir: string = BUILTIN_TEMPLATES_DIR): TemplateDirectory[] {
  return [
    { dir: path.join(baseDir, 'default'), source: 'default' },
    { dir: path.join(baseDir, 'custom'), source: 'custom' },
  ];
}

/**
 * Разбирает содержимое YAML-файла шаблона.
 * @throws {TemplateLoadError} если файл не проходит схему или использует
 *   плейсхолдер, не объявленный в required_context
 */
export function parseTemplateFile(
  content: string,
  filePath: string,
  source: TemplateSource,
): PromptTemplate {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (e) {
    throw new TemplateLoadError(`Invalid YAML in template ${filePath}`, filePath, toError(e));
  }

  const result = templateFileSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new TemplateLoadError(`Invalid template ${filePath}: ${details}`, filePath, result.error);
  }

  const { name, description, required_context: requiredContext, template } = result.data;

  const undeclared = scanPlaceholders(template).filter((key) => !requiredContext.includes(key));
  if (undeclared.length > 0) {
    throw new TemplateLoadError(
      `Invalid template ${filePath}: placeholders not listed in required_context: ${undeclared.join(', ')}`,
      filePath,
    );
  }

  return {
    name,
    description,
    requiredContext: [...new Set(requiredContext)],
    body: template,
    source,
    filePath,
  };
}

export interface DirectoryLoadResult {
  templates: PromptTemplate[];
  errors: TemplateLoadError[];
}

/**
 * Загружает все *.yaml / *.yml из директории в алфавитном порядке.
 * Отсутствующая директория → пустой результат; битые файлы попадают в errors.
 */
export async function loadTemplateDirectory(
  directory: TemplateDirectory,
  fs: FsModule = defaultFs,
): Promise<DirectoryLoadResult> {
  let entries: string[];
  try {
    entries = await fs.readdir(directory.dir);
  } catch (e) {
    if (hasErrorCode(e, 'ENOENT', 'ENOTDIR')) {
      return { templates: [], errors: [] };
    }
    throw new TemplateLoadError(
      `Cannot read template directory ${directory.dir}`,
      directory.dir,
      toError(e),
    );
  }

  const files = entries.filter((entry) => /\.ya?ml$/.test(entry)).sort();
  const templates: PromptTemplate[] = [];
  const errors: TemplateLoadError[] = [];

  for (const file of files) {
    const filePath = path.join(directory.dir, file);
    try {
      const content = await fs.readFile(filePath, 'utf8');
      templates.push(parseTemplateFile(content, filePath, directory.source));
    } catch (e) {
      if (e instanceof TemplateLoadError) {
        errors.push(e);
      } else {
        errors.push(new TemplateLoadError(`Cannot read template ${filePath}`, filePath, toError(e)));
      }
    }
  }

  return { templates, errors };
}
