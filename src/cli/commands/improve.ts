import * as path from 'node:path';
import type { Command } from 'commander';
import { z } from 'zod';
import type { Services } from '../services.js';
import { runPrompt, type PromptOptions, type PromptResult } from '../prompt.js';
import { CliValidationError } from '../errors.js';
import { parseChoice } from '../validation.js';
import { addPromptOptions, promptOptions, type CommandRunner, type PromptCliOptions } from '../runner.js';
import { info, printPrompt, success } from '../output.js';
import { formatList, projectFiles, readTarget } from '../context.js';
import { parseJsonBlock } from '../../llm/index.js';
import { writeFileAtomic } from '../../storage/index.js';
import { hasErrorCode, pathExists, toError } from '../../utils/fs.js';

export const IMPROVEMENT_TYPES = ['tests', 'commands', 'plugins'] as const;

const MAX_LISTED_FILES = 50;

const changeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('replace'), find: z.string().min(1), content: z.string() }),
  z.object({ type: z.literal('append'), content: z.string() }),
  z.object({ type: z.literal('prepend'), content: z.string() }),
]);

const enhancementSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('new_file'),
    path: z.string().min(1),
    description: z.string().default(''),
    content: z.string(),
  }),
  z.object({
    type: z.literal('modify_file'),
    path: z.string().min(1),
    description: z.string().default(''),
    changes: z.array(changeSchema).min(1),
  }),
]);

export const enhancementsSchema = z.array(enhancementSchema);

export type FileChange = z.infer<typeof changeSchema>;
export type Enhancement = z.infer<typeof enhancementSchema>;

export interface AppliedEnhancement {
  path: string;
  action: 'created' | 'modified';
}

export interface EnhanceResult {
  prompt: PromptResult;
  enhancements: Enhancement[];
  applied: AppliedEnhancement[];
}

/**
 * Ответ LLM → список изменений.
 * @throws {CliValidationError} если JSON нет или он не проходит схему
 */
export function parseEnhancements(response: string): Enhancement[] {
  const json = parseJsonBlock(response);
  if (json === undefined) {
    throw new CliValidationError('The LLM answer does not contain a JSON array of enhancements');
  }
  const result = enhancementsSchema.safeParse(json);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new CliValidationError(`Invalid enhancements in the LLM answer: ${details}`);
  }
  return result.data;
}

/**
 * Путь внутри `root`.
 * @throws {CliValidationError} для путей за пределами root
 */
export function resolveInside(root: string, filePath: string): string {
  const absolute = path.resolve(root, filePath);
  const relative = path.relative(root, absolute);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new CliValidationError(`Refusing to write outside ${root}: ${filePath}`);
  }
  return absolute;
}

function joinLines(first: string, second: string): string {
  if (first === '' || first.endsWith('\n')) {
    return `${first}${second}`;
  }
  return `${first}\n${second}`;
}

export function applyChanges(content: string, changes: FileChange[], filePath: string): string {
  let result = content;
  for (const change of changes) {
    switch (change.type) {
      case 'replace':
        if (!result.includes(change.find)) {
          throw new CliValidationError(`Text to replace not found in ${filePath}: ${change.find}`);
        }
        result = result.replace(change.find, () => change.content);
        break;
      case 'append':
        result = joinLines(result, change.content);
        break;
      case 'prepend':
        result = joinLines(change.content, result);
        break;
    }
  }
  return result;
}

/**
 * Все новые содержимые вычисляются до первой записи. Изменения одного
 * файла применяются последовательно к уже вычисленному содержимому.
 * @throws {CliValidationError} для путей вне cwd, существующих new_file и ненайденных replace
 */
export async function applyEnhancements(
  services: Services,
  enhancements: Enhancement[],
): Promise<AppliedEnhancement[]> {
  const pending = new Map<string, string>();
  const applied: AppliedEnhancement[] = [];

  for (const enhancement of enhancements) {
    const absolutePath = resolveInside(services.cwd, enhancement.path);
    const planned = pending.get(absolutePath);

    if (enhancement.type === 'new_file') {
      if (planned !== undefined || (await pathExists(absolutePath, services.fs))) {
        throw new CliValidationError(`File already exists: ${enhancement.path}`);
      }
      pending.set(absolutePath, enhancement.content);
      applied.push({ path: enhancement.path, action: 'created' });
    } else {
      const current = planned ?? (await readTarget(services, absolutePath)).content;
      pending.set(absolutePath, applyChanges(current, enhancement.changes, enhancement.path));
      applied.push({ path: enhancement.path, action: 'modified' });
    }
  }

  for (const [absolutePath, content] of pending) {
    await writeFileAtomic(absolutePath, content, services.fs);
  }
  return applied;
}

async function describeTarget(services: Services, target: string): Promise<string> {
  const absolutePath = path.resolve(services.cwd, target);
  let isDirectory: boolean;
  try {
    isDirectory = (await services.fs.stat(absolutePath)).isDirectory();
  } catch (e) {
    if (hasErrorCode(e, 'ENOENT', 'ENOTDIR')) {
      throw new CliValidationError(`Path '${target}' does not exist`);
    }
    throw toError(e);
  }

  if (!isDirectory) {
    const source = await readTarget(services, target);
    return `File ${target}:\n${source.content}`;
  }
  const files = await projectFiles(services, absolutePath);
  const listed = formatList(files.slice(0, MAX_LISTED_FILES));
  const more = files.length > MAX_LISTED_FILES ? `\n... and ${files.length - MAX_LISTED_FILES} more` : '';
  return `Directory ${target} with ${files.length} files:\n${listed}${more}`;
}

export async function enhanceCommand(
  services: Services,
  options: { target: string; type?: string; apply?: boolean },
  promptOpts: PromptOptions = {},
): Promise<EnhanceResult> {
  const type = parseChoice(options.type ?? 'tests', IMPROVEMENT_TYPES, 'improvement type');
  if (options.apply && !promptOpts.send) {
    throw new CliValidationError('--apply requires --send');
  }

  const prompt = await runPrompt(
    services,
    {
      command: 'enhance',
      template: 'enhance-system',
      context: {
        target_path: options.target,
        improvement_type: type,
        current_state: await describeTarget(services, options.target),
        system_capabilities: services.templates
          .list()
          .map((t) => `- ${t.name}: ${t.description}`)
          .join('\n'),
      },
      target: options.target,
    },
    promptOpts,
  );

  const enhancements = prompt.response === undefined ? [] : parseEnhancements(prompt.response);
  const applied = options.apply ? await applyEnhancements(services, enhancements) : [];
  return { prompt, enhancements, applied };
}

export function registerImproveCommands(program: Command, run: CommandRunner): void {
  const improve = program.command('improve').description('Prompts that propose enhancements to the project');

  addPromptOptions(
    improve
      .command('enhance <target>')
      .description('Propose enhancements for a file or directory')
      .option('-t, --type <type>', IMPROVEMENT_TYPES.join(', '), 'tests')
      .option('--apply', 'Apply the proposed changes (requires --send)'),
  ).action((target: string, options: PromptCliOptions & { type: string; apply?: boolean }) =>
    run(async (services) => {
      const result = await enhanceCommand(
        services,
        { target, type: options.type, apply: options.apply },
        promptOptions(options),
      );
      printPrompt(result.prompt, options.quiet);
      for (const enhancement of result.enhancements) {
        info(`${enhancement.type} ${enhancement.path}: ${enhancement.description}`);
      }
      for (const applied of result.applied) {
        success(`${applied.action} ${applied.path}`);
      }
    }),
  );
}
