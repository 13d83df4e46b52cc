import type { Command } from 'commander';
import { parse } from 'yaml';
import { z } from 'zod';
import chalk from 'chalk';
import type { Services } from '../services.js';
import { runPrompt, type PromptOptions, type PromptResult } from '../prompt.js';
import { CliValidationError } from '../errors.js';
import { collect, parseKeyValue } from '../validation.js';
import { addPromptOptions, promptOptions, type CommandRunner, type PromptCliOptions } from '../runner.js';
import { header, printJson, printPrompt } from '../output.js';
import { readTarget } from '../context.js';
import type { PromptTemplate, TemplateContext } from '../../prompts/index.js';
import { toError } from '../../utils/fs.js';

const contextFileSchema = z.record(z.unknown());

/**
 * Читает контекст из JSON или YAML файла (JSON является подмножеством YAML).
 * @throws {CliValidationError} если файл не разбирается или это не mapping
 */
export async function readContextFile(services: Services, file: string): Promise<TemplateContext> {
  const { content } = await readTarget(services, file);
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (e) {
    throw new CliValidationError(`Invalid context file ${file}: ${toError(e).message}`);
  }
  const result = contextFileSchema.safeParse(raw);
  if (!result.success) {
    throw new CliValidationError(`Context file ${file} must contain a mapping of context values`);
  }
  return result.data;
}

export function listTemplatesCommand(services: Services): PromptTemplate[] {
  return services.templates.list();
}

export function showTemplateCommand(services: Services, name: string): PromptTemplate {
  return services.templates.get(name);
}

export async function renderTemplateCommand(
  services: Services,
  options: { name: string; set?: string[]; contextFile?: string },
  promptOpts: PromptOptions = {},
): Promise<PromptResult> {
  const context: TemplateContext = options.contextFile
    ? await readContextFile(services, options.contextFile)
    : {};
  // --set побеждает значения из файла
  for (const raw of options.set ?? []) {
    const [key, value] = parseKeyValue(raw);
    context[key] = value;
  }

  return runPrompt(
    services,
    { command: 'templates render', template: options.name, context },
    promptOpts,
  );
}

export function registerTemplateCommands(program: Command, run: CommandRunner): void {
  const templates = program.command('templates').description('Inspect and render prompt templates');

  templates
    .command('list')
    .description('List available templates')
    .option('--json', 'Print as JSON')
    .action((options: { json?: boolean }) =>
      run(async (services) => {
        const list = listTemplatesCommand(services);
        if (options.json) {
          printJson(list.map(({ name, description, source }) => ({ name, description, source })));
          return;
        }
        for (const template of list) {
          console.log(`${chalk.bold(template.name)} ${chalk.dim(`[${template.source}]`)} ${template.description}`);
        }
      }),
    );

  templates
    .command('show <name>')
    .description('Show a template with its required context')
    .action((name: string) =>
      run(async (services) => {
        const template = showTemplateCommand(services, name);
        header(template.name);
        console.log(`Description: ${template.description}`);
        console.log(`Source: ${template.source} (${template.filePath})`);
        console.log(`Required context: ${template.requiredContext.join(', ') || 'none'}`);
        console.log();
        console.log(template.body);
      }),
    );

  addPromptOptions(
    templates
      .command('render <name>')
      .description('Render a template with the given context')
      .option('-s, --set <key=value>', 'Context value (repeatable)', collect, [])
      .option('--context-file <file>', 'JSON or YAML file with context values'),
  ).action((name: string, options: PromptCliOptions & { set: string[]; contextFile?: string }) =>
    run(async (services) => {
      const result = await renderTemplateCommand(
        services,
        { name, set: options.set, contextFile: options.contextFile },
        promptOptions(options),
      );
      printPrompt(result, options.quiet);
    }),
  );
}
