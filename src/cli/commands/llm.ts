import type { Command } from 'commander';
import type { Services } from '../services.js';
import { runPrompt, type PromptOptions, type PromptResult } from '../prompt.js';
import { collect, parsePositiveInt } from '../validation.js';
import { addPromptOptions, promptOptions, type CommandRunner, type PromptCliOptions } from '../runner.js';
import { printPrompt } from '../output.js';
import { formatHistory, formatList, isHybrid, readTarget } from '../context.js';

const DEFAULT_MAX_SUGGESTIONS = 5;
const COMMAND_HISTORY_LIMIT = 10;

export async function analyzeImpactCommand(
  services: Services,
  options: { files: string[]; changes?: string },
  promptOpts: PromptOptions = {},
): Promise<PromptResult> {
  const paths: string[] = [];
  for (const file of options.files) {
    paths.push((await readTarget(services, file)).path);
  }

  const changed = new Set(services.git.changedFiles());
  const changes =
    options.changes ??
    paths
      .map((p) => `${p}: ${changed.has(p) ? 'has uncommitted changes' : 'no uncommitted changes'}`)
      .join('\n');

  return runPrompt(
    services,
    {
      command: 'analyze-impact',
      template: 'analyze-impact',
      context: {
        file_paths: paths,
        changes,
        recent_commits: formatList(services.git.recentCommits(5)),
        previous_analysis: formatHistory(await services.history.previous('analyze-impact')),
      },
      target: paths.join(', '),
    },
    promptOpts,
  );
}

export async function suggestImprovementsCommand(
  services: Services,
  options: { file: string; maxSuggestions?: string },
  promptOpts: PromptOptions = {},
): Promise<PromptResult> {
  const maxSuggestions =
    options.maxSuggestions === undefined
      ? DEFAULT_MAX_SUGGESTIONS
      : parsePositiveInt(options.maxSuggestions, 'max suggestions');
  const source = await readTarget(services, options.file);

  return runPrompt(
    services,
    {
      command: 'suggest-improvements',
      template: 'suggest-improvements',
      context: {
        file_path: source.path,
        file_content: source.content,
        previous_suggestions: formatHistory(
          await services.history.previous('suggest-improvements', { target: source.path }),
        ),
        max_suggestions: maxSuggestions,
      },
      target: source.path,
    },
    promptOpts,
  );
}

export async function createPrCommand(
  services: Services,
  options: { title: string; description: string; files?: string[] },
  promptOpts: PromptOptions = {},
): Promise<PromptResult> {
  const files = options.files && options.files.length > 0 ? options.files : services.git.changedFiles();

  return runPrompt(
    services,
    {
      command: 'create-pr',
      template: 'create-pr',
      context: {
        title: options.title,
        description: options.description,
        current_branch: services.git.currentBranch(),
        changed_files: formatList(files),
        commit_history: formatList(services.git.recentCommits(10)),
      },
    },
    promptOpts,
  );
}

/**
 * Последние команды: из commandHistory.md (hybrid) или из истории промптов.
 */
export async function recentCommands(services: Services, limit = COMMAND_HISTORY_LIMIT): Promise<string[]> {
  if (isHybrid(services)) {
    const lines = (await services.bank.sections('commandHistory.md')).flatMap((s) =>
      s.content
        .split('\n')
        .filter((line) => line.startsWith('Command: '))
        .map((line) => `${s.title} ${line.slice('Command: '.length)}`),
    );
    return lines.slice(-limit);
  }
  const entries = await services.history.all();
  return entries.slice(-limit).map((e) => `${e.timestamp} ${e.command}`);
}

export async function generateCommandsCommand(
  services: Services,
  options: { file: string },
  promptOpts: PromptOptions = {},
): Promise<PromptResult> {
  const source = await readTarget(services, options.file);

  return runPrompt(
    services,
    {
      command: 'generate-commands',
      template: 'generate-commands',
      context: {
        file_path: source.path,
        file_content: source.content,
        command_history: formatList(await recentCommands(services)),
      },
      target: source.path,
    },
    promptOpts,
  );
}

export function registerLlmCommands(program: Command, run: CommandRunner): void {
  const llm = program.command('llm').description('Prompts for change impact, suggestions and pull requests');

  addPromptOptions(
    llm
      .command('analyze-impact <files...>')
      .description('Analyse the impact of changing files')
      .option('-c, --changes <text>', 'Description of the planned changes'),
  ).action((files: string[], options: PromptCliOptions & { changes?: string }) =>
    run(async (services) => {
      const result = await analyzeImpactCommand(services, { files, changes: options.changes }, promptOptions(options));
      printPrompt(result, options.quiet);
    }),
  );

  addPromptOptions(
    llm
      .command('suggest-improvements <file>')
      .description('Suggest improvements for a file')
      .option('-m, --max-suggestions <n>', 'Maximum number of suggestions', String(DEFAULT_MAX_SUGGESTIONS)),
  ).action((file: string, options: PromptCliOptions & { maxSuggestions: string }) =>
    run(async (services) => {
      const result = await suggestImprovementsCommand(
        services,
        { file, maxSuggestions: options.maxSuggestions },
        promptOptions(options),
      );
      printPrompt(result, options.quiet);
    }),
  );

  addPromptOptions(
    llm
      .command('create-pr [files...]')
      .description('Draft a pull request description')
      .requiredOption('-t, --title <title>', 'Pull request title')
      .requiredOption('-d, --description <text>', 'What the change does')
      .option('--file <file>', 'Changed file (repeatable)', collect, []),
  ).action(
    (files: string[], options: PromptCliOptions & { title: string; description: string; file: string[] }) =>
      run(async (services) => {
        const result = await createPrCommand(
          services,
          { title: options.title, description: options.description, files: [...files, ...options.file] },
          promptOptions(options),
        );
        printPrompt(result, options.quiet);
      }),
  );

  addPromptOptions(
    llm.command('generate-commands <file>').description('Suggest shell commands for working on a file'),
  ).action((file: string, options: PromptCliOptions) =>
    run(async (services) => {
      const result = await generateCommandsCommand(services, { file }, promptOptions(options));
      printPrompt(result, options.quiet);
    }),
  );
}
