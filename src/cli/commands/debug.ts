import * as path from 'node:path';
import type { Command } from 'commander';
import type { Services } from '../services.js';
import { runPrompt, type PromptOptions, type PromptRequest, type PromptResult } from '../prompt.js';
import { parsePositiveInt } from '../validation.js';
import { addPromptOptions, promptOptions, type CommandRunner, type PromptCliOptions } from '../runner.js';
import { printPrompt } from '../output.js';
import {
  formatHistory,
  formatList,
  projectContext,
  projectFiles,
  readTarget,
  recordInBank,
  type SourceFile,
} from '../context.js';
import { summarizeFiles } from '../../repo/index.js';

const DEFAULT_CONTEXT_LINES = 5;

/**
 * Результат отладочной команды: `<kind>_<file>` секция в techContext.md
 * (hybrid) и промпт.
 */
async function runDebugPrompt(
  services: Services,
  kind: string,
  target: string,
  request: PromptRequest,
  options: PromptOptions,
): Promise<PromptResult> {
  const result = await runPrompt(services, request, options);
  const content =
    result.response ??
    `Prompt prepared with template '${result.template}' at ${services.now().toISOString()}`;
  await recordInBank(services, 'techContext.md', `${kind}_${target}`, content, 'replace');
  return result;
}

async function techStack(services: Services): Promise<string> {
  const { languages } = summarizeFiles(await projectFiles(services));
  return languages.length > 0 ? languages.join(', ') : 'unknown';
}

export async function analyzeFileCommand(
  services: Services,
  options: { file: string; contextLines?: string },
  promptOpts: PromptOptions = {},
): Promise<PromptResult> {
  const contextLines =
    options.contextLines === undefined
      ? DEFAULT_CONTEXT_LINES
      : parsePositiveInt(options.contextLines, 'context lines');
  const source = await readTarget(services, options.file);

  return runDebugPrompt(
    services,
    'Analysis',
    source.path,
    {
      command: 'analyze-file',
      template: 'analyze-file',
      context: {
        file_path: source.path,
        context_lines: contextLines,
        file_content: source.content,
        project_context: await projectContext(services),
        previous_analyses: formatHistory(
          await services.history.previous('analyze-file', { target: source.path }),
        ),
        tech_stack: await techStack(services),
      },
      target: source.path,
    },
    promptOpts,
  );
}

export async function findRootCauseCommand(
  services: Services,
  options: { file: string; error?: string },
  promptOpts: PromptOptions = {},
): Promise<PromptResult> {
  const source = await readTarget(services, options.file);

  return runDebugPrompt(
    services,
    'RootCause',
    source.path,
    {
      command: 'find-root-cause',
      template: 'find-root-cause',
      context: {
        file_path: source.path,
        error_message: options.error ?? 'Not provided',
        file_content: source.content,
        recent_changes: formatList(services.git.recentCommits(5)),
      },
      target: source.path,
    },
    promptOpts,
  );
}

export async function iterativeFixCommand(
  services: Services,
  options: { file: string; issue?: string; testResults?: string },
  promptOpts: PromptOptions = {},
): Promise<PromptResult> {
  const source = await readTarget(services, options.file);

  return runDebugPrompt(
    services,
    'Fix',
    source.path,
    {
      command: 'iterative-fix',
      template: 'iterative-fix',
      context: {
        file_path: source.path,
        issue_description: options.issue ?? 'Not provided',
        file_content: source.content,
        fix_attempts: formatHistory(
          await services.history.previous('iterative-fix', { target: source.path }),
        ),
        test_results: options.testResults ?? 'Not run',
      },
      target: source.path,
    },
    promptOpts,
  );
}

/**
 * Тесты рядом с файлом: `<name>.test.*`, `<name>.spec.*`, `test_<name>.*`.
 */
export function findExistingTests(file: string, projectPaths: string[]): string[] {
  const base = path.basename(file, path.extname(file));
  const patterns = [`${base}.test.`, `${base}.spec.`, `test_${base}.`, `${base}_test.`];
  return projectPaths.filter((p) => {
    const name = path.basename(p);
    return patterns.some((pattern) => name.startsWith(pattern));
  });
}

export async function testRoadmapCommand(
  services: Services,
  options: { file: string; framework?: string },
  promptOpts: PromptOptions = {},
): Promise<PromptResult> {
  const source = await readTarget(services, options.file);
  const existingTests = findExistingTests(source.path, await projectFiles(services));

  return runDebugPrompt(
    services,
    'TestRoadmap',
    source.path,
    {
      command: 'test-roadmap',
      template: 'test-roadmap',
      context: {
        file_path: source.path,
        file_content: source.content,
        existing_tests: formatList(existingTests),
        test_framework: options.framework ?? 'unspecified',
        project_requirements: await projectContext(services),
      },
      target: source.path,
    },
    promptOpts,
  );
}

export async function analyzeDependenciesCommand(
  services: Services,
  options: { files: string[] },
  promptOpts: PromptOptions = {},
): Promise<PromptResult> {
  const sources: SourceFile[] = [];
  for (const file of options.files) {
    sources.push(await readTarget(services, file));
  }
  const paths = sources.map((s) => s.path);

  return runDebugPrompt(
    services,
    'Dependencies',
    paths[0],
    {
      command: 'analyze-dependencies',
      template: 'analyze-dependencies',
      context: {
        file_paths: paths,
        file_contents: sources.map((s) => `--- ${s.path} ---\n${s.content}`).join('\n\n'),
        project_context: await projectContext(services),
      },
      target: paths.join(', '),
    },
    promptOpts,
  );
}

export async function traceErrorCommand(
  services: Services,
  options: { file: string; error?: string; stack?: string },
  promptOpts: PromptOptions = {},
): Promise<PromptResult> {
  const source = await readTarget(services, options.file);
  const errorContext = [
    `Branch: ${services.git.currentBranch()}`,
    `Changed files:\n${formatList(services.git.changedFiles())}`,
    `Earlier traces:\n${formatHistory(await services.history.previous('trace-error', { target: source.path }))}`,
  ].join('\n');

  return runDebugPrompt(
    services,
    'ErrorTrace',
    source.path,
    {
      command: 'trace-error',
      template: 'trace-error',
      context: {
        file_path: source.path,
        error_message: options.error ?? 'Not provided',
        stack_trace: options.stack ?? 'Not provided',
        file_content: source.content,
        error_context: errorContext,
      },
      target: source.path,
    },
    promptOpts,
  );
}

export function registerDebugCommands(program: Command, run: CommandRunner): void {
  const debug = program.command('debug').description('Prompts for analysing and fixing source files');

  addPromptOptions(
    debug
      .command('analyze-file <file>')
      .description('Review a source file')
      .option('--context-lines <n>', 'Lines of code to quote per finding', String(DEFAULT_CONTEXT_LINES)),
  ).action((file: string, options: PromptCliOptions & { contextLines: string }) =>
    run(async (services) => {
      const result = await analyzeFileCommand(
        services,
        { file, contextLines: options.contextLines },
        promptOptions(options),
      );
      printPrompt(result, options.quiet);
    }),
  );

  addPromptOptions(
    debug
      .command('find-root-cause <file>')
      .description('Find the root cause of an error')
      .option('-e, --error <message>', 'Error message'),
  ).action((file: string, options: PromptCliOptions & { error?: string }) =>
    run(async (services) => {
      const result = await findRootCauseCommand(services, { file, error: options.error }, promptOptions(options));
      printPrompt(result, options.quiet);
    }),
  );

  addPromptOptions(
    debug
      .command('iterative-fix <file>')
      .description('Propose the next fix attempt for an issue')
      .option('-i, --issue <description>', 'Issue description')
      .option('--test-results <text>', 'Output of the last test run'),
  ).action((file: string, options: PromptCliOptions & { issue?: string; testResults?: string }) =>
    run(async (services) => {
      const result = await iterativeFixCommand(
        services,
        { file, issue: options.issue, testResults: options.testResults },
        promptOptions(options),
      );
      printPrompt(result, options.quiet);
    }),
  );

  addPromptOptions(
    debug
      .command('test-roadmap <file>')
      .description('Plan tests for a file')
      .option('--framework <name>', 'Test framework'),
  ).action((file: string, options: PromptCliOptions & { framework?: string }) =>
    run(async (services) => {
      const result = await testRoadmapCommand(
        services,
        { file, framework: options.framework },
        promptOptions(options),
      );
      printPrompt(result, options.quiet);
    }),
  );

  addPromptOptions(
    debug.command('analyze-dependencies <files...>').description('Analyse how files depend on each other'),
  ).action((files: string[], options: PromptCliOptions) =>
    run(async (services) => {
      const result = await analyzeDependenciesCommand(services, { files }, promptOptions(options));
      printPrompt(result, options.quiet);
    }),
  );

  addPromptOptions(
    debug
      .command('trace-error <file>')
      .description('Trace an error through a file')
      .option('-e, --error <message>', 'Error message')
      .option('-s, --stack <trace>', 'Stack trace'),
  ).action((file: string, options: PromptCliOptions & { error?: string; stack?: string }) =>
    run(async (services) => {
      const result = await traceErrorCommand(
        services,
        { file, error: options.error, stack: options.stack },
        promptOptions(options),
      );
      printPrompt(result, options.quiet);
    }),
  );
}
