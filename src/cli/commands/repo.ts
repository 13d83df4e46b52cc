import * as path from 'node:path';
import type { Command } from 'commander';
import type { Services } from '../services.js';
import { runPrompt, type PromptOptions, type PromptResult } from '../prompt.js';
import { parsePositiveInt } from '../validation.js';
import { addPromptOptions, promptOptions, type CommandRunner, type PromptCliOptions } from '../runner.js';
import { printPrompt } from '../output.js';
import { assertDirectory, formatHistory, formatList, projectFiles } from '../context.js';
import { createGitService, summarizeFiles, type GitService } from '../../repo/index.js';

const DEFAULT_DURATION_MINUTES = 30;

interface RepoTarget {
  root: string;
  git: GitService;
}

async function resolveRepo(services: Services, target: string | undefined): Promise<RepoTarget> {
  const display = target ?? '.';
  const root = path.resolve(services.cwd, display);
  await assertDirectory(services.fs, root, display);
  const git = root === services.cwd ? services.git : createGitService(root, services.gitRunner);
  return { root, git };
}

export async function analyzeRepoCommand(
  services: Services,
  options: { path?: string },
  promptOpts: PromptOptions = {},
): Promise<PromptResult> {
  const repo = await resolveRepo(services, options.path);
  const summary = summarizeFiles(await projectFiles(services, repo.root));

  return runPrompt(
    services,
    {
      command: 'analyze-repo',
      template: 'analyze-repo',
      context: {
        repo_path: repo.root,
        current_branch: repo.git.currentBranch(),
        last_commit: repo.git.lastCommit(),
        file_count: summary.fileCount,
        main_languages: summary.languages.length > 0 ? summary.languages.join(', ') : 'unknown',
        previous_analysis: formatHistory(
          await services.history.previous('analyze-repo', { target: repo.root }),
        ),
      },
      target: repo.root,
    },
    promptOpts,
  );
}

export async function learnSessionCommand(
  services: Services,
  options: { path?: string; duration?: string },
  promptOpts: PromptOptions = {},
): Promise<PromptResult> {
  const duration =
    options.duration === undefined
      ? DEFAULT_DURATION_MINUTES
      : parsePositiveInt(options.duration, 'duration');
  const repo = await resolveRepo(services, options.path);
  const summary = summarizeFiles(await projectFiles(services, repo.root));

  return runPrompt(
    services,
    {
      command: 'learn-session',
      template: 'learn-session',
      context: {
        repo_path: repo.root,
        duration,
        file_count: summary.fileCount,
        languages: summary.languages.length > 0 ? summary.languages.join(', ') : 'unknown',
        recent_changes: formatList(repo.git.recentCommits(10)),
      },
      target: repo.root,
    },
    promptOpts,
  );
}

export function registerRepoCommands(program: Command, run: CommandRunner): void {
  const repo = program.command('repo').description('Prompts about the repository as a whole');

  addPromptOptions(
    repo.command('analyze-repo [path]').description('Give an overview of the repository'),
  ).action((target: string | undefined, options: PromptCliOptions) =>
    run(async (services) => {
      const result = await analyzeRepoCommand(services, { path: target }, promptOptions(options));
      printPrompt(result, options.quiet);
    }),
  );

  addPromptOptions(
    repo
      .command('learn-session [path]')
      .description('Plan a session for learning the codebase')
      .option('-d, --duration <minutes>', 'Session length in minutes', String(DEFAULT_DURATION_MINUTES)),
  ).action((target: string | undefined, options: PromptCliOptions & { duration: string }) =>
    run(async (services) => {
      const result = await learnSessionCommand(
        services,
        { path: target, duration: options.duration },
        promptOptions(options),
      );
      printPrompt(result, options.quiet);
    }),
  );
}
