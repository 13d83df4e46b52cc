import * as path from 'node:path';
import type { Command } from 'commander';
import type { Services } from '../services.js';
import { runPrompt, type PromptOptions, type PromptResult } from '../prompt.js';
import { CliValidationError } from '../errors.js';
import { collect, parseChoice } from '../validation.js';
import { addPromptOptions, promptOptions, type CommandRunner, type PromptCliOptions } from '../runner.js';
import { dim, info, printJson, printPrompt, success, warn } from '../output.js';
import { formatCounts, formatTaskLine, formatTaskLines, NONE, recordInBank } from '../context.js';
import {
  EXPORT_FORMATS,
  TASK_PRIORITIES,
  TASK_SORT_FIELDS,
  TASK_STATUSES,
  TaskAlreadyExistsError,
  formatFromPath,
  type DependencyInfo,
  type ExportResult,
  type ImportResult,
  type ProgressUpdate,
  type StatusCounts,
  type Task,
} from '../../tasks/index.js';
import { parseStringList } from '../../llm/index.js';
import { normalizeTaskName } from '../../utils/validation.js';

export interface AddTaskOptions {
  name: string;
  description?: string;
  priority?: string;
  template?: string;
  tags?: string[];
  dependsOn?: string[];
  showPrompt?: boolean;
}

export interface AddTaskResult {
  task: Task;
  prompt?: PromptResult;
}

export async function addTaskCommand(services: Services, options: AddTaskOptions): Promise<AddTaskResult> {
  const priority = parseChoice(options.priority ?? 'medium', TASK_PRIORITIES, 'priority');

  let prompt: PromptResult | undefined;
  if (options.showPrompt) {
    const existing = await services.tasks.list({ sortBy: 'created' });
    prompt = await runPrompt(services, {
      command: 'add-task',
      template: 'add-task',
      context: {
        task_name: options.name,
        description: options.description ?? '',
        priority,
        template: options.template ?? NONE,
        existing_tasks: formatTaskLines(existing),
      },
      target: options.name,
    });
  }

  const task = await services.tasks.add({
    name: options.name,
    description: options.description,
    priority,
    template: options.template,
    tags: options.tags,
    dependencies: options.dependsOn,
  });
  await recordInBank(services, 'activeContext.md', 'Tasks', `Task: ${task.name}`, 'append');

  return { task, prompt };
}

export interface UpdateProgressOptions {
  name: string;
  status: string;
  note?: string;
  showPrompt?: boolean;
}

export interface UpdateProgressResult extends ProgressUpdate {
  prompt?: PromptResult;
}

export async function updateProgressCommand(
  services: Services,
  options: UpdateProgressOptions,
): Promise<UpdateProgressResult> {
  const status = parseChoice(options.status, TASK_STATUSES, 'status');

  let prompt: PromptResult | undefined;
  if (options.showPrompt) {
    const task = await services.tasks.get(options.name);
    const related = await services.tasks.relatedTasks(options.name);
    prompt = await runPrompt(services, {
      command: 'update-progress',
      template: 'update-progress',
      context: {
        task_name: task.name,
        current_status: task.status,
        new_status: status,
        progress_note: options.note ?? NONE,
        task_history:
          task.notes.length > 0
            ? task.notes.map((n) => `- ${n.timestamp} [${n.status}] ${n.text}`).join('\n')
            : NONE,
        related_tasks: formatTaskLines(related),
      },
      target: task.name,
    });
  }

  const update = await services.tasks.updateProgress(options.name, status, options.note);
  const note = options.note ? ` (${options.note})` : '';
  await recordInBank(
    services,
    'progress.md',
    'Task Updates',
    `${update.task.name}: ${update.previousStatus} -> ${update.task.status}${note}`,
    'append',
  );

  return { ...update, prompt };
}

export interface ListTasksCommandOptions {
  status?: string;
  priority?: string;
  tag?: string;
  sortBy?: string;
  showPrompt?: boolean;
}

export interface ListTasksResult {
  tasks: Task[];
  counts: StatusCounts;
  prompt?: PromptResult;
}

export async function listTasksCommand(
  services: Services,
  options: ListTasksCommandOptions = {},
): Promise<ListTasksResult> {
  const status = options.status === undefined ? undefined : parseChoice(options.status, TASK_STATUSES, 'status');
  const priority =
    options.priority === undefined ? undefined : parseChoice(options.priority, TASK_PRIORITIES, 'priority');
  const sortBy = parseChoice(options.sortBy ?? 'created', TASK_SORT_FIELDS, 'sort field');

  const tasks = await services.tasks.list({ status, priority, tag: options.tag, sortBy });
  const counts = await services.tasks.stats();

  let prompt: PromptResult | undefined;
  if (options.showPrompt) {
    prompt = await runPrompt(services, {
      command: 'list-tasks',
      template: 'list-tasks',
      context: {
        tasks: formatTaskLines(tasks),
        filter_status: status ?? 'all',
        completion_stats: formatCounts(counts),
      },
    });
  }

  return { tasks, counts, prompt };
}

export interface ExportTasksOptions {
  output: string;
  format?: string;
  showPrompt?: boolean;
}

export interface ExportTasksResult extends ExportResult {
  prompt?: PromptResult;
}

export async function exportTasksCommand(
  services: Services,
  options: ExportTasksOptions,
): Promise<ExportTasksResult> {
  const format =
    options.format === undefined
      ? formatFromPath(options.output)
      : parseChoice(options.format, EXPORT_FORMATS, 'format');

  let prompt: PromptResult | undefined;
  if (options.showPrompt) {
    prompt = await runPrompt(services, {
      command: 'export-tasks',
      template: 'export-tasks',
      context: {
        tasks: formatTaskLines(await services.tasks.list({ sortBy: 'created' })),
        export_format: format,
        export_path: options.output,
        project_name: path.basename(services.config.rootDir),
      },
      target: options.output,
    });
  }

  const result = await services.tasks.exportTo(path.resolve(services.cwd, options.output), format);
  return { ...result, prompt };
}

export async function importTasksCommand(
  services: Services,
  options: { file: string; replace?: boolean },
): Promise<ImportResult> {
  return services.tasks.importFrom(path.resolve(services.cwd, options.file), {
    replace: options.replace,
  });
}

export async function addDependencyCommand(
  services: Services,
  options: { task: string; dependsOn: string },
): Promise<Task> {
  return services.tasks.addDependency(options.task, options.dependsOn);
}

export async function removeDependencyCommand(
  services: Services,
  options: { task: string; dependsOn: string },
): Promise<Task> {
  return services.tasks.removeDependency(options.task, options.dependsOn);
}

export async function listDependenciesCommand(
  services: Services,
  options: { task: string },
): Promise<DependencyInfo> {
  return services.tasks.listDependencies(options.task);
}

export interface GenerateBoltTasksOptions {
  description: string;
  framework?: string;
  add?: boolean;
}

export interface GenerateBoltTasksResult {
  prompt: PromptResult;
  /** Задачи из ответа LLM (только с --send) */
  items: string[];
  added: Task[];
  /** Уже существующие задачи, которые не добавлялись */
  skipped: string[];
  /** Пустые или слишком длинные имена из ответа */
  invalid: string[];
}

export async function generateBoltTasksCommand(
  services: Services,
  options: GenerateBoltTasksOptions,
  promptOpts: PromptOptions = {},
): Promise<GenerateBoltTasksResult> {
  if (options.add && !promptOpts.send) {
    throw new CliValidationError('--add requires --send');
  }

  const existing = await services.tasks.list({ sortBy: 'created' });
  const prompt = await runPrompt(
    services,
    {
      command: 'generate-bolt-tasks',
      template: 'generate-bolt-tasks',
      context: {
        description: options.description,
        framework: options.framework ?? 'unspecified',
        existing_tasks: formatTaskLines(existing),
      },
    },
    promptOpts,
  );

  const items = prompt.response === undefined ? [] : parseStringList(prompt.response);
  const added: Task[] = [];
  const skipped: string[] = [];
  const invalid: string[] = [];

  if (options.add) {
    for (const item of items) {
      const name = normalizeTaskName(item);
      if (name === null) {
        invalid.push(item);
        continue;
      }
      let task: Task;
      try {
        task = await services.tasks.add({
          name,
          description: `Generated from: ${options.description}`,
          template: 'generate-bolt-tasks',
        });
      } catch (e) {
        if (!(e instanceof TaskAlreadyExistsError)) {
          throw e;
        }
        skipped.push(name);
        continue;
      }
      added.push(task);
      await recordInBank(services, 'activeContext.md', 'Tasks', `Task: ${task.name}`, 'append');
    }
  }

  return { prompt, items, added, skipped, invalid };
}

function printTasks(tasks: Task[]): void {
  if (tasks.length === 0) {
    info('No tasks');
    return;
  }
  for (const task of tasks) {
    console.log(formatTaskLine(task));
    if (task.description) {
      dim(`    ${task.description}`);
    }
  }
}

interface ShowPromptCliOptions {
  showPrompt?: boolean;
}

export function registerBaseCommands(program: Command, run: CommandRunner): void {
  const base = program.command('base').description('Task tracking: tasks, progress, export and dependencies');

  base
    .command('add-task <name> [description]')
    .description('Add a task')
    .option('-p, --priority <priority>', 'low, medium or high', 'medium')
    .option('--template <template>', 'Template or note linked to the task')
    .option('--tag <tag>', 'Tag (repeatable)', collect, [])
    .option('--depends-on <task>', 'Task this one depends on (repeatable)', collect, [])
    .option('--show-prompt', 'Print the add-task prompt')
    .action(
      (
        name: string,
        description: string | undefined,
        options: ShowPromptCliOptions & { priority: string; template?: string; tag: string[]; dependsOn: string[] },
      ) =>
        run(async (services) => {
          const result = await addTaskCommand(services, {
            name,
            description,
            priority: options.priority,
            template: options.template,
            tags: options.tag,
            dependsOn: options.dependsOn,
            showPrompt: options.showPrompt,
          });
          if (result.prompt) {
            printPrompt(result.prompt);
          }
          success(`Added task: ${result.task.name}`);
        }),
    );

  base
    .command('update-progress <name> <status>')
    .description(`Change task status (${TASK_STATUSES.join(', ')})`)
    .option('-n, --note <note>', 'Progress note')
    .option('--show-prompt', 'Print the update-progress prompt')
    .action((name: string, status: string, options: ShowPromptCliOptions & { note?: string }) =>
      run(async (services) => {
        const result = await updateProgressCommand(services, { name, status, ...options });
        if (result.prompt) {
          printPrompt(result.prompt);
        }
        success(`Task ${result.task.name}: ${result.previousStatus} -> ${result.task.status}`);
      }),
    );

  base
    .command('list-tasks')
    .description('List tasks')
    .option('-s, --status <status>', 'Filter by status')
    .option('-p, --priority <priority>', 'Filter by priority')
    .option('-t, --tag <tag>', 'Filter by tag')
    .option('--sort-by <field>', `Sort by ${TASK_SORT_FIELDS.join(', ')}`, 'created')
    .option('--json', 'Output as JSON')
    .option('--show-prompt', 'Print the list-tasks prompt')
    .action((options: ListTasksCommandOptions & { json?: boolean }) =>
      run(async (services) => {
        const result = await listTasksCommand(services, options);
        if (result.prompt) {
          printPrompt(result.prompt);
        }
        if (options.json) {
          printJson(result.tasks);
          return;
        }
        printTasks(result.tasks);
      }),
    );

  base
    .command('export-tasks <output>')
    .description('Export tasks to json, yaml or markdown')
    .option('-f, --format <format>', 'json, yaml or markdown (default: from the file extension)')
    .option('--show-prompt', 'Print the export-tasks prompt')
    .action((output: string, options: ShowPromptCliOptions & { format?: string }) =>
      run(async (services) => {
        const result = await exportTasksCommand(services, { output, ...options });
        if (result.prompt) {
          printPrompt(result.prompt);
        }
        success(`Exported ${result.count} tasks to ${result.path} (${result.format})`);
      }),
    );

  base
    .command('import-tasks <file>')
    .description('Import tasks from a json or yaml export')
    .option('--replace', 'Replace all tasks instead of merging by name')
    .action((file: string, options: { replace?: boolean }) =>
      run(async (services) => {
        const result = await importTasksCommand(services, { file, ...options });
        success(
          `Imported ${result.total} tasks (${result.added.length} added, ${result.updated.length} updated)`,
        );
      }),
    );

  base
    .command('add-dependency <task> <dependsOn>')
    .description('Make a task depend on another')
    .action((task: string, dependsOn: string) =>
      run(async (services) => {
        await addDependencyCommand(services, { task, dependsOn });
        success(`Added dependency: ${task} -> ${dependsOn}`);
      }),
    );

  base
    .command('remove-dependency <task> <dependsOn>')
    .description('Remove a dependency between tasks')
    .action((task: string, dependsOn: string) =>
      run(async (services) => {
        await removeDependencyCommand(services, { task, dependsOn });
        success(`Removed dependency: ${task} -> ${dependsOn}`);
      }),
    );

  base
    .command('list-dependencies <task>')
    .description('Show what a task depends on and what depends on it')
    .action((task: string) =>
      run(async (services) => {
        const deps = await listDependenciesCommand(services, { task });
        console.log(`Depends on: ${deps.dependsOn.length > 0 ? deps.dependsOn.join(', ') : NONE}`);
        console.log(`Required by: ${deps.dependents.length > 0 ? deps.dependents.join(', ') : NONE}`);
      }),
    );

  addPromptOptions(
    base
      .command('generate-bolt-tasks <description>')
      .description('Break a feature into small tasks')
      .option('--framework <framework>', 'Framework used by the project')
      .option('--add', 'Add the generated tasks (requires --send)'),
  ).action((description: string, options: PromptCliOptions & { framework?: string; add?: boolean }) =>
    run(async (services) => {
      const result = await generateBoltTasksCommand(
        services,
        { description, framework: options.framework, add: options.add },
        promptOptions(options),
      );
      printPrompt(result.prompt, options.quiet);
      for (const task of result.added) {
        success(`Added task: ${task.name}`);
      }
      for (const name of result.skipped) {
        warn(`Task already exists: ${name}`);
      }
      for (const item of result.invalid) {
        warn(`Skipped invalid task name: ${item.length > 60 ? `${item.slice(0, 60)}...` : item}`);
      }
    }),
  );
}
