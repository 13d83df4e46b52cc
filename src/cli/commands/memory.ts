import * as path from 'node:path';
import type { Command } from 'commander';
import type { Services } from '../services.js';
import { CliValidationError } from '../errors.js';
import { parseChoice } from '../validation.js';
import type { CommandRunner } from '../runner.js';
import { info, printJson, success, warn } from '../output.js';
import { requireBank } from '../context.js';
import {
  MEMORY_BANK_FILES,
  MemoryKeyNotFoundError,
  UPDATE_MODES,
  jsonValueSchema,
  type BackupResult,
  type JsonValue,
  type MemoryEntry,
} from '../../memory/index.js';
import { writeFileAtomic } from '../../storage/index.js';
import { toError } from '../../utils/fs.js';

export function parseMemoryValue(raw: string, json: boolean): JsonValue {
  if (!json) {
    return raw;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new CliValidationError(`Invalid JSON value: ${toError(e).message}`);
  }
  const result = jsonValueSchema.safeParse(parsed);
  if (!result.success) {
    throw new CliValidationError('Invalid JSON value');
  }
  return result.data;
}

export function formatMemoryValue(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value, null, 2);
}

async function writeOutput(services: Services, output: string, content: string): Promise<string> {
  const outputPath = path.resolve(services.cwd, output);
  await writeFileAtomic(outputPath, content.endsWith('\n') ? content : `${content}\n`, services.fs);
  return outputPath;
}

export async function storeCommand(
  services: Services,
  options: { key: string; value: string; json?: boolean },
): Promise<MemoryEntry> {
  return services.memory.store(options.key, parseMemoryValue(options.value, options.json ?? false));
}

export async function retrieveCommand(services: Services, options: { key: string }): Promise<MemoryEntry> {
  return services.memory.retrieve(options.key);
}

export async function listAllCommand(services: Services): Promise<MemoryEntry[]> {
  return services.memory.list();
}

/**
 * @throws {MemoryKeyNotFoundError} если ключа нет
 */
export async function forgetCommand(services: Services, options: { key: string }): Promise<void> {
  if (!(await services.memory.remove(options.key))) {
    throw new MemoryKeyNotFoundError(options.key);
  }
}

export async function updateContextCommand(
  services: Services,
  options: { file: string; section: string; content: string; mode?: string },
): Promise<void> {
  requireBank(services);
  await services.bank.updateSection(options.file, options.section, options.content, options.mode ?? 'append');
}

/**
 * Содержимое одного файла memory bank или всех подряд.
 */
export async function showCommand(services: Services, options: { file?: string } = {}): Promise<string> {
  requireBank(services);
  if (options.file !== undefined) {
    const file = parseChoice(options.file, MEMORY_BANK_FILES, 'memory bank file');
    return services.bank.read(file);
  }
  const parts: string[] = [];
  for (const file of MEMORY_BANK_FILES) {
    parts.push((await services.bank.read(file)).trimEnd());
  }
  return `${parts.join('\n\n')}\n`;
}

export async function backupCommand(services: Services): Promise<BackupResult> {
  return services.backups.backup();
}

export async function restoreCommand(services: Services, options: { backup?: string } = {}): Promise<BackupResult> {
  return services.backups.restore(options.backup ?? 'latest');
}

export async function resetCommand(services: Services): Promise<void> {
  requireBank(services);
  await services.bank.reset();
}

export function registerMemoryCommands(program: Command, run: CommandRunner): void {
  const memory = program.command('memory').description('Project memory: key-value context and the markdown memory bank');

  memory
    .command('store <key> <value>')
    .description('Store a value under a key')
    .option('--json', 'Parse the value as JSON')
    .action((key: string, value: string, options: { json?: boolean }) =>
      run(async (services) => {
        await storeCommand(services, { key, value, json: options.json });
        success(`Stored ${key}`);
      }),
    );

  memory
    .command('retrieve <key>')
    .description('Print the value stored under a key')
    .option('-o, --output <file>', 'Write the value to a file')
    .action((key: string, options: { output?: string }) =>
      run(async (services) => {
        const entry = await retrieveCommand(services, { key });
        const text = formatMemoryValue(entry.value);
        if (options.output) {
          success(`Saved to ${await writeOutput(services, options.output, text)}`);
          return;
        }
        console.log(text);
      }),
    );

  memory
    .command('list-all')
    .description('List every stored key')
    .option('--json', 'Output as JSON')
    .option('-o, --output <file>', 'Write the entries to a file as JSON')
    .action((options: { json?: boolean; output?: string }) =>
      run(async (services) => {
        const entries = await listAllCommand(services);
        if (options.output) {
          success(`Saved to ${await writeOutput(services, options.output, JSON.stringify(entries, null, 2))}`);
          return;
        }
        if (options.json) {
          printJson(entries);
          return;
        }
        if (entries.length === 0) {
          info('Memory is empty');
          return;
        }
        for (const entry of entries) {
          console.log(`${entry.key}: ${formatMemoryValue(entry.value)}`);
        }
      }),
    );

  memory
    .command('forget <key>')
    .description('Remove a stored key')
    .action((key: string) =>
      run(async (services) => {
        await forgetCommand(services, { key });
        success(`Forgot ${key}`);
      }),
    );

  memory
    .command('update-context <file> <section> <content>')
    .description(`Update a section of a memory bank file (${MEMORY_BANK_FILES.join(', ')})`)
    .option('-m, --mode <mode>', UPDATE_MODES.join(' or '), 'append')
    .action((file: string, section: string, content: string, options: { mode: string }) =>
      run(async (services) => {
        await updateContextCommand(services, { file, section, content, mode: options.mode });
        success(`Updated ${file}: ${section}`);
      }),
    );

  memory
    .command('show')
    .description('Print the memory bank')
    .option('-f, --file <name>', 'Only this memory bank file')
    .option('-o, --output <file>', 'Write to a file')
    .action((options: { file?: string; output?: string }) =>
      run(async (services) => {
        const text = await showCommand(services, { file: options.file });
        if (options.output) {
          success(`Saved to ${await writeOutput(services, options.output, text)}`);
          return;
        }
        process.stdout.write(text);
      }),
    );

  memory
    .command('backup')
    .description('Copy the memory directory into memory/backups')
    .action(() =>
      run(async (services) => {
        const result = await backupCommand(services);
        success(`Backup ${result.id}: ${result.files.length} files`);
      }),
    );

  memory
    .command('restore')
    .description('Restore files from a backup')
    .option('-b, --backup <id>', 'Backup id or latest', 'latest')
    .action((options: { backup: string }) =>
      run(async (services) => {
        const result = await restoreCommand(services, { backup: options.backup });
        success(`Restored ${result.files.length} files from ${result.id}`);
      }),
    );

  memory
    .command('reset')
    .description('Reset every memory bank file to its header')
    .action(() =>
      run(async (services) => {
        await resetCommand(services);
        warn('Memory bank reset');
      }),
    );
}
