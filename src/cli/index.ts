#!/usr/bin/env node
import * as fs from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { initCommand, type InitCommandOptions } from './commands/init.js';
import { registerBaseCommands } from './commands/base.js';
import { registerDebugCommands } from './commands/debug.js';
import { registerLlmCommands } from './commands/llm.js';
import { registerMemoryCommands } from './commands/memory.js';
import { registerRepoCommands } from './commands/repo.js';
import { registerImproveCommands } from './commands/improve.js';
import { registerTemplateCommands } from './commands/templates.js';
import { createServices } from './services.js';
import type { CommandRunner } from './runner.js';
import { info, success, warn } from './output.js';
import { configService } from '../config/index.js';

const program = new Command();

function fail(error: unknown): never {
  console.error(error instanceof Error ? error.message : 'Unknown error');
  process.exit(1);
}

/**
 * Загружает сервисы для каждой команды отдельно: `--config` известен
 * только после разбора аргументов.
 */
const run: CommandRunner = async (action) => {
  try {
    const services = await createServices(program.opts<{ config?: string }>().config);
    for (const warning of services.templates.warnings) {
      warn(warning.message);
    }

    await action(services);

    if (services.config.mode === 'hybrid') {
      await services.bank.recordCommand(process.argv.slice(2).join(' '), services.now().toISOString());
    }
  } catch (error) {
    fail(error);
  }
};

function registerInitCommand(): void {
  program
    .command('init')
    .description('Create prompt-manager.config.yml and the memory directory')
    .option('-p, --path <dir>', 'Project directory', '.')
    .action(async (options: InitCommandOptions) => {
      try {
        const result = await initCommand(options, {
          configService,
          fs,
          cwd: process.cwd(),
          now: () => new Date(),
        });
        success(result.message);
        info(`Memory directory: ${result.memoryDir}`);
        for (const file of result.created) {
          info(`Created ${file}`);
        }
      } catch (error) {
        fail(error);
      }
    });
}

/**
 * Main CLI entry point.
 */
export async function main(): Promise<void> {
  program
    .name('prompt-manager')
    .description('Prompt templates, task tracking and project memory for LLM-assisted development')
    .version('0.1.0')
    .option('-C, --config <path>', 'Path to prompt-manager.config.yml');

  registerInitCommand();
  registerBaseCommands(program, run);
  registerDebugCommands(program, run);
  registerLlmCommands(program, run);
  registerRepoCommands(program, run);
  registerImproveCommands(program, run);
  registerMemoryCommands(program, run);
  registerTemplateCommands(program, run);

  await program.parseAsync(process.argv);
}

// npm ставит bin как симлинк, поэтому сравниваем реальные пути
function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && fileURLToPath(import.meta.url) === realpathSync(entry);
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
