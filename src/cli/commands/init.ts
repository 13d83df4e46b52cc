import * as path from 'node:path';
import type { Services } from '../services.js';
import { assertDirectory } from '../context.js';
import { createTaskStore, TASKS_FILE_NAME } from '../../tasks/index.js';
import {
  createMemoryBank,
  createMemoryStore,
  createPromptHistory,
  CONTEXT_FILE_NAME,
  PROMPTS_FILE_NAME,
} from '../../memory/index.js';

export interface InitCommandOptions {
  path?: string;
}

export type InitDeps = Pick<Services, 'configService' | 'fs' | 'cwd' | 'now'>;

export interface InitCommandResult {
  message: string;
  configPath: string;
  memoryDir: string;
  /** Созданные файлы memory директории */
  created: string[];
}

/**
 * Main implementation of the init command.
 * Конфиг, пустые JSON хранилища и (hybrid) memory bank.
 */
export async function initCommand(
  options: InitCommandOptions,
  deps: InitDeps,
): Promise<InitCommandResult> {
  const display = options.path ?? '.';
  const rootDir = path.resolve(deps.cwd, display);
  await assertDirectory(deps.fs, rootDir, display);

  const result = await deps.configService.createDefault(rootDir);
  const config = await deps.configService.load(result.configPath);
  const { fs, now } = deps;

  const created: string[] = [];
  if (await createTaskStore(config.memoryDir, { fs, now }).initialize()) {
    created.push(TASKS_FILE_NAME);
  }
  if (await createMemoryStore(config.memoryDir, { fs, now }).initialize()) {
    created.push(CONTEXT_FILE_NAME);
  }
  if (await createPromptHistory(config.memoryDir, fs).initialize()) {
    created.push(PROMPTS_FILE_NAME);
  }
  if (config.mode === 'hybrid') {
    created.push(...(await createMemoryBank(config.memoryDir, fs).initialize()));
  }

  return { message: result.message, configPath: result.configPath, memoryDir: config.memoryDir, created };
}
