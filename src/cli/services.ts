import * as defaultFs from 'node:fs/promises';
import type { Config, ConfigService } from '../config/types.js';
import { configService } from '../config/index.js';
import { loadTemplateStore, type TemplateStore } from '../prompts/index.js';
import { createTaskStore, type TaskStore } from '../tasks/index.js';
import {
  createBackupService,
  createMemoryBank,
  createMemoryStore,
  createPromptHistory,
  type BackupService,
  type MemoryBank,
  type MemoryStore,
  type PromptHistory,
} from '../memory/index.js';
import { createGitService, defaultGitRunner, type GitRunner, type GitService } from '../repo/index.js';
import { createLlmClient, type Env, type FetchFn, type LlmClient } from '../llm/index.js';
import type { FsModule } from '../utils/fs.js';

export interface Services {
  config: Config;
  configService: ConfigService;
  /** Директория, относительно которой разрешаются пути аргументов */
  cwd: string;
  fs: FsModule;
  templates: TemplateStore;
  tasks: TaskStore;
  memory: MemoryStore;
  bank: MemoryBank;
  backups: BackupService;
  history: PromptHistory;
  git: GitService;
  gitRunner: GitRunner;
  llm: LlmClient;
  now: () => Date;
}

export interface ServiceOverrides {
  configService?: ConfigService;
  cwd?: string;
  fs?: FsModule;
  gitRunner?: GitRunner;
  fetchFn?: FetchFn;
  env?: Env;
  now?: () => Date;
}

/**
 * Собирает сервисы вокруг уже загруженного конфига и шаблонов.
 */
export function buildServices(
  config: Config,
  templates: TemplateStore,
  overrides: ServiceOverrides = {},
): Services {
  const fs = overrides.fs ?? defaultFs;
  const now = overrides.now ?? (() => new Date());
  const cwd = overrides.cwd ?? process.cwd();
  const gitRunner = overrides.gitRunner ?? defaultGitRunner;

  return {
    config,
    configService: overrides.configService ?? configService,
    cwd,
    fs,
    templates,
    tasks: createTaskStore(config.memoryDir, { fs, now }),
    memory: createMemoryStore(config.memoryDir, { fs, now }),
    bank: createMemoryBank(config.memoryDir, fs),
    backups: createBackupService(config.memoryDir, { fs, now }),
    history: createPromptHistory(config.memoryDir, fs),
    git: createGitService(cwd, gitRunner),
    gitRunner,
    llm: createLlmClient(config.llm, overrides.env ?? process.env, overrides.fetchFn ?? fetch),
    now,
  };
}

export async function createServices(configPath?: string): Promise<Services> {
  // 1. Конфиг нужен для memoryDir и templatesDir
  const config = await configService.load(configPath);

  // 2. Шаблоны пакета + шаблоны проекта
  const templates = await loadTemplateStore({ projectDir: config.templatesDir });

  return buildServices(config, templates);
}
