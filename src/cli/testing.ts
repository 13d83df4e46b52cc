import { vi } from 'vitest';
import { Volume } from 'memfs';
import type { Config, StorageMode } from '../config/types.js';
import { ConfigServiceImpl } from '../config/index.js';
import { loadTemplateStore, type TemplateStore } from '../prompts/index.js';
import type { GitRunner } from '../repo/index.js';
import type { FetchFn } from '../llm/index.js';
import { buildServices, type Services } from './services.js';

export const PROJECT_DIR = '/project';

let templates: TemplateStore | undefined;

/** Шаблоны пакета читаются с реального диска один раз */
async function builtinTemplates(): Promise<TemplateStore> {
  templates ??= await loadTemplateStore();
  return templates;
}

export function testConfig(mode: StorageMode = 'hybrid'): Config {
  return {
    rootDir: PROJECT_DIR,
    configPath: `${PROJECT_DIR}/prompt-manager.config.yml`,
    memoryDir: `${PROJECT_DIR}/memory`,
    templatesDir: `${PROJECT_DIR}/prompt_templates`,
    mode,
    llm: {
      endpoint: 'http://llm.test/v1/chat/completions',
      model: 'test-model',
      apiKeyEnv: 'TEST_LLM_KEY',
      timeoutMs: 1000,
      maxTokens: 256,
      temperature: 0,
    },
  };
}

/**
 * Часы, которые сдвигаются на минуту при каждом вызове, начиная с 10:00.
 */
export function createClock(start = '2026-03-01T10:00:00.000Z'): () => Date {
  let tick = 0;
  return () => new Date(Date.parse(start) + tick++ * 60_000);
}

/** git вне репозитория */
export const noGit: GitRunner = () => {
  throw new Error('fatal: not a git repository');
};

export function fakeGit(outputs: Record<string, string>): GitRunner {
  return (args) => {
    const output = outputs[args.join(' ')];
    if (output === undefined) {
      throw new Error(`fatal: unexpected git ${args.join(' ')}`);
    }
    return output;
  };
}

export function llmReply(content: string): FetchFn {
  return vi.fn<FetchFn>(
    async () =>
      new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
      }),
  );
}

export interface TestServicesOptions {
  files?: Record<string, string>;
  mode?: StorageMode;
  gitRunner?: GitRunner;
  fetchFn?: FetchFn;
}

export interface TestContext {
  vol: InstanceType<typeof Volume>;
  services: Services;
  fetchFn: FetchFn;
}

/**
 * Сервисы поверх memfs с проектом в /project.
 */
export async function createTestServices(options: TestServicesOptions = {}): Promise<TestContext> {
  const vol = Volume.fromJSON(options.files ?? {});
  vol.mkdirSync(PROJECT_DIR, { recursive: true });
  const fs = vol.promises as unknown as typeof import('node:fs/promises');
  const fetchFn = options.fetchFn ?? vi.fn<FetchFn>();

  const services = buildServices(testConfig(options.mode), await builtinTemplates(), {
    configService: new ConfigServiceImpl(fs, PROJECT_DIR),
    cwd: PROJECT_DIR,
    fs,
    gitRunner: options.gitRunner ?? noGit,
    fetchFn,
    env: { TEST_LLM_KEY: 'test-secret' },
    now: createClock(),
  });

  return { vol, services, fetchFn };
}
