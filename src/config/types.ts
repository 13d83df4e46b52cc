export const CONFIG_FILE_NAME = 'prompt-manager.config.yml';

/** Env var holding the LLM API key when `llm.apiKeyEnv` is not configured */
export const DEFAULT_API_KEY_ENV = 'PROMPT_MANAGER_API_KEY';

export const STORAGE_MODES = ['json', 'hybrid'] as const;

/**
 * `json` держит только tasks.json, context.json и prompts.json;
 * `hybrid` дополнительно ведёт markdown memory bank.
 */
export type StorageMode = (typeof STORAGE_MODES)[number];

export interface LlmConfig {
  /** OpenAI-compatible chat completions URL */
  endpoint?: string;
  model: string;
  apiKeyEnv: string;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
}

export interface Config {
  /** Директория конфига (или cwd, если конфиг не найден) */
  rootDir: string;
  configPath: string | null;
  memoryDir: string;
  templatesDir: string;
  mode: StorageMode;
  llm: LlmConfig;
}

export interface InitResult {
  created: boolean;
  message: string;
  configPath: string;
}

export interface ConfigService {
  load(path?: string): Promise<Config>;
  validate(raw: unknown): void;
  createDefault(rootDir: string): Promise<InitResult>;
}
