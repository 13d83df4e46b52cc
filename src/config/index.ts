import * as defaultFs from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import {
  CONFIG_FILE_NAME,
  DEFAULT_API_KEY_ENV,
  STORAGE_MODES,
  type Config,
  type ConfigService,
  type InitResult,
} from './types.js';
import { ConfigLoadError, ConfigNotFoundError, ConfigValidationError } from './errors.js';
import { type FsModule, hasErrorCode, pathExists, toError } from '../utils/fs.js';

const ENV_NAME_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/;

const llmSchema = z
  .object({
    endpoint: z.string().url('llm.endpoint must be a URL').optional(),
    model: z.string().min(1, 'llm.model cannot be empty').default('gpt-4o-mini'),
    apiKeyEnv: z
      .string()
      .regex(ENV_NAME_REGEX, 'apiKeyEnv must be an environment variable name')
      .default(DEFAULT_API_KEY_ENV),
    timeoutMs: z.number().int().positive().default(60_000),
    maxTokens: z.number().int().positive().default(2048),
    temperature: z.number().min(0).max(2).default(0.2),
  })
  .strict();

const configSchema = z
  .object({
    memoryDir: z.string().min(1, 'memoryDir cannot be empty').default('./memory'),
    templatesDir: z.string().min(1, 'templatesDir cannot be empty').default('./prompt_templates'),
    mode: z.enum(STORAGE_MODES).default('hybrid'),
    llm: llmSchema.default({}),
  })
  .strict();

type ParsedConfig = z.infer<typeof configSchema>;

export class ConfigServiceImpl implements ConfigService {
  constructor(
    private readonly fs: FsModule = defaultFs,
    private readonly cwd: string = process.cwd(),
  ) {}

  async createDefault(rootDir: string): Promise<InitResult> {
    const configPath = resolve(this.cwd, rootDir, CONFIG_FILE_NAME);

    if (await pathExists(configPath, this.fs)) {
      return {
        created: false,
        message: `Configuration already exists (${CONFIG_FILE_NAME})`,
        configPath,
      };
    }

    const defaultConfig = {
      memoryDir: './memory',
      templatesDir: './prompt_templates',
      mode: 'hybrid',
      llm: {
        model: 'gpt-4o-mini',
        apiKeyEnv: DEFAULT_API_KEY_ENV,
      },
    };

    await this.fs.writeFile(configPath, stringify(defaultConfig), 'utf-8');

    return { created: true, message: `Created ${CONFIG_FILE_NAME}`, configPath };
  }

  /**
   * Find config file by traversing up the directory tree.
   * Returns the resolved path to the config file, or null if not found.
   */
  private async findConfigPath(startDir: string): Promise<string | null> {
    let currentDir = resolve(startDir);

    while (true) {
      const configPath = resolve(currentDir, CONFIG_FILE_NAME);

      try {
        await this.fs.access(configPath);
        return configPath;
      } catch (e) {
        // If it's not a "not found" error (e.g., permission denied), propagate it
        if (!hasErrorCode(e, 'ENOENT')) {
          throw new ConfigLoadError(`Cannot access config at ${configPath}`, toError(e));
        }
      }

      const parentDir = dirname(currentDir);

      // Stop if we've reached the root
      if (parentDir === currentDir) {
        return null;
      }

      currentDir = parentDir;
    }
  }

  async load(path?: string): Promise<Config> {
    let configPath: string | null;

    if (path) {
      configPath = resolve(this.cwd, path);
      // Explicit path: verify it exists
      if (!(await pathExists(configPath, this.fs))) {
        throw new ConfigNotFoundError(configPath);
      }
    } else {
      configPath = await this.findConfigPath(this.cwd);
    }

    if (configPath === null) {
      return this.resolvePaths(this.validateAndParse({}), resolve(this.cwd), null);
    }

    let content: string;
    try {
      content = await this.fs.readFile(configPath, 'utf-8');
    } catch (e) {
      throw new ConfigLoadError(`Cannot read configuration file ${configPath}`, toError(e));
    }

    let rawConfig: unknown;
    try {
      rawConfig = parse(content);
    } catch (e) {
      throw new ConfigLoadError('Invalid YAML in configuration file', toError(e));
    }

    // Пустой файл → дефолты
    if (rawConfig === null || rawConfig === undefined) {
      rawConfig = {};
    }

    if (typeof rawConfig !== 'object' || Array.isArray(rawConfig)) {
      throw new ConfigLoadError('Configuration file must contain a YAML mapping');
    }

    return this.resolvePaths(this.validateAndParse(rawConfig), dirname(configPath), configPath);
  }

  validate(raw: unknown): void {
    const result = configSchema.safeParse(raw);

    if (!result.success) {
      throw new ConfigValidationError(result.error.issues);
    }
  }

  private validateAndParse(raw: unknown): ParsedConfig {
    const result = configSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigValidationError(result.error.issues);
    }
    return result.data;
  }

  private resolvePaths(config: ParsedConfig, rootDir: string, configPath: string | null): Config {
    return {
      ...config,
      rootDir,
      configPath,
      memoryDir: resolve(rootDir, config.memoryDir),
      templatesDir: resolve(rootDir, config.templatesDir),
    };
  }
}

export const configService = new ConfigServiceImpl();
