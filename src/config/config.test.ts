import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, mkdirSync, readFileSync, realpathSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigServiceImpl } from './index.js';
import { ConfigLoadError, ConfigNotFoundError, ConfigValidationError } from './errors.js';
import { CONFIG_FILE_NAME } from './types.js';

describe('ConfigService', () => {
  let tempDir: string;
  let service: ConfigServiceImpl;

  beforeEach(() => {
    tempDir = realpathSync(mkdtempSync(join(tmpdir(), 'prompt-manager-test-')));
    service = new ConfigServiceImpl(undefined, tempDir);
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('load()', () => {
    it('должен загрузить конфиг и разрешить пути относительно файла', async () => {
      writeFileSync(
        join(tempDir, CONFIG_FILE_NAME),
        `
memoryDir: ./state
templatesDir: prompts
mode: json
llm:
  endpoint: https://llm.example.test/v1/chat/completions
  model: test-model
`,
      );

      const config = await service.load(join(tempDir, CONFIG_FILE_NAME));

      expect(config).toEqual({
        rootDir: tempDir,
        configPath: join(tempDir, CONFIG_FILE_NAME),
        memoryDir: join(tempDir, 'state'),
        templatesDir: join(tempDir, 'prompts'),
        mode: 'json',
        llm: {
          endpoint: 'https://llm.example.test/v1/chat/completions',
          model: 'test-model',
          apiKeyEnv: 'PROMPT_MANAGER_API_KEY',
          timeoutMs: 60000,
          maxTokens: 2048,
          temperature: 0.2,
        },
      });
    });

    it('должен найти конфиг в родительской директории', async () => {
      const nested = join(tempDir, 'a', 'b');
      mkdirSync(nested, { recursive: true });
      writeFileSync(join(tempDir, CONFIG_FILE_NAME), 'memoryDir: ./mem\n');

      const config = await new ConfigServiceImpl(undefined, nested).load();

      expect(config.configPath).toBe(join(tempDir, CONFIG_FILE_NAME));
      expect(config.memoryDir).toBe(join(tempDir, 'mem'));
    });

    it('должен выбросить ConfigNotFoundError для явного несуществующего пути', async () => {
      await expect(service.load(join(tempDir, 'nonexistent.yml'))).rejects.toThrow(
        ConfigNotFoundError,
      );
    });

    it('должен выбросить ConfigLoadError если YAML невалиден', async () => {
      writeFileSync(join(tempDir, CONFIG_FILE_NAME), 'memoryDir: [[[\n');

      await expect(service.load(join(tempDir, CONFIG_FILE_NAME))).rejects.toThrow(ConfigLoadError);
    });

    it('должен использовать дефолты для пустого файла', async () => {
      writeFileSync(join(tempDir, CONFIG_FILE_NAME), '');

      const config = await service.load(join(tempDir, CONFIG_FILE_NAME));

      expect(config.memoryDir).toBe(join(tempDir, 'memory'));
      expect(config.templatesDir).toBe(join(tempDir, 'prompt_templates'));
      expect(config.mode).toBe('hybrid');
    });

    it('должен выбросить ConfigLoadError если YAML не является mapping', async () => {
      writeFileSync(join(tempDir, CONFIG_FILE_NAME), '- one\n- two\n');

      await expect(service.load(join(tempDir, CONFIG_FILE_NAME))).rejects.toThrow(
        'Configuration file must contain a YAML mapping',
      );
    });

    it('должен выбросить ConfigValidationError для неизвестных полей', async () => {
      writeFileSync(join(tempDir, CONFIG_FILE_NAME), 'unknownField: value\n');

      await expect(service.load(join(tempDir, CONFIG_FILE_NAME))).rejects.toThrow(
        "Configuration validation failed: (root): Unrecognized key(s) in object: 'unknownField'",
      );
    });

    it('должен выбросить ConfigValidationError для неизвестного mode', async () => {
      writeFileSync(join(tempDir, CONFIG_FILE_NAME), 'mode: markdown\n');

      const error = await service.load(join(tempDir, CONFIG_FILE_NAME)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.issues[0]?.path).toEqual(['mode']);
      }
    });
  });

  describe('validate()', () => {
    it('должен пройти валидацию для пустого объекта', () => {
      expect(() => service.validate({})).not.toThrow();
    });

    it('должен выбросить ошибку если memoryDir пустой', () => {
      expect(() => service.validate({ memoryDir: '' })).toThrow(ConfigValidationError);
    });

    it('должен выбросить ошибку для невалидного имени переменной окружения', () => {
      expect(() => service.validate({ llm: { apiKeyEnv: 'NOT-A-NAME' } })).toThrow(
        ConfigValidationError,
      );
    });

    it('должен выбросить ошибку для temperature вне диапазона', () => {
      expect(() => service.validate({ llm: { temperature: 3 } })).toThrow(ConfigValidationError);
    });
  });

  describe('createDefault()', () => {
    it('должен создать конфиг, который затем загружается', async () => {
      const result = await service.createDefault('.');

      expect(result).toEqual({
        created: true,
        message: `Created ${CONFIG_FILE_NAME}`,
        configPath: join(tempDir, CONFIG_FILE_NAME),
      });
      expect(readFileSync(result.configPath, 'utf-8')).toContain('mode: hybrid');

      const config = await service.load(result.configPath);
      expect(config.memoryDir).toBe(join(tempDir, 'memory'));
    });

    it('не должен перезаписывать существующий конфиг', async () => {
      writeFileSync(join(tempDir, CONFIG_FILE_NAME), 'mode: json\n');

      const result = await service.createDefault(tempDir);

      expect(result.created).toBe(false);
      expect(readFileSync(join(tempDir, CONFIG_FILE_NAME), 'utf-8')).toBe('mode: json\n');
    });
  });
});
