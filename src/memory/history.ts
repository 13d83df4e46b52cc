import * as path from 'node:path';
import { z } from 'zod';
import type { PromptHistoryEntry } from './types.js';
import { createJsonFile, type JsonFile } from '../storage/storage.js';
import type { FsModule } from '../utils/fs.js';

export const PROMPTS_FILE_NAME = 'prompts.json';

interface PromptsFile {
  version: number;
  entries: PromptHistoryEntry[];
}

const promptsFileSchema: z.ZodType<PromptsFile, z.ZodTypeDef, unknown> = z.object({
  version: z.number().int(),
  entries: z.array(
    z.object({
      command: z.string(),
      template: z.string(),
      prompt: z.string(),
      response: z.string().optional(),
      target: z.string().optional(),
      timestamp: z.string(),
    }),
  ),
});

/**
 * Журнал отрендеренных промптов (и ответов LLM) в prompts.json.
 */
export interface PromptHistory {
  initialize(): Promise<boolean>;
  record(entry: PromptHistoryEntry): Promise<void>;
  /** Последние `limit` записей команды, новые первыми */
  previous(command: string, options?: { target?: string; limit?: number }): Promise<PromptHistoryEntry[]>;
  all(): Promise<PromptHistoryEntry[]>;
}

class PromptHistoryImpl implements PromptHistory {
  private readonly file: JsonFile<PromptsFile>;

  constructor(memoryDir: string, fs?: FsModule) {
    this.file = createJsonFile(
      path.join(memoryDir, PROMPTS_FILE_NAME),
      promptsFileSchema,
      () => ({ version: 1, entries: [] }),
      fs,
    );
  }

  async initialize(): Promise<boolean> {
    return this.file.initialize();
  }

  async record(entry: PromptHistoryEntry): Promise<void> {
    const data = await this.file.read();
    await this.file.write({ ...data, entries: [...data.entries, entry] });
  }

  async previous(
    command: string,
    options: { target?: string; limit?: number } = {},
  ): Promise<PromptHistoryEntry[]> {
    const { entries } = await this.file.read();
    return entries
      .filter(
        (e) => e.command === command && (options.target === undefined || e.target === options.target),
      )
      .reverse()
      .slice(0, options.limit ?? 3);
  }

  async all(): Promise<PromptHistoryEntry[]> {
    return (await this.file.read()).entries;
  }
}

export function createPromptHistory(memoryDir: string, fs?: FsModule): PromptHistory {
  return new PromptHistoryImpl(memoryDir, fs);
}
