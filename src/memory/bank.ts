import * as defaultFs from 'node:fs/promises';
import * as path from 'node:path';
import {
  MEMORY_BANK_FILES,
  MEMORY_BANK_TITLES,
  UPDATE_MODES,
  type BankSection,
  type MemoryBankFile,
  type UpdateMode,
} from './types.js';
import { MemoryBankError } from './errors.js';
import { readTextFile, writeFileAtomic } from '../storage/storage.js';
import type { FsModule } from '../utils/fs.js';

export function isMemoryBankFile(name: string): name is MemoryBankFile {
  return MEMORY_BANK_FILES.some((f) => f === name);
}

export function isUpdateMode(mode: string): mode is UpdateMode {
  return UPDATE_MODES.some((m) => m === mode);
}

export function bankFileHeader(file: MemoryBankFile): string {
  return `# ${MEMORY_BANK_TITLES[file]}\n`;
}

export interface ParsedMarkdown {
  /** Всё до первого `## ` заголовка */
  preamble: string;
  sections: BankSection[];
}

export function parseSections(text: string): ParsedMarkdown {
  const preamble: string[] = [];
  const sections: Array<{ title: string; lines: string[] }> = [];

  for (const line of text.split('\n')) {
    if (line.startsWith('## ')) {
      sections.push({ title: line.slice(3).trim(), lines: [] });
      continue;
    }
    const current = sections[sections.length - 1];
    if (current) {
      current.lines.push(line);
    } else {
      preamble.push(line);
    }
  }

  return {
    preamble: preamble.join('\n').trim(),
    sections: sections.map((s) => ({ title: s.title, content: s.lines.join('\n').trim() })),
  };
}

export function renderSections({ preamble, sections }: ParsedMarkdown): string {
  const parts = preamble ? [preamble] : [];
  for (const section of sections) {
    parts.push(section.content ? `## ${section.title}\n${section.content}` : `## ${section.title}`);
  }
  return `${parts.join('\n\n')}\n`;
}

/**
 * Markdown memory bank: набор файлов с `## ` секциями.
 */
export interface MemoryBank {
  readonly dir: string;
  /** Создаёт недостающие файлы с заголовком; возвращает имена созданных */
  initialize(): Promise<MemoryBankFile[]>;
  read(file: MemoryBankFile): Promise<string>;
  sections(file: MemoryBankFile): Promise<BankSection[]>;
  /**
   * @throws {MemoryBankError} для неизвестного файла, режима или пустого заголовка
   */
  updateSection(file: string, section: string, content: string, mode?: string): Promise<void>;
  recordCommand(commandLine: string, timestamp: string): Promise<void>;
  /** Перезаписывает все файлы пустыми заголовками */
  reset(): Promise<void>;
}

class MemoryBankImpl implements MemoryBank {
  constructor(
    readonly dir: string,
    private readonly fs: FsModule = defaultFs,
  ) {}

  private filePath(file: MemoryBankFile): string {
    return path.join(this.dir, file);
  }

  async initialize(): Promise<MemoryBankFile[]> {
    const created: MemoryBankFile[] = [];
    for (const file of MEMORY_BANK_FILES) {
      const existing = await readTextFile(this.filePath(file), this.fs);
      if (existing === null) {
        await writeFileAtomic(this.filePath(file), bankFileHeader(file), this.fs);
        created.push(file);
      }
    }
    return created;
  }

  async read(file: MemoryBankFile): Promise<string> {
    return (await readTextFile(this.filePath(file), this.fs)) ?? bankFileHeader(file);
  }

  async sections(file: MemoryBankFile): Promise<BankSection[]> {
    return parseSections(await this.read(file)).sections;
  }

  async updateSection(
    file: string,
    section: string,
    content: string,
    mode: string = 'append',
  ): Promise<void> {
    if (!isMemoryBankFile(file)) {
      throw new MemoryBankError(
        `Unknown memory bank file '${file}'. Expected one of: ${MEMORY_BANK_FILES.join(', ')}`,
      );
    }
    if (!isUpdateMode(mode)) {
      throw new MemoryBankError(`Invalid update mode '${mode}'. Expected append or replace`);
    }
    const title = section.trim();
    if (title === '' || title.includes('\n')) {
      throw new MemoryBankError('Section title must be a single non-empty line');
    }

    const parsed = parseSections(await this.read(file));
    // `## ` внутри содержимого разорвал бы секцию при следующем чтении
    const text = content
      .trim()
      .split('\n')
      .map((line) => (line.startsWith('## ') ? `#${line}` : line))
      .join('\n');
    const existing = parsed.sections.find((s) => s.title === title);

    if (!existing) {
      parsed.sections.push({ title, content: text });
    } else if (mode === 'replace' || existing.content === '') {
      existing.content = text;
    } else if (text !== '') {
      existing.content = `${existing.content}\n${text}`;
    }

    if (parsed.preamble === '') {
      parsed.preamble = bankFileHeader(file).trim();
    }

    await writeFileAtomic(this.filePath(file), renderSections(parsed), this.fs);
  }

  async recordCommand(commandLine: string, timestamp: string): Promise<void> {
    await this.updateSection('commandHistory.md', timestamp, `Command: ${commandLine}`, 'append');
  }

  async reset(): Promise<void> {
    for (const file of MEMORY_BANK_FILES) {
      await writeFileAtomic(this.filePath(file), bankFileHeader(file), this.fs);
    }
  }
}

export function createMemoryBank(memoryDir: string, fs?: FsModule): MemoryBank {
  return new MemoryBankImpl(memoryDir, fs);
}
