/**
 * Значение memory entry: строка или любой JSON.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface MemoryEntry {
  key: string;
  value: JsonValue;
  updatedAt: string;
}

export const MEMORY_BANK_FILES = [
  'productContext.md',
  'activeContext.md',
  'systemPatterns.md',
  'techContext.md',
  'progress.md',
  'commandHistory.md',
] as const;

export type MemoryBankFile = (typeof MEMORY_BANK_FILES)[number];

/** Заголовок первого уровня каждого файла */
export const MEMORY_BANK_TITLES: Record<MemoryBankFile, string> = {
  'productContext.md': 'Product Context',
  'activeContext.md': 'Active Context',
  'systemPatterns.md': 'System Patterns',
  'techContext.md': 'Tech Context',
  'progress.md': 'Progress',
  'commandHistory.md': 'Command History',
};

export const UPDATE_MODES = ['append', 'replace'] as const;

export type UpdateMode = (typeof UPDATE_MODES)[number];

export interface BankSection {
  title: string;
  content: string;
}

export interface BackupResult {
  id: string;
  files: string[];
}

export interface PromptHistoryEntry {
  command: string;
  template: string;
  prompt: string;
  response?: string;
  /** Файл или путь, к которому относится промпт */
  target?: string;
  timestamp: string;
}
