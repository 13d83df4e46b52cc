export { MemoryKeyNotFoundError, MemoryValidationError, MemoryBankError } from './errors.js';
export { createMemoryStore, jsonValueSchema, CONTEXT_FILE_NAME, type MemoryStore } from './store.js';
export {
  createMemoryBank,
  isMemoryBankFile,
  isUpdateMode,
  bankFileHeader,
  parseSections,
  renderSections,
  type MemoryBank,
} from './bank.js';
export { createBackupService, backupIdFromDate, compareBackupIds, BACKUPS_DIR_NAME, type BackupService } from './backup.js';
export { createPromptHistory, PROMPTS_FILE_NAME, type PromptHistory } from './history.js';
export * from './types.js';
