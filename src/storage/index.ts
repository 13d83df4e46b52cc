export { StorageAccessError, StorageWriteError, StorageParseError } from './errors.js';
export {
  createJsonFile,
  JsonFileImpl,
  parseJson,
  readTextFile,
  serializeJson,
  writeFileAtomic,
  type JsonFile,
} from './storage.js';
