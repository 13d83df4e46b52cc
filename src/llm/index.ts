export { LlmNotConfiguredError, LlmRequestError } from './errors.js';
export {
  createLlmClient,
  type ChatMessage,
  type CompleteOptions,
  type Env,
  type FetchFn,
  type LlmClient,
} from './client.js';
export { parseJsonBlock, parseStringList } from './parse.js';
