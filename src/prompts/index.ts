export { TemplateNotFoundError, MissingContextError, TemplateLoadError } from './errors.js';
export {
  BUILTIN_TEMPLATES_DIR,
  builtinTemplateDirectories,
  loadTemplateDirectory,
  parseTemplateFile,
} from './loader.js';
export { renderTemplate, scanPlaceholders, stringifyContextValue } from './renderer.js';
export {
  createTemplateStore,
  loadTemplateStore,
  type LoadTemplateStoreOptions,
  type TemplateStore,
} from './store.js';
export {
  TEMPLATE_SOURCES,
  type PromptTemplate,
  type TemplateContext,
  type TemplateDirectory,
  type TemplateSource,
} from './types.js';
