import * as path from 'node:path';
import type { Services } from './services.js';
import type { TemplateContext } from '../prompts/index.js';
import type { PromptHistoryEntry } from '../memory/index.js';
import { writeFileAtomic } from '../storage/index.js';

export interface PromptRequest {
  /** Имя команды для истории промптов */
  command: string;
  template: string;
  context: TemplateContext;
  /** Файл или путь, к которому относится промпт */
  target?: string;
  system?: string;
}

export interface PromptOptions {
  send?: boolean;
  output?: string;
  quiet?: boolean;
}

export interface PromptResult {
  command: string;
  template: string;
  prompt: string;
  response?: string;
  outputPath?: string;
}

function withTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

/**
 * render → (send) → история промптов → (output).
 * `--output` получает ответ LLM, если он есть, иначе сам промпт.
 */
export async function runPrompt(
  services: Services,
  request: PromptRequest,
  options: PromptOptions = {},
): Promise<PromptResult> {
  const prompt = services.templates.render(request.template, request.context);
  const response = options.send
    ? await services.llm.complete(prompt, { system: request.system })
    : undefined;

  const entry: PromptHistoryEntry = {
    command: request.command,
    template: request.template,
    prompt,
    timestamp: services.now().toISOString(),
  };
  if (response !== undefined) {
    entry.response = response;
  }
  if (request.target !== undefined) {
    entry.target = request.target;
  }
  await services.history.record(entry);

  const result: PromptResult = { command: request.command, template: request.template, prompt };
  if (response !== undefined) {
    result.response = response;
  }

  if (options.output) {
    const outputPath = path.resolve(services.cwd, options.output);
    await writeFileAtomic(outputPath, withTrailingNewline(response ?? prompt), services.fs);
    result.outputPath = outputPath;
  }

  return result;
}
