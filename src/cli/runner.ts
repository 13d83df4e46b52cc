import type { Command } from 'commander';
import type { Services } from './services.js';
import type { PromptOptions } from './prompt.js';

/**
 * Выполняет действие команды с загруженными сервисами. Ошибки печатает
 * в stderr и завершает процесс с кодом 1.
 */
export type CommandRunner = (action: (services: Services) => Promise<void>) => Promise<void>;

export interface PromptCliOptions {
  send?: boolean;
  output?: string;
  quiet?: boolean;
}

export function addPromptOptions(command: Command): Command {
  return command
    .option('--send', 'Send the rendered prompt to the configured LLM')
    .option('-o, --output <file>', 'Write the prompt (or the LLM response) to a file')
    .option('-q, --quiet', 'Print only the result, without the banner');
}

export function promptOptions(options: PromptCliOptions): PromptOptions {
  return { send: options.send, output: options.output, quiet: options.quiet };
}
