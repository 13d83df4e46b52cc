import chalk from 'chalk';
import type { PromptResult } from './prompt.js';

const BANNER = '='.repeat(80);

export function success(msg: string): void {
  console.log(chalk.green('✔'), msg);
}

export function warn(msg: string): void {
  console.warn(chalk.yellow('⚠'), msg);
}

export function info(msg: string): void {
  console.log(chalk.cyan('ℹ'), msg);
}

export function header(title: string): void {
  console.log();
  console.log(chalk.bold(title));
  console.log(chalk.dim('─'.repeat(Math.max(40, title.length + 4))));
}

export function dim(msg: string): void {
  console.log(chalk.dim(msg));
}

/**
 * Печатает промпт в рамке, затем ответ LLM. С `quiet` печатает только результат.
 */
export function printPrompt(result: PromptResult, quiet = false): void {
  if (quiet) {
    console.log(result.response ?? result.prompt);
    return;
  }

  console.log(BANNER);
  console.log(`Using prompt template: ${result.template}`);
  console.log(BANNER);
  console.log(result.prompt);
  console.log(BANNER);

  if (result.response !== undefined) {
    header('Response');
    console.log(result.response);
  }
  if (result.outputPath) {
    success(`Saved to ${result.outputPath}`);
  }
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}
