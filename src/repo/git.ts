import { execFileSync } from 'node:child_process';

/**
 * Запускает git и возвращает stdout. Бросает при ненулевом коде выхода.
 */
export type GitRunner = (args: string[], cwd: string) => string;

export const defaultGitRunner: GitRunner = (args, cwd) =>
  execFileSync('git', args, {
    cwd,
    encoding: 'utf-8',
    stdio: ['pipe', 'pipe', 'pipe'],
    windowsHide: true,
  });

export const UNKNOWN = 'unknown';

/**
 * Факты о git репозитории. Вне репозитория методы возвращают
 * `unknown` или пустой список.
 */
export interface GitService {
  readonly cwd: string;
  isRepository(): boolean;
  currentBranch(): string;
  /** `<short sha> <subject>` */
  lastCommit(): string;
  recentCommits(count: number): string[];
  /** Изменения рабочей копии относительно HEAD и неотслеживаемые файлы */
  changedFiles(): string[];
  trackedFiles(): string[];
}

function splitLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '');
}

class GitServiceImpl implements GitService {
  constructor(
    readonly cwd: string,
    private readonly run: GitRunner,
  ) {}

  /** null, если git завершился с ошибкой (нет репозитория, нет коммитов, нет git) */
  private tryRun(args: string[]): string | null {
    try {
      return this.run(args, this.cwd).trim();
    } catch (e) {
      if (e instanceof Error) {
        return null;
      }
      throw e;
    }
  }

  isRepository(): boolean {
    return this.tryRun(['rev-parse', '--is-inside-work-tree']) === 'true';
  }

  currentBranch(): string {
    return this.tryRun(['rev-parse', '--abbrev-ref', 'HEAD']) || UNKNOWN;
  }

  lastCommit(): string {
    return this.tryRun(['log', '-1', '--format=%h %s']) || UNKNOWN;
  }

  recentCommits(count: number): string[] {
    const output = this.tryRun(['log', `-${count}`, '--format=%h %s']);
    return output ? splitLines(output) : [];
  }

  changedFiles(): string[] {
    const modified = this.tryRun(['diff', '--name-only', 'HEAD']);
    const untracked = this.tryRun(['ls-files', '--others', '--exclude-standard']);
    const files = new Set([...splitLines(modified ?? ''), ...splitLines(untracked ?? '')]);
    return [...files].sort();
  }

  trackedFiles(): string[] {
    const output = this.tryRun(['ls-files']);
    return output ? splitLines(output) : [];
  }
}

export function createGitService(cwd: string, runner: GitRunner = defaultGitRunner): GitService {
  return new GitServiceImpl(cwd, runner);
}
