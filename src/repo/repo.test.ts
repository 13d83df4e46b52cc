import { describe, it, expect, vi } from 'vitest';
import { Volume } from 'memfs';
import {
  createGitService,
  readSourceFile,
  summarizeFiles,
  walkFiles,
  SourceFileNotFoundError,
  type GitRunner,
} from './index.js';

function fakeGit(outputs: Record<string, string>): GitRunner {
  return vi.fn<GitRunner>((args) => {
    const key = args.join(' ');
    const output = outputs[key];
    if (output === undefined) {
      throw new Error(`fatal: not a git repository (${key})`);
    }
    return output;
  });
}

describe('GitService', () => {
  it('должен вернуть факты о репозитории', () => {
    const runner = fakeGit({
      'rev-parse --is-inside-work-tree': 'true\n',
      'rev-parse --abbrev-ref HEAD': 'main\n',
      'log -1 --format=%h %s': 'a1b2c3d Add parser\n',
      'log -2 --format=%h %s': 'a1b2c3d Add parser\n9f8e7d6 Initial commit\n',
      'diff --name-only HEAD': 'src/b.ts\nsrc/a.ts\n',
      'ls-files --others --exclude-standard': 'notes.md\nsrc/a.ts\n',
      'ls-files': 'src/a.ts\nsrc/b.ts\nREADME.md\n',
    });
    const git = createGitService('/project', runner);

    expect(git.isRepository()).toBe(true);
    expect(git.currentBranch()).toBe('main');
    expect(git.lastCommit()).toBe('a1b2c3d Add parser');
    expect(git.recentCommits(2)).toEqual(['a1b2c3d Add parser', '9f8e7d6 Initial commit']);
    expect(git.changedFiles()).toEqual(['notes.md', 'src/a.ts', 'src/b.ts']);
    expect(git.trackedFiles()).toEqual(['src/a.ts', 'src/b.ts', 'README.md']);
    expect(runner).toHaveBeenCalledWith(['rev-parse', '--abbrev-ref', 'HEAD'], '/project');
  });

  it('вне репозитория должен возвращать нейтральные значения', () => {
    const git = createGitService('/tmp', fakeGit({}));

    expect(git.isRepository()).toBe(false);
    expect(git.currentBranch()).toBe('unknown');
    expect(git.lastCommit()).toBe('unknown');
    expect(git.recentCommits(5)).toEqual([]);
    expect(git.changedFiles()).toEqual([]);
    expect(git.trackedFiles()).toEqual([]);
  });
});

describe('summarizeFiles()', () => {
  it('должен посчитать файлы и выбрать самые частые языки', () => {
    const summary = summarizeFiles([
      'src/a.ts',
      'src/b.tsx',
      'src/c.ts',
      'scripts/build.js',
      'README.md',
      'tool.py',
      'main.go',
      'LICENSE',
      'lib.rs',
    ]);

    expect(summary).toEqual({
      fileCount: 9,
      languages: ['TypeScript', 'Go', 'JavaScript', 'Markdown', 'Python'],
    });
  });
});

describe('readSourceFile()', () => {
  const vol = Volume.fromJSON({ '/project/src/app.ts': 'export const x = 1;\n' });
  const fs = vol.promises as unknown as typeof import('node:fs/promises');

  it('должен прочитать файл', async () => {
    expect(await readSourceFile('/project/src/app.ts', fs)).toBe('export const x = 1;\n');
  });

  it('должен выбросить SourceFileNotFoundError для отсутствующего файла', async () => {
    await expect(readSourceFile('/project/missing.ts', fs)).rejects.toThrow(
      new SourceFileNotFoundError('/project/missing.ts'),
    );
    await expect(readSourceFile('/project/missing.ts', fs)).rejects.toThrow(
      'File not found: /project/missing.ts',
    );
  });
});

describe('walkFiles()', () => {
  it('должен обойти директорию, пропуская node_modules и .git', async () => {
    const vol = Volume.fromJSON({
      '/project/package.json': '{}',
      '/project/src/index.ts': '',
      '/project/src/lib/util.ts': '',
      '/project/node_modules/pkg/index.js': '',
      '/project/.git/HEAD': '',
    });

    const files = await walkFiles('/project', vol.promises as unknown as typeof import('node:fs/promises'));

    expect(files).toEqual(['package.json', 'src/index.ts', 'src/lib/util.ts']);
  });
});
