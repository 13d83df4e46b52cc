import { describe, it, expect } from 'vitest';
import { analyzeRepoCommand, learnSessionCommand } from './repo.js';
import { createTestServices, fakeGit } from '../testing.js';

const files = {
  '/project/src/app.ts': 'export function main() {}\n',
  '/project/src/util.ts': 'export const x = 1;\n',
  '/project/README.md': '# Demo\n',
};

describe('repo commands', () => {
  describe('analyze-repo', () => {
    it('вне git должен посчитать файлы обходом директории', async () => {
      const { services } = await createTestServices({ files });

      const result = await analyzeRepoCommand(services, {});

      expect(result.prompt).toContain('Give an overview of the repository at /project.\n');
      expect(result.prompt).toContain(
        'Branch: unknown\nLast commit: unknown\nFiles: 3\nMain languages: TypeScript, Markdown\n',
      );
    });

    it('в git репозитории должен взять ветку, коммит и файлы из git', async () => {
      const { services } = await createTestServices({
        files,
        gitRunner: fakeGit({
          'rev-parse --is-inside-work-tree': 'true\n',
          'rev-parse --abbrev-ref HEAD': 'main\n',
          'log -1 --format=%h %s': 'a1b2c3d Add main\n',
          'ls-files': 'src/app.ts\n',
        }),
      });

      const result = await analyzeRepoCommand(services, {});

      expect(result.prompt).toContain(
        'Branch: main\nLast commit: a1b2c3d Add main\nFiles: 1\nMain languages: TypeScript\n',
      );
    });

    it('должен отклонить несуществующий путь', async () => {
      const { services } = await createTestServices({ files });

      await expect(analyzeRepoCommand(services, { path: 'nope' })).rejects.toThrow("Path 'nope' does not exist");
    });

    it('должен передать предыдущий анализ того же пути', async () => {
      const { services } = await createTestServices({ files });

      await analyzeRepoCommand(services, { path: 'src' });
      const second = await analyzeRepoCommand(services, { path: 'src' });

      expect(second.prompt).toContain('Earlier analyses:\n- 2026-03-01T10:00:00.000Z: prompt prepared (analyze-repo)\n');
    });
  });

  describe('learn-session', () => {
    it('должен использовать длительность по умолчанию', async () => {
      const { services } = await createTestServices({ files });

      const result = await learnSessionCommand(services, {});

      expect(result.prompt).toContain('Plan a 30-minute session for getting to know the codebase at /project.\n');
    });

    it('должен принять длительность и путь', async () => {
      const { services } = await createTestServices({ files });

      const result = await learnSessionCommand(services, { path: 'src', duration: '45' });

      expect(result.prompt).toContain('Plan a 45-minute session for getting to know the codebase at /project/src.\n');
      expect(result.prompt).toContain('Files: 2\nLanguages: TypeScript\n');
    });

    it.each(['0', '-5', 'abc', '1.5'])('должен отклонить длительность %s', async (duration) => {
      const { services } = await createTestServices({ files });

      await expect(learnSessionCommand(services, { duration })).rejects.toThrow(
        `Invalid duration '${duration}': expected a positive integer`,
      );
    });
  });
});
