import { describe, it, expect } from 'vitest';
import {
  storeCommand,
  retrieveCommand,
  listAllCommand,
  forgetCommand,
  updateContextCommand,
  showCommand,
  backupCommand,
  restoreCommand,
  resetCommand,
  parseMemoryValue,
} from './memory.js';
import { createTestServices } from '../testing.js';
import { CliValidationError } from '../errors.js';
import { MemoryBankError } from '../../memory/index.js';

describe('memory commands', () => {
  it('store/retrieve должны сохранить строку как есть', async () => {
    const { services } = await createTestServices();

    await storeCommand(services, { key: 'owner', value: '{"not": "parsed"}' });

    expect((await retrieveCommand(services, { key: 'owner' })).value).toBe('{"not": "parsed"}');
  });

  it('store --json должен сохранить JSON значение', async () => {
    const { services } = await createTestServices();

    await storeCommand(services, { key: 'limits', value: '{"retries": 3}', json: true });

    expect((await retrieveCommand(services, { key: 'limits' })).value).toEqual({ retries: 3 });
  });

  it('store --json должен отклонить невалидный JSON', () => {
    expect(() => parseMemoryValue('{oops', true)).toThrow(CliValidationError);
  });

  it('list-all должен вернуть записи по ключу', async () => {
    const { services } = await createTestServices();
    await storeCommand(services, { key: 'b', value: '2' });
    await storeCommand(services, { key: 'a', value: '1' });

    expect((await listAllCommand(services)).map((e) => [e.key, e.value])).toEqual([
      ['a', '1'],
      ['b', '2'],
    ]);
  });

  it('forget должен удалить ключ и выбросить ошибку для отсутствующего', async () => {
    const { services } = await createTestServices();
    await storeCommand(services, { key: 'a', value: '1' });

    await forgetCommand(services, { key: 'a' });

    await expect(forgetCommand(services, { key: 'a' })).rejects.toThrow('No memory entry for key: a');
  });

  describe('memory bank', () => {
    it('update-context и show --file должны работать с секциями', async () => {
      const { services } = await createTestServices();

      await updateContextCommand(services, {
        file: 'productContext.md',
        section: 'Overview',
        content: 'A CLI',
        mode: 'replace',
      });

      expect(await showCommand(services, { file: 'productContext.md' })).toBe(
        '# Product Context\n\n## Overview\nA CLI\n',
      );
    });

    it('show без --file должен вывести все файлы', async () => {
      const { services } = await createTestServices();

      expect(await showCommand(services)).toBe(
        '# Product Context\n\n# Active Context\n\n# System Patterns\n\n# Tech Context\n\n# Progress\n\n# Command History\n',
      );
    });

    it('show должен отклонить неизвестный файл', async () => {
      const { services } = await createTestServices();

      await expect(showCommand(services, { file: 'notes.md' })).rejects.toThrow(
        "Invalid memory bank file 'notes.md'. Expected one of: productContext.md, activeContext.md, systemPatterns.md, techContext.md, progress.md, commandHistory.md",
      );
    });

    it('в режиме json команды memory bank должны быть ошибкой', async () => {
      const { services } = await createTestServices({ mode: 'json' });

      await expect(
        updateContextCommand(services, { file: 'progress.md', section: 'A', content: 'b' }),
      ).rejects.toThrow(MemoryBankError);
      await expect(resetCommand(services)).rejects.toThrow(MemoryBankError);
    });

    it('reset должен оставить только заголовки', async () => {
      const { vol, services } = await createTestServices();
      await updateContextCommand(services, { file: 'progress.md', section: 'Done', content: 'parser' });

      await resetCommand(services);

      expect(vol.readFileSync('/project/memory/progress.md', 'utf8')).toBe('# Progress\n');
    });
  });

  it('backup и restore latest должны вернуть прежние значения', async () => {
    const { services } = await createTestServices();
    await storeCommand(services, { key: 'a', value: '1' });

    const backup = await backupCommand(services);
    await storeCommand(services, { key: 'a', value: '2' });
    const restored = await restoreCommand(services);

    expect(backup).toEqual({ id: '20260301-100100', files: ['context.json'] });
    expect(restored.id).toBe('20260301-100100');
    expect((await retrieveCommand(services, { key: 'a' })).value).toBe('1');
  });
});
