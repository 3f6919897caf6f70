// Tests for FolderTableRepository: one record per file inside a folder.

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { defineFolderTable } from './define.js';
import { createInMemoryProvider } from '../providers/memory.js';
import { defaultSerializerFactory } from '../serializers/factory.js';
import { ConfigurationError, DuplicateKeyError, UnsupportedFormatError } from '../errors.js';

const QuestSchema = z.object({
  id: z.string(),
  title: z.string(),
});

const Quest = defineFolderTable({
  name: 'Quest',
  folder: 'Quests',
  schema: QuestSchema,
  key: 'id',
});

const QUEST_FILES = {
  'Quests/a.json': '{"id":"intro","title":"Wake Up"}',
  'Quests/b.json': '{"id":"finale","title":"The Tower"}',
  'Quests/notes.txt': 'not a quest',
  'Quests/old/c.json': '{"id":"cut","title":"Cut Content"}',
};

async function loadedRepository(files: Record<string, string> = QUEST_FILES) {
  const provider = createInMemoryProvider(files);
  const repository = Quest.createRepository();
  await repository.load(provider, defaultSerializerFactory);
  return { provider, repository };
}

describe('FolderTableRepository', () => {
  describe('load', () => {
    it('reads one record from each matching file in path order', async () => {
      const { repository } = await loadedRepository();

      expect(Array.from(repository.keys())).toEqual(['intro', 'finale']);
      expect(repository.get('finale')).toEqual({ id: 'finale', title: 'The Tower' });
      expect(repository.fileOf('intro')).toBe('Quests/a.json');
    });

    it('loads a missing or empty folder as an empty table', async () => {
      const { repository } = await loadedRepository({ 'Items.json': '[]' });

      expect(repository.isLoaded).toBe(true);
      expect(repository.count).toBe(0);
    });

    it('reads YAML files matched by the pattern', async () => {
      const YamlQuest = defineFolderTable({
        name: 'Quest',
        folder: 'Quests',
        pattern: '*.yaml',
        schema: QuestSchema,
        key: 'id',
      });
      const provider = createInMemoryProvider({
        'Quests/intro.yaml': 'id: intro\ntitle: Wake Up\n',
        'Quests/side.yml': 'id: side\ntitle: Lost Cat\n',
      });
      const repository = YamlQuest.createRepository();

      await repository.load(provider, defaultSerializerFactory);

      expect(Array.from(repository.keys())).toEqual(['intro']);
      expect(repository.get('intro').title).toBe('Wake Up');
    });

    it('rejects a key found in two files', async () => {
      const { repository } = await loadedRepository();
      const provider = createInMemoryProvider({
        'Quests/a.json': '{"id":"intro","title":"Wake Up"}',
        'Quests/b.json': '{"id":"intro","title":"Wake Up Again"}',
      });

      const attempt = repository.load(provider, defaultSerializerFactory);

      await expect(attempt).rejects.toThrow(DuplicateKeyError);
      await expect(attempt).rejects.toThrow('Malformed data in Quests/b.json, field "id": duplicate key "intro"');
      expect(Array.from(repository.keys())).toEqual(['intro', 'finale']);
    });

    it('rejects a format that cannot hold a single record', async () => {
      const CsvQuest = defineFolderTable({
        name: 'Quest',
        folder: 'Quests',
        pattern: '*.csv',
        schema: QuestSchema,
        key: 'id',
      });
      const provider = createInMemoryProvider({ 'Quests/intro.csv': 'id,title\nintro,Wake Up\n' });

      const attempt = CsvQuest.createRepository().load(provider, defaultSerializerFactory);

      await expect(attempt).rejects.toThrow(UnsupportedFormatError);
      await expect(attempt).rejects.toThrow('Unsupported format "csv": cannot hold a single Quest record');
    });
  });

  describe('save', () => {
    it('writes changed and new records and deletes removed ones', async () => {
      const { provider, repository } = await loadedRepository();

      repository.update({ id: 'finale', title: 'The Spire' });
      repository.remove('intro');
      repository.add({ id: 'side', title: 'Lost Cat' });
      await repository.save(provider, defaultSerializerFactory);

      expect(provider.files.has('Quests/a.json')).toBe(false);
      expect(provider.files.get('Quests/b.json')).toBe('{\n  "id": "finale",\n  "title": "The Spire"\n}\n');
      expect(provider.files.get('Quests/side.json')).toBe('{\n  "id": "side",\n  "title": "Lost Cat"\n}\n');
      expect(provider.files.get('Quests/notes.txt')).toBe('not a quest');
    });

    it('moves a record removed and added again to a file named after its key', async () => {
      const { provider, repository } = await loadedRepository();

      repository.remove('intro');
      repository.add({ id: 'intro', title: 'Wake Up Slowly' });
      await repository.save(provider, defaultSerializerFactory);

      expect(provider.files.has('Quests/a.json')).toBe(false);
      expect(provider.files.get('Quests/intro.json')).toBe('{\n  "id": "intro",\n  "title": "Wake Up Slowly"\n}\n');
    });

    it('loads back what it saved', async () => {
      const { provider, repository } = await loadedRepository();
      repository.add({ id: 'side', title: 'Lost Cat' });
      await repository.save(provider, defaultSerializerFactory);

      const reloaded = Quest.createRepository();
      await reloaded.load(provider, defaultSerializerFactory);

      expect(Array.from(reloaded.keys())).toEqual(['intro', 'finale', 'side']);
    });
  });

  it('declares its folder and default pattern', () => {
    expect(Quest).toMatchObject({ name: 'Quest', path: 'Quests', pattern: '*.json', key: 'id' });
  });

  it('refuses an empty name or folder', () => {
    expect(() => defineFolderTable({ name: 'Quest', folder: ' ', schema: QuestSchema, key: 'id' })).toThrow(
      'Invalid folder table declaration: folder: must not be empty'
    );
    expect(() => defineFolderTable({ name: '', folder: 'Quests', schema: QuestSchema, key: 'id' })).toThrow(
      ConfigurationError
    );
  });
});
