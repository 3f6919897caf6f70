// Tests for TableRepository: lookups, atomic loads, edits and saves.

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { defineTable } from './define.js';
import { createInMemoryProvider } from '../providers/memory.js';
import { defaultSerializerFactory } from '../serializers/factory.js';
import {
  ConfigurationError,
  DuplicateKeyError,
  FileNotFoundError,
  MalformedDataError,
  OperationCancelledError,
  RecordNotFoundError,
  UnsupportedFormatError,
} from '../errors.js';

const CharacterSchema = z.object({
  id: z.string(),
  name: z.string(),
  level: z.number().int().min(1),
});

const Character = defineTable({
  name: 'Character',
  path: 'Characters.csv',
  schema: CharacterSchema,
  key: 'id',
});

const CHARACTERS_CSV = 'id,name,level\nhero,Aria,5\nmage,Corin,3\n';

async function loadedRepository(files: Record<string, string> = { 'Characters.csv': CHARACTERS_CSV }) {
  const provider = createInMemoryProvider(files);
  const repository = Character.createRepository();
  await repository.load(provider, defaultSerializerFactory);
  return { provider, repository };
}

describe('TableRepository', () => {
  describe('lookups', () => {
    it('exposes loaded records by key', async () => {
      const { repository } = await loadedRepository();

      expect(repository.isLoaded).toBe(true);
      expect(repository.count).toBe(2);
      expect(repository.get('hero')).toEqual({ id: 'hero', name: 'Aria', level: 5 });
      expect(repository.tryGet('ghost')).toBeUndefined();
      expect(repository.has('mage')).toBe(true);
      expect(repository.loadedItems.get('mage')?.name).toBe('Corin');
    });

    it('enumerates in source order', async () => {
      const { repository } = await loadedRepository();

      expect(Array.from(repository.keys())).toEqual(['hero', 'mage']);
      expect(Array.from(repository, (record) => record.name)).toEqual(['Aria', 'Corin']);
      expect(Array.from(repository.entries())[1]).toEqual(['mage', { id: 'mage', name: 'Corin', level: 3 }]);
    });

    it('finds records matching a predicate', async () => {
      const { repository } = await loadedRepository();

      expect(repository.find((record) => record.level > 4).map((record) => record.id)).toEqual(['hero']);
    });

    it('throws a not-found error for a missing key', async () => {
      const { repository } = await loadedRepository();

      expect(() => repository.get('ghost')).toThrow(RecordNotFoundError);
      expect(() => repository.get('ghost')).toThrow('Record not found in Character: ghost');
    });
  });

  describe('load', () => {
    it('starts empty and unloaded', () => {
      const repository = Character.createRepository();

      expect(repository.isLoaded).toBe(false);
      expect(repository.count).toBe(0);
    });

    it('keeps previous contents when a reload fails', async () => {
      const { provider, repository } = await loadedRepository();
      provider.files.set('Characters.csv', 'id,name,level\nrogue,Vex,0\n');

      await expect(repository.load(provider, defaultSerializerFactory)).rejects.toBeInstanceOf(MalformedDataError);

      expect(repository.isLoaded).toBe(true);
      expect(Array.from(repository.keys())).toEqual(['hero', 'mage']);
    });

    it('stays empty when the first load fails', async () => {
      const provider = createInMemoryProvider({ 'Characters.csv': 'id,name,level\nhero,Aria,5\nhero,Aria,6\n' });
      const repository = Character.createRepository();

      await expect(repository.load(provider, defaultSerializerFactory)).rejects.toBeInstanceOf(DuplicateKeyError);

      expect(repository.isLoaded).toBe(false);
      expect(repository.count).toBe(0);
    });

    it('passes on the provider error for a missing file', async () => {
      const repository = Character.createRepository();

      await expect(repository.load(createInMemoryProvider(), defaultSerializerFactory)).rejects.toBeInstanceOf(
        FileNotFoundError
      );
    });

    it('rejects an extension without a serializer', async () => {
      const Legacy = defineTable({ name: 'Character', path: 'Characters.xml', schema: CharacterSchema, key: 'id' });
      const provider = createInMemoryProvider({ 'Characters.xml': '<characters />' });

      await expect(Legacy.createRepository().load(provider, defaultSerializerFactory)).rejects.toBeInstanceOf(
        UnsupportedFormatError
      );
    });

    it('uses an explicit format over the extension', async () => {
      const Plain = defineTable({
        name: 'Character',
        path: 'Characters.txt',
        format: 'csv',
        schema: CharacterSchema,
        key: 'id',
      });
      const repository = Plain.createRepository();

      await repository.load(createInMemoryProvider({ 'Characters.txt': CHARACTERS_CSV }), defaultSerializerFactory);

      expect(repository.count).toBe(2);
    });

    it('does not read anything once cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const repository = Character.createRepository();

      await expect(
        repository.load(createInMemoryProvider({ 'Characters.csv': CHARACTERS_CSV }), defaultSerializerFactory, {
          signal: controller.signal,
        })
      ).rejects.toThrow(OperationCancelledError);
      expect(repository.isLoaded).toBe(false);
    });

    it('loads from text in hand', () => {
      const repository = Character.createRepository();

      repository.loadFromText('[{"id":"hero","name":"Aria","level":5}]', defaultSerializerFactory, 'Characters.json');

      expect(repository.get('hero').level).toBe(5);
    });
  });

  describe('edits', () => {
    it('adds a record at the end', async () => {
      const { repository } = await loadedRepository();

      repository.add({ id: 'rogue', name: 'Vex', level: 4 });

      expect(Array.from(repository.keys())).toEqual(['hero', 'mage', 'rogue']);
    });

    it('refuses to add a duplicate key', async () => {
      const { repository } = await loadedRepository();

      expect(() => repository.add({ id: 'hero', name: 'Other', level: 1 })).toThrow(DuplicateKeyError);
    });

    it('validates added records', async () => {
      const { repository } = await loadedRepository();

      expect(() => repository.add({ id: 'rogue', name: 'Vex', level: 0 })).toThrow(MalformedDataError);
      expect(repository.has('rogue')).toBe(false);
    });

    it('updates a record in place', async () => {
      const { repository } = await loadedRepository();

      repository.update({ id: 'hero', name: 'Aria', level: 6 });

      expect(Array.from(repository.keys())).toEqual(['hero', 'mage']);
      expect(repository.get('hero').level).toBe(6);
    });

    it('refuses to update a missing record', async () => {
      const { repository } = await loadedRepository();

      expect(() => repository.update({ id: 'ghost', name: 'Boo', level: 1 })).toThrow(RecordNotFoundError);
    });

    it('removes a record', async () => {
      const { repository } = await loadedRepository();

      expect(repository.remove('hero')).toBe(true);
      expect(repository.remove('hero')).toBe(false);
      expect(repository.count).toBe(1);
    });
  });

  describe('save', () => {
    it('writes current records in order', async () => {
      const { provider, repository } = await loadedRepository();
      repository.add({ id: 'rogue', name: 'Vex', level: 4 });

      await repository.save(provider, defaultSerializerFactory);

      expect(provider.files.get('Characters.csv')).toBe('id,name,level\nhero,Aria,5\nmage,Corin,3\nrogue,Vex,4\n');
    });

    it('keeps annotation columns through a load and save', async () => {
      const { provider, repository } = await loadedRepository({
        'Characters.csv': 'id,~note,name,level\nhero,lead role,Aria,5\nmage,,Corin,3\n',
      });
      repository.update({ id: 'mage', name: 'Corin', level: 4 });
      repository.add({ id: 'rogue', name: 'Vex', level: 2 });

      await repository.save(provider, defaultSerializerFactory);

      expect(repository.annotations.columns).toEqual([{ name: '~note', index: 1 }]);
      expect(provider.files.get('Characters.csv')).toBe(
        'id,~note,name,level\nhero,lead role,Aria,5\nmage,,Corin,4\nrogue,,Vex,2\n'
      );
    });

    it('loads back what it saved', async () => {
      const { provider, repository } = await loadedRepository();
      await repository.save(provider, defaultSerializerFactory);

      const reloaded = Character.createRepository();
      await reloaded.load(provider, defaultSerializerFactory);

      expect(Array.from(reloaded.entries())).toEqual(Array.from(repository.entries()));
    });
  });
});

describe('defineTable', () => {
  it('refuses an empty name or path', () => {
    expect(() => defineTable({ name: ' ', path: 'Characters.csv', schema: CharacterSchema, key: 'id' })).toThrow(
      'Invalid table declaration: name: must not be empty'
    );
    expect(() => defineTable({ name: 'Character', path: '', schema: CharacterSchema, key: 'id' })).toThrow(
      ConfigurationError
    );
  });

  it('gives each repository its own records', async () => {
    const { repository } = await loadedRepository();
    const other = Character.createRepository();

    expect(other).not.toBe(repository);
    expect(other.count).toBe(0);
  });
});
