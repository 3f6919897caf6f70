// Tests for the JSON serializer.

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import type { TableLayout } from '@tablekit/protocol';
import { JsonSerializer } from './json.js';
import { DuplicateKeyError, MalformedDataError } from '../errors.js';

const ItemSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  attack: z.number().optional(),
});

const layout: TableLayout<typeof ItemSchema, 'id'> = {
  name: 'Item',
  schema: ItemSchema,
  key: 'id',
};

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('JsonSerializer', () => {
  const serializer = new JsonSerializer();

  describe('parseTable', () => {
    it('parses an array of objects in order', () => {
      const text = '[{"id":2,"name":"Iron Shield"},{"id":1,"name":"Wooden Sword","attack":3}]';

      const table = serializer.parseTable(text, layout, 'Items.json');

      expect(Array.from(table.keys())).toEqual([2, 1]);
      expect(table.get(1)).toEqual({ id: 1, name: 'Wooden Sword', attack: 3 });
    });

    it('drops fields the schema does not declare', () => {
      const table = serializer.parseTable('[{"id":1,"name":"Sword","weight":4}]', layout, 'Items.json');

      expect(table.get(1)).toEqual({ id: 1, name: 'Sword' });
    });

    it('returns an empty table for blank text', () => {
      expect(serializer.parseTable('  \n', layout, 'Items.json').size).toBe(0);
      expect(serializer.parseTable('[]', layout, 'Items.json').size).toBe(0);
    });

    it('rejects a document that is not an array', () => {
      expect(() => serializer.parseTable('{"id":1}', layout, 'Items.json')).toThrow(
        'Malformed data in Items.json: expected an array of Item records'
      );
    });

    it('reports the line of a syntax error', () => {
      const text = '[\n{"id": 1},\n{"id": 2,}\n]';

      const error = captureError(() => serializer.parseTable(text, layout, 'Items.json'));

      expect(error).toBeInstanceOf(MalformedDataError);
      expect(error).toMatchObject({ path: 'Items.json', line: 3 });
    });

    it('reports the record and field that fail validation', () => {
      const text = '[{"id":1,"name":"Sword"},{"id":"two","name":"Shield"}]';

      const error = captureError(() => serializer.parseTable(text, layout, 'Items.json'));

      expect(error).toBeInstanceOf(MalformedDataError);
      expect(error).toMatchObject({ record: 1, field: 'id' });
    });

    it('rejects duplicate keys', () => {
      const text = '[{"id":1,"name":"Sword"},{"id":1,"name":"Shield"}]';

      const error = captureError(() => serializer.parseTable(text, layout, 'Items.json'));

      expect(error).toBeInstanceOf(DuplicateKeyError);
      expect(error).toMatchObject({
        key: 1,
        message: 'Malformed data in Items.json, record 1: duplicate key 1',
      });
    });
  });

  describe('renderTable', () => {
    it('writes an indented array', () => {
      const text = serializer.renderTable([{ id: 1, name: 'Sword' }], layout);

      expect(text).toBe('[\n  {\n    "id": 1,\n    "name": "Sword"\n  }\n]\n');
    });

    it('parses its own output back to the same records', () => {
      const table = serializer.parseTable(
        '[{"id":1,"name":"Sword","attack":3},{"id":2,"name":"Shield"}]',
        layout,
        'Items.json'
      );

      const reparsed = serializer.parseTable(serializer.renderTable(table.values(), layout), layout, 'Items.json');

      expect(Array.from(reparsed.entries())).toEqual(Array.from(table.entries()));
    });
  });

  describe('single objects', () => {
    const ConfigSchema = z.object({ startingGold: z.number(), maxPartySize: z.number() });

    it('parses and validate one object', () => {
      const value = serializer.parseSingle('{"startingGold":50,"maxPartySize":4}', ConfigSchema, 'GameConfig.json');

      expect(value).toEqual({ startingGold: 50, maxPartySize: 4 });
    });

    it('reports the failing field', () => {
      expect(() => serializer.parseSingle('{"startingGold":50}', ConfigSchema, 'GameConfig.json')).toThrow(
        'Malformed data in GameConfig.json, field "maxPartySize": maxPartySize: Required'
      );
    });

    it('renders one object', () => {
      expect(serializer.renderSingle({ startingGold: 50 })).toBe('{\n  "startingGold": 50\n}\n');
    });
  });
});
