// Tests for the NDJSON serializer.

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import type { TableLayout } from '@tablekit/protocol';
import { NdjsonSerializer } from './ndjson.js';
import { MalformedDataError } from '../errors.js';

const EventSchema = z.object({
  id: z.string(),
  reward: z.number(),
});

const layout: TableLayout<typeof EventSchema, 'id'> = {
  name: 'Event',
  schema: EventSchema,
  key: 'id',
};

describe('NdjsonSerializer', () => {
  const serializer = new NdjsonSerializer();

  it('parses one record per line, skipping blank lines', () => {
    const table = serializer.parseTable('{"id":"a","reward":1}\n\n{"id":"b","reward":2}\n', layout, 'Events.ndjson');

    expect(Array.from(table.values())).toEqual([
      { id: 'a', reward: 1 },
      { id: 'b', reward: 2 },
    ]);
  });

  it('reports the line of invalid JSON', () => {
    expect(() => serializer.parseTable('{"id":"a","reward":1}\n{oops}\n', layout, 'Events.ndjson')).toThrow(
      MalformedDataError
    );

    try {
      serializer.parseTable('{"id":"a","reward":1}\n{oops}\n', layout, 'Events.ndjson');
    } catch (error) {
      expect(error).toMatchObject({ line: 2 });
    }
  });

  it('reports the source line of a duplicate key', () => {
    const text = '{"id":"a","reward":1}\n\n{"id":"a","reward":2}\n';

    expect(() => serializer.parseTable(text, layout, 'Events.ndjson')).toThrow(
      'Malformed data in Events.ndjson, line 3, record 1: duplicate key "a"'
    );
  });

  it('renders one line per record', () => {
    const text = serializer.renderTable(
      [
        { id: 'a', reward: 1 },
        { id: 'b', reward: 2 },
      ],
      layout
    );

    expect(text).toBe('{"id":"a","reward":1}\n{"id":"b","reward":2}\n');
  });
});
