// NDJSON (Newline Delimited JSON) helpers
// Used for one-record-per-line table files

import { CodecError } from './errors.js';

/**
 * A parsed NDJSON line with its 1-based position in the source
 */
export type NdjsonEntry = {
  line: number;
  value: unknown;
};

/**
 * Parse an NDJSON string into entries, one per non-empty line
 */
export function parseNdjson(content: string): NdjsonEntry[] {
  if (!content.trim()) {
    return [];
  }

  const lines = content.split('\n');
  const results: NdjsonEntry[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue; // Skip empty lines

    try {
      results.push({ line: i + 1, value: JSON.parse(line) });
    } catch (error) {
      throw new CodecError(
        `Failed to parse NDJSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
        i + 1
      );
    }
  }

  return results;
}

/**
 * Stringify an array of values to NDJSON format
 */
export function stringifyNdjson(items: readonly unknown[]): string {
  return items.map((item) => JSON.stringify(item)).join('\n') + (items.length > 0 ? '\n' : '');
}
