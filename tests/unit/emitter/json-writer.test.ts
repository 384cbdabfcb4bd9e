/**
 * JSON Array Writer Tests
 * Verifies JSON array format output
 */

import { describe, it, expect } from 'vitest';
import { Readable } from 'stream';
import { createJSONWriter } from '../../../src/lib/emitter/json-writer.js';

async function collect(objects: unknown[]): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of Readable.from(objects).pipe(createJSONWriter())) {
    chunks.push(String(chunk));
  }
  return chunks.join('');
}

describe('JSON Array Writer', () => {
  it('should convert record stream to JSON array format', async () => {
    const records = [
      { id: 1, name: 'Alice' },
      { id: 2, name: 'Bob' },
    ];

    const output = await collect(records);

    expect(output).toBe('[\n  {"id":1,"name":"Alice"},\n  {"id":2,"name":"Bob"}\n]\n');
    expect(JSON.parse(output)).toEqual(records);
  });

  it('should handle empty stream', async () => {
    const output = await collect([]);

    expect(output).toBe('[\n]\n');
    expect(JSON.parse(output)).toEqual([]);
  });

  it('should handle single record', async () => {
    const output = await collect([{ id: 1, name: 'Solo' }]);

    expect(output).toBe('[\n  {"id":1,"name":"Solo"}\n]\n');
  });

  it('should handle nested values', async () => {
    const records = [
      { id: 1, nested: { a: 1, b: [1, 2, 3] }, tags: ['foo', 'bar'] },
      { id: 2, nested: { c: 'test', d: { deep: true } }, tags: [] },
    ];

    expect(JSON.parse(await collect(records))).toEqual(records);
  });

  it('should reject values that are not JSON records', async () => {
    await expect(collect([{ ratio: Number.NaN }])).rejects.toThrow(
      'JSONWriter accepts JSON-representable records only',
    );
  });
});
