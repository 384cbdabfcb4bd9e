import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { FileSchemaStore, InMemorySchemaStore } from '../../../src/lib/registry/schema-store.js';
import type { SchemaDocument } from '../../../src/lib/schema/serializer.js';
import { PersistenceError } from '../../../src/utils/errors.js';

const document: SchemaDocument = {
  name: 'tag',
  version: '1.0',
  description: '',
  fields: [{ name: 'label', data_type: 'string' }],
};

describe('FileSchemaStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'seedbed-schemas-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should keep one JSON file per schema', async () => {
    const store = new FileSchemaStore(path.join(dir, 'schemas'));
    await store.write(document);

    const text = await readFile(path.join(dir, 'schemas', 'tag.json'), 'utf-8');
    expect(JSON.parse(text)).toEqual(document);
    expect(await store.read('tag')).toEqual(document);
    expect(await store.list()).toEqual(['tag']);
  });

  it('should return undefined for unknown names', async () => {
    const store = new FileSchemaStore(dir);

    expect(await store.read('nonexistent')).toBeUndefined();
  });

  it('should list nothing for a missing directory', async () => {
    expect(await new FileSchemaStore(path.join(dir, 'absent')).list()).toEqual([]);
  });

  it.each(['../escape', 'nested/name', 'back\\slash', '..'])(
    'should refuse the name %s',
    async (name) => {
      const store = new FileSchemaStore(path.join(dir, 'schemas'));

      await expect(store.read(name)).rejects.toThrow(
        `Invalid schema name for file storage: ${name}`,
      );
      await expect(store.write({ ...document, name })).rejects.toThrow(PersistenceError);
      expect(await readdir(dir)).toEqual([]);
    },
  );

  it('should reject unreadable documents', async () => {
    await writeFile(path.join(dir, 'broken.json'), '{ nope');
    const store = new FileSchemaStore(dir);

    await expect(store.read('broken')).rejects.toThrow(PersistenceError);
  });
});

describe('InMemorySchemaStore', () => {
  it('should store copies of documents', async () => {
    const store = new InMemorySchemaStore();
    await store.write(document);

    const read = await store.read('tag');
    expect(read).toEqual(document);
    expect(read).not.toBe(document);
    expect(await store.list()).toEqual(['tag']);
    expect(await store.read('other')).toBeUndefined();
  });
});
