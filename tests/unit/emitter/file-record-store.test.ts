import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import {
  FileRecordStore,
  detectFormat,
  readNdjsonRecords,
} from '../../../src/lib/emitter/file-record-store.js';
import { RECORD_FORMATS, type DataRecord } from '../../../src/types/data-model.js';
import { PersistenceError } from '../../../src/utils/errors.js';

describe('FileRecordStore', () => {
  let dir: string;
  const store = new FileRecordStore();
  const records: DataRecord[] = [
    { id: 1, name: 'Ann', active: true, tags: ['a'], score: 9.5 },
    { id: 2, name: 'Bo', active: false, tags: [], score: 0 },
  ];

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'seedbed-records-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it.each(RECORD_FORMATS)('should round-trip records as %s', async (format) => {
    const destination = path.join(dir, `records.${format}`);

    await expect(store.save(records, destination, format)).resolves.toBe(destination);
    expect(await store.load(destination, format)).toEqual(records);
  });

  it('should write pretty JSON arrays and NDJSON lines', async () => {
    await store.save(records.slice(0, 1), path.join(dir, 'one.json'), 'json');
    await store.save(records, path.join(dir, 'two.ndjson'), 'ndjson');

    expect(await readFile(path.join(dir, 'one.json'), 'utf-8')).toBe(
      '[\n  {"id":1,"name":"Ann","active":true,"tags":["a"],"score":9.5}\n]\n',
    );
    expect((await readFile(path.join(dir, 'two.ndjson'), 'utf-8')).split('\n')).toHaveLength(3);
  });

  it('should create parent directories', async () => {
    const destination = path.join(dir, 'a', 'b', 'records.json');
    await store.save(records, destination, 'json');

    expect(await store.load(destination, 'json')).toHaveLength(2);
  });

  it('should leave no temp file behind when a save fails', async () => {
    const destination = path.join(dir, 'taken.json');
    await mkdir(destination);

    await expect(store.save(records, destination, 'json')).rejects.toThrow(PersistenceError);
    expect(await readdir(dir)).toEqual(['taken.json']);
  });

  it('should wrap a single JSON object in a list', async () => {
    const source = path.join(dir, 'single.json');
    await writeFile(source, '{"id": 7}');

    expect(await store.load(source, 'json')).toEqual([{ id: 7 }]);
  });

  it('should reject non-record entries', async () => {
    const source = path.join(dir, 'numbers.json');
    await writeFile(source, '[1, 2]');

    await expect(store.load(source, 'json')).rejects.toThrow(
      `Expected a record object in ${source}`,
    );
  });

  it('should wrap missing files', async () => {
    const source = path.join(dir, 'missing.csv');

    await expect(store.load(source, 'csv')).rejects.toThrow(
      `Failed to load csv records from ${source}`,
    );
  });

  it('should load an empty YAML file as no records', async () => {
    const source = path.join(dir, 'empty.yaml');
    await writeFile(source, '');

    expect(await store.load(source, 'yaml')).toEqual([]);
  });
});

describe('detectFormat', () => {
  it.each([
    ['out.json', 'json'],
    ['out.ndjson', 'ndjson'],
    ['out.jsonl', 'ndjson'],
    ['OUT.CSV', 'csv'],
    ['out.yaml', 'yaml'],
    ['out.yml', 'yaml'],
  ])('should map %s to %s', (file, format) => {
    expect(detectFormat(file)).toBe(format);
  });

  it('should reject unknown extensions', () => {
    expect(() => detectFormat('out.xlsx')).toThrow('Unsupported record file format: out.xlsx');
  });
});

describe('readNdjsonRecords', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'seedbed-ndjson-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should yield one record per non-blank line', async () => {
    const source = path.join(dir, 'in.ndjson');
    await writeFile(source, '{"id":1}\n\n{"id":2}\n');

    const seen: DataRecord[] = [];
    for await (const record of readNdjsonRecords(source)) {
      seen.push(record);
    }

    expect(seen).toEqual([{ id: 1 }, { id: 2 }]);
  });

  it('should name the malformed line', async () => {
    const source = path.join(dir, 'bad.ndjson');
    await writeFile(source, '{"id":1}\n{oops\n');

    const consume = async () => {
      for await (const record of readNdjsonRecords(source)) {
        expect(record).toEqual({ id: 1 });
      }
    };

    await expect(consume()).rejects.toThrow(`Failed to parse NDJSON line 2 of ${source}`);
  });
});
