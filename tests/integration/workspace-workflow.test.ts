/**
 * Workspace Workflow Tests
 * Register, generate to disk, reload and validate through one registry
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { createWorkspaceRegistry } from '../../src/lib/registry/index.js';
import { createUserSchema } from '../../src/lib/schema/presets.js';
import { loadConfig } from '../../src/utils/config-loader.js';
import { DataWorkspace } from '../../src/lib/workspace/index.js';
import { Logger } from '../../src/utils/logger.js';
import { PredicateRegistry } from '../../src/lib/schema/predicates.js';
import { SchemaDefinition } from '../../src/lib/schema/schema-definition.js';
import { RECORD_FORMATS, type DataRecord } from '../../src/types/data-model.js';

describe('Workspace workflow', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'seedbed-workflow-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it('should persist schemas and generated files inside the workspace', async () => {
    const config = loadConfig({ overrides: { dataDir: root, seed: 'workflow' } });
    const registry = await createWorkspaceRegistry(config, { logger: new Logger({ level: 'error' }) });

    const registered = await registry.register(createUserSchema());
    expect(registered.status).toBe('success');
    expect(await readdir(path.join(root, 'schemas'))).toEqual(['user.json']);

    for (const format of RECORD_FORMATS) {
      const stored = await registry.generateAndStore('user', 20, format);
      if (stored.status !== 'success') throw stored.error;

      const loaded = await registry.loadRecords(stored.value);
      if (loaded.status !== 'success') throw loaded.error;

      const report = await registry.validate(loaded.value, 'user');
      if (report.status !== 'success') throw report.error;
      expect(report.value.total).toBe(20);
      expect(report.value.conformanceRate).toBe(1);
    }

    const stats = await new DataWorkspace(root).statistics();
    expect(stats.schemas).toBe(1);
    expect(stats.generated).toBeGreaterThanOrEqual(1);
  });

  it('should resolve schemas persisted by an earlier registry', async () => {
    const config = loadConfig({ overrides: { dataDir: root } });
    const logger = new Logger({ level: 'error' });

    const first = await createWorkspaceRegistry(config, { logger });
    await first.register(createUserSchema());

    const second = await createWorkspaceRegistry(config, { logger });
    expect(await second.names()).toEqual(['user']);

    const loaded = await second.load('user');
    if (loaded.status !== 'success') throw loaded.error;
    expect(loaded.value.fieldNames).toEqual(createUserSchema().fieldNames);
  });

  it('should repeat generated data for the same configured seed', async () => {
    const config = loadConfig({ overrides: { dataDir: root, seed: 42 } });
    const logger = new Logger({ level: 'error' });

    const runs: DataRecord[][] = [];
    for (let i = 0; i < 2; i++) {
      const registry = await createWorkspaceRegistry(config, { logger });
      await registry.register(createUserSchema());
      const generated = await registry.generate('user', 10);
      if (generated.status !== 'success') throw generated.error;
      runs.push(generated.value);
    }

    expect(runs[1]).toEqual(runs[0]);
  });
  it('should log at the configured level', async () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const quiet = await createWorkspaceRegistry(
      loadConfig({ overrides: { dataDir: root }, env: { SEEDBED_LOG_LEVEL: 'error' } }),
    );
    await quiet.register(createUserSchema());
    expect(write).not.toHaveBeenCalled();

    const chatty = await createWorkspaceRegistry(
      loadConfig({ overrides: { dataDir: root }, env: { SEEDBED_LOG_LEVEL: 'info' } }),
    );
    await chatty.register(createUserSchema());
    expect(write).toHaveBeenCalledWith('[Seedbed] INFO: Registered schema {"schema":"user","fields":11}\n');
  });

  it('should store in the configured default format', async () => {
    const config = loadConfig({ overrides: { dataDir: root }, env: { SEEDBED_FORMAT: 'csv' } });
    const registry = await createWorkspaceRegistry(config, { logger: new Logger({ level: 'error' }) });
    await registry.register(createUserSchema());

    const stored = await registry.generateAndStore('user', 2);
    if (stored.status !== 'success') throw stored.error;

    expect(path.dirname(stored.value)).toBe(path.join(root, 'generated'));
    expect(path.extname(stored.value)).toBe('.csv');
  });

  it('should share custom predicates between generation and validation', async () => {
    const predicates = new PredicateRegistry().register(
      'even',
      (value) => typeof value === 'number' && value % 2 === 0,
    );
    const registry = await createWorkspaceRegistry(loadConfig({ overrides: { dataDir: root } }), {
      logger: new Logger({ level: 'error' }),
      predicates,
    });
    await registry.register(
      new SchemaDefinition({
        name: 'counter',
        fields: [{ name: 'n', dataType: 'integer', maxValue: 50, validator: 'even' }],
      }),
    );

    const generated = await registry.generate('counter', 10);
    if (generated.status !== 'success') throw generated.error;

    const report = await registry.validate([...generated.value, { n: 3 }], 'counter');
    if (report.status !== 'success') throw report.error;
    expect(report.value.validCount).toBe(10);
    expect(report.value.errors).toEqual([
      { recordIndex: 10, record: { n: 3 }, errors: ["Field 'n' failed custom validation 'even'"] },
    ]);
  });
});
