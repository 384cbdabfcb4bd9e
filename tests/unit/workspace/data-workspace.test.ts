import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, stat, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { DataWorkspace } from '../../../src/lib/workspace/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('DataWorkspace', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'seedbed-workspace-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should create the workspace layout', async () => {
    const workspace = new DataWorkspace(path.join(root, 'data'));
    await workspace.ensure();

    expect((await readdir(workspace.root)).sort()).toEqual([
      'fixtures',
      'generated',
      'schemas',
      'temp',
    ]);
    expect((await stat(workspace.schemasDir)).isDirectory()).toBe(true);
  });

  it('should count nothing before the workspace exists', async () => {
    const workspace = new DataWorkspace(path.join(root, 'absent'));

    expect(await workspace.statistics()).toEqual({
      schemas: 0,
      generated: 0,
      fixtures: 0,
      temp: 0,
    });
  });

  it('should count files per directory', async () => {
    const workspace = new DataWorkspace(root);
    await workspace.ensure();
    await writeFile(path.join(workspace.schemasDir, 'user.json'), '{}');
    await writeFile(path.join(workspace.generatedDir, 'user_1.json'), '[]');
    await writeFile(path.join(workspace.generatedDir, 'user_2.csv'), '');
    await writeFile(path.join(workspace.tempDir, 'scratch'), '');

    expect(await workspace.statistics()).toEqual({
      schemas: 1,
      generated: 2,
      fixtures: 0,
      temp: 1,
    });
  });

  it('should remove only temp files older than the cutoff', async () => {
    const workspace = new DataWorkspace(root);
    await workspace.ensure();
    const now = new Date('2026-01-15T12:00:00.000Z');

    const stale = path.join(workspace.tempDir, 'stale.tmp');
    const fresh = path.join(workspace.tempDir, 'fresh.tmp');
    await writeFile(stale, 'old');
    await writeFile(fresh, 'new');
    await utimes(stale, new Date(now.getTime() - 10 * DAY_MS), new Date(now.getTime() - 10 * DAY_MS));
    await utimes(fresh, new Date(now.getTime() - DAY_MS), new Date(now.getTime() - DAY_MS));

    expect(await workspace.cleanupTemp(7, now)).toEqual([stale]);
    expect(await readdir(workspace.tempDir)).toEqual(['fresh.tmp']);
  });

  it('should tolerate a missing temp directory', async () => {
    const workspace = new DataWorkspace(path.join(root, 'absent'));

    expect(await workspace.cleanupTemp()).toEqual([]);
  });
});
