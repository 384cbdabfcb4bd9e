/**
 * Data workspace - directory layout for schemas, generated data and fixtures
 */

import { mkdir, readdir, rm, stat } from "fs/promises";
import path from "path";
import { PersistenceError } from "../../utils/errors.js";
import { logger as defaultLogger, type Logger } from "../../utils/logger.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface WorkspaceStatistics {
  schemas: number;
  generated: number;
  fixtures: number;
  temp: number;
}

export class DataWorkspace {
  readonly schemasDir: string;
  readonly generatedDir: string;
  readonly fixturesDir: string;
  readonly tempDir: string;

  constructor(
    readonly root: string,
    private readonly logger: Logger = defaultLogger,
  ) {
    this.schemasDir = path.join(root, "schemas");
    this.generatedDir = path.join(root, "generated");
    this.fixturesDir = path.join(root, "fixtures");
    this.tempDir = path.join(root, "temp");
  }

  /**
   * Create every workspace directory that does not exist yet
   */
  async ensure(): Promise<void> {
    try {
      for (const dir of this.directories()) {
        await mkdir(dir, { recursive: true });
      }
    } catch (error) {
      throw new PersistenceError(
        `Failed to prepare data workspace at ${this.root}`,
        { root: this.root },
        { cause: error },
      );
    }
    this.logger.debug("Data workspace ready", { root: this.root });
  }

  /**
   * Remove temp files last modified before `now - olderThanDays`
   * @returns paths of the removed files
   */
  async cleanupTemp(olderThanDays = 7, now: Date = new Date()): Promise<string[]> {
    const cutoff = now.getTime() - olderThanDays * DAY_MS;
    const removed: string[] = [];

    for (const filePath of await listFiles(this.tempDir)) {
      const info = await stat(filePath);
      if (info.mtimeMs < cutoff) {
        await rm(filePath, { force: true });
        removed.push(filePath);
      }
    }

    if (removed.length > 0) {
      this.logger.info("Removed stale temp files", { count: removed.length });
    }
    return removed;
  }

  async statistics(): Promise<WorkspaceStatistics> {
    const [schemas, generated, fixtures, temp] = await Promise.all(
      this.directories().map(async (dir) => (await listFiles(dir)).length),
    );
    return {
      schemas: schemas ?? 0,
      generated: generated ?? 0,
      fixtures: fixtures ?? 0,
      temp: temp ?? 0,
    };
  }

  private directories(): string[] {
    return [this.schemasDir, this.generatedDir, this.fixturesDir, this.tempDir];
  }
}

/**
 * Regular files directly inside `dir`; a missing directory has none
 */
async function listFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => path.join(dir, entry.name));
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
