/**
 * Schema document storage
 */

import { mkdir, readdir, readFile, writeFile } from "fs/promises";
import path from "path";
import { PersistenceError } from "../../utils/errors.js";
import type { SchemaDocument } from "../schema/serializer.js";

/**
 * Persistence seam for schema documents, keyed by schema name
 */
export interface SchemaStore {
  /**
   * @returns the raw document, or undefined when none exists under `name`
   */
  read(name: string): Promise<unknown>;
  write(document: SchemaDocument): Promise<void>;
  list(): Promise<string[]>;
}

/**
 * Keeps each schema as `<dir>/<name>.json`
 */
export class FileSchemaStore implements SchemaStore {
  constructor(private readonly dir: string) {}

  async read(name: string): Promise<unknown> {
    const filePath = this.pathFor(name);
    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return undefined;
      }
      throw new PersistenceError(
        `Failed to read schema file: ${filePath}`,
        { filePath },
        { cause: error },
      );
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new PersistenceError(
        `Schema file is not valid JSON: ${filePath}`,
        { filePath },
        { cause: error },
      );
    }
  }

  async write(document: SchemaDocument): Promise<void> {
    const filePath = this.pathFor(document.name);
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(filePath, JSON.stringify(document, null, 2) + "\n", "utf-8");
    } catch (error) {
      throw new PersistenceError(
        `Failed to write schema file: ${filePath}`,
        { filePath },
        { cause: error },
      );
    }
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw new PersistenceError(
        `Failed to list schema directory: ${this.dir}`,
        { dir: this.dir },
        { cause: error },
      );
    }
    return entries
      .filter((entry) => path.extname(entry) === ".json")
      .map((entry) => path.basename(entry, ".json"));
  }

  private pathFor(name: string): string {
    if (name === "" || name === "." || name.includes("..") || /[\\/]/.test(name)) {
      throw new PersistenceError(`Invalid schema name for file storage: ${name}`, {
        name,
      });
    }
    return path.join(this.dir, `${name}.json`);
  }
}

export class InMemorySchemaStore implements SchemaStore {
  private readonly documents = new Map<string, string>();

  read(name: string): Promise<unknown> {
    const stored = this.documents.get(name);
    return Promise.resolve(stored === undefined ? undefined : JSON.parse(stored));
  }

  write(document: SchemaDocument): Promise<void> {
    this.documents.set(document.name, JSON.stringify(document));
    return Promise.resolve();
  }

  list(): Promise<string[]> {
    return Promise.resolve([...this.documents.keys()]);
  }
}
