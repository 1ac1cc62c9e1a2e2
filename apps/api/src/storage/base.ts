/**
 * Base Repository
 *
 * JSON file persistence with:
 * - In-memory cache for reads
 * - Write-through persistence
 * - Zod validation on load and on every write
 * - Async API so a database can replace the file later
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

export interface RepositoryConfig<T> {
  /** Path to the JSON file for this collection */
  filePath: string;
  /** Schema every stored item must satisfy */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Field holding the primary key */
  idField: keyof T & string;
}

export class BaseRepository<T extends object> {
  protected items: Map<string, T> = new Map();
  protected loaded = false;
  protected readonly config: RepositoryConfig<T>;

  constructor(config: RepositoryConfig<T>) {
    this.config = config;
  }

  get filePath(): string {
    return this.config.filePath;
  }

  /**
   * Load the collection from disk once.
   */
  async init(): Promise<void> {
    if (this.loaded) return;

    if (existsSync(this.config.filePath)) {
      const content = await readFile(this.config.filePath, "utf-8");
      const data: unknown = JSON.parse(content);
      if (!Array.isArray(data)) {
        throw new Error(`${this.config.filePath} does not contain a JSON array`);
      }

      for (const item of data) {
        const parsed = this.config.schema.safeParse(item);
        if (!parsed.success) {
          throw new Error(
            `Schema validation failed loading ${this.config.filePath}: ${parsed.error.message}`
          );
        }
        this.items.set(this.idOf(parsed.data), parsed.data);
      }
    }

    this.loaded = true;
  }

  protected idOf(item: T): string {
    return String(item[this.config.idField]);
  }

  protected async persist(): Promise<void> {
    const content = JSON.stringify(Array.from(this.items.values()), null, 2);
    const dir = dirname(this.config.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    await writeFile(this.config.filePath, content, "utf-8");
  }

  async get(id: string): Promise<T | undefined> {
    await this.init();
    return this.items.get(id);
  }

  /**
   * List all items, optionally filtered
   */
  async list(filter?: (item: T) => boolean): Promise<T[]> {
    await this.init();
    const all = Array.from(this.items.values());
    return filter ? all.filter(filter) : all;
  }

  async count(filter?: (item: T) => boolean): Promise<number> {
    const items = await this.list(filter);
    return items.length;
  }

  /**
   * Validate and store an item, then write the collection through.
   */
  protected async _set(item: T): Promise<T> {
    await this.init();
    const validated = this.config.schema.parse(item);
    this.items.set(this.idOf(validated), validated);
    await this.persist();
    return validated;
  }

  protected async _delete(id: string): Promise<boolean> {
    await this.init();
    const existed = this.items.delete(id);
    if (existed) {
      await this.persist();
    }
    return existed;
  }
}

/**
 * Default data directory: <repo>/data. The path is the same from src/ and dist/.
 */
export function getDataDir(): string {
  return join(dirname(fileURLToPath(import.meta.url)), "..", "..", "..", "..", "data");
}

export function getCollectionPath(collection: string, dataDir: string = getDataDir()): string {
  return join(dataDir, `${collection}.json`);
}

export function nowISO(): string {
  return new Date().toISOString();
}
