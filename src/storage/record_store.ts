/**
 * Record Store: keyed put/get for round records and ledger commitments.
 *
 * `InMemoryRecordStore` is scoped to a process (tests, API default).
 * `JsonFileRecordStore` writes one pretty-printed JSON file per key.
 */

import { existsSync, mkdirSync } from "fs";
import { readFile, writeFile, rename, readdir } from "fs/promises";
import path from "path";
import { RecordNotFoundError } from "../shared/errors.js";

export interface RecordStore<T> {
  put(key: string, record: T): Promise<void>;
  get(key: string): Promise<T>;
  /** Like `get`, but `undefined` for unknown keys. */
  find(key: string): Promise<T | undefined>;
  has(key: string): Promise<boolean>;
  keys(): Promise<string[]>;
}

export class InMemoryRecordStore<T> implements RecordStore<T> {
  private data = new Map<string, T>();

  async put(key: string, record: T): Promise<void> {
    this.data.set(key, structuredClone(record));
  }

  async get(key: string): Promise<T> {
    const value = await this.find(key);
    if (value === undefined) throw new RecordNotFoundError(key);
    return value;
  }

  async find(key: string): Promise<T | undefined> {
    const value = this.data.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  async has(key: string): Promise<boolean> {
    return this.data.has(key);
  }

  async keys(): Promise<string[]> {
    return [...this.data.keys()];
  }

  get size(): number {
    return this.data.size;
  }
}

const SAFE_KEY_RE = /^[A-Za-z0-9._-]+$/;

/**
 * JSON file per key under `dir`. Keys are restricted to filename-safe
 * characters. Writes go to a temp file first and are renamed into place.
 */
export class JsonFileRecordStore<T> implements RecordStore<T> {
  readonly dir: string;
  private parse: (raw: unknown) => T;

  constructor(dir: string, parse: (raw: unknown) => T) {
    this.dir = path.resolve(dir);
    this.parse = parse;
    if (!existsSync(this.dir)) mkdirSync(this.dir, { recursive: true });
  }

  private fileFor(key: string): string {
    if (!SAFE_KEY_RE.test(key) || key.startsWith(".")) {
      throw new Error(`JsonFileRecordStore: unsafe key "${key}"`);
    }
    return path.join(this.dir, `${key}.json`);
  }

  async put(key: string, record: T): Promise<void> {
    const target = this.fileFor(key);
    const tmp = `${target}.tmp`;
    await writeFile(tmp, JSON.stringify(record, null, 2) + "\n", "utf-8");
    await rename(tmp, target);
  }

  async get(key: string): Promise<T> {
    const value = await this.find(key);
    if (value === undefined) throw new RecordNotFoundError(key);
    return value;
  }

  async find(key: string): Promise<T | undefined> {
    const file = this.fileFor(key);
    if (!existsSync(file)) return undefined;
    const raw: unknown = JSON.parse(await readFile(file, "utf-8"));
    return this.parse(raw);
  }

  async has(key: string): Promise<boolean> {
    return existsSync(this.fileFor(key));
  }

  async keys(): Promise<string[]> {
    const entries = await readdir(this.dir);
    return entries.filter((f) => f.endsWith(".json")).map((f) => f.slice(0, -".json".length));
  }
}
