/**
 * Index persistence
 *
 * Invariants:
 * - A missing index file loads as an empty index
 * - Every write replaces the whole file atomically
 * - Writers are serialized through "<file>.lock"; readers take no lock
 */

import type { IndexFormat, IndexRecord, IndexStorage } from "../types.js";
import { atomicWrite, readTextFile } from "../io.js";
import { IndexWriteError } from "../errors.js";
import { FileLock, type LockOptions } from "./lock.js";
import { decodeIndexJsonl, decodeIndexText, encodeIndexJsonl, encodeIndexText } from "./codec.js";

export interface FileIndexStorageOptions {
  lock?: LockOptions;
  /** Refuse store() and append() (static indexes on the rules path) */
  readOnly?: boolean;
}

/**
 * File name of the index for a calibration type
 */
export function indexFileName(type: string, format: IndexFormat): string {
  return format === "jsonl" ? `index.${type}.jsonl` : `index.${type}`;
}

export function encodeIndex(records: readonly IndexRecord[], format: IndexFormat): string {
  return format === "jsonl" ? encodeIndexJsonl(records) : encodeIndexText(records);
}

export function decodeIndex(text: string, format: IndexFormat, filePath?: string): IndexRecord[] {
  return format === "jsonl" ? decodeIndexJsonl(text, filePath) : decodeIndexText(text, filePath);
}

export class FileIndexStorage implements IndexStorage {
  readonly filePath: string;
  readonly format: IndexFormat;
  #lockOptions: LockOptions;
  #readOnly: boolean;

  constructor(filePath: string, format: IndexFormat = "text", options: FileIndexStorageOptions = {}) {
    this.filePath = filePath;
    this.format = format;
    this.#lockOptions = options.lock ?? {};
    this.#readOnly = options.readOnly ?? false;
  }

  get readOnly(): boolean {
    return this.#readOnly;
  }

  async load(): Promise<IndexRecord[]> {
    const text = await readTextFile(this.filePath);
    if (text === null) {
      return [];
    }
    return decodeIndex(text, this.format, this.filePath);
  }

  async store(records: readonly IndexRecord[]): Promise<void> {
    this.#assertWritable();
    await new FileLock(this.filePath, this.#lockOptions).withLock(() =>
      atomicWrite(this.filePath, encodeIndex(records, this.format))
    );
  }

  /**
   * Re-read under the lock so concurrent appenders never drop each other's rows
   */
  async append(record: IndexRecord): Promise<void> {
    this.#assertWritable();
    await new FileLock(this.filePath, this.#lockOptions).withLock(async () => {
      const records = await this.load();
      records.push({ seq: records.length, name: record.name, header: record.header });
      await atomicWrite(this.filePath, encodeIndex(records, this.format));
    });
  }

  #assertWritable(): void {
    if (this.#readOnly) {
      throw new IndexWriteError(this.filePath, { cause: new Error("index is read-only") });
    }
  }
}

/**
 * In-process storage for tests and scratch indexes
 */
export class MemoryIndexStorage implements IndexStorage {
  #records: IndexRecord[];

  constructor(records: readonly IndexRecord[] = []) {
    this.#records = [...records];
  }

  async load(): Promise<IndexRecord[]> {
    return [...this.#records];
  }

  async store(records: readonly IndexRecord[]): Promise<void> {
    this.#records = [...records];
  }

  async append(record: IndexRecord): Promise<void> {
    this.#records.push({ seq: this.#records.length, name: record.name, header: record.header });
  }
}
