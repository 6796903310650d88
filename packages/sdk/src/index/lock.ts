/**
 * File-based lock serializing index writers across processes
 * Uses exclusive file open to ensure only one writer at a time
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { LockTimeoutError } from "../errors.js";
import { errnoCode } from "../io.js";
import { logger } from "../observability/logs.js";

export interface LockOptions {
  /** Maximum time to wait for the lock (default: 30000ms) */
  timeoutMs?: number;
  /** Time between retry attempts (default: 50ms) */
  retryIntervalMs?: number;
}

/**
 * Simple file-based lock using exclusive open
 */
export class FileLock {
  #lockPath: string;
  #fd?: fs.FileHandle;
  #acquired = false;
  #timeoutMs: number;
  #retryIntervalMs: number;

  /**
   * @param target - File being protected; the lock lives beside it as "<target>.lock"
   */
  constructor(target: string, options: LockOptions = {}) {
    this.#lockPath = `${target}.lock`;
    this.#timeoutMs = options.timeoutMs ?? 30000;
    this.#retryIntervalMs = options.retryIntervalMs ?? 50;
  }

  get lockPath(): string {
    return this.#lockPath;
  }

  /**
   * Acquire the lock (blocking with retries)
   * @throws {LockTimeoutError} If the lock is still held after the timeout
   */
  async acquire(): Promise<void> {
    if (this.#acquired) {
      throw new Error("Lock already acquired");
    }

    const startTime = Date.now();

    await fs.mkdir(path.dirname(this.#lockPath), { recursive: true });

    for (;;) {
      try {
        // Fails if the file already exists
        this.#fd = await fs.open(this.#lockPath, "wx");
        this.#acquired = true;

        // PID and timestamp for debugging stale locks
        const lockInfo = {
          pid: process.pid,
          acquiredAt: new Date().toISOString(),
        };
        await this.#fd.writeFile(JSON.stringify(lockInfo, null, 2));
        await this.#fd.sync();

        return;
      } catch (err) {
        if (errnoCode(err) !== "EEXIST") {
          throw err;
        }

        if (Date.now() - startTime > this.#timeoutMs) {
          throw new LockTimeoutError(this.#lockPath, this.#timeoutMs);
        }

        await new Promise((resolve) => setTimeout(resolve, this.#retryIntervalMs));
      }
    }
  }

  /**
   * Release the lock
   */
  async release(): Promise<void> {
    if (!this.#acquired) {
      return;
    }

    try {
      if (this.#fd) {
        await this.#fd.close();
        this.#fd = undefined;
      }

      await fs.unlink(this.#lockPath);
    } catch (err) {
      // Already cleaned up is fine
      if (errnoCode(err) !== "ENOENT") {
        logger.error("lock.release.failed", { message: `${this.#lockPath}: ${String(err)}` });
      }
    } finally {
      this.#acquired = false;
    }
  }

  /**
   * Execute a function with the lock held
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  /**
   * Force remove a stale lock file
   * DANGEROUS - only use if you're sure the process that created it is dead
   */
  static async forceRemove(target: string): Promise<void> {
    try {
      await fs.unlink(`${target}.lock`);
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        throw err;
      }
    }
  }
}
