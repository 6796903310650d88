/**
 * File I/O for rule and index files
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only; a missing file reads as null
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { IndexReadError, IndexWriteError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * errno-style code of a thrown value, if any
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new IndexWriteError(dirPath, { cause: err });
  }
}

async function syncDirectory(dir: string): Promise<void> {
  if (!ENABLE_DIR_FSYNC) return;
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // Platforms without directory fsync report EINVAL/ENOTSUP/EBADF
    const code = errnoCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF") {
      logger.debug("io.dirsync.failed", { message: `${dir}: ${String(err)}` });
    }
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 * @throws {IndexWriteError} If any step fails
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content, "utf-8");

    // Prefer datasync, fall back to full sync where it is unsupported
    try {
      await fileHandle.datasync();
    } catch (err) {
      const code = errnoCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);
    await syncDirectory(dir);
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close.failed", { message: `${tmp}: ${String(closeErr)}` });
      });
    }
    await fs.rm(tmp, { force: true });
    throw new IndexWriteError(filePath, { cause: err });
  }
}

/**
 * Read a UTF-8 text file
 * @returns File contents, or null if the file does not exist
 * @throws {IndexReadError} For other read failures
 */
export async function readTextFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return null;
    }
    throw new IndexReadError(filePath, { cause: err });
  }
}

/**
 * Check whether a regular file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (err) {
    if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") {
      return false;
    }
    throw new IndexReadError(filePath, { cause: err });
  }
}

/**
 * Copy a file into place unless the target already exists
 * @returns true if a copy was made
 */
export async function copyIfAbsent(source: string, target: string): Promise<boolean> {
  if (await fileExists(target)) {
    return false;
  }
  const content = await readTextFile(source);
  if (content === null) {
    throw new IndexReadError(source);
  }
  await atomicWrite(target, content);
  return true;
}
