/**
 * File system test utilities
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openCalibrationStore } from "@calsel/sdk";
import type { CalibrationStore, StoreOptions } from "@calsel/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "calsel-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempRoot(prefix = "calsel-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write rules.<type> into a directory
 * @returns Path of the written file
 */
export async function writeRulesFile(dir: string, type: string, text: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = join(dir, `rules.${type}`);
  await writeFile(filePath, text, "utf-8");
  return filePath;
}

/**
 * Write a file verbatim, creating its directory
 */
export async function writeFixture(dir: string, name: string, text: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = join(dir, name);
  await writeFile(filePath, text, "utf-8");
  return filePath;
}

/**
 * Directories of a temporary store
 */
export interface TempStoreDirs {
  root: string;
  /** Rules search directory (root/cal) */
  calDir: string;
  /** Data directory (root/data) */
  dataDir: string;
}

export interface TempStoreOptions {
  /** rules.<type> files to create, keyed by type */
  rules?: Record<string, string>;
  /** Extra store options; rulesPath and dataDir are set by the helper */
  store?: Partial<Omit<StoreOptions, "rulesPath" | "dataDir">>;
}

/**
 * Execute a function with a store over fresh temp directories, cleaning up after
 * @param fn - Function to execute with the store
 * @param options - Rule files to create and store settings
 * @returns Result of fn
 */
export async function withTempStore<T>(
  fn: (store: CalibrationStore, dirs: TempStoreDirs) => Promise<T>,
  options: TempStoreOptions = {}
): Promise<T> {
  const root = await createTempRoot();
  const dirs: TempStoreDirs = { root, calDir: join(root, "cal"), dataDir: join(root, "data") };

  try {
    await mkdir(dirs.calDir, { recursive: true });
    for (const [type, text] of Object.entries(options.rules ?? {})) {
      await writeRulesFile(dirs.calDir, type, text);
    }

    const store = openCalibrationStore({
      ...options.store,
      rulesPath: [dirs.calDir],
      dataDir: dirs.dataDir,
    });
    return await fn(store, dirs);
  } finally {
    await removeDir(root);
  }
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
