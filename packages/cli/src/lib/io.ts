/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { InvalidArgumentError } from "commander";
import { parseHeaderSet, type HeaderSet } from "@calsel/sdk";
import { parseJson } from "./arg.js";

/**
 * Streams the program reads and writes; replaced in tests
 */
export interface CliIo {
  stdout(content: string): void;
  stderr(content: string): void;
  readStdin(): Promise<string>;
  isStdinTTY(): boolean;
}

/**
 * Read from stdin with size limit (default 10MB)
 * @param maxBytes - Maximum bytes to read (default 10MB)
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes = 10 * 1024 * 1024): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk: string) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      // Enforce size limit during streaming to prevent memory exhaustion
      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * Process streams
 */
export const processIo: CliIo = {
  stdout: (content) => {
    process.stdout.write(content);
  },
  stderr: (content) => {
    process.stderr.write(content);
  },
  readStdin: () => readStdin(),
  isStdinTTY: () => process.stdin.isTTY ?? false,
};

/**
 * Read JSON from a file
 */
export async function readJsonFromFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new InvalidArgumentError(
      `Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseJson(content, `file ${filePath}`);
}

export interface HeaderInputOptions {
  header?: string;
  headerFile?: string;
}

/**
 * Reference header from --header, --header-file or stdin
 * @throws {InvalidArgumentError} On conflicting or missing input and bad JSON
 * @throws {InvalidHeaderError} If the JSON is not a flat object of strings and numbers
 */
export async function readHeader(options: HeaderInputOptions, io: CliIo): Promise<HeaderSet> {
  if (options.header !== undefined && options.headerFile !== undefined) {
    throw new InvalidArgumentError(
      "Cannot use both --header and --header-file; choose one or use stdin"
    );
  }

  if (options.header !== undefined) {
    return parseHeaderSet(parseJson(options.header, "--header"), "--header");
  }

  if (options.headerFile !== undefined) {
    return parseHeaderSet(await readJsonFromFile(options.headerFile), options.headerFile);
  }

  if (io.isStdinTTY()) {
    throw new InvalidArgumentError(
      "No header provided. Use --header, --header-file, or pipe JSON to stdin"
    );
  }

  let stdin: string;
  try {
    stdin = await io.readStdin(); // Size limit enforced during streaming
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : "Failed to read from stdin");
  }
  if (!stdin.trim()) {
    throw new InvalidArgumentError("stdin is empty");
  }
  return parseHeaderSet(parseJson(stdin, "stdin"), "stdin");
}
