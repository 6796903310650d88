import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempRoot, removeDir } from "@calsel/testkit";
import { FileIndexStorage, MemoryIndexStorage, indexFileName } from "./storage.js";
import { FileLock } from "./lock.js";
import { IndexWriteError, LockTimeoutError } from "../errors.js";

describe("index storage", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempRoot("calsel-storage-");
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  describe("FileIndexStorage", () => {
    it("should load a missing file as empty", async () => {
      const storage = new FileIndexStorage(join(testDir, "index.arc"));
      expect(await storage.load()).toEqual([]);
    });

    it("should append rows in the column text format", async () => {
      const filePath = join(testDir, "nested", "index.arc");
      const storage = new FileIndexStorage(filePath);

      await storage.append({ seq: 0, name: "arc_1", header: { OBSTYPE: "ARC", ORACTIME: 1 } });
      await storage.append({ seq: 1, name: "arc_2", header: { OBSTYPE: "ARC", ORACTIME: 2 } });

      expect(await readFile(filePath, "utf-8")).toBe(
        "#OBSTYPE ORACTIME\narc_1 ARC 1\narc_2 ARC 2\n"
      );
      expect((await storage.load()).map((record) => record.name)).toEqual(["arc_1", "arc_2"]);
    });

    it("should write JSON Lines when asked", async () => {
      const filePath = join(testDir, indexFileName("flat", "jsonl"));
      const storage = new FileIndexStorage(filePath, "jsonl");

      await storage.store([{ seq: 0, name: "flat_1", header: { FILTER: "K", ORACTIME: 3 } }]);

      expect(filePath.endsWith("index.flat.jsonl")).toBe(true);
      expect(await readFile(filePath, "utf-8")).toBe(
        '{"name":"flat_1","header":{"FILTER":"K","ORACTIME":3}}\n'
      );
    });

    it("should leave no temp or lock files behind", async () => {
      const storage = new FileIndexStorage(join(testDir, "index.arc"));
      await storage.append({ seq: 0, name: "arc_1", header: { ORACTIME: 1 } });

      expect(await readdir(testDir)).toEqual(["index.arc"]);
    });

    it("should keep every row from concurrent appenders", async () => {
      const filePath = join(testDir, "index.arc");
      const writers = Array.from({ length: 5 }, () => new FileIndexStorage(filePath, "text", {
        lock: { retryIntervalMs: 5 },
      }));

      await Promise.all(
        writers.map((storage, i) =>
          storage.append({ seq: 0, name: `arc_${i}`, header: { ORACTIME: i } })
        )
      );

      const names = (await writers[0]?.load())?.map((record) => record.name).sort();
      expect(names).toEqual(["arc_0", "arc_1", "arc_2", "arc_3", "arc_4"]);
    });

    it("should refuse writes when read-only", async () => {
      const filePath = join(testDir, "index.arc");
      await writeFile(filePath, "#ORACTIME\narc_1 1\n", "utf-8");
      const storage = new FileIndexStorage(filePath, "text", { readOnly: true });

      await expect(
        storage.append({ seq: 1, name: "arc_2", header: { ORACTIME: 2 } })
      ).rejects.toThrow(IndexWriteError);
      expect(await readFile(filePath, "utf-8")).toBe("#ORACTIME\narc_1 1\n");
    });
  });

  describe("FileLock", () => {
    it("should create and remove the lock file", async () => {
      const target = join(testDir, "index.arc");
      const lock = new FileLock(target);

      await lock.acquire();
      expect(await readdir(testDir)).toEqual(["index.arc.lock"]);

      await lock.release();
      expect(await readdir(testDir)).toEqual([]);
    });

    it("should time out while another holder keeps the lock", async () => {
      const target = join(testDir, "index.arc");
      const holder = new FileLock(target);
      await holder.acquire();

      try {
        const waiter = new FileLock(target, { timeoutMs: 50, retryIntervalMs: 10 });
        await expect(waiter.acquire()).rejects.toThrow(LockTimeoutError);
      } finally {
        await holder.release();
      }
    });

    it("should release after withLock even when the function throws", async () => {
      const target = join(testDir, "index.arc");
      const lock = new FileLock(target);

      await expect(
        lock.withLock(async () => {
          throw new Error("boom");
        })
      ).rejects.toThrow("boom");
      expect(await readdir(testDir)).toEqual([]);
    });

    it("should remove a stale lock by force", async () => {
      const target = join(testDir, "index.arc");
      await writeFile(`${target}.lock`, "{}", "utf-8");

      await FileLock.forceRemove(target);
      await FileLock.forceRemove(target);
      expect(await readdir(testDir)).toEqual([]);
    });
  });

  describe("MemoryIndexStorage", () => {
    it("should keep records in process", async () => {
      const storage = new MemoryIndexStorage();
      await storage.append({ seq: 7, name: "a", header: { ORACTIME: 1 } });
      await storage.append({ seq: 9, name: "b", header: { ORACTIME: 2 } });

      expect((await storage.load()).map((record) => [record.seq, record.name])).toEqual([
        [0, "a"],
        [1, "b"],
      ]);

      await storage.store([]);
      expect(await storage.load()).toEqual([]);
    });
  });
});
