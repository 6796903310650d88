/**
 * Calibration store: per-type rules, index snapshots and current selections
 */

import * as path from "node:path";
import type {
  CalibrationStore,
  CalibrationTypeOptions,
  HeaderSet,
  HeaderValue,
  IndexRecord,
  IndexStorage,
  ResolveOptions,
  RuleSet,
  Selection,
  SelectOptions,
  StoreOptions,
  Verification,
} from "./types.js";
import { CalibrationIndex, projectHeader, validateRecord } from "./index/calibration-index.js";
import { FileIndexStorage, indexFileName } from "./index/storage.js";
import { parseRules } from "./rules/parser.js";
import { matchRuleSet } from "./rules/evaluator.js";
import { selectBest } from "./selector.js";
import { getField } from "./header.js";
import { copyIfAbsent, fileExists, readTextFile } from "./io.js";
import {
  NoSuitableCalibrationError,
  OverrideUnsuitableError,
  RulesNotFoundError,
} from "./errors.js";
import { logger } from "./observability/logs.js";
import { MetricsCollector, type SelectionMetrics } from "./observability/metrics.js";

interface LoadedIndex {
  index: CalibrationIndex;
  storage: IndexStorage;
  filePath: string;
}

/**
 * Calibration store backed by rule files on a search path and index files
 *
 * Rules and index snapshots are loaded once per type and cached until
 * reload(). Records appended by other processes become visible on reload.
 *
 * @example
 * ```typescript
 * const store = openCalibrationStore({ rulesPath: ["./cal"], dataDir: "./data" });
 *
 * const arc = await store.resolve("arc", { ORACTIME: 45292.6, OBSTYPE: "ARC", DETECXS: 100 });
 * await store.add("arc", "arc_20240101_0012", frameHeader);
 * ```
 */
class CalselStore implements CalibrationStore {
  #options: StoreOptions;
  #rules = new Map<string, RuleSet>();
  #indexes = new Map<string, LoadedIndex>();
  #current = new Map<string, string>();
  #overrides = new Set<string>();
  #metrics = new MetricsCollector();

  constructor(options: StoreOptions) {
    this.#options = {
      ...options,
      rulesPath: options.rulesPath.map((dir) => path.resolve(dir)),
      dataDir: path.resolve(options.dataDir),
    };
  }

  get options(): Readonly<StoreOptions> {
    return this.#options;
  }

  #typeOptions(type: string): CalibrationTypeOptions {
    return this.#options.calibrations?.[type] ?? {};
  }

  /**
   * Load rules.<type> from the first directory on the search path that has one
   * @throws {RulesNotFoundError} If no directory has the file
   * @throws {MalformedRuleError} If any line fails to parse
   */
  async rules(type: string): Promise<RuleSet> {
    const cached = this.#rules.get(type);
    if (cached) return cached;

    for (const dir of this.#options.rulesPath) {
      const filePath = path.join(dir, `rules.${type}`);
      const text = await readTextFile(filePath);
      if (text === null) continue;

      const ruleSet = parseRules(text, { source: filePath, policy: this.#typeOptions(type).policy });
      this.#rules.set(type, ruleSet);
      logger.info("rules.load", {
        type,
        message: filePath,
        details: { rules: ruleSet.rules.length },
      });
      return ruleSet;
    }

    throw new RulesNotFoundError(type, this.#options.rulesPath);
  }

  async index(type: string): Promise<CalibrationIndex> {
    return (await this.#load(type)).index;
  }

  async #load(type: string): Promise<LoadedIndex> {
    const cached = this.#indexes.get(type);
    if (cached) return cached;

    const { storage, filePath } = await this.#openStorage(type);
    const index = CalibrationIndex.from(await storage.load());
    const loaded: LoadedIndex = { index, storage, filePath };
    this.#indexes.set(type, loaded);

    logger.info("index.load", { type, message: filePath, details: { records: index.size } });
    return loaded;
  }

  async #openStorage(type: string): Promise<{ storage: IndexStorage; filePath: string }> {
    const { indexMode = "dynamic", format = "text" } = this.#typeOptions(type);
    const fileName = indexFileName(type, format);
    const dataFile = path.join(this.#options.dataDir, fileName);

    let filePath = dataFile;
    let readOnly = false;

    if (indexMode === "static") {
      filePath = (await this.#findOnRulesPath(fileName)) ?? dataFile;
      readOnly = true;
    } else if (indexMode === "copy") {
      const source = await this.#findOnRulesPath(fileName);
      if (source && (await copyIfAbsent(source, dataFile))) {
        logger.info("index.copy", { type, message: `${source} -> ${dataFile}` });
      }
    }

    const storage = this.#options.storageFactory
      ? this.#options.storageFactory(type, filePath, format)
      : new FileIndexStorage(filePath, format, { readOnly });
    return { storage, filePath };
  }

  async #findOnRulesPath(fileName: string): Promise<string | undefined> {
    for (const dir of this.#options.rulesPath) {
      const candidate = path.join(dir, fileName);
      if (await fileExists(candidate)) return candidate;
    }
    return undefined;
  }

  /**
   * Choose the best calibration for a reference header
   * @returns The selection, including "none" outcomes
   * @throws {MissingFieldError} If a time-based policy is in effect and the reference lacks ORACTIME
   */
  async select(type: string, reference: HeaderSet, opts?: SelectOptions): Promise<Selection> {
    const ruleSet = await this.rules(type);
    const { index } = await this.#load(type);

    const start = performance.now();
    const selection = selectBest(index, ruleSet, reference, opts);
    this.#metrics.recordQueryTime(type, performance.now() - start);
    this.#metrics.recordSelection(type, {
      selected: selection.status === "selected",
      scanned: index.size,
      rejections: selection.rejections.map((rejection) => rejection.reason),
    });

    for (const rejection of selection.rejections) {
      logger.debug("select.reject", {
        type,
        calibration: rejection.record.name,
        message: rejection.message,
        details: { reason: rejection.reason, line: rejection.rule.line },
      });
    }

    if (selection.status === "selected") {
      logger.info("select.result", {
        type,
        calibration: selection.record.name,
        details: { policy: selection.policy, matches: selection.matches.length },
      });
    } else {
      logger.info("select.none", {
        type,
        message: selection.reason,
        details: { policy: selection.policy, scanned: index.size },
      });
    }

    return selection;
  }

  /**
   * Current calibration if still suitable, otherwise a fresh selection
   * @throws {OverrideUnsuitableError} If a pinned calibration fails its rules
   * @throws {NoSuitableCalibrationError} If nothing matches and neither fallback nor optional applies
   */
  async resolve(type: string, reference: HeaderSet, opts: ResolveOptions = {}): Promise<string | null> {
    const current = this.#current.get(type);
    if (current !== undefined) {
      const verification = await this.verify(type, current, reference);
      if (verification.suitable) {
        return current;
      }
      if (this.#overrides.has(type)) {
        const detail =
          verification.reason === "unknown" ? "not present in the index" : verification.message;
        throw new OverrideUnsuitableError(type, current, detail);
      }
    }

    const selection = await this.select(type, reference, { policy: opts.policy });
    if (selection.status === "selected") {
      this.#current.set(type, selection.record.name);
      return selection.record.name;
    }

    const fallback = opts.fallback?.() ?? null;
    if (fallback !== null) {
      logger.info("select.fallback", { type, calibration: fallback });
      this.#current.set(type, fallback);
      return fallback;
    }

    if (opts.optional) {
      return null;
    }

    logger.warn("select.none", { type, message: `No suitable ${type} calibration` });
    throw new NoSuitableCalibrationError(type);
  }

  /**
   * Check a named calibration against the rules; an unknown name is unsuitable
   */
  async verify(type: string, name: string, reference: HeaderSet): Promise<Verification> {
    const ruleSet = await this.rules(type);
    const { index } = await this.#load(type);

    const record = index.entry(name);
    if (!record) {
      return { suitable: false, reason: "unknown" };
    }

    const match = matchRuleSet(ruleSet, reference, record.header);
    if (match.matched) {
      return { suitable: true, record };
    }
    return { suitable: false, reason: match.reason, rule: match.rule, message: match.message };
  }

  /**
   * Project a header onto the rule columns and append it
   * @throws {MissingFieldError} If the header lacks a rule column
   * @throws {InvalidRecordError} If the name or ORACTIME is invalid
   * @throws {IndexWriteError} If the index is static or the write fails
   */
  async add(type: string, name: string, header: HeaderSet): Promise<IndexRecord> {
    const ruleSet = await this.rules(type);
    const loaded = await this.#load(type);

    const projected = projectHeader(ruleSet, header);
    validateRecord(name, projected);

    await loaded.storage.append({ seq: loaded.index.size, name, header: projected });
    const record = loaded.index.append(name, projected);

    this.#metrics.recordAppend(type);
    logger.info("index.append", { type, calibration: name, message: loaded.filePath });
    return record;
  }

  /**
   * Column value from the nearest matching record, or from the pinned
   * override when one is set
   * @returns The value, or undefined if that record lacks the column
   * @throws {NoSuitableCalibrationError} If no record matches
   * @throws {OverrideUnsuitableError} If the pinned calibration is not in the index
   */
  async retrieveByColumn(
    type: string,
    column: string,
    reference: HeaderSet
  ): Promise<HeaderValue | undefined> {
    const pinned = this.#overrides.has(type) ? this.#current.get(type) : undefined;
    if (pinned !== undefined) {
      const record = (await this.#load(type)).index.entry(pinned);
      if (!record) {
        throw new OverrideUnsuitableError(type, pinned, "not present in the index");
      }
      return getField(record.header, column);
    }

    const selection = await this.select(type, reference, { policy: "nearest" });
    if (selection.status === "none") {
      throw new NoSuitableCalibrationError(type);
    }
    return getField(selection.record.header, column);
  }

  current(type: string): string | undefined {
    return this.#current.get(type);
  }

  setCurrent(type: string, name: string): void {
    if (this.#overrides.has(type)) {
      logger.debug("current.ignored", { type, calibration: name, message: "override pinned" });
      return;
    }
    this.#current.set(type, name);
  }

  override(type: string, name: string): void {
    this.#current.set(type, name);
    this.#overrides.add(type);
  }

  reload(type: string): void {
    this.#rules.delete(type);
    this.#indexes.delete(type);
  }

  metrics(type: string): SelectionMetrics | undefined {
    return this.#metrics.getMetrics(type);
  }
}

/**
 * Open a calibration store
 *
 * @param options - Search path for rule files, data directory for indexes and per-type settings
 * @returns Store instance
 *
 * @example
 * ```typescript
 * const store = openCalibrationStore({
 *   rulesPath: ["./cal/ufti", "./cal/common"],
 *   dataDir: "./reduced",
 *   calibrations: {
 *     flat: { policy: "nearest" },
 *     standard: { indexMode: "copy", format: "jsonl" },
 *   },
 * });
 * ```
 */
export function openCalibrationStore(options: StoreOptions): CalibrationStore {
  return new CalselStore(options);
}
