import { describe, it, expect } from "vitest";
import {
  decodeIndexJsonl,
  decodeIndexText,
  encodeIndexJsonl,
  encodeIndexText,
  unionColumns,
} from "./codec.js";
import { IndexFormatError } from "../errors.js";
import type { IndexRecord } from "../types.js";

function rec(seq: number, name: string, header: IndexRecord["header"]): IndexRecord {
  return { seq, name, header };
}

describe("index codec", () => {
  describe("column text format", () => {
    it("should write a column line and one row per record", () => {
      const text = encodeIndexText([
        rec(0, "arc_0012", { OBSTYPE: "ARC", DETECXS: 50, ORACTIME: 45292.51 }),
        rec(1, "flat_0013", { OBSTYPE: "FLAT", DETECXS: 100, ORACTIME: 45292.6 }),
      ]);
      expect(text).toBe(
        "#OBSTYPE DETECXS ORACTIME\narc_0012 ARC 50 45292.51\nflat_0013 FLAT 100 45292.6\n"
      );
    });

    it("should quote values that would not survive bare", () => {
      const text = encodeIndexText(
        [rec(0, "std", { OBJECT: "NGC 253", MODE: "", CODE: "007", DASH: "-", HASH: "a#b", ORACTIME: 1 })],
        ["OBJECT", "MODE", "CODE", "DASH", "HASH", "ORACTIME"]
      );
      expect(text).toBe('#OBJECT MODE CODE DASH HASH ORACTIME\nstd "NGC 253" "" "007" "-" "a#b" 1\n');
    });

    it("should write - for a column the record lacks", () => {
      const text = encodeIndexText([rec(0, "a", { ORACTIME: 1 })], ["ORACTIME", "FILTER"]);
      expect(text).toBe("#ORACTIME FILTER\na 1 -\n");
    });

    it("should decode bare numbers as numbers and keep quoted text as text", () => {
      const records = decodeIndexText(
        '#OBJECT CODE ORACTIME FILTER\nstd "NGC 253" "007" 45292.5 -\n',
        "index.std"
      );
      expect(records).toEqual([
        { seq: 0, name: "std", header: { OBJECT: "NGC 253", CODE: "007", ORACTIME: 45292.5 } },
      ]);
    });

    it("should decode rows written by hand with extra whitespace and comments", () => {
      const records = decodeIndexText(
        "#OBSTYPE ORACTIME\n\n# added manually\narc_1   ARC\t10\r\narc_2 ARC 11\n"
      );
      expect(records.map((record) => [record.seq, record.name, record.header])).toEqual([
        [0, "arc_1", { OBSTYPE: "ARC", ORACTIME: 10 }],
        [1, "arc_2", { OBSTYPE: "ARC", ORACTIME: 11 }],
      ]);
    });

    it("should round-trip tricky values", () => {
      const records = [
        rec(0, "a", { OBJECT: 'say "hi"', CODE: "1e3", N: -2.5, ORACTIME: 3 }),
        rec(1, "b", { OBJECT: "plain", CODE: "x", N: 0, ORACTIME: 4 }),
      ];
      expect(decodeIndexText(encodeIndexText(records))).toEqual(records);
    });

    it("should quote strings that overflow as numbers", () => {
      const records = [rec(0, "f", { ORACTIME: 1, GAIN: "1e999" })];
      const text = encodeIndexText(records);

      expect(text).toBe('#ORACTIME GAIN\nf 1 "1e999"\n');
      expect(decodeIndexText(text)).toEqual(records);
    });

    it("should keep an overflowing bare token as text", () => {
      const [record] = decodeIndexText("#ORACTIME GAIN\nf 1 1e999\n");
      expect(record?.header).toEqual({ ORACTIME: 1, GAIN: "1e999" });
    });

    it("should read an empty file as an empty index", () => {
      expect(decodeIndexText("")).toEqual([]);
      expect(decodeIndexText("#ORACTIME\n")).toEqual([]);
    });

    it("should reject a row with the wrong value count", () => {
      expect(() => decodeIndexText("#OBSTYPE ORACTIME\narc_1 ARC\n", "index.arc")).toThrow(
        "index.arc:2: expected 2 values, found 1"
      );
    });

    it("should reject rows before the column line", () => {
      expect(() => decodeIndexText("arc_1 ARC 1\n")).toThrow(IndexFormatError);
    });

    it("should reject an unterminated quoted value", () => {
      expect(() => decodeIndexText('#OBJECT\nstd "NGC 253\n', "index.std")).toThrow(
        "index.std:2: unterminated quoted value"
      );
    });
  });

  describe("JSON Lines format", () => {
    it("should write one object per line", () => {
      expect(encodeIndexJsonl([rec(0, "arc_1", { OBSTYPE: "ARC", ORACTIME: 1 })])).toBe(
        '{"name":"arc_1","header":{"OBSTYPE":"ARC","ORACTIME":1}}\n'
      );
    });

    it("should decode and number records", () => {
      const records = decodeIndexJsonl(
        '{"name":"a","header":{"ORACTIME":1}}\n\n{"name":"b","header":{"ORACTIME":"2"}}\n'
      );
      expect(records).toEqual([
        { seq: 0, name: "a", header: { ORACTIME: 1 } },
        { seq: 1, name: "b", header: { ORACTIME: "2" } },
      ]);
    });

    it("should reject invalid JSON with its line number", () => {
      expect(() => decodeIndexJsonl('{"name":"a","header":{}}\n{oops\n', "index.arc.jsonl")).toThrow(
        "index.arc.jsonl:2: invalid JSON"
      );
    });

    it("should reject rows that fail validation", () => {
      expect(() => decodeIndexJsonl('{"name":"","header":{}}\n')).toThrow(IndexFormatError);
      expect(() => decodeIndexJsonl('{"name":"a","header":{"X":[1]}}\n')).toThrow(
        /invalid index row: header\.X/
      );
    });
  });

  it("should collect columns in first-seen order", () => {
    expect(
      unionColumns([rec(0, "a", { B: 1, A: 2 }), rec(1, "b", { C: 3, A: 4 })])
    ).toEqual(["B", "A", "C"]);
  });
});
