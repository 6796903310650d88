import { describe, it, expect } from "vitest";
import { effectivePolicy, pickBest, selectBest } from "./selector.js";
import { CalibrationIndex } from "./index/calibration-index.js";
import { parseRules } from "./rules/parser.js";
import { MissingFieldError, NotNumericError } from "./errors.js";
import type { Selection } from "./types.js";

const timeOnly = parseRules("ORACTIME");

function indexAt(...times: number[]): CalibrationIndex {
  const index = new CalibrationIndex();
  times.forEach((time, i) => index.append(`cal_${i}_${time}`, { ORACTIME: time }));
  return index;
}

function selectedName(selection: Selection): string | null {
  return selection.status === "selected" ? selection.record.name : null;
}

describe("selector", () => {
  describe("before policy", () => {
    it("should pick the latest record not after the reference", () => {
      const selection = selectBest(indexAt(99, 105), timeOnly, { ORACTIME: 100 });
      expect(selectedName(selection)).toBe("cal_0_99");
      expect(selection.policy).toBe("before");
    });

    it("should accept a record at the reference time", () => {
      expect(selectedName(selectBest(indexAt(90, 100), timeOnly, { ORACTIME: 100 }))).toBe(
        "cal_1_100"
      );
    });

    it("should report none when every match is after the reference", () => {
      const selection = selectBest(indexAt(105, 110), timeOnly, { ORACTIME: 100 });
      expect(selection.status).toBe("none");
      expect(selection.status === "none" ? selection.reason : null).toBe("none-before-reference");
      expect(selection.matches).toHaveLength(2);
    });
  });

  describe("policies disagree", () => {
    it("should choose 90 before and 105 nearest for candidates 90 and 105", () => {
      const index = indexAt(90, 105);
      const reference = { ORACTIME: 100 };
      expect(selectedName(selectBest(index, timeOnly, reference, { policy: "before" }))).toBe(
        "cal_0_90"
      );
      expect(selectedName(selectBest(index, timeOnly, reference, { policy: "nearest" }))).toBe(
        "cal_1_105"
      );
    });

    it("should agree when the earlier record is also nearest", () => {
      const index = indexAt(90, 95, 110);
      const reference = { ORACTIME: 100 };
      expect(selectedName(selectBest(index, timeOnly, reference))).toBe("cal_1_95");
      expect(selectedName(selectBest(index, timeOnly, reference, { policy: "nearest" }))).toBe(
        "cal_1_95"
      );
    });
  });

  describe("ties", () => {
    it("should pick the later-appended record on identical ORACTIME every time", () => {
      const index = new CalibrationIndex();
      index.append("first", { ORACTIME: 50 });
      index.append("second", { ORACTIME: 50 });

      for (let i = 0; i < 5; i++) {
        expect(selectedName(selectBest(index, timeOnly, { ORACTIME: 60 }))).toBe("second");
        expect(
          selectedName(selectBest(index, timeOnly, { ORACTIME: 60 }, { policy: "nearest" }))
        ).toBe("second");
      }
    });

    it("should pick the later-appended record on equal distance", () => {
      expect(
        selectedName(selectBest(indexAt(95, 105), timeOnly, { ORACTIME: 100 }, { policy: "nearest" }))
      ).toBe("cal_1_105");
      expect(
        selectedName(selectBest(indexAt(105, 95), timeOnly, { ORACTIME: 100 }, { policy: "nearest" }))
      ).toBe("cal_1_95");
    });
  });

  describe("latest policy", () => {
    it("should pick the most recently appended match and ignore time", () => {
      const selection = selectBest(indexAt(90, 200, 50), timeOnly, {}, { policy: "latest" });
      expect(selectedName(selection)).toBe("cal_2_50");
    });
  });

  describe("no candidates", () => {
    it("should report none when nothing matches", () => {
      const rules = parseRules("OBSTYPE eq 'ARC'");
      const index = new CalibrationIndex();
      index.append("flat", { OBSTYPE: "FLAT", ORACTIME: 1 });

      const selection = selectBest(index, rules, { ORACTIME: 2 });
      expect(selection).toMatchObject({ status: "none", reason: "no-candidates", matches: [] });
      expect(selection.rejections.map((r) => r.record.name)).toEqual(["flat"]);
    });

    it("should not need the reference time when nothing matches", () => {
      const selection = selectBest(new CalibrationIndex(), timeOnly, {});
      expect(selection.status).toBe("none");
    });
  });

  describe("reference time", () => {
    it("should throw when the reference lacks ORACTIME", () => {
      expect(() => selectBest(indexAt(1), timeOnly, {})).toThrow(MissingFieldError);
    });

    it("should throw when the reference ORACTIME is not numeric", () => {
      expect(() => selectBest(indexAt(1), timeOnly, { ORACTIME: "later" })).toThrow(NotNumericError);
    });
  });

  describe("arc scenario", () => {
    const arcRules = parseRules("OBSTYPE eq 'ARC'\nDETECXS <= $Hdr{DETECXS}\n");

    function arcIndex(): CalibrationIndex {
      const index = new CalibrationIndex();
      index.append("arc", { OBSTYPE: "ARC", DETECXS: 50, ORACTIME: 1 });
      index.append("flat", { OBSTYPE: "FLAT", DETECXS: 50, ORACTIME: 2 });
      return index;
    }

    it("should select the ARC record", () => {
      const selection = selectBest(arcIndex(), arcRules, { DETECXS: 100, ORACTIME: 5 });
      expect(selectedName(selection)).toBe("arc");
      expect(selection.matches.map((record) => record.name)).toEqual(["arc"]);
    });

    it("should select it under the latest policy without a reference time", () => {
      const selection = selectBest(arcIndex(), arcRules, { DETECXS: 100 }, { policy: "latest" });
      expect(selectedName(selection)).toBe("arc");
    });
  });

  describe("effectivePolicy", () => {
    it("should prefer the caller, then the rule set, then before", () => {
      const nearestRules = parseRules("ORACTIME", { policy: "nearest" });
      expect(effectivePolicy(nearestRules, { policy: "latest" })).toBe("latest");
      expect(effectivePolicy(nearestRules)).toBe("nearest");
      expect(effectivePolicy(timeOnly)).toBe("before");
    });
  });

  it("should return undefined from pickBest for no candidates", () => {
    expect(pickBest([], "before", { ORACTIME: 1 })).toBeUndefined();
  });
});
