import { describe, it, expect } from "vitest";
import {
  getField,
  hasField,
  parseHeaderSet,
  parseNumber,
  pickFields,
  requireField,
  toNumber,
  toText,
} from "./header.js";
import { InvalidHeaderError, MissingFieldError, NotNumericError } from "./errors.js";

describe("header model", () => {
  describe("field lookup", () => {
    it("should treat an empty string as present", () => {
      expect(hasField({ FILTER: "" }, "FILTER")).toBe(true);
      expect(getField({ FILTER: "" }, "FILTER")).toBe("");
    });

    it("should report absent fields as undefined", () => {
      expect(hasField({ FILTER: "K" }, "filter")).toBe(false);
      expect(getField({ FILTER: "K" }, "EXPTIME")).toBeUndefined();
    });

    it("should not see inherited properties", () => {
      expect(hasField({}, "toString")).toBe(false);
    });

    it("should keep dotted names opaque", () => {
      const header = { "HIERARCH.ESO.DET.WIN.STARTX": 1 };
      expect(getField(header, "HIERARCH.ESO.DET.WIN.STARTX")).toBe(1);
      expect(hasField(header, "HIERARCH")).toBe(false);
    });

    it("should name the header side when a required field is missing", () => {
      expect(() => requireField({}, "DETECXS", "reference")).toThrow(MissingFieldError);
      expect(() => requireField({}, "DETECXS", "reference")).toThrow(
        'Field "DETECXS" missing from reference header'
      );
    });
  });

  describe("numeric coercion", () => {
    it("should parse decimal and exponent forms", () => {
      expect(parseNumber("10")).toBe(10);
      expect(parseNumber(" 10.0 ")).toBe(10);
      expect(parseNumber("1e3")).toBe(1000);
      expect(parseNumber(".5")).toBe(0.5);
      expect(parseNumber("-3")).toBe(-3);
      expect(parseNumber(42.5)).toBe(42.5);
    });

    it("should reject text with trailing junk", () => {
      expect(parseNumber("10a")).toBeUndefined();
      expect(parseNumber("")).toBeUndefined();
      expect(parseNumber("ARC")).toBeUndefined();
      expect(parseNumber(Number.POSITIVE_INFINITY)).toBeUndefined();
    });

    it("should throw NotNumericError naming the field", () => {
      expect(() => toNumber("DETECXS", "10a")).toThrow(NotNumericError);
      expect(() => toNumber("DETECXS", "10a")).toThrow('Value of "DETECXS" is not numeric: "10a"');
    });

    it("should render canonical text", () => {
      expect(toText(10.5)).toBe("10.5");
      expect(toText(10)).toBe("10");
      expect(toText("ARC")).toBe("ARC");
    });
  });

  describe("parseHeaderSet", () => {
    it("should accept a flat object of strings and numbers", () => {
      const header = parseHeaderSet({ OBSTYPE: "ARC", DETECXS: 100 });
      expect(header).toEqual({ OBSTYPE: "ARC", DETECXS: 100 });
      expect(Object.isFrozen(header)).toBe(true);
    });

    it("should reject nested values", () => {
      expect(() => parseHeaderSet({ OBSTYPE: { value: "ARC" } })).toThrow(InvalidHeaderError);
      expect(() => parseHeaderSet({ OBSTYPE: { value: "ARC" } })).toThrow(/at "OBSTYPE"/);
    });

    it("should reject non-objects", () => {
      expect(() => parseHeaderSet("ARC", "stdin")).toThrow(/^Invalid header in stdin: /);
      expect(() => parseHeaderSet(null)).toThrow(InvalidHeaderError);
    });

    it("should reject NaN", () => {
      expect(() => parseHeaderSet({ ORACTIME: Number.NaN })).toThrow(InvalidHeaderError);
    });
  });

  describe("pickFields", () => {
    it("should keep only the named fields in the given order", () => {
      const picked = pickFields({ A: 1, B: 2, C: 3 }, ["C", "A"]);
      expect(Object.keys(picked)).toEqual(["C", "A"]);
      expect(picked).toEqual({ C: 3, A: 1 });
    });

    it("should fail on a missing field", () => {
      expect(() => pickFields({ A: 1 }, ["A", "B"])).toThrow('Field "B" missing from candidate header');
    });
  });
});
