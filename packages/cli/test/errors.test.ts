/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import {
  MalformedRuleError,
  NoSuitableCalibrationError,
  RulesNotFoundError,
} from "@calsel/sdk";
import { CliError, mapSdkErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.reported).toBe(false);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("no match", { exitCode: 2 });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapSdkErrorToExitCode", () => {
    it("should map NoSuitableCalibrationError to exit code 2", () => {
      expect(mapSdkErrorToExitCode(new NoSuitableCalibrationError("arc"))).toBe(2);
    });

    it("should map rule and lookup errors to exit code 1", () => {
      expect(mapSdkErrorToExitCode(new MalformedRuleError("rules.arc", 1, "X ~", "bad"))).toBe(1);
      expect(mapSdkErrorToExitCode(new RulesNotFoundError("arc", ["/cal"]))).toBe(1);
    });

    it("should use the exit code of a CliError", () => {
      expect(mapSdkErrorToExitCode(new CliError("x", { exitCode: 3 }))).toBe(3);
    });

    it("should default to 1 for unknown values", () => {
      expect(mapSdkErrorToExitCode(new Error("x"))).toBe(1);
      expect(mapSdkErrorToExitCode("x")).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should return the message", () => {
      expect(formatCliError(new Error("simple"))).toBe("simple");
      expect(formatCliError("plain")).toBe("plain");
    });

    it("should truncate long messages", () => {
      const formatted = formatCliError(new Error("x".repeat(3000)));
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should add the error code and cause when verbose", () => {
      const err = new NoSuitableCalibrationError("arc", { cause: new Error("empty index") });
      const formatted = formatCliError(err, true);
      expect(formatted.startsWith(
        "No suitable arc calibration was found in the index [E_NO_CALIBRATION]\n  Cause: Error: empty index"
      )).toBe(true);
    });
  });
});
