/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { joinKeywords, parseFormat, parsePositiveInt } from "../src/lib/arg.js";
import { InvalidArgumentError } from "commander";

describe("arg parsing", () => {
  describe("parsePositiveInt", () => {
    it("should parse valid positive integers", () => {
      expect(parsePositiveInt("1", "--limit")).toBe(1);
      expect(parsePositiveInt(" 25 ", "--limit")).toBe(25);
      expect(parsePositiveInt("10000", "--limit")).toBe(10000);
    });

    it("should reject zero, negatives and non-numbers", () => {
      for (const value of ["0", "-1", "abc", "1.5", ""]) {
        expect(() => parsePositiveInt(value, "--limit")).toThrow(InvalidArgumentError);
      }
      expect(() => parsePositiveInt("0", "--limit")).toThrow("--limit must be a positive integer");
    });

    it("should reject values > 10000", () => {
      expect(() => parsePositiveInt("10001", "--limit")).toThrow("--limit must be <= 10000");
    });
  });

  describe("parseFormat", () => {
    it("should accept known formats in any case", () => {
      expect(parseFormat("text")).toBe("text");
      expect(parseFormat("HTML")).toBe("html");
      expect(parseFormat(" json ")).toBe("json");
    });

    it("should reject unknown formats", () => {
      expect(() => parseFormat("xml")).toThrow(InvalidArgumentError);
      expect(() => parseFormat("xml")).toThrow("--format must be one of text, html, json");
    });
  });

  describe("joinKeywords", () => {
    it("should join variadic words with spaces", () => {
      expect(joinKeywords(["vacuum", "leak"])).toBe("vacuum leak");
      expect(joinKeywords([])).toBe("");
    });
  });
});
