/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { InvalidQueryError, LoadError, NotFoundError } from "@dtcref/sdk";
import { CliError, mapSdkErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("not found", { exitCode: 2 });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapSdkErrorToExitCode", () => {
    it("should map NotFoundError to exit code 2", () => {
      expect(mapSdkErrorToExitCode(new NotFoundError("P9999"))).toBe(2);
    });

    it("should map InvalidQueryError to exit code 3", () => {
      expect(mapSdkErrorToExitCode(new InvalidQueryError("filter needs a system"))).toBe(3);
    });

    it("should map LoadError to exit code 4", () => {
      expect(mapSdkErrorToExitCode(new LoadError(3, "bad", "syntax"))).toBe(4);
      expect(mapSdkErrorToExitCode(new LoadError(0, "cannot read file", "io", "/tmp/x.txt"))).toBe(4);
    });

    it("should map usage errors to exit code 1", () => {
      expect(mapSdkErrorToExitCode(new InvalidArgumentError("--limit must be a positive integer"))).toBe(1);
    });

    it("should use the CliError exit code", () => {
      expect(mapSdkErrorToExitCode(new CliError("write failed", { exitCode: 1 }))).toBe(1);
    });

    it("should default to 1 for unknown errors", () => {
      expect(mapSdkErrorToExitCode(new Error("boom"))).toBe(1);
      expect(mapSdkErrorToExitCode("string error")).toBe(1);
      expect(mapSdkErrorToExitCode(undefined)).toBe(1);
    });

    it("should match by class, not by name", () => {
      const err = new Error("not found");
      err.name = "NotFoundError";
      expect(mapSdkErrorToExitCode(err)).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should return the message", () => {
      expect(formatCliError(new NotFoundError("P9999"))).toBe("Code not found: P9999");
    });

    it("should truncate long messages", () => {
      const message = formatCliError(new Error("x".repeat(2500)));
      expect(message).toHaveLength(2000 + "... (truncated)".length);
      expect(message.endsWith("... (truncated)")).toBe(true);
    });

    it("should include cause and stack when verbose", () => {
      const err = new CliError("write failed", { cause: new Error("EACCES") });
      const message = formatCliError(err, true);

      expect(message.startsWith("write failed\n  Cause: Error: EACCES\n")).toBe(true);
      expect(message).toContain(err.stack ?? "missing stack");
    });

    it("should stringify non-errors", () => {
      expect(formatCliError("plain")).toBe("plain");
      expect(formatCliError(42)).toBe("42");
    });
  });
});
