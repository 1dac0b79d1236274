/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { defaultCorpusPath } from "@dtcref/sdk";
import { expandTilde, isVerbose, resolveCorpusPath } from "../src/lib/env.js";

describe("environment resolution", () => {
  let originalCorpus: string | undefined;
  let originalDebug: string | undefined;

  beforeEach(() => {
    originalCorpus = process.env.DTCREF_CORPUS;
    originalDebug = process.env.DTCREF_CLI_DEBUG;
  });

  afterEach(() => {
    restore("DTCREF_CORPUS", originalCorpus);
    restore("DTCREF_CLI_DEBUG", originalDebug);
  });

  function restore(name: string, value: string | undefined): void {
    if (value !== undefined) {
      process.env[name] = value;
    } else {
      delete process.env[name];
    }
  }

  describe("resolveCorpusPath", () => {
    it("should use CLI option when provided", () => {
      process.env.DTCREF_CORPUS = "/env/codes.txt";
      expect(resolveCorpusPath("/cli/codes.txt")).toBe(path.resolve("/cli/codes.txt"));
    });

    it("should use DTCREF_CORPUS when CLI option not provided", () => {
      process.env.DTCREF_CORPUS = "/env/codes.txt";
      expect(resolveCorpusPath()).toBe(path.resolve("/env/codes.txt"));
    });

    it("should fall back to the bundled corpus", () => {
      delete process.env.DTCREF_CORPUS;
      expect(resolveCorpusPath()).toBe(defaultCorpusPath());

      process.env.DTCREF_CORPUS = "  ";
      expect(resolveCorpusPath()).toBe(defaultCorpusPath());
    });

    it("should resolve relative paths to absolute", () => {
      const result = resolveCorpusPath("./my-codes.txt");
      expect(path.isAbsolute(result)).toBe(true);
      expect(result).toBe(path.resolve("my-codes.txt"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveCorpusPath("~/codes.txt")).toBe(path.join(homedir(), "codes.txt"));
    });
  });

  describe("expandTilde", () => {
    it("should only expand the current user's home", () => {
      expect(expandTilde("~")).toBe(homedir());
      expect(expandTilde("~other/codes.txt")).toBe("~other/codes.txt");
      expect(expandTilde("/abs/~/codes.txt")).toBe("/abs/~/codes.txt");
    });
  });

  describe("isVerbose", () => {
    it("should read DTCREF_CLI_DEBUG", () => {
      process.env.DTCREF_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
      process.env.DTCREF_CLI_DEBUG = "0";
      expect(isVerbose()).toBe(false);
    });
  });
});
