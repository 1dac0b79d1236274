/**
 * Integration tests for loading corpus files from disk
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTempDir, removeDir, writeCorpusFile, SAMPLE_CORPUS } from "@dtcref/testkit";
import { defaultCorpusPath, loadCorpusFile, openDatabase } from "./database.js";
import { LoadError } from "./errors.js";
import { phraseProximityScorer } from "./scoring.js";

async function rejection(promise: Promise<unknown>): Promise<LoadError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof LoadError) return err;
    throw err;
  }
  throw new Error("expected a LoadError");
}

describe("database", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("should open a text corpus", async () => {
    const corpusPath = await writeCorpusFile(dir, "codes.txt", SAMPLE_CORPUS);
    const engine = await openDatabase({ corpusPath });

    expect(engine.size).toBe(5);
    expect(engine.lookupByCode("P0300").system).toBe("Engine");
    expect(engine.scorer.name).toBe("token-sum");
  });

  it("should detect JSON corpora by extension", async () => {
    const corpusPath = await writeCorpusFile(
      dir,
      "codes.json",
      JSON.stringify([{ code: "B1318", description: "Battery Voltage Low", severity: "Low", system: "Electrical" }])
    );

    const store = await loadCorpusFile(corpusPath);
    expect(store.codes()).toEqual(["B1318"]);
  });

  it("should honour an explicit format", async () => {
    const corpusPath = await writeCorpusFile(dir, "codes.data", SAMPLE_CORPUS);
    await expect(loadCorpusFile(corpusPath, "json")).rejects.toThrow(LoadError);
    expect((await loadCorpusFile(corpusPath, "text")).size).toBe(5);
  });

  it("should pass the scorer to the engine", async () => {
    const corpusPath = await writeCorpusFile(dir, "codes.txt", SAMPLE_CORPUS);
    const engine = await openDatabase({ corpusPath, scorer: phraseProximityScorer });
    expect(engine.scorer).toBe(phraseProximityScorer);
  });

  it("should report unreadable files as io errors", async () => {
    const err = await rejection(loadCorpusFile(`${dir}/missing.txt`));

    expect(err.kind).toBe("io");
    expect(err.line).toBe(0);
    expect(err.source).toBe(`${dir}/missing.txt`);
    expect(err.reason).toMatch(/^cannot read file: /);
    expect(err.message).toMatch(new RegExp(`^Failed to load corpus ${dir}/missing\\.txt: cannot read file`));
  });

  it("should attribute validation errors to the file", async () => {
    const corpusPath = await writeCorpusFile(
      dir,
      "bad.txt",
      "Error Code: P0300\nDescription: Misfire\nSeverity: Severe\nSystem: Engine\n"
    );

    const err = await rejection(openDatabase({ corpusPath }));
    expect(err.source).toBe(corpusPath);
    expect(err.line).toBe(3);
    expect(err.kind).toBe("unknown-severity");
    expect(err.message).toBe(
      `Failed to load corpus ${corpusPath} at line 3: unrecognized severity "Severe" for P0300 (expected Low, Medium, High, Critical)`
    );
  });

  it("should open the bundled corpus by default", async () => {
    expect(defaultCorpusPath()).toMatch(/codes\.txt$/);

    const engine = await openDatabase();
    expect(engine.size).toBe(20);
    expect(engine.lookupByCode("P0300").severity).toBe("High");
  });
});
