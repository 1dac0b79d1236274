/**
 * Unit tests for QueryEngine
 */

import { describe, it, expect, beforeEach } from "vitest";
import { SAMPLE_CORPUS, MINIMAL_CORPUS } from "@dtcref/testkit";
import { QueryEngine } from "./query.js";
import { RecordStore } from "./store.js";
import { InvalidQueryError, NotFoundError } from "./errors.js";
import { phraseProximityScorer } from "./scoring.js";
import { metrics } from "./observability/metrics.js";
import type { SearchHit } from "./types.js";

function ranked(hits: SearchHit[]): Array<[string, number]> {
  return hits.map((hit) => [hit.record.code, hit.score]);
}

describe("QueryEngine", () => {
  let engine: QueryEngine;

  beforeEach(() => {
    metrics.reset();
    engine = new QueryEngine(RecordStore.load(SAMPLE_CORPUS));
  });

  describe("lookupByCode", () => {
    it("should return the stored record", () => {
      const record = engine.lookupByCode("P0300");
      expect(record.description).toBe("Random/Multiple Cylinder Misfire Detected");
      expect(record.severity).toBe("High");
      expect(record.system).toBe("Engine");
    });

    it("should ignore case and surrounding whitespace", () => {
      expect(engine.lookupByCode(" p0300 ")).toBe(engine.lookupByCode("P0300"));
    });

    it("should throw NotFoundError with the normalized code", () => {
      expect(() => engine.lookupByCode("p9999")).toThrow(NotFoundError);
      expect(() => engine.lookupByCode("p9999")).toThrow("Code not found: P9999");
    });

    it("should treat malformed codes as not found", () => {
      expect(() => engine.lookupByCode("not-a-code")).toThrow(NotFoundError);
    });

    it("should track hits and misses", () => {
      engine.lookupByCode("P0300");
      expect(() => engine.lookupByCode("P9999")).toThrow();

      expect(metrics.getMetrics("lookup")).toMatchObject({ hitCount: 1, missCount: 1 });
      expect(metrics.getHitRate("lookup")).toBe(0.5);
    });
  });

  describe("find", () => {
    it("should return undefined instead of throwing", () => {
      expect(engine.find("P9999")).toBeUndefined();
      expect(engine.find("u0100")?.code).toBe("U0100");
    });
  });

  describe("filter", () => {
    const codes = (criteria: Parameters<QueryEngine["filter"]>[0]) =>
      engine.filter(criteria).map((record) => record.code);

    it("should filter by system case-insensitively", () => {
      expect(codes({ system: "Engine" })).toEqual(["P0300"]);
      expect(codes({ system: "engine" })).toEqual(["P0300"]);
      expect(codes({ system: "  FUEL   system " })).toEqual(["P0171"]);
    });

    it("should filter by severity in code order", () => {
      expect(codes({ severity: "High" })).toEqual(["C0035", "P0300"]);
      expect(codes({ severity: "low" })).toEqual(["B1318"]);
    });

    it("should intersect criteria", () => {
      expect(codes({ system: "ABS", severity: "High" })).toEqual(["C0035"]);
      expect(codes({ system: "ABS", severity: "Low" })).toEqual([]);
    });

    it("should filter by minimum severity", () => {
      expect(codes({ minSeverity: "High" })).toEqual(["C0035", "P0300", "U0100"]);
      expect(codes({ minSeverity: "Low" })).toEqual(engine.store.codes());
      expect(codes({ system: "Engine", minSeverity: "Critical" })).toEqual([]);
    });

    it("should return an empty list for an unknown system", () => {
      expect(codes({ system: "Transmission" })).toEqual([]);
    });

    it("should reject a filter without criteria", () => {
      expect(() => engine.filter({})).toThrow(InvalidQueryError);
      expect(() => engine.filter({})).toThrow(
        "Invalid query: filter needs a system, severity or minSeverity"
      );
    });

    it("should reject an unknown severity", () => {
      expect(() => engine.filter({ severity: "Severe" })).toThrow(
        'Invalid query: severity must be one of Low, Medium, High, Critical (got "Severe")'
      );
      expect(() => engine.filter({ minSeverity: "max" })).toThrow(InvalidQueryError);
    });

    it("should reject a blank system", () => {
      expect(() => engine.filter({ system: "   " })).toThrow("Invalid query: system must not be empty");
    });
  });

  describe("search", () => {
    it("should rank description matches above cause matches", () => {
      expect(ranked(engine.search("sensor"))).toEqual([
        ["C0035", 3],
        ["P0171", 2],
      ]);
    });

    it("should break ties by code", () => {
      expect(ranked(engine.search("fuel"))).toEqual([
        ["P0171", 2],
        ["P0300", 2],
      ]);
      expect(ranked(engine.search("wiring"))).toEqual([
        ["C0035", 2],
        ["U0100", 2],
      ]);
    });

    it("should add the scores of every matched token", () => {
      expect(ranked(engine.search("fuel misfire"))).toEqual([
        ["P0300", 5],
        ["P0171", 2],
      ]);
    });

    it("should count a repeated query word once", () => {
      expect(ranked(engine.search("misfire MISFIRE"))).toEqual([["P0300", 3]]);
    });

    it("should be case-insensitive", () => {
      expect(ranked(engine.search("BATTERY"))).toEqual([["B1318", 3]]);
    });

    it("should return nothing when no token matches", () => {
      expect(engine.search("transmission")).toEqual([]);
      expect(engine.search("a")).toEqual([]);
      expect(engine.search("   ")).toEqual([]);
    });

    it("should apply a limit after ranking", () => {
      expect(ranked(engine.search("fuel misfire", { limit: 1 }))).toEqual([["P0300", 5]]);
    });

    it.each([0, -1, 1.5])("should reject limit %s", (limit) => {
      expect(() => engine.search("fuel", { limit })).toThrow(InvalidQueryError);
    });

    it("should use the configured scorer", () => {
      const phrase = new QueryEngine(engine.store, { scorer: phraseProximityScorer });
      expect(phrase.scorer.name).toBe("phrase-proximity");
      expect(ranked(phrase.search("fuel pressure"))).toEqual([
        ["P0300", 7],
        ["P0171", 2],
      ]);
      expect(ranked(engine.search("fuel pressure"))).toEqual([
        ["P0300", 4],
        ["P0171", 2],
      ]);
    });
  });

  describe("systems", () => {
    it("should list systems with counts ordered by label", () => {
      expect(engine.systems()).toEqual([
        { system: "ABS", count: 1 },
        { system: "Electrical", count: 1 },
        { system: "Engine", count: 1 },
        { system: "Fuel System", count: 1 },
        { system: "Network", count: 1 },
      ]);
    });
  });

  describe("stats", () => {
    it("should count records by severity, category and system", () => {
      expect(engine.stats()).toEqual({
        total: 5,
        bySeverity: { Low: 1, Medium: 1, High: 2, Critical: 1 },
        byCategory: { Powertrain: 2, Chassis: 1, Body: 1, Network: 1 },
        bySystem: { ABS: 1, Electrical: 1, Engine: 1, "Fuel System": 1, Network: 1 },
      });
    });
  });

  describe("reload", () => {
    it("should answer from the new store", () => {
      engine.reload(RecordStore.load(MINIMAL_CORPUS));

      expect(engine.size).toBe(2);
      expect(engine.find("C0035")).toBeUndefined();
      expect(engine.filter({ severity: "High" }).map((r) => r.code)).toEqual(["P0300"]);
      expect(engine.search("sensor").map((hit) => hit.record.code)).toEqual(["P0171"]);
    });
  });
});
