import { describe, it, expect, vi } from "vitest";
import { MINIMAL_CORPUS } from "@dtcref/testkit";
import { buildExplainRequest, explainCode } from "./explain.js";
import { QueryEngine } from "./query.js";
import { RecordStore } from "./store.js";
import { NotFoundError } from "./errors.js";
import type { Explainer } from "./contracts/explainer.js";

const engine = new QueryEngine(RecordStore.load(MINIMAL_CORPUS));

describe("buildExplainRequest", () => {
  it("should describe the record in the prompt", () => {
    const request = buildExplainRequest(engine.lookupByCode("P0171"));

    expect(request.code).toBe("P0171");
    expect(request.prompt.split("\n")).toEqual([
      "Explain the powertrain diagnostic trouble code P0171 to a vehicle owner.",
      "Description: System Too Lean (Bank 1)",
      "Severity: Medium",
      "System: Fuel System",
      "Possible causes: Vacuum leak in intake manifold; Dirty mass airflow sensor; Weak fuel pump",
      "Recommended actions: Smoke test the intake; Clean the mass airflow sensor",
    ]);
  });

  it("should leave out empty lists", () => {
    const store = RecordStore.load("Error Code: U0100\nDescription: Lost Communication\nSeverity: Critical\nSystem: Network");
    const request = buildExplainRequest(new QueryEngine(store).lookupByCode("U0100"));
    expect(request.prompt.split("\n")).toHaveLength(4);
  });
});

describe("explainCode", () => {
  it("should send the request to the explainer", async () => {
    const explain = vi.fn(async () => "Your engine is misfiring.");
    const explainer: Explainer = { explain };

    await expect(explainCode(engine, explainer, "p0300")).resolves.toBe("Your engine is misfiring.");
    expect(explain).toHaveBeenCalledWith(buildExplainRequest(engine.lookupByCode("P0300")));
  });

  it("should not call the explainer for unknown codes", async () => {
    const explain = vi.fn(async () => "unused");

    await expect(explainCode(engine, { explain }, "P9999")).rejects.toThrow(NotFoundError);
    expect(explain).not.toHaveBeenCalled();
  });
});
