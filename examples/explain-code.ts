/**
 * Explainer Example
 *
 * Plugs a stand-in explainer into the engine. A real one would call a
 * text-generation service with the request prompt.
 * Run with: npx tsx examples/explain-code.ts P0171
 */

import { explainCode, openDatabase, phraseProximityScorer, type Explainer } from "@dtcref/sdk";

const echoExplainer: Explainer = {
  async explain(request) {
    return `Prompt sent for ${request.code}:\n${request.prompt}`;
  },
};

async function main(): Promise<void> {
  const code = process.argv[2] ?? "P0300";
  const engine = await openDatabase({ scorer: phraseProximityScorer });

  console.log(await explainCode(engine, echoExplainer, code));

  console.log("\nRelated codes:");
  const record = engine.lookupByCode(code);
  for (const hit of engine.search(record.description, { limit: 4 })) {
    if (hit.record.code !== record.code) {
      console.log(`  ${hit.record.code} (score ${hit.score}) ${hit.record.description}`);
    }
  }
}

main().catch((err: unknown) => {
  console.error("❌ Error:", err);
  process.exit(1);
});
