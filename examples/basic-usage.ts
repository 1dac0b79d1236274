/**
 * Basic Usage Example
 *
 * Looks up, filters and searches the bundled corpus.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { openDatabase, NotFoundError } from "@dtcref/sdk";

async function main(): Promise<void> {
  console.log("📂 Opening bundled corpus...");
  const engine = await openDatabase();
  console.log(`✅ Loaded ${engine.size} codes`);

  // Lookup is case-insensitive
  console.log("\n🔎 Looking up p0300...");
  const record = engine.lookupByCode("p0300");
  console.log(`   ${record.code}: ${record.description}`);
  console.log(`   Severity: ${record.severity}, System: ${record.system}`);
  console.log(`   Causes: ${record.causes.join(", ")}`);

  try {
    engine.lookupByCode("P9999");
  } catch (err) {
    if (!(err instanceof NotFoundError)) throw err;
    console.log(`   ${err.message}`);
  }

  console.log("\n📋 High or Critical codes in the Engine system...");
  for (const match of engine.filter({ system: "engine", minSeverity: "High" })) {
    console.log(`   ${match.code} [${match.severity}] ${match.description}`);
  }

  console.log("\n🔍 Searching for 'vacuum leak'...");
  for (const hit of engine.search("vacuum leak", { limit: 5 })) {
    console.log(`   ${hit.record.code} (score ${hit.score}) ${hit.record.description}`);
  }

  console.log("\n📊 Codes per system:");
  for (const { system, count } of engine.systems()) {
    console.log(`   ${system}: ${count}`);
  }
}

main().catch((err: unknown) => {
  console.error("❌ Error:", err);
  process.exit(1);
});
