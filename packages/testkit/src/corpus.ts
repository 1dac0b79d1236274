/**
 * Corpus fixtures
 */

/**
 * One record as written into a text corpus
 */
export interface CorpusEntry {
  code: string;
  description: string;
  severity: string;
  system: string;
  causes?: string[];
  actions?: string[];
}

/**
 * Render one entry as a text corpus block
 */
export function corpusBlock(entry: CorpusEntry): string {
  const lines = [
    `Error Code: ${entry.code}`,
    `Description: ${entry.description}`,
    `Severity: ${entry.severity}`,
    `System: ${entry.system}`,
  ];

  if (entry.causes) {
    lines.push("Possible Causes:", ...entry.causes.map((cause) => `  - ${cause}`));
  }
  if (entry.actions) {
    lines.push("Recommended Actions:", ...entry.actions.map((action) => `  - ${action}`));
  }

  return lines.join("\n");
}

/**
 * Render entries as a text corpus, blocks separated by blank lines
 */
export function corpusText(entries: readonly CorpusEntry[]): string {
  return entries.map(corpusBlock).join("\n\n") + "\n";
}

export const P0300: CorpusEntry = {
  code: "P0300",
  description: "Random/Multiple Cylinder Misfire Detected",
  severity: "High",
  system: "Engine",
  causes: [
    "Spark plug issues",
    "Faulty ignition coils",
    "Vacuum leaks",
    "Low fuel pressure",
    "Clogged fuel injectors",
  ],
  actions: ["Inspect spark plugs", "Check for vacuum leaks", "Test fuel pressure"],
};

export const P0171: CorpusEntry = {
  code: "P0171",
  description: "System Too Lean (Bank 1)",
  severity: "Medium",
  system: "Fuel System",
  causes: ["Vacuum leak in intake manifold", "Dirty mass airflow sensor", "Weak fuel pump"],
  actions: ["Smoke test the intake", "Clean the mass airflow sensor"],
};

export const C0035: CorpusEntry = {
  code: "C0035",
  description: "Left Front Wheel Speed Sensor Circuit",
  severity: "High",
  system: "ABS",
  causes: ["Damaged wheel speed sensor", "Broken sensor wiring"],
  actions: ["Inspect sensor wiring", "Replace the wheel speed sensor"],
};

export const U0100: CorpusEntry = {
  code: "U0100",
  description: "Lost Communication With ECM",
  severity: "Critical",
  system: "Network",
  causes: ["Open CAN bus wiring", "ECM without power"],
  actions: ["Check ECM power and ground"],
};

export const B1318: CorpusEntry = {
  code: "B1318",
  description: "Battery Voltage Low",
  severity: "Low",
  system: "Electrical",
  causes: ["Discharged battery"],
  actions: ["Charge the battery"],
};

/**
 * Five records, one per system, covering every severity and category
 */
export const SAMPLE_ENTRIES: readonly CorpusEntry[] = [P0300, P0171, C0035, U0100, B1318];

/**
 * P0300 (High) and P0171 (Medium)
 */
export const MINIMAL_ENTRIES: readonly CorpusEntry[] = [P0300, P0171];

export const SAMPLE_CORPUS = corpusText(SAMPLE_ENTRIES);
export const MINIMAL_CORPUS = corpusText(MINIMAL_ENTRIES);
