/**
 * Shared test helpers
 */

export * from "./corpus.js";
export * from "./fs.js";
export * from "./cli.js";
