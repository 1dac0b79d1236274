/**
 * Code explanations through an external Explainer
 */

import type { Explainer, ExplainRequest } from "./contracts/explainer.js";
import type { QueryEngine } from "./query.js";
import type { CodeRecord } from "./types.js";

/**
 * Build the request sent to an explainer for one record
 */
export function buildExplainRequest(record: CodeRecord): ExplainRequest {
  const lines = [
    `Explain the ${record.category.toLowerCase()} diagnostic trouble code ${record.code} to a vehicle owner.`,
    `Description: ${record.description}`,
    `Severity: ${record.severity}`,
    `System: ${record.system}`,
  ];
  if (record.causes.length > 0) {
    lines.push(`Possible causes: ${record.causes.join("; ")}`);
  }
  if (record.actions.length > 0) {
    lines.push(`Recommended actions: ${record.actions.join("; ")}`);
  }

  return { code: record.code, prompt: lines.join("\n") };
}

/**
 * Look up a code and ask the explainer about it
 * @throws NotFoundError if the code is not in the store
 */
export async function explainCode(
  engine: QueryEngine,
  explainer: Explainer,
  code: string
): Promise<string> {
  const record = engine.lookupByCode(code);
  return explainer.explain(buildExplainRequest(record));
}
