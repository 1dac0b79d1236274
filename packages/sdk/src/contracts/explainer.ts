/**
 * Explainer capability: an external text-generation service that explains a code
 */

export interface ExplainRequest {
  code: string;
  /** Prompt text describing the record */
  prompt: string;
}

export interface Explainer {
  explain(request: ExplainRequest): Promise<string>;
}
