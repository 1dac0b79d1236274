/**
 * Zod schemas for JSON-encoded corpora
 * Only the shape is checked here; codes, severities and descriptions are
 * validated the same way for every corpus format.
 */

import { z } from "zod";

const ItemListSchema = z.array(z.string()).default([]);

export const JsonRecordSchema = z
  .object({
    code: z.string(),
    description: z.string(),
    severity: z.string(),
    system: z.string(),
    causes: ItemListSchema,
    actions: ItemListSchema,
  })
  .strict();

export const JsonCorpusSchema = z.array(JsonRecordSchema);

export type JsonRecord = z.infer<typeof JsonRecordSchema>;
