/** On-disk shape of the shared memory document. */
import { z } from "zod";
import { OBJECT_KINDS } from "../types.js";

export const MEMORY_DOCUMENT_VERSION = 1;

const SchemaEntrySchema = z.object({
  exists: z.boolean(),
  updatedAt: z.string(),
});

const TableMappingEntrySchema = z.object({
  targetSchema: z.string(),
  targetName: z.string(),
  updatedAt: z.string(),
});

const SolutionEntrySchema = z.object({
  solution: z.string(),
  provenance: z.enum(["memory", "web-search", "translator"]),
  recordedAt: z.string(),
});

const PatternEntrySchema = z.object({
  kind: z.enum(OBJECT_KINDS),
  objectName: z.string(),
  outcome: z.enum(["success", "failure"]),
  fixSummary: z.string(),
  timestamp: z.string(),
});

export const MemoryDocumentSchema = z.object({
  version: z.literal(MEMORY_DOCUMENT_VERSION),
  last_updated: z.string().nullable(),
  schemas: z.record(SchemaEntrySchema),
  identity_columns: z.record(z.array(z.string())),
  table_mappings: z.record(TableMappingEntrySchema),
  error_solutions: z.record(z.array(SolutionEntrySchema)),
  patterns: z.array(PatternEntrySchema),
});

export type MemoryDocument = z.infer<typeof MemoryDocumentSchema>;
export type SchemaEntry = z.infer<typeof SchemaEntrySchema>;
export type TableMappingEntry = z.infer<typeof TableMappingEntrySchema>;

export function emptyMemoryDocument(): MemoryDocument {
  return {
    version: MEMORY_DOCUMENT_VERSION,
    last_updated: null,
    schemas: {},
    identity_columns: {},
    table_mappings: {},
    error_solutions: {},
    patterns: [],
  };
}
