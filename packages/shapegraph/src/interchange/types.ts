/**
 * Interchange types.
 *
 * Schema graphs travel as TriG: one named graph block per stored graph.
 */
import { z } from "zod";

import { type Statement } from "../rdf/terms";

/**
 * Media type written and read by this module.
 */
export const TRIG_FORMAT = "application/trig" as const;

/**
 * Statements of one named graph.
 */
export type GraphStatements = Readonly<{
  graph: string;
  statements: readonly Statement[];
}>;

// ============================================================
// Export Options
// ============================================================

export const TrigExportOptionsSchema = z.strictObject({
  /** Extra prefix → namespace entries; the standard ones are always written */
  prefixes: z.record(z.string(), z.string()).optional(),
});

export type TrigExportOptions = z.infer<typeof TrigExportOptionsSchema>;

// ============================================================
// Import Options
// ============================================================

export const TrigImportOptionsSchema = z.strictObject({
  /** Only import these graphs; default is every named graph in the document */
  graphs: z.array(z.string().min(1)).optional(),
  /** Remove what the graphs hold before adding (default: false) */
  replace: z.boolean().optional(),
});

export type TrigImportOptions = z.infer<typeof TrigImportOptionsSchema>;

export type GraphImportResult = Readonly<{
  graph: string;
  removed: number;
  added: number;
}>;

export type TrigImportResult = Readonly<{
  graphs: readonly GraphImportResult[];
  /** Statements outside any named graph, which are not imported */
  skipped: number;
}>;
