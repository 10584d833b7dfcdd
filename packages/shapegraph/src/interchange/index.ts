/**
 * Interchange Module
 *
 * TriG export and import of schema graphs. Use this module to:
 *
 * - Export a data model or the stored graphs for review or backup
 * - Seed a store from a TriG document
 * - Move a project's graphs between stores
 *
 * @example
 * ```typescript
 * import { exportStoredGraphs, importTrig } from "shapegraph/interchange";
 *
 * const backup = await exportStoredGraphs(gateway, project);
 * await importTrig(otherGateway, backup, { replace: true });
 * ```
 */

// ============================================================
// Types & Schemas
// ============================================================

export {
  type GraphImportResult,
  type GraphStatements,
  TRIG_FORMAT,
  type TrigExportOptions,
  TrigExportOptionsSchema,
  type TrigImportOptions,
  TrigImportOptionsSchema,
  type TrigImportResult,
} from "./types";

// ============================================================
// Functions
// ============================================================

export {
  exportStoredGraphs,
  modelToTrig,
  type ModelTrigOptions,
  writeTrig,
} from "./export";
export { importTrig, parseTrig } from "./import";
