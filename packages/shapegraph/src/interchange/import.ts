/**
 * TriG import into a store.
 *
 * Used to seed stores and to restore exported graphs. The documents
 * are written to the store as given: nothing checks that the two
 * graphs of a project agree until the project is loaded.
 */
import { Parser, type Quad } from "n3";

import { ValidationError } from "../errors";
import { validateInput } from "../errors/validation";
import { applyDeltaOrThrow, readGraphOrThrow } from "../gateway/calls";
import { failureReason, type StoreGateway } from "../gateway/types";
import { diffStatements } from "../rdf/delta";
import { type Statement, statement } from "../rdf/terms";
import {
  type GraphImportResult,
  type GraphStatements,
  TRIG_FORMAT,
  type TrigImportOptions,
  TrigImportOptionsSchema,
  type TrigImportResult,
} from "./types";

const DEFAULT_GRAPH = "";

// ============================================================
// Parser
// ============================================================

function invalidDocument(message: string, cause?: unknown): ValidationError {
  return new ValidationError(
    `Invalid TriG document: ${message}`,
    { entity: "document", issues: [{ path: "trig", message }] },
    { cause },
  );
}

function toStatement(value: Quad): Statement {
  const { subject, predicate, object } = value;
  if (subject.termType !== "NamedNode" && subject.termType !== "BlankNode") {
    throw invalidDocument(`unsupported subject ${subject.termType}`);
  }
  if (
    object.termType !== "NamedNode" &&
    object.termType !== "BlankNode" &&
    object.termType !== "Literal"
  ) {
    throw invalidDocument(`unsupported object ${object.termType}`);
  }
  return statement(subject, predicate.value, object);
}

/**
 * Parses a TriG document into its graphs, in document order.
 * Statements outside any named graph are grouped under `""`.
 * Blank node labels are kept as written.
 *
 * @throws ValidationError when the document does not parse
 */
export function parseTrig(text: string): readonly GraphStatements[] {
  const parser = new Parser({ format: TRIG_FORMAT, blankNodePrefix: "" });
  let quads: Quad[];
  try {
    quads = parser.parse(text);
  } catch (error) {
    throw invalidDocument(failureReason(error), error);
  }

  const graphs = new Map<string, Statement[]>();
  for (const value of quads) {
    const graph =
      value.graph.termType === "DefaultGraph" ? DEFAULT_GRAPH : (
        value.graph.value
      );
    const statements = graphs.get(graph) ?? [];
    statements.push(toStatement(value));
    graphs.set(graph, statements);
  }
  return [...graphs].map(([graph, statements]) => ({ graph, statements }));
}

// ============================================================
// Import
// ============================================================

/**
 * Adds the named graphs of a TriG document to a store, one delta per graph.
 *
 * @throws ValidationError when the document does not parse
 * @throws StoreUnavailableError when a graph cannot be read or written
 *
 * @example
 * ```typescript
 * await importTrig(gateway, text, { replace: true });
 * const model = await DataModel.load(gateway, project);
 * ```
 */
export async function importTrig(
  gateway: StoreGateway,
  text: string,
  options: TrigImportOptions = {},
): Promise<TrigImportResult> {
  const parsed = validateInput(TrigImportOptionsSchema, options, {
    entity: "document",
  });
  const wanted =
    parsed.graphs === undefined ? undefined : new Set(parsed.graphs);

  const results: GraphImportResult[] = [];
  let skipped = 0;
  for (const { graph, statements } of parseTrig(text)) {
    if (graph === DEFAULT_GRAPH) {
      skipped += statements.length;
      continue;
    }
    if (wanted !== undefined && !wanted.has(graph)) continue;

    const current = await readGraphOrThrow(gateway, graph);
    const delta = diffStatements(current, statements);
    const removals = parsed.replace === true ? delta.removals : [];
    await applyDeltaOrThrow(gateway, graph, {
      removals,
      additions: delta.additions,
    });
    results.push({
      graph,
      removed: removals.length,
      added: delta.additions.length,
    });
  }
  return { graphs: results, skipped };
}
