/**
 * TriG export of data models and stored graphs.
 */
import { DataFactory, Writer } from "n3";

import { validateInput } from "../errors/validation";
import { readGraphOrThrow } from "../gateway/calls";
import { type StoreGateway } from "../gateway/types";
import { type Model } from "../model/types";
import { STANDARD_PREFIXES } from "../ontology/constants";
import {
  constraintMarkerStatements,
  inferenceMarkerStatements,
  type SnapshotMarker,
} from "../rdf/marker";
import { type Project } from "../rdf/project";
import { serializeModel } from "../rdf/serialize";
import {
  type GraphStatements,
  TRIG_FORMAT,
  type TrigExportOptions,
  TrigExportOptionsSchema,
} from "./types";

const { namedNode, quad } = DataFactory;

// ============================================================
// Writer
// ============================================================

/**
 * Writes named graphs as a TriG document.
 *
 * @example
 * ```typescript
 * const text = await writeTrig(
 *   [{ graph: project.constraintGraph, statements }],
 *   { prefixes: { ex: "http://example.org/" } },
 * );
 * ```
 */
export function writeTrig(
  graphs: readonly GraphStatements[],
  options: TrigExportOptions = {},
): Promise<string> {
  const parsed = validateInput(TrigExportOptionsSchema, options, {
    entity: "document",
  });
  const writer = new Writer({
    format: TRIG_FORMAT,
    prefixes: { ...STANDARD_PREFIXES, ...parsed.prefixes },
  });

  for (const { graph, statements } of graphs) {
    const name = namedNode(graph);
    for (const value of statements) {
      writer.addQuad(quad(value.subject, value.predicate, value.object, name));
    }
  }

  return new Promise((resolve, reject) => {
    writer.end((error, result) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(result);
    });
  });
}

// ============================================================
// Model Export
// ============================================================

export type ModelTrigOptions = TrigExportOptions &
  Readonly<{
    /** Marker written into both graphs, as a commit would */
    marker?: SnapshotMarker;
    systemPredicates?: readonly string[];
  }>;

/**
 * Writes a model as the two graphs a commit would store.
 * The project's short name becomes the prefix of its namespace.
 */
export function modelToTrig(
  model: Model,
  project: Project,
  options: ModelTrigOptions = {},
): Promise<string> {
  const { marker, systemPredicates, prefixes } = options;
  const serialized = serializeModel(
    model,
    systemPredicates === undefined ? {} : { systemPredicates },
  );
  return writeTrig(
    [
      {
        graph: project.constraintGraph,
        statements: [
          ...constraintMarkerStatements(project, marker),
          ...serialized.constraint,
        ],
      },
      {
        graph: project.inferenceGraph,
        statements: [
          ...inferenceMarkerStatements(project, marker),
          ...serialized.inference,
        ],
      },
    ],
    { prefixes: { [project.shortName]: project.namespace, ...prefixes } },
  );
}

/**
 * Writes what the store currently holds for a project.
 *
 * @throws StoreUnavailableError when a graph cannot be read
 */
export async function exportStoredGraphs(
  gateway: StoreGateway,
  project: Project,
  options: TrigExportOptions = {},
): Promise<string> {
  const constraint = await readGraphOrThrow(gateway, project.constraintGraph);
  const inference = await readGraphOrThrow(gateway, project.inferenceGraph);
  return writeTrig(
    [
      { graph: project.constraintGraph, statements: constraint },
      { graph: project.inferenceGraph, statements: inference },
    ],
    {
      prefixes: { [project.shortName]: project.namespace, ...options.prefixes },
    },
  );
}
