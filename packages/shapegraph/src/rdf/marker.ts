import { DCTERMS, OWL, RDF } from "../ontology/constants";
import { generateId } from "../utils";
import { type Project } from "./project";
import {
  iriTerm,
  literalText,
  type Statement,
  statement,
  stringLiteral,
} from "./terms";

// ============================================================
// Snapshot Marker
// ============================================================

/**
 * Opaque version token of a stored data model, `"<version>:<token>"`.
 * The version advances by one per successful commit.
 */
export type SnapshotMarker = string;

export type ParsedMarker = Readonly<{ version: number; token: string }>;

const MARKER_PATTERN = /^(\d+):(\S+)$/;

export function parseMarker(marker: SnapshotMarker): ParsedMarker | undefined {
  const match = MARKER_PATTERN.exec(marker);
  if (match?.[1] === undefined || match[2] === undefined) return undefined;
  return { version: Number(match[1]), token: match[2] };
}

export function formatMarker(marker: ParsedMarker): SnapshotMarker {
  return `${marker.version}:${marker.token}`;
}

/**
 * Marker that follows `previous`; a project never committed starts at 1.
 */
export function nextMarker(
  previous: SnapshotMarker | undefined,
  token: string = generateId(),
): SnapshotMarker {
  const version =
    previous === undefined ? 0 : (parseMarker(previous)?.version ?? 0);
  return formatMarker({ version: version + 1, token });
}

// ============================================================
// Marker Statements
// ============================================================

/**
 * Statements carrying the marker in the constraint graph.
 */
export function constraintMarkerStatements(
  project: Project,
  marker: SnapshotMarker | undefined,
): readonly Statement[] {
  if (marker === undefined) return [];
  return [
    statement(
      iriTerm(project.shapesSubject),
      DCTERMS.hasVersion,
      stringLiteral(marker),
    ),
  ];
}

/**
 * Statements carrying the marker in the inference graph, including the
 * ontology header.
 */
export function inferenceMarkerStatements(
  project: Project,
  marker: SnapshotMarker | undefined,
): readonly Statement[] {
  if (marker === undefined) return [];
  const subject = iriTerm(project.ontologySubject);
  return [
    statement(subject, RDF.type, iriTerm(OWL.Ontology)),
    statement(subject, OWL.versionInfo, stringLiteral(marker)),
  ];
}

/**
 * Whether a statement is part of a graph's marker group.
 */
export function isMarkerStatement(project: Project, value: Statement): boolean {
  const subject = value.subject.value;
  return (
    value.subject.termType === "NamedNode" &&
    (subject === project.shapesSubject || subject === project.ontologySubject)
  );
}

/**
 * Marker recorded in a graph's statements, if any.
 */
export function readMarker(
  project: Project,
  statements: readonly Statement[],
): SnapshotMarker | undefined {
  for (const value of statements) {
    if (value.subject.termType !== "NamedNode") continue;
    const subject = value.subject.value;
    const predicate = value.predicate.value;
    if (
      (subject === project.shapesSubject && predicate === DCTERMS.hasVersion) ||
      (subject === project.ontologySubject && predicate === OWL.versionInfo)
    ) {
      return literalText(value.object);
    }
  }
  return undefined;
}
