/**
 * Statement, delta and marker helpers.
 */
import { describe, expect, it } from "vitest";

import { ValidationError } from "../src/errors";
import { RDF, RDFS, SH } from "../src/ontology/constants";
import {
  constraintMarkerStatements,
  decodeStatement,
  decodeTerm,
  defineProject,
  describeDelta,
  diffStatements,
  encodeTerm,
  inferenceMarkerStatements,
  invertDelta,
  isEmptyDelta,
  isMarkerStatement,
  mergeDeltas,
  nextMarker,
  parseMarker,
  readMarker,
  statementKey,
} from "../src/rdf";
import {
  derivedBlankNode,
  iriTerm,
  langLiteral,
  statement,
  stringLiteral,
} from "../src/rdf/terms";
import { CONSTRAINT_GRAPH, EX, PROJECT } from "./test-utils";

const a = statement(iriTerm(`${EX}a`), RDF.type, iriTerm(SH.PropertyShape));
const b = statement(iriTerm(`${EX}b`), RDF.type, iriTerm(SH.PropertyShape));
const c = statement(iriTerm(`${EX}c`), RDFS.label, langLiteral("C", "en"));

// ============================================================
// Terms
// ============================================================

describe("term encoding", () => {
  it("writes terms in N-Triples form", () => {
    expect(encodeTerm(iriTerm(`${EX}a`))).toBe(`<${EX}a>`);
    expect(encodeTerm(langLiteral("Titel", "de"))).toBe('"Titel"@de');
    expect(encodeTerm(stringLiteral('say "hi"'))).toBe(
      '"say \\"hi\\""^^<http://www.w3.org/2001/XMLSchema#string>',
    );
  });

  it("reads back what it writes", () => {
    for (const term of [
      iriTerm(`${EX}a`),
      derivedBlankNode("hp", `${EX}A`, `${EX}b`),
      langLiteral("Titel", "de"),
      stringLiteral('line one\nline "two"\\'),
    ]) {
      expect(decodeTerm(encodeTerm(term)).equals(term)).toBe(true);
    }
  });

  it("rejects text that is not a term", () => {
    expect(() => decodeTerm("plain")).toThrow("Cannot decode term plain");
    expect(() =>
      decodeStatement('"lit"', `<${RDF.type}>`, `<${EX}a>`),
    ).toThrow(TypeError);
  });

  it("keys a statement by its three encoded terms", () => {
    expect(statementKey(a)).toBe(
      `<${EX}a> <${RDF.type}> <${SH.PropertyShape}>`,
    );
    expect(
      statementKey(decodeStatement(`<${EX}a>`, `<${RDF.type}>`, `<${SH.PropertyShape}>`)),
    ).toBe(statementKey(a));
  });

  it("names blank nodes after their owners", () => {
    const first = derivedBlankNode("hp", `${EX}Book`, `${EX}title`);

    expect(first.value).toMatch(/^hp_[0-9a-f]{12}$/);
    expect(derivedBlankNode("hp", `${EX}Book`, `${EX}title`).value).toBe(
      first.value,
    );
    expect(derivedBlankNode("hp", `${EX}Book`, `${EX}isbn`).value).not.toBe(
      first.value,
    );
  });
});

// ============================================================
// Deltas
// ============================================================

describe("statement deltas", () => {
  it("keeps only what differs, sorted", () => {
    const delta = diffStatements([c, a, b], [b, c, c]);

    expect(delta.removals.map((value) => statementKey(value))).toEqual([
      statementKey(a),
    ]);
    expect(delta.additions).toEqual([]);
  });

  it("drops duplicate additions", () => {
    const delta = diffStatements([], [b, a, b]);

    expect(delta.additions.map((value) => statementKey(value))).toEqual([
      statementKey(a),
      statementKey(b),
    ]);
  });

  it("inverts and merges deltas", () => {
    const delta = diffStatements([a], [b]);
    const inverse = invertDelta(delta);

    expect(inverse.removals).toEqual(delta.additions);
    expect(inverse.additions).toEqual(delta.removals);
    expect(isEmptyDelta(diffStatements([a], [a]))).toBe(true);
    expect(mergeDeltas(delta, inverse).removals).toHaveLength(2);
  });

  it("describes a delta line by line", () => {
    expect(describeDelta(CONSTRAINT_GRAPH, diffStatements([a], [b]))).toEqual({
      graph: CONSTRAINT_GRAPH,
      removals: [`${statementKey(a)} .`],
      additions: [`${statementKey(b)} .`],
    });
  });
});

// ============================================================
// Markers
// ============================================================

describe("snapshot markers", () => {
  it("parses version and token", () => {
    expect(parseMarker("3:abc")).toEqual({ version: 3, token: "abc" });
    expect(parseMarker("abc")).toBeUndefined();
  });

  it("advances the version by one", () => {
    expect(nextMarker(undefined, "t")).toBe("1:t");
    expect(nextMarker("4:x", "t")).toBe("5:t");
    expect(nextMarker("garbage", "t")).toBe("1:t");
    expect(nextMarker(undefined)).toMatch(/^1:\S+$/);
  });

  it("is written to and read from both graphs", () => {
    const constraint = constraintMarkerStatements(PROJECT, "2:x");
    const inference = inferenceMarkerStatements(PROJECT, "2:x");

    expect(constraint).toHaveLength(1);
    expect(inference).toHaveLength(2);
    expect(readMarker(PROJECT, constraint)).toBe("2:x");
    expect(readMarker(PROJECT, inference)).toBe("2:x");
    expect(readMarker(PROJECT, [a, b])).toBeUndefined();
    expect(constraintMarkerStatements(PROJECT, undefined)).toEqual([]);
  });

  it("recognizes marker statements by subject", () => {
    const [marker] = constraintMarkerStatements(PROJECT, "2:x");

    expect(marker && isMarkerStatement(PROJECT, marker)).toBe(true);
    expect(isMarkerStatement(PROJECT, a)).toBe(false);
  });
});

// ============================================================
// Projects
// ============================================================

describe("defineProject", () => {
  it("names the graphs and marker subjects after the namespace", () => {
    expect(PROJECT).toEqual({
      shortName: "library",
      namespace: "http://example.org/library/",
      constraintGraph: "http://example.org/library/shacl",
      inferenceGraph: "http://example.org/library/onto",
      shapesSubject: "http://example.org/library/shapes",
      ontologySubject: "http://example.org/library/ontology",
    });
  });

  it("rejects a bad short name or namespace", () => {
    expect(() =>
      defineProject({ shortName: "my library", namespace: EX }),
    ).toThrow(ValidationError);
    expect(() =>
      defineProject({ shortName: "library", namespace: "http://example.org" }),
    ).toThrow(ValidationError);
  });
});
