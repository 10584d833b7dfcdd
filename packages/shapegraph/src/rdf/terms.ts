import { createHash } from "node:crypto";

import {
  type BlankNode,
  DataFactory,
  type Literal,
  type NamedNode,
  type Quad,
  type Term,
} from "n3";

import { type Iri, isIri } from "../identifier";
import { formatTypedValue, type TypedValue } from "../literal";
import { RDF, XSD_NS } from "../ontology/constants";

const { namedNode, blankNode, literal, quad } = DataFactory;

// ============================================================
// Types
// ============================================================

/**
 * One schema statement. Statements are kept in the default graph; the
 * graph they belong to is carried by the gateway call.
 */
export type Statement = Quad;

export type StatementSubject = NamedNode | BlankNode;
export type StatementObject = NamedNode | BlankNode | Literal;

const XSD_STRING = `${XSD_NS}string`;
const XSD_INTEGER = `${XSD_NS}integer`;
const XSD_BOOLEAN = `${XSD_NS}boolean`;
const XSD_NON_NEGATIVE_INTEGER = `${XSD_NS}nonNegativeInteger`;
const XSD_DATE_TIME = `${XSD_NS}dateTime`;

// ============================================================
// Term Construction
// ============================================================

export function iriTerm(iri: string): NamedNode {
  return namedNode(iri);
}

export function typedLiteral(value: TypedValue): Literal {
  return literal(value.lexical, value.language ?? namedNode(value.datatype));
}

export function stringLiteral(value: string): Literal {
  return literal(value, namedNode(XSD_STRING));
}

export function langLiteral(value: string, language: string): Literal {
  return literal(value, language);
}

export function integerLiteral(value: number): Literal {
  return literal(String(value), namedNode(XSD_INTEGER));
}

export function nonNegativeIntegerLiteral(value: number): Literal {
  return literal(String(value), namedNode(XSD_NON_NEGATIVE_INTEGER));
}

export function dateTimeLiteral(lexical: string): Literal {
  return literal(lexical, namedNode(XSD_DATE_TIME));
}

export function booleanLiteral(value: boolean): Literal {
  return literal(String(value), namedNode(XSD_BOOLEAN));
}

export function statement(
  subject: StatementSubject,
  predicate: string,
  object: StatementObject,
): Statement {
  return quad(subject, namedNode(predicate), object);
}

// ============================================================
// Blank Node Labels
// ============================================================

/**
 * Deterministic blank node derived from the identifiers that own it,
 * so the same model always yields the same statements.
 */
export function derivedBlankNode(kind: string, ...owners: string[]): BlankNode {
  const digest = createHash("sha256")
    .update(owners.join("|"))
    .digest("hex")
    .slice(0, 12);
  return blankNode(`${kind}_${digest}`);
}

// ============================================================
// Term Inspection
// ============================================================

export function asIri(term: Term): Iri | undefined {
  if (term.termType !== "NamedNode") return undefined;
  return isIri(term.value) ? term.value : undefined;
}

export function literalText(term: Term): string | undefined {
  return term.termType === "Literal" ? term.value : undefined;
}

export function literalInteger(term: Term): number | undefined {
  if (term.termType !== "Literal") return undefined;
  if (!/^[+-]?\d+$/.test(term.value)) return undefined;
  return Number(term.value);
}

export function literalBoolean(term: Term): boolean | undefined {
  if (term.termType !== "Literal") return undefined;
  if (term.value === "true" || term.value === "1") return true;
  if (term.value === "false" || term.value === "0") return false;
  return undefined;
}

/**
 * Lexical form and datatype of a literal. Language-tagged literals
 * report `rdf:langString`.
 */
export function literalValue(term: Term): TypedValue | undefined {
  if (term.termType !== "Literal") return undefined;
  const datatype = term.language ? RDF.langString : term.datatype.value;
  if (!isIri(datatype)) return undefined;
  return Object.freeze({
    lexical: term.value,
    datatype,
    ...(term.language !== "" && { language: term.language }),
  });
}

// ============================================================
// Encoding
// ============================================================

/**
 * N-Triples form of a term, used as the stored column value and as
 * the sort key of statements.
 */
export function encodeTerm(term: Term): string {
  switch (term.termType) {
    case "NamedNode": {
      return `<${term.value}>`;
    }
    case "BlankNode": {
      return `_:${term.value}`;
    }
    case "Literal": {
      return formatTypedValue({
        lexical: term.value,
        datatype: namedIri(term.datatype.value),
        ...(term.language !== "" && { language: term.language }),
      });
    }
    default: {
      throw new TypeError(`Cannot encode ${term.termType} terms`);
    }
  }
}

function namedIri(value: string): Iri {
  if (isIri(value)) return value;
  throw new TypeError(`"${value}" is not an absolute identifier`);
}

const NAMED = /^<([^>]*)>$/;
const BLANK = /^_:(\S+)$/;
const LITERAL = /^"((?:[^"\\]|\\.)*)"(?:@([A-Za-z0-9-]+)|\^\^<([^>]*)>)?$/s;

function unescapeLexical(value: string): string {
  return value.replaceAll(/\\(.)/g, (_, char: string) => {
    switch (char) {
      case "n": {
        return "\n";
      }
      case "r": {
        return "\r";
      }
      case "t": {
        return "\t";
      }
      default: {
        return char;
      }
    }
  });
}

/**
 * Inverse of `encodeTerm`.
 *
 * @throws TypeError when the text is not an encoded term
 */
export function decodeTerm(text: string): NamedNode | BlankNode | Literal {
  const named = NAMED.exec(text);
  if (named?.[1] !== undefined) return namedNode(named[1]);

  const blank = BLANK.exec(text);
  if (blank?.[1] !== undefined) return blankNode(blank[1]);

  const match = LITERAL.exec(text);
  if (match?.[1] !== undefined) {
    const lexical = unescapeLexical(match[1]);
    if (match[2] !== undefined) return literal(lexical, match[2]);
    return literal(lexical, namedNode(match[3] ?? XSD_STRING));
  }
  throw new TypeError(`Cannot decode term ${text}`);
}

/**
 * Rebuilds a statement from its three encoded columns.
 */
export function decodeStatement(
  subject: string,
  predicate: string,
  object: string,
): Statement {
  const decodedSubject = decodeTerm(subject);
  const decodedPredicate = decodeTerm(predicate);
  if (
    decodedSubject.termType === "Literal" ||
    decodedPredicate.termType !== "NamedNode"
  ) {
    throw new TypeError(`Malformed statement ${subject} ${predicate} ${object}`);
  }
  return quad(decodedSubject, decodedPredicate, decodeTerm(object));
}

/**
 * Stable identity of a statement within one graph.
 */
export function statementKey(value: Statement): string {
  return `${encodeTerm(value.subject)} ${encodeTerm(value.predicate)} ${encodeTerm(value.object)}`;
}

export function sortStatements(
  statements: readonly Statement[],
): readonly Statement[] {
  return statements
    .map((value) => ({ value, key: statementKey(value) }))
    .sort((left, right) => {
      if (left.key < right.key) return -1;
      if (left.key > right.key) return 1;
      return 0;
    })
    .map(({ value }) => value);
}
