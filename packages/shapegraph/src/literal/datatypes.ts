/**
 * Supported literal datatypes.
 *
 * The table lives in datatypes.json; each entry carries the datatype's
 * category, its lexical pattern and, for the bounded integer types,
 * the value range as decimal strings.
 */

import { z } from "zod";

import { type Iri, resolveIri } from "../identifier";
import { RDF } from "../ontology/constants";
import datatypeTable from "./datatypes.json";

// ============================================================
// Types
// ============================================================

export type DatatypeCategory =
  | "string"
  | "numeric"
  | "temporal"
  | "boolean"
  | "other";

export type DatatypeInfo = Readonly<{
  iri: Iri;
  /** Qualified name, e.g. "xsd:integer" */
  name: string;
  category: DatatypeCategory;
  lexical: RegExp;
  min?: bigint;
  max?: bigint;
}>;

// ============================================================
// Table
// ============================================================

const datatypeEntrySchema = z.object({
  name: z.string().min(1),
  category: z.enum(["string", "numeric", "temporal", "boolean", "other"]),
  pattern: z.string(),
  min: z.string().regex(/^-?\d+$/).optional(),
  max: z.string().regex(/^-?\d+$/).optional(),
});

function buildRegistry(): ReadonlyMap<string, DatatypeInfo> {
  const entries = z.array(datatypeEntrySchema).parse(datatypeTable);
  const registry = new Map<string, DatatypeInfo>();
  for (const entry of entries) {
    const iri = resolveIri(entry.name);
    registry.set(
      iri,
      Object.freeze({
        iri,
        name: entry.name,
        category: entry.category,
        lexical: new RegExp(entry.pattern),
        ...(entry.min !== undefined && { min: BigInt(entry.min) }),
        ...(entry.max !== undefined && { max: BigInt(entry.max) }),
      }),
    );
  }
  return registry;
}

const DATATYPES = buildRegistry();

// ============================================================
// Lookup
// ============================================================

/**
 * Returns the datatype entry for an identifier, or undefined if unsupported.
 */
export function getDatatype(datatype: string): DatatypeInfo | undefined {
  return DATATYPES.get(datatype);
}

/**
 * Lists every supported datatype identifier.
 */
export function supportedDatatypes(): readonly Iri[] {
  return [...DATATYPES.values()].map((info) => info.iri);
}

export function datatypeCategory(
  datatype: string,
): DatatypeCategory | undefined {
  return DATATYPES.get(datatype)?.category;
}

export function isStringLike(datatype: string | undefined): boolean {
  return datatype !== undefined && datatypeCategory(datatype) === "string";
}

export function isNumeric(datatype: string | undefined): boolean {
  return datatype !== undefined && datatypeCategory(datatype) === "numeric";
}

export function isLangString(datatype: string | undefined): boolean {
  return datatype === RDF.langString;
}

/**
 * Whether values of the two datatypes can be ordered against each other.
 *
 * Numeric types compare across the family; string-like types compare
 * lexicographically; temporal types only with themselves.
 */
export function areComparable(left: string, right: string): boolean {
  const leftCategory = datatypeCategory(left);
  const rightCategory = datatypeCategory(right);
  if (leftCategory === undefined || rightCategory === undefined) return false;
  if (leftCategory !== rightCategory) return false;
  switch (leftCategory) {
    case "numeric":
    case "string": {
      return true;
    }
    case "temporal": {
      return left === right;
    }
    case "boolean":
    case "other": {
      return false;
    }
  }
}
