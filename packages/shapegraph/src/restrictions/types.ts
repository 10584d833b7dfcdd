import { type Iri } from "../identifier";
import { type LiteralInput, type TypedValue } from "../literal";

// ============================================================
// Restriction Set
// ============================================================

/**
 * An enumeration member: a literal for datatype properties, an
 * identifier for properties with a target class.
 */
export type InValue = TypedValue | Iri;

/**
 * The constraint facets attached to a property, in normalized form.
 *
 * Built by `normalizeRestrictions()`; every identifier is absolute and
 * every enumeration member is converted to the property's datatype.
 */
export type RestrictionSet = Readonly<{
  datatype?: Iri;
  targetClass?: Iri;
  minCount?: number;
  maxCount?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  minInclusive?: number;
  minExclusive?: number;
  maxInclusive?: number;
  maxExclusive?: number;
  in?: readonly InValue[];
  languageIn?: readonly string[];
  uniqueLang?: boolean;
  lessThan?: Iri;
  lessThanOrEquals?: Iri;
}>;

/**
 * Restriction facets as callers write them: identifiers may be qualified
 * names and enumeration members are plain JS values.
 */
export type RestrictionInput = Readonly<{
  datatype?: string;
  targetClass?: string;
  minCount?: number;
  maxCount?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  minInclusive?: number;
  minExclusive?: number;
  maxInclusive?: number;
  maxExclusive?: number;
  in?: readonly LiteralInput[];
  languageIn?: readonly string[];
  uniqueLang?: boolean;
  lessThan?: string;
  lessThanOrEquals?: string;
}>;

export type RestrictionFacet = keyof RestrictionSet;

/**
 * Every facet, in the order statements are written.
 */
export const RESTRICTION_FACETS = [
  "datatype",
  "targetClass",
  "minCount",
  "maxCount",
  "minLength",
  "maxLength",
  "pattern",
  "minInclusive",
  "minExclusive",
  "maxInclusive",
  "maxExclusive",
  "in",
  "languageIn",
  "uniqueLang",
  "lessThan",
  "lessThanOrEquals",
] as const satisfies readonly RestrictionFacet[];

export const NUMERIC_BOUND_FACETS = [
  "minInclusive",
  "minExclusive",
  "maxInclusive",
  "maxExclusive",
] as const satisfies readonly RestrictionFacet[];

export type NumericBoundFacet = (typeof NUMERIC_BOUND_FACETS)[number];

/**
 * Resolves the datatype or class of a referenced property, used for
 * `lessThan` / `lessThanOrEquals` checks.
 */
export type PropertyLookup = (iri: Iri) => RestrictionSet | undefined;
