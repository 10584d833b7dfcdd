import { z } from "zod";

import { type ValidationIssue } from "../errors";
import { validateInput, type ValidationContext } from "../errors/validation";
import { type Iri, type PrefixMap, resolveIri } from "../identifier";
import { isValidLexical, lexicalForm, type LiteralInput } from "../literal";
import { RDF } from "../ontology/constants";
import { type InValue, type RestrictionInput, type RestrictionSet } from "./types";

// ============================================================
// Input Schema
// ============================================================

const literalInputSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.bigint(),
]);

export const restrictionInputSchema = z.strictObject({
  datatype: z.string().optional(),
  targetClass: z.string().optional(),
  minCount: z.number().optional(),
  maxCount: z.number().optional(),
  minLength: z.number().optional(),
  maxLength: z.number().optional(),
  pattern: z.string().optional(),
  minInclusive: z.number().optional(),
  minExclusive: z.number().optional(),
  maxInclusive: z.number().optional(),
  maxExclusive: z.number().optional(),
  in: z.array(literalInputSchema).optional(),
  languageIn: z.array(z.string()).optional(),
  uniqueLang: z.boolean().optional(),
  lessThan: z.string().optional(),
  lessThanOrEquals: z.string().optional(),
});

// ============================================================
// Enumeration Conversion
// ============================================================

function inferDatatype(value: LiteralInput): Iri {
  if (typeof value === "string") return resolveIri("xsd:string");
  if (typeof value === "boolean") return resolveIri("xsd:boolean");
  if (typeof value === "bigint" || Number.isInteger(value)) {
    return resolveIri("xsd:integer");
  }
  return resolveIri("xsd:double");
}

/**
 * Converts enumeration members to the property's value space.
 *
 * With a target class every member is an identifier; with a datatype
 * every member becomes a literal of that datatype (`rdf:langString`
 * members become `xsd:string`). Members that do not convert are reported
 * as issues.
 */
export function convertEnumeration(
  values: readonly LiteralInput[],
  target: Readonly<{ datatype?: Iri; targetClass?: Iri }>,
  prefixes: PrefixMap,
): { values: InValue[]; issues: ValidationIssue[] } {
  const converted: InValue[] = [];
  const issues: ValidationIssue[] = [];

  values.forEach((value, index) => {
    const path = `in.${index}`;
    if (target.targetClass !== undefined) {
      if (typeof value !== "string") {
        issues.push({
          path,
          message: "values of an object property must be identifiers",
          code: "INCONSISTENT_RESTRICTIONS",
        });
        return;
      }
      converted.push(resolveIri(value, prefixes));
      return;
    }

    const datatype =
      target.datatype === undefined ? inferDatatype(value)
      : target.datatype === RDF.langString ? resolveIri("xsd:string")
      : target.datatype;
    const lexical = lexicalForm(value);
    if (!isValidLexical(lexical, datatype)) {
      issues.push({
        path,
        message: `"${lexical}" is not a valid ${datatype} value`,
        code: "INCONSISTENT_RESTRICTIONS",
      });
      return;
    }
    converted.push(Object.freeze({ lexical, datatype }));
  });

  return { values: converted, issues };
}

/**
 * Re-converts existing enumeration members after the datatype or target
 * class changed. Without either, members are kept as they are.
 */
export function reconvertEnumeration(
  values: readonly InValue[],
  target: Readonly<{ datatype?: Iri; targetClass?: Iri }>,
  prefixes: PrefixMap,
): { values: InValue[]; issues: ValidationIssue[] } {
  if (target.datatype === undefined && target.targetClass === undefined) {
    return { values: [...values], issues: [] };
  }
  return convertEnumeration(
    values.map((value) => (typeof value === "string" ? value : value.lexical)),
    target,
    prefixes,
  );
}

// ============================================================
// Normalization
// ============================================================

/**
 * Result of normalizing caller input: the restriction set plus any
 * issues found while converting values. Cross-checks are not run here.
 */
export type NormalizedRestrictions = Readonly<{
  restrictions: RestrictionSet;
  issues: readonly ValidationIssue[];
}>;

/**
 * Validates the shape of caller input and converts it to a RestrictionSet.
 *
 * @throws ValidationError when the input does not have the expected shape
 * @throws InvalidIdentifierError when an identifier does not resolve
 */
export function normalizeRestrictions(
  input: unknown,
  prefixes: PrefixMap,
  context: ValidationContext,
): NormalizedRestrictions {
  const parsed: RestrictionInput = validateInput(
    restrictionInputSchema,
    input ?? {},
    context,
  );

  const datatype =
    parsed.datatype === undefined ? undefined : (
      resolveIri(parsed.datatype, prefixes)
    );
  const targetClass =
    parsed.targetClass === undefined ? undefined : (
      resolveIri(parsed.targetClass, prefixes)
    );

  const enumeration =
    parsed.in === undefined ? undefined : (
      convertEnumeration(
        parsed.in,
        {
          ...(datatype !== undefined && { datatype }),
          ...(targetClass !== undefined && { targetClass }),
        },
        prefixes,
      )
    );

  const restrictions: RestrictionSet = Object.freeze({
    ...(datatype !== undefined && { datatype }),
    ...(targetClass !== undefined && { targetClass }),
    ...(parsed.minCount !== undefined && { minCount: parsed.minCount }),
    ...(parsed.maxCount !== undefined && { maxCount: parsed.maxCount }),
    ...(parsed.minLength !== undefined && { minLength: parsed.minLength }),
    ...(parsed.maxLength !== undefined && { maxLength: parsed.maxLength }),
    ...(parsed.pattern !== undefined && { pattern: parsed.pattern }),
    ...(parsed.minInclusive !== undefined && {
      minInclusive: parsed.minInclusive,
    }),
    ...(parsed.minExclusive !== undefined && {
      minExclusive: parsed.minExclusive,
    }),
    ...(parsed.maxInclusive !== undefined && {
      maxInclusive: parsed.maxInclusive,
    }),
    ...(parsed.maxExclusive !== undefined && {
      maxExclusive: parsed.maxExclusive,
    }),
    ...(enumeration !== undefined && {
      in: Object.freeze(enumeration.values),
    }),
    ...(parsed.languageIn !== undefined && {
      languageIn: Object.freeze(
        parsed.languageIn.map((tag) => tag.toLowerCase()),
      ),
    }),
    ...(parsed.uniqueLang !== undefined && { uniqueLang: parsed.uniqueLang }),
    ...(parsed.lessThan !== undefined && {
      lessThan: resolveIri(parsed.lessThan, prefixes),
    }),
    ...(parsed.lessThanOrEquals !== undefined && {
      lessThanOrEquals: resolveIri(parsed.lessThanOrEquals, prefixes),
    }),
  });

  return { restrictions, issues: enumeration?.issues ?? [] };
}
