import { z } from "zod";

import { type ValidationIssue } from "../errors";
import {
  assertNoRestrictionIssues,
  validateInput,
} from "../errors/validation";
import { type PrefixMap, resolveIri } from "../identifier";
import { langString, type LangString } from "../literal";
import { STANDARD_PREFIXES } from "../ontology/constants";
import {
  convertEnumeration,
  normalizeRestrictions,
  reconvertEnumeration,
  type RestrictionFacet,
  type RestrictionSet,
  validateRestrictions,
} from "../restrictions";
import {
  type Property,
  type PropertyAttribute,
  type PropertyAttributeValues,
  type PropertyDefinition,
  type PropertyOrigin,
} from "./types";

// ============================================================
// Schemas
// ============================================================

const langStringInputSchema = z.record(z.string(), z.string());

export const propertyDefinitionSchema = z.strictObject({
  iri: z.string().min(1),
  restrictions: z.unknown().optional(),
  name: langStringInputSchema.optional(),
  description: langStringInputSchema.optional(),
  subPropertyOf: z.string().min(1).optional(),
});

// ============================================================
// Options
// ============================================================

export type DefinePropertyOptions = Readonly<{
  /** Default: "standalone" */
  origin?: PropertyOrigin;
  /** Prefixes for qualified names; the standard ones are always known */
  prefixes?: PrefixMap;
}>;

// ============================================================
// Helpers
// ============================================================

type MutableProperty = {
  -readonly [K in keyof Property]: Property[K];
};

type MutableRestrictionSet = {
  -readonly [K in keyof RestrictionSet]: RestrictionSet[K];
};

function omitFacets(
  set: RestrictionSet,
  facets: readonly RestrictionFacet[],
): MutableRestrictionSet {
  const copy: MutableRestrictionSet = { ...set };
  for (const facet of facets) {
    delete copy[facet];
  }
  return copy;
}

/**
 * A private property's cardinality lives on its binding.
 */
function originIssues(
  origin: PropertyOrigin,
  set: RestrictionSet,
): ValidationIssue[] {
  if (origin !== "private") return [];
  return (["minCount", "maxCount"] as const)
    .filter((facet) => set[facet] !== undefined)
    .map((facet) => ({
      path: facet,
      message: `a private property takes ${facet} from its binding`,
      code: "INCONSISTENT_RESTRICTIONS",
    }));
}

/**
 * Full restriction check for a property: cross-checks plus origin rules.
 */
export function propertyIssues(
  origin: PropertyOrigin,
  set: RestrictionSet,
): readonly ValidationIssue[] {
  return [...validateRestrictions(set), ...originIssues(origin, set)];
}

function optionalLangString(
  value: Readonly<Record<string, string>> | undefined,
  path: string,
): LangString | undefined {
  return value === undefined ? undefined : langString(value, path);
}

// ============================================================
// Property Factory
// ============================================================

/**
 * Creates a property from its definition.
 *
 * @throws ValidationError when the definition does not have the expected shape
 * @throws InvalidIdentifierError when an identifier does not resolve
 * @throws InconsistentRestrictionsError when the restriction set fails a cross-check
 *
 * @example
 * ```typescript
 * const title = defineProperty({
 *   iri: "ex:title",
 *   restrictions: { datatype: "xsd:string", minLength: 1, maxLength: 200 },
 *   name: { en: "Title" },
 * }, { prefixes: { ex: "http://example.org/" } });
 * ```
 */
export function defineProperty(
  definition: PropertyDefinition,
  options: DefinePropertyOptions = {},
): Property {
  const prefixes = options.prefixes ?? STANDARD_PREFIXES;
  const origin = options.origin ?? "standalone";
  const parsed = validateInput(propertyDefinitionSchema, definition, {
    entity: "property",
    iri: definition.iri,
  });
  const iri = resolveIri(parsed.iri, prefixes);
  const context = { entity: "property", iri } as const;

  const normalized = normalizeRestrictions(
    parsed.restrictions,
    prefixes,
    context,
  );
  assertNoRestrictionIssues(
    [
      ...normalized.issues,
      ...propertyIssues(origin, normalized.restrictions),
    ],
    context,
  );

  const name = optionalLangString(parsed.name, "name");
  const description = optionalLangString(parsed.description, "description");

  return Object.freeze({
    iri,
    origin,
    restrictions: normalized.restrictions,
    ...(name !== undefined && { name }),
    ...(description !== undefined && { description }),
    ...(parsed.subPropertyOf !== undefined && {
      subPropertyOf: resolveIri(parsed.subPropertyOf, prefixes),
    }),
  });
}

// ============================================================
// Attribute Update
// ============================================================

/**
 * Returns a copy of the property with one attribute replaced (or removed
 * when `value` is undefined), after re-validating the whole restriction set.
 *
 * Setting `datatype` removes `targetClass` and vice versa; the enumeration
 * is converted to the new value space.
 *
 * @throws InconsistentRestrictionsError when the resulting set fails a cross-check
 */
export function updatePropertyAttribute<K extends PropertyAttribute>(
  property: Property,
  attribute: K,
  value: PropertyAttributeValues[K] | undefined,
  prefixes?: PrefixMap,
): Property;
export function updatePropertyAttribute(
  property: Property,
  attribute: PropertyAttribute,
  value: unknown,
  prefixes: PrefixMap = STANDARD_PREFIXES,
): Property {
  const context = { entity: "property", iri: property.iri } as const;

  switch (attribute) {
    case "name":
    case "description": {
      const next: MutableProperty = { ...property };
      if (value === undefined) {
        delete next[attribute];
      } else {
        next[attribute] = langString(
          validateInput(langStringInputSchema, value, context),
          attribute,
        );
      }
      return Object.freeze(next);
    }
    case "subPropertyOf": {
      const next: MutableProperty = { ...property };
      if (value === undefined) {
        delete next.subPropertyOf;
      } else {
        next.subPropertyOf = resolveIri(
          validateInput(z.string().min(1), value, context),
          prefixes,
        );
      }
      return Object.freeze(next);
    }
  }

  const facet: RestrictionFacet = attribute;
  const current = property.restrictions;
  const next = omitFacets(current, [facet]);
  const conversionIssues: ValidationIssue[] = [];

  if (value !== undefined) {
    if (facet === "in") {
      const values = validateInput(
        z.array(z.union([z.string(), z.number(), z.boolean(), z.bigint()])),
        value,
        context,
      );
      const converted = convertEnumeration(values, next, prefixes);
      next.in = Object.freeze(converted.values);
      conversionIssues.push(...converted.issues);
    } else {
      const normalized = normalizeRestrictions(
        { [facet]: value },
        prefixes,
        context,
      );
      Object.assign(next, normalized.restrictions);
      conversionIssues.push(...normalized.issues);
    }
  }

  if (facet === "datatype" || facet === "targetClass") {
    if (value !== undefined) {
      delete next[facet === "datatype" ? "targetClass" : "datatype"];
    }
    if (next.in !== undefined) {
      const converted = reconvertEnumeration(next.in, next, prefixes);
      next.in = Object.freeze(converted.values);
      conversionIssues.push(...converted.issues);
    }
  }

  const restrictions: RestrictionSet = Object.freeze(next);
  assertNoRestrictionIssues(
    [...conversionIssues, ...propertyIssues(property.origin, restrictions)],
    context,
  );

  return Object.freeze({ ...property, restrictions });
}
