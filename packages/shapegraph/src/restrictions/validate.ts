/**
 * Restriction cross-checks.
 *
 * Every check here works on a normalized RestrictionSet and reports
 * issues instead of throwing, so callers can validate a whole model
 * and report the first violation, or a single property and throw.
 */

import { type ValidationIssue } from "../errors";
import { type Iri } from "../identifier";
import {
  areComparable,
  getDatatype,
  isLangString,
  isLanguageTag,
  isNumeric,
  isStringLike,
  isValidLexical,
} from "../literal";
import { XSD_NS } from "../ontology/constants";
import {
  NUMERIC_BOUND_FACETS,
  type NumericBoundFacet,
  type PropertyLookup,
  type RestrictionSet,
} from "./types";

// ============================================================
// Helpers
// ============================================================

const XSD_STRING = `${XSD_NS}string`;

function issue(path: string, message: string): ValidationIssue {
  return { path, message, code: "INCONSISTENT_RESTRICTIONS" };
}

function checkCountPair(
  set: RestrictionSet,
  lowerFacet: "minCount" | "minLength",
  upperFacet: "maxCount" | "maxLength",
  issues: ValidationIssue[],
): void {
  const lower = set[lowerFacet];
  const upper = set[upperFacet];
  for (const [facet, value] of [
    [lowerFacet, lower],
    [upperFacet, upper],
  ] as const) {
    if (value !== undefined && !(Number.isInteger(value) && value >= 0)) {
      issues.push(issue(facet, `${facet} must be a non-negative integer`));
    }
  }
  if (lower !== undefined && upper !== undefined && lower > upper) {
    issues.push(
      issue(lowerFacet, `${lowerFacet} ${lower} exceeds ${upperFacet} ${upper}`),
    );
  }
}

function isExclusive(facet: NumericBoundFacet): boolean {
  return facet === "minExclusive" || facet === "maxExclusive";
}

/**
 * Compiles a pattern, returning the error message when it does not compile.
 */
export function patternError(pattern: string): string | undefined {
  try {
    new RegExp(pattern);
    return undefined;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}

// ============================================================
// Cross-checks
// ============================================================

/**
 * Checks a restriction set against every facet cross-check.
 *
 * @returns The issues found; an empty array means the set is consistent
 */
export function validateRestrictions(
  set: RestrictionSet,
): readonly ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const { datatype } = set;

  if (datatype !== undefined && set.targetClass !== undefined) {
    issues.push(
      issue("targetClass", "datatype and targetClass are mutually exclusive"),
    );
  }
  if (datatype !== undefined && getDatatype(datatype) === undefined) {
    issues.push(issue("datatype", `unsupported datatype ${datatype}`));
  }

  checkCountPair(set, "minCount", "maxCount", issues);
  checkCountPair(set, "minLength", "maxLength", issues);

  for (const facet of ["minLength", "maxLength", "pattern"] as const) {
    if (set[facet] !== undefined && !isStringLike(datatype)) {
      issues.push(issue(facet, `${facet} requires a string-like datatype`));
    }
  }
  if (set.pattern !== undefined) {
    const message = patternError(set.pattern);
    if (message !== undefined) {
      issues.push(issue("pattern", `pattern does not compile: ${message}`));
    }
  }

  checkNumericBounds(set, issues);
  checkEnumeration(set, issues);

  if (set.languageIn !== undefined) {
    if (!isLangString(datatype)) {
      issues.push(issue("languageIn", "languageIn requires rdf:langString"));
    }
    if (set.languageIn.length === 0) {
      issues.push(issue("languageIn", "languageIn must list at least one tag"));
    }
    for (const tag of set.languageIn) {
      if (!isLanguageTag(tag)) {
        issues.push(issue("languageIn", `invalid language tag "${tag}"`));
      }
    }
  }
  if (set.uniqueLang !== undefined && !isLangString(datatype)) {
    issues.push(issue("uniqueLang", "uniqueLang requires rdf:langString"));
  }

  for (const facet of ["lessThan", "lessThanOrEquals"] as const) {
    if (set[facet] !== undefined && datatype === undefined) {
      issues.push(issue(facet, `${facet} requires a datatype to compare`));
    }
  }

  return issues;
}

function checkNumericBounds(set: RestrictionSet, issues: ValidationIssue[]) {
  const { datatype } = set;
  const present = NUMERIC_BOUND_FACETS.filter(
    (facet) => set[facet] !== undefined,
  );
  if (present.length === 0) return;

  if (!isNumeric(datatype) || datatype === undefined) {
    for (const facet of present) {
      issues.push(issue(facet, `${facet} requires a numeric datatype`));
    }
    return;
  }

  for (const facet of present) {
    const value = set[facet];
    if (value === undefined) continue;
    if (!Number.isFinite(value) || !isValidLexical(String(value), datatype)) {
      issues.push(
        issue(facet, `${facet} ${value} is not a valid ${datatype} value`),
      );
    }
  }

  for (const lowerFacet of ["minInclusive", "minExclusive"] as const) {
    for (const upperFacet of ["maxInclusive", "maxExclusive"] as const) {
      const lower = set[lowerFacet];
      const upper = set[upperFacet];
      if (lower === undefined || upper === undefined) continue;
      const strict = isExclusive(lowerFacet) || isExclusive(upperFacet);
      if (strict ? lower >= upper : lower > upper) {
        issues.push(
          issue(
            lowerFacet,
            `${lowerFacet} ${lower} is not below ${upperFacet} ${upper}`,
          ),
        );
      }
    }
  }
}

function checkEnumeration(set: RestrictionSet, issues: ValidationIssue[]) {
  const values = set.in;
  if (values === undefined) return;
  if (values.length === 0) {
    issues.push(issue("in", "in must list at least one value"));
    return;
  }

  const expected =
    set.targetClass !== undefined ? undefined
    : isLangString(set.datatype) ? XSD_STRING
    : set.datatype;

  values.forEach((value, index) => {
    const path = `in.${index}`;
    if (set.targetClass !== undefined) {
      if (typeof value !== "string") {
        issues.push(issue(path, "values of an object property must be identifiers"));
      }
      return;
    }
    if (typeof value === "string") {
      issues.push(issue(path, "values of a datatype property must be literals"));
      return;
    }
    if (expected !== undefined && value.datatype !== expected) {
      issues.push(issue(path, `value is not a ${expected} literal`));
      return;
    }
    if (!isValidLexical(value.lexical, value.datatype)) {
      issues.push(
        issue(path, `"${value.lexical}" is not a valid ${value.datatype} value`),
      );
    }
  });
}

// ============================================================
// Model-context checks
// ============================================================

/**
 * Checks `lessThan` / `lessThanOrEquals` against the referenced properties.
 */
export function validateRestrictionReferences(
  self: Iri,
  set: RestrictionSet,
  lookup: PropertyLookup,
): readonly ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const facet of ["lessThan", "lessThanOrEquals"] as const) {
    const target = set[facet];
    if (target === undefined) continue;
    if (target === self) {
      issues.push(issue(facet, `${facet} cannot reference the property itself`));
      continue;
    }
    const referenced = lookup(target);
    if (referenced === undefined) {
      issues.push(issue(facet, `${facet} references unknown property ${target}`));
      continue;
    }
    if (
      set.datatype === undefined ||
      referenced.datatype === undefined ||
      !areComparable(set.datatype, referenced.datatype)
    ) {
      issues.push(
        issue(
          facet,
          `${facet} references ${target}, whose datatype is not comparable`,
        ),
      );
    }
  }
  return issues;
}
