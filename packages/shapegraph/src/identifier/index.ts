import { InvalidIdentifierError } from "../errors";
import { SHAPE_SUFFIX, STANDARD_PREFIXES } from "../ontology/constants";

// ============================================================
// Types
// ============================================================

/** Brand symbol for Iri */
declare const __iri: unique symbol;

/**
 * An absolute identifier in normalized (expanded) form.
 *
 * Two identifiers are the same entity iff their Iri strings are equal,
 * so plain `===`, Map keys and Set membership all work on the brand.
 */
export type Iri = string & Readonly<{ [__iri]: true }>;

/**
 * Prefix → namespace table used to expand qualified names.
 */
export type PrefixMap = Readonly<Record<string, string>>;

/**
 * Anything an operation accepts where an identifier is expected:
 * an absolute IRI, `<absolute>`, or a qualified name such as `ex:title`.
 */
export type IriInput = string;

// ============================================================
// Normalization
// ============================================================

const ABSOLUTE_SCHEMES = new Set(["urn", "tag", "mailto"]);
const QNAME_PATTERN = /^([A-Za-z][\w.-]*)?:([^\s<>"{}|\\^`]*)$/;
const FORBIDDEN = /[\s<>"{}|\\^`]/;

/**
 * Type guard for an already-normalized absolute identifier.
 */
export function isIri(value: string): value is Iri {
  if (value.length === 0 || FORBIDDEN.test(value)) return false;
  if (value.includes("://")) return true;
  const colon = value.indexOf(":");
  if (colon <= 0) return false;
  return ABSOLUTE_SCHEMES.has(value.slice(0, colon).toLowerCase());
}

/**
 * Merges the standard prefixes with caller-supplied ones.
 * Caller entries win on conflict.
 */
export function mergePrefixes(extra: PrefixMap | undefined): PrefixMap {
  return Object.freeze({ ...STANDARD_PREFIXES, ...extra });
}

/**
 * Resolves an identifier to its absolute form.
 *
 * Resolution order: a qualified name whose prefix is registered is expanded;
 * otherwise the value must already be absolute.
 *
 * @throws InvalidIdentifierError when the value cannot be resolved
 *
 * @example
 * ```typescript
 * resolveIri("ex:title", { ex: "http://example.org/" });
 * // "http://example.org/title"
 * ```
 */
export function resolveIri(
  value: IriInput,
  prefixes: PrefixMap = STANDARD_PREFIXES,
): Iri {
  const trimmed = value.trim();
  const unwrapped =
    trimmed.startsWith("<") && trimmed.endsWith(">") ?
      trimmed.slice(1, -1)
    : trimmed;

  if (unwrapped.length === 0) {
    throw new InvalidIdentifierError(value, "identifier is empty");
  }

  const match = QNAME_PATTERN.exec(unwrapped);
  if (match && !unwrapped.includes("://")) {
    const prefix = match[1] ?? "";
    const namespace = prefixes[prefix];
    if (namespace !== undefined) {
      const expanded = `${namespace}${match[2] ?? ""}`;
      if (isIri(expanded)) return expanded;
      throw new InvalidIdentifierError(
        value,
        `prefix "${prefix}" expands to a non-absolute identifier`,
      );
    }
  }

  if (isIri(unwrapped)) return unwrapped;

  const colon = unwrapped.indexOf(":");
  const reason =
    colon > 0 ?
      `unknown prefix "${unwrapped.slice(0, colon)}"`
    : "not an absolute identifier";
  throw new InvalidIdentifierError(value, reason);
}

/**
 * Shortens an identifier to `prefix:local` when a registered namespace matches.
 * The longest matching namespace wins.
 */
export function compactIri(value: Iri, prefixes: PrefixMap): string {
  let best: { prefix: string; namespace: string } | undefined;
  for (const [prefix, namespace] of Object.entries(prefixes)) {
    if (!value.startsWith(namespace)) continue;
    if (best === undefined || namespace.length > best.namespace.length) {
      best = { prefix, namespace };
    }
  }
  if (best === undefined) return value;
  const local = value.slice(best.namespace.length);
  return /^[\w.-]*$/.test(local) ? `${best.prefix}:${local}` : value;
}

/**
 * Ordering of identifiers by absolute form.
 */
export function compareIri(left: Iri, right: Iri): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

// ============================================================
// Constraint-graph naming
// ============================================================

/**
 * Name of the constraint-graph node for an identifier.
 * Applied only when writing statements.
 */
export function toShapeIri(value: Iri): Iri {
  const shape = `${value}${SHAPE_SUFFIX}`;
  if (isIri(shape)) return shape;
  throw new InvalidIdentifierError(value, "cannot derive shape identifier");
}

/**
 * Inverse of `toShapeIri`. Returns undefined when the value does not
 * carry the suffix.
 */
export function fromShapeIri(value: string): Iri | undefined {
  if (!value.endsWith(SHAPE_SUFFIX)) return undefined;
  const base = value.slice(0, -SHAPE_SUFFIX.length);
  return isIri(base) ? base : undefined;
}
