import { ValidationError } from "../errors";
import { type Iri, resolveIri } from "../identifier";
import { RDF } from "../ontology/constants";
import { getDatatype } from "./datatypes";

// ============================================================
// Types
// ============================================================

/**
 * A literal value: lexical form plus datatype, and a language tag
 * for `rdf:langString` values.
 */
export type TypedValue = Readonly<{
  lexical: string;
  datatype: Iri;
  language?: string;
}>;

/**
 * JS values accepted wherever a literal is expected.
 */
export type LiteralInput = string | number | boolean | bigint;

// ============================================================
// Validation
// ============================================================

/**
 * Checks a lexical form against a datatype's lexical space.
 * Unsupported datatypes never validate.
 */
export function isValidLexical(lexical: string, datatype: string): boolean {
  const info = getDatatype(datatype);
  if (info === undefined) return false;
  if (!info.lexical.test(lexical)) return false;
  if (info.min === undefined && info.max === undefined) return true;

  const value = BigInt(lexical);
  if (info.min !== undefined && value < info.min) return false;
  if (info.max !== undefined && value > info.max) return false;
  return true;
}

/**
 * Lexical form of a JS value; non-finite numbers use the XSD spellings.
 */
export function lexicalForm(value: LiteralInput): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") {
    if (Number.isNaN(value)) return "NaN";
    if (value === Number.POSITIVE_INFINITY) return "INF";
    if (value === Number.NEGATIVE_INFINITY) return "-INF";
  }
  return String(value);
}

// ============================================================
// Parsing / Formatting
// ============================================================

/**
 * Builds a TypedValue for a datatype, validating the lexical form.
 *
 * `rdf:langString` values are converted to `xsd:string`: enumerations
 * and bounds never carry a language tag.
 *
 * @throws ValidationError when the value is outside the datatype's lexical space
 */
export function parseTypedValue(
  value: LiteralInput,
  datatype: Iri,
): TypedValue {
  const target =
    datatype === RDF.langString ? resolveIri("xsd:string") : datatype;
  const lexical = lexicalForm(value);

  if (!isValidLexical(lexical, target)) {
    const info = getDatatype(target);
    throw new ValidationError(
      `Value "${lexical}" is not a valid ${info?.name ?? target}`,
      {
        entity: "literal",
        issues: [
          {
            path: "value",
            message:
              info === undefined ?
                `unsupported datatype ${target}`
              : `"${lexical}" is outside the lexical space of ${info.name}`,
          },
        ],
      },
    );
  }

  return Object.freeze({ lexical, datatype: target });
}

/**
 * Renders a TypedValue in N-Triples literal syntax.
 */
export function formatTypedValue(value: TypedValue): string {
  const escaped = value.lexical
    .replaceAll("\\", "\\\\")
    .replaceAll('"', '\\"')
    .replaceAll("\n", "\\n")
    .replaceAll("\r", "\\r");
  if (value.language !== undefined) {
    return `"${escaped}"@${value.language}`;
  }
  return `"${escaped}"^^<${value.datatype}>`;
}

/**
 * Numeric value of a numeric literal, or undefined for other datatypes.
 */
export function numericValue(value: TypedValue): number | undefined {
  if (getDatatype(value.datatype)?.category !== "numeric") return undefined;
  switch (value.lexical) {
    case "INF":
    case "+INF": {
      return Number.POSITIVE_INFINITY;
    }
    case "-INF": {
      return Number.NEGATIVE_INFINITY;
    }
    default: {
      return Number(value.lexical);
    }
  }
}

export function typedValuesEqual(left: TypedValue, right: TypedValue): boolean {
  return (
    left.lexical === right.lexical &&
    left.datatype === right.datatype &&
    left.language === right.language
  );
}
