import { z } from "zod";

import { ValidationError } from "../errors";
import { zodIssuesToValidationIssues } from "../errors/validation";

// ============================================================
// Types
// ============================================================

/**
 * Language-tagged text: at most one string per (lower-cased) tag.
 */
export type LangString = Readonly<Record<string, string>>;

const LANGUAGE_TAG = /^[a-zA-Z]{1,8}(?:-[a-zA-Z0-9]{1,8})*$/;

const langStringSchema = z.record(
  z.string().regex(LANGUAGE_TAG, "invalid language tag"),
  z.string(),
);

// ============================================================
// Construction
// ============================================================

/**
 * Validates and normalizes language-tagged text.
 *
 * @throws ValidationError on a malformed tag, or two tags that differ only by case
 *
 * @example
 * ```typescript
 * langString({ EN: "Title", de: "Titel" });
 * // { en: "Title", de: "Titel" }
 * ```
 */
export function langString(input: unknown, path = "value"): LangString {
  const result = langStringSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      `Invalid language-tagged text at ${path}`,
      {
        entity: "literal",
        issues: zodIssuesToValidationIssues(result.error).map((issue) => ({
          ...issue,
          path: issue.path ? `${path}.${issue.path}` : path,
        })),
      },
      { cause: result.error },
    );
  }

  const normalized: Record<string, string> = {};
  for (const [tag, text] of Object.entries(result.data)) {
    const lower = tag.toLowerCase();
    if (lower in normalized) {
      throw new ValidationError(
        `Duplicate language tag "${lower}" at ${path}`,
        {
          entity: "literal",
          issues: [
            { path: `${path}.${tag}`, message: "at most one string per tag" },
          ],
        },
      );
    }
    normalized[lower] = text;
  }
  return Object.freeze(normalized);
}

export function langStringsEqual(
  left: LangString | undefined,
  right: LangString | undefined,
): boolean {
  const leftKeys = Object.keys(left ?? {}).sort();
  const rightKeys = Object.keys(right ?? {}).sort();
  if (leftKeys.length !== rightKeys.length) return false;
  return leftKeys.every(
    (key, index) => key === rightKeys[index] && left?.[key] === right?.[key],
  );
}

export function isLanguageTag(value: string): boolean {
  return LANGUAGE_TAG.test(value);
}
