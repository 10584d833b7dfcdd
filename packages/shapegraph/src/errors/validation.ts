/**
 * Contextual Validation Utilities
 *
 * Zod validation wrappers that report which entity failed and map
 * Zod issues onto ValidationIssue.
 *
 * @example
 * ```typescript
 * const input = validateInput(propertyInputSchema, raw, {
 *   entity: "property",
 *   iri: "ex:title",
 * });
 * ```
 */

import { type ZodError, type ZodType } from "zod";

import {
  InconsistentRestrictionsError,
  ValidationError,
  type ValidationIssue,
} from "./index";

// ============================================================
// Types
// ============================================================

/**
 * Context for validation operations.
 */
export type ValidationContext = Readonly<{
  /** Kind of entity being validated */
  entity:
    | "property"
    | "resourceClass"
    | "binding"
    | "literal"
    | "project"
    | "document";
  /** Identifier of the entity, if known */
  iri?: string;
}>;

// ============================================================
// Validation Functions
// ============================================================

/**
 * Converts Zod issues to ValidationIssue format.
 */
export function zodIssuesToValidationIssues(
  error: ZodError,
): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
    code: issue.code,
  }));
}

function describe(context: ValidationContext): string {
  return context.iri === undefined ?
      `new ${context.entity}`
    : `${context.entity} ${context.iri}`;
}

/**
 * Validates raw input against a schema, with full context for error messages.
 *
 * @throws ValidationError with the Zod issues if validation fails
 */
export function validateInput<T>(
  schema: ZodType<T>,
  input: unknown,
  context: ValidationContext,
): T {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  throw new ValidationError(
    `Invalid input for ${describe(context)}: ${result.error.message}`,
    {
      entity: context.entity,
      ...(context.iri !== undefined && { iri: context.iri }),
      issues: zodIssuesToValidationIssues(result.error),
    },
    { cause: result.error },
  );
}

/**
 * Throws InconsistentRestrictionsError when the cross-check produced issues.
 */
export function assertNoRestrictionIssues(
  issues: readonly ValidationIssue[],
  context: ValidationContext,
): void {
  const first = issues[0];
  if (first === undefined) return;

  throw new InconsistentRestrictionsError(
    `Inconsistent restrictions for ${describe(context)}: ${first.path}: ${first.message}`,
    {
      entity: context.entity,
      ...(context.iri !== undefined && { iri: context.iri }),
      issues,
    },
  );
}
