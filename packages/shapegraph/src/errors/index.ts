/**
 * ShapeGraph Error Hierarchy
 *
 * All errors extend ShapeGraphError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * @example
 * ```typescript
 * try {
 *   await model.commit();
 * } catch (error) {
 *   if (isShapeGraphError(error)) {
 *     console.error(error.toUserMessage());
 *     if (isUserRecoverable(error)) {
 *       // Show to user for correction
 *     }
 *   }
 * }
 * ```
 */

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by invalid input or incorrect usage. Recoverable by fixing input.
 * - `constraint`: A structural rule of the data model was violated. Recoverable by changing the model.
 * - `system`: Store-side or infrastructure issue. May require investigation or retry.
 */
export type ErrorCategory = "user" | "constraint" | "system";

/**
 * Options for ShapeGraphError constructor.
 */
export type ShapeGraphErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance for users */
  suggestion?: string;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  if (
    typeof cause === "number" ||
    typeof cause === "boolean" ||
    typeof cause === "bigint"
  ) {
    return String(cause);
  }
  if (typeof cause === "symbol") {
    return cause.description ?? "Symbol";
  }
  if (cause === undefined) {
    return "Unknown cause";
  }

  try {
    return JSON.stringify(cause);
  } catch (error) {
    return `Unserializable cause: ${
      error instanceof Error ? error.message : "Unknown error"
    }`;
  }
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all ShapeGraph errors.
 */
export class ShapeGraphError extends Error {
  /** Machine-readable error code (e.g., "CYCLIC_INHERITANCE") */
  readonly code: string;

  /** Error category for handling strategies */
  readonly category: ErrorCategory;

  /** Structured context about the error */
  readonly details: Readonly<Record<string, unknown>>;

  /** Recovery guidance for users */
  readonly suggestion?: string;

  constructor(message: string, code: string, options: ShapeGraphErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "ShapeGraphError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze(options.details ?? {});
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /**
   * Returns a user-friendly error message with suggestion if available.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Returns a detailed string representation for logging.
   */
  toLogString(): string {
    const lines = [
      `[${this.code}] ${this.message}`,
      `  Category: ${this.category}`,
    ];

    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }

    const detailKeys = Object.keys(this.details);
    if (detailKeys.length > 0) {
      lines.push(`  Details: ${JSON.stringify(this.details)}`);
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Validation Errors (category: "user")
// ============================================================

/**
 * A single validation issue, from Zod or from a cross-check.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid field (e.g., "restrictions.maxLength") */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Zod error code if from Zod validation */
  code?: string;
}>;

/**
 * Details for ValidationError.
 */
export type ValidationErrorDetails = Readonly<{
  /** Kind of entity being validated */
  entity?:
    | "property"
    | "resourceClass"
    | "binding"
    | "literal"
    | "project"
    | "document";
  /** Identifier of the entity, if known */
  iri?: string;
  /** Individual validation issues */
  issues: readonly ValidationIssue[];
}>;

function listIssuePaths(issues: readonly ValidationIssue[]): string {
  return issues.length > 0 ?
      issues.map((issue) => issue.path || "(root)").join(", ")
    : "unknown";
}

/**
 * Thrown when input does not have the expected shape (bad language tag,
 * malformed literal, unknown attribute name).
 */
export class ValidationError extends ShapeGraphError {
  declare readonly details: ValidationErrorDetails;

  constructor(
    message: string,
    details: ValidationErrorDetails,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "VALIDATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Check the following fields: ${listIssuePaths(details.issues)}. See error.details.issues for specific validation failures.`,
      cause: options?.cause,
    });
    this.name = "ValidationError";
  }
}

/**
 * Thrown when a property's restriction set violates a cross-check
 * (e.g. `minLength` without a string-like datatype, `minCount > maxCount`).
 *
 * @example
 * ```typescript
 * try {
 *   model.createProperty({ iri: "ex:age", restrictions: { pattern: "^\\d+$" } });
 * } catch (error) {
 *   if (error instanceof InconsistentRestrictionsError) {
 *     console.log(error.details.issues);
 *     // [{ path: "pattern", message: "pattern requires a string-like datatype" }]
 *   }
 * }
 * ```
 */
export class InconsistentRestrictionsError extends ShapeGraphError {
  declare readonly details: ValidationErrorDetails;

  constructor(
    message: string,
    details: ValidationErrorDetails,
    options?: { cause?: unknown },
  ) {
    super(message, "INCONSISTENT_RESTRICTIONS", {
      details,
      category: "user",
      suggestion: `Fix the restriction facets: ${listIssuePaths(details.issues)}.`,
      cause: options?.cause,
    });
    this.name = "InconsistentRestrictionsError";
  }
}

/**
 * Thrown when a string cannot be turned into an absolute identifier.
 */
export class InvalidIdentifierError extends ShapeGraphError {
  constructor(value: string, reason: string, options?: { cause?: unknown }) {
    super(`Invalid identifier "${value}": ${reason}`, "INVALID_IDENTIFIER", {
      details: { value, reason },
      category: "user",
      suggestion: `Use an absolute IRI (e.g. "http://example.org/title") or a prefixed name with a registered prefix (e.g. "ex:title").`,
      cause: options?.cause,
    });
    this.name = "InvalidIdentifierError";
  }
}

// ============================================================
// Lookup / State Errors (category: "user")
// ============================================================

/**
 * Thrown when an operation names a property or resource class the model does not hold.
 */
export class EntityNotFoundError extends ShapeGraphError {
  constructor(
    entity: "property" | "resourceClass",
    iri: string,
    options?: { cause?: unknown },
  ) {
    const label = entity === "property" ? "Property" : "Resource class";
    super(`${label} not found: ${iri}`, "ENTITY_NOT_FOUND", {
      details: { entity, iri },
      category: "user",
      suggestion: `Verify "${iri}" is defined in this data model and spelled correctly.`,
      cause: options?.cause,
    });
    this.name = "EntityNotFoundError";
  }
}

/**
 * Thrown when an operation is not allowed in the model's current lifecycle state.
 */
export class ModelStateError extends ShapeGraphError {
  constructor(
    operation: string,
    state: string,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(
      `Cannot ${operation} while the data model is ${state}`,
      "INVALID_MODEL_STATE",
      {
        details: { operation, state },
        category: "user",
        suggestion:
          options?.suggestion ??
          `Load the data model before mutating it, and do not mutate it while a commit is running.`,
        cause: options?.cause,
      },
    );
    this.name = "ModelStateError";
  }
}

/**
 * Thrown when a Property or ResourceClass identifier is already taken in the data model.
 */
export class DuplicateIdentifierError extends ShapeGraphError {
  constructor(
    details: Readonly<{
      iri: string;
      existing: "property" | "privateProperty" | "resourceClass";
      owner?: string;
    }>,
    options?: { cause?: unknown },
  ) {
    const where =
      details.existing === "privateProperty" ?
        `a private property of ${details.owner ?? "another resource class"}`
      : details.existing === "property" ? "a standalone property"
      : "a resource class";
    super(
      `Identifier "${details.iri}" is already used by ${where}`,
      "DUPLICATE_IDENTIFIER",
      {
        details,
        category: "user",
        suggestion: `Choose a different identifier, or update the existing definition instead of creating a new one.`,
        cause: options?.cause,
      },
    );
    this.name = "DuplicateIdentifierError";
  }
}

/**
 * Thrown when a superclass identifier does not resolve within the data model.
 */
export class UnknownSuperclassError extends ShapeGraphError {
  constructor(
    details: Readonly<{ resourceClass: string; superclass: string }>,
    options?: { cause?: unknown },
  ) {
    super(
      `Superclass "${details.superclass}" of "${details.resourceClass}" is not defined in this data model`,
      "UNKNOWN_SUPERCLASS",
      {
        details,
        category: "user",
        suggestion: `Create "${details.superclass}" before referencing it as a superclass.`,
        cause: options?.cause,
      },
    );
    this.name = "UnknownSuperclassError";
  }
}

// ============================================================
// Constraint Errors (category: "constraint")
// ============================================================

/**
 * Thrown when deleting a property that is still referenced.
 */
export class PropertyInUseError extends ShapeGraphError {
  constructor(
    details: Readonly<{
      iri: string;
      referencedBy: readonly string[];
    }>,
    options?: { cause?: unknown },
  ) {
    const list = details.referencedBy.join(", ");
    super(
      `Cannot delete property "${details.iri}": still referenced by ${list}`,
      "PROPERTY_IN_USE",
      {
        details,
        category: "constraint",
        suggestion: `Detach the property from ${list} (or remove the references) before deleting it.`,
        cause: options?.cause,
      },
    );
    this.name = "PropertyInUseError";
  }
}

/**
 * Thrown when a private property is bound to a second resource class.
 */
export class PropertyNotReusableError extends ShapeGraphError {
  constructor(
    details: Readonly<{
      property: string;
      owner: string;
      resourceClass: string;
    }>,
    options?: { cause?: unknown },
  ) {
    super(
      `Property "${details.property}" is private to "${details.owner}" and cannot be bound to "${details.resourceClass}"`,
      "PROPERTY_NOT_REUSABLE",
      {
        details,
        category: "constraint",
        suggestion: `Define "${details.property}" as a standalone property to share it between resource classes.`,
        cause: options?.cause,
      },
    );
    this.name = "PropertyNotReusableError";
  }
}

/**
 * Thrown when a binding's local cardinality is wider than, or contradicts,
 * the cardinality of the standalone property it binds.
 */
export class CardinalityConflictError extends ShapeGraphError {
  constructor(
    details: Readonly<{
      resourceClass: string;
      property: string;
      facet: "minCount" | "maxCount";
      local: number;
      declared: number;
    }>,
    options?: { cause?: unknown },
  ) {
    super(
      `Cardinality conflict on "${details.resourceClass}" → "${details.property}": local ${details.facet} ${details.local} is incompatible with the property's declared ${details.facet === "minCount" ? "bounds" : "maxCount"} ${details.declared}`,
      "CARDINALITY_CONFLICT",
      {
        details,
        category: "constraint",
        suggestion: `A binding may only narrow the property's own cardinality. Use a value within the declared bounds.`,
        cause: options?.cause,
      },
    );
    this.name = "CardinalityConflictError";
  }
}

/**
 * Thrown when a superclass assignment would close a cycle in the superclass chain.
 */
export class CyclicInheritanceError extends ShapeGraphError {
  constructor(
    details: Readonly<{
      resourceClass: string;
      superclass: string;
      cycle: readonly string[];
    }>,
    options?: { cause?: unknown },
  ) {
    super(
      `Setting "${details.superclass}" as superclass of "${details.resourceClass}" creates a cycle: ${details.cycle.join(" → ")}`,
      "CYCLIC_INHERITANCE",
      {
        details,
        category: "constraint",
        suggestion: `"${details.resourceClass}" is already an ancestor of "${details.superclass}". Pick a superclass outside its descendants.`,
        cause: options?.cause,
      },
    );
    this.name = "CyclicInheritanceError";
  }
}

/**
 * Thrown when a subclass binding loosens (or contradicts) an inherited cardinality.
 */
export class InheritedCardinalityViolationError extends ShapeGraphError {
  constructor(
    details: Readonly<{
      resourceClass: string;
      property: string;
      inheritedFrom: string;
      facet: "minCount" | "maxCount";
      local: number;
      inherited: number;
    }>,
    options?: { cause?: unknown },
  ) {
    super(
      `"${details.resourceClass}" loosens the ${details.facet} of "${details.property}" inherited from "${details.inheritedFrom}" (${details.local} vs ${details.inherited})`,
      "INHERITED_CARDINALITY_VIOLATION",
      {
        details,
        category: "constraint",
        suggestion: `A subclass may only narrow inherited cardinalities.`,
        cause: options?.cause,
      },
    );
    this.name = "InheritedCardinalityViolationError";
  }
}

/**
 * Thrown when deleting a resource class that another class declares as superclass.
 */
export class ResourceClassInUseError extends ShapeGraphError {
  constructor(
    details: Readonly<{ iri: string; subclasses: readonly string[] }>,
    options?: { cause?: unknown },
  ) {
    const list = details.subclasses.join(", ");
    super(
      `Cannot delete resource class "${details.iri}": it is the superclass of ${list}`,
      "RESOURCE_CLASS_IN_USE",
      {
        details,
        category: "constraint",
        suggestion: `Change the superclass of ${list} first.`,
        cause: options?.cause,
      },
    );
    this.name = "ResourceClassInUseError";
  }
}

/**
 * Thrown by commit when whole-model validation finds a violation.
 * Nothing has been sent to the store.
 */
export class ModelInconsistentError extends ShapeGraphError {
  declare readonly details: Readonly<{ issues: readonly ValidationIssue[] }>;

  constructor(
    issues: readonly ValidationIssue[],
    options?: { cause?: unknown },
  ) {
    const first = issues[0];
    super(
      `Data model is inconsistent: ${first ? `${first.path}: ${first.message}` : "unknown violation"}`,
      "MODEL_INCONSISTENT",
      {
        details: { issues },
        category: "constraint",
        suggestion: `Fix the reported entity, or discard() the pending changes and reload.`,
        cause: options?.cause,
      },
    );
    this.name = "ModelInconsistentError";
  }
}

// ============================================================
// Store Errors (category: "system")
// ============================================================

/**
 * Thrown when the snapshot marker in the store no longer matches the one
 * recorded at load time.
 */
export class ConcurrentModificationError extends ShapeGraphError {
  constructor(
    details: Readonly<{
      project: string;
      expectedMarker: string | undefined;
      actualMarker: string | undefined;
    }>,
    options?: { cause?: unknown },
  ) {
    super(
      `Concurrent modification of data model "${details.project}": expected marker ${details.expectedMarker ?? "(none)"}, found ${details.actualMarker ?? "(none)"}`,
      "CONCURRENT_MODIFICATION",
      {
        details,
        category: "system",
        suggestion: `Reload the data model, re-apply your changes and commit again.`,
        cause: options?.cause,
      },
    );
    this.name = "ConcurrentModificationError";
  }
}

/**
 * Thrown at load time when the constraint and inference graphs disagree.
 */
export class CrossGraphMismatchError extends ShapeGraphError {
  constructor(
    message: string,
    details: Readonly<{
      project: string;
      subject: string;
      presentIn?: "constraint" | "inference";
    }>,
    options?: { cause?: unknown },
  ) {
    super(message, "CROSS_GRAPH_MISMATCH", {
      details,
      category: "system",
      suggestion: `The stored schema graphs are out of sync. Repair the stored data before loading.`,
      cause: options?.cause,
    });
    this.name = "CrossGraphMismatchError";
  }
}

/**
 * A statement delta against one graph, as reported in commit errors.
 */
export type DeltaDescription = Readonly<{
  graph: string;
  removals: readonly string[];
  additions: readonly string[];
}>;

/**
 * Thrown when the inference write failed and the constraint write was reverted.
 * The store holds the pre-commit state; the model keeps its pending changes.
 */
export class PartialCommitRolledBackError extends ShapeGraphError {
  constructor(
    details: Readonly<{ project: string; reason: string }>,
    options?: { cause?: unknown },
  ) {
    super(
      `Commit of data model "${details.project}" failed and was rolled back: ${details.reason}`,
      "PARTIAL_COMMIT_ROLLED_BACK",
      {
        details,
        category: "system",
        suggestion: `The store is unchanged and the pending changes are kept. Retry the commit.`,
        cause: options?.cause,
      },
    );
    this.name = "PartialCommitRolledBackError";
  }
}

/**
 * Thrown when the inference write failed and the compensating write failed too.
 * `details.applied` is the constraint-graph delta now live on the store.
 */
export class PartialCommitUnrecoverableError extends ShapeGraphError {
  declare readonly details: Readonly<{
    project: string;
    reason: string;
    applied: DeltaDescription;
  }>;

  constructor(
    details: Readonly<{
      project: string;
      reason: string;
      applied: DeltaDescription;
    }>,
    options?: { cause?: unknown },
  ) {
    super(
      `Commit of data model "${details.project}" left the store inconsistent: ${details.reason}`,
      "PARTIAL_COMMIT_UNRECOVERABLE",
      {
        details,
        category: "system",
        suggestion: `Revert error.details.applied on graph ${details.applied.graph} manually, then reload.`,
        cause: options?.cause,
      },
    );
    this.name = "PartialCommitUnrecoverableError";
  }
}

/**
 * Thrown when the store could not be read, or the first write failed.
 * No state was changed.
 */
export class StoreUnavailableError extends ShapeGraphError {
  constructor(
    message: string,
    details: Readonly<{ operation: string; graph: string }>,
    options?: { cause?: unknown },
  ) {
    super(message, "STORE_UNAVAILABLE", {
      details,
      category: "system",
      suggestion: `Check the store connection and retry the operation.`,
      cause: options?.cause,
    });
    this.name = "StoreUnavailableError";
  }
}

/**
 * Thrown when a gateway is misconfigured.
 */
export class ConfigurationError extends ShapeGraphError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "system",
      suggestion:
        options?.suggestion ?? `Review the gateway configuration for errors.`,
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Type guard for ShapeGraphError.
 */
export function isShapeGraphError(error: unknown): error is ShapeGraphError {
  return error instanceof ShapeGraphError;
}

/**
 * Check if error is recoverable by user action (user or constraint error).
 *
 * @example
 * ```typescript
 * if (isUserRecoverable(error)) {
 *   showErrorToUser(error.toUserMessage());
 * } else {
 *   logAndAlertOps(error);
 * }
 * ```
 */
export function isUserRecoverable(error: unknown): boolean {
  if (!isShapeGraphError(error)) return false;
  return error.category === "user" || error.category === "constraint";
}

/**
 * Check if error indicates a store or infrastructure issue.
 */
export function isSystemError(error: unknown): boolean {
  return isShapeGraphError(error) && error.category === "system";
}

/**
 * Check if error is a structural model violation.
 */
export function isConstraintError(error: unknown): boolean {
  return isShapeGraphError(error) && error.category === "constraint";
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isShapeGraphError(error) ? error.suggestion : undefined;
}
