/**
 * Unit tests for ShapeGraph error classes.
 */
import { describe, expect, it } from "vitest";

import {
  CardinalityConflictError,
  ConcurrentModificationError,
  ConfigurationError,
  CrossGraphMismatchError,
  CyclicInheritanceError,
  DuplicateIdentifierError,
  EntityNotFoundError,
  getErrorSuggestion,
  InconsistentRestrictionsError,
  InheritedCardinalityViolationError,
  InvalidIdentifierError,
  isConstraintError,
  isShapeGraphError,
  isSystemError,
  isUserRecoverable,
  ModelInconsistentError,
  ModelStateError,
  PartialCommitRolledBackError,
  PartialCommitUnrecoverableError,
  PropertyInUseError,
  PropertyNotReusableError,
  ResourceClassInUseError,
  ShapeGraphError,
  StoreUnavailableError,
  UnknownSuperclassError,
  ValidationError,
} from "../src/errors";

describe("ShapeGraphError", () => {
  it("creates error with message, code, and options", () => {
    const error = new ShapeGraphError("test message", "TEST_CODE", {
      category: "user",
    });
    expect(error.message).toBe("test message");
    expect(error.code).toBe("TEST_CODE");
    expect(error.name).toBe("ShapeGraphError");
    expect(error.category).toBe("user");
  });

  it("defaults to empty details", () => {
    const error = new ShapeGraphError("test", "CODE", { category: "user" });
    expect(error.details).toEqual({});
  });

  it("supports error cause chain", () => {
    const cause = new Error("root cause");
    const error = new ShapeGraphError("wrapper", "CODE", {
      category: "system",
      cause,
    });
    expect(error.cause).toBe(cause);
    expect(error).toBeInstanceOf(Error);
  });

  it("formats user message with and without suggestion", () => {
    const withSuggestion = new ShapeGraphError("something went wrong", "CODE", {
      category: "user",
      suggestion: "try again later",
    });
    const without = new ShapeGraphError("something went wrong", "CODE", {
      category: "user",
    });
    expect(withSuggestion.toUserMessage()).toBe(
      "something went wrong\n\nSuggestion: try again later",
    );
    expect(without.toUserMessage()).toBe("something went wrong");
  });

  it("formats log string", () => {
    const error = new ShapeGraphError("something went wrong", "TEST_CODE", {
      category: "user",
      details: { key: "value" },
      suggestion: "fix it",
      cause: "disk full",
    });
    expect(error.toLogString()).toBe(
      [
        "[TEST_CODE] something went wrong",
        "  Category: user",
        "  Suggestion: fix it",
        '  Details: {"key":"value"}',
        "  Cause: disk full",
      ].join("\n"),
    );
  });
});

describe("ValidationError", () => {
  it("lists the failing paths in its suggestion", () => {
    const error = new ValidationError("validation failed", {
      entity: "property",
      issues: [
        { path: "restrictions.maxLength", message: "expected number" },
        { path: "", message: "unrecognized key" },
      ],
    });
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.category).toBe("user");
    expect(error.suggestion).toBe(
      "Check the following fields: restrictions.maxLength, (root). See error.details.issues for specific validation failures.",
    );
  });
});

describe("InconsistentRestrictionsError", () => {
  it("names the facets to fix", () => {
    const error = new InconsistentRestrictionsError("inconsistent", {
      issues: [{ path: "minLength", message: "needs a string datatype" }],
    });
    expect(error.code).toBe("INCONSISTENT_RESTRICTIONS");
    expect(error.suggestion).toBe("Fix the restriction facets: minLength.");
  });
});

describe("lookup and state errors", () => {
  it("formats identifier and lookup messages", () => {
    expect(new InvalidIdentifierError("x", "not an absolute identifier").message).toBe(
      'Invalid identifier "x": not an absolute identifier',
    );
    expect(new EntityNotFoundError("property", "ex:title").message).toBe(
      "Property not found: ex:title",
    );
    expect(new EntityNotFoundError("resourceClass", "ex:Book").message).toBe(
      "Resource class not found: ex:Book",
    );
    expect(new ModelStateError("commit", "committing").message).toBe(
      "Cannot commit while the data model is committing",
    );
  });

  it("says who holds a duplicate identifier", () => {
    expect(
      new DuplicateIdentifierError({
        iri: "ex:genre",
        existing: "privateProperty",
        owner: "ex:Book",
      }).message,
    ).toBe('Identifier "ex:genre" is already used by a private property of ex:Book');
    expect(
      new DuplicateIdentifierError({ iri: "ex:Book", existing: "resourceClass" })
        .message,
    ).toBe('Identifier "ex:Book" is already used by a resource class');
  });

  it("names the missing superclass", () => {
    const error = new UnknownSuperclassError({
      resourceClass: "ex:Novel",
      superclass: "ex:Book",
    });
    expect(error.message).toBe(
      'Superclass "ex:Book" of "ex:Novel" is not defined in this data model',
    );
    expect(error.suggestion).toBe(
      'Create "ex:Book" before referencing it as a superclass.',
    );
  });
});

describe("constraint errors", () => {
  it("lists what still references a property or class", () => {
    expect(
      new PropertyInUseError({
        iri: "ex:title",
        referencedBy: ["ex:Book", "ex:Magazine"],
      }).message,
    ).toBe('Cannot delete property "ex:title": still referenced by ex:Book, ex:Magazine');
    expect(
      new ResourceClassInUseError({ iri: "ex:Book", subclasses: ["ex:Novel"] })
        .message,
    ).toBe('Cannot delete resource class "ex:Book": it is the superclass of ex:Novel');
  });

  it("describes cardinality conflicts", () => {
    expect(
      new CardinalityConflictError({
        resourceClass: "ex:Book",
        property: "ex:isbn",
        facet: "maxCount",
        local: 2,
        declared: 1,
      }).message,
    ).toBe(
      'Cardinality conflict on "ex:Book" → "ex:isbn": local maxCount 2 is incompatible with the property\'s declared maxCount 1',
    );
    expect(
      new InheritedCardinalityViolationError({
        resourceClass: "ex:Novel",
        property: "ex:title",
        inheritedFrom: "ex:Book",
        facet: "minCount",
        local: 0,
        inherited: 1,
      }).message,
    ).toBe(
      '"ex:Novel" loosens the minCount of "ex:title" inherited from "ex:Book" (0 vs 1)',
    );
  });

  it("prints the cycle it would close", () => {
    const error = new CyclicInheritanceError({
      resourceClass: "ex:A",
      superclass: "ex:C",
      cycle: ["ex:A", "ex:C", "ex:B", "ex:A"],
    });
    expect(error.message).toBe(
      'Setting "ex:C" as superclass of "ex:A" creates a cycle: ex:A → ex:C → ex:B → ex:A',
    );
  });

  it("refuses to reuse a private property", () => {
    const error = new PropertyNotReusableError({
      property: "ex:genre",
      owner: "ex:Book",
      resourceClass: "ex:Film",
    });
    expect(error.message).toBe(
      'Property "ex:genre" is private to "ex:Book" and cannot be bound to "ex:Film"',
    );
  });

  it("reports the first model violation", () => {
    const error = new ModelInconsistentError([
      { path: "ex:count.minLength", message: "needs a string datatype" },
      { path: "ex:other", message: "ignored in message" },
    ]);
    expect(error.message).toBe(
      "Data model is inconsistent: ex:count.minLength: needs a string datatype",
    );
    expect(error.details.issues).toHaveLength(2);
  });
});

describe("store errors", () => {
  it("reports both markers of a concurrent modification", () => {
    const error = new ConcurrentModificationError({
      project: "library",
      expectedMarker: undefined,
      actualMarker: "1:abc",
    });
    expect(error.message).toBe(
      'Concurrent modification of data model "library": expected marker (none), found 1:abc',
    );
  });

  it("carries the live delta when a commit cannot be reverted", () => {
    const applied = {
      graph: "http://example.org/library/shacl",
      removals: [],
      additions: ["<http://example.org/a> <http://example.org/b> <http://example.org/c> ."],
    };
    const error = new PartialCommitUnrecoverableError({
      project: "library",
      reason: "timeout",
      applied,
    });
    expect(error.message).toBe(
      'Commit of data model "library" left the store inconsistent: timeout',
    );
    expect(error.details.applied).toEqual(applied);
    expect(error.suggestion).toBe(
      "Revert error.details.applied on graph http://example.org/library/shacl manually, then reload.",
    );
  });

  it("keeps the gateway failure as cause", () => {
    const cause = new Error("socket hang up");
    const error = new PartialCommitRolledBackError(
      { project: "library", reason: "socket hang up" },
      { cause },
    );
    expect(error.message).toBe(
      'Commit of data model "library" failed and was rolled back: socket hang up',
    );
    expect(error.cause).toBe(cause);
  });
});

describe("error helpers", () => {
  const userError = new EntityNotFoundError("property", "ex:title");
  const constraintError = new PropertyInUseError({
    iri: "ex:title",
    referencedBy: ["ex:Book"],
  });
  const systemErrors = [
    new StoreUnavailableError("down", { operation: "readGraph", graph: "g" }),
    new CrossGraphMismatchError("differs", { project: "p", subject: "s" }),
    new ConfigurationError("bad config"),
  ];

  it("classifies errors by category", () => {
    expect(isUserRecoverable(userError)).toBe(true);
    expect(isUserRecoverable(constraintError)).toBe(true);
    expect(isConstraintError(constraintError)).toBe(true);
    expect(isConstraintError(userError)).toBe(false);
    for (const error of systemErrors) {
      expect(isSystemError(error)).toBe(true);
      expect(isUserRecoverable(error)).toBe(false);
    }
  });

  it("ignores foreign errors", () => {
    const foreign = new Error("plain");
    expect(isShapeGraphError(foreign)).toBe(false);
    expect(isUserRecoverable(foreign)).toBe(false);
    expect(getErrorSuggestion(foreign)).toBeUndefined();
  });

  it("returns the suggestion of a ShapeGraph error", () => {
    expect(getErrorSuggestion(new ConfigurationError("bad config"))).toBe(
      "Review the gateway configuration for errors.",
    );
  });
});
