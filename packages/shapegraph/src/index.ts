/**
 * shapegraph: schema management for RDF stores
 *
 * Keeps a project's data model (properties, resource classes and their
 * bindings) in two graphs: SHACL shapes for validation and OWL
 * declarations for inference.
 *
 * @example
 * ```typescript
 * import { createMemoryGateway, DataModel } from "shapegraph";
 *
 * const gateway = createMemoryGateway();
 * const model = await DataModel.load(gateway, {
 *   shortName: "library",
 *   namespace: "http://example.org/library/",
 * }, { prefixes: { ex: "http://example.org/" } });
 *
 * model.createProperty({
 *   iri: "ex:title",
 *   restrictions: { datatype: "xsd:string", minLength: 1, maxLength: 200 },
 * });
 * model.createResourceClass({
 *   iri: "ex:Book",
 *   properties: [{ property: "ex:title", minCount: 1, maxCount: 1 }],
 * });
 *
 * await model.commit();
 * ```
 */

// ============================================================
// Data Model
// ============================================================

export {
  type ChangeKind,
  type ChangeLogEntry,
  type CommitResult,
  DataModel,
  type DataModelOptions,
  type ModelDelta,
  type ModelState,
} from "./model/data-model";

export {
  type CommitEndInfo,
  type DataModelHooks,
  type DeltaAppliedInfo,
  type GraphRole,
  type HookContext,
  type RollbackInfo,
} from "./model/hooks";

export {
  type BindingDefinition,
  type BindingOverrides,
  type BindingUpdate,
  EMPTY_MODEL,
  type EffectiveBinding,
  type HasProperty,
  type Model,
  type Property,
  type PropertyAttribute,
  type PropertyAttributeValues,
  type PropertyDefinition,
  type PropertyOrigin,
  type PropertyReference,
  type Provenance,
  type ResourceClass,
  type ResourceClassAttribute,
  type ResourceClassAttributeValues,
  type ResourceClassDefinition,
} from "./model/types";

// ============================================================
// Pure Helpers
// ============================================================

export {
  checkBindingCardinality,
  displayBindings,
} from "./model/has-property";
export { defineProperty, updatePropertyAttribute } from "./model/property";
export {
  computeEffectiveBindings,
  defineResourceClass,
  wouldCreateCycle,
} from "./model/resource-class";
export { modelsEqual } from "./model/equality";
export { validateModel } from "./model/validate-model";
export {
  type RestrictionInput,
  type RestrictionSet,
  validateRestrictions,
} from "./restrictions";

// ============================================================
// Identifiers & Literals
// ============================================================

export {
  compactIri,
  fromShapeIri,
  type Iri,
  type IriInput,
  isIri,
  type PrefixMap,
  resolveIri,
  toShapeIri,
} from "./identifier";

export {
  formatTypedValue,
  isValidLexical,
  type LangString,
  langString,
  numericValue,
  parseTypedValue,
  supportedDatatypes,
  type TypedValue,
} from "./literal";

// ============================================================
// Graph Layout
// ============================================================

export {
  defineProject,
  deserializeModel,
  type DeserializedModel,
  describeDelta,
  diffStatements,
  type Project,
  type ProjectDefinition,
  serializeModel,
  type SerializedModel,
  type SerializeOptions,
  type SnapshotMarker,
  type Statement,
  type StatementDelta,
} from "./rdf";

export {
  DCTERMS,
  OWL,
  RDF,
  RDFS,
  SG,
  SH,
  STANDARD_PREFIXES,
} from "./ontology/constants";

// ============================================================
// Store Gateways
// ============================================================

export {
  type ApplyDeltaResult,
  createMemoryGateway,
  type MemoryGateway,
  type ReadGraphResult,
  type StoreFailure,
  type StoreGateway,
} from "./gateway";

// ============================================================
// Errors
// ============================================================

export {
  CardinalityConflictError,
  ConcurrentModificationError,
  ConfigurationError,
  CrossGraphMismatchError,
  CyclicInheritanceError,
  type DeltaDescription,
  DuplicateIdentifierError,
  EntityNotFoundError,
  type ErrorCategory,
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
  type ValidationIssue,
} from "./errors";

// ============================================================
// Utilities
// ============================================================

export { err, ok, type Result } from "./utils/result";
