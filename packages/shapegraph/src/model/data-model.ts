import {
  ConcurrentModificationError,
  EntityNotFoundError,
  ModelInconsistentError,
  ModelStateError,
  PartialCommitRolledBackError,
  PartialCommitUnrecoverableError,
  type ValidationIssue,
} from "../errors";
import {
  applyDeltaOrThrow,
  applyDeltaSafely,
  readGraphOrThrow,
} from "../gateway/calls";
import { type StoreFailure, type StoreGateway } from "../gateway/types";
import {
  type Iri,
  type IriInput,
  mergePrefixes,
  type PrefixMap,
  resolveIri,
} from "../identifier";
import { modelToTrig } from "../interchange/export";
import { type TrigExportOptions } from "../interchange/types";
import { DEFAULT_SYSTEM_PREDICATES } from "../ontology/constants";
import {
  describeDelta,
  diffStatements,
  EMPTY_DELTA,
  invertDelta,
  isEmptyDelta,
  mergeDeltas,
  type StatementDelta,
} from "../rdf/delta";
import { deserializeModel } from "../rdf/deserialize";
import {
  constraintMarkerStatements,
  inferenceMarkerStatements,
  nextMarker,
  readMarker,
  type SnapshotMarker,
} from "../rdf/marker";
import { type Project, type ProjectDefinition, toProject } from "../rdf/project";
import { serializeModel } from "../rdf/serialize";
import { generateId } from "../utils";
import { bindingPropertyIri, displayBindings } from "./has-property";
import {
  type DataModelHooks,
  type GraphRole,
  type HookContext,
} from "./hooks";
import {
  addProperty,
  addResourceClass,
  attachProperty,
  detachProperty,
  findIdentifierOwner,
  findProperty,
  removeProperty,
  removeResourceClass,
  replaceProperty,
  replaceResourceClass,
  requireResourceClass,
  setSuperclass,
  updateBinding,
} from "./operations";
import { defineProperty, updatePropertyAttribute } from "./property";
import {
  type ProvenanceStamp,
  provenanceStamp,
  stampCreated,
  stampNewResourceClass,
  stampTouched,
  touchResourceClass,
} from "./provenance";
import {
  computeEffectiveBindings,
  defineResourceClass,
  updateResourceClassAttribute,
} from "./resource-class";
import {
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
  type ResourceClass,
  type ResourceClassAttribute,
  type ResourceClassAttributeValues,
  type ResourceClassDefinition,
} from "./types";
import { validateModel } from "./validate-model";

// ============================================================
// Types
// ============================================================

/**
 * Lifecycle of a DataModel instance.
 *
 * - `unloaded`: nothing read yet; only `reload()` is allowed
 * - `clean`: mirrors the store as last read or written
 * - `dirty`: holds changes not yet committed
 * - `committing`: a commit is writing to the store
 */
export type ModelState = "unloaded" | "clean" | "dirty" | "committing";

export type ChangeKind =
  | "createProperty"
  | "updateProperty"
  | "deleteProperty"
  | "createResourceClass"
  | "updateResourceClass"
  | "setSuperclass"
  | "deleteResourceClass"
  | "attachProperty"
  | "updateBinding"
  | "detachProperty";

/**
 * One mutation recorded since the last load, commit or discard.
 */
export type ChangeLogEntry = Readonly<{
  sequence: number;
  kind: ChangeKind;
  /** Property or class the change was made to */
  target: Iri;
  /** Bound property, for binding changes */
  property?: Iri;
  /** Changed attribute, for updates */
  attribute?: string;
}>;

/**
 * Statement changes for both graphs.
 */
export type ModelDelta = Readonly<{
  constraint: StatementDelta;
  inference: StatementDelta;
}>;

export type CommitResult = Readonly<{
  /** False when there was nothing to write and the store was not contacted */
  written: boolean;
  /** Marker the store now carries */
  marker: SnapshotMarker | undefined;
  /** What was written, marker statements included */
  applied: ModelDelta;
}>;

export type DataModelOptions = Readonly<{
  /** Observability hooks for monitoring */
  hooks?: DataModelHooks;
  /** Prefix → namespace entries for qualified identifiers */
  prefixes?: PrefixMap;
  /** Predicates always permitted on instances of closed classes */
  systemPredicates?: readonly string[];
  /** Source of creation and modification times; defaults to the system clock */
  clock?: () => Date;
  /** Recorded as creator of new entities and contributor of changed ones */
  agent?: IriInput;
}>;

type ChangeInput = Omit<ChangeLogEntry, "sequence">;

const EMPTY_MODEL_DELTA: ModelDelta = Object.freeze({
  constraint: EMPTY_DELTA,
  inference: EMPTY_DELTA,
});

function isEmptyModelDelta(delta: ModelDelta): boolean {
  return isEmptyDelta(delta.constraint) && isEmptyDelta(delta.inference);
}

function statementCount(delta: ModelDelta): number {
  return (
    delta.constraint.removals.length +
    delta.constraint.additions.length +
    delta.inference.removals.length +
    delta.inference.additions.length
  );
}

// ============================================================
// DataModel
// ============================================================

/**
 * The schema of one project: standalone properties and resource classes,
 * kept in step with the project's constraint and inference graphs.
 *
 * Mutations apply to an in-memory working copy and are recorded in a
 * change log. `commit()` writes the statement delta to the constraint
 * graph, then to the inference graph, reverting the first write when
 * the second one fails. A snapshot marker stored with both graphs
 * detects commits made by other instances since this one loaded.
 *
 * An instance is not synchronized: callers serialize access to it.
 *
 * @example
 * ```typescript
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
export class DataModel {
  readonly #gateway: StoreGateway;
  readonly #project: Project;
  readonly #hooks: DataModelHooks;
  readonly #prefixes: PrefixMap;
  readonly #systemPredicates: readonly Iri[];
  readonly #clock: () => Date;
  readonly #agent: Iri | undefined;

  #state: ModelState = "unloaded";
  #snapshot: Model = EMPTY_MODEL;
  #current: Model = EMPTY_MODEL;
  #marker: SnapshotMarker | undefined;
  #log: ChangeLogEntry[] = [];
  #sequence = 0;

  constructor(
    gateway: StoreGateway,
    project: Project | ProjectDefinition,
    options: DataModelOptions = {},
  ) {
    this.#gateway = gateway;
    this.#project = toProject(project);
    this.#hooks = options.hooks ?? {};
    this.#prefixes = mergePrefixes({
      [this.#project.shortName]: this.#project.namespace,
      ...options.prefixes,
    });
    this.#systemPredicates = (
      options.systemPredicates ?? DEFAULT_SYSTEM_PREDICATES
    ).map((predicate) => resolveIri(predicate, this.#prefixes));
    this.#clock = options.clock ?? (() => new Date());
    this.#agent =
      options.agent === undefined ?
        undefined
      : resolveIri(options.agent, this.#prefixes);
  }

  /**
   * Reads the project's graphs and returns a clean model.
   *
   * @throws StoreUnavailableError when a graph cannot be read
   * @throws CrossGraphMismatchError when the two graphs disagree
   * @throws ModelInconsistentError when a statement cannot be read back
   */
  static async load(
    gateway: StoreGateway,
    project: Project | ProjectDefinition,
    options?: DataModelOptions,
  ): Promise<DataModel> {
    const model = new DataModel(gateway, project, options);
    await model.reload();
    return model;
  }

  // === Accessors ===

  get project(): Project {
    return this.#project;
  }

  get state(): ModelState {
    return this.#state;
  }

  /** Marker of the store state this model was loaded from or last wrote */
  get marker(): SnapshotMarker | undefined {
    return this.#marker;
  }

  /** Mutations since the last load, commit or discard, oldest first */
  get changeLog(): readonly ChangeLogEntry[] {
    return [...this.#log];
  }

  /** The working copy */
  get model(): Model {
    return this.#current;
  }

  get prefixes(): PrefixMap {
    return this.#prefixes;
  }

  // === Lifecycle ===

  /**
   * Replaces the in-memory state with what the store holds now.
   * Pending changes are dropped.
   */
  async reload(): Promise<void> {
    if (this.#state === "committing") {
      throw new ModelStateError("reload", this.#state);
    }
    const ctx = this.#createHookContext();
    try {
      const { constraintGraph, inferenceGraph } = this.#project;
      const constraint = await readGraphOrThrow(this.#gateway, constraintGraph);
      const inference = await readGraphOrThrow(this.#gateway, inferenceGraph);
      const { model, marker } = deserializeModel(
        constraint,
        inference,
        this.#project,
      );
      this.#reset(model, marker);
    } catch (error) {
      this.#reportError(ctx, error);
      throw error;
    }
  }

  /**
   * Drops pending changes and returns to the last loaded or committed state.
   */
  discard(): void {
    this.#assertMutable("discard changes");
    this.#reset(this.#snapshot, this.#marker);
  }

  // === Properties ===

  /**
   * @throws DuplicateIdentifierError when the identifier is taken
   * @throws InconsistentRestrictionsError when the restrictions fail a cross-check
   */
  createProperty(definition: PropertyDefinition): Property {
    this.#assertMutable("create a property");
    const property = stampCreated(
      defineProperty(definition, { prefixes: this.#prefixes }),
      this.#stamp(),
    );
    this.#apply(addProperty(this.#current, property), {
      kind: "createProperty",
      target: property.iri,
    });
    return this.#requireProperty(property.iri);
  }

  /**
   * Replaces one attribute of a standalone or private property.
   * Passing `undefined` removes it.
   *
   * @throws InconsistentRestrictionsError when the resulting set fails a cross-check
   * @throws CardinalityConflictError when a binding becomes wider than the property
   */
  updateProperty<K extends PropertyAttribute>(
    iri: IriInput,
    attribute: K,
    value: PropertyAttributeValues[K] | undefined,
  ): Property {
    this.#assertMutable("update a property");
    const current = this.#requireProperty(this.#resolve(iri));
    const updated = stampTouched(
      updatePropertyAttribute(current, attribute, value, this.#prefixes),
      this.#stamp(),
    );
    this.#apply(replaceProperty(this.#current, updated), {
      kind: "updateProperty",
      target: updated.iri,
      attribute,
    });
    return updated;
  }

  /**
   * @throws PropertyInUseError when a binding or another property references it
   */
  deleteProperty(iri: IriInput): void {
    this.#assertMutable("delete a property");
    const target = this.#resolve(iri);
    this.#apply(removeProperty(this.#current, target), {
      kind: "deleteProperty",
      target,
    });
  }

  /** Standalone or private property with this identifier */
  getProperty(iri: IriInput): Property | undefined {
    return findProperty(this.#current, this.#resolve(iri));
  }

  /** Standalone properties */
  properties(): readonly Property[] {
    return [...this.#current.properties.values()];
  }

  // === Resource Classes ===

  /**
   * @throws DuplicateIdentifierError when the identifier is taken
   * @throws UnknownSuperclassError when the superclass is not in the model
   * @throws CardinalityConflictError when a binding widens its property's cardinality
   */
  createResourceClass(definition: ResourceClassDefinition): ResourceClass {
    this.#assertMutable("create a resource class");
    const resourceClass = stampNewResourceClass(
      defineResourceClass(definition, { prefixes: this.#prefixes }),
      this.#stamp(),
    );
    const next = addResourceClass(this.#current, resourceClass);
    this.#apply(next, {
      kind: "createResourceClass",
      target: resourceClass.iri,
    });
    return requireResourceClass(next, resourceClass.iri);
  }

  updateResourceClass<K extends ResourceClassAttribute>(
    iri: IriInput,
    attribute: K,
    value: ResourceClassAttributeValues[K] | undefined,
  ): ResourceClass {
    this.#assertMutable("update a resource class");
    const current = requireResourceClass(this.#current, this.#resolve(iri));
    const updated = stampTouched(
      updateResourceClassAttribute(current, attribute, value),
      this.#stamp(),
    );
    const next = replaceResourceClass(this.#current, updated);
    this.#apply(next, {
      kind: "updateResourceClass",
      target: updated.iri,
      attribute,
    });
    return requireResourceClass(next, updated.iri);
  }

  /**
   * Sets the superclass, or clears it with `undefined`.
   *
   * @throws UnknownSuperclassError when the superclass is not in the model
   * @throws CyclicInheritanceError when the class is already an ancestor of it
   * @throws InheritedCardinalityViolationError when a binding loosens an inherited one
   */
  setSuperclass(iri: IriInput, superclass: IriInput | undefined): void {
    this.#assertMutable("set a superclass");
    const target = this.#resolve(iri);
    const next = setSuperclass(
      this.#current,
      target,
      superclass === undefined ? undefined : this.#resolve(superclass),
    );
    this.#apply(touchResourceClass(next, target, this.#stamp()), {
      kind: "setSuperclass",
      target,
    });
  }

  closeResourceClass(iri: IriInput): ResourceClass {
    return this.updateResourceClass(iri, "closed", true);
  }

  reopenResourceClass(iri: IriInput): ResourceClass {
    return this.updateResourceClass(iri, "closed", false);
  }

  /**
   * Deletes a class together with its private properties.
   *
   * @throws ResourceClassInUseError when another class names it as superclass
   */
  deleteResourceClass(iri: IriInput): void {
    this.#assertMutable("delete a resource class");
    const target = this.#resolve(iri);
    this.#apply(removeResourceClass(this.#current, target), {
      kind: "deleteResourceClass",
      target,
    });
  }

  getResourceClass(iri: IriInput): ResourceClass | undefined {
    return this.#current.resourceClasses.get(this.#resolve(iri));
  }

  resourceClasses(): readonly ResourceClass[] {
    return [...this.#current.resourceClasses.values()];
  }

  /**
   * Own and inherited bindings of a class, inherited first.
   */
  effectiveProperties(iri: IriInput): readonly EffectiveBinding[] {
    const target = this.#resolve(iri);
    requireResourceClass(this.#current, target);
    return computeEffectiveBindings(this.#current, target);
  }

  /**
   * Own bindings of a class sorted by `order`.
   */
  displayBindings(iri: IriInput): readonly HasProperty[] {
    return displayBindings(
      requireResourceClass(this.#current, this.#resolve(iri)).bindings,
    );
  }

  // === Bindings ===

  /**
   * Binds a standalone property (by identifier) or a new private property
   * (by definition) to a class.
   *
   * @throws PropertyNotReusableError when the property is private to another class
   * @throws CardinalityConflictError when the local cardinality widens the property's
   * @throws InheritedCardinalityViolationError when it loosens an inherited binding
   */
  attachProperty(
    classIri: IriInput,
    property: IriInput | PropertyDefinition,
    overrides?: BindingOverrides,
  ): HasProperty {
    this.#assertMutable("attach a property");
    const target = this.#resolve(classIri);
    const stamp = this.#stamp();
    const attached =
      typeof property === "string" ?
        this.#resolve(property)
      : stampCreated(
          defineProperty(property, {
            origin: "private",
            prefixes: this.#prefixes,
          }),
          stamp,
        );
    const propertyIri = typeof attached === "string" ? attached : attached.iri;
    const next = touchResourceClass(
      attachProperty(this.#current, target, attached, overrides),
      target,
      stamp,
    );
    this.#apply(next, {
      kind: "attachProperty",
      target,
      property: propertyIri,
    });
    return this.#requireBinding(next, target, propertyIri);
  }

  /**
   * Changes a binding's local cardinality or order; `null` clears a bound.
   */
  updateBinding(
    classIri: IriInput,
    propertyIri: IriInput,
    update: BindingUpdate,
  ): HasProperty {
    this.#assertMutable("update a binding");
    const target = this.#resolve(classIri);
    const property = this.#resolve(propertyIri);
    const next = touchResourceClass(
      updateBinding(this.#current, target, property, update),
      target,
      this.#stamp(),
    );
    this.#apply(next, { kind: "updateBinding", target, property });
    return this.#requireBinding(next, target, property);
  }

  /**
   * Removes a binding. A standalone property stays in the model.
   */
  detachProperty(classIri: IriInput, propertyIri: IriInput): void {
    this.#assertMutable("detach a property");
    const target = this.#resolve(classIri);
    const property = this.#resolve(propertyIri);
    const next = detachProperty(this.#current, target, property);
    this.#apply(touchResourceClass(next, target, this.#stamp()), {
      kind: "detachProperty",
      target,
      property,
    });
  }

  // === Protocol ===

  /**
   * Whole-model check, as run by `commit()`.
   */
  validate(): readonly ValidationIssue[] {
    return validateModel(this.#current);
  }

  /**
   * Statement changes the pending mutations amount to, marker statements
   * excluded. Only entities named in the change log, and classes bound
   * to them, are serialized.
   */
  computeDelta(): ModelDelta {
    if (this.#log.length === 0) return EMPTY_MODEL_DELTA;
    const options = {
      scope: this.#deltaScope(),
      systemPredicates: this.#systemPredicates,
    };
    const before = serializeModel(this.#snapshot, options);
    const after = serializeModel(this.#current, options);
    return {
      constraint: diffStatements(before.constraint, after.constraint),
      inference: diffStatements(before.inference, after.inference),
    };
  }

  /**
   * Writes pending changes to the store. With nothing to write the store
   * is not contacted.
   *
   * @throws ModelInconsistentError when whole-model validation fails
   * @throws StoreUnavailableError when the store cannot be read, or the first write fails
   * @throws ConcurrentModificationError when another commit happened since load
   * @throws PartialCommitRolledBackError when the second write failed and was reverted
   * @throws PartialCommitUnrecoverableError when reverting failed as well
   */
  async commit(): Promise<CommitResult> {
    this.#assertMutable("commit");
    const delta = this.computeDelta();
    if (isEmptyModelDelta(delta)) {
      this.#reset(this.#current, this.#marker);
      return { written: false, marker: this.#marker, applied: delta };
    }

    const ctx = this.#createHookContext();
    this.#state = "committing";
    try {
      return await this.#withCommitHooks(ctx, () => this.#write(ctx, delta));
    } finally {
      if (this.#state === "committing") this.#state = "dirty";
    }
  }

  /**
   * The working copy as TriG, in the layout a commit writes.
   */
  toTrig(options: TrigExportOptions = {}): Promise<string> {
    return modelToTrig(this.#current, this.#project, {
      ...(this.#marker !== undefined && { marker: this.#marker }),
      systemPredicates: this.#systemPredicates,
      prefixes: { ...this.#prefixes, ...options.prefixes },
    });
  }

  // === Internal: Commit ===

  async #write(ctx: HookContext, delta: ModelDelta): Promise<CommitResult> {
    const issues = validateModel(this.#current);
    if (issues.length > 0) throw new ModelInconsistentError(issues);

    const project = this.#project;
    const stored = readMarker(
      project,
      await readGraphOrThrow(this.#gateway, project.constraintGraph),
    );
    if (stored !== this.#marker) {
      throw new ConcurrentModificationError({
        project: project.shortName,
        expectedMarker: this.#marker,
        actualMarker: stored,
      });
    }

    const marker = nextMarker(this.#marker);
    const applied: ModelDelta = {
      constraint: mergeDeltas(
        delta.constraint,
        diffStatements(
          constraintMarkerStatements(project, this.#marker),
          constraintMarkerStatements(project, marker),
        ),
      ),
      inference: mergeDeltas(
        delta.inference,
        diffStatements(
          inferenceMarkerStatements(project, this.#marker),
          inferenceMarkerStatements(project, marker),
        ),
      ),
    };

    await applyDeltaOrThrow(
      this.#gateway,
      project.constraintGraph,
      applied.constraint,
    );
    this.#notifyApplied(ctx, "constraint", applied.constraint);

    const second = await applyDeltaSafely(
      this.#gateway,
      project.inferenceGraph,
      applied.inference,
    );
    if (!second.success) {
      return this.#compensate(ctx, applied.constraint, second.error);
    }
    this.#notifyApplied(ctx, "inference", applied.inference);

    this.#reset(this.#current, marker);
    return { written: true, marker, applied };
  }

  /**
   * Reverts the constraint-graph write after the inference write failed.
   */
  async #compensate(
    ctx: HookContext,
    constraint: StatementDelta,
    failure: StoreFailure,
  ): Promise<never> {
    const graph = this.#project.constraintGraph;
    const rollback = await applyDeltaSafely(
      this.#gateway,
      graph,
      invertDelta(constraint),
    );
    this.#observe(ctx, (hooks) =>
      hooks.onRollback?.(ctx, {
        graph,
        succeeded: rollback.success,
        reason: failure.reason,
      }),
    );

    if (rollback.success) {
      throw new PartialCommitRolledBackError(
        { project: this.#project.shortName, reason: failure.reason },
        { cause: failure.cause },
      );
    }
    throw new PartialCommitUnrecoverableError(
      {
        project: this.#project.shortName,
        reason: `${failure.reason}; reverting the constraint graph failed: ${rollback.error.reason}`,
        applied: describeDelta(graph, constraint),
      },
      { cause: rollback.error.cause ?? failure.cause },
    );
  }

  #notifyApplied(
    ctx: HookContext,
    role: GraphRole,
    delta: StatementDelta,
  ): void {
    this.#observe(ctx, (hooks) =>
      hooks.onDeltaApplied?.(ctx, {
        role,
        graph:
          role === "constraint" ?
            this.#project.constraintGraph
          : this.#project.inferenceGraph,
        removals: delta.removals.length,
        additions: delta.additions.length,
      }),
    );
  }

  /**
   * Identifiers whose statements may differ between snapshot and working
   * copy: everything the log names, owners of named private properties,
   * and classes binding a named property (their OWL restrictions carry
   * its range).
   */
  #deltaScope(): ReadonlySet<Iri> {
    const touched = new Set<Iri>();
    for (const entry of this.#log) {
      touched.add(entry.target);
      if (entry.property !== undefined) touched.add(entry.property);
    }

    const scope = new Set(touched);
    for (const model of [this.#snapshot, this.#current]) {
      for (const iri of touched) {
        const owner = findIdentifierOwner(model, iri);
        if (owner?.kind === "privateProperty") scope.add(owner.owner);
      }
      for (const resourceClass of model.resourceClasses.values()) {
        if (
          resourceClass.bindings.some((binding) =>
            touched.has(bindingPropertyIri(binding)),
          )
        ) {
          scope.add(resourceClass.iri);
        }
      }
    }
    return scope;
  }

  // === Internal: State ===

  #assertMutable(operation: string): void {
    if (this.#state === "unloaded" || this.#state === "committing") {
      throw new ModelStateError(operation, this.#state);
    }
  }

  #apply(next: Model, change: ChangeInput): void {
    this.#current = next;
    this.#sequence += 1;
    this.#log.push(Object.freeze({ sequence: this.#sequence, ...change }));
    this.#state = "dirty";
  }

  #reset(model: Model, marker: SnapshotMarker | undefined): void {
    this.#snapshot = model;
    this.#current = model;
    this.#marker = marker;
    this.#log = [];
    this.#state = "clean";
  }

  #stamp(): ProvenanceStamp {
    return provenanceStamp(this.#clock(), this.#agent);
  }

  #resolve(iri: IriInput): Iri {
    return resolveIri(iri, this.#prefixes);
  }

  #requireProperty(iri: Iri): Property {
    const property = findProperty(this.#current, iri);
    if (property === undefined) throw new EntityNotFoundError("property", iri);
    return property;
  }

  #requireBinding(model: Model, classIri: Iri, propertyIri: Iri): HasProperty {
    const binding = requireResourceClass(model, classIri).bindings.find(
      (candidate) => bindingPropertyIri(candidate) === propertyIri,
    );
    if (binding === undefined) {
      throw new EntityNotFoundError("property", propertyIri);
    }
    return binding;
  }

  // === Internal: Hook Helpers ===

  #createHookContext(): HookContext {
    return {
      operationId: generateId(),
      project: this.#project.shortName,
      startedAt: new Date(),
    };
  }

  async #withCommitHooks(
    ctx: HookContext,
    fn: () => Promise<CommitResult>,
  ): Promise<CommitResult> {
    this.#observe(ctx, (hooks) => hooks.onCommitStart?.(ctx));
    const startTime = Date.now();
    try {
      const result = await fn();
      this.#observe(ctx, (hooks) =>
        hooks.onCommitEnd?.(ctx, {
          durationMs: Date.now() - startTime,
          marker: result.marker,
          statements: statementCount(result.applied),
        }),
      );
      return result;
    } catch (error) {
      this.#reportError(ctx, error);
      throw error;
    }
  }

  /**
   * Runs a hook. A hook that throws or rejects is reported to `onError`
   * and never changes the outcome of the operation it observes.
   */
  #observe(ctx: HookContext, notify: (hooks: DataModelHooks) => unknown): void {
    let returned: unknown;
    try {
      returned = notify(this.#hooks);
    } catch (error) {
      this.#reportError(ctx, error);
      return;
    }
    if (returned instanceof Promise) {
      void returned.catch((error: unknown) => {
        this.#reportError(ctx, error);
      });
    }
  }

  #reportError(ctx: HookContext, error: unknown): void {
    const reported = error instanceof Error ? error : new Error(String(error));
    try {
      this.#hooks.onError?.(ctx, reported);
    } catch (hookError) {
      console.warn(
        `[shapegraph] onError hook failed for operation ${ctx.operationId}:`,
        hookError,
      );
    }
  }
}
