import { type SnapshotMarker } from "../rdf/marker";

// ============================================================
// Observability Hooks
// ============================================================

/**
 * Context passed to observability hooks.
 */
export type HookContext = Readonly<{
  /** Unique ID for this operation */
  operationId: string;
  /** Short name of the project */
  project: string;
  /** Timestamp when operation started */
  startedAt: Date;
}>;

/**
 * Which of the two graphs a write went to.
 */
export type GraphRole = "constraint" | "inference";

export type DeltaAppliedInfo = Readonly<{
  role: GraphRole;
  graph: string;
  removals: number;
  additions: number;
}>;

export type RollbackInfo = Readonly<{
  graph: string;
  /** Whether the compensating write went through */
  succeeded: boolean;
  reason: string;
}>;

export type CommitEndInfo = Readonly<{
  durationMs: number;
  marker: SnapshotMarker | undefined;
  /** Statements removed and added across both graphs */
  statements: number;
}>;

/**
 * Observability hooks for monitoring commits.
 * Hooks observe only; what they return is ignored. An error thrown by a
 * hook goes to `onError` and the commit carries on.
 *
 * @example
 * ```typescript
 * const hooks: DataModelHooks = {
 *   onCommitStart: (ctx) => {
 *     console.log(`[${ctx.operationId}] Committing ${ctx.project}`);
 *   },
 *   onCommitEnd: (ctx, result) => {
 *     console.log(`[${ctx.operationId}] ${result.statements} statements in ${result.durationMs}ms`);
 *   },
 *   onError: (ctx, error) => {
 *     console.error(`[${ctx.operationId}] Error:`, error);
 *   },
 * };
 *
 * const model = await DataModel.load(gateway, project, { hooks });
 * ```
 */
export type DataModelHooks = Readonly<{
  /** Called before a commit contacts the store */
  onCommitStart?: (ctx: HookContext) => void;
  /** Called after a delta was written to one graph */
  onDeltaApplied?: (ctx: HookContext, info: DeltaAppliedInfo) => void;
  /** Called after a compensating write was attempted */
  onRollback?: (ctx: HookContext, info: RollbackInfo) => void;
  /** Called after a commit completes */
  onCommitEnd?: (ctx: HookContext, result: CommitEndInfo) => void;
  /** Called when a commit or load fails, or another hook throws */
  onError?: (ctx: HookContext, error: Error) => void;
}>;
