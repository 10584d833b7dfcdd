/**
 * Store gateway interface.
 *
 * The gateway is the only way the engine reaches the store: it reads
 * whole graphs and applies statement deltas to one graph at a time.
 * Nothing more is assumed, in particular no transaction spanning
 * two graphs.
 */
import { type Statement } from "../rdf/terms";
import { type Result } from "../utils/result";

/**
 * Why a gateway call failed.
 */
export type StoreFailure = Readonly<{
  reason: string;
  cause?: unknown;
}>;

export type ReadGraphResult = Result<readonly Statement[], StoreFailure>;

export type ApplyDeltaResult = Result<undefined, StoreFailure>;

export type StoreGateway = Readonly<{
  /** Human-readable gateway kind, used in error reports */
  kind: string;

  /**
   * Every statement of a named graph. An unknown graph reads as empty.
   */
  readGraph: (graph: string) => Promise<ReadGraphResult>;

  /**
   * Removes then adds statements in one graph. Either the whole delta
   * is applied or none of it.
   */
  applyDelta: (
    graph: string,
    removals: readonly Statement[],
    additions: readonly Statement[],
  ) => Promise<ApplyDeltaResult>;

  /** Releases the underlying connection, where the gateway owns one */
  close?: () => Promise<void>;
}>;

export function failureReason(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
