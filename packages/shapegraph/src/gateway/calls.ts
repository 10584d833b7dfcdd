/**
 * Gateway calls as the engine makes them.
 *
 * A gateway reports failure through its Result, but a misbehaving one
 * may still reject; both end up as a StoreFailure here.
 */
import { StoreUnavailableError } from "../errors";
import { type StatementDelta } from "../rdf/delta";
import { type Statement } from "../rdf/terms";
import { err } from "../utils/result";
import {
  type ApplyDeltaResult,
  failureReason,
  type ReadGraphResult,
  type StoreGateway,
} from "./types";

export async function readGraphSafely(
  gateway: StoreGateway,
  graph: string,
): Promise<ReadGraphResult> {
  try {
    return await gateway.readGraph(graph);
  } catch (error) {
    return err({ reason: failureReason(error), cause: error });
  }
}

export async function applyDeltaSafely(
  gateway: StoreGateway,
  graph: string,
  delta: StatementDelta,
): Promise<ApplyDeltaResult> {
  try {
    return await gateway.applyDelta(graph, delta.removals, delta.additions);
  } catch (error) {
    return err({ reason: failureReason(error), cause: error });
  }
}

/**
 * Reads a graph.
 *
 * @throws StoreUnavailableError when the gateway fails
 */
export async function readGraphOrThrow(
  gateway: StoreGateway,
  graph: string,
): Promise<readonly Statement[]> {
  const result = await readGraphSafely(gateway, graph);
  if (result.success) return result.data;
  throw new StoreUnavailableError(
    `Cannot read graph ${graph} from ${gateway.kind} store: ${result.error.reason}`,
    { operation: "readGraph", graph },
    { cause: result.error.cause },
  );
}

/**
 * Applies a delta to a graph.
 *
 * @throws StoreUnavailableError when the gateway fails
 */
export async function applyDeltaOrThrow(
  gateway: StoreGateway,
  graph: string,
  delta: StatementDelta,
): Promise<void> {
  const result = await applyDeltaSafely(gateway, graph, delta);
  if (result.success) return;
  throw new StoreUnavailableError(
    `Cannot write graph ${graph} to ${gateway.kind} store: ${result.error.reason}`,
    { operation: "applyDelta", graph },
    { cause: result.error.cause },
  );
}
