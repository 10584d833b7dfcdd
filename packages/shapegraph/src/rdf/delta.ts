import { type DeltaDescription } from "../errors";
import { sortStatements, type Statement, statementKey } from "./terms";

/**
 * Statements to remove from and add to one graph.
 */
export type StatementDelta = Readonly<{
  removals: readonly Statement[];
  additions: readonly Statement[];
}>;

export const EMPTY_DELTA: StatementDelta = Object.freeze({
  removals: [],
  additions: [],
});

/**
 * Set difference of two statement lists, both sides sorted.
 * A statement present on both sides appears in neither list.
 */
export function diffStatements(
  before: readonly Statement[],
  after: readonly Statement[],
): StatementDelta {
  const beforeKeys = new Set(before.map((value) => statementKey(value)));
  const afterKeys = new Set(after.map((value) => statementKey(value)));
  return {
    removals: sortStatements(
      dedupe(before).filter((value) => !afterKeys.has(statementKey(value))),
    ),
    additions: sortStatements(
      dedupe(after).filter((value) => !beforeKeys.has(statementKey(value))),
    ),
  };
}

function dedupe(statements: readonly Statement[]): Statement[] {
  const seen = new Set<string>();
  return statements.filter((value) => {
    const key = statementKey(value);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function isEmptyDelta(delta: StatementDelta): boolean {
  return delta.removals.length === 0 && delta.additions.length === 0;
}

/**
 * The delta that undoes `delta`.
 */
export function invertDelta(delta: StatementDelta): StatementDelta {
  return { removals: delta.additions, additions: delta.removals };
}

/**
 * Concatenates deltas for the same graph.
 */
export function mergeDeltas(...deltas: StatementDelta[]): StatementDelta {
  return {
    removals: deltas.flatMap((delta) => delta.removals),
    additions: deltas.flatMap((delta) => delta.additions),
  };
}

/**
 * Text form of a delta for error reports.
 */
export function describeDelta(
  graph: string,
  delta: StatementDelta,
): DeltaDescription {
  return {
    graph,
    removals: delta.removals.map((value) => `${statementKey(value)} .`),
    additions: delta.additions.map((value) => `${statementKey(value)} .`),
  };
}
