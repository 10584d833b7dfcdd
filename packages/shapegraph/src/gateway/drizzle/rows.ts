import { decodeStatement, encodeTerm, type Statement } from "../../rdf/terms";

/**
 * A statement as stored in the statements table.
 */
export type StatementRow = Readonly<{
  graph: string;
  subject: string;
  predicate: string;
  object: string;
}>;

export function toRow(graph: string, value: Statement): StatementRow {
  return {
    graph,
    subject: encodeTerm(value.subject),
    predicate: encodeTerm(value.predicate),
    object: encodeTerm(value.object),
  };
}

export function fromRow(
  row: Readonly<{ subject: string; predicate: string; object: string }>,
): Statement {
  return decodeStatement(row.subject, row.predicate, row.object);
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}
