/**
 * Shared helpers for examples
 *
 * Provides an in-memory SQLite gateway and the project every example
 * stores its data model in.
 */
import { defineProject } from "shapegraph";
import { createLocalSqliteGateway } from "shapegraph/sqlite";

export const libraryProject = defineProject({
  shortName: "library",
  namespace: "http://example.org/library/",
});

export const prefixes = { ex: "http://example.org/" } as const;

/**
 * Creates an in-memory SQLite gateway for examples.
 */
export function createExampleGateway() {
  const { gateway } = createLocalSqliteGateway();
  return gateway;
}
