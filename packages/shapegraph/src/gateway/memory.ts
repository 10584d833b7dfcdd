import { DataFactory, Store } from "n3";

import { type Statement } from "../rdf/terms";
import { ok } from "../utils/result";
import { type StoreGateway } from "./types";

const { namedNode, quad } = DataFactory;

export type MemoryGateway = StoreGateway &
  Readonly<{
    /** The backing quad store; statements carry their graph name */
    store: Store;
  }>;

/**
 * Gateway over an in-process n3 quad store.
 *
 * @example
 * ```typescript
 * const gateway = createMemoryGateway();
 * const model = await DataModel.load(gateway, {
 *   shortName: "demo",
 *   namespace: "http://example.org/demo#",
 * });
 * ```
 */
export function createMemoryGateway(store: Store = new Store()): MemoryGateway {
  return {
    kind: "memory",
    store,

    readGraph(graph) {
      const statements = store
        .getQuads(null, null, null, namedNode(graph))
        .map(
          (value): Statement =>
            quad(value.subject, value.predicate, value.object),
        );
      return Promise.resolve(ok(statements));
    },

    applyDelta(graph, removals, additions) {
      const target = namedNode(graph);
      for (const value of removals) {
        store.removeQuad(
          quad(value.subject, value.predicate, value.object, target),
        );
      }
      for (const value of additions) {
        store.addQuad(
          quad(value.subject, value.predicate, value.object, target),
        );
      }
      return Promise.resolve(ok(undefined));
    },
  };
}
