/**
 * Example 03: Concurrent Edits
 *
 * Two editors load the same data model. The snapshot marker stored with
 * both graphs lets the second commit notice that the store moved on:
 * - The first commit wins
 * - The second gets a ConcurrentModificationError and writes nothing
 * - Reloading and reapplying the change lets it through
 */
import { ConcurrentModificationError, DataModel } from "shapegraph";

import { createExampleGateway, libraryProject, prefixes } from "./_helpers";

export async function main() {
  const gateway = createExampleGateway();

  const setup = await DataModel.load(gateway, libraryProject, { prefixes });
  setup.createProperty({
    iri: "ex:title",
    restrictions: { datatype: "xsd:string", maxLength: 200 },
  });
  const initial = await setup.commit();
  console.log("Initial commit, marker:", initial.marker);

  // ============================================================
  // Two editors, same starting point
  // ============================================================

  const alice = await DataModel.load(gateway, libraryProject, { prefixes });
  const bob = await DataModel.load(gateway, libraryProject, { prefixes });

  alice.updateProperty("ex:title", "maxLength", 300);
  const aliceCommit = await alice.commit();
  console.log("Alice committed, marker:", aliceCommit.marker);

  bob.updateProperty("ex:title", "minLength", 1);
  try {
    await bob.commit();
  } catch (error) {
    if (!(error instanceof ConcurrentModificationError)) throw error;
    console.log("Bob's commit refused:", error.message);
  }

  // ============================================================
  // Reload and retry
  // ============================================================

  await bob.reload();
  bob.updateProperty("ex:title", "minLength", 1);
  const bobCommit = await bob.commit();
  console.log("Bob committed after reload, marker:", bobCommit.marker);

  const restrictions = bob.getProperty("ex:title")?.restrictions;
  console.log(
    `ex:title length range: ${restrictions?.minLength}..${restrictions?.maxLength}`,
  );

  await gateway.close?.();
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
