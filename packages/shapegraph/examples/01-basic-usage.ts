/**
 * Example 01: Basic Usage
 *
 * This example demonstrates the fundamental concepts of shapegraph:
 * - Loading a project's data model through a store gateway
 * - Creating properties with restrictions
 * - Creating a resource class that binds them
 * - Inspecting the change log and pending delta
 * - Committing and reloading
 */
import { DataModel } from "shapegraph";

import { createExampleGateway, libraryProject, prefixes } from "./_helpers";

export async function main() {
  const gateway = createExampleGateway();

  // ============================================================
  // Step 1: Load the (empty) data model
  // ============================================================

  const model = await DataModel.load(gateway, libraryProject, { prefixes });
  console.log("Loaded model, state:", model.state);

  // ============================================================
  // Step 2: Define properties
  // ============================================================

  model.createProperty({
    iri: "ex:title",
    name: { en: "Title", de: "Titel" },
    restrictions: { datatype: "xsd:string", minLength: 1, maxLength: 200 },
  });

  model.createProperty({
    iri: "ex:pages",
    restrictions: { datatype: "xsd:integer", minInclusive: 1 },
  });

  // ============================================================
  // Step 3: Define a resource class
  // ============================================================

  model.createResourceClass({
    iri: "ex:Book",
    label: { en: "Book" },
    properties: [
      { property: "ex:title", minCount: 1, maxCount: 1 },
      { property: "ex:pages", maxCount: 1 },
    ],
  });

  console.log("\nChange log:");
  for (const entry of model.changeLog) {
    console.log(`  #${entry.sequence} ${entry.kind} ${entry.target}`);
  }

  const delta = model.computeDelta();
  console.log(
    `\nPending delta: ${delta.constraint.additions.length} constraint and ${delta.inference.additions.length} inference statements`,
  );

  // ============================================================
  // Step 4: Commit and reload
  // ============================================================

  const result = await model.commit();
  console.log("\nCommitted, marker:", result.marker);

  const reloaded = await DataModel.load(gateway, libraryProject, { prefixes });
  const book = reloaded.getResourceClass("ex:Book");
  console.log(
    "Reloaded ex:Book with",
    book?.bindings.length,
    "bindings; title maxLength:",
    reloaded.getProperty("ex:title")?.restrictions.maxLength,
  );

  // ============================================================
  // Step 5: Change a restriction
  // ============================================================

  reloaded.updateProperty("ex:title", "maxLength", 300);
  const second = await reloaded.commit();
  console.log("Second commit, marker:", second.marker);

  // Clean up
  await gateway.close?.();
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
