/**
 * Example 02: Class Hierarchies
 *
 * This example demonstrates superclasses:
 * - Declaring a subclass and reading its effective properties
 * - Tightening an inherited cardinality
 * - Rejected changes: loosening a cardinality, closing a cycle
 * - Closed classes
 */
import {
  CyclicInheritanceError,
  DataModel,
  InheritedCardinalityViolationError,
} from "shapegraph";

import { createExampleGateway, libraryProject, prefixes } from "./_helpers";

export async function main() {
  const gateway = createExampleGateway();
  const model = await DataModel.load(gateway, libraryProject, { prefixes });

  // ============================================================
  // Step 1: A small hierarchy
  // ============================================================

  model.createProperty({
    iri: "ex:title",
    restrictions: { datatype: "xsd:string", maxLength: 200 },
  });
  model.createProperty({
    iri: "ex:isbn",
    restrictions: { datatype: "xsd:string", pattern: "^[0-9-]{10,17}$" },
  });

  model.createResourceClass({
    iri: "ex:Publication",
    properties: [{ property: "ex:title", minCount: 1 }],
  });
  model.createResourceClass({
    iri: "ex:Book",
    superclass: "ex:Publication",
    properties: [{ property: "ex:isbn", maxCount: 1 }],
  });

  console.log("Effective properties of ex:Book:");
  for (const binding of model.effectiveProperties("ex:Book")) {
    console.log(
      `  ${binding.propertyIri} [${binding.minCount ?? 0}..${binding.maxCount ?? "*"}] from ${binding.declaredIn}`,
    );
  }

  // ============================================================
  // Step 2: Tighten an inherited binding
  // ============================================================

  model.attachProperty("ex:Book", "ex:title", { minCount: 1, maxCount: 1 });
  console.log("\nex:Book now requires exactly one title");

  // ============================================================
  // Step 3: Changes the model refuses
  // ============================================================

  try {
    model.updateBinding("ex:Book", "ex:title", { minCount: 0 });
  } catch (error) {
    if (!(error instanceof InheritedCardinalityViolationError)) throw error;
    console.log("\nRejected:", error.message);
  }

  try {
    model.setSuperclass("ex:Publication", "ex:Book");
  } catch (error) {
    if (!(error instanceof CyclicInheritanceError)) throw error;
    console.log("Rejected:", error.message);
  }

  // ============================================================
  // Step 4: Close a class and commit
  // ============================================================

  model.closeResourceClass("ex:Book");
  const result = await model.commit();
  console.log("\nCommitted hierarchy, marker:", result.marker);

  await gateway.close?.();
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
