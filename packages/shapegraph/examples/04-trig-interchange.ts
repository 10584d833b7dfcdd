/**
 * Example 04: TriG Interchange
 *
 * This example moves a data model between stores as TriG:
 * - Rendering the working copy with toTrig()
 * - Exporting what a store holds
 * - Importing the document into another store and loading it there
 */
import { createMemoryGateway, DataModel } from "shapegraph";
import { exportStoredGraphs, importTrig } from "shapegraph/interchange";

import { createExampleGateway, libraryProject, prefixes } from "./_helpers";

export async function main() {
  const source = createExampleGateway();
  const model = await DataModel.load(source, libraryProject, { prefixes });

  model.createProperty({
    iri: "ex:title",
    restrictions: { datatype: "xsd:string", maxLength: 200 },
  });
  model.createResourceClass({
    iri: "ex:Book",
    properties: [
      { property: "ex:title", minCount: 1, maxCount: 1 },
      {
        property: {
          iri: "ex:edition",
          restrictions: { datatype: "xsd:integer", minInclusive: 1 },
        },
        maxCount: 1,
      },
    ],
  });

  // ============================================================
  // Preview before committing
  // ============================================================

  console.log("Working copy as TriG:\n");
  console.log(await model.toTrig());
  await model.commit();

  // ============================================================
  // Copy the stored graphs to another store
  // ============================================================

  const backup = await exportStoredGraphs(source, libraryProject);
  const target = createMemoryGateway();
  const result = await importTrig(target, backup);

  for (const graph of result.graphs) {
    console.log(`Imported ${graph.added} statements into ${graph.graph}`);
  }

  const copy = await DataModel.load(target, libraryProject, { prefixes });
  console.log(
    "Copy has",
    copy.properties().length,
    "standalone properties; marker",
    copy.marker,
  );

  await source.close?.();
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
