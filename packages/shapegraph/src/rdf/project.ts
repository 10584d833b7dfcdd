import { z } from "zod";

import { validateInput } from "../errors/validation";
import { type Iri, resolveIri } from "../identifier";
import {
  CONSTRAINT_GRAPH_NAME,
  INFERENCE_GRAPH_NAME,
  ONTOLOGY_SUBJECT_NAME,
  SHAPES_SUBJECT_NAME,
} from "../ontology/constants";

/**
 * The project a data model belongs to, with the names of its two graphs.
 */
export type Project = Readonly<{
  shortName: string;
  namespace: Iri;
  /** `<namespace>shacl` */
  constraintGraph: Iri;
  /** `<namespace>onto` */
  inferenceGraph: Iri;
  shapesSubject: Iri;
  ontologySubject: Iri;
}>;

export type ProjectDefinition = Readonly<{
  shortName: string;
  namespace: string;
}>;

export const projectDefinitionSchema = z.strictObject({
  shortName: z
    .string()
    .regex(/^[A-Za-z][\w-]*$/, "must start with a letter and contain no spaces"),
  namespace: z
    .string()
    .refine(
      (value) => value.endsWith("/") || value.endsWith("#"),
      "must end with '/' or '#'",
    ),
});

export function defineProject(definition: ProjectDefinition): Project {
  const parsed = validateInput(projectDefinitionSchema, definition, {
    entity: "project",
  });
  const namespace = resolveIri(parsed.namespace);
  return Object.freeze({
    shortName: parsed.shortName,
    namespace,
    constraintGraph: resolveIri(`${namespace}${CONSTRAINT_GRAPH_NAME}`),
    inferenceGraph: resolveIri(`${namespace}${INFERENCE_GRAPH_NAME}`),
    shapesSubject: resolveIri(`${namespace}${SHAPES_SUBJECT_NAME}`),
    ontologySubject: resolveIri(`${namespace}${ONTOLOGY_SUBJECT_NAME}`),
  });
}

/**
 * Accepts either a defined project or its definition.
 */
export function toProject(value: Project | ProjectDefinition): Project {
  return "constraintGraph" in value ? value : defineProject(value);
}
