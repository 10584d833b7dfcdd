/**
 * DataModel lifecycle and mutation tests.
 */
import { beforeEach, describe, expect, it } from "vitest";

import {
  CardinalityConflictError,
  CyclicInheritanceError,
  DuplicateIdentifierError,
  EntityNotFoundError,
  InconsistentRestrictionsError,
  InheritedCardinalityViolationError,
  ModelStateError,
  PropertyInUseError,
  PropertyNotReusableError,
  ResourceClassInUseError,
  UnknownSuperclassError,
} from "../src/errors";
import { createMemoryGateway, type MemoryGateway } from "../src/gateway";
import { DataModel } from "../src/model/data-model";
import { modelsEqual } from "../src/model/equality";
import { type HasProperty } from "../src/model/types";
import {
  addTitleAndBook,
  EX,
  FIXED_TIME,
  loadModel,
  PREFIXES,
  PROJECT,
} from "./test-utils";

function boundIris(bindings: readonly HasProperty[]): string[] {
  return bindings.map((binding) =>
    binding.property.kind === "standalone" ?
      binding.property.iri
    : binding.property.property.iri,
  );
}

describe("DataModel", () => {
  let gateway: MemoryGateway;
  let model: DataModel;

  beforeEach(async () => {
    gateway = createMemoryGateway();
    model = await loadModel(gateway);
  });

  // ============================================================
  // Lifecycle
  // ============================================================

  describe("lifecycle", () => {
    it("loads an empty project as a clean model without marker", () => {
      expect(model.state).toBe("clean");
      expect(model.marker).toBeUndefined();
      expect(model.properties()).toEqual([]);
      expect(model.resourceClasses()).toEqual([]);
    });

    it("rejects mutations before the first load", () => {
      const unloaded = new DataModel(gateway, PROJECT, { prefixes: PREFIXES });

      expect(unloaded.state).toBe("unloaded");
      expect(() => unloaded.createProperty({ iri: "ex:title" })).toThrow(
        ModelStateError,
      );
      expect(() => unloaded.createProperty({ iri: "ex:title" })).toThrow(
        "Cannot create a property while the data model is unloaded",
      );
    });

    it("rejects commit before the first load", async () => {
      const unloaded = new DataModel(gateway, PROJECT);

      await expect(unloaded.commit()).rejects.toThrow(ModelStateError);
    });

    it("accepts a project definition as well as a defined project", () => {
      const fromDefinition = new DataModel(gateway, {
        shortName: "library",
        namespace: "http://example.org/library/",
      });

      expect(fromDefinition.project).toEqual(PROJECT);
    });

    it("registers the project namespace under its short name", () => {
      model.createProperty({ iri: "library:isbn" });

      expect(model.getProperty("http://example.org/library/isbn")).toBeDefined();
      expect(model.prefixes.library).toBe("http://example.org/library/");
    });

    it("becomes dirty and records each mutation in the change log", () => {
      addTitleAndBook(model);

      expect(model.state).toBe("dirty");
      expect(model.changeLog).toEqual([
        { sequence: 1, kind: "createProperty", target: `${EX}title` },
        { sequence: 2, kind: "createResourceClass", target: `${EX}Book` },
      ]);
    });

    it("records the attribute of updates and the property of bindings", () => {
      addTitleAndBook(model);
      model.createProperty({ iri: "ex:author" });
      model.updateProperty("ex:title", "maxLength", 100);
      model.attachProperty("ex:Book", "ex:author");

      expect(model.changeLog.slice(3)).toEqual([
        {
          sequence: 4,
          kind: "updateProperty",
          target: `${EX}title`,
          attribute: "maxLength",
        },
        {
          sequence: 5,
          kind: "attachProperty",
          target: `${EX}Book`,
          property: `${EX}author`,
        },
      ]);
    });

    it("discard returns to the loaded state", () => {
      addTitleAndBook(model);

      model.discard();

      expect(model.state).toBe("clean");
      expect(model.changeLog).toEqual([]);
      expect(model.getProperty("ex:title")).toBeUndefined();
      expect(model.getResourceClass("ex:Book")).toBeUndefined();
    });

    it("reload drops pending changes", async () => {
      addTitleAndBook(model);

      await model.reload();

      expect(model.state).toBe("clean");
      expect(model.properties()).toEqual([]);
    });

    it("keeps the model unchanged when a mutation fails", () => {
      addTitleAndBook(model);
      const before = model.model;

      expect(() => model.createResourceClass({ iri: "ex:title" })).toThrow(
        DuplicateIdentifierError,
      );

      expect(model.model).toBe(before);
      expect(model.changeLog).toHaveLength(2);
    });
  });

  // ============================================================
  // Properties
  // ============================================================

  describe("properties", () => {
    it("creates a standalone property with normalized identifiers", () => {
      const property = model.createProperty({
        iri: "ex:title",
        restrictions: { datatype: "xsd:string", minLength: 1 },
        name: { EN: "Title" },
      });

      expect(property).toEqual({
        iri: `${EX}title`,
        origin: "standalone",
        restrictions: {
          datatype: "http://www.w3.org/2001/XMLSchema#string",
          minLength: 1,
        },
        name: { en: "Title" },
        provenance: { created: FIXED_TIME, modified: FIXED_TIME },
      });
      expect(model.properties()).toEqual([property]);
    });

    it("rejects an inconsistent restriction set", () => {
      expect(() =>
        model.createProperty({
          iri: "ex:age",
          restrictions: { datatype: "xsd:integer", pattern: "^\\d+$" },
        }),
      ).toThrow(InconsistentRestrictionsError);
      expect(model.getProperty("ex:age")).toBeUndefined();
    });

    it("rejects an identifier held by a resource class", () => {
      addTitleAndBook(model);

      expect(() => model.createProperty({ iri: "ex:Book" })).toThrow(
        'Identifier "http://example.org/Book" is already used by a resource class',
      );
    });

    it("updates one attribute and re-validates the set", () => {
      addTitleAndBook(model);

      const updated = model.updateProperty("ex:title", "maxLength", 80);

      expect(updated.restrictions.maxLength).toBe(80);
      expect(updated.restrictions.minLength).toBe(1);
    });

    it("removes an attribute when given undefined", () => {
      addTitleAndBook(model);

      const updated = model.updateProperty("ex:title", "maxLength", undefined);

      expect(updated.restrictions).toEqual({
        datatype: "http://www.w3.org/2001/XMLSchema#string",
        minLength: 1,
      });
    });

    it("rejects an update that breaks a cross-check", () => {
      addTitleAndBook(model);

      expect(() =>
        model.updateProperty("ex:title", "datatype", "xsd:integer"),
      ).toThrow("minLength requires a string-like datatype");
      expect(model.getProperty("ex:title")?.restrictions.datatype).toBe(
        "http://www.w3.org/2001/XMLSchema#string",
      );
    });

    it("rejects narrowing a property's cardinality below a binding's", () => {
      model.createProperty({ iri: "ex:tag", restrictions: { maxCount: 5 } });
      model.createResourceClass({
        iri: "ex:Book",
        properties: [{ property: "ex:tag", maxCount: 3 }],
      });

      expect(() => model.updateProperty("ex:tag", "maxCount", 2)).toThrow(
        CardinalityConflictError,
      );
    });

    it("refuses to delete a property that is still bound", () => {
      addTitleAndBook(model);

      let caught: unknown;
      try {
        model.deleteProperty("ex:title");
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(PropertyInUseError);
      expect(caught).toMatchObject({
        details: { iri: `${EX}title`, referencedBy: [`${EX}Book`] },
      });
    });

    it("deletes a property once it is detached", () => {
      addTitleAndBook(model);
      model.detachProperty("ex:Book", "ex:title");

      model.deleteProperty("ex:title");

      expect(model.getProperty("ex:title")).toBeUndefined();
      expect(model.getResourceClass("ex:Book")?.bindings).toEqual([]);
    });

    it("reports an unknown property", () => {
      expect(() => model.deleteProperty("ex:missing")).toThrow(
        EntityNotFoundError,
      );
    });
  });

  // ============================================================
  // Resource Classes
  // ============================================================

  describe("resource classes", () => {
    it("creates a class with a standalone binding", () => {
      addTitleAndBook(model);

      expect(model.getResourceClass("ex:Book")).toEqual({
        iri: `${EX}Book`,
        bindings: [
          {
            property: { kind: "standalone", iri: `${EX}title` },
            minCount: 1,
            maxCount: 1,
            order: 1,
          },
        ],
        closed: false,
        provenance: { created: FIXED_TIME, modified: FIXED_TIME },
      });
    });

    it("rejects an unknown superclass", () => {
      expect(() =>
        model.createResourceClass({ iri: "ex:Novel", superclass: "ex:Book" }),
      ).toThrow(UnknownSuperclassError);
    });

    it("closes and reopens a class", () => {
      addTitleAndBook(model);

      expect(model.closeResourceClass("ex:Book").closed).toBe(true);
      expect(model.reopenResourceClass("ex:Book").closed).toBe(false);
    });

    it("updates and removes the label", () => {
      addTitleAndBook(model);

      model.updateResourceClass("ex:Book", "label", { en: "Book", de: "Buch" });
      expect(model.getResourceClass("ex:Book")?.label).toEqual({
        en: "Book",
        de: "Buch",
      });

      model.updateResourceClass("ex:Book", "label", undefined);
      expect(model.getResourceClass("ex:Book")?.label).toBeUndefined();
    });

    it("refuses to delete a class that is a superclass", () => {
      addTitleAndBook(model);
      model.createResourceClass({ iri: "ex:Novel", superclass: "ex:Book" });

      expect(() => model.deleteResourceClass("ex:Book")).toThrow(
        ResourceClassInUseError,
      );
    });

    it("deletes a class together with its private properties", () => {
      addTitleAndBook(model);
      model.attachProperty("ex:Book", { iri: "ex:subtitle" });

      model.deleteResourceClass("ex:Book");

      expect(model.getResourceClass("ex:Book")).toBeUndefined();
      expect(model.getProperty("ex:subtitle")).toBeUndefined();
      expect(model.getProperty("ex:title")).toBeDefined();
    });
  });

  // ============================================================
  // Inheritance
  // ============================================================

  describe("inheritance", () => {
    beforeEach(() => {
      model.createResourceClass({ iri: "ex:A" });
      model.createResourceClass({ iri: "ex:B", superclass: "ex:A" });
      model.createResourceClass({ iri: "ex:C", superclass: "ex:B" });
    });

    it("rejects a superclass that closes a cycle", () => {
      let caught: unknown;
      try {
        model.setSuperclass("ex:A", "ex:C");
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(CyclicInheritanceError);
      expect(caught).toMatchObject({
        details: {
          resourceClass: `${EX}A`,
          superclass: `${EX}C`,
          cycle: [`${EX}A`, `${EX}C`, `${EX}B`, `${EX}A`],
        },
      });
      expect(model.getResourceClass("ex:A")?.superclass).toBeUndefined();
    });

    it("rejects a class as its own superclass", () => {
      expect(() => model.setSuperclass("ex:B", "ex:B")).toThrow(
        CyclicInheritanceError,
      );
      expect(model.getResourceClass("ex:B")?.superclass).toBe(`${EX}A`);
    });

    it("clears a superclass", () => {
      model.setSuperclass("ex:C", undefined);

      expect(model.getResourceClass("ex:C")?.superclass).toBeUndefined();
      model.setSuperclass("ex:A", "ex:C");
      expect(model.getResourceClass("ex:A")?.superclass).toBe(`${EX}C`);
    });

    it("inherits bindings through the whole chain", () => {
      model.createProperty({ iri: "ex:name", restrictions: { datatype: "xsd:string" } });
      model.attachProperty("ex:A", "ex:name", { minCount: 1, maxCount: 3 });
      model.attachProperty("ex:B", "ex:name", { maxCount: 2 });

      expect(model.effectiveProperties("ex:C")).toEqual([
        {
          propertyIri: `${EX}name`,
          property: { kind: "standalone", iri: `${EX}name` },
          declaredIn: `${EX}B`,
          minCount: 1,
          maxCount: 2,
          order: 1,
        },
      ]);
    });

    it("rejects a subclass binding that loosens an inherited cardinality", () => {
      model.createProperty({ iri: "ex:name" });
      model.attachProperty("ex:A", "ex:name", { maxCount: 1 });

      expect(() =>
        model.attachProperty("ex:C", "ex:name", { maxCount: 2 }),
      ).toThrow(InheritedCardinalityViolationError);
    });

    it("rejects a superclass whose bindings are narrower than the subclass's", () => {
      model.createProperty({ iri: "ex:name" });
      model.createResourceClass({ iri: "ex:Strict" });
      model.attachProperty("ex:Strict", "ex:name", { maxCount: 1 });
      model.attachProperty("ex:C", "ex:name", { maxCount: 4 });

      expect(() => model.setSuperclass("ex:C", "ex:Strict")).toThrow(
        InheritedCardinalityViolationError,
      );
      expect(model.getResourceClass("ex:C")?.superclass).toBe(`${EX}B`);
    });
  });

  // ============================================================
  // Bindings
  // ============================================================

  describe("bindings", () => {
    beforeEach(() => {
      model.createProperty({
        iri: "ex:isbn",
        restrictions: { datatype: "xsd:string", maxCount: 1 },
      });
      model.createResourceClass({ iri: "ex:Book" });
      model.createResourceClass({ iri: "ex:Journal" });
    });

    it("rejects a local cardinality wider than the property's", () => {
      const before = model.model;
      let caught: unknown;
      try {
        model.attachProperty("ex:Book", "ex:isbn", { maxCount: 2 });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(CardinalityConflictError);
      expect(caught).toMatchObject({
        details: {
          resourceClass: `${EX}Book`,
          property: `${EX}isbn`,
          facet: "maxCount",
          local: 2,
          declared: 1,
        },
      });
      expect(model.model).toBe(before);
      expect(model.getResourceClass("ex:Book")?.bindings).toEqual([]);
    });

    it("accepts a local cardinality that narrows the property's", () => {
      const binding = model.attachProperty("ex:Book", "ex:isbn", {
        minCount: 1,
        maxCount: 1,
      });

      expect(binding).toEqual({
        property: { kind: "standalone", iri: `${EX}isbn` },
        minCount: 1,
        maxCount: 1,
        order: 1,
      });
    });

    it("reuses a standalone property across classes", () => {
      model.attachProperty("ex:Book", "ex:isbn");
      model.attachProperty("ex:Journal", "ex:isbn");

      expect(model.getResourceClass("ex:Journal")?.bindings).toHaveLength(1);
    });

    it("keeps a private property to its class", () => {
      const binding = model.attachProperty(
        "ex:Book",
        { iri: "ex:edition", restrictions: { datatype: "xsd:integer" } },
        { maxCount: 1 },
      );

      expect(binding.property.kind).toBe("private");
      expect(model.getProperty("ex:edition")?.origin).toBe("private");
      expect(model.properties().map((property) => property.iri)).toEqual([
        `${EX}isbn`,
      ]);
      expect(() => model.attachProperty("ex:Journal", "ex:edition")).toThrow(
        PropertyNotReusableError,
      );
    });

    it("rejects a private property that declares its own cardinality", () => {
      expect(() =>
        model.attachProperty("ex:Book", {
          iri: "ex:edition",
          restrictions: { minCount: 1 },
        }),
      ).toThrow("a private property takes minCount from its binding");
    });

    it("rejects binding the same property twice", () => {
      model.attachProperty("ex:Book", "ex:isbn");

      expect(() => model.attachProperty("ex:Book", "ex:isbn")).toThrow(
        DuplicateIdentifierError,
      );
    });

    it("updates and clears a binding's cardinality", () => {
      model.attachProperty("ex:Book", "ex:isbn", { minCount: 1 });

      expect(model.updateBinding("ex:Book", "ex:isbn", { maxCount: 1 })).toEqual({
        property: { kind: "standalone", iri: `${EX}isbn` },
        minCount: 1,
        maxCount: 1,
        order: 1,
      });
      expect(
        model.updateBinding("ex:Book", "ex:isbn", { minCount: null }),
      ).toEqual({
        property: { kind: "standalone", iri: `${EX}isbn` },
        maxCount: 1,
        order: 1,
      });
    });

    it("lists bindings by display order", () => {
      model.createProperty({ iri: "ex:a" });
      model.createProperty({ iri: "ex:b" });
      model.attachProperty("ex:Book", "ex:a", { order: 3 });
      model.attachProperty("ex:Book", "ex:b", { order: 1 });
      model.attachProperty("ex:Book", "ex:isbn");

      expect(boundIris(model.displayBindings("ex:Book"))).toEqual([
        `${EX}b`,
        `${EX}a`,
        `${EX}isbn`,
      ]);
      expect(model.getResourceClass("ex:Book")?.bindings[2]?.order).toBe(4);
    });

    it("shows equal display orders in declaration order after a reload", async () => {
      model.createProperty({ iri: "ex:zeta" });
      model.createProperty({ iri: "ex:alpha" });
      model.attachProperty("ex:Book", "ex:zeta", { order: 1 });
      model.attachProperty("ex:Book", "ex:alpha", { order: 1 });
      await model.commit();

      const reloaded = await loadModel(gateway);

      expect(boundIris(reloaded.displayBindings("ex:Book"))).toEqual([
        `${EX}zeta`,
        `${EX}alpha`,
      ]);
      expect(modelsEqual(reloaded.model, model.model)).toBe(true);
    });

    it("detaches a binding and keeps the standalone property", () => {
      model.attachProperty("ex:Book", "ex:isbn");

      model.detachProperty("ex:Book", "ex:isbn");

      expect(model.getResourceClass("ex:Book")?.bindings).toEqual([]);
      expect(model.getProperty("ex:isbn")).toBeDefined();
    });
  });

  // ============================================================
  // Validation
  // ============================================================

  describe("validate()", () => {
    it("finds no issue in a model built through operations", () => {
      addTitleAndBook(model);
      model.createResourceClass({
        iri: "ex:Novel",
        superclass: "ex:Book",
        properties: [{ property: { iri: "ex:series" } }],
      });

      expect(model.validate()).toEqual([]);
    });
  });

  // ============================================================
  // Provenance
  // ============================================================

  describe("provenance", () => {
    const CREATED = "2026-03-01T08:00:00.000Z";
    const CHANGED = "2026-03-02T17:45:00.000Z";

    async function createdByAlice(): Promise<void> {
      const author = await loadModel(gateway, {
        agent: "ex:alice",
        clock: () => new Date(CREATED),
      });
      addTitleAndBook(author);
      await author.commit();
    }

    it("records creator and creation time of new entities", async () => {
      await createdByAlice();

      const reloaded = await loadModel(gateway);

      const expected = {
        created: CREATED,
        modified: CREATED,
        creator: `${EX}alice`,
        contributor: `${EX}alice`,
      };
      expect(reloaded.getProperty("ex:title")?.provenance).toEqual(expected);
      expect(reloaded.getResourceClass("ex:Book")?.provenance).toEqual(
        expected,
      );
    });

    it("advances modification time and contributor on change", async () => {
      await createdByAlice();
      const editor = await loadModel(gateway, {
        agent: "ex:bob",
        clock: () => new Date(CHANGED),
      });

      editor.updateProperty("ex:title", "maxLength", 100);
      editor.updateBinding("ex:Book", "ex:title", { order: 2 });
      await editor.commit();
      const reloaded = await loadModel(gateway);

      const expected = {
        created: CREATED,
        modified: CHANGED,
        creator: `${EX}alice`,
        contributor: `${EX}bob`,
      };
      expect(reloaded.getProperty("ex:title")?.provenance).toEqual(expected);
      expect(reloaded.getResourceClass("ex:Book")?.provenance).toEqual(
        expected,
      );
    });

    it("stamps a private property and touches its class when attached", async () => {
      await createdByAlice();
      const editor = await loadModel(gateway, {
        clock: () => new Date(CHANGED),
      });

      editor.attachProperty("ex:Book", { iri: "ex:edition" });

      expect(editor.getProperty("ex:edition")?.provenance).toEqual({
        created: CHANGED,
        modified: CHANGED,
      });
      expect(editor.getResourceClass("ex:Book")?.provenance).toEqual({
        created: CREATED,
        modified: CHANGED,
        creator: `${EX}alice`,
        contributor: `${EX}alice`,
      });
      expect(editor.getProperty("ex:title")?.provenance?.modified).toBe(
        CREATED,
      );
    });
  });

  // ============================================================
  // Round Trip
  // ============================================================

  describe("round trip", () => {
    it("reads back what it committed", async () => {
      addTitleAndBook(model);
      model.attachProperty(
        "ex:Book",
        {
          iri: "ex:genre",
          restrictions: { datatype: "xsd:string", in: ["fiction", "essay"] },
          name: { en: "Genre" },
        },
        { maxCount: 1, order: 5 },
      );
      model.createResourceClass({
        iri: "ex:Novel",
        superclass: "ex:Book",
        closed: true,
        label: { en: "Novel" },
        properties: [{ property: "ex:title", minCount: 1, maxCount: 1 }],
      });

      const result = await model.commit();
      const reloaded = await loadModel(gateway);

      expect(result.written).toBe(true);
      expect(result.marker).toMatch(/^1:\S+$/);
      expect(reloaded.marker).toBe(result.marker);
      expect(modelsEqual(reloaded.model, model.model)).toBe(true);
      expect(reloaded.getProperty("ex:genre")?.restrictions.in).toEqual([
        {
          lexical: "fiction",
          datatype: "http://www.w3.org/2001/XMLSchema#string",
        },
        {
          lexical: "essay",
          datatype: "http://www.w3.org/2001/XMLSchema#string",
        },
      ]);
    });
  });
});
