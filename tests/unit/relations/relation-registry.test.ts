import { describe, expect, it } from "vitest";
import { RelationAlreadyDefinedError } from "../../../src/errors/relation-already-defined.error";
import { Model } from "../../../src/model/model";
import { RelationMetadata } from "../../../src/relations/relation-metadata";
import { RelationRegistry } from "../../../src/relations/relation-registry";
import { Comment, Person } from "../../fixtures/models/test-models";

describe("RelationRegistry", () => {
  it("should keep relations in declaration order", () => {
    expect(Person.getRelationRegistry().names()).toEqual(["cars", "boss", "addresses", "exams"]);
  });

  it("should list the columns relations write on the owner", () => {
    expect(Person.getRelationRegistry().managedColumns()).toEqual([
      "car_ids",
      "boss_id",
      "exam_ids",
    ]);
    expect(Comment.getRelationRegistry().managedColumns()).toEqual([
      "commentable_id",
      "commentable_type",
    ]);
  });

  it("should list the families holding embedded records", () => {
    expect(Person.getRelationRegistry().embeddedFamilies()).toEqual(["addresses"]);
  });

  it("should filter relations by kind", () => {
    const names = Person.getRelationRegistry()
      .ofType("referencesMany")
      .map((metadata) => metadata.name);

    expect(names).toEqual(["cars", "exams"]);
  });

  it("should reject a second relation with the same name", () => {
    const registry = new RelationRegistry("Garage");
    registry.add(new RelationMetadata("cars", "referencesMany"));

    expect(() => registry.add(new RelationMetadata("cars", "embedsMany"))).toThrow(
      RelationAlreadyDefinedError,
    );
    expect(() => registry.add(new RelationMetadata("cars", "embedsMany"))).toThrow(
      'Relation "cars" is already defined on Garage.',
    );
  });

  it("should register an accessor pair for every relation", () => {
    const registry = new RelationRegistry("Garage");
    registry.add(new RelationMetadata("cars", "referencesMany"));

    expect(registry.accessor("cars")).toEqual({
      get: expect.any(Function),
      set: expect.any(Function),
    });
    expect(registry.accessor("bikes")).toBeUndefined();
  });

  describe("declarations on models", () => {
    it("should add persisted foreign keys to their column family", () => {
      class Garage extends Model {
        public static table = "garages";
      }

      Garage.referencesMany("cars", { storeIn: "inventory" });
      Garage.referencesOne("owner", { className: "Person", storeIn: "inventory" });

      expect(Garage.columnFamilyOf("car_ids")).toBe("inventory");
      expect(Garage.columnFamilyOf("owner_id")).toBe("inventory");
      expect(Garage.columnFamilies.map((family) => family.fields)).toEqual([
        ["car_ids", "owner_id"],
      ]);
      expect(Model.columnFamilies).toEqual([]);
    });

    it("should throw when a model declares a relation twice", () => {
      class Garage extends Model {
        public static table = "garages";
      }

      Garage.referencesMany("cars");

      expect(() => Garage.embedsMany("cars")).toThrow(RelationAlreadyDefinedError);
    });

    it("should inherit the parent's relations without sharing new ones", () => {
      class Employee extends Person {}

      Employee.referencesOne("desk", { className: "Bike" });

      expect(Employee.getRelationRegistry().has("cars")).toBe(true);
      expect(Employee.getRelationRegistry().has("desk")).toBe(true);
      expect(Person.getRelationRegistry().has("desk")).toBe(false);
    });
  });
});
