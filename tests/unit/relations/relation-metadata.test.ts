import { describe, expect, it } from "vitest";
import { EmbedsManyProxy } from "../../../src/relations/proxies/embeds-many-proxy";
import { ReferencesManyProxy } from "../../../src/relations/proxies/references-many-proxy";
import { ReferencesOneProxy } from "../../../src/relations/proxies/references-one-proxy";
import { RelationMetadata } from "../../../src/relations/relation-metadata";
import { Car, Person, findExamsOf } from "../../fixtures/models/test-models";

describe("RelationMetadata", () => {
  describe("defaults", () => {
    it("should derive a list foreign key and target from a plural name", () => {
      const metadata = new RelationMetadata("cars", "referencesMany");

      expect(metadata.foreignKey).toBe("car_ids");
      expect(metadata.targetTypeName).toBe("Car");
      expect(metadata.storeIn).toBeUndefined();
      expect(metadata.persistingForeignKey).toBe(false);
    });

    it("should derive a single foreign key from a singular name", () => {
      const metadata = new RelationMetadata("boss", "referencesOne");

      expect(metadata.foreignKey).toBe("boss_id");
      expect(metadata.targetTypeName).toBe("Boss");
    });

    it("should store embedded records in a family named after the relation", () => {
      const metadata = new RelationMetadata("addresses", "embedsMany");

      expect(metadata.foreignKey).toBeUndefined();
      expect(metadata.storeIn).toBe("addresses");
      expect(metadata.targetTypeName).toBe("Address");
      expect(metadata.persistingForeignKey).toBe(false);
      expect(() => metadata.foreignKeyColumn()).toThrow(
        'Relation "addresses" is embedded and has no foreign key.',
      );
    });
  });

  describe("options", () => {
    it("should keep an explicit foreign key and family", () => {
      const metadata = new RelationMetadata("cars", "referencesMany", {
        foreignKey: "vehicle_ids",
        storeIn: "info",
      });

      expect(metadata.foreignKeyColumn()).toBe("vehicle_ids");
      expect(metadata.persistingForeignKey).toBe(true);
    });

    it("should accept the target class itself", () => {
      const metadata = new RelationMetadata("vehicles", "referencesMany", { className: Car });

      expect(metadata.targetTypeName).toBe("Car");
      expect(metadata.targetClass()).toBe(Car);
    });

    it("should resolve a registered target by name", () => {
      expect(new RelationMetadata("boss", "referencesOne", { className: "Person" }).targetClass()).toBe(
        Person,
      );
    });

    it("should throw for a target that is not registered", () => {
      expect(() => new RelationMetadata("boss", "referencesOne").targetClass()).toThrow(
        'Model "Boss" is not registered.',
      );
    });

    it("should name a type column for polymorphic relations", () => {
      const metadata = new RelationMetadata("attachable", "referencesOne", {
        polymorphic: true,
        storeIn: "meta",
      });

      expect(metadata.polymorphic).toBe(true);
      expect(metadata.polymorphicTypeColumn).toBe("attachable_type");
    });

    it("should ignore polymorphic on list relations", () => {
      const metadata = new RelationMetadata("cars", "referencesMany", { polymorphic: true });

      expect(metadata.polymorphic).toBe(false);
      expect(metadata.polymorphicTypeColumn).toBeUndefined();
    });

    it("should report a custom finder", () => {
      const metadata = new RelationMetadata("exams", "referencesMany", {
        startsWith: "id",
        findWith: findExamsOf,
      });

      expect(metadata.hasFinder).toBe(true);
      expect(metadata.startsWith).toBe("id");
    });
  });

  it("should compare relations by name", () => {
    const cars = new RelationMetadata("cars", "referencesMany");

    expect(cars.equals(new RelationMetadata("cars", "embedsMany"))).toBe(true);
    expect(cars.equals(new RelationMetadata("bikes", "referencesMany"))).toBe(false);
    expect(cars.equals("cars")).toBe(false);
  });

  it("should create the proxy matching its kind", () => {
    const person = new Person({ name: "Ann" });

    expect(new RelationMetadata("boss", "referencesOne").newRelationProxy(person)).toBeInstanceOf(
      ReferencesOneProxy,
    );
    expect(new RelationMetadata("cars", "referencesMany").newRelationProxy(person)).toBeInstanceOf(
      ReferencesManyProxy,
    );
    expect(
      new RelationMetadata("addresses", "embedsMany").newRelationProxy(person),
    ).toBeInstanceOf(EmbedsManyProxy);
  });
});
