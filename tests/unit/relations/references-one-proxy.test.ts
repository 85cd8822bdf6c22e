import { beforeEach, describe, expect, it, vi } from "vitest";
import type { MemoryDriver } from "../../../src/drivers/memory/memory-driver";
import { RelationTypeMismatchError } from "../../../src/errors/relation-type-mismatch.error";
import { Car, Comment, Person } from "../../fixtures/models/test-models";
import { useMemoryDataSource } from "../../utils/test-helpers";

describe("ReferencesOneProxy", () => {
  let driver: MemoryDriver;

  beforeEach(() => {
    ({ driver } = useMemoryDataSource());
  });

  it("should write the target id on the owner without saving it", async () => {
    const boss = await Person.create({ name: "Bea" });
    const person = new Person({ name: "Ann" });
    const relation = person.referencesOneRelation("boss");

    const result = await relation.replace(boss);

    expect(result).toEqual({ success: true, addedIds: ["1"], removedIds: [], relation: "boss" });
    expect(person.get("boss_id")).toBe("1");
    expect(person.isNew).toBe(true);
    expect(await relation.get()).toBe(boss);
  });

  it("should report no change when the same target is assigned again", async () => {
    const boss = await Person.create({ name: "Bea" });
    const person = new Person({ name: "Ann", boss_id: "1" });

    const result = await person.referencesOneRelation("boss").replace(boss);

    expect(result.addedIds).toEqual([]);
    expect(result.removedIds).toEqual([]);
  });

  it("should report the previous id when the target changes", async () => {
    await Person.create({ name: "Bea" });
    const other = await Person.create({ name: "Cy" });
    const person = new Person({ name: "Ann", boss_id: "1" });

    const result = await person.referencesOneRelation("boss").replace(other);

    expect(result.addedIds).toEqual(["2"]);
    expect(result.removedIds).toEqual(["1"]);
  });

  it("should load the target once", async () => {
    await Person.create({ name: "Bea" });
    await Person.create({ name: "Ann", boss_id: "1" });

    const person = await Person.find("2");
    const find = vi.spyOn(driver, "find");

    const relation = person?.referencesOneRelation("boss");
    const boss = await relation?.get();
    await relation?.get();

    expect(boss?.get("name")).toBe("Bea");
    expect(find).toHaveBeenCalledTimes(1);
  });

  it("should resolve to null without a lookup when no id is stored", async () => {
    const relation = new Person({ name: "Ann" }).referencesOneRelation("boss");
    const find = vi.spyOn(driver, "find");

    expect(relation.canLoad()).toBe(false);
    expect(await relation.get()).toBeNull();
    expect(find).not.toHaveBeenCalled();
  });

  it("should unset the foreign key when given null", async () => {
    const person = new Person({ name: "Ann", boss_id: "1" });
    const relation = person.referencesOneRelation("boss");

    const result = await relation.replace(null);

    expect(result.removedIds).toEqual(["1"]);
    expect(person.has("boss_id")).toBe(false);
    expect(relation.isLoaded()).toBe(true);
    expect(await relation.get()).toBeNull();
  });

  it("should reject a record of another model", async () => {
    const relation = new Person({ name: "Ann" }).referencesOneRelation("boss");

    await expect(relation.replace(new Car({ name: "Volvo" }))).rejects.toThrow(
      RelationTypeMismatchError,
    );
  });

  it("should drop the target on reset", async () => {
    const boss = await Person.create({ name: "Bea" });
    const relation = new Person({ name: "Ann" }).referencesOneRelation("boss");

    await relation.replace(boss);
    relation.reset();

    expect(relation.isLoaded()).toBe(false);
    expect(relation.target).toBeNull();
  });

  describe("polymorphic", () => {
    it("should store the target's model name next to its id", async () => {
      const car = await Car.create({ name: "Volvo" });
      const comment = new Comment({ body: "Nice car" });

      await comment.referencesOneRelation("commentable").replace(car);

      expect(comment.get("commentable_id")).toBe("1");
      expect(comment.get("commentable_type")).toBe("Car");
    });

    it("should load the target from the type column", async () => {
      const car = await Car.create({ name: "Volvo" });
      const comment = new Comment({ body: "Nice car" });

      await comment.referencesOneRelation("commentable").replace(car);
      await comment.save();

      const row = await driver.find("comments", "1");
      expect(row?.families.meta).toEqual({ commentable_id: "1", commentable_type: "Car" });

      const reloaded = await Comment.find("1");
      const target = await reloaded?.referencesOneRelation("commentable").get();

      expect(target).toBeInstanceOf(Car);
      expect(target?.get("name")).toBe("Volvo");
    });

    it("should reject an unsaved target", async () => {
      const comment = new Comment({ body: "Nice car" });

      await expect(
        comment.referencesOneRelation("commentable").replace(new Car({ name: "Volvo" })),
      ).rejects.toThrow('Relation "commentable" expects a persisted record, got an unsaved Car.');
    });

    it("should clear the type column along with the id", async () => {
      const comment = new Comment({ commentable_id: "1", commentable_type: "Car" });

      await comment.referencesOneRelation("commentable").replace(null);

      expect(comment.has("commentable_id")).toBe(false);
      expect(comment.has("commentable_type")).toBe(false);
    });
  });
});
