import { describe, expect, it } from "vitest";
import { ColumnFamilyError } from "../../../src/errors/column-family.error";
import { ColumnFamily } from "../../../src/schema/column-family";

describe("ColumnFamily", () => {
  it("should hold its fields once each", () => {
    const family = new ColumnFamily("info", ["name", "email"]);

    family.addField("name").addField("age");

    expect(family.fields).toEqual(["name", "email", "age"]);
    expect(family.hasField("age")).toBe(true);
    expect(family.hasField("nickname")).toBe(false);
  });

  it("should reject blank names", () => {
    expect(() => new ColumnFamily(" ")).toThrow(ColumnFamilyError);
    expect(() => new ColumnFamily("info", [""])).toThrow(
      'Field name in column family "info" can\'t be blank.',
    );
  });

  it("should compare by name", () => {
    expect(new ColumnFamily("info", ["name"]).equals(new ColumnFamily("info"))).toBe(true);
    expect(new ColumnFamily("info").equals(new ColumnFamily("base"))).toBe(false);
    expect(new ColumnFamily("info").equals("info")).toBe(false);
  });

  it("should clone independently", () => {
    const family = new ColumnFamily("info", ["name"]);
    const copy = family.clone();

    copy.addField("email");

    expect(copy.name).toBe("info");
    expect(family.fields).toEqual(["name"]);
    expect(copy.fields).toEqual(["name", "email"]);
  });
});
