import { describe, expect, it } from "vitest";
import { chunk, compact, uniqueBy } from "../../../src/utils/array";

describe("array utilities", () => {
  describe("chunk()", () => {
    it("should split into chunks of the given size", () => {
      expect(chunk(["1", "2", "3", "4", "5"], 2)).toEqual([["1", "2"], ["3", "4"], ["5"]]);
      expect(chunk([], 3)).toEqual([]);
    });

    it("should reject a size below one", () => {
      expect(() => chunk(["1"], 0)).toThrow("Chunk size must be a positive number, got 0.");
    });
  });

  describe("compact()", () => {
    it("should drop null and undefined only", () => {
      expect(compact([0, null, "", undefined, false])).toEqual([0, "", false]);
    });
  });

  describe("uniqueBy()", () => {
    it("should keep the first item per identity", () => {
      const items = [
        { id: "1", name: "a" },
        { id: "2", name: "b" },
        { id: "1", name: "c" },
      ];

      expect(uniqueBy(items, (item) => item.id).map((item) => item.name)).toEqual(["a", "b"]);
    });

    it("should compare items without identity by reference", () => {
      const first = { id: undefined };
      const second = { id: undefined };

      expect(uniqueBy([first, second, first], (item) => item.id)).toEqual([first, second]);
    });
  });
});
