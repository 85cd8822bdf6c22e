import { describe, expect, it } from "vitest";
import type { ColumnFamilies } from "../../../src/contracts";
import { applyUpdateOperations, splitColumnPath } from "../../../src/utils/column-path";

describe("column paths", () => {
  describe("splitColumnPath()", () => {
    it("should split on the first dot", () => {
      expect(splitColumnPath("info.car_ids")).toEqual(["info", "car_ids"]);
      expect(splitColumnPath("meta.a.b")).toEqual(["meta", "a.b"]);
    });

    it("should reject paths without both parts", () => {
      for (const path of ["info", ".name", "info."]) {
        expect(() => splitColumnPath(path)).toThrow(
          `Invalid column path "${path}", expected "family.column".`,
        );
      }
    });
  });

  describe("applyUpdateOperations()", () => {
    it("should set and unset columns, dropping empty families", () => {
      const families: ColumnFamilies = {
        info: { name: "Ann" },
        base: { nickname: "A" },
      };

      applyUpdateOperations(families, {
        $set: { "info.email": "ann@example.com", "addresses.1": '{"street":"Main"}' },
        $unset: { "base.nickname": 1, "ghost.column": 1 },
      });

      expect(families).toEqual({
        info: { name: "Ann", email: "ann@example.com" },
        addresses: { "1": '{"street":"Main"}' },
      });
    });
  });
});
