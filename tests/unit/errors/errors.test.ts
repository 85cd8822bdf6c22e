import { beforeEach, describe, expect, it } from "vitest";
import { ColumnFamilyError } from "../../../src/errors/column-family.error";
import { DatabaseWriterValidationError } from "../../../src/errors/database-writer-validation.error";
import { MissingDataSourceError } from "../../../src/errors/missing-data-source.error";
import { RecordNotFoundError } from "../../../src/errors/record-not-found.error";
import { RelationAlreadyDefinedError } from "../../../src/errors/relation-already-defined.error";
import { RelationTypeMismatchError } from "../../../src/errors/relation-type-mismatch.error";
import { UnsupportedFinderOptionError } from "../../../src/errors/unsupported-finder-option.error";
import { Car } from "../../fixtures/models/test-models";
import { useMemoryDataSource } from "../../utils/test-helpers";

describe("errors", () => {
  describe("MissingDataSourceError", () => {
    it("should carry the data source name", () => {
      const error = new MissingDataSourceError("Not found", "primary");

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe("MissingDataSourceError");
      expect(error.message).toBe("Not found");
      expect(error.dataSourceName).toBe("primary");
    });

    it("should handle undefined dataSourceName", () => {
      expect(new MissingDataSourceError("No default data source").dataSourceName).toBeUndefined();
    });

    it("should capture stack trace correctly", () => {
      expect(new MissingDataSourceError("Test").stack).toContain("MissingDataSourceError");
    });
  });

  describe("RecordNotFoundError", () => {
    it("should name the model and the id", () => {
      const error = new RecordNotFoundError("Car", "9");

      expect(error.message).toBe("Could not find Car with id=9");
      expect(error.modelName).toBe("Car");
      expect(error.id).toBe("9");
      expect(error.name).toBe("RecordNotFoundError");
    });
  });

  describe("RelationAlreadyDefinedError", () => {
    it("should name the relation and the model", () => {
      const error = new RelationAlreadyDefinedError("cars", "Person");

      expect(error.message).toBe('Relation "cars" is already defined on Person.');
      expect(error.relationName).toBe("cars");
      expect(error.modelName).toBe("Person");
    });
  });

  describe("RelationTypeMismatchError", () => {
    it("should name the expected and received types", () => {
      const error = new RelationTypeMismatchError("cars", "Car", "Bike");

      expect(error.message).toBe('Relation "cars" expects Car, got Bike.');
      expect(error.expected).toBe("Car");
      expect(error.received).toBe("Bike");
    });
  });

  describe("UnsupportedFinderOptionError", () => {
    it("should list the rejected options", () => {
      const error = new UnsupportedFinderOptionError(["offset"], "Car");

      expect(error.options).toEqual(["offset"]);
      expect(error.message).toBe(
        "Unsupported finder option(s) offset for Car: foreign keys are stored in the owner.",
      );
    });
  });

  describe("ColumnFamilyError", () => {
    it("should be a named error", () => {
      const error = new ColumnFamilyError("Column family name can't be blank.");

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe("ColumnFamilyError");
    });
  });

  describe("DatabaseWriterValidationError", () => {
    beforeEach(() => {
      useMemoryDataSource();
    });

    async function carError() {
      const { errors } = await new Car({}).validate();

      return new DatabaseWriterValidationError("[Car Model] Insert Validation failed", errors);
    }

    it("should look up errors by field", async () => {
      const error = await carError();

      expect(error.hasFieldError("name")).toBe(true);
      expect(error.hasFieldError("brand")).toBe(false);
      expect(error.getFieldErrors("name")).toHaveLength(1);
    });

    it("should render every field in its summary", async () => {
      const summary = (await carError()).toString();

      expect(summary).toContain("Validation Error: Car (Insert)");
      expect(summary).toContain("Field: name");
    });
  });
});
