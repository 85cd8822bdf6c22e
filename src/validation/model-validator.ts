import { getSealConfig, v, type ObjectValidator, type ValidationResult } from "@warlock.js/seal";
import type { Model } from "../model/model";

export type ModelValidationResult = {
  isValid: boolean;
  errors: ValidationResult["errors"];
  data: Record<string, unknown>;
};

/**
 * Runs a model's @warlock.js/seal schema against its attributes.
 *
 * The primary key and the columns managed by relations (foreign keys and
 * polymorphic type columns) are always accepted, so strict mode never strips them.
 */
export class ModelValidator {
  public constructor(private readonly model: Model) {}

  /**
   * The schema to validate against, `undefined` when the model declares none.
   */
  public buildSchema(): ObjectValidator | undefined {
    const ctor = this.model.self();

    if (!ctor.schema) {
      return undefined;
    }

    const managedColumns = [ctor.primaryKey, ...ctor.getRelationRegistry().managedColumns()];

    const schema = ctor.schema
      .clone()
      .extend(Object.fromEntries(managedColumns.map((column) => [column, v.any()])));

    const strictMode = ctor.strictMode ?? "strip";

    if (strictMode === "strip") {
      schema.stripUnknown();
    } else if (strictMode === "fail") {
      schema.allowUnknown(false);
    } else {
      schema.allowUnknown(true);
    }

    return schema;
  }

  public async validate(): Promise<ModelValidationResult> {
    const schema = this.buildSchema();

    if (!schema) {
      return { isValid: true, errors: [], data: this.model.data };
    }

    const result = await v.validate(schema, this.model.data, {
      context: {
        model: this.model,
      },
      ...getSealConfig(),
    });

    return {
      isValid: result.isValid,
      errors: result.errors,
      data: result.data,
    };
  }
}
