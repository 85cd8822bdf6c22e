import { ColumnFamilyError } from "../errors/column-family.error";

/**
 * A named bucket of columns in a row.
 *
 * Models declare which attributes live in which family; the writer uses the
 * declaration to split a record's attributes into the row it stores.
 *
 * @example
 * ```typescript
 * class Person extends Model {
 *   public static table = "people";
 *   public static columnFamilies = [new ColumnFamily("info", ["name", "email"])];
 * }
 * ```
 */
export class ColumnFamily {
  public readonly name: string;

  protected readonly fieldNames = new Set<string>();

  public constructor(name: string, fields: string[] = []) {
    if (name.trim() === "") {
      throw new ColumnFamilyError("Column family name can't be blank.");
    }

    this.name = name;

    for (const field of fields) {
      this.addField(field);
    }
  }

  /**
   * Add a field to the family; adding the same field twice is a no-op.
   */
  public addField(field: string): this {
    if (field.trim() === "") {
      throw new ColumnFamilyError(`Field name in column family "${this.name}" can't be blank.`);
    }

    this.fieldNames.add(field);

    return this;
  }

  public hasField(field: string): boolean {
    return this.fieldNames.has(field);
  }

  public get fields(): string[] {
    return Array.from(this.fieldNames);
  }

  /**
   * Families are equal when they share a name.
   */
  public equals(other: unknown): boolean {
    return other instanceof ColumnFamily && other.name === this.name;
  }

  /**
   * Copy of this family, used when a child model extends its parent's schema.
   */
  public clone(): ColumnFamily {
    return new ColumnFamily(this.name, this.fields);
  }
}
