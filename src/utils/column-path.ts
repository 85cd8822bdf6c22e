import type { ColumnFamilies, UpdateOperations } from "../contracts/database-driver.contract";

/**
 * Split a `family.column` path on its first dot.
 *
 * @example
 * ```typescript
 * splitColumnPath("info.car_ids"); // ["info", "car_ids"]
 * splitColumnPath("meta.a.b"); // ["meta", "a.b"]
 * ```
 */
export function splitColumnPath(path: string): [family: string, column: string] {
  const dot = path.indexOf(".");

  if (dot <= 0 || dot === path.length - 1) {
    throw new Error(`Invalid column path "${path}", expected "family.column".`);
  }

  return [path.slice(0, dot), path.slice(dot + 1)];
}

/**
 * Apply `$set`/`$unset` operations to column families in place.
 *
 * Families left without columns are dropped.
 */
export function applyUpdateOperations(
  families: ColumnFamilies,
  operations: UpdateOperations,
): ColumnFamilies {
  for (const [path, value] of Object.entries(operations.$set ?? {})) {
    const [family, column] = splitColumnPath(path);

    families[family] ??= {};
    families[family][column] = value;
  }

  for (const path of Object.keys(operations.$unset ?? {})) {
    const [family, column] = splitColumnPath(path);
    const columns = families[family];

    if (!columns) continue;

    delete columns[column];

    if (Object.keys(columns).length === 0) {
      delete families[family];
    }
  }

  return families;
}
