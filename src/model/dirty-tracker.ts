import { areEqual, clone } from "@mongez/reinforcements";
import { isPlainObject } from "@mongez/supportive-is";

type FlatRecord = Record<string, unknown>;

/**
 * Old and new value of a changed attribute.
 */
export type AttributeChange = { oldValue: unknown; newValue: unknown };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && isPlainObject(value);
}

/**
 * Flatten nested plain objects into dot-notation keys; arrays and class
 * instances are kept as leaves.
 */
function flatten(object: Record<string, unknown>, parent?: string, root: FlatRecord = {}) {
  for (const key of Object.keys(object)) {
    const value = object[key];
    const keyChain = parent ? `${parent}.${key}` : key;

    if (isRecord(value) && Object.keys(value).length > 0) {
      flatten(value, keyChain, root);
    } else {
      root[keyChain] = value;
    }
  }

  return root;
}

function topLevel(column: string): string {
  const dot = column.indexOf(".");

  return dot === -1 ? column : column.slice(0, dot);
}

/**
 * Tracks changes to a record's attributes by comparing a baseline snapshot
 * with the current one.
 *
 * Columns are compared in dot-notation, so a change deep inside a nested
 * attribute marks only that path dirty. Attributes mutated in place (e.g. an
 * id list pushed to directly) can be flagged with `touch()`.
 *
 * @example
 * ```typescript
 * const tracker = new DirtyTracker({ name: "Alice", car_ids: [] });
 * tracker.mergeChanges({ car_ids: ["1"] });
 * tracker.getDirtyColumns(); // ["car_ids"]
 * tracker.getChangedAttributes(); // ["car_ids"]
 * ```
 */
export class DirtyTracker {
  private initialRaw: Record<string, unknown>;

  private currentRaw: Record<string, unknown>;

  private initialFlattened: FlatRecord;

  private currentFlattened: FlatRecord;

  private readonly dirtyColumns = new Set<string>();

  private readonly removedColumns = new Set<string>();

  /**
   * Columns explicitly flagged as changed regardless of their value.
   */
  private readonly touchedColumns = new Set<string>();

  public constructor(data: Record<string, unknown>) {
    this.initialRaw = clone(data);
    this.currentRaw = clone(data);

    this.initialFlattened = flatten(this.initialRaw);
    this.currentFlattened = { ...this.initialFlattened };

    this.updateDirtyState();
  }

  /**
   * Dirty columns in dot-notation, touched columns included.
   */
  public getDirtyColumns(): string[] {
    return Array.from(new Set([...this.dirtyColumns, ...this.touchedColumns]));
  }

  /**
   * Columns present in the baseline that no longer exist.
   */
  public getRemovedColumns(): string[] {
    return Array.from(this.removedColumns);
  }

  /**
   * Top-level attribute names that have a dirty column, excluding removed ones.
   */
  public getChangedAttributes(): string[] {
    const removed = new Set(this.getRemovedAttributes());
    const attributes = new Set(this.getDirtyColumns().map(topLevel));

    return Array.from(attributes).filter((attribute) => !removed.has(attribute));
  }

  /**
   * Top-level attributes that were removed entirely.
   */
  public getRemovedAttributes(): string[] {
    return Array.from(new Set(Array.from(this.removedColumns).map(topLevel))).filter(
      (attribute) => !(attribute in this.currentRaw),
    );
  }

  public hasChanges(): boolean {
    return this.dirtyColumns.size > 0 || this.removedColumns.size > 0 || this.touchedColumns.size > 0;
  }

  public isDirty(column: string): boolean {
    return this.dirtyColumns.has(column) || this.touchedColumns.has(column);
  }

  /**
   * Mark a column as changed even when its value compares equal to the baseline.
   */
  public touch(column: string): void {
    this.touchedColumns.add(column);
  }

  /**
   * Dirty columns mapped to their baseline and current values.
   */
  public getDirtyColumnsWithValues(): Record<string, AttributeChange> {
    const result: Record<string, AttributeChange> = {};

    for (const column of this.getDirtyColumns()) {
      result[column] = {
        oldValue: this.initialFlattened[column],
        newValue: column in this.currentFlattened ? this.currentFlattened[column] : undefined,
      };
    }

    return result;
  }

  /**
   * Changed top-level attributes mapped to their baseline and current values.
   */
  public getChanges(): Record<string, AttributeChange> {
    const result: Record<string, AttributeChange> = {};

    for (const attribute of [...this.getChangedAttributes(), ...this.getRemovedAttributes()]) {
      result[attribute] = {
        oldValue: this.initialRaw[attribute],
        newValue: this.currentRaw[attribute],
      };
    }

    return result;
  }

  /**
   * Replace the current snapshot entirely, keeping the baseline.
   */
  public replaceCurrentData(data: Record<string, unknown>): void {
    this.currentRaw = clone(data);
    this.currentFlattened = flatten(this.currentRaw);
    this.updateDirtyState();
  }

  /**
   * Deep merge a partial payload into the current snapshot.
   */
  public mergeChanges(partial: Record<string, unknown>): void {
    this.mergeIntoRaw(this.currentRaw, partial);
    this.currentFlattened = flatten(this.currentRaw);
    this.updateDirtyState();
  }

  /**
   * Remove one or more columns (dot-notation supported) from the current snapshot.
   */
  public unset(columns: string | string[]): void {
    const targets = Array.isArray(columns) ? columns : [columns];

    for (const path of targets) {
      this.deleteFromRaw(path);
    }

    this.currentFlattened = flatten(this.currentRaw);
    this.updateDirtyState();
  }

  /**
   * Make the given data, or the current snapshot, the new baseline.
   */
  public reset(data?: Record<string, unknown>): void {
    const source = data ?? this.currentRaw;
    this.initialRaw = clone(source);
    this.currentRaw = clone(source);

    this.initialFlattened = flatten(this.initialRaw);
    this.currentFlattened = flatten(this.currentRaw);

    this.dirtyColumns.clear();
    this.removedColumns.clear();
    this.touchedColumns.clear();
  }

  private updateDirtyState(): void {
    this.dirtyColumns.clear();
    this.removedColumns.clear();

    const keys = new Set([
      ...Object.keys(this.initialFlattened),
      ...Object.keys(this.currentFlattened),
    ]);

    for (const key of keys) {
      const hasCurrent = key in this.currentFlattened;
      const hasInitial = key in this.initialFlattened;

      if (!hasCurrent && hasInitial) {
        this.removedColumns.add(key);
      }

      const currentValue = hasCurrent ? this.currentFlattened[key] : undefined;

      if (!areEqual(this.initialFlattened[key], currentValue)) {
        this.dirtyColumns.add(key);
      }
    }
  }

  private mergeIntoRaw(target: Record<string, unknown>, source: Record<string, unknown>): void {
    for (const [key, value] of Object.entries(source)) {
      const existing = target[key];

      if (isRecord(value) && isRecord(existing)) {
        this.mergeIntoRaw(existing, value);
        continue;
      }

      target[key] = clone(value);
    }
  }

  private deleteFromRaw(path: string): void {
    const segments = path.split(".");
    let container: unknown = this.currentRaw;

    for (let index = 0; index < segments.length - 1; index += 1) {
      container = isRecord(container) ? container[segments[index]] : undefined;
    }

    if (isRecord(container)) {
      delete container[segments[segments.length - 1]];
    }
  }
}
