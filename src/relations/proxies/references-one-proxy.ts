import { RelationTypeMismatchError } from "../../errors/relation-type-mismatch.error";
import type { Model, ModelClass } from "../../model/model";
import { resolveModelClass } from "../../model/register-model";
import type { RelationFinderResult, RelationMutationResult } from "../types";
import { BaseRelationProxy } from "./base-relation-proxy";

/**
 * Proxy of a relation to a single record whose id is stored on the owner.
 *
 * A polymorphic relation also stores the target's registered model name in
 * its type column, e.g. `attachable_id` and `attachable_type`.
 */
export class ReferencesOneProxy extends BaseRelationProxy<Model | null> {
  public readonly kind = "referencesOne" as const;

  /**
   * The target, loading it on first access; `null` when there is none.
   */
  public async get(): Promise<Model | null> {
    return this.load();
  }

  /**
   * The stored target id, `undefined` when the owner references nothing.
   */
  public foreignKeyValue(): string | undefined {
    const value = this.owner.get(this.metadata.foreignKeyColumn());

    return value === undefined || value === null || value === "" ? undefined : String(value);
  }

  /**
   * Point the relation at another record, or at nothing.
   *
   * Writes the foreign key (and type column) on the owner without saving it.
   *
   * @throws {RelationTypeMismatchError} When the record is not of the target
   * type, or is not persisted for a polymorphic relation
   */
  public async replace(record: Model | null): Promise<RelationMutationResult> {
    const previousId = this.foreignKeyValue();
    const managesForeignKeys = this.managesForeignKeys();

    if (record === null) {
      if (managesForeignKeys) {
        const { polymorphicTypeColumn } = this.metadata;
        const columns = [this.metadata.foreignKeyColumn()];
        if (polymorphicTypeColumn) columns.push(polymorphicTypeColumn);

        this.owner.unset(...columns);
      }

      this.proxyTarget = null;
      this.markLoaded();

      const removedIds = managesForeignKeys && previousId ? [previousId] : [];
      await this.synced([], removedIds);

      return this.mutationResult(true, [], removedIds);
    }

    this.assertTarget(record);

    const id = await record.ensureId();
    let addedIds: string[] = [];
    let removedIds: string[] = [];

    if (managesForeignKeys) {
      this.owner.set(this.metadata.foreignKeyColumn(), id);

      if (this.metadata.polymorphicTypeColumn) {
        this.owner.set(this.metadata.polymorphicTypeColumn, record.self().getModelName());
      }

      if (previousId !== id) {
        addedIds = [id];
        removedIds = previousId ? [previousId] : [];
      }
    }

    this.proxyTarget = record;
    this.markLoaded();

    await this.synced(addedIds, removedIds);

    return this.mutationResult(true, addedIds, removedIds);
  }

  protected emptyTarget(): Model | null {
    return null;
  }

  protected canFindTarget(): boolean {
    return this.foreignKeyValue() !== undefined;
  }

  protected async findTarget(): Promise<Model | null> {
    const id = this.foreignKeyValue();
    const targetClass = this.resolveTargetClass();

    if (id === undefined || !targetClass) {
      return null;
    }

    return targetClass.find(id);
  }

  protected normalizeFound(result: RelationFinderResult): Model | null {
    if (Array.isArray(result)) {
      return result.find((record): record is Model => Boolean(record)) ?? null;
    }

    return result ?? null;
  }

  /**
   * The declared target class, or the one named by the type column when polymorphic.
   */
  private resolveTargetClass(): ModelClass | undefined {
    const { polymorphicTypeColumn } = this.metadata;

    if (!polymorphicTypeColumn) {
      return this.metadata.targetClass();
    }

    const typeName = this.owner.get(polymorphicTypeColumn);

    return typeof typeName === "string" && typeName !== "" ? resolveModelClass(typeName) : undefined;
  }

  private assertTarget(record: Model): void {
    if (this.metadata.polymorphic) {
      if (!record.isPersisted()) {
        throw new RelationTypeMismatchError(
          this.name,
          "a persisted record",
          `an unsaved ${record.self().getModelName()}`,
        );
      }

      return;
    }

    const targetClass = this.metadata.targetClass();

    if (!(record instanceof targetClass)) {
      throw new RelationTypeMismatchError(
        this.name,
        this.metadata.targetTypeName,
        record.self().getModelName(),
      );
    }
  }
}
