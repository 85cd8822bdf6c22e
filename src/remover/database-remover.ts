import type { DriverContract } from "../contracts/database-driver.contract";
import type {
  RemoverContract,
  RemoverOptions,
  RemoverResult,
} from "../contracts/database-remover.contract";
import type { OnDeletedEventContext, OnDeletingEventContext } from "../events/model-events";
import type { EmbeddedOwnerLink, Model, ModelClass } from "../model/model";

/**
 * Database remover service that orchestrates model deletion.
 *
 * Handles the complete deletion pipeline:
 * 1. Validation (check if model is new, has primary key)
 * 2. Event emission (deleting, deleted)
 * 3. Driver execution, or detaching an embedded record from its owner
 * 4. Post-deletion state (`isDestroyed`)
 *
 * @example
 * ```typescript
 * const person = await Person.find("1");
 * const result = await new DatabaseRemover(person).destroy();
 *
 * console.log(result.deletedCount); // 1
 * ```
 */
export class DatabaseRemover implements RemoverContract {
  /** The model instance being deleted */
  private readonly model: Model;

  /** Model constructor reference */
  private readonly ctor: ModelClass;

  private readonly driver: DriverContract;

  private readonly table: string;

  private readonly primaryKey: string;

  public constructor(model: Model) {
    this.model = model;
    this.ctor = model.self();
    this.driver = this.ctor.getDataSource().driver;
    this.table = this.ctor.table;
    this.primaryKey = this.ctor.primaryKey;
  }

  /**
   * Destroy (delete) the model instance from the database.
   *
   * @throws {Error} If model is new (not saved) or if deletion fails
   */
  public async destroy(options: RemoverOptions = {}): Promise<RemoverResult> {
    const embeddedIn = this.model.embeddedIn;

    if (embeddedIn) {
      return this.destroyEmbedded(embeddedIn, options);
    }

    const modelName = this.ctor.getModelName();

    if (this.model.isNew) {
      throw new Error(`Cannot destroy a ${modelName} that was never saved.`);
    }

    const id = this.model.id;

    if (id === undefined) {
      throw new Error(`Cannot destroy ${modelName} without "${this.primaryKey}".`);
    }

    const context: OnDeletingEventContext = {
      primaryKeyValue: id,
      primaryKey: this.primaryKey,
      embedded: false,
    };

    if (!options.skipEvents) {
      await this.model.emitEvent("deleting", context);
    }

    const deletedCount = await this.driver.delete(this.table, id);

    if (deletedCount === 0) {
      throw new Error(`Failed to delete ${modelName} with ${this.primaryKey}=${id}: row not found.`);
    }

    this.model.markAsDestroyed();

    if (!options.skipEvents) {
      await this.model.emitEvent<OnDeletedEventContext>("deleted", { ...context, deletedCount });
    }

    return {
      success: true,
      deletedCount,
      embedded: false,
    };
  }

  /**
   * Detach an embedded record; the owner's save removes it from the owner's row.
   */
  private async destroyEmbedded(
    link: EmbeddedOwnerLink,
    options: RemoverOptions,
  ): Promise<RemoverResult> {
    const proxy = link.owner.embedsManyRelation(link.relation);
    const id = this.model.id ?? "";

    const context: OnDeletingEventContext = {
      primaryKeyValue: id,
      primaryKey: this.primaryKey,
      embedded: true,
    };

    if (!options.skipEvents) {
      await this.model.emitEvent("deleting", context);
    }

    const deletedCount = id in proxy.storedEntries() ? 1 : 0;

    await proxy.destroy(this.model);

    if (link.owner.isPersisted()) {
      await link.owner.save();
    }

    if (!options.skipEvents) {
      await this.model.emitEvent<OnDeletedEventContext>("deleted", { ...context, deletedCount });
    }

    return {
      success: true,
      deletedCount,
      embedded: true,
    };
  }
}
