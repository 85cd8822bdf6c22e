import { colors } from "@mongez/copper";
import events from "@mongez/events";
import { log } from "@warlock.js/logger";
import { shouldLog } from "../../config";
import type { Model } from "../../model/model";
import type { RelationMetadata } from "../relation-metadata";
import { getRelationSyncedEvent } from "../relation-events";
import type {
  LoadState,
  RelationFinderResult,
  RelationMutationResult,
  RelationType,
} from "../types";

/**
 * Lazily loaded handle on one relation of one owner record.
 *
 * State machine: `unloaded` → `loaded` on the first `load()`, back to
 * `unloaded` on `reset()`. While loaded, reads never touch the store.
 *
 * Variants implement how the target is looked up (`findTarget`), what an
 * empty target is, and how a fresh lookup merges with what is held in memory.
 */
export abstract class BaseRelationProxy<TTarget> {
  public abstract readonly kind: RelationType;

  protected loadState: LoadState = "unloaded";

  protected proxyTarget: TTarget;

  public constructor(
    public readonly owner: Model,
    public readonly metadata: RelationMetadata,
  ) {
    this.proxyTarget = this.emptyTarget();
  }

  public get name(): string {
    return this.metadata.name;
  }

  /**
   * The in-memory target, without loading.
   */
  public get target(): TTarget {
    return this.proxyTarget;
  }

  public isLoaded(): boolean {
    return this.loadState === "loaded";
  }

  /**
   * Whether a lookup is worth making: a custom finder is set, or there is something to look up.
   */
  public canLoad(): boolean {
    return this.metadata.hasFinder || this.canFindTarget();
  }

  public markLoaded(): this {
    this.loadState = "loaded";

    return this;
  }

  /**
   * Drop the in-memory target; the next read loads again.
   */
  public reset(): this {
    this.loadState = "unloaded";
    this.proxyTarget = this.emptyTarget();

    return this;
  }

  /**
   * Load the target once; later calls return the cached value until `reset()`.
   */
  public async load(): Promise<TTarget> {
    if (this.isLoaded()) {
      return this.proxyTarget;
    }

    let found: TTarget;

    if (!this.canLoad()) {
      found = this.emptyTarget();
    } else if (this.metadata.findWith) {
      found = this.normalizeFound(await this.metadata.findWith(this.owner, {}));
    } else {
      found = await this.findTarget();
    }

    this.proxyTarget = this.mergeLoaded(found);
    this.markLoaded();

    if (shouldLog("info")) {
      log.info(
        "relations",
        "load",
        `Loaded ${colors.cyan(this.owner.self().getModelName())}.${colors.yellow(this.name)}`,
      );
    }

    return this.proxyTarget;
  }

  /**
   * Whether this proxy writes the foreign key on the owner.
   *
   * Relations stored in a column family always do; a relation driven by a
   * custom finder only does when the owner already carries the attribute.
   */
  protected managesForeignKeys(): boolean {
    const { foreignKey } = this.metadata;

    if (foreignKey === undefined) return false;

    return (
      this.metadata.persistingForeignKey || !this.metadata.hasFinder || this.owner.has(foreignKey)
    );
  }

  protected mutationResult(
    success: boolean,
    addedIds: string[] = [],
    removedIds: string[] = [],
  ): RelationMutationResult {
    return { success, addedIds, removedIds, relation: this.name };
  }

  /**
   * Broadcast foreign-key changes made by a mutation.
   */
  protected async synced(addedIds: string[], removedIds: string[]): Promise<void> {
    if (addedIds.length === 0 && removedIds.length === 0) return;

    await events.triggerAll(getRelationSyncedEvent(this.owner.self(), this.name), {
      owner: this.owner,
      relation: this.name,
      addedIds,
      removedIds,
    });
  }

  protected abstract emptyTarget(): TTarget;

  /**
   * Whether the default lookup has anything to fetch.
   */
  protected abstract canFindTarget(): boolean;

  protected abstract findTarget(): Promise<TTarget>;

  /**
   * Turn a custom finder's result into a target value.
   */
  protected abstract normalizeFound(result: RelationFinderResult): TTarget;

  /**
   * Combine freshly found targets with the in-memory ones.
   */
  protected mergeLoaded(found: TTarget): TTarget {
    return found;
  }
}
