import type { Model, ModelClass } from "../model/model";

/**
 * Payload broadcast after a mutation changed a relation's foreign keys.
 */
export type RelationSyncedPayload = {
  owner: Model;
  relation: string;
  addedIds: string[];
  removedIds: string[];
};

/**
 * Event name fired through `@mongez/events` when a relation's foreign keys change.
 *
 * @example
 * ```typescript
 * events.subscribe(getRelationSyncedEvent(Person, "cars"), (payload: RelationSyncedPayload) => {
 *   console.log(payload.addedIds);
 * });
 * ```
 */
export function getRelationSyncedEvent(model: ModelClass, relation: string): string {
  return `relation.${model.table}.${relation}.synced`;
}
