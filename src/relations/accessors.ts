import { RelationTypeMismatchError } from "../errors/relation-type-mismatch.error";
import type { Model } from "../model/model";
import type { RelationMetadata } from "./relation-metadata";
import type { RelationAccessor, RelationValue } from "./types";

function toList(value: RelationValue): (Model | null)[] {
  if (value === null) return [null];

  return Array.isArray(value) ? value : [value];
}

/**
 * Getter/setter pair dispatching to the owner's proxy of the relation.
 *
 * - references-one: reads the target or `null`, assigns a record or `null`
 * - collections: reads every member, assigns a full replacement (`null` clears)
 */
export function createRelationAccessor(metadata: RelationMetadata): RelationAccessor {
  const { name } = metadata;

  switch (metadata.relationType) {
    case "referencesOne":
      return {
        get: (owner) => owner.referencesOneRelation(name).get(),
        set: async (owner, value) => {
          if (Array.isArray(value)) {
            throw new RelationTypeMismatchError(name, metadata.targetTypeName, "Array");
          }

          return owner.referencesOneRelation(name).replace(value);
        },
      };
    case "referencesMany":
      return {
        get: (owner) => owner.referencesManyRelation(name).all(),
        set: (owner, value) => owner.referencesManyRelation(name).replace(...toList(value)),
      };
    case "embedsMany":
      return {
        get: (owner) => owner.embedsManyRelation(name).all(),
        set: (owner, value) => owner.embedsManyRelation(name).replace(...toList(value)),
      };
  }
}
