import type { ModelClass } from "../model/model";
import type { RelationMetadata } from "./relation-metadata";

/**
 * Register a relation on a model class.
 *
 * A relation stored in a column family adds its foreign key, and its
 * polymorphic type column, to that family.
 *
 * @throws {RelationAlreadyDefinedError} When the model already declares the name
 */
export function declareRelation(model: ModelClass, metadata: RelationMetadata): RelationMetadata {
  model.getRelationRegistry().add(metadata);

  if (metadata.persistingForeignKey && metadata.storeIn) {
    model.addFieldToColumnFamily(metadata.storeIn, metadata.foreignKeyColumn());

    if (metadata.polymorphicTypeColumn) {
      model.addFieldToColumnFamily(metadata.storeIn, metadata.polymorphicTypeColumn);
    }
  }

  return metadata;
}
