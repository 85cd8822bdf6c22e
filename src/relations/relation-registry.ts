import { RelationAlreadyDefinedError } from "../errors/relation-already-defined.error";
import { createRelationAccessor } from "./accessors";
import type { RelationMetadata } from "./relation-metadata";
import type { RelationAccessor, RelationType } from "./types";

/**
 * Relations declared on one model class, keyed by name, and the accessor
 * pair registered for each of them.
 *
 * A subclass registry starts with the relations its parent declared so far.
 */
export class RelationRegistry {
  private readonly relations = new Map<string, RelationMetadata>();

  private readonly accessors = new Map<string, RelationAccessor>();

  public constructor(
    public readonly modelName: string,
    inherited?: RelationRegistry,
  ) {
    if (inherited) {
      for (const metadata of inherited.all()) {
        this.relations.set(metadata.name, metadata);
        this.accessors.set(metadata.name, createRelationAccessor(metadata));
      }
    }
  }

  /**
   * @throws {RelationAlreadyDefinedError} When a relation with the same name exists
   */
  public add(metadata: RelationMetadata): this {
    if (this.all().some((existing) => existing.equals(metadata))) {
      throw new RelationAlreadyDefinedError(metadata.name, this.modelName);
    }

    this.relations.set(metadata.name, metadata);
    this.accessors.set(metadata.name, createRelationAccessor(metadata));

    return this;
  }

  public get(name: string): RelationMetadata | undefined {
    return this.relations.get(name);
  }

  public has(name: string): boolean {
    return this.relations.has(name);
  }

  public all(): RelationMetadata[] {
    return Array.from(this.relations.values());
  }

  public ofType(relationType: RelationType): RelationMetadata[] {
    return this.all().filter((metadata) => metadata.relationType === relationType);
  }

  public accessor(name: string): RelationAccessor | undefined {
    return this.accessors.get(name);
  }

  public names(): string[] {
    return Array.from(this.relations.keys());
  }

  /**
   * Owner attributes written by relations: foreign keys and polymorphic type columns.
   */
  public managedColumns(): string[] {
    const columns: string[] = [];

    for (const metadata of this.all()) {
      if (metadata.foreignKey) columns.push(metadata.foreignKey);
      if (metadata.polymorphicTypeColumn) columns.push(metadata.polymorphicTypeColumn);
    }

    return columns;
  }

  /**
   * Column families holding embedded records.
   */
  public embeddedFamilies(): string[] {
    return this.ofType("embedsMany").flatMap((metadata) =>
      metadata.storeIn ? [metadata.storeIn] : [],
    );
  }
}
