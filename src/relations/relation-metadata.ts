import pluralize from "pluralize";
import type { Model, ModelClass } from "../model/model";
import { resolveModelClass } from "../model/register-model";
import { EmbedsManyProxy } from "./proxies/embeds-many-proxy";
import { ReferencesManyProxy } from "./proxies/references-many-proxy";
import { ReferencesOneProxy } from "./proxies/references-one-proxy";
import type { RelationFinder, RelationOptions, RelationProxy, RelationType } from "./types";

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Descriptor of one declared relation.
 *
 * Built once per declaration; derives the foreign key and target type name
 * from the relation name unless they are given.
 *
 * | kind             | foreign key             | target     |
 * | ---------------- | ----------------------- | ---------- |
 * | `referencesOne`  | `boss` → `boss_id`      | `Boss`     |
 * | `referencesMany` | `cars` → `car_ids`      | `Car`      |
 * | `embedsMany`     | none                    | `Address`  |
 */
export class RelationMetadata {
  public readonly name: string;

  public readonly relationType: RelationType;

  /**
   * Owner attribute holding the target id(s); undefined for embedded relations.
   */
  public readonly foreignKey?: string;

  /**
   * Column family holding the foreign key, or the serialized records when embedded.
   */
  public readonly storeIn?: string;

  public readonly polymorphic: boolean;

  public readonly findWith?: RelationFinder;

  /**
   * Owner attribute whose value prefixes the target ids.
   */
  public readonly startsWith?: string;

  private readonly className: string | ModelClass;

  public constructor(name: string, relationType: RelationType, options: RelationOptions = {}) {
    this.name = name;
    this.relationType = relationType;
    this.className = options.className ?? capitalize(pluralize.singular(name));

    if (relationType === "embedsMany") {
      this.storeIn = options.storeIn ?? name;
      this.polymorphic = false;
      return;
    }

    this.storeIn = options.storeIn;
    this.findWith = options.findWith;
    this.startsWith = options.startsWith;
    this.polymorphic = relationType === "referencesOne" && Boolean(options.polymorphic);
    this.foreignKey =
      options.foreignKey ??
      (relationType === "referencesOne" ? `${name}_id` : `${pluralize.singular(name)}_ids`);
  }

  /**
   * Whether the relation writes its foreign key into the owner's schema.
   */
  public get persistingForeignKey(): boolean {
    return this.relationType !== "embedsMany" && this.storeIn !== undefined;
  }

  /**
   * Owner attribute recording the target's type name, for polymorphic relations.
   */
  public get polymorphicTypeColumn(): string | undefined {
    if (!this.polymorphic || !this.foreignKey) {
      return undefined;
    }

    return `${this.foreignKey.replace(/_id$/, "")}_type`;
  }

  public get hasFinder(): boolean {
    return this.findWith !== undefined;
  }

  public get targetTypeName(): string {
    return typeof this.className === "string" ? this.className : this.className.getModelName();
  }

  /**
   * The foreign key of a references relation.
   *
   * @throws {Error} For embedded relations, which have none
   */
  public foreignKeyColumn(): string {
    if (this.foreignKey === undefined) {
      throw new Error(`Relation "${this.name}" is embedded and has no foreign key.`);
    }

    return this.foreignKey;
  }

  public targetClass(): ModelClass {
    return resolveModelClass(this.className);
  }

  /**
   * Relations are the same relation when they share a name.
   */
  public equals(other: unknown): boolean {
    return other instanceof RelationMetadata && other.name === this.name;
  }

  public newRelationProxy(owner: Model): RelationProxy {
    switch (this.relationType) {
      case "referencesOne":
        return new ReferencesOneProxy(owner, this);
      case "referencesMany":
        return new ReferencesManyProxy(owner, this);
      case "embedsMany":
        return new EmbedsManyProxy(owner, this);
    }
  }
}
