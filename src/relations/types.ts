/**
 * @fileoverview Relation type definitions.
 *
 * This module defines the options accepted when declaring relations
 * (references-one, references-many, embeds-many), the custom finder
 * signature, and the results returned by relation mutations.
 */

import type { Model, ModelClass } from "../model/model";
import type { EmbedsManyProxy } from "./proxies/embeds-many-proxy";
import type { ReferencesManyProxy } from "./proxies/references-many-proxy";
import type { ReferencesOneProxy } from "./proxies/references-one-proxy";

// ============================================================================
// RELATION TYPES
// ============================================================================

/**
 * The kind of a declared relation.
 *
 * - `referencesOne`: the owner stores the id of a single target
 * - `referencesMany`: the owner stores an ordered list of target ids
 * - `embedsMany`: the targets are serialized inside the owner's row
 */
export type RelationType = "referencesOne" | "referencesMany" | "embedsMany";

/**
 * Load state of a relation proxy.
 */
export type LoadState = "unloaded" | "loaded";

/**
 * Every proxy variant; `kind` tells them apart.
 */
export type RelationProxy = ReferencesOneProxy | ReferencesManyProxy | EmbedsManyProxy;

// ============================================================================
// FINDERS
// ============================================================================

/**
 * Options a custom finder may receive from `all()` and `limit()`.
 */
export type FinderOptions = {
  limit?: number;
  offset?: number;
  startsWith?: string;
  batchSize?: number;
};

/**
 * Custom lookup replacing the default foreign-key lookup.
 *
 * May return a single record, a list (empty entries are discarded) or nothing.
 *
 * @example
 * ```typescript
 * Person.referencesMany("tests", {
 *   startsWith: "id",
 *   findWith: (person) => Test.all({ startsWith: String(person.id) }),
 * });
 * ```
 */
export type RelationFinder = (
  owner: Model,
  options: FinderOptions,
) => RelationFinderResult | Promise<RelationFinderResult>;

export type RelationFinderResult = Model | (Model | null | undefined)[] | null | undefined;

// ============================================================================
// DECLARATION OPTIONS
// ============================================================================

type BaseRelationOptions = {
  /**
   * Target model, by registered name or class.
   *
   * @default the singular, capitalised relation name
   */
  className?: string | ModelClass;

  /**
   * Column family the foreign key is stored in. When set, the foreign key
   * (and the polymorphic type column) are added to the owner's schema.
   */
  storeIn?: string;

  /**
   * Custom finder replacing the default lookup.
   */
  findWith?: RelationFinder;

  /**
   * Owner attribute whose value prefixes every target id.
   */
  startsWith?: string;
};

export type ReferencesOneOptions = BaseRelationOptions & {
  /**
   * @default `${name}_id`
   */
  foreignKey?: string;

  /**
   * Accept targets of any registered model, recording their type next to the foreign key.
   */
  polymorphic?: boolean;
};

export type ReferencesManyOptions = BaseRelationOptions & {
  /**
   * @default `${singular(name)}_ids`
   */
  foreignKey?: string;
};

export type EmbedsManyOptions = {
  className?: string | ModelClass;

  /**
   * Column family holding the serialized records.
   *
   * @default the relation name
   */
  storeIn?: string;
};

/**
 * Every option any relation kind accepts; each kind reads the ones it understands.
 */
export type RelationOptions = ReferencesOneOptions & ReferencesManyOptions & EmbedsManyOptions;

// ============================================================================
// COLLECTION OPTIONS
// ============================================================================

export type AllOptions = {
  limit?: number;
  offset?: number;
  startsWith?: string;
};

export type BatchOptions = {
  /**
   * @default the `relations.batchSize` configuration, or 1000
   */
  batchSize?: number;

  /**
   * Only ids starting with this prefix.
   */
  startsWith?: string;
};

// ============================================================================
// RESULTS
// ============================================================================

/**
 * Outcome of a relation mutation, reporting the foreign-key changes it made.
 *
 * @example
 * ```typescript
 * const result = await person.referencesManyRelation("cars").add(car);
 * // { success: true, addedIds: ["7"], removedIds: [], relation: "cars" }
 * ```
 */
export type RelationMutationResult = {
  /**
   * False when the batch was rejected because a candidate failed validation.
   */
  success: boolean;
  addedIds: string[];
  removedIds: string[];
  relation: string;
};

/**
 * Value of a relation read through the accessor table.
 */
export type RelationValue = Model | Model[] | null;

/**
 * Getter/setter pair registered for every declared relation.
 */
export type RelationAccessor = {
  get(owner: Model): Promise<RelationValue>;
  set(owner: Model, value: RelationValue): Promise<RelationMutationResult>;
};
