/**
 * @fileoverview Relations module.
 *
 * Relation declarations, their metadata and registry, and the lazily
 * loaded proxies mediating access to related records.
 *
 * @example
 * ```typescript
 * class Person extends Model {
 *   public static table = "people";
 * }
 *
 * Person.referencesOne("boss", { className: "Person", storeIn: "info" });
 * Person.referencesMany("cars", { storeIn: "info" });
 * Person.embedsMany("addresses");
 * ```
 */

export * from "./accessors";
export * from "./declare-relation";
export * from "./proxies/base-relation-proxy";
export * from "./proxies/collection-relation-proxy";
export * from "./proxies/embeds-many-proxy";
export * from "./proxies/references-many-proxy";
export * from "./proxies/references-one-proxy";
export * from "./relation-events";
export * from "./relation-metadata";
export * from "./relation-proxy-cache";
export * from "./relation-registry";
export * from "./types";
