import type { Model } from "../model/model";
import type { EmbedsManyProxy } from "./proxies/embeds-many-proxy";
import type { RelationRegistry } from "./relation-registry";
import type { RelationProxy } from "./types";

/**
 * Relation proxies of one owner record, created on first access and reused
 * for the owner's lifetime.
 */
export class RelationProxyCache {
  private readonly cache = new Map<string, RelationProxy>();

  public constructor(
    private readonly owner: Model,
    private readonly registry: RelationRegistry,
  ) {}

  /**
   * The proxy of the named relation, `undefined` when it is not declared.
   */
  public get(name: string): RelationProxy | undefined {
    const cached = this.cache.get(name);

    if (cached) return cached;

    const metadata = this.registry.get(name);

    if (!metadata) return undefined;

    const proxy = metadata.newRelationProxy(this.owner);
    this.cache.set(name, proxy);

    return proxy;
  }

  /**
   * Whether a proxy was created for the relation.
   */
  public has(name: string): boolean {
    return this.cache.has(name);
  }

  /**
   * Return every cached proxy to the unloaded state.
   */
  public reset(): void {
    for (const proxy of this.cache.values()) {
      proxy.reset();
    }
  }

  public proxies(): RelationProxy[] {
    return Array.from(this.cache.values());
  }

  public embedded(): EmbedsManyProxy[] {
    return this.proxies().filter((proxy): proxy is EmbedsManyProxy => proxy.kind === "embedsMany");
  }
}
