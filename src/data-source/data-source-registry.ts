import { EventEmitter } from "node:events";
import { MissingDataSourceError } from "../errors/missing-data-source.error";
import { DataSource, type DataSourceOptions } from "./data-source";

/**
 * Event types emitted by the DataSourceRegistry.
 *
 * - `registered`: Emitted when any data source is registered
 * - `default-registered`: Emitted when a default data source is registered
 * - `connected`: Emitted when a data source's driver connects
 * - `disconnected`: Emitted when a data source's driver disconnects
 */
export type DataSourceRegistryEvent =
  | "registered"
  | "default-registered"
  | "connected"
  | "disconnected";

/**
 * Callback signature for registry events.
 */
export type DataSourceRegistryListener = (dataSource: DataSource) => void;

/** Maintains registry of named data sources. */
export class DataSourceRegistry {
  private readonly sources = new Map<string, DataSource>();
  private defaultSource?: DataSource;
  private readonly events = new EventEmitter();

  /**
   * Register a new data source definition.
   *
   * Driver connection events are forwarded to the registry listeners.
   */
  public register(options: DataSourceOptions): DataSource {
    const source = new DataSource(options);
    this.sources.set(source.name, source);

    const isNewDefault = source.isDefault || !this.defaultSource;

    if (isNewDefault) {
      this.defaultSource = source;
    }

    this.events.emit("registered", source);

    if (isNewDefault) {
      this.events.emit("default-registered", source);
    }

    source.driver.on("connected", () => {
      this.events.emit("connected", source);
    });

    source.driver.on("disconnected", () => {
      this.events.emit("disconnected", source);
    });

    return source;
  }

  /**
   * Clean up all data sources and default one
   */
  public clear() {
    this.defaultSource = undefined;
    this.sources.clear();
  }

  /**
   * Listen for data source registry events.
   *
   * @example
   * ```typescript
   * dataSourceRegistry.on("connected", (ds) => {
   *   console.log(`${ds.driver.name} data source "${ds.name}" connected`);
   * });
   * ```
   */
  public on(event: DataSourceRegistryEvent, listener: DataSourceRegistryListener): void {
    this.events.on(event, listener);
  }

  public once(event: DataSourceRegistryEvent, listener: DataSourceRegistryListener): void {
    this.events.once(event, listener);
  }

  public off(event: DataSourceRegistryEvent, listener: DataSourceRegistryListener): void {
    this.events.off(event, listener);
  }

  /** Retrieve a data source either by name or the default one. */
  public get(name?: string): DataSource {
    if (name != null) {
      const source = this.sources.get(name);
      if (!source) {
        throw new MissingDataSourceError(`Data source "${name}" is not registered.`, name);
      }
      return source;
    }

    if (!this.defaultSource) {
      throw new MissingDataSourceError("No default data source registered.");
    }

    return this.defaultSource;
  }

  /**
   * Get all registered data sources.
   *
   * @example
   * ```typescript
   * for (const dataSource of dataSourceRegistry.getAllDataSources()) {
   *   await dataSource.driver.disconnect();
   * }
   * ```
   */
  public getAllDataSources(): DataSource[] {
    return Array.from(this.sources.values());
  }
}

export const dataSourceRegistry = new DataSourceRegistry();
