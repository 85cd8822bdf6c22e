import { beforeEach, describe, expect, it, vi } from "vitest";
import { DataSource } from "../../../src/data-source/data-source";
import { DataSourceRegistry } from "../../../src/data-source/data-source-registry";
import { MemoryDriver } from "../../../src/drivers/memory/memory-driver";
import { MissingDataSourceError } from "../../../src/errors/missing-data-source.error";

describe("DataSourceRegistry", () => {
  let registry: DataSourceRegistry;

  beforeEach(() => {
    registry = new DataSourceRegistry();
  });

  describe("register()", () => {
    it("should add data source to registry", () => {
      const dataSource = registry.register({ name: "primary", driver: new MemoryDriver() });

      expect(dataSource).toBeInstanceOf(DataSource);
      expect(registry.get("primary")).toBe(dataSource);
    });

    it("should make the first source the default", () => {
      const first = registry.register({ name: "first", driver: new MemoryDriver() });
      registry.register({ name: "second", driver: new MemoryDriver() });

      expect(registry.get()).toBe(first);
    });

    it("should respect explicit isDefault: true", () => {
      registry.register({ name: "first", driver: new MemoryDriver() });
      const second = registry.register({
        name: "second",
        driver: new MemoryDriver(),
        isDefault: true,
      });

      expect(second.isDefault).toBe(true);
      expect(registry.get()).toBe(second);
    });

    it("should emit 'registered' and 'default-registered'", () => {
      const registered = vi.fn();
      const defaultRegistered = vi.fn();

      registry.on("registered", registered);
      registry.on("default-registered", defaultRegistered);

      const first = registry.register({ name: "first", driver: new MemoryDriver() });
      const second = registry.register({ name: "second", driver: new MemoryDriver() });

      expect(registered).toHaveBeenCalledTimes(2);
      expect(registered).toHaveBeenLastCalledWith(second);
      expect(defaultRegistered).toHaveBeenCalledTimes(1);
      expect(defaultRegistered).toHaveBeenCalledWith(first);
    });

    it("should forward driver connection events", async () => {
      const driver = new MemoryDriver();
      const connected = vi.fn();
      const disconnected = vi.fn();

      registry.on("connected", connected);
      registry.on("disconnected", disconnected);

      const dataSource = registry.register({ name: "primary", driver });

      await driver.connect();
      await driver.disconnect();

      expect(connected).toHaveBeenCalledWith(dataSource);
      expect(disconnected).toHaveBeenCalledWith(dataSource);
    });
  });

  describe("get()", () => {
    it("should throw MissingDataSourceError for unknown name", () => {
      expect(() => registry.get("unknown-db")).toThrow(MissingDataSourceError);
      expect(() => registry.get("unknown-db")).toThrow('Data source "unknown-db" is not registered.');
    });

    it("should throw when no default registered", () => {
      expect(() => registry.get()).toThrow("No default data source registered.");
    });
  });

  describe("clear()", () => {
    it("should forget every source and the default", () => {
      registry.register({ name: "primary", driver: new MemoryDriver() });
      registry.clear();

      expect(registry.getAllDataSources()).toEqual([]);
      expect(() => registry.get()).toThrow(MissingDataSourceError);
    });
  });

  describe("getAllDataSources()", () => {
    it("should return all registered sources", () => {
      const first = registry.register({ name: "db1", driver: new MemoryDriver() });
      const second = registry.register({ name: "db2", driver: new MemoryDriver() });

      expect(registry.getAllDataSources()).toEqual([first, second]);
    });
  });

  describe("event listeners", () => {
    it("should support once() for one-time listeners", () => {
      const listener = vi.fn();

      registry.once("registered", listener);
      registry.register({ name: "test1", driver: new MemoryDriver() });
      registry.register({ name: "test2", driver: new MemoryDriver() });

      expect(listener).toHaveBeenCalledTimes(1);
    });

    it("should support off() for removing listeners", () => {
      const listener = vi.fn();

      registry.on("registered", listener);
      registry.off("registered", listener);
      registry.register({ name: "test", driver: new MemoryDriver() });

      expect(listener).not.toHaveBeenCalled();
    });
  });
});
