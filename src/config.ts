import type { DatabaseConfigurations, DebugLevel } from "./types";

let configurations: DatabaseConfigurations = {};

export const DEFAULT_BATCH_SIZE = 1000;

export function setDatabaseConfigurations(databaseConfigurations: DatabaseConfigurations) {
  configurations = {
    ...configurations,
    ...databaseConfigurations,
  };
}

export function getDatabaseConfig<Key extends keyof DatabaseConfigurations>(
  key: Key,
): DatabaseConfigurations[Key] {
  return configurations[key];
}

export function resetDatabaseConfigurations() {
  configurations = {};
}

export function getDatabaseDebugLevel(): DebugLevel {
  return configurations.debugLevel || "warn";
}

/**
 * Whether a message of the given level should be logged under the current debug level.
 */
export function shouldLog(level: DebugLevel): boolean {
  const order: DebugLevel[] = ["error", "warn", "info"];

  return order.indexOf(level) <= order.indexOf(getDatabaseDebugLevel());
}

export function getRelationsBatchSize(): number {
  return configurations.relations?.batchSize || DEFAULT_BATCH_SIZE;
}
