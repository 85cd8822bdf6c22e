// Configuration
export * from "./config";
export * from "./types";

// Contracts
export * from "./contracts";

// Data Source
export * from "./data-source/data-source";
export * from "./data-source/data-source-registry";

// Errors
export * from "./errors";

// Core Services
export * from "./events/model-events";
export * from "./model/dirty-tracker";
export * from "./model/model";
export * from "./model/register-model";
export * from "./remover/database-remover";
export * from "./schema/column-family";
export * from "./serialization/json-coder";
export * from "./validation/model-validator";
export * from "./writer/database-writer";

// Relations
export * from "./relations";

// Drivers
export * from "./drivers/memory/memory-driver";
export * from "./drivers/memory/memory-id-generator";
export * from "./drivers/mongo/mongo-id-generator";
export * from "./drivers/mongo/mongodb-driver";

// Re-export MongoDB client types for convenience
export type { MongoClientOptions } from "mongodb";
