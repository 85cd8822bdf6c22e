export * from "./coder.contract";
export * from "./database-driver.contract";
export * from "./database-id-generator.contract";
export * from "./database-remover.contract";
export * from "./database-writer.contract";
