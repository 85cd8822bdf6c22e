export * from "./column-family.error";
export * from "./database-writer-validation.error";
export * from "./missing-data-source.error";
export * from "./record-not-found.error";
export * from "./relation-already-defined.error";
export * from "./relation-type-mismatch.error";
export * from "./unsupported-finder-option.error";
