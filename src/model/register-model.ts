import type { Model, ModelClass } from "./model";

/**
 * Global model registry that maps model names to their classes.
 *
 * Relations reference their target by name, and polymorphic relations store
 * the target's registered name next to the foreign key, so every model that
 * can be a relation target must be registered.
 */
const modelsRegistry = new Map<string, ModelClass<Model>>();

/**
 * Reverse lookup, class → registered name.
 */
const modelNames = new WeakMap<object, string>();

/**
 * Register a model class under its class name, or under the given name.
 *
 * @example
 * ```typescript
 * registerModelInRegistry(Car);
 * registerModelInRegistry(Car, "Vehicle");
 * ```
 */
export function registerModelInRegistry(model: ModelClass<Model>, name?: string): string {
  const modelName = name || model.name;

  if (!modelName) {
    throw new Error("Unable to determine model name. Please provide a name when registering it.");
  }

  modelsRegistry.set(modelName, model);
  modelNames.set(model, modelName);

  return modelName;
}

/**
 * Get a model class by its name from the global registry.
 */
export function getModelFromRegistry(name: string): ModelClass<Model> | undefined {
  return modelsRegistry.get(name);
}

/**
 * Name a model class was registered under.
 */
export function getRegisteredModelName(model: object): string | undefined {
  return modelNames.get(model);
}

export function getAllModelsFromRegistry() {
  return new Map(modelsRegistry);
}

export function removeModelFromRegistry(name: string) {
  const model = modelsRegistry.get(name);

  if (model) {
    modelNames.delete(model);
  }

  modelsRegistry.delete(name);
}

/**
 * Resolve a model class given either the class itself or its registered name.
 */
export function resolveModelClass(model: ModelClass<Model> | string): ModelClass<Model> {
  if (typeof model !== "string") {
    return model;
  }

  const modelClass = getModelFromRegistry(model);

  if (!modelClass) {
    throw new Error(`Model "${model}" is not registered.`);
  }

  return modelClass;
}
