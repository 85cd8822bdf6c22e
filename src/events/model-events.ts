import type { Model } from "../model/model";

export type OnSavingEventContext = {
  isInsert: boolean;
  mode: "insert" | "update";
};

export type OnValidatingEventContext = OnSavingEventContext;

export type OnDeletingEventContext = {
  primaryKeyValue: string;
  primaryKey: string;
  embedded: boolean;
};

export type OnDeletedEventContext = OnDeletingEventContext & {
  deletedCount: number;
};

/**
 * Lifecycle events understood by models.
 */
export type ModelEventName =
  | "validating"
  | "validated"
  | "saving"
  | "saved"
  | "creating"
  | "created"
  | "updating"
  | "updated"
  | "deleting"
  | "deleted";

/** Signature of an event listener registered against a model lifecycle hook. */
export type ModelEventListener<TModel, TContext = unknown> = (
  model: TModel,
  context: TContext,
) => void | Promise<void>;

/**
 * Light-weight async event emitter used to power model lifecycle hooks.
 *
 * Listeners run sequentially and are awaited, so a listener may enrich the
 * record before the writer persists it.
 */
export class ModelEvents<TModel> {
  public readonly listeners = new Map<ModelEventName, Set<ModelEventListener<TModel>>>();

  /**
   * Register a listener for the given event.
   * Returns an unsubscribe function for convenience.
   */
  public on<TContext = unknown>(
    event: ModelEventName,
    listener: ModelEventListener<TModel, TContext>,
  ): () => void {
    const listeners = this.ensureListenerSet(event);
    listeners.add(listener as ModelEventListener<TModel>);
    return () => this.off(event, listener);
  }

  /**
   * Register a listener that automatically unsubscribes after the first call.
   */
  public once<TContext = unknown>(
    event: ModelEventName,
    listener: ModelEventListener<TModel, TContext>,
  ): () => void {
    const wrapper: ModelEventListener<TModel, TContext> = async (model, context) => {
      try {
        await listener(model, context);
      } finally {
        this.off(event, wrapper);
      }
    };
    return this.on(event, wrapper);
  }

  /**
   * Deregister a listener for the given event.
   */
  public off<TContext = unknown>(
    event: ModelEventName,
    listener: ModelEventListener<TModel, TContext>,
  ): void {
    const listeners = this.listeners.get(event);
    if (!listeners) {
      return;
    }
    listeners.delete(listener as ModelEventListener<TModel>);
    if (listeners.size === 0) {
      this.listeners.delete(event);
    }
  }

  /**
   * Emit an event to all registered listeners.
   */
  public async emit<TContext = unknown>(
    event: ModelEventName,
    model: TModel,
    context: TContext,
  ): Promise<void> {
    const listeners = this.listeners.get(event);
    if (!listeners || listeners.size === 0) {
      return;
    }
    for (const listener of Array.from(listeners)) {
      await listener(model, context);
    }
  }

  /**
   * Remove all registered listeners.
   */
  public clear(): void {
    this.listeners.clear();
  }

  /**
   * Fired before a model is persisted (both insert and update), and before validation.
   */
  public onSaving<TContext = OnSavingEventContext>(
    listener: ModelEventListener<TModel, TContext>,
  ): () => void {
    return this.on("saving", listener);
  }

  public onSaved<TContext = unknown>(listener: ModelEventListener<TModel, TContext>) {
    return this.on("saved", listener);
  }

  public onCreating<TContext = unknown>(
    listener: ModelEventListener<TModel, TContext>,
  ): () => void {
    return this.on("creating", listener);
  }

  public onCreated<TContext = unknown>(listener: ModelEventListener<TModel, TContext>): () => void {
    return this.on("created", listener);
  }

  public onUpdating<TContext = unknown>(
    listener: ModelEventListener<TModel, TContext>,
  ): () => void {
    return this.on("updating", listener);
  }

  public onUpdated<TContext = unknown>(listener: ModelEventListener<TModel, TContext>): () => void {
    return this.on("updated", listener);
  }

  /**
   * Fired before a model is deleted, or detached from its owner when embedded.
   */
  public onDeleting<TContext = OnDeletingEventContext>(
    listener: ModelEventListener<TModel, TContext>,
  ): () => void {
    return this.on("deleting", listener);
  }

  public onDeleted<TContext = OnDeletedEventContext>(
    listener: ModelEventListener<TModel, TContext>,
  ): () => void {
    return this.on("deleted", listener);
  }

  public onValidating<TContext = OnValidatingEventContext>(
    listener: ModelEventListener<TModel, TContext>,
  ): () => void {
    return this.on("validating", listener);
  }

  public onValidated<TContext = unknown>(
    listener: ModelEventListener<TModel, TContext>,
  ): () => void {
    return this.on("validated", listener);
  }

  private ensureListenerSet(event: ModelEventName): Set<ModelEventListener<TModel>> {
    let listeners = this.listeners.get(event);
    if (!listeners) {
      listeners = new Set();
      this.listeners.set(event, listeners);
    }
    return listeners;
  }
}

/**
 * Global event emitter invoked for every model instance, regardless of type.
 */
export const globalModelEvents = new ModelEvents<Model>();
