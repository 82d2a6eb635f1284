import type { EventPayloadMap, EventType } from "./types.js";

type EventHandler<T extends EventType> = (payload: EventPayloadMap[T]) => void | Promise<void>;
type ErrorHandler = (error: unknown) => void;
type HandlerTable = { [K in EventType]?: Array<EventHandler<K>> };

const isPromise = (value: unknown): value is Promise<void> =>
  typeof value === "object" && value !== null && "then" in value;

/**
 * Synchronous fan-out of run events. Async handlers are tracked so that
 * `flush()` can wait for them before the run directory is finalized.
 */
export class EventBus {
  private handlers: HandlerTable = {};
  private pending = new Set<Promise<void>>();
  private asyncErrors: unknown[] = [];

  private trackPending(result: Promise<void>, onError?: ErrorHandler): void {
    const wrapped = result
      .catch((error: unknown) => {
        if (onError) {
          onError(error);
          return;
        }
        this.asyncErrors.push(error);
      })
      .finally(() => {
        this.pending.delete(wrapped);
      });
    this.pending.add(wrapped);
  }

  private listenersFor<T extends EventType>(type: T): Array<EventHandler<T>> {
    const existing = this.handlers[type];
    if (existing) {
      return existing;
    }
    const created: NonNullable<HandlerTable[T]> = [];
    this.handlers[type] = created;
    return created;
  }

  private register<T extends EventType>(type: T, handler: EventHandler<T>): () => void {
    this.listenersFor(type).push(handler);
    return (): void => {
      const handlers = this.handlers[type];
      if (!handlers) {
        return;
      }
      const index = handlers.indexOf(handler);
      if (index >= 0) {
        handlers.splice(index, 1);
      }
    };
  }

  /** Async rejections surface from `flush()`; synchronous throws reach `emit()`. */
  subscribe<T extends EventType>(type: T, handler: EventHandler<T>): () => void {
    return this.register(type, (payload) => {
      const result = handler(payload);
      if (isPromise(result)) {
        this.trackPending(result);
      }
    });
  }

  /** Like `subscribe`, but every handler failure goes to `onError` (or is dropped). */
  subscribeSafe<T extends EventType>(
    type: T,
    handler: EventHandler<T>,
    onError?: ErrorHandler
  ): () => void {
    return this.register(type, (payload) => {
      try {
        const result = handler(payload);
        if (isPromise(result)) {
          this.trackPending(result, onError ?? (() => undefined));
        }
      } catch (error) {
        onError?.(error);
      }
    });
  }

  emit<T extends EventType>(event: { type: T; payload: EventPayloadMap[T] }): void {
    const handlers = this.handlers[event.type];
    if (!handlers || handlers.length === 0) {
      return;
    }
    handlers.slice().forEach((handler) => {
      void handler(event.payload);
    });
  }

  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled(Array.from(this.pending));
    }
    if (this.asyncErrors.length > 0) {
      const errors = this.asyncErrors.splice(0);
      throw new AggregateError(errors, "EventBus async handlers failed");
    }
  }
}
