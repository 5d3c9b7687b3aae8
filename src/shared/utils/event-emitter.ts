type Callback<T> = (payload: T) => void;

/**
 * Type-safe event emitter shared by the simulation and its worker API.
 *
 * Listeners run synchronously in registration order. A listener that throws
 * is logged and does not stop the others.
 */
export default class EventEmitter<TEvents extends object> {
  private listeners = new Map<keyof TEvents, Set<Callback<never>>>();

  on<K extends keyof TEvents>(
    event: K,
    callback: Callback<TEvents[K]>,
  ): () => void {
    let callbacks = this.listeners.get(event);
    if (!callbacks) {
      callbacks = new Set();
      this.listeners.set(event, callbacks);
    }
    callbacks.add(callback);

    // Return unsubscribe function
    return () => this.off(event, callback);
  }

  off<K extends keyof TEvents>(
    event: K,
    callback?: Callback<TEvents[K]>,
  ): void {
    if (!callback) {
      this.listeners.delete(event);
    } else {
      this.listeners.get(event)?.delete(callback);
    }
  }

  listenerCount<K extends keyof TEvents>(event: K): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  protected emit<K extends keyof TEvents>(event: K, payload: TEvents[K]): void {
    const callbacks = this.listeners.get(event);
    if (!callbacks) return;

    for (const callback of [...callbacks]) {
      try {
        (callback as Callback<TEvents[K]>)(payload);
      } catch (error) {
        console.error(
          `[EventEmitter.emit] Listener for "${String(event)}" threw:`,
          error,
        );
      }
    }
  }

  dispose(): void {
    this.listeners.clear();
  }
}
