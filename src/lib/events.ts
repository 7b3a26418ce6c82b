/**
 * Type-safe event emitter for lifecycle notifications.
 */
export class TypedEventEmitter<T extends Record<string, unknown>> {
  private listeners: { [K in keyof T]?: Set<(data: T[K]) => void> } = {};

  on<K extends keyof T>(event: K, listener: (data: T[K]) => void): () => void {
    const bucket = this.listeners[event] ?? new Set<(data: T[K]) => void>();
    bucket.add(listener);
    this.listeners[event] = bucket;

    return () => {
      this.listeners[event]?.delete(listener);
    };
  }

  emit<K extends keyof T>(event: K, data: T[K]): void {
    const bucket = this.listeners[event];
    if (!bucket) return;

    for (const listener of [...bucket]) {
      listener(data);
    }
  }

  removeAllListeners<K extends keyof T>(event?: K): void {
    if (event) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }
}
