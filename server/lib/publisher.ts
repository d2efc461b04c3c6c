export type Listener<T> = (value: T) => void;

/**
 * Fan-out of a value to subscribers. A throwing listener is logged and does
 * not stop delivery to the others.
 */
export class Publisher<T> {
  private readonly listeners = new Set<Listener<T>>();

  constructor(private readonly tag: string) {}

  subscribe(listener: Listener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(value: T): void {
    for (const listener of this.listeners) {
      try {
        listener(value);
      } catch (error: unknown) {
        console.error(`❌ [${this.tag}] Subscriber failed:`, error instanceof Error ? error.message : error);
      }
    }
  }
}
