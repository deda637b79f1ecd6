export type Listener<T> = (value: T) => void;

/**
 * Holds one value and tells every subscriber, synchronously and in
 * subscription order, whenever a different value is set.
 */
export class Notifier<T> {
  private current: T;
  private listeners = new Set<Listener<T>>();

  constructor(initial: T) {
    this.current = initial;
  }

  get value(): T {
    return this.current;
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  set(next: T) {
    if (Object.is(next, this.current)) return;
    this.current = next;
    this.notify();
  }

  subscribe(listener: Listener<T>): () => void {
    // Wrapped so the same function can be subscribed twice and removed once per handle.
    const handle: Listener<T> = (value) => listener(value);
    this.listeners.add(handle);
    return () => {
      this.listeners.delete(handle);
    };
  }

  dispose() {
    this.listeners.clear();
  }

  private notify() {
    const value = this.current;
    for (const listener of [...this.listeners]) {
      // Skip listeners removed by an earlier callback in this round.
      if (!this.listeners.has(listener)) continue;
      try {
        listener(value);
      } catch (error) {
        console.error('Log listener failed:', error);
      }
    }
  }
}
