import type { Unsubscribe } from '../types';

export type Listener<Args extends unknown[]> = (...args: Args) => void;

/** Registration list for the item-level hooks of container cells. */
export class ListenerSet<Args extends unknown[]> {
  readonly #listeners = new Set<Listener<Args>>();

  get size(): number {
    return this.#listeners.size;
  }

  add(listener: Listener<Args>): Unsubscribe {
    this.#listeners.add(listener);

    return () => {
      this.#listeners.delete(listener);
    };
  }

  snapshot(): Listener<Args>[] {
    return Array.from(this.#listeners);
  }

  clear(): void {
    this.#listeners.clear();
  }
}
