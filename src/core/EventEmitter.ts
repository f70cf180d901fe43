/**
 * Type-safe event emitter
 */

export type Listener<T> = (data: T) => void;

export class EventEmitter<Events extends object> {
  private listeners: { [K in keyof Events]?: Set<Listener<Events[K]>> } = {};

  private listenersFor<K extends keyof Events>(event: K): Set<Listener<Events[K]>> | undefined {
    return this.listeners[event];
  }

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    let set = this.listenersFor(event);
    if (!set) {
      set = new Set<Listener<Events[K]>>();
      this.listeners[event] = set;
    }
    set.add(listener);
    return () => this.off(event, listener);
  }

  /**
   * Unsubscribe from an event
   */
  off<K extends keyof Events>(event: K, listener: Listener<Events[K]>): void {
    const set = this.listenersFor(event);
    if (!set) return;
    set.delete(listener);
    if (set.size === 0) {
      delete this.listeners[event];
    }
  }

  /**
   * Subscribe to the next occurrence of an event only
   * @returns Unsubscribe function
   */
  once<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    const wrapper: Listener<Events[K]> = (data) => {
      this.off(event, wrapper);
      listener(data);
    };
    return this.on(event, wrapper);
  }

  /**
   * Call every listener of an event with `data`
   */
  emit<K extends keyof Events>(event: K, data: Events[K]): void {
    const set = this.listenersFor(event);
    if (!set) return;
    for (const listener of [...set]) {
      listener(data);
    }
  }

  /**
   * Remove all listeners for an event, or all listeners if no event specified
   */
  removeAllListeners(event?: keyof Events): void {
    if (event === undefined) {
      this.listeners = {};
    } else {
      delete this.listeners[event];
    }
  }

  listenerCount(event: keyof Events): number {
    return this.listenersFor(event)?.size ?? 0;
  }
}
