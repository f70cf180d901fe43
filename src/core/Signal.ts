/**
 * Signal/Observable System
 *
 * Signals are mutable reactive values; computed values derive from signals
 * and recompute when any dependency changes.
 */

type Subscriber<T> = (value: T) => void;

/**
 * Equality check deciding whether a set() is a change
 */
export type Equals<T> = (a: T, b: T) => boolean;

/**
 * Signal interface - a mutable reactive value
 */
export interface Signal<T> {
  /** Get the current value */
  get(): T;
  /** Set a new value (notifies subscribers if changed) */
  set(value: T): void;
  /** Set a value derived from the current one */
  update(fn: (current: T) => T): void;
  /** Subscribe to value changes, returns unsubscribe function */
  subscribe(callback: Subscriber<T>): () => void;
  /** Get the current subscriber count */
  subscriberCount(): number;
}

/**
 * Computed interface - a read-only derived reactive value
 */
export interface Computed<T> {
  /** Get the current computed value */
  get(): T;
  /** Subscribe to value changes, returns unsubscribe function */
  subscribe(callback: Subscriber<T>): () => void;
  /** Get the current subscriber count */
  subscriberCount(): number;
  /** Cleanup subscriptions to dependencies */
  dispose(): void;
}

/**
 * Dependency of a computed value; any signal or computed qualifies
 */
export interface Observable {
  subscribe(callback: () => void): () => void;
}

/**
 * Subscriber bookkeeping shared by signals and computed values
 */
class Subscribers<T> {
  private callbacks = new Set<Subscriber<T>>();

  add(callback: Subscriber<T>): () => void {
    this.callbacks.add(callback);
    return () => {
      this.callbacks.delete(callback);
    };
  }

  get size(): number {
    return this.callbacks.size;
  }

  clear(): void {
    this.callbacks.clear();
  }

  notify(value: T): void {
    // Copy so callbacks may unsubscribe while being notified
    for (const callback of [...this.callbacks]) {
      callback(value);
    }
  }
}

class SignalImpl<T> implements Signal<T> {
  private subscribers = new Subscribers<T>();

  constructor(
    private value: T,
    private equals: Equals<T>
  ) {}

  get(): T {
    return this.value;
  }

  set(newValue: T): void {
    if (!this.equals(this.value, newValue)) {
      this.value = newValue;
      this.subscribers.notify(newValue);
    }
  }

  update(fn: (current: T) => T): void {
    this.set(fn(this.value));
  }

  subscribe(callback: Subscriber<T>): () => void {
    return this.subscribers.add(callback);
  }

  subscriberCount(): number {
    return this.subscribers.size;
  }
}

class ComputedImpl<T> implements Computed<T> {
  private value: T;
  private subscribers = new Subscribers<T>();
  private unsubscribes: (() => void)[] = [];
  private disposed = false;

  constructor(
    private fn: () => T,
    deps: readonly Observable[]
  ) {
    this.value = fn();
    this.unsubscribes = deps.map((dep) => dep.subscribe(() => this.recompute()));
  }

  get(): T {
    return this.value;
  }

  subscribe(callback: Subscriber<T>): () => void {
    if (this.disposed) {
      throw new Error('Cannot subscribe to a disposed computed');
    }
    return this.subscribers.add(callback);
  }

  subscriberCount(): number {
    return this.subscribers.size;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    for (const unsub of this.unsubscribes) {
      unsub();
    }
    this.unsubscribes = [];
    this.subscribers.clear();
  }

  /**
   * Recompute from scratch; dependencies call this on every change
   */
  recompute(): void {
    if (this.disposed) return;

    const newValue = this.fn();
    if (!Object.is(this.value, newValue)) {
      this.value = newValue;
      this.subscribers.notify(newValue);
    }
  }
}

/**
 * Create a new reactive signal with an initial value
 *
 * @param equals - Change detection (default: Object.is)
 *
 * @example
 * ```typescript
 * const page = createSignal(0);
 * page.subscribe(value => console.log('Page:', value));
 * page.update(p => p + 1); // logs: Page: 1
 * ```
 */
export function createSignal<T>(initial: T, equals: Equals<T> = Object.is): Signal<T> {
  return new SignalImpl(initial, equals);
}

/**
 * Create a computed value that updates when any dependency changes
 *
 * @example
 * ```typescript
 * const rows = createSignal(25);
 * const pageSize = createSignal(10);
 * const pages = computed(() => Math.ceil(rows.get() / pageSize.get()), [rows, pageSize]);
 * pages.get(); // 3
 * ```
 */
export function computed<T>(fn: () => T, deps: readonly Observable[]): Computed<T> {
  return new ComputedImpl(fn, deps);
}
