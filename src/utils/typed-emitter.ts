import { EventEmitter } from "node:events";

type Listener<A extends unknown[]> = (...args: A) => void;

/**
 * Event emitter keyed by an event map of argument tuples. A throwing listener is
 * reported through `onListenerError` and never interrupts the emitter's caller.
 */
export class TypedEventEmitter<T extends { [K in keyof T]: unknown[] }> {
  private readonly emitter = new EventEmitter();
  private readonly wrapped = new Map<object, Listener<unknown[]>>();
  private readonly onListenerError: (err: unknown, event: string) => void;

  constructor(onListenerError?: (err: unknown, event: string) => void) {
    this.onListenerError = onListenerError ?? (() => {});
  }

  on<K extends string & keyof T>(event: K, listener: Listener<T[K]>): this {
    this.emitter.on(event, this.wrap(event, listener));
    return this;
  }

  once<K extends string & keyof T>(event: K, listener: Listener<T[K]>): this {
    const wrapped = this.wrap(event, listener);
    const fireOnce = (...args: unknown[]): void => {
      this.emitter.off(event, fireOnce);
      this.wrapped.delete(listener);
      wrapped(...args);
    };
    this.wrapped.set(listener, fireOnce);
    this.emitter.on(event, fireOnce);
    return this;
  }

  off<K extends string & keyof T>(event: K, listener: Listener<T[K]>): this {
    const wrapped = this.wrapped.get(listener);
    if (wrapped) {
      this.emitter.off(event, wrapped);
      this.wrapped.delete(listener);
    }
    return this;
  }

  emit<K extends string & keyof T>(event: K, ...args: T[K]): boolean {
    return this.emitter.emit(event, ...args);
  }

  listenerCount<K extends string & keyof T>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners<K extends string & keyof T>(event?: K): this {
    this.emitter.removeAllListeners(event);
    if (event === undefined) this.wrapped.clear();
    return this;
  }

  private wrap<A extends unknown[]>(event: string, listener: Listener<A>): Listener<unknown[]> {
    const wrapped = (...args: unknown[]): void => {
      try {
        listener(...(args as A));
      } catch (err) {
        this.onListenerError(err, event);
      }
    };
    this.wrapped.set(listener, wrapped);
    return wrapped;
  }
}
