import { EventEmitter } from "node:events";

type Listener = (...args: unknown[]) => void;

/** EventEmitter keyed by an event map of argument tuples. */
export class TypedEventEmitter<T extends { [K in keyof T]: unknown[] }> {
  private readonly emitter = new EventEmitter();

  on<K extends string & keyof T>(event: K, listener: (...args: T[K]) => void): this {
    this.emitter.on(event, listener as Listener);
    return this;
  }

  off<K extends string & keyof T>(event: K, listener: (...args: T[K]) => void): this {
    this.emitter.off(event, listener as Listener);
    return this;
  }

  once<K extends string & keyof T>(event: K, listener: (...args: T[K]) => void): this {
    this.emitter.once(event, listener as Listener);
    return this;
  }

  emit<K extends string & keyof T>(event: K, ...args: T[K]): boolean {
    return this.emitter.emit(event, ...args);
  }

  removeAllListeners<K extends string & keyof T>(event?: K): this {
    this.emitter.removeAllListeners(event);
    return this;
  }

  listenerCount<K extends string & keyof T>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
