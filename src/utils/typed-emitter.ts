import { EventEmitter } from "node:events";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Listener = (...args: any[]) => void;

export class TypedEventEmitter<T extends { [K in keyof T]: Listener }> {
  private readonly emitter = new EventEmitter();

  on<K extends string & keyof T>(event: K, listener: T[K]): this {
    this.emitter.on(event, listener as Listener);
    return this;
  }

  off<K extends string & keyof T>(event: K, listener: T[K]): this {
    this.emitter.off(event, listener as Listener);
    return this;
  }

  protected emit<K extends string & keyof T>(event: K, ...args: Parameters<T[K]>): boolean {
    return this.emitter.emit(event, ...args);
  }
}
