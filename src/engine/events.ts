/**
 * Typed Event Emitter
 *
 * Type-safe event emission and subscription over Node's EventEmitter.
 * Each component declares an event map (event name to payload type);
 * events whose payload is `void` are emitted and received without arguments.
 *
 * @module engine/events
 */

import { EventEmitter } from 'events';

/** Argument tuple for an event payload type */
export type EventArgs<P> = [P] extends [void] ? [] : [payload: P];

/** Listener signature for an event payload type */
export type EventListener<P> = (...args: EventArgs<P>) => void;

/**
 * Event emitter with compile-time checked event names and payloads.
 *
 * @example
 * ```typescript
 * interface Events {
 *   block: { pieceIndex: number };
 *   ready: void;
 * }
 *
 * class Session extends TypedEventEmitter<Events> {}
 *
 * session.on('block', ({ pieceIndex }) => console.log(pieceIndex));
 * session.emit('ready');
 * ```
 */
export class TypedEventEmitter<T extends { [K in keyof T]: unknown }> {
  private readonly emitter = new EventEmitter();

  on<K extends keyof T & string>(event: K, listener: EventListener<T[K]>): this {
    this.emitter.on(event, listener);
    return this;
  }

  /**
   * Emit an event with payload
   *
   * @returns true if event had listeners, false otherwise
   */
  emit<K extends keyof T & string>(event: K, ...args: EventArgs<T[K]>): boolean {
    return this.emitter.emit(event, ...args);
  }
}
