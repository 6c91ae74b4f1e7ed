import { createLogger } from './logger';

const emitterLogger = createLogger('txgen:utils:events');

/**
 * Map of event name to the tuple of arguments its listeners receive
 */
export type EventArgsMap<Events> = { [K in keyof Events]: unknown[] };

export type Listener<Args extends unknown[]> = (...args: Args) => void;

/**
 * Typed event emitter shared by the engine packages.
 *
 * Listener exceptions are logged and swallowed so that a faulty subscriber can
 * never interrupt the single writer that emits.
 *
 * @example
 * ```typescript
 * interface Events {
 *   'daa-score': [score: bigint];
 * }
 * const emitter = new TypedEventEmitter<Events>();
 * emitter.on('daa-score', (score) => console.log(score));
 * ```
 */
export class TypedEventEmitter<Events extends EventArgsMap<Events>> {
  private listeners: { [K in keyof Events]?: Listener<Events[K]>[] } = {};

  on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): this {
    const list = this.listeners[event] ?? [];
    list.push(listener);
    this.listeners[event] = list;
    return this;
  }

  /**
   * Register a listener that is removed after its first call
   */
  once<K extends keyof Events>(event: K, listener: Listener<Events[K]>): this {
    const wrapper: Listener<Events[K]> = (...args) => {
      this.off(event, wrapper);
      listener(...args);
    };
    return this.on(event, wrapper);
  }

  off<K extends keyof Events>(event: K, listener: Listener<Events[K]>): this {
    const list = this.listeners[event];
    if (list) {
      const index = list.indexOf(listener);
      if (index > -1) {
        list.splice(index, 1);
      }
    }
    return this;
  }

  /**
   * @returns True if the event had listeners
   */
  emit<K extends keyof Events>(event: K, ...args: Events[K]): boolean {
    const list = this.listeners[event];
    if (!list || list.length === 0) return false;

    for (const listener of [...list]) {
      try {
        listener(...args);
      } catch (error) {
        emitterLogger.error(
          `Error in event listener for ${String(event)}`,
          error instanceof Error ? error : { error: String(error) }
        );
      }
    }
    return true;
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.listeners[event]?.length ?? 0;
  }

  removeAllListeners<K extends keyof Events>(event?: K): this {
    if (event === undefined) {
      this.listeners = {};
    } else {
      delete this.listeners[event];
    }
    return this;
  }
}
