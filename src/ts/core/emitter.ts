/**
 * Typed event channel used by every producer in the engine
 */

import { EventEmitter } from 'events';
import { errorMessage } from './errors';
import type { LogSink } from './types';

export type EventMap = Record<string, unknown[]>;

export class TypedEmitter<Events extends EventMap> {
  private readonly emitter = new EventEmitter();

  constructor(private readonly logger: LogSink) {}

  /**
   * Subscribe; returns the unsubscribe function
   */
  on<K extends keyof Events & string>(event: K, listener: (...args: Events[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  listenerCount<K extends keyof Events & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }

  /**
   * A throwing listener is logged and does not reach the producer
   */
  emit<K extends keyof Events & string>(event: K, ...args: Events[K]): void {
    for (const listener of this.emitter.listeners(event)) {
      try {
        listener(...args);
      } catch (error) {
        this.logger.error({ event, err: errorMessage(error) }, 'event listener failed');
      }
    }
  }
}
