import EventEmitter from 'eventemitter3';
import type { PipelineEvents } from '../agents/types';

/**
 * Type-safe event handler
 */
type EventHandler<T> = (data: T) => void | Promise<void>;

/**
 * Type-safe event bus for turn lifecycle notifications
 *
 * The runner publishes every execution event here as it is produced, so
 * front ends can render progress without consuming the event stream.
 */
export class EventBus {
  private emitter: EventEmitter;
  private debug: boolean;

  constructor(options: { debug?: boolean } = {}) {
    this.emitter = new EventEmitter();
    this.debug = options.debug ?? false;
  }

  /**
   * Subscribe to an event; returns the matching unsubscribe function
   */
  on<K extends keyof PipelineEvents>(event: K, handler: EventHandler<PipelineEvents[K]>): () => void {
    this.emitter.on(event, handler);
    return () => this.off(event, handler);
  }

  off<K extends keyof PipelineEvents>(event: K, handler: EventHandler<PipelineEvents[K]>): void {
    this.emitter.off(event, handler);
  }

  emit<K extends keyof PipelineEvents>(event: K, data: PipelineEvents[K]): void {
    if (this.debug) {
      // eslint-disable-next-line no-console
      console.error(`[EventBus] ${event}:`, JSON.stringify(data, null, 2));
    }
    this.emitter.emit(event, data);
  }
}
