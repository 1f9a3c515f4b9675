import { EventEmitter } from 'events';
import type { Disposable } from '@fnhost/kernel';

export interface ScriptEvent {
  /** Component raising the event, e.g. `host` */
  source: string;
  name: string;
  data?: Record<string, unknown>;
}

export type ScriptEventListener = (event: ScriptEvent) => void;

const EVENT = 'event';

/**
 * In-process publish/subscribe for host events.
 */
export class ScriptEventManager implements Disposable {
  private readonly emitter = new EventEmitter();

  publish(event: ScriptEvent): void {
    this.emitter.emit(EVENT, event);
  }

  /**
   * @param filter - only events it accepts reach the listener
   * @returns unsubscribe
   */
  subscribe(listener: ScriptEventListener, filter?: (event: ScriptEvent) => boolean): () => void {
    const handler = (event: ScriptEvent) => {
      if (!filter || filter(event)) {
        listener(event);
      }
    };
    this.emitter.on(EVENT, handler);
    return () => {
      this.emitter.off(EVENT, handler);
    };
  }

  get listenerCount(): number {
    return this.emitter.listenerCount(EVENT);
  }

  dispose(): void {
    this.emitter.removeAllListeners();
  }
}
