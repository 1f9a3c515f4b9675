/**
 * Buffered queue of worker console output.
 *
 * Worker processes push lines as they arrive; a single reader drains them
 * in order. Reads wait until a line is available, the source is completed,
 * or the reader's signal aborts.
 */

import { HostError, ERROR_CODES } from '@fnhost/kernel';
import type { ConsoleLog } from './types.js';

type PendingRead = (log: ConsoleLog | undefined) => void;

export class WorkerConsoleLogSource {
  private readonly buffer: ConsoleLog[] = [];
  private readonly readers: PendingRead[] = [];
  private completed = false;

  /**
   * Queue a line. Lines logged after `complete()` are dropped.
   */
  log(entry: ConsoleLog): void {
    if (this.completed) {
      return;
    }
    const reader = this.readers.shift();
    if (reader) {
      reader(entry);
      return;
    }
    this.buffer.push(entry);
  }

  /**
   * No more lines will be queued; waiting readers receive `undefined` once
   * the buffer is empty.
   */
  complete(): void {
    this.completed = true;
    for (const reader of this.readers.splice(0)) {
      reader(undefined);
    }
  }

  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Next line, or `undefined` when the source is completed and drained.
   *
   * @throws HostError E_DISPOSED (name `AbortError`) when `signal` aborts first
   */
  read(signal?: AbortSignal): Promise<ConsoleLog | undefined> {
    if (signal?.aborted) {
      return Promise.reject(abortError());
    }

    const next = this.buffer.shift();
    if (next || this.completed) {
      return Promise.resolve(next);
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        const index = this.readers.indexOf(reader);
        if (index !== -1) {
          this.readers.splice(index, 1);
        }
        reject(abortError());
      };
      const reader: PendingRead = (log) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(log);
      };
      this.readers.push(reader);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

function abortError(): HostError {
  const error = new HostError(ERROR_CODES.E_DISPOSED, 'Console log read was cancelled');
  error.name = 'AbortError';
  return error;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
