/**
 * Worker console log service
 *
 * Drains a WorkerConsoleLogSource into the `Host.Function.Console` logger
 * for as long as the host runs.
 */

import { HostError, ERROR_CODES, SCRIPT_CONSTANTS, type Disposable } from '@fnhost/kernel';
import { createNullLogger, type Logger, type LoggerFactory } from '@fnhost/logging';
import { WorkerConsoleLogSource, isAbortError } from './console-log-source.js';

export class WorkerConsoleLogService implements Disposable {
  private readonly logger: Logger;
  private readonly source: WorkerConsoleLogSource;
  private readonly controller = new AbortController();
  private processing?: Promise<void>;
  private disposed = false;

  constructor(source: WorkerConsoleLogSource | undefined, loggerFactory?: LoggerFactory | Logger) {
    if (!source) {
      throw new HostError(ERROR_CODES.E_ARGUMENT_REQUIRED, "Argument 'source' is required");
    }
    this.source = source;
    this.logger = resolveLogger(loggerFactory);
  }

  get running(): boolean {
    return this.processing !== undefined && !this.controller.signal.aborted;
  }

  start(): void {
    if (this.disposed) {
      throw new HostError(ERROR_CODES.E_DISPOSED, 'The console log service has been disposed');
    }
    this.processing ??= this.processLogs().catch((err: unknown) => {
      this.logger.error({ err }, 'Worker console log processing failed');
    });
  }

  /**
   * Cancel the drain loop and wait for it to finish. Lines still buffered
   * stay in the source.
   */
  async stop(): Promise<void> {
    this.controller.abort();
    if (this.processing) {
      await this.processing;
    }
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.controller.abort();
  }

  private async processLogs(): Promise<void> {
    const signal = this.controller.signal;
    try {
      for (;;) {
        const log = await this.source.read(signal);
        if (!log) {
          return;
        }
        this.logger[log.level](log.message);
      }
    } catch (err) {
      // cancelled during shutdown
      if (!isAbortError(err)) {
        throw err;
      }
    }
  }
}

function resolveLogger(loggerFactory: LoggerFactory | Logger | undefined): Logger {
  if (!loggerFactory) {
    return createNullLogger();
  }
  return 'createLogger' in loggerFactory
    ? loggerFactory.createLogger(SCRIPT_CONSTANTS.CONSOLE_LOG_CATEGORY)
    : loggerFactory;
}
