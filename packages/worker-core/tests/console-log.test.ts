/**
 * @fnhost/worker-core - console log source and service tests
 */

import { describe, it, expect } from 'vitest';
import { LoggingBuilder, type LogEntry } from '@fnhost/logging';
import { WorkerConsoleLogService, WorkerConsoleLogSource, isAbortError, type ConsoleLog } from '../src/index.js';

function collectingFactory() {
  const entries: LogEntry[] = [];
  const factory = new LoggingBuilder()
    .setDestination({ write: () => undefined })
    .setMinimumLevel('trace')
    .addSink({ name: 'collect', emit: (entry) => entries.push(entry) })
    .build();
  return { entries, factory };
}

function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('WorkerConsoleLogSource', () => {
  it('returns buffered lines in order', async () => {
    const source = new WorkerConsoleLogSource();
    source.log({ level: 'info', message: 'one' });
    source.log({ level: 'warn', message: 'two' });

    expect(source.pending).toBe(2);
    expect(await source.read()).toEqual({ level: 'info', message: 'one' });
    expect(await source.read()).toEqual({ level: 'warn', message: 'two' });
  });

  it('hands a line straight to a waiting reader', async () => {
    const source = new WorkerConsoleLogSource();
    const read = source.read();

    source.log({ level: 'info', message: 'late' });

    expect(await read).toEqual({ level: 'info', message: 'late' });
    expect(source.pending).toBe(0);
  });

  it('ends reads once completed and drained', async () => {
    const source = new WorkerConsoleLogSource();
    source.log({ level: 'info', message: 'last' });

    source.complete();
    source.log({ level: 'info', message: 'dropped' });

    expect(await source.read()).toEqual({ level: 'info', message: 'last' });
    expect(await source.read()).toBeUndefined();
  });

  it('resolves waiting readers when completed', async () => {
    const source = new WorkerConsoleLogSource();
    const read = source.read();

    source.complete();

    expect(await read).toBeUndefined();
  });

  it('rejects a waiting read when its signal aborts', async () => {
    const source = new WorkerConsoleLogSource();
    const controller = new AbortController();
    const read = source.read(controller.signal);

    controller.abort();

    const error = await read.catch((err: unknown) => err);
    expect(isAbortError(error)).toBe(true);

    source.log({ level: 'info', message: 'kept' });
    expect(source.pending).toBe(1);
  });

  it('rejects immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(new WorkerConsoleLogSource().read(controller.signal)).rejects.toMatchObject({ name: 'AbortError' });
  });
});

describe('WorkerConsoleLogService', () => {
  it('requires a source', () => {
    expect(() => new WorkerConsoleLogService(undefined)).toThrow("Argument 'source' is required");
  });

  it('logs console lines under the console category at their level', async () => {
    const { entries, factory } = collectingFactory();
    const source = new WorkerConsoleLogSource();
    const service = new WorkerConsoleLogService(source, factory);

    service.start();
    source.log({ level: 'info', message: 'worker started' });
    source.log({ level: 'error', message: 'worker failed' });
    await settle();
    await service.stop();

    expect(entries.map((e) => [e.category, e.level, e.message])).toEqual([
      ['Host.Function.Console', 'info', 'worker started'],
      ['Host.Function.Console', 'error', 'worker failed'],
    ]);
  });

  it('stops without error while waiting for lines', async () => {
    const { entries, factory } = collectingFactory();
    const source = new WorkerConsoleLogSource();
    const service = new WorkerConsoleLogService(source, factory);
    service.start();

    expect(service.running).toBe(true);
    await service.stop();

    expect(service.running).toBe(false);
    source.log({ level: 'info', message: 'after stop' });
    await settle();
    expect(entries).toHaveLength(0);
    expect(source.pending).toBe(1);
  });

  it('finishes when the source completes', async () => {
    const { entries, factory } = collectingFactory();
    const source = new WorkerConsoleLogSource();
    const service = new WorkerConsoleLogService(source, factory);
    source.log({ level: 'debug', message: 'final' });
    source.complete();

    service.start();
    await settle();
    await service.stop();

    expect(entries.map((e) => e.message)).toEqual(['final']);
  });

  it('logs a failing source instead of rejecting', async () => {
    class FailingSource extends WorkerConsoleLogSource {
      override read(): Promise<ConsoleLog | undefined> {
        return Promise.reject(new Error('channel closed'));
      }
    }
    const { entries, factory } = collectingFactory();
    const service = new WorkerConsoleLogService(new FailingSource(), factory);

    service.start();
    await settle();
    await service.stop();

    expect(entries.map((e) => [e.level, e.message, e.error?.message])).toEqual([
      ['error', 'Worker console log processing failed', 'channel closed'],
    ]);
  });

  it('tolerates stop before start and repeated dispose', async () => {
    const service = new WorkerConsoleLogService(new WorkerConsoleLogSource());

    await service.stop();
    service.dispose();
    service.dispose();

    expect(() => service.start()).toThrow('The console log service has been disposed');
  });
});
