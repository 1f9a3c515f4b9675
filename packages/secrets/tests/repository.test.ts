import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createNullLogger } from '@fnhost/logging';
import {
  FileSystemSecretsRepository,
  InMemorySecretsRepository,
  Semaphore,
  snapshotTimestamp,
  type SecretsChangedEvent,
} from '../src/index.js';

describe('snapshotTimestamp', () => {
  it('formats UTC time to the millisecond', () => {
    expect(snapshotTimestamp(new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6)))).toBe('20240102030405006');
  });
});

describe('InMemorySecretsRepository', () => {
  it('stores secrets by type and lowercased scope', async () => {
    const repository = new InMemorySecretsRepository();

    await repository.write('function', 'Orders', '{"keys":[]}');

    expect(await repository.read('function', 'orders')).toBe('{"keys":[]}');
    expect(await repository.read('host')).toBeUndefined();
  });

  it('reports writes but not snapshots', async () => {
    const repository = new InMemorySecretsRepository();
    const events: SecretsChangedEvent[] = [];
    const unsubscribe = repository.onSecretsChanged((event) => events.push(event));

    await repository.write('host', undefined, '{}');
    await repository.write('function', 'orders', '{}');
    await repository.writeSnapshot('host', undefined, '{}');
    unsubscribe();
    await repository.write('host', undefined, '{}');

    expect(events).toEqual([{ type: 'host' }, { type: 'function', name: 'orders' }]);
  });

  it('keeps snapshots per scope', async () => {
    const repository = new InMemorySecretsRepository();

    await repository.writeSnapshot('host', undefined, 'first');
    await repository.writeSnapshot('host', undefined, 'second');
    await repository.writeSnapshot('function', 'orders', 'function');

    const snapshots = await repository.getSecretSnapshots('host');
    expect(snapshots).toHaveLength(2);
    expect(await repository.readSnapshot(snapshots[0])).toBe('first');
    expect(await repository.getSecretSnapshots('function', 'orders')).toHaveLength(1);
    expect(await repository.getSecretSnapshots('function', 'billing')).toEqual([]);
  });

  it('purges secrets of removed functions', async () => {
    const repository = new InMemorySecretsRepository();
    await repository.write('host', undefined, 'host');
    await repository.write('function', 'orders', 'orders');
    await repository.write('function', 'removed', 'removed');

    await repository.purgeOldSecrets(['Orders'], createNullLogger());

    expect(await repository.read('host')).toBe('host');
    expect(await repository.read('function', 'orders')).toBe('orders');
    expect(await repository.read('function', 'removed')).toBeUndefined();
  });
});

describe('FileSystemSecretsRepository', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'fnhost-secrets-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('writes host.json and <function>.json', async () => {
    const repository = new FileSystemSecretsRepository(path.join(directory, 'secrets'));

    await repository.write('host', undefined, 'host');
    await repository.write('function', 'Orders', 'orders');

    expect((await fs.readdir(path.join(directory, 'secrets'))).sort()).toEqual(['host.json', 'orders.json']);
    expect(await repository.read('function', 'orders')).toBe('orders');
    expect(await repository.read('function', 'missing')).toBeUndefined();
  });

  it('lists snapshots of one scope', async () => {
    const repository = new FileSystemSecretsRepository(directory);
    await repository.write('host', undefined, 'host');
    await repository.writeSnapshot('host', undefined, 'backup');
    await repository.writeSnapshot('function', 'orders', 'orders backup');

    const snapshots = await repository.getSecretSnapshots('host');

    expect(snapshots).toHaveLength(1);
    expect(snapshots[0]).toMatch(/^host\.\d{17}\.snapshot$/);
    expect(await repository.readSnapshot(snapshots[0])).toBe('backup');
  });

  it('returns no snapshots for a missing directory', async () => {
    const repository = new FileSystemSecretsRepository(path.join(directory, 'missing'));

    expect(await repository.getSecretSnapshots('host')).toEqual([]);
  });

  it('purges function secrets but keeps host secrets and snapshots', async () => {
    const repository = new FileSystemSecretsRepository(directory);
    await repository.write('host', undefined, 'host');
    await repository.write('function', 'orders', 'orders');
    await repository.write('function', 'removed', 'removed');
    await repository.writeSnapshot('function', 'removed', 'backup');

    await repository.purgeOldSecrets(['orders'], createNullLogger());

    const files = await fs.readdir(directory);
    expect(files).toContain('host.json');
    expect(files).toContain('orders.json');
    expect(files).not.toContain('removed.json');
    expect(files.filter((file) => file.endsWith('.snapshot.json'))).toHaveLength(1);
  });

  it('reports its own writes', async () => {
    const repository = new FileSystemSecretsRepository(directory);
    const events: SecretsChangedEvent[] = [];
    repository.onSecretsChanged((event) => events.push(event));

    await repository.write('function', 'orders', 'orders');
    await repository.dispose();

    expect(events).toEqual([{ type: 'function', name: 'orders' }]);
  });

  it('reports secrets files changed by other processes when watching', async () => {
    const repository = new FileSystemSecretsRepository(directory, { watch: true });
    const events: SecretsChangedEvent[] = [];
    repository.onSecretsChanged((event) => events.push(event));

    try {
      await vi.waitFor(
        async () => {
          await fs.writeFile(path.join(directory, 'Orders.json'), '{"keys":[]}', 'utf8');
          await fs.writeFile(path.join(directory, 'host.json'), '{}', 'utf8');
          expect(events).toContainEqual({ type: 'function', name: 'orders' });
          expect(events).toContainEqual({ type: 'host' });
        },
        { timeout: 5000, interval: 100 }
      );
      await fs.writeFile(path.join(directory, 'host.20240102030405006.snapshot.json'), '{}', 'utf8');
      await fs.writeFile(path.join(directory, 'notes.txt'), 'x', 'utf8');
      await new Promise((resolve) => setTimeout(resolve, 300));
    } finally {
      await repository.dispose();
    }

    expect(new Set(events.map((event) => JSON.stringify(event)))).toEqual(
      new Set([JSON.stringify({ type: 'function', name: 'orders' }), JSON.stringify({ type: 'host' })])
    );
  });
});

describe('Semaphore', () => {
  it('runs one holder at a time', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = semaphore.use(async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
    });
    const second = semaphore.use(async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(semaphore.available).toBe(0);
    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(semaphore.available).toBe(1);
  });
});
