/**
 * SchemaLock Tests
 */

import { describe, it, expect } from 'vitest';

import { SchemaLock } from '../services/schema-lock.js';

const deferred = () => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
};

describe('SchemaLock', () => {
  it('should serialise work on the same key', async () => {
    const lock = new SchemaLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.withLock('tenant_a', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lock.withLock('tenant_a', async () => {
      events.push('second:start');
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should not block different keys', async () => {
    const lock = new SchemaLock();
    const gate = deferred();
    const events: string[] = [];

    const first = lock.withLock('tenant_a', async () => {
      await gate.promise;
      events.push('a');
    });
    await lock.withLock('tenant_b', async () => {
      events.push('b');
    });

    expect(events).toEqual(['b']);
    gate.resolve();
    await first;
  });

  it('should release the key when work throws', async () => {
    const lock = new SchemaLock();

    await expect(
      lock.withLock('tenant_a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(lock.isLocked('tenant_a')).toBe(false);
    await expect(lock.withLock('tenant_a', async () => 'next')).resolves.toBe('next');
  });

  it('should report held keys', async () => {
    const lock = new SchemaLock();
    const gate = deferred();

    const held = lock.withLock('tenant_a', () => gate.promise);

    expect(lock.isLocked('tenant_a')).toBe(true);
    gate.resolve();
    await held;
    expect(lock.isLocked('tenant_a')).toBe(false);
  });
});
