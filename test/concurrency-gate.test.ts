import { describe, expect, it } from 'vitest';
import { ModbusCancelledError, ModbusConfigError } from '../src/errors.js';
import { ConcurrencyGate, type GateRelease } from '../src/transaction/concurrency-gate.js';
import { flushPromises } from './helpers/mock-transport.js';

function track(promise: Promise<GateRelease>) {
  const state: { release: GateRelease | null; error: unknown } = { release: null, error: null };
  void promise.then(
    release => {
      state.release = release;
    },
    (err: unknown) => {
      state.error = err;
    }
  );
  return state;
}

describe('ConcurrencyGate', () => {
  it('rejects a limit below one', () => {
    expect(() => new ConcurrencyGate(0)).toThrow(ModbusConfigError);
    expect(() => new ConcurrencyGate(1.5)).toThrow('Invalid concurrency limit: 1.5');
  });

  it('suspends the request past the limit until a slot frees up', async () => {
    const gate = new ConcurrencyGate(2);
    const first = track(gate.acquire());
    const second = track(gate.acquire());
    const third = track(gate.acquire());
    await flushPromises();

    expect(first.release).not.toBeNull();
    expect(second.release).not.toBeNull();
    expect(third.release).toBeNull();
    expect(gate.active).toBe(2);
    expect(gate.waiting).toBe(1);

    first.release?.();
    await flushPromises();
    expect(third.release).not.toBeNull();
    expect(gate.active).toBe(2);
    expect(gate.waiting).toBe(0);
  });

  it('ignores a second call of the same release', async () => {
    const gate = new ConcurrencyGate(1);
    const release = await gate.acquire();
    release();
    release();
    expect(gate.active).toBe(0);

    const next = track(gate.acquire());
    const after = track(gate.acquire());
    await flushPromises();
    expect(next.release).not.toBeNull();
    expect(after.release).toBeNull();
  });

  it('abandons a wait when the signal fires and hands the slot on', async () => {
    const gate = new ConcurrencyGate(1);
    const holder = await gate.acquire();
    const controller = new AbortController();
    const cancelled = track(gate.acquire(controller.signal));
    const next = track(gate.acquire());

    controller.abort(new ModbusCancelledError('gave up'));
    await flushPromises();
    expect(cancelled.error).toBeInstanceOf(ModbusCancelledError);
    expect(gate.waiting).toBe(1);

    holder();
    await flushPromises();
    expect(cancelled.release).toBeNull();
    expect(next.release).not.toBeNull();
    expect(gate.active).toBe(1);
  });

  it('rejects at once when the signal is already aborted', async () => {
    const gate = new ConcurrencyGate(1);
    const controller = new AbortController();
    controller.abort();
    await expect(gate.acquire(controller.signal)).rejects.toBeInstanceOf(ModbusCancelledError);
    expect(gate.waiting).toBe(0);
  });

  it('never waits without a limit', async () => {
    const gate = new ConcurrencyGate(null);
    const releases = await Promise.all(Array.from({ length: 50 }, () => gate.acquire()));
    expect(gate.active).toBe(50);
    releases.forEach(release => release());
    expect(gate.active).toBe(0);
  });
});
