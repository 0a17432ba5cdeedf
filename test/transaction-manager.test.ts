import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ModbusFunctionCode } from '../src/constants/constants.js';
import {
  ModbusCancelledError,
  ModbusConnectionLostError,
  ModbusError,
  ModbusExceptionError,
  ModbusTimeoutError,
} from '../src/errors.js';
import { TransactionManager } from '../src/transaction/transaction-manager.js';
import {
  ConnectionErrorType,
  TransactionState,
  type ModbusRequest,
  type TransactionOutcome,
} from '../src/types/modbus-types.js';

const readOne: ModbusRequest = {
  functionCode: ModbusFunctionCode.READ_HOLDING_REGISTERS,
  address: 0,
  quantity: 1,
};

function errorOf(outcome: TransactionOutcome): ModbusError {
  if (outcome.ok) throw new Error('expected a failed outcome');
  return outcome.error;
}

describe('TransactionManager', () => {
  let manager: TransactionManager;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    manager = new TransactionManager();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves a transaction with the decoded response', async () => {
    const outcome = manager.register({ key: 5, request: readOne, unitId: 1, timeout: 1000 });
    expect(manager.deliver(5, Uint8Array.of(0x03, 0x02, 0x00, 0x07))).toBe(true);
    expect(await outcome).toEqual({
      ok: true,
      response: { functionCode: ModbusFunctionCode.READ_HOLDING_REGISTERS, values: [7] },
    });
    expect(manager.size).toBe(0);
  });

  it('reports an exception response as a failed outcome', async () => {
    const outcome = manager.register({ key: 1, request: readOne, unitId: 1, timeout: 1000 });
    manager.deliver(1, Uint8Array.of(0x83, 0x02));
    const error = errorOf(await outcome);
    expect(error).toBeInstanceOf(ModbusExceptionError);
  });

  it('ignores a delivery nobody waits for', () => {
    expect(manager.deliver(42, Uint8Array.of(0x03, 0x02, 0x00, 0x01))).toBe(false);
  });

  it('refuses a key that is already outstanding', () => {
    void manager.register({ key: 1, request: readOne, unitId: 1, timeout: 1000 });
    expect(() => manager.register({ key: 1, request: readOne, unitId: 1, timeout: 1000 })).toThrow(
      'Correlation key 1 is already outstanding'
    );
  });

  it('times a transaction out at its deadline', async () => {
    const outcome = manager.register({ key: 1, request: readOne, unitId: 1, timeout: 100 });

    vi.advanceTimersByTime(99);
    expect(manager.has(1)).toBe(true);

    vi.advanceTimersByTime(1);
    expect(manager.has(1)).toBe(false);
    const error = errorOf(await outcome);
    expect(error).toBeInstanceOf(ModbusTimeoutError);
    expect(error.message).toBe('No response within 100 ms (transaction 1)');
  });

  it('expires each transaction at its own deadline with one timer', async () => {
    const slow = manager.register({ key: 1, request: readOne, unitId: 1, timeout: 100 });
    const fast = manager.register({ key: 2, request: readOne, unitId: 1, timeout: 50 });

    vi.advanceTimersByTime(50);
    expect(manager.has(1)).toBe(true);
    expect(manager.has(2)).toBe(false);
    expect(errorOf(await fast)).toBeInstanceOf(ModbusTimeoutError);

    vi.advanceTimersByTime(50);
    expect(manager.size).toBe(0);
    expect(errorOf(await slow)).toBeInstanceOf(ModbusTimeoutError);
  });

  it('leaves an unarmed transaction pending until it is armed', async () => {
    const outcome = manager.register({ key: 1, request: readOne, unitId: 1, timeout: null });
    vi.advanceTimersByTime(10_000);
    expect(manager.get(1)?.deadline).toBeNull();

    expect(manager.arm(1, 30)).toBe(true);
    vi.advanceTimersByTime(30);
    expect(errorOf(await outcome).message).toBe('No response within 30 ms (transaction 1)');
  });

  it('does not fire for a transaction answered before its deadline', async () => {
    const outcome = manager.register({ key: 1, request: readOne, unitId: 1, timeout: 100 });
    vi.advanceTimersByTime(40);
    manager.deliver(1, Uint8Array.of(0x03, 0x02, 0x00, 0x01));
    vi.advanceTimersByTime(100);
    expect((await outcome).ok).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('cancels one transaction', async () => {
    const outcome = manager.register({ key: 3, request: readOne, unitId: 1, timeout: 100 });
    expect(manager.cancel(3, new ModbusCancelledError('stop'))).toBe(true);
    expect(manager.cancel(3)).toBe(false);
    const error = errorOf(await outcome);
    expect(error).toBeInstanceOf(ModbusCancelledError);
    expect(error.message).toBe('stop');
  });

  it('fails every outstanding transaction with the same error', async () => {
    const outcomes = [1, 2, 3].map(key =>
      manager.register({ key, request: readOne, unitId: 1, timeout: 1000 })
    );
    const lost = new ModbusConnectionLostError(ConnectionErrorType.ConnectionLost);

    expect(manager.failAll(lost)).toBe(3);
    for (const outcome of outcomes) {
      expect(errorOf(await outcome)).toBe(lost);
    }
    expect(vi.getTimerCount()).toBe(0);
  });

  it('settles a transaction only once', async () => {
    const outcome = manager.register({ key: 1, request: readOne, unitId: 1, timeout: 100 });
    manager.fail(1, new ModbusError('first'));
    expect(manager.deliver(1, Uint8Array.of(0x03, 0x02, 0x00, 0x01))).toBe(false);
    vi.advanceTimersByTime(200);
    expect(errorOf(await outcome).message).toBe('first');
  });

  it('reports the sole outstanding transaction', () => {
    expect(manager.sole()).toBeUndefined();
    void manager.register({ key: 9, request: readOne, unitId: 4, timeout: null });
    expect(manager.sole()?.unitId).toBe(4);
    void manager.register({ key: 10, request: readOne, unitId: 4, timeout: null });
    expect(manager.sole()).toBeUndefined();
  });

  it('calls the settled handler with the final state and elapsed time', () => {
    const settled: Array<{ key: number; state: TransactionState; elapsed: number }> = [];
    manager.setSettledHandler((tx, _outcome, elapsed) =>
      settled.push({ key: tx.key, state: tx.state, elapsed })
    );

    void manager.register({ key: 1, request: readOne, unitId: 1, timeout: 100 });
    vi.advanceTimersByTime(25);
    manager.deliver(1, Uint8Array.of(0x03, 0x02, 0x00, 0x01));

    expect(settled).toEqual([{ key: 1, state: TransactionState.Resolved, elapsed: 25 }]);
  });
});
