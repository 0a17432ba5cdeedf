import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ModbusConnectionLostError,
  ModbusNotConnectedError,
  TransportError,
} from '../src/errors.js';
import { ConnectionLifecycle } from '../src/transport/connection-lifecycle.js';
import {
  ConnectionErrorType,
  ConnectionState,
  type LifecycleConfig,
} from '../src/types/modbus-types.js';
import { flushPromises, MockTransport } from './helpers/mock-transport.js';

function lifecycleConfig(overrides: Partial<LifecycleConfig> = {}): LifecycleConfig {
  return {
    autoReconnectAfter: null,
    queueWhileDisconnected: true,
    connectWaitTimeout: 2000,
    ...overrides,
  };
}

describe('ConnectionLifecycle', () => {
  let transport: MockTransport;
  let transitions: Array<{ state: ConnectionState; error?: Error }>;

  function create(overrides: Partial<LifecycleConfig> = {}): ConnectionLifecycle {
    const lifecycle = new ConnectionLifecycle(transport, lifecycleConfig(overrides));
    lifecycle.setStateHandler((state, _previous, error) => transitions.push({ state, error }));
    return lifecycle;
  }

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    transport = new MockTransport();
    transitions = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('goes through connecting to connected', async () => {
    const lifecycle = create();
    await lifecycle.connect();
    expect(lifecycle.isConnected).toBe(true);
    expect(transitions.map(t => t.state)).toEqual([
      ConnectionState.Connecting,
      ConnectionState.Connected,
    ]);
  });

  it('shares one attempt between concurrent connect calls', async () => {
    const lifecycle = create();
    await Promise.all([lifecycle.connect(), lifecycle.connect()]);
    expect(transport.connectAttempts).toBe(1);
  });

  it('throws the first failure when reconnecting is off', async () => {
    transport.connectError = new Error('refused');
    const lifecycle = create();

    await expect(lifecycle.connect()).rejects.toThrow(
      new TransportError('Failed to connect to mock:502: refused')
    );
    expect(lifecycle.state).toBe(ConnectionState.Disconnected);
    expect(transitions[1].error).toBeInstanceOf(TransportError);
  });

  it('keeps retrying a failed connect at the reconnect interval', async () => {
    transport.connectError = new Error('refused');
    const lifecycle = create({ autoReconnectAfter: 500 });
    let connected = false;
    void lifecycle.connect().then(() => {
      connected = true;
    });

    await flushPromises();
    expect(transport.connectAttempts).toBe(1);

    await vi.advanceTimersByTimeAsync(500);
    await flushPromises();
    expect(transport.connectAttempts).toBe(2);
    expect(connected).toBe(false);

    transport.connectError = null;
    await vi.advanceTimersByTimeAsync(500);
    await flushPromises();
    expect(transport.connectAttempts).toBe(3);
    expect(connected).toBe(true);
  });

  it('reports the loss before reconnecting', async () => {
    const lifecycle = create({ autoReconnectAfter: 1000 });
    await lifecycle.connect();

    transport.simulateClose();
    expect(lifecycle.state).toBe(ConnectionState.Disconnected);
    expect(lifecycle.reconnectPending).toBe(true);
    const lost = transitions[2];
    expect(lost.state).toBe(ConnectionState.Disconnected);
    expect(lost.error).toBeInstanceOf(ModbusConnectionLostError);
    if (lost.error instanceof ModbusConnectionLostError) {
      expect(lost.error.type).toBe(ConnectionErrorType.ConnectionLost);
    }

    await vi.advanceTimersByTimeAsync(999);
    expect(transport.connectAttempts).toBe(1);
    await vi.advanceTimersByTimeAsync(1);
    await flushPromises();
    expect(transport.connectAttempts).toBe(2);
    expect(lifecycle.isConnected).toBe(true);
  });

  it('stays down after a loss when reconnecting is off', async () => {
    const lifecycle = create();
    await lifecycle.connect();
    transport.simulateClose();
    await vi.advanceTimersByTimeAsync(60_000);
    expect(transport.connectAttempts).toBe(1);
    expect(lifecycle.reconnectPending).toBe(false);
  });

  it('holds waiters until the reconnect succeeds', async () => {
    const lifecycle = create({ autoReconnectAfter: 1000 });
    await lifecycle.connect();
    transport.simulateClose();

    let ready = false;
    void lifecycle.waitUntilConnected().then(() => {
      ready = true;
    });
    await vi.advanceTimersByTimeAsync(1000);
    await flushPromises();
    expect(ready).toBe(true);
  });

  it('gives up on a waiter after connectWaitTimeout', async () => {
    const lifecycle = create({ autoReconnectAfter: 1000, connectWaitTimeout: 300 });
    await lifecycle.connect();
    transport.simulateClose();

    const waiting = lifecycle.waitUntilConnected();
    const assertion = expect(waiting).rejects.toThrow('Not connected to mock:502 after 300 ms');
    await vi.advanceTimersByTimeAsync(300);
    await assertion;
  });

  it('fails waiters at once when queueing is off', async () => {
    const lifecycle = create({ autoReconnectAfter: 1000, queueWhileDisconnected: false });
    await lifecycle.connect();
    transport.simulateClose();
    await expect(lifecycle.waitUntilConnected()).rejects.toThrow('Not connected to mock:502');
  });

  it('fails waiters when never started', async () => {
    const lifecycle = create();
    await expect(lifecycle.waitUntilConnected()).rejects.toBeInstanceOf(ModbusNotConnectedError);
  });

  it('wraps write failures as connection errors', async () => {
    const lifecycle = create();
    await expect(lifecycle.write(Uint8Array.of(1))).rejects.toThrow('Not connected to mock:502');

    await lifecycle.connect();
    transport.writeError = new Error('EPIPE');
    await expect(lifecycle.write(Uint8Array.of(1))).rejects.toThrow(
      new TransportError('Write to mock:502 failed: EPIPE')
    );
  });

  it('flushes through the transport', async () => {
    const lifecycle = create();
    await lifecycle.flush();
    expect(transport.flushes).toBe(1);
  });

  it('closes without scheduling a reconnect', async () => {
    const lifecycle = create({ autoReconnectAfter: 100 });
    await lifecycle.connect();
    await lifecycle.close();

    expect(transport.isOpen).toBe(false);
    const last = transitions[transitions.length - 1];
    expect(last.state).toBe(ConnectionState.Disconnected);
    expect(last.error?.message).toBe('Connection closed by client');

    await vi.advanceTimersByTimeAsync(1000);
    expect(transport.connectAttempts).toBe(1);
  });

  it('stops a retrying connect on close', async () => {
    transport.connectError = new Error('refused');
    const lifecycle = create({ autoReconnectAfter: 500 });
    const attempt = lifecycle.connect();
    const assertion = expect(attempt).rejects.toThrow('Reconnect aborted: Connection closed');

    await flushPromises();
    await lifecycle.close();
    await assertion;

    await vi.advanceTimersByTimeAsync(5000);
    expect(transport.connectAttempts).toBe(1);
  });
});
