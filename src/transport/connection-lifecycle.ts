// src/transport/connection-lifecycle.ts

import {
  ModbusConnectionError,
  ModbusConnectionLostError,
  ModbusNotConnectedError,
  toConnectionError,
} from '../errors.js';
import { logger } from '../logger.js';
import {
  ConnectionErrorType,
  ConnectionState,
  type ConnectionStateHandler,
  type DataHandler,
  type LifecycleConfig,
  type Transport,
} from '../types/modbus-types.js';
import { delay } from '../utils/utils.js';

const log = logger.createLogger('ConnectionLifecycle');

interface ConnectWaiter {
  resolve: () => void;
  reject: (err: ModbusConnectionError) => void;
  timer: NodeJS.Timeout;
}

/**
 * Состояние соединения: Disconnected → Connecting → Connected → Disconnected.
 *
 * При потере соединения из Connected сначала уведомляется обработчик состояния (он завершает
 * незавершённые транзакции), и только потом планируется переподключение.
 */
export class ConnectionLifecycle {
  private _state: ConnectionState = ConnectionState.Disconnected;
  private _running = false;
  private _connecting: Promise<void> | null = null;
  private _reconnectTimer: NodeJS.Timeout | null = null;
  private _sleepAbort: AbortController | null = null;
  private _stateHandler: ConnectionStateHandler | null = null;
  private readonly _waiters = new Set<ConnectWaiter>();

  constructor(
    readonly transport: Transport,
    private readonly config: LifecycleConfig
  ) {
    transport.setPortStateHandler((connected, error) => {
      if (connected) return;
      const type = error?.type ?? ConnectionErrorType.ConnectionLost;
      this._onConnectionLost(
        new ModbusConnectionLostError(type, error?.message ?? `Connection to ${transport.description} lost`)
      );
    });
  }

  get state(): ConnectionState {
    return this._state;
  }

  get isConnected(): boolean {
    return this._state === ConnectionState.Connected;
  }

  /** true while a reconnect is scheduled or a connect attempt is running */
  get reconnectPending(): boolean {
    return this._reconnectTimer !== null || this._connecting !== null;
  }

  setStateHandler(handler: ConnectionStateHandler): void {
    this._stateHandler = handler;
  }

  setDataHandler(handler: DataHandler): void {
    this.transport.setDataHandler(handler);
  }

  /**
   * Opens the transport. With `autoReconnectAfter` set, failed attempts are retried after that
   * delay until one succeeds or `close()` is called; otherwise the first failure is thrown.
   */
  connect(): Promise<void> {
    if (this._state === ConnectionState.Connected) return Promise.resolve();
    if (this._connecting) return this._connecting;

    this._running = true;
    this._clearReconnectTimer();
    const attempt = this._connectLoop().finally(() => {
      this._connecting = null;
    });
    this._connecting = attempt;
    return attempt;
  }

  private async _connectLoop(): Promise<void> {
    for (;;) {
      this._setState(ConnectionState.Connecting);
      try {
        await this.transport.connect();
      } catch (err: unknown) {
        const error = toConnectionError(err, `Failed to connect to ${this.transport.description}`);
        this._setState(ConnectionState.Disconnected, error);

        const retryAfter = this.config.autoReconnectAfter;
        if (!this._running || retryAfter === null) {
          this._rejectWaiters(error);
          throw error;
        }
        log.warn(`${error.message}. Retrying in ${retryAfter} ms`, {
          transport: this.transport.description,
        });
        await this._sleep(retryAfter);
        continue;
      }

      if (!this._running) {
        await this.transport.disconnect();
        throw new ModbusNotConnectedError('Connection closed while connecting');
      }
      log.info(`Connected to ${this.transport.description}`);
      this._setState(ConnectionState.Connected);
      return;
    }
  }

  private async _sleep(ms: number): Promise<void> {
    const controller = new AbortController();
    this._sleepAbort = controller;
    try {
      await delay(ms, controller.signal);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ModbusNotConnectedError(`Reconnect aborted: ${reason}`);
    } finally {
      this._sleepAbort = null;
    }
  }

  /**
   * Stops reconnecting, fails waiters and closes the transport.
   */
  async close(): Promise<void> {
    this._running = false;
    this._clearReconnectTimer();
    this._sleepAbort?.abort(new ModbusNotConnectedError('Connection closed'));
    this._rejectWaiters(new ModbusNotConnectedError('Connection closed'));

    if (this._state !== ConnectionState.Disconnected) {
      this._setState(
        ConnectionState.Disconnected,
        new ModbusConnectionLostError(ConnectionErrorType.ManualDisconnect, 'Connection closed by client')
      );
    }
    if (this.transport.isOpen) await this.transport.disconnect();
    log.info(`Closed ${this.transport.description}`);
  }

  /**
   * Resolves once the connection is usable.
   * @throws ModbusNotConnectedError when disconnected with nothing to wait for, or when
   *   `connectWaitTimeout` passes first
   */
  waitUntilConnected(): Promise<void> {
    if (this._state === ConnectionState.Connected) return Promise.resolve();
    if (!this._running) {
      return Promise.reject(new ModbusNotConnectedError());
    }
    if (!this.config.queueWhileDisconnected || !this.reconnectPending) {
      return Promise.reject(
        new ModbusNotConnectedError(`Not connected to ${this.transport.description}`)
      );
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: ConnectWaiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this._waiters.delete(waiter);
          reject(
            new ModbusNotConnectedError(
              `Not connected to ${this.transport.description} after ${this.config.connectWaitTimeout} ms`
            )
          );
        }, this.config.connectWaitTimeout),
      };
      this._waiters.add(waiter);
    });
  }

  async write(adu: Uint8Array): Promise<void> {
    if (this._state !== ConnectionState.Connected) {
      throw new ModbusNotConnectedError(`Not connected to ${this.transport.description}`);
    }
    try {
      await this.transport.write(adu);
    } catch (err: unknown) {
      throw toConnectionError(err, `Write to ${this.transport.description} failed`);
    }
  }

  /**
   * Drops stale input held by the transport, if it supports that.
   */
  async flush(): Promise<void> {
    if (!this.transport.flush) return;
    try {
      await this.transport.flush();
    } catch (err: unknown) {
      throw toConnectionError(err, `Flush of ${this.transport.description} failed`);
    }
  }

  private _onConnectionLost(error: ModbusConnectionLostError): void {
    if (this._state !== ConnectionState.Connected) return;
    log.warn(`${error.message} (${error.type})`, { transport: this.transport.description });
    this._setState(ConnectionState.Disconnected, error);

    const retryAfter = this.config.autoReconnectAfter;
    if (!this._running || retryAfter === null) return;
    if (error.type === ConnectionErrorType.ManualDisconnect) return;

    log.info(`Reconnecting in ${retryAfter} ms`, { transport: this.transport.description });
    this._reconnectTimer = setTimeout(() => {
      this._reconnectTimer = null;
      this.connect().catch((err: unknown) => {
        log.error(`Reconnect failed: ${err instanceof Error ? err.message : String(err)}`, {
          transport: this.transport.description,
        });
      });
    }, retryAfter);
  }

  private _setState(state: ConnectionState, error?: ModbusConnectionError): void {
    const previous = this._state;
    if (previous === state) return;
    this._state = state;
    log.debug(`State ${previous} -> ${state}`, { transport: this.transport.description });
    this._stateHandler?.(state, previous, error);

    if (state === ConnectionState.Connected) {
      for (const waiter of this._waiters) {
        clearTimeout(waiter.timer);
        waiter.resolve();
      }
      this._waiters.clear();
    }
  }

  private _rejectWaiters(error: ModbusConnectionError): void {
    for (const waiter of this._waiters) {
      clearTimeout(waiter.timer);
      waiter.reject(error);
    }
    this._waiters.clear();
  }

  private _clearReconnectTimer(): void {
    if (this._reconnectTimer) {
      clearTimeout(this._reconnectTimer);
      this._reconnectTimer = null;
    }
  }
}
