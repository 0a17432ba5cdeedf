// src/transport/node-transports/node-tcp-transport.ts

import * as net from 'net';
import { Mutex } from 'async-mutex';
import { logger as rootLogger } from '../../logger.js';
import {
  ModbusConnectionRefusedError,
  ModbusConnectionTimeoutError,
  ModbusNotConnectedError,
  TransportError,
} from '../../errors.js';
import {
  ConnectionErrorType,
  type DataHandler,
  type NodeTcpTransportOptions,
  type PortStateHandler,
  type Transport,
} from '../../types/modbus-types.js';
import { toHex } from '../../utils/utils.js';

const logger = rootLogger.createLogger('NodeTcpTransport');

const DEFAULT_CONNECT_TIMEOUT = 2000;

function errorCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

/**
 * Постоянное TCP-соединение. Переподключением управляет ConnectionLifecycle,
 * сам транспорт только сообщает о закрытии сокета.
 */
export class NodeTcpTransport implements Transport {
  public isOpen: boolean = false;
  public readonly description: string;

  private readonly options: Required<Omit<NodeTcpTransportOptions, 'localPort'>> &
    Pick<NodeTcpTransportOptions, 'localPort'>;
  private socket: net.Socket | null = null;
  private _isDisconnecting: boolean = false;
  private _writeMutex: Mutex = new Mutex();

  private _dataHandler: DataHandler | null = null;
  private _portStateHandler: PortStateHandler | null = null;

  constructor(
    private readonly host: string,
    private readonly port: number,
    options: NodeTcpTransportOptions = {}
  ) {
    this.description = `${host}:${port}`;
    this.options = {
      connectTimeout: options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT,
      noDelay: options.noDelay ?? true,
      localPort: options.localPort,
    };
  }

  public setDataHandler(handler: DataHandler): void {
    this._dataHandler = handler;
  }

  public setPortStateHandler(handler: PortStateHandler): void {
    this._portStateHandler = handler;
  }

  public connect(): Promise<void> {
    if (this.isOpen) return Promise.resolve();
    this._isDisconnecting = false;

    return new Promise<void>((resolve, reject) => {
      logger.info(`Connecting to ${this.description}...`);
      let connecting = true;

      const socket = net.connect({
        host: this.host,
        port: this.port,
        localPort: this.options.localPort,
      });
      this.socket = socket;
      socket.setTimeout(this.options.connectTimeout);

      socket.once('connect', () => {
        connecting = false;
        this.isOpen = true;
        socket.setTimeout(0);
        socket.setNoDelay(this.options.noDelay);
        logger.info(`Connected to ${this.description}`);
        resolve();
      });

      socket.on('timeout', () => {
        if (!connecting) return;
        connecting = false;
        socket.destroy();
        reject(
          new ModbusConnectionTimeoutError(
            `TCP connection to ${this.description} timed out after ${this.options.connectTimeout} ms`
          )
        );
      });

      socket.on('data', (data: Buffer) => {
        logger.trace(`RX ${toHex(data, ' ')}`, { transport: this.description });
        this._dataHandler?.(new Uint8Array(data.buffer, data.byteOffset, data.byteLength));
      });

      socket.on('error', (err: Error) => {
        if (connecting) {
          connecting = false;
          reject(
            errorCode(err) === 'ECONNREFUSED'
              ? new ModbusConnectionRefusedError(this.host, this.port)
              : new TransportError(`TCP connection to ${this.description} failed: ${err.message}`)
          );
          return;
        }
        logger.error(`Socket error: ${err.message}`, { transport: this.description });
      });

      socket.on('close', (hadError: boolean) => this._onClose(socket, hadError));
    });
  }

  private _onClose(socket: net.Socket, hadError: boolean): void {
    if (this.socket !== socket) return;
    const wasOpen = this.isOpen;
    this.isOpen = false;
    this.socket = null;
    if (!wasOpen) return;

    if (this._isDisconnecting) {
      this._portStateHandler?.(false, {
        type: ConnectionErrorType.ManualDisconnect,
        message: `Disconnected from ${this.description}`,
      });
      return;
    }
    logger.warn(`Connection closed by ${this.description}`);
    this._portStateHandler?.(false, {
      type: hadError ? ConnectionErrorType.ConnectionLost : ConnectionErrorType.PortClosed,
      message: `Connection to ${this.description} closed${hadError ? ' after a socket error' : ''}`,
    });
  }

  public async write(buffer: Uint8Array): Promise<void> {
    const release = await this._writeMutex.acquire();
    try {
      const socket = this.socket;
      if (!this.isOpen || !socket) {
        throw new ModbusNotConnectedError(`Not connected to ${this.description}`);
      }
      logger.trace(`TX ${toHex(buffer, ' ')}`, { transport: this.description });
      await new Promise<void>((resolve, reject) => {
        socket.write(Buffer.from(buffer), (err?: Error | null) => {
          if (err) reject(new TransportError(`Write failed: ${err.message}`));
          else resolve();
        });
      });
    } finally {
      release();
    }
  }

  public async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.destroyed) return;
    this._isDisconnecting = true;
    await new Promise<void>(resolve => {
      // Пир может не закрыть соединение в ответ на FIN
      const timer = setTimeout(() => socket.destroy(), this.options.connectTimeout);
      socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      socket.end();
    });
  }
}

export default NodeTcpTransport;
