// src/transport/node-transports/node-serialport.ts

import { SerialPort } from 'serialport';
import { Mutex } from 'async-mutex';
import { logger as rootLogger } from '../../logger.js';
import {
  ModbusConfigError,
  ModbusNotConnectedError,
  NodeSerialConnectionError,
  TransportError,
} from '../../errors.js';
import {
  ConnectionErrorType,
  type DataHandler,
  type NodeSerialTransportOptions,
  type PortStateHandler,
  type SerialLineParameters,
  type Transport,
} from '../../types/modbus-types.js';
import { toHex } from '../../utils/utils.js';

const NODE_SERIAL_CONSTANTS = {
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 921600,
} as const;

const logger = rootLogger.createLogger('NodeSerialTransport');

/**
 * Сообщение об ошибке открытия порта в понятном виде
 */
function describeOpenError(err: Error): string {
  const message = err.message.toLowerCase();
  if (message.includes('permission')) return 'Permission denied';
  if (message.includes('busy')) return 'Serial port is busy';
  if (message.includes('no such file')) return 'Serial port does not exist';
  return err.message;
}

/**
 * Последовательный порт через пакет serialport. Порт открывается один раз и удерживается
 * на всё время жизни соединения.
 */
export class NodeSerialTransport implements Transport {
  public readonly description: string;
  public readonly line: SerialLineParameters;

  private port: SerialPort | null = null;
  private _isDisconnecting: boolean = false;
  private _operationMutex: Mutex = new Mutex();

  private _dataHandler: DataHandler | null = null;
  private _portStateHandler: PortStateHandler | null = null;

  constructor(
    private readonly path: string,
    options: NodeSerialTransportOptions = {}
  ) {
    this.description = path;
    this.line = {
      baudRate: options.baudRate ?? 9600,
      dataBits: options.dataBits ?? 8,
      stopBits: options.stopBits ?? 1,
      parity: options.parity ?? 'none',
    };
    if (
      this.line.baudRate < NODE_SERIAL_CONSTANTS.MIN_BAUD_RATE ||
      this.line.baudRate > NODE_SERIAL_CONSTANTS.MAX_BAUD_RATE
    ) {
      throw new ModbusConfigError(`Invalid baud rate: ${this.line.baudRate}`);
    }
  }

  public get isOpen(): boolean {
    return this.port?.isOpen ?? false;
  }

  public setDataHandler(handler: DataHandler): void {
    this._dataHandler = handler;
  }

  public setPortStateHandler(handler: PortStateHandler): void {
    this._portStateHandler = handler;
  }

  public async connect(): Promise<void> {
    if (this.isOpen) return;
    this._isDisconnecting = false;

    const port = new SerialPort({
      path: this.path,
      baudRate: this.line.baudRate,
      dataBits: this.line.dataBits,
      stopBits: this.line.stopBits,
      parity: this.line.parity,
      autoOpen: false,
    });

    await new Promise<void>((resolve, reject) => {
      port.open((err: Error | null) => {
        if (err) {
          reject(new NodeSerialConnectionError(describeOpenError(err)));
          return;
        }
        resolve();
      });
    });

    port.on('data', (data: Buffer) => {
      logger.trace(`RX ${toHex(data, ' ')}`, { transport: this.description });
      this._dataHandler?.(new Uint8Array(data.buffer, data.byteOffset, data.byteLength));
    });
    port.on('error', (err: Error) => {
      logger.error(`Serial port error: ${err.message}`, { transport: this.description });
    });
    port.on('close', () => this._onClose(port));

    this.port = port;
    logger.info(
      `Serial port ${this.path} opened (${this.line.baudRate} ${this.line.dataBits}` +
        `${this.line.parity.charAt(0).toUpperCase()}${this.line.stopBits})`
    );
  }

  private _onClose(port: SerialPort): void {
    if (this.port !== port) return;
    this.port = null;
    port.removeAllListeners();

    if (this._isDisconnecting) {
      this._portStateHandler?.(false, {
        type: ConnectionErrorType.ManualDisconnect,
        message: `Serial port ${this.path} closed`,
      });
      return;
    }
    logger.warn(`Serial port ${this.path} closed unexpectedly`);
    this._portStateHandler?.(false, {
      type: ConnectionErrorType.PortClosed,
      message: `Serial port ${this.path} closed unexpectedly`,
    });
  }

  public async write(buffer: Uint8Array): Promise<void> {
    const release = await this._operationMutex.acquire();
    try {
      const port = this.port;
      if (!port || !port.isOpen) {
        throw new ModbusNotConnectedError(`Serial port ${this.path} is not open`);
      }
      logger.trace(`TX ${toHex(buffer, ' ')}`, { transport: this.description });
      await new Promise<void>((resolve, reject) => {
        port.write(Buffer.from(buffer), 'binary', (err: Error | null | undefined) => {
          if (err) {
            reject(new TransportError(`Write failed: ${err.message}`));
            return;
          }
          // Ждём, пока данные физически уйдут в линию: дедлайн RTU отсчитывается от конца записи
          port.drain((drainErr: Error | null) => {
            if (drainErr) reject(new TransportError(`Drain failed: ${drainErr.message}`));
            else resolve();
          });
        });
      });
    } finally {
      release();
    }
  }

  /**
   * Сбрасывает буферы драйвера (непрочитанные байты от прошлых ответов)
   */
  public async flush(): Promise<void> {
    const port = this.port;
    if (!port || !port.isOpen) return;
    const release = await this._operationMutex.acquire();
    try {
      await new Promise<void>((resolve, reject) => {
        port.flush((err: Error | null) => {
          if (err) reject(new TransportError(`Flush failed: ${err.message}`));
          else resolve();
        });
      });
    } finally {
      release();
    }
  }

  public async disconnect(): Promise<void> {
    const port = this.port;
    if (!port || !port.isOpen) return;
    this._isDisconnecting = true;
    await new Promise<void>((resolve, reject) => {
      port.close((err: Error | null) => {
        if (err) reject(new NodeSerialConnectionError(`Failed to close ${this.path}: ${err.message}`));
        else resolve();
      });
    });
  }
}

export default NodeSerialTransport;
