// src/types/modbus-types.ts

import type { ModbusFunctionCode } from '../constants/constants.js';
import type { ModbusError } from '../errors.js';

// !=============================================================================
// ! Запросы
// !=============================================================================

interface RequestBase {
  /** Unit/station id. Falls back to the connection's `defaultUnitId`. */
  unitId?: number;
}

export interface ReadBitsRequest<
  F extends ModbusFunctionCode.READ_COILS | ModbusFunctionCode.READ_DISCRETE_INPUTS,
> extends RequestBase {
  functionCode: F;
  address: number;
  quantity: number;
}

export interface ReadRegistersRequest<
  F extends ModbusFunctionCode.READ_HOLDING_REGISTERS | ModbusFunctionCode.READ_INPUT_REGISTERS,
> extends RequestBase {
  functionCode: F;
  address: number;
  quantity: number;
}

export interface WriteSingleCoilRequest extends RequestBase {
  functionCode: ModbusFunctionCode.WRITE_SINGLE_COIL;
  address: number;
  value: boolean;
}

export interface WriteSingleRegisterRequest extends RequestBase {
  functionCode: ModbusFunctionCode.WRITE_SINGLE_REGISTER;
  address: number;
  value: number;
}

export interface WriteMultipleCoilsRequest extends RequestBase {
  functionCode: ModbusFunctionCode.WRITE_MULTIPLE_COILS;
  address: number;
  values: boolean[];
}

export interface WriteMultipleRegistersRequest extends RequestBase {
  functionCode: ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS;
  address: number;
  values: number[];
}

export interface ReadExceptionStatusRequest extends RequestBase {
  functionCode: ModbusFunctionCode.READ_EXCEPTION_STATUS;
}

export interface DiagnosticsRequest extends RequestBase {
  functionCode: ModbusFunctionCode.DIAGNOSTICS;
  subFunction: number;
  data: number[];
}

export type ModbusRequest =
  | ReadBitsRequest<ModbusFunctionCode.READ_COILS>
  | ReadBitsRequest<ModbusFunctionCode.READ_DISCRETE_INPUTS>
  | ReadRegistersRequest<ModbusFunctionCode.READ_HOLDING_REGISTERS>
  | ReadRegistersRequest<ModbusFunctionCode.READ_INPUT_REGISTERS>
  | WriteSingleCoilRequest
  | WriteSingleRegisterRequest
  | WriteMultipleCoilsRequest
  | WriteMultipleRegistersRequest
  | ReadExceptionStatusRequest
  | DiagnosticsRequest;

// !=============================================================================
// ! Ответы
// !=============================================================================

export interface ReadBitsResponse<F extends ModbusFunctionCode> {
  functionCode: F;
  values: boolean[];
}

export interface ReadRegistersResponse<F extends ModbusFunctionCode> {
  functionCode: F;
  values: number[];
}

export interface WriteSingleCoilResponse {
  functionCode: ModbusFunctionCode.WRITE_SINGLE_COIL;
  address: number;
  value: boolean;
}

export interface WriteSingleRegisterResponse {
  functionCode: ModbusFunctionCode.WRITE_SINGLE_REGISTER;
  address: number;
  value: number;
}

export interface WriteMultipleResponse<F extends ModbusFunctionCode> {
  functionCode: F;
  startAddress: number;
  quantity: number;
}

export interface ReadExceptionStatusResponse {
  functionCode: ModbusFunctionCode.READ_EXCEPTION_STATUS;
  status: number;
}

export interface DiagnosticsResponse {
  functionCode: ModbusFunctionCode.DIAGNOSTICS;
  subFunction: number;
  data: number[];
}

export type ModbusResponse =
  | ReadBitsResponse<ModbusFunctionCode.READ_COILS>
  | ReadBitsResponse<ModbusFunctionCode.READ_DISCRETE_INPUTS>
  | ReadRegistersResponse<ModbusFunctionCode.READ_HOLDING_REGISTERS>
  | ReadRegistersResponse<ModbusFunctionCode.READ_INPUT_REGISTERS>
  | WriteSingleCoilResponse
  | WriteSingleRegisterResponse
  | WriteMultipleResponse<ModbusFunctionCode.WRITE_MULTIPLE_COILS>
  | WriteMultipleResponse<ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS>
  | ReadExceptionStatusResponse
  | DiagnosticsResponse;

export type ResponseOf<F extends ModbusFunctionCode> = Extract<ModbusResponse, { functionCode: F }>;

/** Typed resolution of a transaction. Never rejects when observed through `settle()`. */
export type TransactionOutcome =
  | { ok: true; response: ModbusResponse }
  | { ok: false; error: ModbusError };

export enum TransactionState {
  Pending = 'pending',
  Resolved = 'resolved',
  Failed = 'failed',
  Cancelled = 'cancelled',
}

export interface SubmitOptions {
  /** TCP: flat deadline in ms. RTU: extra wait added to the turnaround delay. */
  timeout?: number;
  retries?: number;
  signal?: AbortSignal;
}

export interface RequestOptions extends SubmitOptions {
  unitId?: number;
}

// !=============================================================================
// ! Кадры
// !=============================================================================

export interface DecodedFrame {
  /** null for RTU: the line has no correlation field */
  transactionId: number | null;
  unitId: number;
  pdu: Uint8Array;
}

export interface EncodedAdu {
  adu: Uint8Array;
  transactionId: number | null;
}

export type FrameHandler = (frame: DecodedFrame) => void;
export type DiscardHandler = (reason: string, bytes: Uint8Array) => void;

// !=============================================================================
// ! Транспорт
// !=============================================================================

/**
 * Типы ошибок подключения
 */
export enum ConnectionErrorType {
  UnknownError = 'UnknownError',
  PortClosed = 'PortClosed',
  Timeout = 'Timeout',
  ConnectionLost = 'ConnectionLost',
  ManualDisconnect = 'ManualDisconnect',
}

export enum ConnectionState {
  Disconnected = 'disconnected',
  Connecting = 'connecting',
  Connected = 'connected',
}

export type DataHandler = (chunk: Uint8Array) => void;

/** Обработчик изменения состояния порта */
export type PortStateHandler = (
  connected: boolean,
  error?: { type: ConnectionErrorType; message: string }
) => void;

export type ConnectionStateHandler = (
  state: ConnectionState,
  previous: ConnectionState,
  error?: Error
) => void;

export interface Transport {
  readonly isOpen: boolean;
  /** host:port or device path, used in log output */
  readonly description: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(buffer: Uint8Array): Promise<void>;
  /** Drops bytes buffered by the OS or driver that were not yet delivered. */
  flush?(): Promise<void>;
  setDataHandler(handler: DataHandler): void;
  setPortStateHandler(handler: PortStateHandler): void;
}

export type SerialParity = 'none' | 'even' | 'odd' | 'mark' | 'space';
export type SerialDataBits = 5 | 6 | 7 | 8;
export type SerialStopBits = 1 | 1.5 | 2;

export interface SerialLineParameters {
  baudRate: number;
  dataBits: SerialDataBits;
  parity: SerialParity;
  stopBits: SerialStopBits;
}

/** Опции для транспорта через Node.js SerialPort */
export type NodeSerialTransportOptions = Partial<SerialLineParameters>;

export interface NodeTcpTransportOptions {
  connectTimeout?: number;
  localPort?: number;
  noDelay?: boolean;
}

// !=============================================================================
// ! Конфигурация
// !=============================================================================

interface ConnectionOptionsBase {
  defaultUnitId?: number;
  timeout?: number;
  retries?: number;
  retryDelay?: number;
  autoReconnectAfter?: number | null;
  queueWhileDisconnected?: boolean;
  connectWaitTimeout?: number;
}

export interface ModbusTcpOptions extends ConnectionOptionsBase {
  host: string;
  port?: number;
  localPort?: number;
  connectTimeout?: number;
  maxActiveRequests?: number | null;
}

export interface ModbusRtuOptions extends ConnectionOptionsBase, NodeSerialTransportOptions {
  path: string;
  /** Idle threshold override (ms) for frame delimiting. */
  frameSilence?: number;
}

export interface EngineConfig {
  readonly defaultUnitId: number;
  readonly timeout: number;
  readonly retries: number;
  readonly retryDelay: number;
  /** null means unbounded */
  readonly maxActiveRequests: number | null;
}

export interface LifecycleConfig {
  readonly autoReconnectAfter: number | null;
  readonly queueWhileDisconnected: boolean;
  readonly connectWaitTimeout: number;
}

export interface ResolvedTcpConfig extends EngineConfig, LifecycleConfig {
  readonly host: string;
  readonly port: number;
  readonly localPort: number | null;
  readonly connectTimeout: number;
}

export interface ResolvedRtuConfig extends EngineConfig, LifecycleConfig, SerialLineParameters {
  readonly path: string;
  readonly frameSilence: number | null;
}

// !=============================================================================
// ! Логгер
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Контекст для логгера */
export interface LogContext {
  unitId?: number;
  funcCode?: number;
  exceptionCode?: number;
  transactionId?: number;
  address?: number;
  quantity?: number;
  responseTime?: number;
  logger?: string;
  transport?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
}

/** Интерфейс для экземпляра логгера */
export interface LoggerInstance {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  setLevel(level: LogLevel | 'none'): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! Диагностика
// !=============================================================================

export interface DiagnosticsStats {
  uptimeSeconds: number;
  totalRequests: number;
  successfulResponses: number;
  exceptionResponses: number;
  timeouts: number;
  retries: number;
  cancellations: number;
  connectionErrors: number;
  otherErrors: number;
  discardedFrames: number;
  bytesSent: number;
  bytesReceived: number;
  lastResponseTime: number | null;
  minResponseTime: number | null;
  maxResponseTime: number | null;
  averageResponseTime: number | null;
  exceptionCodeCounts: Record<number, number>;
  lastError: string | null;
}
