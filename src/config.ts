// src/config.ts

import { TCP_CONSTANTS } from './constants/constants.js';
import { ModbusConfigError } from './errors.js';
import type {
  ModbusRtuOptions,
  ModbusTcpOptions,
  ResolvedRtuConfig,
  ResolvedTcpConfig,
  SerialDataBits,
  SerialParity,
  SerialStopBits,
  SubmitOptions,
} from './types/modbus-types.js';

export const TCP_DEFAULTS = {
  port: TCP_CONSTANTS.DEFAULT_PORT,
  timeout: 2000,
  connectTimeout: 2000,
} as const;

export const RTU_DEFAULTS = {
  baudRate: 9600,
  dataBits: 8,
  parity: 'none',
  stopBits: 1,
  /** extra wait added to the turnaround deadline */
  timeout: 100,
} as const;

const COMMON_DEFAULTS = {
  defaultUnitId: 1,
  retries: 0,
  retryDelay: 0,
  autoReconnectAfter: null,
  queueWhileDisconnected: true,
  connectWaitTimeout: 2000,
} as const;

const DATA_BITS: readonly SerialDataBits[] = [5, 6, 7, 8];
const STOP_BITS: readonly SerialStopBits[] = [1, 1.5, 2];
const PARITIES: readonly SerialParity[] = ['none', 'even', 'odd', 'mark', 'space'];

function requireInteger(name: string, value: number, min: number, max: number): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ModbusConfigError(`Invalid ${name}: ${value}. Must be an integer ${min}-${max}`);
  }
  return value;
}

function requireDuration(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ModbusConfigError(`Invalid ${name}: ${value}. Must be a non-negative number of ms`);
  }
  return value;
}

function requireOneOf<T>(name: string, value: T, allowed: readonly T[]): T {
  if (!allowed.includes(value)) {
    throw new ModbusConfigError(`Invalid ${name}: ${String(value)}. Allowed: ${allowed.join(', ')}`);
  }
  return value;
}

/**
 * Проверяет переопределения таймаута и числа повторов для одного запроса
 * @throws ModbusConfigError
 */
export function validateSubmitOptions(options: SubmitOptions): void {
  if (options.timeout !== undefined) requireDuration('timeout', options.timeout);
  if (options.retries !== undefined) requireInteger('retries', options.retries, 0, 100);
}

function resolveCommon(options: ModbusTcpOptions | ModbusRtuOptions) {
  const autoReconnectAfter = options.autoReconnectAfter ?? COMMON_DEFAULTS.autoReconnectAfter;
  return {
    defaultUnitId: requireInteger(
      'defaultUnitId',
      options.defaultUnitId ?? COMMON_DEFAULTS.defaultUnitId,
      0,
      255
    ),
    retries: requireInteger('retries', options.retries ?? COMMON_DEFAULTS.retries, 0, 100),
    retryDelay: requireDuration('retryDelay', options.retryDelay ?? COMMON_DEFAULTS.retryDelay),
    autoReconnectAfter:
      autoReconnectAfter === null ? null : requireDuration('autoReconnectAfter', autoReconnectAfter),
    queueWhileDisconnected: options.queueWhileDisconnected ?? COMMON_DEFAULTS.queueWhileDisconnected,
    connectWaitTimeout: requireDuration(
      'connectWaitTimeout',
      options.connectWaitTimeout ?? COMMON_DEFAULTS.connectWaitTimeout
    ),
  };
}

/**
 * Проверяет и дополняет значениями по умолчанию настройки TCP-соединения
 * @throws ModbusConfigError
 */
export function resolveTcpConfig(options: ModbusTcpOptions): ResolvedTcpConfig {
  if (typeof options.host !== 'string' || options.host.length === 0) {
    throw new ModbusConfigError('TCP host is required');
  }
  const maxActive = options.maxActiveRequests ?? null;

  return Object.freeze({
    ...resolveCommon(options),
    host: options.host,
    port: requireInteger('port', options.port ?? TCP_DEFAULTS.port, 1, 65535),
    localPort:
      options.localPort === undefined ? null : requireInteger('localPort', options.localPort, 1, 65535),
    timeout: requireDuration('timeout', options.timeout ?? TCP_DEFAULTS.timeout),
    connectTimeout: requireDuration(
      'connectTimeout',
      options.connectTimeout ?? TCP_DEFAULTS.connectTimeout
    ),
    maxActiveRequests:
      maxActive === null ? null : requireInteger('maxActiveRequests', maxActive, 1, 65535),
  });
}

/**
 * Проверяет настройки RTU-соединения. На последовательной линии всегда один запрос в полёте.
 * @throws ModbusConfigError
 */
export function resolveRtuConfig(options: ModbusRtuOptions): ResolvedRtuConfig {
  if (typeof options.path !== 'string' || options.path.length === 0) {
    throw new ModbusConfigError('Serial port path is required');
  }
  const baudRate = options.baudRate ?? RTU_DEFAULTS.baudRate;
  if (!Number.isFinite(baudRate) || baudRate <= 0) {
    throw new ModbusConfigError(`Invalid baudRate: ${baudRate}`);
  }

  return Object.freeze({
    ...resolveCommon(options),
    path: options.path,
    baudRate,
    dataBits: requireOneOf('dataBits', options.dataBits ?? RTU_DEFAULTS.dataBits, DATA_BITS),
    parity: requireOneOf('parity', options.parity ?? RTU_DEFAULTS.parity, PARITIES),
    stopBits: requireOneOf('stopBits', options.stopBits ?? RTU_DEFAULTS.stopBits, STOP_BITS),
    timeout: requireDuration('timeout', options.timeout ?? RTU_DEFAULTS.timeout),
    frameSilence:
      options.frameSilence === undefined
        ? null
        : requireDuration('frameSilence', options.frameSilence),
    maxActiveRequests: 1,
  });
}
