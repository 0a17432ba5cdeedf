// src/errors.ts

import { MODBUS_EXCEPTION_MESSAGES } from './constants/constants.js';
import { ConnectionErrorType } from './types/modbus-types.js';

/**
 * Base class for all Modbus errors
 */
export class ModbusError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModbusError';
  }
}

// !=============================================================================
// ! Ошибки кодирования запроса (до отправки в линию)
// !=============================================================================

/**
 * Invalid request shape or bounds. Never reaches the wire.
 */
export class ModbusEncodingError extends ModbusError {
  constructor(message: string = 'Invalid Modbus request') {
    super(message);
    this.name = 'ModbusEncodingError';
  }
}

export class ModbusInvalidAddressError extends ModbusEncodingError {
  constructor(address: number) {
    super(`Invalid address: ${address}. Must be 0-65535`);
    this.name = 'ModbusInvalidAddressError';
  }
}

export class ModbusInvalidQuantityError extends ModbusEncodingError {
  constructor(quantity: number, min: number, max: number) {
    super(`Invalid quantity: ${quantity}. Must be ${min}-${max}`);
    this.name = 'ModbusInvalidQuantityError';
  }
}

export class ModbusIllegalDataValueError extends ModbusEncodingError {
  constructor(value: string | number, expected: string) {
    super(`Illegal data value: ${value}. Expected ${expected}`);
    this.name = 'ModbusIllegalDataValueError';
  }
}

export class ModbusInvalidUnitIdError extends ModbusEncodingError {
  constructor(unitId: number) {
    super(`Invalid unit id: ${unitId}. Must be 0-255`);
    this.name = 'ModbusInvalidUnitIdError';
  }
}

// !=============================================================================
// ! Ошибки протокола (битые или чужие кадры)
// !=============================================================================

export class ModbusProtocolError extends ModbusError {
  constructor(message: string = 'Modbus protocol error') {
    super(message);
    this.name = 'ModbusProtocolError';
  }
}

export class ModbusMalformedFrameError extends ModbusProtocolError {
  constructor(message: string = 'Malformed Modbus frame') {
    super(message);
    this.name = 'ModbusMalformedFrameError';
  }
}

export class ModbusInvalidFrameLengthError extends ModbusProtocolError {
  readonly received: number;
  readonly expected: number;

  constructor(received: number, expected: number) {
    super(`Invalid frame length: expected ${expected}, got ${received}`);
    this.name = 'ModbusInvalidFrameLengthError';
    this.received = received;
    this.expected = expected;
  }
}

export class ModbusUnexpectedFunctionCodeError extends ModbusProtocolError {
  readonly sent: number;
  readonly received: number;

  constructor(sent: number, received: number) {
    super(
      `Unexpected function code: sent 0x${sent.toString(16)}, received 0x${received.toString(16)}`
    );
    this.name = 'ModbusUnexpectedFunctionCodeError';
    this.sent = sent;
    this.received = received;
  }
}

/**
 * Device-reported Modbus exception
 */
export class ModbusExceptionError extends ModbusError {
  readonly functionCode: number;
  readonly exceptionCode: number;

  constructor(functionCode: number, exceptionCode: number) {
    const exceptionMessage =
      MODBUS_EXCEPTION_MESSAGES[exceptionCode] ?? `Unknown exception code: ${exceptionCode}`;
    super(
      `Modbus exception: function 0x${functionCode.toString(16)}, code 0x${exceptionCode.toString(16)} (${exceptionMessage})`
    );
    this.name = 'ModbusExceptionError';
    this.functionCode = functionCode;
    this.exceptionCode = exceptionCode;
  }
}

/**
 * Error class for Modbus timeout
 */
export class ModbusTimeoutError extends ModbusError {
  constructor(message: string = 'Modbus request timed out') {
    super(message);
    this.name = 'ModbusTimeoutError';
  }
}

export class ModbusCancelledError extends ModbusError {
  constructor(message: string = 'Modbus request cancelled') {
    super(message);
    this.name = 'ModbusCancelledError';
  }
}

// !=============================================================================
// ! Ошибки соединения
// !=============================================================================

export class ModbusConnectionError extends ModbusError {
  constructor(message: string = 'Modbus connection error') {
    super(message);
    this.name = 'ModbusConnectionError';
  }
}

export class ModbusNotConnectedError extends ModbusConnectionError {
  constructor(message: string = 'Modbus client is not connected') {
    super(message);
    this.name = 'ModbusNotConnectedError';
  }
}

export class ModbusConnectionLostError extends ModbusConnectionError {
  readonly type: ConnectionErrorType;

  constructor(type: ConnectionErrorType, message: string = 'Connection lost') {
    super(message);
    this.name = 'ModbusConnectionLostError';
    this.type = type;
  }
}

export class ModbusConnectionTimeoutError extends ModbusConnectionError {
  constructor(message: string = 'Connection timed out') {
    super(message);
    this.name = 'ModbusConnectionTimeoutError';
  }
}

export class ModbusConnectionRefusedError extends ModbusConnectionError {
  constructor(host: string, port: number) {
    super(`Connection refused by ${host}:${port}`);
    this.name = 'ModbusConnectionRefusedError';
  }
}

export class TransportError extends ModbusConnectionError {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

export class NodeSerialConnectionError extends TransportError {
  constructor(message: string) {
    super(message);
    this.name = 'NodeSerialConnectionError';
  }
}

export class ModbusConfigError extends ModbusError {
  constructor(message: string = 'Invalid Modbus configuration') {
    super(message);
    this.name = 'ModbusConfigError';
  }
}

/**
 * Приводит произвольное значение к ошибке соединения
 */
export function toConnectionError(err: unknown, fallback: string): ModbusConnectionError {
  if (err instanceof ModbusConnectionError) return err;
  if (err instanceof Error) return new TransportError(`${fallback}: ${err.message}`);
  return new TransportError(`${fallback}: ${String(err)}`);
}

export function isRetryableError(err: unknown): boolean {
  return err instanceof ModbusTimeoutError || err instanceof ModbusProtocolError;
}
