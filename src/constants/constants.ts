// src/constants/constants.ts

/**
 * Modbus Function Codes
 */
export enum ModbusFunctionCode {
  READ_COILS = 0x01,
  READ_DISCRETE_INPUTS = 0x02,
  READ_HOLDING_REGISTERS = 0x03,
  READ_INPUT_REGISTERS = 0x04,
  WRITE_SINGLE_COIL = 0x05,
  WRITE_SINGLE_REGISTER = 0x06,
  READ_EXCEPTION_STATUS = 0x07,
  DIAGNOSTICS = 0x08,
  WRITE_MULTIPLE_COILS = 0x0f,
  WRITE_MULTIPLE_REGISTERS = 0x10,
}

/**
 * Modbus Exception Codes
 */
export enum ModbusExceptionCode {
  ILLEGAL_FUNCTION = 0x01,
  ILLEGAL_DATA_ADDRESS = 0x02,
  ILLEGAL_DATA_VALUE = 0x03,
  SLAVE_DEVICE_FAILURE = 0x04,
  ACKNOWLEDGE = 0x05,
  SLAVE_DEVICE_BUSY = 0x06,
  NEGATIVE_ACKNOWLEDGE = 0x07,
  MEMORY_PARITY_ERROR = 0x08,
  GATEWAY_PATH_UNAVAILABLE = 0x0a,
  GATEWAY_TARGET_DEVICE_FAILED = 0x0b,
}

export const MODBUS_EXCEPTION_MESSAGES: Readonly<Record<number, string>> = {
  [ModbusExceptionCode.ILLEGAL_FUNCTION]: 'Illegal Function',
  [ModbusExceptionCode.ILLEGAL_DATA_ADDRESS]: 'Illegal Data Address',
  [ModbusExceptionCode.ILLEGAL_DATA_VALUE]: 'Illegal Data Value',
  [ModbusExceptionCode.SLAVE_DEVICE_FAILURE]: 'Slave Device Failure',
  [ModbusExceptionCode.ACKNOWLEDGE]: 'Acknowledge',
  [ModbusExceptionCode.SLAVE_DEVICE_BUSY]: 'Slave Device Busy',
  [ModbusExceptionCode.NEGATIVE_ACKNOWLEDGE]: 'Negative Acknowledge',
  [ModbusExceptionCode.MEMORY_PARITY_ERROR]: 'Memory Parity Error',
  [ModbusExceptionCode.GATEWAY_PATH_UNAVAILABLE]: 'Gateway Path Unavailable',
  [ModbusExceptionCode.GATEWAY_TARGET_DEVICE_FAILED]: 'Gateway Target Device Failed to Respond',
};

/** Бит исключения в коде функции ответа */
export const EXCEPTION_BIT = 0x80;

export const COIL_ON = 0xff00;
export const COIL_OFF = 0x0000;

/**
 * Границы адресов и количеств по спецификации протокола
 */
export const MODBUS_LIMITS = {
  MIN_ADDRESS: 0,
  MAX_ADDRESS: 0xffff,
  MIN_UNIT_ID: 0,
  MAX_UNIT_ID: 0xff,
  MAX_REGISTER_VALUE: 0xffff,
  MAX_READ_COILS: 2000,
  MAX_READ_REGISTERS: 125,
  MAX_WRITE_COILS: 1968,
  MAX_WRITE_REGISTERS: 123,
  MAX_DIAGNOSTIC_WORDS: 125,
} as const;

export const TCP_CONSTANTS = {
  DEFAULT_PORT: 502,
  MBAP_HEADER_SIZE: 7,
  PROTOCOL_ID: 0,
  // unit id + max PDU (253)
  MAX_MBAP_LENGTH: 254,
} as const;

export const RTU_CONSTANTS = {
  // address + function code + crc
  MIN_FRAME_SIZE: 4,
  MAX_FRAME_SIZE: 256,
  CRC_SIZE: 2,
  // выше этой скорости тайминги фиксированы
  FIXED_TIMING_BAUD_RATE: 19200,
  FIXED_T1_5_MS: 0.75,
  FIXED_T3_5_MS: 1.75,
  DEFAULT_FRAME_SILENCE_FLOOR_MS: 20,
} as const;

/**
 * Returns the readable name of a function code for log output
 */
export function functionCodeName(code: number): string {
  const name = ModbusFunctionCode[code];
  return typeof name === 'string' ? name : `UNKNOWN_FUNCTION_0x${code.toString(16)}`;
}
