// src/function-codes/common.ts

import { MODBUS_LIMITS } from '../constants/constants.js';
import {
  ModbusIllegalDataValueError,
  ModbusInvalidAddressError,
  ModbusInvalidFrameLengthError,
  ModbusInvalidQuantityError,
  ModbusMalformedFrameError,
  ModbusUnexpectedFunctionCodeError,
} from '../errors.js';

const UINT16_SIZE = 2;

export interface AddressQuantity {
  address: number;
  quantity: number;
}

function isUint16(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffff;
}

/**
 * Валидация адреса
 */
export function validateAddress(address: number): void {
  if (!isUint16(address)) throw new ModbusInvalidAddressError(address);
}

/**
 * Адрес + количество не должны выходить за пределы адресного пространства
 */
export function validateQuantity(address: number, quantity: number, max: number): void {
  if (!Number.isInteger(quantity) || quantity < 1 || quantity > max) {
    throw new ModbusInvalidQuantityError(quantity, 1, max);
  }
  if (address + quantity - 1 > MODBUS_LIMITS.MAX_ADDRESS) {
    throw new ModbusInvalidAddressError(address + quantity - 1);
  }
}

export function validateRegisterValue(value: number): void {
  if (!isUint16(value)) throw new ModbusIllegalDataValueError(value, '0-65535');
}

export function pduView(pdu: Uint8Array): DataView {
  return new DataView(pdu.buffer, pdu.byteOffset, pdu.byteLength);
}

export function expectFunctionCode(pdu: Uint8Array, functionCode: number): void {
  if (pdu.length === 0) throw new ModbusInvalidFrameLengthError(0, 1);
  if (pdu[0] !== functionCode) throw new ModbusUnexpectedFunctionCodeError(functionCode, pdu[0]);
}

export function expectLength(pdu: Uint8Array, expected: number): void {
  if (pdu.length !== expected) throw new ModbusInvalidFrameLengthError(pdu.length, expected);
}

/**
 * PDU для запросов чтения: FC + адрес + количество (BE)
 */
export function buildAddressQuantityPdu(
  functionCode: number,
  address: number,
  quantity: number
): Uint8Array {
  const pdu = new Uint8Array(5);
  const view = pduView(pdu);
  view.setUint8(0, functionCode);
  view.setUint16(1, address, false);
  view.setUint16(3, quantity, false);
  return pdu;
}

export function parseAddressQuantityPdu(pdu: Uint8Array, functionCode: number): AddressQuantity {
  expectFunctionCode(pdu, functionCode);
  expectLength(pdu, 5);
  const view = pduView(pdu);
  return { address: view.getUint16(1, false), quantity: view.getUint16(3, false) };
}

/**
 * Упаковка битов: первый бит — младший бит первого байта
 */
export function packBits(values: boolean[]): Uint8Array {
  const bytes = new Uint8Array(Math.ceil(values.length / 8));
  values.forEach((value, i) => {
    if (value) bytes[i >> 3] |= 1 << (i & 7);
  });
  return bytes;
}

export function unpackBits(bytes: Uint8Array, count: number): boolean[] {
  const values: boolean[] = new Array<boolean>(count);
  for (let i = 0; i < count; i++) {
    values[i] = (bytes[i >> 3] & (1 << (i & 7))) !== 0;
  }
  return values;
}

/**
 * Ответ с byte count: FC + N + данные. Возвращает срез данных.
 */
export function readByteCountPayload(
  pdu: Uint8Array,
  functionCode: number,
  expectedByteCount: number
): Uint8Array {
  expectFunctionCode(pdu, functionCode);
  if (pdu.length < 2) throw new ModbusInvalidFrameLengthError(pdu.length, 2 + expectedByteCount);
  const byteCount = pdu[1];
  if (byteCount !== expectedByteCount) {
    throw new ModbusMalformedFrameError(
      `Byte count mismatch: expected ${expectedByteCount}, got ${byteCount}`
    );
  }
  expectLength(pdu, 2 + byteCount);
  return pdu.subarray(2);
}

export function parseBitsResponse(
  pdu: Uint8Array,
  functionCode: number,
  quantity: number
): boolean[] {
  const payload = readByteCountPayload(pdu, functionCode, Math.ceil(quantity / 8));
  return unpackBits(payload, quantity);
}

export function parseRegistersResponse(
  pdu: Uint8Array,
  functionCode: number,
  quantity: number
): number[] {
  const payload = readByteCountPayload(pdu, functionCode, quantity * UINT16_SIZE);
  const view = pduView(payload);
  const values: number[] = new Array<number>(quantity);
  for (let i = 0; i < quantity; i++) {
    values[i] = view.getUint16(i * UINT16_SIZE, false);
  }
  return values;
}
