// src/function-codes/write-multiple-coils.ts

import { MODBUS_LIMITS, ModbusFunctionCode } from '../constants/constants.js';
import { ModbusIllegalDataValueError, ModbusMalformedFrameError } from '../errors.js';
import {
  expectFunctionCode,
  expectLength,
  packBits,
  pduView,
  unpackBits,
  validateAddress,
  validateQuantity,
} from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.WRITE_MULTIPLE_COILS;
const MAX_COILS = MODBUS_LIMITS.MAX_WRITE_COILS;
const REQUEST_HEADER_SIZE = 6;
const RESPONSE_SIZE = 5;

export interface MultipleCoils {
  address: number;
  values: boolean[];
}

export interface MultipleWriteAck {
  startAddress: number;
  quantity: number;
}

/**
 * Строит PDU-запрос для записи множества катушек (Write Multiple Coils)
 * @param startAddress - начальный адрес
 * @param values - значения катушек (1-1968)
 */
export function buildWriteMultipleCoilsRequest(
  startAddress: number,
  values: boolean[]
): Uint8Array {
  validateAddress(startAddress);
  if (!Array.isArray(values)) throw new ModbusIllegalDataValueError(String(values), 'boolean[]');
  validateQuantity(startAddress, values.length, MAX_COILS);
  for (const value of values) {
    if (typeof value !== 'boolean') {
      throw new ModbusIllegalDataValueError(String(value), 'boolean');
    }
  }

  const packed = packBits(values);
  const pdu = new Uint8Array(REQUEST_HEADER_SIZE + packed.length);
  const view = pduView(pdu);

  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, startAddress, false);
  view.setUint16(3, values.length, false);
  view.setUint8(5, packed.length);
  pdu.set(packed, REQUEST_HEADER_SIZE);

  return pdu;
}

export function parseWriteMultipleCoilsRequest(pdu: Uint8Array): MultipleCoils {
  expectFunctionCode(pdu, FUNCTION_CODE);
  if (pdu.length < REQUEST_HEADER_SIZE) {
    throw new ModbusMalformedFrameError(`Request too short: ${pdu.length} bytes`);
  }
  const view = pduView(pdu);
  const quantity = view.getUint16(3, false);
  const byteCount = view.getUint8(5);
  if (byteCount !== Math.ceil(quantity / 8)) {
    throw new ModbusMalformedFrameError(
      `Byte count ${byteCount} does not match quantity ${quantity}`
    );
  }
  expectLength(pdu, REQUEST_HEADER_SIZE + byteCount);
  return {
    address: view.getUint16(1, false),
    values: unpackBits(pdu.subarray(REQUEST_HEADER_SIZE), quantity),
  };
}

/**
 * Разбирает PDU-ответ: начальный адрес и количество записанных катушек
 */
export function parseWriteMultipleCoilsResponse(pdu: Uint8Array): MultipleWriteAck {
  expectFunctionCode(pdu, FUNCTION_CODE);
  expectLength(pdu, RESPONSE_SIZE);
  const view = pduView(pdu);
  return { startAddress: view.getUint16(1, false), quantity: view.getUint16(3, false) };
}
