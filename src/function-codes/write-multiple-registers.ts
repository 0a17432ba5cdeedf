// src/function-codes/write-multiple-registers.ts

import { MODBUS_LIMITS, ModbusFunctionCode } from '../constants/constants.js';
import { ModbusIllegalDataValueError, ModbusMalformedFrameError } from '../errors.js';
import {
  expectFunctionCode,
  expectLength,
  pduView,
  validateAddress,
  validateQuantity,
  validateRegisterValue,
} from './common.js';
import type { MultipleWriteAck } from './write-multiple-coils.js';

const FUNCTION_CODE = ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS;
const MAX_REGISTERS = MODBUS_LIMITS.MAX_WRITE_REGISTERS;
const REQUEST_HEADER_SIZE = 6;
const RESPONSE_SIZE = 5;
const UINT16_SIZE = 2;

export interface MultipleRegisters {
  address: number;
  values: number[];
}

/**
 * Строит PDU-запрос для записи множества регистров (Write Multiple Registers)
 * @param startAddress - начальный адрес
 * @param values - массив значений регистров
 * @throws ModbusInvalidQuantityError если количество регистров вне 1-123
 */
export function buildWriteMultipleRegistersRequest(
  startAddress: number,
  values: number[]
): Uint8Array {
  validateAddress(startAddress);
  if (!Array.isArray(values)) throw new ModbusIllegalDataValueError(String(values), 'number[]');
  validateQuantity(startAddress, values.length, MAX_REGISTERS);
  values.forEach(validateRegisterValue);

  const byteCount = values.length * UINT16_SIZE;
  const pdu = new Uint8Array(REQUEST_HEADER_SIZE + byteCount);
  const view = pduView(pdu);

  // Заполняем заголовок PDU
  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, startAddress, false);
  view.setUint16(3, values.length, false);
  view.setUint8(5, byteCount);

  values.forEach((value, i) => view.setUint16(REQUEST_HEADER_SIZE + i * UINT16_SIZE, value, false));

  return pdu;
}

export function parseWriteMultipleRegistersRequest(pdu: Uint8Array): MultipleRegisters {
  expectFunctionCode(pdu, FUNCTION_CODE);
  if (pdu.length < REQUEST_HEADER_SIZE) {
    throw new ModbusMalformedFrameError(`Request too short: ${pdu.length} bytes`);
  }
  const view = pduView(pdu);
  const quantity = view.getUint16(3, false);
  const byteCount = view.getUint8(5);
  if (byteCount !== quantity * UINT16_SIZE) {
    throw new ModbusMalformedFrameError(
      `Byte count ${byteCount} does not match quantity ${quantity}`
    );
  }
  expectLength(pdu, REQUEST_HEADER_SIZE + byteCount);

  const values: number[] = [];
  for (let i = 0; i < quantity; i++) {
    values.push(view.getUint16(REQUEST_HEADER_SIZE + i * UINT16_SIZE, false));
  }
  return { address: view.getUint16(1, false), values };
}

/**
 * Разбирает PDU-ответ на запись множества регистров
 */
export function parseWriteMultipleRegistersResponse(pdu: Uint8Array): MultipleWriteAck {
  expectFunctionCode(pdu, FUNCTION_CODE);
  expectLength(pdu, RESPONSE_SIZE);
  const view = pduView(pdu);
  return {
    startAddress: view.getUint16(1, false),
    quantity: view.getUint16(3, false),
  };
}
