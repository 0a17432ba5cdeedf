// src/function-codes/write-single-coil.ts

import { COIL_OFF, COIL_ON, ModbusFunctionCode } from '../constants/constants.js';
import { ModbusIllegalDataValueError, ModbusMalformedFrameError } from '../errors.js';
import { expectFunctionCode, expectLength, pduView, validateAddress } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.WRITE_SINGLE_COIL;
const PDU_SIZE = 5;

export interface SingleCoil {
  address: number;
  value: boolean;
}

/**
 * Строит PDU-запрос для записи одной катушки
 * @param address - адрес катушки
 * @param value - true → 0xFF00, false → 0x0000
 */
export function buildWriteSingleCoilRequest(address: number, value: boolean): Uint8Array {
  validateAddress(address);
  if (typeof value !== 'boolean') {
    throw new ModbusIllegalDataValueError(String(value), 'boolean');
  }

  const pdu = new Uint8Array(PDU_SIZE);
  const view = pduView(pdu);
  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, address, false);
  view.setUint16(3, value ? COIL_ON : COIL_OFF, false);
  return pdu;
}

function parseSingleCoil(pdu: Uint8Array): SingleCoil {
  expectFunctionCode(pdu, FUNCTION_CODE);
  expectLength(pdu, PDU_SIZE);

  const view = pduView(pdu);
  const raw = view.getUint16(3, false);
  if (raw !== COIL_ON && raw !== COIL_OFF) {
    throw new ModbusMalformedFrameError(`Invalid coil value: 0x${raw.toString(16)}`);
  }
  return { address: view.getUint16(1, false), value: raw === COIL_ON };
}

export function parseWriteSingleCoilRequest(pdu: Uint8Array): SingleCoil {
  return parseSingleCoil(pdu);
}

/**
 * Ответ — эхо запроса
 */
export function parseWriteSingleCoilResponse(pdu: Uint8Array): SingleCoil {
  return parseSingleCoil(pdu);
}
