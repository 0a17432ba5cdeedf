// src/function-codes/diagnostics.ts

import { MODBUS_LIMITS, ModbusFunctionCode } from '../constants/constants.js';
import {
  ModbusIllegalDataValueError,
  ModbusInvalidQuantityError,
  ModbusMalformedFrameError,
} from '../errors.js';
import { expectFunctionCode, pduView, validateRegisterValue } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.DIAGNOSTICS;
const HEADER_SIZE = 3;
const UINT16_SIZE = 2;

export interface DiagnosticsPayload {
  subFunction: number;
  data: number[];
}

/**
 * Строит PDU диагностики (FC 0x08)
 * @param subFunction - код подфункции (0x0000 — Return Query Data)
 * @param data - слова данных подфункции
 */
export function buildDiagnosticsRequest(subFunction: number, data: number[]): Uint8Array {
  if (!Number.isInteger(subFunction) || subFunction < 0 || subFunction > 0xffff) {
    throw new ModbusIllegalDataValueError(subFunction, 'sub-function 0-65535');
  }
  if (data.length > MODBUS_LIMITS.MAX_DIAGNOSTIC_WORDS) {
    throw new ModbusInvalidQuantityError(data.length, 0, MODBUS_LIMITS.MAX_DIAGNOSTIC_WORDS);
  }
  data.forEach(validateRegisterValue);

  const pdu = new Uint8Array(HEADER_SIZE + data.length * UINT16_SIZE);
  const view = pduView(pdu);
  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, subFunction, false);
  data.forEach((word, i) => view.setUint16(HEADER_SIZE + i * UINT16_SIZE, word, false));
  return pdu;
}

/**
 * Запрос и ответ имеют одинаковую структуру
 */
export function parseDiagnosticsPdu(pdu: Uint8Array): DiagnosticsPayload {
  expectFunctionCode(pdu, FUNCTION_CODE);
  if (pdu.length < HEADER_SIZE || (pdu.length - HEADER_SIZE) % UINT16_SIZE !== 0) {
    throw new ModbusMalformedFrameError(`Invalid diagnostics PDU length: ${pdu.length}`);
  }
  const view = pduView(pdu);
  const data: number[] = [];
  for (let offset = HEADER_SIZE; offset < pdu.length; offset += UINT16_SIZE) {
    data.push(view.getUint16(offset, false));
  }
  return { subFunction: view.getUint16(1, false), data };
}

export function diagnosticsResponseLength(data: number[]): number {
  return HEADER_SIZE + data.length * UINT16_SIZE;
}
