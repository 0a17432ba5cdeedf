// src/function-codes/write-single-register.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import {
  expectFunctionCode,
  expectLength,
  pduView,
  validateAddress,
  validateRegisterValue,
} from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.WRITE_SINGLE_REGISTER;
const PDU_SIZE = 5;

export interface SingleRegister {
  address: number;
  value: number;
}

/**
 * Строит PDU-запрос для записи одного регистра
 */
export function buildWriteSingleRegisterRequest(address: number, value: number): Uint8Array {
  validateAddress(address);
  validateRegisterValue(value);

  const pdu = new Uint8Array(PDU_SIZE);
  const view = pduView(pdu);
  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, address, false);
  view.setUint16(3, value, false);
  return pdu;
}

function parseSingleRegister(pdu: Uint8Array): SingleRegister {
  expectFunctionCode(pdu, FUNCTION_CODE);
  expectLength(pdu, PDU_SIZE);
  const view = pduView(pdu);
  return { address: view.getUint16(1, false), value: view.getUint16(3, false) };
}

export function parseWriteSingleRegisterRequest(pdu: Uint8Array): SingleRegister {
  return parseSingleRegister(pdu);
}

export function parseWriteSingleRegisterResponse(pdu: Uint8Array): SingleRegister {
  return parseSingleRegister(pdu);
}
