// src/function-codes/read-exception-status.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import { expectFunctionCode, expectLength } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.READ_EXCEPTION_STATUS;

// Serial line only: reads the eight exception status outputs of the device
export function buildReadExceptionStatusRequest(): Uint8Array {
  return Uint8Array.of(FUNCTION_CODE);
}

export function parseReadExceptionStatusRequest(pdu: Uint8Array): void {
  expectFunctionCode(pdu, FUNCTION_CODE);
  expectLength(pdu, 1);
}

export function parseReadExceptionStatusResponse(pdu: Uint8Array): number {
  expectFunctionCode(pdu, FUNCTION_CODE);
  expectLength(pdu, 2);
  return pdu[1];
}
