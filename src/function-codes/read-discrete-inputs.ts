// src/function-codes/read-discrete-inputs.ts

import { MODBUS_LIMITS, ModbusFunctionCode } from '../constants/constants.js';
import {
  type AddressQuantity,
  buildAddressQuantityPdu,
  parseAddressQuantityPdu,
  parseBitsResponse,
  validateAddress,
  validateQuantity,
} from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.READ_DISCRETE_INPUTS;
const MAX_QUANTITY = MODBUS_LIMITS.MAX_READ_COILS;

/**
 * Строит PDU-запрос для чтения дискретных входов
 * @param startAddress - начальный адрес
 * @param quantity - количество (1-2000)
 */
export function buildReadDiscreteInputsRequest(startAddress: number, quantity: number): Uint8Array {
  validateAddress(startAddress);
  validateQuantity(startAddress, quantity, MAX_QUANTITY);
  return buildAddressQuantityPdu(FUNCTION_CODE, startAddress, quantity);
}

export function parseReadDiscreteInputsRequest(pdu: Uint8Array): AddressQuantity {
  return parseAddressQuantityPdu(pdu, FUNCTION_CODE);
}

export function parseReadDiscreteInputsResponse(pdu: Uint8Array, quantity: number): boolean[] {
  return parseBitsResponse(pdu, FUNCTION_CODE, quantity);
}

export function readDiscreteInputsResponseLength(quantity: number): number {
  return 2 + Math.ceil(quantity / 8);
}
