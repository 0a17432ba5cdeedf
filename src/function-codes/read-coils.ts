// src/function-codes/read-coils.ts

import { MODBUS_LIMITS, ModbusFunctionCode } from '../constants/constants.js';
import {
  type AddressQuantity,
  buildAddressQuantityPdu,
  parseAddressQuantityPdu,
  parseBitsResponse,
  validateAddress,
  validateQuantity,
} from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.READ_COILS;
const MAX_QUANTITY = MODBUS_LIMITS.MAX_READ_COILS;

/**
 * Строит PDU-запрос для чтения дискретных выходов (coils)
 * @param startAddress - начальный адрес
 * @param quantity - количество (1-2000)
 */
export function buildReadCoilsRequest(startAddress: number, quantity: number): Uint8Array {
  validateAddress(startAddress);
  validateQuantity(startAddress, quantity, MAX_QUANTITY);
  return buildAddressQuantityPdu(FUNCTION_CODE, startAddress, quantity);
}

export function parseReadCoilsRequest(pdu: Uint8Array): AddressQuantity {
  return parseAddressQuantityPdu(pdu, FUNCTION_CODE);
}

/**
 * Разбирает PDU-ответ; quantity берётся из исходного запроса
 */
export function parseReadCoilsResponse(pdu: Uint8Array, quantity: number): boolean[] {
  return parseBitsResponse(pdu, FUNCTION_CODE, quantity);
}

/** FC + byte count + данные */
export function readCoilsResponseLength(quantity: number): number {
  return 2 + Math.ceil(quantity / 8);
}
