// src/function-codes/read-input-registers.ts

import { MODBUS_LIMITS, ModbusFunctionCode } from '../constants/constants.js';
import {
  type AddressQuantity,
  buildAddressQuantityPdu,
  parseAddressQuantityPdu,
  parseRegistersResponse,
  validateAddress,
  validateQuantity,
} from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.READ_INPUT_REGISTERS;
const MAX_QUANTITY = MODBUS_LIMITS.MAX_READ_REGISTERS;

/**
 * Строит PDU-запрос для чтения входных регистров
 * @param startAddress - начальный адрес
 * @param quantity - количество (1-125)
 */
export function buildReadInputRegistersRequest(startAddress: number, quantity: number): Uint8Array {
  validateAddress(startAddress);
  validateQuantity(startAddress, quantity, MAX_QUANTITY);
  return buildAddressQuantityPdu(FUNCTION_CODE, startAddress, quantity);
}

export function parseReadInputRegistersRequest(pdu: Uint8Array): AddressQuantity {
  return parseAddressQuantityPdu(pdu, FUNCTION_CODE);
}

/**
 * Разбирает PDU-ответ с входными регистрами
 * @param pdu - FC + byte count + значения (BE)
 * @param quantity - количество регистров из исходного запроса
 */
export function parseReadInputRegistersResponse(pdu: Uint8Array, quantity: number): number[] {
  return parseRegistersResponse(pdu, FUNCTION_CODE, quantity);
}

/** FC + byte count + данные */
export function readInputRegistersResponseLength(quantity: number): number {
  return 2 + quantity * 2;
}
