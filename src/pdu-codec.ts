// src/pdu-codec.ts

import { EXCEPTION_BIT, ModbusFunctionCode } from './constants/constants.js';
import {
  ModbusExceptionError,
  ModbusInvalidFrameLengthError,
  ModbusMalformedFrameError,
  ModbusUnexpectedFunctionCodeError,
} from './errors.js';
import {
  buildReadCoilsRequest,
  parseReadCoilsRequest,
  parseReadCoilsResponse,
  readCoilsResponseLength,
} from './function-codes/read-coils.js';
import {
  buildReadDiscreteInputsRequest,
  parseReadDiscreteInputsRequest,
  parseReadDiscreteInputsResponse,
  readDiscreteInputsResponseLength,
} from './function-codes/read-discrete-inputs.js';
import {
  buildReadHoldingRegistersRequest,
  parseReadHoldingRegistersRequest,
  parseReadHoldingRegistersResponse,
  readHoldingRegistersResponseLength,
} from './function-codes/read-holding-registers.js';
import {
  buildReadInputRegistersRequest,
  parseReadInputRegistersRequest,
  parseReadInputRegistersResponse,
  readInputRegistersResponseLength,
} from './function-codes/read-input-registers.js';
import {
  buildWriteSingleCoilRequest,
  parseWriteSingleCoilRequest,
  parseWriteSingleCoilResponse,
} from './function-codes/write-single-coil.js';
import {
  buildWriteSingleRegisterRequest,
  parseWriteSingleRegisterRequest,
  parseWriteSingleRegisterResponse,
} from './function-codes/write-single-register.js';
import {
  buildWriteMultipleCoilsRequest,
  parseWriteMultipleCoilsRequest,
  parseWriteMultipleCoilsResponse,
  type MultipleWriteAck,
} from './function-codes/write-multiple-coils.js';
import {
  buildWriteMultipleRegistersRequest,
  parseWriteMultipleRegistersRequest,
  parseWriteMultipleRegistersResponse,
} from './function-codes/write-multiple-registers.js';
import {
  buildReadExceptionStatusRequest,
  parseReadExceptionStatusRequest,
  parseReadExceptionStatusResponse,
} from './function-codes/read-exception-status.js';
import {
  buildDiagnosticsRequest,
  diagnosticsResponseLength,
  parseDiagnosticsPdu,
} from './function-codes/diagnostics.js';
import type { ModbusRequest, ModbusResponse } from './types/modbus-types.js';

/** Size of a PDU carrying an exception: FC | 0x80 + exception code */
export const EXCEPTION_PDU_SIZE = 2;

/**
 * Encodes a request into a PDU. Bounds are validated first, so an invalid request
 * throws a ModbusEncodingError and never reaches the wire.
 */
export function encodeRequest(request: ModbusRequest): Uint8Array {
  switch (request.functionCode) {
    case ModbusFunctionCode.READ_COILS:
      return buildReadCoilsRequest(request.address, request.quantity);
    case ModbusFunctionCode.READ_DISCRETE_INPUTS:
      return buildReadDiscreteInputsRequest(request.address, request.quantity);
    case ModbusFunctionCode.READ_HOLDING_REGISTERS:
      return buildReadHoldingRegistersRequest(request.address, request.quantity);
    case ModbusFunctionCode.READ_INPUT_REGISTERS:
      return buildReadInputRegistersRequest(request.address, request.quantity);
    case ModbusFunctionCode.WRITE_SINGLE_COIL:
      return buildWriteSingleCoilRequest(request.address, request.value);
    case ModbusFunctionCode.WRITE_SINGLE_REGISTER:
      return buildWriteSingleRegisterRequest(request.address, request.value);
    case ModbusFunctionCode.WRITE_MULTIPLE_COILS:
      return buildWriteMultipleCoilsRequest(request.address, request.values);
    case ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS:
      return buildWriteMultipleRegistersRequest(request.address, request.values);
    case ModbusFunctionCode.READ_EXCEPTION_STATUS:
      return buildReadExceptionStatusRequest();
    case ModbusFunctionCode.DIAGNOSTICS:
      return buildDiagnosticsRequest(request.subFunction, request.data);
  }
}

function frozenCopy<T>(items: T[]): T[] {
  if (!Array.isArray(items)) return items;
  const copy = items.slice();
  Object.freeze(copy);
  return copy;
}

/**
 * Глубокая замороженная копия запроса: изменения массивов вызывающей стороны её не затрагивают
 */
export function freezeRequest(request: ModbusRequest): ModbusRequest {
  switch (request.functionCode) {
    case ModbusFunctionCode.WRITE_MULTIPLE_COILS:
      return Object.freeze({ ...request, values: frozenCopy(request.values) });
    case ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS:
      return Object.freeze({ ...request, values: frozenCopy(request.values) });
    case ModbusFunctionCode.DIAGNOSTICS:
      return Object.freeze({ ...request, data: frozenCopy(request.data) });
    default:
      return Object.freeze({ ...request });
  }
}

/**
 * Decodes a request PDU back into a request (without unit id).
 */
export function decodeRequest(pdu: Uint8Array): ModbusRequest {
  if (pdu.length === 0) throw new ModbusInvalidFrameLengthError(0, 1);
  const functionCode = pdu[0];

  switch (functionCode) {
    case ModbusFunctionCode.READ_COILS:
      return { functionCode: ModbusFunctionCode.READ_COILS, ...parseReadCoilsRequest(pdu) };
    case ModbusFunctionCode.READ_DISCRETE_INPUTS:
      return {
        functionCode: ModbusFunctionCode.READ_DISCRETE_INPUTS,
        ...parseReadDiscreteInputsRequest(pdu),
      };
    case ModbusFunctionCode.READ_HOLDING_REGISTERS:
      return {
        functionCode: ModbusFunctionCode.READ_HOLDING_REGISTERS,
        ...parseReadHoldingRegistersRequest(pdu),
      };
    case ModbusFunctionCode.READ_INPUT_REGISTERS:
      return {
        functionCode: ModbusFunctionCode.READ_INPUT_REGISTERS,
        ...parseReadInputRegistersRequest(pdu),
      };
    case ModbusFunctionCode.WRITE_SINGLE_COIL:
      return {
        functionCode: ModbusFunctionCode.WRITE_SINGLE_COIL,
        ...parseWriteSingleCoilRequest(pdu),
      };
    case ModbusFunctionCode.WRITE_SINGLE_REGISTER:
      return {
        functionCode: ModbusFunctionCode.WRITE_SINGLE_REGISTER,
        ...parseWriteSingleRegisterRequest(pdu),
      };
    case ModbusFunctionCode.WRITE_MULTIPLE_COILS:
      return {
        functionCode: ModbusFunctionCode.WRITE_MULTIPLE_COILS,
        ...parseWriteMultipleCoilsRequest(pdu),
      };
    case ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS:
      return {
        functionCode: ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS,
        ...parseWriteMultipleRegistersRequest(pdu),
      };
    case ModbusFunctionCode.READ_EXCEPTION_STATUS:
      parseReadExceptionStatusRequest(pdu);
      return { functionCode: ModbusFunctionCode.READ_EXCEPTION_STATUS };
    case ModbusFunctionCode.DIAGNOSTICS:
      return { functionCode: ModbusFunctionCode.DIAGNOSTICS, ...parseDiagnosticsPdu(pdu) };
    default:
      throw new ModbusMalformedFrameError(
        `Unsupported function code 0x${functionCode.toString(16)}`
      );
  }
}

function expectEcho(what: string, sent: number, received: number): void {
  if (sent !== received) {
    throw new ModbusMalformedFrameError(
      `Response ${what} ${received} does not echo request ${sent}`
    );
  }
}

function expectWriteAck(
  ack: MultipleWriteAck,
  request: { address: number; values: unknown[] }
): MultipleWriteAck {
  expectEcho('start address', request.address, ack.startAddress);
  expectEcho('quantity', request.values.length, ack.quantity);
  return ack;
}

/**
 * Decodes a response PDU against the request that produced it.
 * @throws ModbusExceptionError when the device answered with FC | 0x80
 * @throws ModbusUnexpectedFunctionCodeError on any other function code
 * @throws ModbusProtocolError subclasses on malformed payloads
 */
export function decodeResponse(request: ModbusRequest, pdu: Uint8Array): ModbusResponse {
  if (pdu.length === 0) throw new ModbusInvalidFrameLengthError(0, 1);
  const received = pdu[0];

  if (received === (request.functionCode | EXCEPTION_BIT)) {
    if (pdu.length !== EXCEPTION_PDU_SIZE) {
      throw new ModbusInvalidFrameLengthError(pdu.length, EXCEPTION_PDU_SIZE);
    }
    throw new ModbusExceptionError(request.functionCode, pdu[1]);
  }
  if (received !== request.functionCode) {
    throw new ModbusUnexpectedFunctionCodeError(request.functionCode, received);
  }

  switch (request.functionCode) {
    case ModbusFunctionCode.READ_COILS:
      return {
        functionCode: request.functionCode,
        values: parseReadCoilsResponse(pdu, request.quantity),
      };
    case ModbusFunctionCode.READ_DISCRETE_INPUTS:
      return {
        functionCode: request.functionCode,
        values: parseReadDiscreteInputsResponse(pdu, request.quantity),
      };
    case ModbusFunctionCode.READ_HOLDING_REGISTERS:
      return {
        functionCode: request.functionCode,
        values: parseReadHoldingRegistersResponse(pdu, request.quantity),
      };
    case ModbusFunctionCode.READ_INPUT_REGISTERS:
      return {
        functionCode: request.functionCode,
        values: parseReadInputRegistersResponse(pdu, request.quantity),
      };
    case ModbusFunctionCode.WRITE_SINGLE_COIL: {
      const echo = parseWriteSingleCoilResponse(pdu);
      expectEcho('address', request.address, echo.address);
      return { functionCode: request.functionCode, ...echo };
    }
    case ModbusFunctionCode.WRITE_SINGLE_REGISTER: {
      const echo = parseWriteSingleRegisterResponse(pdu);
      expectEcho('address', request.address, echo.address);
      return { functionCode: request.functionCode, ...echo };
    }
    case ModbusFunctionCode.WRITE_MULTIPLE_COILS:
      return {
        functionCode: request.functionCode,
        ...expectWriteAck(parseWriteMultipleCoilsResponse(pdu), request),
      };
    case ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS:
      return {
        functionCode: request.functionCode,
        ...expectWriteAck(parseWriteMultipleRegistersResponse(pdu), request),
      };
    case ModbusFunctionCode.READ_EXCEPTION_STATUS:
      return {
        functionCode: request.functionCode,
        status: parseReadExceptionStatusResponse(pdu),
      };
    case ModbusFunctionCode.DIAGNOSTICS: {
      const payload = parseDiagnosticsPdu(pdu);
      expectEcho('sub-function', request.subFunction, payload.subFunction);
      return { functionCode: request.functionCode, ...payload };
    }
  }
}

/**
 * Expected length of a normal (non-exception) response PDU for the request.
 */
export function expectedResponsePduLength(request: ModbusRequest): number {
  switch (request.functionCode) {
    case ModbusFunctionCode.READ_COILS:
      return readCoilsResponseLength(request.quantity);
    case ModbusFunctionCode.READ_DISCRETE_INPUTS:
      return readDiscreteInputsResponseLength(request.quantity);
    case ModbusFunctionCode.READ_HOLDING_REGISTERS:
      return readHoldingRegistersResponseLength(request.quantity);
    case ModbusFunctionCode.READ_INPUT_REGISTERS:
      return readInputRegistersResponseLength(request.quantity);
    case ModbusFunctionCode.WRITE_SINGLE_COIL:
    case ModbusFunctionCode.WRITE_SINGLE_REGISTER:
    case ModbusFunctionCode.WRITE_MULTIPLE_COILS:
    case ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS:
      return 5;
    case ModbusFunctionCode.READ_EXCEPTION_STATUS:
      return 2;
    case ModbusFunctionCode.DIAGNOSTICS:
      return diagnosticsResponseLength(request.data);
  }
}
