// src/client.ts

import { resolveRtuConfig, resolveTcpConfig } from './config.js';
import { ModbusFunctionCode } from './constants/constants.js';
import { ModbusEngine, type TransactionHandle } from './engine.js';
import { ModbusUnexpectedFunctionCodeError } from './errors.js';
import { RtuFramer } from './framers/rtu-framer.js';
import { TcpFramer } from './framers/tcp-framer.js';
import { logger } from './logger.js';
import { FlatDeadline } from './timing/deadline-policy.js';
import { RtuTimingModel } from './timing/rtu-timing.js';
import { ConnectionLifecycle } from './transport/connection-lifecycle.js';
import { createTransport } from './transport/factory.js';
import type {
  DiagnosticsResponse,
  DiagnosticsStats,
  ModbusRequest,
  ModbusResponse,
  ModbusRtuOptions,
  ModbusTcpOptions,
  RequestOptions,
  ResponseOf,
  Transport,
  WriteMultipleResponse,
  WriteSingleCoilResponse,
  WriteSingleRegisterResponse,
} from './types/modbus-types.js';

const log = logger.createLogger('ModbusClient');

/**
 * Сужает ответ до типа, соответствующего коду функции запроса
 */
export function isResponseTo<F extends ModbusFunctionCode>(
  response: ModbusResponse,
  functionCode: F
): response is ResponseOf<F> {
  return response.functionCode === functionCode;
}

function expectResponse<F extends ModbusFunctionCode>(
  response: ModbusResponse,
  functionCode: F
): ResponseOf<F> {
  const received = response.functionCode;
  if (!isResponseTo(response, functionCode)) {
    throw new ModbusUnexpectedFunctionCodeError(functionCode, received);
  }
  return response;
}

/**
 * Convenience methods over one engine. Every method is a single `submit` of the matching
 * request; bounds are checked by the codec before anything is written.
 */
export class ModbusClient {
  constructor(readonly engine: ModbusEngine) {}

  connect(): Promise<void> {
    return this.engine.connect();
  }

  close(): Promise<void> {
    return this.engine.close();
  }

  get isConnected(): boolean {
    return this.engine.lifecycle.isConnected;
  }

  submit(request: ModbusRequest, options: RequestOptions = {}): TransactionHandle {
    return this.engine.submit(this._withUnit(request, options), options);
  }

  async readCoils(
    address: number,
    quantity: number,
    options: RequestOptions = {}
  ): Promise<boolean[]> {
    const response = await this._send(
      { functionCode: ModbusFunctionCode.READ_COILS, address, quantity },
      options
    );
    return expectResponse(response, ModbusFunctionCode.READ_COILS).values;
  }

  async readDiscreteInputs(
    address: number,
    quantity: number,
    options: RequestOptions = {}
  ): Promise<boolean[]> {
    const response = await this._send(
      { functionCode: ModbusFunctionCode.READ_DISCRETE_INPUTS, address, quantity },
      options
    );
    return expectResponse(response, ModbusFunctionCode.READ_DISCRETE_INPUTS).values;
  }

  async readHoldingRegisters(
    address: number,
    quantity: number,
    options: RequestOptions = {}
  ): Promise<number[]> {
    const response = await this._send(
      { functionCode: ModbusFunctionCode.READ_HOLDING_REGISTERS, address, quantity },
      options
    );
    return expectResponse(response, ModbusFunctionCode.READ_HOLDING_REGISTERS).values;
  }

  async readInputRegisters(
    address: number,
    quantity: number,
    options: RequestOptions = {}
  ): Promise<number[]> {
    const response = await this._send(
      { functionCode: ModbusFunctionCode.READ_INPUT_REGISTERS, address, quantity },
      options
    );
    return expectResponse(response, ModbusFunctionCode.READ_INPUT_REGISTERS).values;
  }

  async writeSingleCoil(
    address: number,
    value: boolean,
    options: RequestOptions = {}
  ): Promise<WriteSingleCoilResponse> {
    const response = await this._send(
      { functionCode: ModbusFunctionCode.WRITE_SINGLE_COIL, address, value },
      options
    );
    return expectResponse(response, ModbusFunctionCode.WRITE_SINGLE_COIL);
  }

  async writeSingleRegister(
    address: number,
    value: number,
    options: RequestOptions = {}
  ): Promise<WriteSingleRegisterResponse> {
    const response = await this._send(
      { functionCode: ModbusFunctionCode.WRITE_SINGLE_REGISTER, address, value },
      options
    );
    return expectResponse(response, ModbusFunctionCode.WRITE_SINGLE_REGISTER);
  }

  async writeMultipleCoils(
    address: number,
    values: boolean[],
    options: RequestOptions = {}
  ): Promise<WriteMultipleResponse<ModbusFunctionCode.WRITE_MULTIPLE_COILS>> {
    const response = await this._send(
      { functionCode: ModbusFunctionCode.WRITE_MULTIPLE_COILS, address, values },
      options
    );
    return expectResponse(response, ModbusFunctionCode.WRITE_MULTIPLE_COILS);
  }

  async writeMultipleRegisters(
    address: number,
    values: number[],
    options: RequestOptions = {}
  ): Promise<WriteMultipleResponse<ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS>> {
    const response = await this._send(
      { functionCode: ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS, address, values },
      options
    );
    return expectResponse(response, ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS);
  }

  /** FC 0x07: eight exception status outputs as one byte */
  async readExceptionStatus(options: RequestOptions = {}): Promise<number> {
    const response = await this._send(
      { functionCode: ModbusFunctionCode.READ_EXCEPTION_STATUS },
      options
    );
    return expectResponse(response, ModbusFunctionCode.READ_EXCEPTION_STATUS).status;
  }

  /** FC 0x08. Sub-function 0x0000 (return query data) echoes `data` back. */
  async diagnostics(
    subFunction: number,
    data: number[] = [],
    options: RequestOptions = {}
  ): Promise<DiagnosticsResponse> {
    const response = await this._send(
      { functionCode: ModbusFunctionCode.DIAGNOSTICS, subFunction, data },
      options
    );
    return expectResponse(response, ModbusFunctionCode.DIAGNOSTICS);
  }

  getDiagnostics(): DiagnosticsStats {
    return this.engine.diagnostics.getStats();
  }

  resetDiagnostics(): void {
    this.engine.diagnostics.reset();
  }

  private _send(request: ModbusRequest, options: RequestOptions): Promise<ModbusResponse> {
    return this.engine.request(this._withUnit(request, options), options);
  }

  private _withUnit(request: ModbusRequest, options: RequestOptions): ModbusRequest {
    return options.unitId === undefined ? request : { ...request, unitId: options.unitId };
  }
}

/**
 * Собирает клиент Modbus TCP. Соединение не открывается: вызовите `connect()`.
 * @param transport - replaces the socket transport (tests, custom links)
 */
export async function createTcpClient(
  options: ModbusTcpOptions,
  transport?: Transport
): Promise<ModbusClient> {
  const config = resolveTcpConfig(options);
  const link =
    transport ??
    (await createTransport({
      type: 'tcp',
      host: config.host,
      port: config.port,
      connectTimeout: config.connectTimeout,
      localPort: config.localPort ?? undefined,
    }));

  const lifecycle = new ConnectionLifecycle(link, config);
  const deadlines = new FlatDeadline(config.timeout);
  const engine = new ModbusEngine(lifecycle, new TcpFramer(), deadlines, config);
  log.debug(`TCP client created for ${link.description}`);
  return new ModbusClient(engine);
}

/**
 * Собирает клиент Modbus RTU поверх последовательного порта.
 * @param transport - replaces the serial port transport (tests, custom links)
 */
export async function createRtuClient(
  options: ModbusRtuOptions,
  transport?: Transport
): Promise<ModbusClient> {
  const config = resolveRtuConfig(options);
  const timing = new RtuTimingModel(config, config.timeout);
  const link =
    transport ??
    (await createTransport({
      type: 'rtu',
      path: config.path,
      baudRate: config.baudRate,
      dataBits: config.dataBits,
      stopBits: config.stopBits,
      parity: config.parity,
    }));

  const lifecycle = new ConnectionLifecycle(link, config);
  const framer = new RtuFramer(timing.frameSilence(config.frameSilence));
  const engine = new ModbusEngine(lifecycle, framer, timing, config);
  log.debug(`RTU client created for ${link.description}`, {
    frameSilence: timing.frameSilence(config.frameSilence),
  });
  return new ModbusClient(engine);
}

export default ModbusClient;
