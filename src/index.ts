// src/index.ts

export { ModbusClient, createRtuClient, createTcpClient, isResponseTo } from './client.js';
export { ModbusEngine, type TransactionHandle } from './engine.js';
export { resolveRtuConfig, resolveTcpConfig, RTU_DEFAULTS, TCP_DEFAULTS } from './config.js';
export * from './constants/constants.js';
export * from './errors.js';
export * from './types/modbus-types.js';
export { Logger, logger } from './logger.js';
export {
  decodeRequest,
  decodeResponse,
  encodeRequest,
  expectedResponsePduLength,
} from './pdu-codec.js';
export { type ModbusFramer } from './framers/modbus-framer.js';
export { TcpFramer } from './framers/tcp-framer.js';
export { RtuFramer, rtuResponseFrameLength } from './framers/rtu-framer.js';
export { FlatDeadline, type DeadlinePolicy } from './timing/deadline-policy.js';
export { RtuTimingModel, bitsPerCharacter } from './timing/rtu-timing.js';
export { TransactionManager, type Transaction } from './transaction/transaction-manager.js';
export { ConcurrencyGate, type GateRelease } from './transaction/concurrency-gate.js';
export { ConnectionLifecycle } from './transport/connection-lifecycle.js';
export { createTransport, type TransportOptions } from './transport/factory.js';
export { NodeTcpTransport } from './transport/node-transports/node-tcp-transport.js';
export { Diagnostics } from './utils/diagnostics.js';
export { crc16Modbus, crc16ModbusValue, verifyCrc16Modbus } from './utils/crc.js';
