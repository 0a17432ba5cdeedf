// src/transport/factory.ts

import { logger as rootLogger } from '../logger.js';
import type {
  NodeSerialTransportOptions,
  NodeTcpTransportOptions,
  Transport,
} from '../types/modbus-types.js';

const logger = rootLogger.createLogger('TransportFactory');

export type TransportOptions =
  | ({ type: 'tcp'; host: string; port: number } & NodeTcpTransportOptions)
  | ({ type: 'rtu'; path: string } & NodeSerialTransportOptions);

/**
 * Creates a new transport instance for the given type and options.
 *
 * The serial transport is loaded on demand, so TCP-only programs never load the native
 * serialport bindings.
 */
export async function createTransport(options: TransportOptions): Promise<Transport> {
  switch (options.type) {
    case 'tcp': {
      const { NodeTcpTransport } = await import('./node-transports/node-tcp-transport.js');
      logger.debug(`Creating TCP transport for ${options.host}:${options.port}`);
      return new NodeTcpTransport(options.host, options.port, {
        connectTimeout: options.connectTimeout,
        localPort: options.localPort,
        noDelay: options.noDelay,
      });
    }

    case 'rtu': {
      const { NodeSerialTransport } = await import('./node-transports/node-serialport.js');
      logger.debug(`Creating serial transport for ${options.path}`);
      return new NodeSerialTransport(options.path, {
        baudRate: options.baudRate,
        dataBits: options.dataBits,
        stopBits: options.stopBits,
        parity: options.parity,
      });
    }
  }
}
