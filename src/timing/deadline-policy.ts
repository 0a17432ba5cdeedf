// src/timing/deadline-policy.ts

import type { ModbusRequest } from '../types/modbus-types.js';

/**
 * How long a transaction may wait for its response, and what the line needs between transactions.
 */
export interface DeadlinePolicy {
  /** RTU: deadline starts once the request has been written out. TCP: at registration. */
  readonly armAfterWrite: boolean;

  /**
   * @param request - the request being sent
   * @param requestAduLength - encoded frame length in bytes
   * @param override - caller override of the configured timeout
   */
  timeoutFor(request: ModbusRequest, requestAduLength: number, override?: number): number;

  /** Silence (ms) the line needs after a transaction before the next request. */
  settleDelay(): number;
}

/**
 * TCP: flat configured timeout, no inter-frame silence
 */
export class FlatDeadline implements DeadlinePolicy {
  readonly armAfterWrite = false;

  constructor(private readonly defaultTimeout: number) {}

  timeoutFor(_request: ModbusRequest, _requestAduLength: number, override?: number): number {
    return override ?? this.defaultTimeout;
  }

  settleDelay(): number {
    return 0;
  }
}
