// src/utils/diagnostics.ts

import { logger } from '../logger.js';
import {
  ModbusCancelledError,
  ModbusConnectionError,
  ModbusExceptionError,
  ModbusTimeoutError,
} from '../errors.js';
import type { DiagnosticsStats, LoggerInstance } from '../types/modbus-types.js';

/**
 * Class that collects statistics about Modbus communication on one connection.
 */
export class Diagnostics {
  private readonly logger: LoggerInstance;
  private startTime: number = Date.now();
  private totalRequests: number = 0;
  private successfulResponses: number = 0;
  private exceptionResponses: number = 0;
  private timeouts: number = 0;
  private totalRetries: number = 0;
  private cancellations: number = 0;
  private connectionErrors: number = 0;
  private otherErrors: number = 0;
  private discardedFrames: number = 0;
  private exceptionCodeCounts: Record<number, number> = {};
  private lastResponseTime: number | null = null;
  private minResponseTime: number | null = null;
  private maxResponseTime: number | null = null;
  private _totalResponseTime: number = 0;
  private totalDataSent: number = 0;
  private totalDataReceived: number = 0;
  private lastErrorMessage: string | null = null;

  constructor(loggerName: string = 'Diagnostics') {
    this.logger = logger.createLogger(loggerName);
  }

  /**
   * Resets all statistics and counters to their initial state.
   */
  reset(): void {
    this.startTime = Date.now();
    this.totalRequests = 0;
    this.successfulResponses = 0;
    this.exceptionResponses = 0;
    this.timeouts = 0;
    this.totalRetries = 0;
    this.cancellations = 0;
    this.connectionErrors = 0;
    this.otherErrors = 0;
    this.discardedFrames = 0;
    this.exceptionCodeCounts = {};
    this.lastResponseTime = null;
    this.minResponseTime = null;
    this.maxResponseTime = null;
    this._totalResponseTime = 0;
    this.totalDataSent = 0;
    this.totalDataReceived = 0;
    this.lastErrorMessage = null;
  }

  recordRequest(unitId: number, funcCode: number): void {
    this.totalRequests++;
    this.logger.trace('Request submitted', { unitId, funcCode });
  }

  recordRetry(attempt: number, unitId: number, funcCode: number): void {
    this.totalRetries++;
    this.logger.debug(`Retry attempt #${attempt}`, { unitId, funcCode });
  }

  /**
   * @param responseTimeMs - from the request write to the matched response
   */
  recordSuccess(responseTimeMs: number): void {
    this.successfulResponses++;
    this.lastResponseTime = responseTimeMs;
    this.minResponseTime =
      this.minResponseTime == null
        ? responseTimeMs
        : Math.min(this.minResponseTime, responseTimeMs);
    this.maxResponseTime =
      this.maxResponseTime == null
        ? responseTimeMs
        : Math.max(this.maxResponseTime, responseTimeMs);
    this._totalResponseTime += responseTimeMs;
  }

  /**
   * Classifies a failed request by its error type.
   */
  recordError(error: Error, unitId?: number, funcCode?: number): void {
    this.lastErrorMessage = error.message;

    if (error instanceof ModbusExceptionError) {
      this.exceptionResponses++;
      this.exceptionCodeCounts[error.exceptionCode] =
        (this.exceptionCodeCounts[error.exceptionCode] ?? 0) + 1;
    } else if (error instanceof ModbusTimeoutError) {
      this.timeouts++;
    } else if (error instanceof ModbusCancelledError) {
      this.cancellations++;
    } else if (error instanceof ModbusConnectionError) {
      this.connectionErrors++;
    } else {
      this.otherErrors++;
    }

    this.logger.debug(error.message, {
      unitId,
      funcCode,
      exceptionCode: error instanceof ModbusExceptionError ? error.exceptionCode : undefined,
    });
  }

  recordDiscard(): void {
    this.discardedFrames++;
  }

  recordDataSent(byteLength: number): void {
    this.totalDataSent += byteLength;
  }

  recordDataReceived(byteLength: number): void {
    this.totalDataReceived += byteLength;
  }

  /**
   * Returns the average response time in milliseconds for successful responses.
   */
  get averageResponseTime(): number | null {
    return this.successfulResponses === 0
      ? null
      : this._totalResponseTime / this.successfulResponses;
  }

  getStats(): DiagnosticsStats {
    return {
      uptimeSeconds: Math.floor((Date.now() - this.startTime) / 1000),
      totalRequests: this.totalRequests,
      successfulResponses: this.successfulResponses,
      exceptionResponses: this.exceptionResponses,
      timeouts: this.timeouts,
      retries: this.totalRetries,
      cancellations: this.cancellations,
      connectionErrors: this.connectionErrors,
      otherErrors: this.otherErrors,
      discardedFrames: this.discardedFrames,
      bytesSent: this.totalDataSent,
      bytesReceived: this.totalDataReceived,
      lastResponseTime: this.lastResponseTime,
      minResponseTime: this.minResponseTime,
      maxResponseTime: this.maxResponseTime,
      averageResponseTime: this.averageResponseTime,
      exceptionCodeCounts: { ...this.exceptionCodeCounts },
      lastError: this.lastErrorMessage,
    };
  }
}

export default Diagnostics;
