// src/engine.ts

import { validateSubmitOptions } from './config.js';
import { logger } from './logger.js';
import { encodeRequest, freezeRequest } from './pdu-codec.js';
import {
  isRetryableError,
  ModbusCancelledError,
  ModbusConnectionError,
  ModbusConnectionLostError,
  ModbusError,
  ModbusInvalidUnitIdError,
  toConnectionError,
} from './errors.js';
import type { ModbusFramer } from './framers/modbus-framer.js';
import type { DeadlinePolicy } from './timing/deadline-policy.js';
import { ConcurrencyGate } from './transaction/concurrency-gate.js';
import { TransactionManager, type Transaction } from './transaction/transaction-manager.js';
import type { ConnectionLifecycle } from './transport/connection-lifecycle.js';
import {
  ConnectionErrorType,
  ConnectionState,
  TransactionState,
  type DecodedFrame,
  type EngineConfig,
  type ModbusRequest,
  type ModbusResponse,
  type SubmitOptions,
  type TransactionOutcome,
} from './types/modbus-types.js';
import { Diagnostics } from './utils/diagnostics.js';
import { delay, toCancelledError, toHex, withAbort } from './utils/utils.js';

const log = logger.createLogger('ModbusEngine');

/**
 * A submitted request. `result` rejects on failure; `settle()` never rejects.
 */
export interface TransactionHandle {
  readonly id: number;
  readonly request: Readonly<ModbusRequest>;
  readonly state: TransactionState;
  readonly result: Promise<ModbusResponse>;
  settle(): Promise<TransactionOutcome>;
  /** Abandons the request. Bytes already written stay on the wire. */
  cancel(reason?: string): void;
}

/** Слот гейта, который освобождается после `hold`, если тот задан */
interface LineLease {
  hold: Promise<void> | null;
}

function toModbusError(err: unknown): ModbusError {
  if (err instanceof ModbusError) return err;
  return new ModbusError(err instanceof Error ? err.message : String(err));
}

class SubmittedTransaction implements TransactionHandle {
  private _state: TransactionState = TransactionState.Pending;
  private _result: Promise<ModbusResponse> | null = null;

  constructor(
    readonly id: number,
    readonly request: Readonly<ModbusRequest>,
    private readonly _outcome: Promise<TransactionOutcome>,
    private readonly _controller: AbortController
  ) {
    void _outcome.then(outcome => {
      if (outcome.ok) this._state = TransactionState.Resolved;
      else if (outcome.error instanceof ModbusCancelledError) this._state = TransactionState.Cancelled;
      else this._state = TransactionState.Failed;
    });
  }

  get state(): TransactionState {
    return this._state;
  }

  // Создаётся лениво: отклонённый промис, на который никто не подписан, считается необработанным
  get result(): Promise<ModbusResponse> {
    this._result ??= this._outcome.then(outcome => {
      if (outcome.ok) return outcome.response;
      throw outcome.error;
    });
    return this._result;
  }

  settle(): Promise<TransactionOutcome> {
    return this._outcome;
  }

  cancel(reason?: string): void {
    if (this._state !== TransactionState.Pending || this._controller.signal.aborted) return;
    this._controller.abort(new ModbusCancelledError(reason));
  }
}

/**
 * Движок транзакций одного соединения: кодирование, корреляция ответов, дедлайны,
 * повторы и ограничение числа запросов в полёте.
 */
export class ModbusEngine {
  readonly diagnostics: Diagnostics;

  private readonly _manager = new TransactionManager();
  private readonly _gate: ConcurrencyGate;
  private _handleSeq = 0;
  private _rtuSeq = 0;
  /** RTU: keys of cancelled transactions whose reply may still arrive */
  private readonly _draining = new Set<number>();

  constructor(
    readonly lifecycle: ConnectionLifecycle,
    readonly framer: ModbusFramer,
    readonly deadlines: DeadlinePolicy,
    readonly config: EngineConfig
  ) {
    // RTU: полудуплексная линия, строго один запрос за раз
    this._gate = new ConcurrencyGate(framer.correlated ? config.maxActiveRequests : 1);
    this.diagnostics = new Diagnostics(`Diagnostics:${lifecycle.transport.description}`);

    lifecycle.setDataHandler(chunk => {
      this.diagnostics.recordDataReceived(chunk.length);
      framer.feed(chunk);
    });
    lifecycle.setStateHandler((state, previous, error) => {
      if (previous === ConnectionState.Connected && state === ConnectionState.Disconnected) {
        this._onConnectionLost(error);
      }
    });
    framer.setFrameHandler(frame => this._onFrame(frame));
    framer.setDiscardHandler((reason, bytes) => {
      this.diagnostics.recordDiscard();
      log.warn(`Frame discarded: ${reason} [${toHex(bytes, ' ')}]`);
    });
    this._manager.setSettledHandler((tx, outcome, elapsed) => {
      if (!outcome.ok) return;
      this.diagnostics.recordSuccess(elapsed);
      log.debug('Response received', {
        transactionId: tx.key,
        unitId: tx.unitId,
        funcCode: tx.request.functionCode,
        responseTime: elapsed,
      });
    });
  }

  /** Transactions waiting for a response */
  get outstanding(): number {
    return this._manager.size;
  }

  get activeRequests(): number {
    return this._gate.active;
  }

  get waitingRequests(): number {
    return this._gate.waiting;
  }

  connect(): Promise<void> {
    return this.lifecycle.connect();
  }

  close(): Promise<void> {
    return this.lifecycle.close();
  }

  /**
   * Submits a request and returns its handle right away.
   */
  submit(input: ModbusRequest, options: SubmitOptions = {}): TransactionHandle {
    const id = ++this._handleSeq;
    const request = freezeRequest(input);
    const controller = new AbortController();
    const external = options.signal;
    const onExternalAbort = (): void => controller.abort(toCancelledError(external?.reason));
    if (external?.aborted) onExternalAbort();
    else external?.addEventListener('abort', onExternalAbort, { once: true });

    const unitId = request.unitId ?? this.config.defaultUnitId;
    const outcome = this._execute(request, unitId, options, controller.signal).then(
      (response): TransactionOutcome => ({ ok: true, response }),
      (err: unknown): TransactionOutcome => {
        const error = toModbusError(err);
        this.diagnostics.recordError(error, unitId, request.functionCode);
        log.debug(`Transaction ${id} failed: ${error.message}`, {
          unitId,
          funcCode: request.functionCode,
        });
        return { ok: false, error };
      }
    );
    void outcome.finally(() => external?.removeEventListener('abort', onExternalAbort));

    return new SubmittedTransaction(id, request, outcome, controller);
  }

  request(request: ModbusRequest, options: SubmitOptions = {}): Promise<ModbusResponse> {
    return this.submit(request, options).result;
  }

  cancel(handle: TransactionHandle, reason?: string): void {
    handle.cancel(reason);
  }

  private async _execute(
    request: ModbusRequest,
    unitId: number,
    options: SubmitOptions,
    signal: AbortSignal
  ): Promise<ModbusResponse> {
    this.diagnostics.recordRequest(unitId, request.functionCode);
    if (!Number.isInteger(unitId) || unitId < 0 || unitId > 255) {
      throw new ModbusInvalidUnitIdError(unitId);
    }
    validateSubmitOptions(options);
    const pdu = encodeRequest(request);
    const retries = options.retries ?? this.config.retries;

    const release = await this._gate.acquire(signal);
    const lease: LineLease = { hold: null };
    try {
      for (let attempt = 0; ; attempt++) {
        try {
          return await this._attempt(request, unitId, pdu, attempt, options.timeout, signal, lease);
        } catch (err: unknown) {
          if (attempt >= retries || !isRetryableError(err) || signal.aborted) throw err;
          this.diagnostics.recordRetry(attempt + 1, unitId, request.functionCode);
          log.warn(
            `${err instanceof Error ? err.message : String(err)}; retry ${attempt + 1}/${retries}`,
            { unitId, funcCode: request.functionCode }
          );
          if (this.config.retryDelay > 0) await delay(this.config.retryDelay, signal);
        }
      }
    } finally {
      if (lease.hold) void lease.hold.then(release);
      else release();
    }
  }

  private async _attempt(
    request: ModbusRequest,
    unitId: number,
    pdu: Uint8Array,
    attempt: number,
    timeoutOverride: number | undefined,
    signal: AbortSignal,
    lease: LineLease
  ): Promise<ModbusResponse> {
    await withAbort(this.lifecycle.waitUntilConnected(), signal);

    if (!this.framer.correlated) {
      this.framer.reset();
      await this.lifecycle.flush();
    }
    if (signal.aborted) throw toCancelledError(signal.reason);

    const { adu, transactionId } = this.framer.buildAdu(unitId, pdu, id => this._manager.has(id));
    const key = transactionId ?? this._nextRtuKey();
    const timeout = this.deadlines.timeoutFor(request, adu.length, timeoutOverride);
    const outcome = this._manager.register({
      key,
      request,
      unitId,
      attempt,
      timeout: this.deadlines.armAfterWrite ? null : timeout,
    });

    let written = false;
    const onAbort = (): void => {
      const cancelled = this._manager.get(key);
      this._manager.cancel(key, toCancelledError(signal.reason));
      // Полудуплекс: ответ на уже отправленный запрос ещё может прийти, линия остаётся занятой
      if (cancelled && written && !this.framer.correlated) {
        lease.hold = this._holdLine(cancelled);
      }
    };
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      log.trace(`TX ${toHex(adu, ' ')}`, { transactionId: key, unitId });
      try {
        written = true;
        await this.lifecycle.write(adu);
        this.diagnostics.recordDataSent(adu.length);
        if (this.deadlines.armAfterWrite) this._manager.arm(key, timeout);
      } catch (err: unknown) {
        this._manager.fail(key, toConnectionError(err, 'Write failed'));
      }

      const result = await outcome;
      if (!result.ok) throw result.error;
      return result.response;
    } finally {
      signal.removeEventListener('abort', onAbort);
      const silence = this.deadlines.settleDelay();
      if (silence > 0 && !lease.hold) await delay(silence);
    }
  }

  /**
   * Keeps a cancelled RTU transaction's slot until its reply arrives or its deadline
   * passes, then waits out the inter-frame gap.
   */
  private _holdLine(cancelled: Transaction): Promise<void> {
    const { key } = cancelled;
    const remaining =
      cancelled.deadline === null ? null : Math.max(0, cancelled.deadline - Date.now());
    this._draining.add(key);
    log.debug('Line held for a late response to a cancelled transaction', {
      transactionId: key,
      unitId: cancelled.unitId,
    });
    // Не армированная заглушка получит дедлайн после записи, как и сама транзакция
    const absorbed = this._manager.register({
      key,
      request: cancelled.request,
      unitId: cancelled.unitId,
      attempt: cancelled.attempt,
      timeout: remaining,
    });
    return absorbed.then(() => {
      this._draining.delete(key);
      return delay(this.deadlines.settleDelay());
    });
  }

  private _nextRtuKey(): number {
    this._rtuSeq = (this._rtuSeq + 1) % 0x100000000;
    return this._rtuSeq;
  }

  private _onFrame(frame: DecodedFrame): void {
    const key = frame.transactionId ?? this._manager.sole()?.key;
    const tx = key === undefined ? undefined : this._manager.get(key);
    if (key === undefined || !tx) {
      this.diagnostics.recordDiscard();
      log.warn('Unmatched response discarded', {
        transactionId: frame.transactionId ?? undefined,
        unitId: frame.unitId,
      });
      return;
    }

    if (tx.unitId !== frame.unitId) {
      if (!this.framer.correlated) {
        this.diagnostics.recordDiscard();
        log.warn(`Response from unit ${frame.unitId} discarded`, { unitId: tx.unitId });
        return;
      }
      log.warn(`Unit id mismatch: sent ${tx.unitId}, received ${frame.unitId}`, {
        transactionId: key,
      });
    }
    if (this._draining.has(key)) {
      this.diagnostics.recordDiscard();
      log.warn('Late response to a cancelled transaction discarded', { unitId: frame.unitId });
      this._manager.cancel(key);
      return;
    }
    this._manager.deliver(key, frame.pdu);
  }

  private _onConnectionLost(error: Error | undefined): void {
    const lost =
      error instanceof ModbusConnectionError
        ? error
        : new ModbusConnectionLostError(ConnectionErrorType.ConnectionLost, 'Connection lost');
    this.framer.reset();
    const failed = this._manager.failAll(lost);
    if (failed > 0) {
      log.warn(`${failed} outstanding transaction(s) failed: ${lost.message}`, {
        transport: this.lifecycle.transport.description,
      });
    }
  }
}

export default ModbusEngine;
