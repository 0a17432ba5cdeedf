// src/transaction/transaction-manager.ts

import { logger } from '../logger.js';
import { decodeResponse } from '../pdu-codec.js';
import {
  ModbusCancelledError,
  ModbusError,
  ModbusProtocolError,
  ModbusTimeoutError,
} from '../errors.js';
import {
  TransactionState,
  type ModbusRequest,
  type TransactionOutcome,
} from '../types/modbus-types.js';

const log = logger.createLogger('TransactionManager');

export interface Transaction {
  /** TCP transaction id, or a local sequence number on RTU */
  readonly key: number;
  readonly request: Readonly<ModbusRequest>;
  readonly unitId: number;
  readonly attempt: number;
  readonly registeredAt: number;
  readonly deadline: number | null;
  readonly state: TransactionState;
}

export interface RegisterOptions {
  key: number;
  request: Readonly<ModbusRequest>;
  unitId: number;
  attempt?: number;
  /** ms from now; null leaves the transaction unarmed until `arm()` */
  timeout: number | null;
}

export type SettledHandler = (
  transaction: Transaction,
  outcome: TransactionOutcome,
  elapsed: number
) => void;

class PendingTransaction implements Transaction {
  state: TransactionState = TransactionState.Pending;
  deadline: number | null = null;
  timeout: number | null = null;
  readonly registeredAt = Date.now();

  constructor(
    readonly key: number,
    readonly request: Readonly<ModbusRequest>,
    readonly unitId: number,
    readonly attempt: number,
    readonly settle: (outcome: TransactionOutcome) => void
  ) {}
}

function toModbusError(err: unknown): ModbusError {
  if (err instanceof ModbusError) return err;
  return new ModbusProtocolError(err instanceof Error ? err.message : String(err));
}

/**
 * Карта незавершённых транзакций соединения.
 *
 * Один таймер на соединение следит за ближайшим дедлайном. Каждая транзакция завершается
 * ровно один раз: ответом, ошибкой, таймаутом или отменой.
 */
export class TransactionManager {
  private readonly _outstanding = new Map<number, PendingTransaction>();
  private _timer: NodeJS.Timeout | null = null;
  private _timerAt: number | null = null;
  private _settledHandler: SettledHandler | null = null;

  get size(): number {
    return this._outstanding.size;
  }

  has(key: number): boolean {
    return this._outstanding.has(key);
  }

  get(key: number): Transaction | undefined {
    return this._outstanding.get(key);
  }

  /**
   * The only outstanding transaction, if exactly one exists (RTU correlation).
   */
  sole(): Transaction | undefined {
    if (this._outstanding.size !== 1) return undefined;
    for (const tx of this._outstanding.values()) return tx;
    return undefined;
  }

  setSettledHandler(handler: SettledHandler): void {
    this._settledHandler = handler;
  }

  /**
   * Регистрирует транзакцию. Возвращаемый промис никогда не отклоняется:
   * результат или ошибка приходят как TransactionOutcome.
   */
  register(options: RegisterOptions): Promise<TransactionOutcome> {
    if (this._outstanding.has(options.key)) {
      throw new ModbusError(`Correlation key ${options.key} is already outstanding`);
    }

    return new Promise<TransactionOutcome>(resolve => {
      const tx = new PendingTransaction(
        options.key,
        options.request,
        options.unitId,
        options.attempt ?? 0,
        resolve
      );
      this._outstanding.set(tx.key, tx);
      log.trace('Transaction registered', {
        transactionId: tx.key,
        unitId: tx.unitId,
        funcCode: tx.request.functionCode,
      });
      if (options.timeout !== null) this.arm(tx.key, options.timeout);
    });
  }

  /**
   * Starts (or restarts) the deadline of an outstanding transaction.
   */
  arm(key: number, timeout: number): boolean {
    const tx = this._outstanding.get(key);
    if (!tx) return false;
    tx.timeout = timeout;
    tx.deadline = Date.now() + timeout;
    this._schedule();
    return true;
  }

  /**
   * Delivers a response PDU. Returns false when no transaction owns the key.
   */
  deliver(key: number, pdu: Uint8Array): boolean {
    const tx = this._take(key);
    if (!tx) return false;

    let outcome: TransactionOutcome;
    try {
      outcome = { ok: true, response: decodeResponse(tx.request, pdu) };
    } catch (err: unknown) {
      outcome = { ok: false, error: toModbusError(err) };
    }
    this._settle(tx, outcome.ok ? TransactionState.Resolved : TransactionState.Failed, outcome);
    return true;
  }

  fail(key: number, error: ModbusError): boolean {
    const tx = this._take(key);
    if (!tx) return false;
    this._settle(tx, TransactionState.Failed, { ok: false, error });
    return true;
  }

  cancel(key: number, error: ModbusCancelledError = new ModbusCancelledError()): boolean {
    const tx = this._take(key);
    if (!tx) return false;
    this._settle(tx, TransactionState.Cancelled, { ok: false, error });
    return true;
  }

  /**
   * Fails every outstanding transaction with the same error (connection loss).
   * @returns number of transactions failed
   */
  failAll(error: ModbusError): number {
    const all = [...this._outstanding.values()];
    this._outstanding.clear();
    this._schedule();
    for (const tx of all) {
      this._settle(tx, TransactionState.Failed, { ok: false, error });
    }
    return all.length;
  }

  private _take(key: number): PendingTransaction | undefined {
    const tx = this._outstanding.get(key);
    if (!tx) return undefined;
    this._outstanding.delete(key);
    this._schedule();
    return tx;
  }

  private _settle(
    tx: PendingTransaction,
    state: TransactionState,
    outcome: TransactionOutcome
  ): void {
    tx.state = state;
    tx.settle(outcome);
    this._settledHandler?.(tx, outcome, Date.now() - tx.registeredAt);
  }

  /**
   * Re-arms the single timer for the earliest deadline.
   */
  private _schedule(): void {
    let earliest: number | null = null;
    for (const tx of this._outstanding.values()) {
      if (tx.deadline !== null && (earliest === null || tx.deadline < earliest)) {
        earliest = tx.deadline;
      }
    }

    if (earliest === this._timerAt) return;

    if (this._timer) {
      clearTimeout(this._timer);
      this._timer = null;
    }
    this._timerAt = earliest;
    if (earliest === null) return;

    const wait = Math.max(0, Math.ceil(earliest - Date.now()));
    this._timer = setTimeout(() => this._expire(), wait);
  }

  private _expire(): void {
    this._timer = null;
    this._timerAt = null;

    const now = Date.now();
    const expired: PendingTransaction[] = [];
    for (const tx of this._outstanding.values()) {
      if (tx.deadline !== null && tx.deadline <= now) expired.push(tx);
    }
    for (const tx of expired) this._outstanding.delete(tx.key);
    this._schedule();

    for (const tx of expired) {
      log.warn('Transaction timed out', {
        transactionId: tx.key,
        unitId: tx.unitId,
        funcCode: tx.request.functionCode,
      });
      this._settle(tx, TransactionState.Failed, {
        ok: false,
        error: new ModbusTimeoutError(
          `No response within ${Math.round(tx.timeout ?? 0)} ms (transaction ${tx.key})`
        ),
      });
    }
  }
}
