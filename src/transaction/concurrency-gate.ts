// src/transaction/concurrency-gate.ts

import { Semaphore } from 'async-mutex';
import { ModbusConfigError } from '../errors.js';
import { logger } from '../logger.js';
import { toCancelledError } from '../utils/utils.js';

const log = logger.createLogger('ConcurrencyGate');

/** Returns the slot. Calling it more than once has no effect. */
export type GateRelease = () => void;

/**
 * Ограничивает число одновременно выполняемых запросов на соединении.
 * Ожидающие получают слот в порядке очереди (FIFO).
 */
export class ConcurrencyGate {
  private readonly _semaphore: Semaphore | null;
  private _active = 0;
  private _waiting = 0;

  /**
   * @param limit - max requests in flight, null for unbounded
   */
  constructor(readonly limit: number | null) {
    if (limit !== null && (!Number.isInteger(limit) || limit < 1)) {
      throw new ModbusConfigError(`Invalid concurrency limit: ${limit}`);
    }
    this._semaphore = limit === null ? null : new Semaphore(limit);
  }

  get active(): number {
    return this._active;
  }

  get waiting(): number {
    return this._waiting;
  }

  /**
   * Waits for a free slot. If the signal fires first the wait is abandoned, and a slot granted
   * afterwards goes straight back to the next waiter.
   */
  acquire(signal?: AbortSignal): Promise<GateRelease> {
    if (signal?.aborted) return Promise.reject(toCancelledError(signal.reason));
    const semaphore = this._semaphore;
    if (!semaphore) return Promise.resolve(this._grant(() => undefined));

    this._waiting++;
    return new Promise<GateRelease>((resolve, reject) => {
      let done = false;

      const onAbort = (): void => {
        if (done) return;
        done = true;
        this._waiting--;
        reject(toCancelledError(signal?.reason));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      semaphore.acquire().then(
        ([, release]) => {
          signal?.removeEventListener('abort', onAbort);
          if (done) {
            release();
            return;
          }
          done = true;
          this._waiting--;
          resolve(this._grant(release));
        },
        (err: unknown) => {
          signal?.removeEventListener('abort', onAbort);
          log.warn(`Slot wait rejected: ${err instanceof Error ? err.message : String(err)}`);
          if (done) return;
          done = true;
          this._waiting--;
          reject(err);
        }
      );
    });
  }

  private _grant(release: () => void): GateRelease {
    this._active++;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this._active--;
      release();
    };
  }
}
