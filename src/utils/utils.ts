// src/utils/utils.ts

import { ModbusCancelledError } from '../errors.js';

const HEX_TABLE = '0123456789abcdef';

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Converts a Uint8Array to a hex string (lookup table).
 * @param uint8arr - bytes to render
 * @param separator - placed between bytes, none by default
 */
export function toHex(uint8arr: Uint8Array, separator: string = ''): string {
  const out: string[] = [];
  for (const b of uint8arr) {
    out.push(HEX_TABLE.charAt((b >> 4) & 0xf) + HEX_TABLE.charAt(b & 0xf));
  }
  return out.join(separator);
}

/**
 * Приводит причину отмены AbortSignal к ModbusCancelledError
 */
export function toCancelledError(reason: unknown): ModbusCancelledError {
  if (reason instanceof ModbusCancelledError) return reason;
  if (reason instanceof Error) return new ModbusCancelledError(reason.message);
  return new ModbusCancelledError();
}

/**
 * Races a promise against an AbortSignal. The source promise keeps its handlers attached,
 * so a later rejection of it is never reported as unhandled.
 */
export function withAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(toCancelledError(signal.reason));
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

/**
 * Пауза, прерываемая через AbortSignal
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(toCancelledError(signal.reason));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(toCancelledError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
