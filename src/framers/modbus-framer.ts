// src/framers/modbus-framer.ts

import type {
  DecodedFrame,
  DiscardHandler,
  EncodedAdu,
  FrameHandler,
} from '../types/modbus-types.js';

/**
 * Общий интерфейс для формирования ADU и разбора потока байтов на кадры
 */
export interface ModbusFramer {
  /** true when frames carry a correlation id (TCP), false for RTU */
  readonly correlated: boolean;

  /** Bytes the envelope adds around a PDU */
  readonly overhead: number;

  /**
   * Обертывает PDU в заголовок/контрольную сумму (ADU).
   * @param isTaken - TCP: transaction ids still outstanding, skipped during allocation
   */
  buildAdu(unitId: number, pdu: Uint8Array, isTaken?: (id: number) => boolean): EncodedAdu;

  /** Принимает очередной фрагмент из транспорта */
  feed(chunk: Uint8Array): void;

  /** Drops partially received bytes */
  reset(): void;

  setFrameHandler(handler: FrameHandler): void;
  setDiscardHandler(handler: DiscardHandler): void;
}

/**
 * Handler plumbing shared by the TCP and RTU framers
 */
export abstract class BaseFramer implements ModbusFramer {
  abstract readonly correlated: boolean;
  abstract readonly overhead: number;

  protected buffer: Uint8Array = new Uint8Array(0);
  private _frameHandler: FrameHandler | null = null;
  private _discardHandler: DiscardHandler | null = null;

  abstract buildAdu(
    unitId: number,
    pdu: Uint8Array,
    isTaken?: (id: number) => boolean
  ): EncodedAdu;

  abstract feed(chunk: Uint8Array): void;

  reset(): void {
    this.buffer = new Uint8Array(0);
  }

  /** Bytes received but not yet framed */
  get pending(): number {
    return this.buffer.length;
  }

  setFrameHandler(handler: FrameHandler): void {
    this._frameHandler = handler;
  }

  setDiscardHandler(handler: DiscardHandler): void {
    this._discardHandler = handler;
  }

  protected emit(frame: DecodedFrame): void {
    this._frameHandler?.(frame);
  }

  protected discard(reason: string, bytes: Uint8Array): void {
    this._discardHandler?.(reason, bytes);
  }
}
