// src/framers/tcp-framer.ts

import { TCP_CONSTANTS } from '../constants/constants.js';
import type { EncodedAdu } from '../types/modbus-types.js';
import { buildMbapHeader, parseMbapHeader, TransactionCounter } from '../utils/tcp-utils.js';
import { concatUint8Arrays } from '../utils/utils.js';
import { BaseFramer } from './modbus-framer.js';

/**
 * MBAP framing: length-prefixed frames correlated by transaction id
 */
export class TcpFramer extends BaseFramer {
  readonly correlated = true;
  readonly overhead = TCP_CONSTANTS.MBAP_HEADER_SIZE;

  private readonly _counter = new TransactionCounter();

  public buildAdu(
    unitId: number,
    pdu: Uint8Array,
    isTaken?: (id: number) => boolean
  ): EncodedAdu {
    const transactionId = this._counter.next(isTaken);
    const header = buildMbapHeader(transactionId, unitId, pdu.length);
    return { adu: concatUint8Arrays([header, pdu]), transactionId };
  }

  public feed(chunk: Uint8Array): void {
    this.buffer = concatUint8Arrays([this.buffer, chunk]);

    while (this.buffer.length >= TCP_CONSTANTS.MBAP_HEADER_SIZE) {
      const header = parseMbapHeader(this.buffer);

      // Длина вне допустимого диапазона: поток рассинхронизирован, начало кадра не найти
      if (header.length < 2 || header.length > TCP_CONSTANTS.MAX_MBAP_LENGTH) {
        const garbage = this.buffer;
        this.reset();
        this.discard(`Invalid MBAP length ${header.length}`, garbage);
        return;
      }

      const total = TCP_CONSTANTS.MBAP_HEADER_SIZE - 1 + header.length;
      if (this.buffer.length < total) return;

      const frame = this.buffer.slice(0, total);
      this.buffer = this.buffer.slice(total);

      if (header.protocolId !== TCP_CONSTANTS.PROTOCOL_ID) {
        this.discard(`Invalid protocol id ${header.protocolId}`, frame);
        continue;
      }

      this.emit({
        transactionId: header.transactionId,
        unitId: header.unitId,
        pdu: frame.subarray(TCP_CONSTANTS.MBAP_HEADER_SIZE),
      });
    }
  }
}
