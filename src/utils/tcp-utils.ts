// src/utils/tcp-utils.ts

import { TCP_CONSTANTS } from '../constants/constants.js';
import { ModbusMalformedFrameError } from '../errors.js';

export interface MbapHeader {
  transactionId: number;
  protocolId: number;
  length: number;
  unitId: number;
}

/**
 * Утилита для управления Transaction ID (0-65535)
 */
export class TransactionCounter {
  private _currentId: number = 0;

  /**
   * Следующий ID с переходом через 65535. ID, для которых `isTaken` вернёт true, пропускаются.
   */
  next(isTaken?: (id: number) => boolean): number {
    for (let attempts = 0; attempts < 65536; attempts++) {
      this._currentId = (this._currentId + 1) % 65536;
      if (!isTaken || !isTaken(this._currentId)) return this._currentId;
    }
    throw new ModbusMalformedFrameError('No free transaction id: 65536 transactions outstanding');
  }
}

/**
 * Формирует MBAP заголовок (7 байт)
 * @param transactionId - ID транзакции (2 байта)
 * @param unitId - ID устройства (1 байт)
 * @param pduLength - Длина PDU
 */
export function buildMbapHeader(
  transactionId: number,
  unitId: number,
  pduLength: number
): Uint8Array {
  const header = new Uint8Array(TCP_CONSTANTS.MBAP_HEADER_SIZE);
  const view = new DataView(header.buffer);

  view.setUint16(0, transactionId, false); // Transaction ID (BE)
  view.setUint16(2, TCP_CONSTANTS.PROTOCOL_ID, false); // Protocol ID: всегда 0 для Modbus (BE)
  view.setUint16(4, pduLength + 1, false); // Length: PDU + 1 байт UnitID (BE)
  view.setUint8(6, unitId); // Unit ID

  return header;
}

/**
 * Разбирает MBAP заголовок
 */
export function parseMbapHeader(data: Uint8Array): MbapHeader {
  if (data.length < TCP_CONSTANTS.MBAP_HEADER_SIZE) {
    throw new ModbusMalformedFrameError(`MBAP header too short: ${data.length} bytes`);
  }

  const view = new DataView(data.buffer, data.byteOffset, TCP_CONSTANTS.MBAP_HEADER_SIZE);
  return {
    transactionId: view.getUint16(0, false),
    protocolId: view.getUint16(2, false),
    length: view.getUint16(4, false),
    unitId: view.getUint8(6),
  };
}
