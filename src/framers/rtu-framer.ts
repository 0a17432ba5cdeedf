// src/framers/rtu-framer.ts

import { EXCEPTION_BIT, ModbusFunctionCode, RTU_CONSTANTS } from '../constants/constants.js';
import type { EncodedAdu } from '../types/modbus-types.js';
import { crc16Modbus, verifyCrc16Modbus } from '../utils/crc.js';
import { concatUint8Arrays, toHex } from '../utils/utils.js';
import { BaseFramer } from './modbus-framer.js';

/**
 * Длина кадра ответа RTU по его структуре (адрес + PDU + CRC).
 * null — длину по известным байтам определить нельзя, кадр закончится по тишине.
 */
export function rtuResponseFrameLength(buffer: Uint8Array): number | null {
  if (buffer.length < 2) return null;
  const functionCode = buffer[1];
  if (functionCode & EXCEPTION_BIT) return 5;

  switch (functionCode) {
    case ModbusFunctionCode.READ_COILS:
    case ModbusFunctionCode.READ_DISCRETE_INPUTS:
    case ModbusFunctionCode.READ_HOLDING_REGISTERS:
    case ModbusFunctionCode.READ_INPUT_REGISTERS:
      return buffer.length < 3 ? null : 3 + buffer[2] + RTU_CONSTANTS.CRC_SIZE;
    case ModbusFunctionCode.WRITE_SINGLE_COIL:
    case ModbusFunctionCode.WRITE_SINGLE_REGISTER:
    case ModbusFunctionCode.WRITE_MULTIPLE_COILS:
    case ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS:
      return 8;
    case ModbusFunctionCode.READ_EXCEPTION_STATUS:
      return 5;
    default:
      return null;
  }
}

/**
 * RTU framing: station address + PDU + CRC16 (LE). Frames end when the declared
 * structure length is reached or when the line stays silent for `frameSilence` ms.
 */
export class RtuFramer extends BaseFramer {
  readonly correlated = false;
  readonly overhead = 1 + RTU_CONSTANTS.CRC_SIZE;

  private _idleTimer: NodeJS.Timeout | null = null;

  constructor(private readonly frameSilence: number) {
    super();
  }

  public buildAdu(slaveId: number, pdu: Uint8Array): EncodedAdu {
    const aduWithoutCrc = concatUint8Arrays([Uint8Array.of(slaveId), pdu]);
    const crc = crc16Modbus(aduWithoutCrc);
    return { adu: concatUint8Arrays([aduWithoutCrc, crc]), transactionId: null };
  }

  public feed(chunk: Uint8Array): void {
    this._clearIdleTimer();
    this.buffer = concatUint8Arrays([this.buffer, chunk]);

    if (this.buffer.length > RTU_CONSTANTS.MAX_FRAME_SIZE) {
      const overflow = this.buffer;
      this.reset();
      this.discard(`Buffer overflow: ${overflow.length} bytes without a valid frame`, overflow);
      return;
    }

    this._drainComplete();

    if (this.buffer.length > 0) {
      this._idleTimer = setTimeout(() => this._onSilence(), this.frameSilence);
    }
  }

  public override reset(): void {
    this._clearIdleTimer();
    super.reset();
  }

  private _drainComplete(): void {
    for (;;) {
      const length = rtuResponseFrameLength(this.buffer);
      if (length === null || this.buffer.length < length) return;
      const frame = this.buffer.slice(0, length);
      this.buffer = this.buffer.slice(length);
      this._deliver(frame);
    }
  }

  private _onSilence(): void {
    this._idleTimer = null;
    const frame = this.buffer;
    super.reset();
    if (frame.length > 0) this._deliver(frame);
  }

  private _deliver(packet: Uint8Array): void {
    if (packet.length < RTU_CONSTANTS.MIN_FRAME_SIZE) {
      this.discard(`Frame too short: ${packet.length} bytes`, packet);
      return;
    }

    if (!verifyCrc16Modbus(packet)) {
      const receivedCrc = packet.subarray(-RTU_CONSTANTS.CRC_SIZE);
      const calculatedCrc = crc16Modbus(packet.subarray(0, -RTU_CONSTANTS.CRC_SIZE));
      this.discard(
        `CRC mismatch: received ${toHex(receivedCrc)}, calculated ${toHex(calculatedCrc)}`,
        packet
      );
      return;
    }

    this.emit({
      transactionId: null,
      unitId: packet[0],
      pdu: packet.slice(1, -RTU_CONSTANTS.CRC_SIZE),
    });
  }

  private _clearIdleTimer(): void {
    if (this._idleTimer) {
      clearTimeout(this._idleTimer);
      this._idleTimer = null;
    }
  }
}
