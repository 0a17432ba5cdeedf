// src/timing/rtu-timing.ts

import { RTU_CONSTANTS } from '../constants/constants.js';
import { ModbusConfigError } from '../errors.js';
import { expectedResponsePduLength } from '../pdu-codec.js';
import type { ModbusRequest, SerialLineParameters } from '../types/modbus-types.js';
import type { DeadlinePolicy } from './deadline-policy.js';

// address + crc
const RTU_ENVELOPE = 1 + RTU_CONSTANTS.CRC_SIZE;

/**
 * Bits on the wire per character: start + data + parity + stop
 */
export function bitsPerCharacter(line: SerialLineParameters): number {
  return 1 + line.dataBits + (line.parity === 'none' ? 0 : 1) + line.stopBits;
}

/**
 * Модель времени передачи по последовательной линии.
 *
 * Дедлайн ответа = время передачи запроса + время передачи ожидаемого ответа + дополнительное
 * ожидание (время обработки на устройстве). Отсчёт с момента окончания записи запроса.
 * Все значения в миллисекундах.
 */
export class RtuTimingModel implements DeadlinePolicy {
  readonly armAfterWrite = true;

  /** Duration of one character (ms) */
  readonly characterTime: number;

  constructor(
    readonly line: SerialLineParameters,
    private readonly defaultWait: number
  ) {
    if (!(line.baudRate > 0)) throw new ModbusConfigError(`Invalid baud rate: ${line.baudRate}`);
    this.characterTime = (bitsPerCharacter(line) * 1000) / line.baudRate;
  }

  transmissionTime(bytes: number): number {
    return bytes * this.characterTime;
  }

  /** t1.5: максимальная пауза между символами внутри кадра */
  get interCharacterTimeout(): number {
    return this.line.baudRate > RTU_CONSTANTS.FIXED_TIMING_BAUD_RATE
      ? RTU_CONSTANTS.FIXED_T1_5_MS
      : this.characterTime * 1.5;
  }

  /** t3.5: минимальная тишина между кадрами */
  get interFrameDelay(): number {
    return this.line.baudRate > RTU_CONSTANTS.FIXED_TIMING_BAUD_RATE
      ? RTU_CONSTANTS.FIXED_T3_5_MS
      : this.characterTime * 3.5;
  }

  /**
   * Idle threshold used to close a frame. Timers resolve in whole milliseconds and USB serial
   * adapters deliver bytes in bursts, so t3.5 is floored.
   */
  frameSilence(override?: number | null): number {
    if (override != null) return override;
    return Math.max(
      Math.ceil(this.interFrameDelay),
      RTU_CONSTANTS.DEFAULT_FRAME_SILENCE_FLOOR_MS
    );
  }

  turnaroundDelay(requestLength: number, responseLength: number, extraWait: number): number {
    return this.transmissionTime(requestLength) + this.transmissionTime(responseLength) + extraWait;
  }

  expectedResponseLength(request: ModbusRequest): number {
    return RTU_ENVELOPE + expectedResponsePduLength(request);
  }

  timeoutFor(request: ModbusRequest, requestAduLength: number, override?: number): number {
    return this.turnaroundDelay(
      requestAduLength,
      this.expectedResponseLength(request),
      override ?? this.defaultWait
    );
  }

  settleDelay(): number {
    return Math.ceil(this.interFrameDelay);
  }
}
