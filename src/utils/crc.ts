// src/utils/crc.ts

const CRC16_TABLE: Uint16Array = new Uint16Array(256);
(function initCrc16Table(): void {
  for (let i: number = 0; i < 256; i++) {
    let crc: number = i;
    for (let j: number = 0; j < 8; j++) {
      crc = crc & 0x0001 ? (crc >> 1) ^ 0xa001 : crc >> 1;
    }
    CRC16_TABLE[i] = crc;
  }
})();

/**
 * Calculates the CRC16-MODBUS register value (polynomial 0xA001, init 0xFFFF).
 */
export function crc16ModbusValue(buffer: Uint8Array): number {
  let crc: number = 0xffff;
  for (const byte of buffer) {
    crc = (crc >> 8) ^ CRC16_TABLE[(crc ^ byte) & 0xff];
  }
  return crc;
}

/**
 * Calculates CRC16-MODBUS in wire order.
 * @returns 2 bytes, low byte first
 */
export function crc16Modbus(buffer: Uint8Array): Uint8Array {
  const crc = crc16ModbusValue(buffer);
  return new Uint8Array([crc & 0xff, (crc >> 8) & 0xff]);
}

/**
 * Проверяет CRC кадра RTU: последние два байта — CRC (LE) по всем предыдущим
 */
export function verifyCrc16Modbus(frame: Uint8Array): boolean {
  if (frame.length < 3) return false;
  const body = frame.subarray(0, frame.length - 2);
  const crc = crc16ModbusValue(body);
  return frame[frame.length - 2] === (crc & 0xff) && frame[frame.length - 1] === ((crc >> 8) & 0xff);
}
