import { describe, expect, it } from 'vitest';
import { crc16Modbus, crc16ModbusValue, verifyCrc16Modbus } from '../src/utils/crc.js';

describe('CRC16 Modbus', () => {
  it('computes the register value for a read request', () => {
    expect(crc16ModbusValue(Uint8Array.of(0x01, 0x03, 0x00, 0x00, 0x00, 0x01))).toBe(0x0a84);
  });

  it('returns the CRC low byte first', () => {
    expect(Array.from(crc16Modbus(Uint8Array.of(0x01, 0x03, 0x00, 0x00, 0x00, 0x01)))).toEqual([
      0x84, 0x0a,
    ]);
    expect(Array.from(crc16Modbus(Uint8Array.of(0x11, 0x03, 0x00, 0x6b, 0x00, 0x03)))).toEqual([
      0x76, 0x87,
    ]);
  });

  it('starts from 0xFFFF on empty input', () => {
    expect(crc16ModbusValue(new Uint8Array(0))).toBe(0xffff);
  });

  it('verifies a complete frame', () => {
    const frame = Uint8Array.of(0x11, 0x03, 0x00, 0x6b, 0x00, 0x03, 0x76, 0x87);
    expect(verifyCrc16Modbus(frame)).toBe(true);
  });

  it('detects every single-bit error', () => {
    const frame = Uint8Array.of(0x11, 0x03, 0x00, 0x6b, 0x00, 0x03, 0x76, 0x87);
    for (let bit = 0; bit < frame.length * 8; bit++) {
      const corrupted = Uint8Array.from(frame);
      corrupted[bit >> 3] ^= 1 << (bit & 7);
      expect(verifyCrc16Modbus(corrupted)).toBe(false);
    }
  });

  it('rejects frames too short to carry a CRC', () => {
    expect(verifyCrc16Modbus(Uint8Array.of(0x01, 0x02))).toBe(false);
  });
});
