import { describe, expect, it } from 'vitest';
import { ModbusFunctionCode } from '../src/constants/constants.js';
import { ModbusConfigError } from '../src/errors.js';
import { FlatDeadline } from '../src/timing/deadline-policy.js';
import { bitsPerCharacter, RtuTimingModel } from '../src/timing/rtu-timing.js';
import type { ModbusRequest, SerialLineParameters } from '../src/types/modbus-types.js';

const line9600: SerialLineParameters = { baudRate: 9600, dataBits: 8, parity: 'none', stopBits: 1 };

describe('bitsPerCharacter', () => {
  it('counts start, data, parity and stop bits', () => {
    expect(bitsPerCharacter(line9600)).toBe(10);
    expect(bitsPerCharacter({ ...line9600, parity: 'even' })).toBe(11);
    expect(bitsPerCharacter({ ...line9600, dataBits: 7, stopBits: 2 })).toBe(10);
  });
});

describe('RtuTimingModel', () => {
  it('derives character time from the line settings', () => {
    const timing = new RtuTimingModel(line9600, 100);
    expect(timing.characterTime).toBeCloseTo(1.0417, 4);
    expect(timing.transmissionTime(192)).toBeCloseTo(200, 6);
  });

  it('adds request, response and extra wait into the deadline', () => {
    const timing = new RtuTimingModel(line9600, 100);
    expect(timing.turnaroundDelay(192, 50, 100)).toBeCloseTo(352.083, 3);
  });

  it('computes the deadline of a read from the expected response size', () => {
    const timing = new RtuTimingModel(line9600, 100);
    const request: ModbusRequest = {
      functionCode: ModbusFunctionCode.READ_HOLDING_REGISTERS,
      address: 0,
      quantity: 3,
    };
    // response: address + 8 byte PDU + CRC
    expect(timing.expectedResponseLength(request)).toBe(11);
    expect(timing.timeoutFor(request, 8)).toBeCloseTo(119.792, 3);
    expect(timing.timeoutFor(request, 8, 10)).toBeCloseTo(29.792, 3);
  });

  it('uses t3.5 for the settle delay, rounded up', () => {
    const timing = new RtuTimingModel(line9600, 100);
    expect(timing.interFrameDelay).toBeCloseTo(3.646, 3);
    expect(timing.interCharacterTimeout).toBeCloseTo(1.5625, 4);
    expect(timing.settleDelay()).toBe(4);
  });

  it('fixes t1.5 and t3.5 above 19200 baud', () => {
    const timing = new RtuTimingModel({ ...line9600, baudRate: 115200 }, 100);
    expect(timing.interCharacterTimeout).toBe(0.75);
    expect(timing.interFrameDelay).toBe(1.75);
    expect(timing.settleDelay()).toBe(2);
  });

  it('floors the frame silence at 20 ms unless overridden', () => {
    const timing = new RtuTimingModel(line9600, 100);
    expect(timing.frameSilence()).toBe(20);
    expect(timing.frameSilence(null)).toBe(20);
    expect(timing.frameSilence(5)).toBe(5);
    expect(new RtuTimingModel({ ...line9600, baudRate: 300 }, 100).frameSilence()).toBe(117);
  });

  it('arms the deadline after the write', () => {
    expect(new RtuTimingModel(line9600, 100).armAfterWrite).toBe(true);
  });

  it('rejects a zero baud rate', () => {
    expect(() => new RtuTimingModel({ ...line9600, baudRate: 0 }, 100)).toThrow(ModbusConfigError);
  });
});

describe('FlatDeadline', () => {
  it('returns the configured timeout or the override', () => {
    const policy = new FlatDeadline(2000);
    const request: ModbusRequest = { functionCode: ModbusFunctionCode.READ_COILS, address: 0, quantity: 1 };
    expect(policy.armAfterWrite).toBe(false);
    expect(policy.timeoutFor(request, 12)).toBe(2000);
    expect(policy.timeoutFor(request, 12, 250)).toBe(250);
    expect(policy.settleDelay()).toBe(0);
  });
});
