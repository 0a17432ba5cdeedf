import { describe, expect, it } from 'vitest';
import { createRtuClient, createTcpClient } from '../src/client.js';
import { ModbusFunctionCode } from '../src/constants/constants.js';
import { ModbusConfigError, ModbusExceptionError } from '../src/errors.js';
import { mbapFrame, MockTransport, tidOf, withCrc } from './helpers/mock-transport.js';

describe('ModbusClient over TCP', () => {
  it('does not connect until asked', async () => {
    const transport = new MockTransport();
    const client = await createTcpClient({ host: 'plc.local' }, transport);
    expect(transport.connectAttempts).toBe(0);
    expect(client.isConnected).toBe(false);

    await client.connect();
    expect(client.isConnected).toBe(true);
    await client.close();
    expect(client.isConnected).toBe(false);
  });

  it('reads holding registers from the given unit', async () => {
    const transport = new MockTransport();
    const client = await createTcpClient({ host: 'plc.local' }, transport);
    await client.connect();

    const values = client.readHoldingRegisters(0x6b, 3, { unitId: 0x11 });
    const frame = await transport.nextWrite();
    expect(Array.from(frame)).toEqual([
      0x00, 0x01, 0x00, 0x00, 0x00, 0x06, 0x11, 0x03, 0x00, 0x6b, 0x00, 0x03,
    ]);
    transport.emitData(mbapFrame(1, 0x11, [0x03, 0x06, 0x02, 0x2b, 0x00, 0x00, 0x00, 0x64]));
    await expect(values).resolves.toEqual([555, 0, 100]);
  });

  it('writes registers and returns the acknowledgement', async () => {
    const transport = new MockTransport();
    const client = await createTcpClient({ host: 'plc.local' }, transport);
    await client.connect();

    const ack = client.writeMultipleRegisters(1, [0x000a, 0x0102]);
    const frame = await transport.nextWrite();
    transport.emitData(mbapFrame(tidOf(frame), 1, [0x10, 0x00, 0x01, 0x00, 0x02]));
    await expect(ack).resolves.toEqual({
      functionCode: ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS,
      startAddress: 1,
      quantity: 2,
    });
  });

  it('reads the exception status byte and echoes diagnostics', async () => {
    const transport = new MockTransport();
    const client = await createTcpClient({ host: 'plc.local' }, transport);
    await client.connect();

    const status = client.readExceptionStatus();
    transport.emitData(mbapFrame(tidOf(await transport.nextWrite()), 1, [0x07, 0x6d]));
    await expect(status).resolves.toBe(0x6d);

    const echo = client.diagnostics(0x0000, [0xa537]);
    const frame = await transport.nextWrite();
    expect(Array.from(frame.subarray(7))).toEqual([0x08, 0x00, 0x00, 0xa5, 0x37]);
    transport.emitData(mbapFrame(tidOf(frame), 1, [0x08, 0x00, 0x00, 0xa5, 0x37]));
    await expect(echo).resolves.toEqual({
      functionCode: ModbusFunctionCode.DIAGNOSTICS,
      subFunction: 0,
      data: [0xa537],
    });
  });

  it('rejects with the exception a device returns for a coil write', async () => {
    const transport = new MockTransport();
    const client = await createTcpClient({ host: 'plc.local' }, transport);
    await client.connect();

    const write = client.writeSingleCoil(0xffff, true);
    transport.emitData(mbapFrame(tidOf(await transport.nextWrite()), 1, [0x85, 0x02]));
    await expect(write).rejects.toBeInstanceOf(ModbusExceptionError);

    expect(client.getDiagnostics()).toMatchObject({ totalRequests: 1, exceptionResponses: 1 });
    client.resetDiagnostics();
    expect(client.getDiagnostics().totalRequests).toBe(0);
  });

  it('validates options before creating anything', async () => {
    await expect(createTcpClient({ host: '' }, new MockTransport())).rejects.toBeInstanceOf(
      ModbusConfigError
    );
  });
});

describe('ModbusClient over RTU', () => {
  it('reads coils through the serial framer', async () => {
    const transport = new MockTransport('/dev/ttyTEST0');
    const client = await createRtuClient({ path: '/dev/ttyTEST0' }, transport);
    await client.connect();

    const coils = client.readCoils(0x13, 10);
    const frame = await transport.nextWrite();
    expect(Array.from(frame)).toEqual(withCrc([0x01, 0x01, 0x00, 0x13, 0x00, 0x0a]));

    transport.emitData(withCrc([0x01, 0x01, 0x02, 0xcd, 0x01]));
    await expect(coils).resolves.toEqual([
      true, false, true, true, false, false, true, true, true, false,
    ]);
    await client.close();
  });

  it('addresses the configured default unit', async () => {
    const transport = new MockTransport('/dev/ttyTEST0');
    const client = await createRtuClient({ path: '/dev/ttyTEST0', defaultUnitId: 7 }, transport);
    await client.connect();

    const write = client.writeSingleRegister(2, 0x0102);
    const frame = await transport.nextWrite();
    expect(Array.from(frame)).toEqual(withCrc([0x07, 0x06, 0x00, 0x02, 0x01, 0x02]));
    transport.emitData(frame);
    await expect(write).resolves.toEqual({
      functionCode: ModbusFunctionCode.WRITE_SINGLE_REGISTER,
      address: 2,
      value: 0x0102,
    });
  });
});
