import { describe, expect, it } from 'vitest';
import { resolveRtuConfig, resolveTcpConfig } from '../src/config.js';
import { ModbusConfigError } from '../src/errors.js';

describe('resolveTcpConfig', () => {
  it('fills in defaults', () => {
    expect(resolveTcpConfig({ host: 'plc.local' })).toEqual({
      host: 'plc.local',
      port: 502,
      localPort: null,
      timeout: 2000,
      connectTimeout: 2000,
      maxActiveRequests: null,
      defaultUnitId: 1,
      retries: 0,
      retryDelay: 0,
      autoReconnectAfter: null,
      queueWhileDisconnected: true,
      connectWaitTimeout: 2000,
    });
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(resolveTcpConfig({ host: 'plc.local' }))).toBe(true);
  });

  it('keeps explicit values', () => {
    const config = resolveTcpConfig({
      host: '10.0.0.5',
      port: 1502,
      maxActiveRequests: 4,
      autoReconnectAfter: 250,
      retries: 2,
    });
    expect(config).toMatchObject({
      port: 1502,
      maxActiveRequests: 4,
      autoReconnectAfter: 250,
      retries: 2,
    });
  });

  it('rejects a missing host', () => {
    expect(() => resolveTcpConfig({ host: '' })).toThrow('TCP host is required');
  });

  it('rejects out-of-range values', () => {
    expect(() => resolveTcpConfig({ host: 'plc', port: 70000 })).toThrow(
      'Invalid port: 70000. Must be an integer 1-65535'
    );
    expect(() => resolveTcpConfig({ host: 'plc', timeout: -1 })).toThrow(
      'Invalid timeout: -1. Must be a non-negative number of ms'
    );
    expect(() => resolveTcpConfig({ host: 'plc', maxActiveRequests: 0 })).toThrow(
      ModbusConfigError
    );
    expect(() => resolveTcpConfig({ host: 'plc', defaultUnitId: 256 })).toThrow(
      'Invalid defaultUnitId: 256. Must be an integer 0-255'
    );
  });
});

describe('resolveRtuConfig', () => {
  it('fills in 9600 8N1 and a single request in flight', () => {
    expect(resolveRtuConfig({ path: '/dev/ttyTEST0' })).toEqual({
      path: '/dev/ttyTEST0',
      baudRate: 9600,
      dataBits: 8,
      parity: 'none',
      stopBits: 1,
      timeout: 100,
      frameSilence: null,
      maxActiveRequests: 1,
      defaultUnitId: 1,
      retries: 0,
      retryDelay: 0,
      autoReconnectAfter: null,
      queueWhileDisconnected: true,
      connectWaitTimeout: 2000,
    });
  });

  it('keeps line settings', () => {
    const config = resolveRtuConfig({
      path: '/dev/ttyTEST0',
      baudRate: 19200,
      parity: 'even',
      stopBits: 2,
      frameSilence: 5,
    });
    expect(config).toMatchObject({ baudRate: 19200, parity: 'even', stopBits: 2, frameSilence: 5 });
  });

  it('rejects a missing path or a bad baud rate', () => {
    expect(() => resolveRtuConfig({ path: '' })).toThrow('Serial port path is required');
    expect(() => resolveRtuConfig({ path: '/dev/ttyTEST0', baudRate: 0 })).toThrow(
      'Invalid baudRate: 0'
    );
    expect(() => resolveRtuConfig({ path: '/dev/ttyTEST0', frameSilence: -5 })).toThrow(
      ModbusConfigError
    );
  });
});
