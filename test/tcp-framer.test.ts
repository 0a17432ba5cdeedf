import { describe, expect, it } from 'vitest';
import { TcpFramer } from '../src/framers/tcp-framer.js';
import type { DecodedFrame } from '../src/types/modbus-types.js';
import { mbapFrame } from './helpers/mock-transport.js';

function collect(framer: TcpFramer) {
  const frames: DecodedFrame[] = [];
  const discards: string[] = [];
  framer.setFrameHandler(frame => frames.push(frame));
  framer.setDiscardHandler(reason => discards.push(reason));
  return { frames, discards };
}

describe('TcpFramer', () => {
  it('wraps a PDU in an MBAP header with a fresh transaction id', () => {
    const framer = new TcpFramer();
    const { adu, transactionId } = framer.buildAdu(1, Uint8Array.of(0x03, 0x00, 0x00, 0x00, 0x01));
    expect(transactionId).toBe(1);
    expect(Array.from(adu)).toEqual([
      0x00, 0x01, 0x00, 0x00, 0x00, 0x06, 0x01, 0x03, 0x00, 0x00, 0x00, 0x01,
    ]);
  });

  it('skips transaction ids that are still outstanding', () => {
    const framer = new TcpFramer();
    framer.buildAdu(1, Uint8Array.of(0x07));
    const { transactionId } = framer.buildAdu(1, Uint8Array.of(0x07), id => id === 2);
    expect(transactionId).toBe(3);
    expect(framer.buildAdu(1, Uint8Array.of(0x07)).transactionId).toBe(4);
  });

  it('reassembles a frame split across chunks', () => {
    const framer = new TcpFramer();
    const { frames } = collect(framer);
    const bytes = mbapFrame(0x1234, 7, [0x03, 0x02, 0x00, 0x2a]);

    framer.feed(Uint8Array.from(bytes.slice(0, 4)));
    framer.feed(Uint8Array.from(bytes.slice(4, 8)));
    expect(frames).toHaveLength(0);
    expect(framer.pending).toBe(8);

    framer.feed(Uint8Array.from(bytes.slice(8)));
    expect(frames).toHaveLength(1);
    expect(frames[0].transactionId).toBe(0x1234);
    expect(frames[0].unitId).toBe(7);
    expect(Array.from(frames[0].pdu)).toEqual([0x03, 0x02, 0x00, 0x2a]);
    expect(framer.pending).toBe(0);
  });

  it('splits several frames arriving in one chunk', () => {
    const framer = new TcpFramer();
    const { frames } = collect(framer);
    framer.feed(
      Uint8Array.from([
        ...mbapFrame(2, 1, [0x06, 0x00, 0x01, 0x00, 0x03]),
        ...mbapFrame(1, 1, [0x83, 0x02]),
      ])
    );
    expect(frames.map(frame => frame.transactionId)).toEqual([2, 1]);
    expect(Array.from(frames[1].pdu)).toEqual([0x83, 0x02]);
  });

  it('discards a frame with a foreign protocol id and keeps going', () => {
    const framer = new TcpFramer();
    const { frames, discards } = collect(framer);
    const foreign = mbapFrame(5, 1, [0x03, 0x00]);
    foreign[3] = 0x01;

    framer.feed(Uint8Array.from([...foreign, ...mbapFrame(6, 1, [0x07, 0x00])]));
    expect(discards).toEqual(['Invalid protocol id 1']);
    expect(frames.map(frame => frame.transactionId)).toEqual([6]);
  });

  it('drops the whole buffer when the length field is out of range', () => {
    const framer = new TcpFramer();
    const { frames, discards } = collect(framer);
    framer.feed(Uint8Array.of(0x00, 0x09, 0x00, 0x00, 0x01, 0x00, 0x01, 0x03));
    expect(discards).toEqual(['Invalid MBAP length 256']);
    expect(frames).toHaveLength(0);
    expect(framer.pending).toBe(0);
  });

  it('reset drops a partial frame', () => {
    const framer = new TcpFramer();
    const { frames } = collect(framer);
    framer.feed(Uint8Array.from(mbapFrame(1, 1, [0x03, 0x02, 0x00, 0x01]).slice(0, 9)));
    framer.reset();
    framer.feed(Uint8Array.from(mbapFrame(2, 1, [0x07, 0x10])));
    expect(frames.map(frame => frame.transactionId)).toEqual([2]);
  });
});
