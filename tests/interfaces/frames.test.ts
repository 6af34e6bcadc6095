import { describe, it, expect } from 'vitest';
import {
  CLOSE_CODE,
  FrameError,
  MAX_PAYLOAD,
  OPCODE,
  encodeCloseFrame,
  encodeControlFrame,
  encodeTextFrame,
  tryParseFrame,
} from '../../src/interfaces/ws/frames.js';

/** Builds a masked client frame the way a browser would. */
function clientFrame(opcode: number, payload: Buffer, mask = Buffer.from([1, 2, 3, 4])): Buffer {
  const masked = Buffer.from(payload.map((byte, i) => byte ^ (mask[i % 4] ?? 0)));
  const header =
    payload.length < 126
      ? Buffer.from([0x80 | opcode, 0x80 | payload.length])
      : Buffer.from([0x80 | opcode, 0x80 | 126, payload.length >> 8, payload.length & 0xff]);
  return Buffer.concat([header, mask, masked]);
}

/** Close code the server would answer `buf` with, if parsing refuses it. */
function closeCodeOf(buf: Buffer): number | undefined {
  try {
    tryParseFrame(buf);
  } catch (err: unknown) {
    return err instanceof FrameError ? err.closeCode : undefined;
  }
  return undefined;
}

describe('encodeTextFrame', () => {
  it('uses the 7-bit length for short payloads', () => {
    expect(encodeTextFrame('hi')).toEqual(Buffer.from([0x81, 2, 0x68, 0x69]));
  });

  it('uses the 16-bit extended length from 126 bytes', () => {
    const frame = encodeTextFrame('x'.repeat(300));
    expect(frame.subarray(0, 4)).toEqual(Buffer.from([0x81, 126, 0x01, 0x2c]));
    expect(frame.length).toBe(304);
  });

  it('counts bytes, not characters', () => {
    expect(encodeTextFrame('é').subarray(0, 2)).toEqual(Buffer.from([0x81, 2]));
  });

  it('rejects payloads over the frame limit', () => {
    expect(() => encodeTextFrame('x'.repeat(MAX_PAYLOAD + 1))).toThrow(RangeError);
  });
});

describe('encodeControlFrame', () => {
  it('encodes an empty close frame', () => {
    expect(encodeControlFrame(OPCODE.CLOSE)).toEqual(Buffer.from([0x88, 0]));
  });

  it('carries a pong payload', () => {
    expect(encodeControlFrame(OPCODE.PONG, Buffer.from('ok'))).toEqual(Buffer.from([0x8a, 2, 0x6f, 0x6b]));
  });

  it('encodes a close status code big-endian', () => {
    expect(encodeCloseFrame(CLOSE_CODE.PROTOCOL_ERROR)).toEqual(Buffer.from([0x88, 2, 0x03, 0xea]));
  });

  it('drops a payload over 125 bytes', () => {
    expect(encodeControlFrame(OPCODE.PING, Buffer.alloc(126))).toEqual(Buffer.from([0x89, 0]));
  });
});

describe('tryParseFrame', () => {
  it('unmasks a client text frame', () => {
    const frame = tryParseFrame(clientFrame(OPCODE.TEXT, Buffer.from('hello')));

    expect(frame?.fin).toBe(true);
    expect(frame?.masked).toBe(true);
    expect(frame?.opcode).toBe(OPCODE.TEXT);
    expect(frame?.payload.toString('utf-8')).toBe('hello');
    expect(frame?.nextOffset).toBe(11);
  });

  it('reads an unmasked server frame', () => {
    const frame = tryParseFrame(encodeTextFrame('hi'));
    expect(frame?.masked).toBe(false);
    expect(frame?.payload.toString('utf-8')).toBe('hi');
  });

  it('reads a 16-bit length frame', () => {
    const payload = Buffer.alloc(200, 0x61);
    const frame = tryParseFrame(clientFrame(OPCODE.TEXT, payload));
    expect(frame?.payload).toEqual(payload);
    expect(frame?.nextOffset).toBe(208);
  });

  it('waits for more bytes on a partial frame', () => {
    const full = clientFrame(OPCODE.TEXT, Buffer.from('hello'));
    expect(tryParseFrame(full.subarray(0, 1))).toBeNull();
    expect(tryParseFrame(full.subarray(0, 8))).toBeNull();
  });

  it('leaves a following frame in place', () => {
    const buf = Buffer.concat([clientFrame(OPCODE.PING, Buffer.alloc(0)), clientFrame(OPCODE.CLOSE, Buffer.alloc(0))]);

    const first = tryParseFrame(buf);
    expect(first?.opcode).toBe(OPCODE.PING);
    const second = tryParseFrame(buf.subarray(first?.nextOffset ?? 0));
    expect(second?.opcode).toBe(OPCODE.CLOSE);
  });

  it('refuses 64-bit lengths with "too big"', () => {
    expect(closeCodeOf(Buffer.from([0x81, 127, 0, 0, 0, 0, 0, 0, 0, 1]))).toBe(CLOSE_CODE.TOO_BIG);
  });

  it('refuses reserved bits', () => {
    expect(() => tryParseFrame(Buffer.from([0xc1, 0x80, 0, 0, 0, 0]))).toThrow(FrameError);
  });

  it('refuses reserved opcodes', () => {
    expect(() => tryParseFrame(Buffer.from([0x83, 0x80, 0, 0, 0, 0]))).toThrow('Reserved opcode 0x3');
  });

  it('refuses a fragmented control frame', () => {
    expect(closeCodeOf(Buffer.from([0x09, 0x80, 0, 0, 0, 0]))).toBe(CLOSE_CODE.PROTOCOL_ERROR);
  });

  it('refuses a control frame over 125 bytes', () => {
    expect(() => tryParseFrame(Buffer.from([0x89, 0x80 | 126, 0, 126]))).toThrow(FrameError);
  });

  it('reads a fragment without FIN', () => {
    const frame = tryParseFrame(Buffer.from([0x01, 0x80, 0, 0, 0, 0]));
    expect(frame?.fin).toBe(false);
    expect(frame?.payload.length).toBe(0);
  });
});
