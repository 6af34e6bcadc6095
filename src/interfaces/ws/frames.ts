/**
 * RFC 6455 frame codec, server side.
 *
 * Supports what the order feed needs: text, ping, pong and close frames with
 * payloads up to 64 KiB. No extensions are negotiated, so any RSV bit is a
 * protocol error.
 */

export const OPCODE = {
  CONTINUATION: 0x00,
  TEXT: 0x01,
  BINARY: 0x02,
  CLOSE: 0x08,
  PING: 0x09,
  PONG: 0x0a,
} as const;

/** Close status codes used by the server (§7.4.1). */
export const CLOSE_CODE = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  PROTOCOL_ERROR: 1002,
  TOO_BIG: 1009,
} as const;

export const MAX_PAYLOAD = 0xffff;
const MAX_CONTROL_PAYLOAD = 125;

const KNOWN_OPCODES: ReadonlySet<number> = new Set(Object.values(OPCODE));

/** A frame the server must answer by closing with `closeCode`. */
export class FrameError extends Error {
  constructor(
    readonly closeCode: number,
    message: string,
  ) {
    super(message);
    this.name = 'FrameError';
  }
}

export interface ParsedFrame {
  fin: boolean;
  opcode: number;
  masked: boolean;
  payload: Buffer;
  /** Offset of the first byte after this frame. */
  nextOffset: number;
}

function isControl(opcode: number): boolean {
  return (opcode & 0x08) !== 0;
}

/**
 * Parses one frame from the front of `buf`.
 *
 * @returns null while the frame is incomplete.
 * @throws FrameError on reserved bits or opcodes, fragmented or oversized
 *   control frames, and 64-bit lengths.
 */
export function tryParseFrame(buf: Buffer): ParsedFrame | null {
  if (buf.length < 2) return null;

  const first = buf.readUInt8(0);
  const second = buf.readUInt8(1);

  const fin = (first & 0x80) !== 0;
  const opcode = first & 0x0f;
  const masked = (second & 0x80) !== 0;
  const shortLength = second & 0x7f;

  if ((first & 0x70) !== 0) {
    throw new FrameError(CLOSE_CODE.PROTOCOL_ERROR, 'Reserved bits set without a negotiated extension');
  }
  if (!KNOWN_OPCODES.has(opcode)) {
    throw new FrameError(CLOSE_CODE.PROTOCOL_ERROR, `Reserved opcode 0x${opcode.toString(16)}`);
  }
  if (isControl(opcode) && (!fin || shortLength > MAX_CONTROL_PAYLOAD)) {
    throw new FrameError(CLOSE_CODE.PROTOCOL_ERROR, 'Control frames must be unfragmented and at most 125 bytes');
  }
  if (shortLength === 127) {
    throw new FrameError(CLOSE_CODE.TOO_BIG, `Frames over ${MAX_PAYLOAD} bytes are not accepted`);
  }

  const headerLength = shortLength === 126 ? 4 : 2;
  if (buf.length < headerLength) return null;
  const payloadLength = shortLength === 126 ? buf.readUInt16BE(2) : shortLength;

  const payloadStart = headerLength + (masked ? 4 : 0);
  const nextOffset = payloadStart + payloadLength;
  if (buf.length < nextOffset) return null;

  const payload = Buffer.from(buf.subarray(payloadStart, nextOffset));
  if (masked) {
    const key = buf.subarray(headerLength, payloadStart);
    for (let i = 0; i < payload.length; i++) {
      payload.writeUInt8(payload.readUInt8(i) ^ key.readUInt8(i % 4), i);
    }
  }

  return { fin, opcode, masked, payload, nextOffset };
}

/** Encodes an unmasked FIN control frame. Payloads over 125 bytes are dropped. */
export function encodeControlFrame(opcode: number, payload: Buffer = Buffer.alloc(0)): Buffer {
  const body = payload.length > MAX_CONTROL_PAYLOAD ? Buffer.alloc(0) : payload;
  return Buffer.concat([Buffer.from([0x80 | opcode, body.length]), body]);
}

/** Close frame carrying a status code. */
export function encodeCloseFrame(code: number): Buffer {
  const payload = Buffer.alloc(2);
  payload.writeUInt16BE(code, 0);
  return encodeControlFrame(OPCODE.CLOSE, payload);
}

/** Encodes a single FIN text frame. Rejects payloads over MAX_PAYLOAD. */
export function encodeTextFrame(data: string): Buffer {
  const payload = Buffer.from(data, 'utf-8');
  const length = payload.length;

  if (length > MAX_PAYLOAD) {
    throw new RangeError(`Text frame of ${length} bytes exceeds ${MAX_PAYLOAD}`);
  }

  const header =
    length < 126
      ? Buffer.from([0x80 | OPCODE.TEXT, length])
      : Buffer.from([0x80 | OPCODE.TEXT, 126, length >> 8, length & 0xff]);
  return Buffer.concat([header, payload]);
}
