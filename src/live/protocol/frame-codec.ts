/**
 * WebSocket frame codec (RFC 6455 subset)
 *
 * Covers what a push channel needs: text messages, ping/pong keep-alive and
 * close. Fragmented messages and extensions are not negotiated, so every
 * frame the server writes is a single FIN frame; frames with other opcodes
 * are decoded and handed back untouched.
 */

export enum Opcode {
  CONTINUATION = 0x0,
  TEXT = 0x1,
  BINARY = 0x2,
  CLOSE = 0x8,
  PING = 0x9,
  PONG = 0xa,
}

export interface Frame {
  fin: boolean;
  opcode: number;
  masked: boolean;
  payload: Buffer;
}

export interface EncodeOptions {
  /** 4-byte key; only clients mask their frames */
  mask?: Buffer;
}

export class FrameDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrameDecodeError';
  }
}

const FIN_BIT = 0x80;
const MASK_BIT = 0x80;
const LENGTH_16 = 126;
const LENGTH_64 = 127;

export function applyMask(payload: Buffer, maskKey: Buffer): Buffer {
  const out = Buffer.allocUnsafe(payload.length);
  for (let i = 0; i < payload.length; i++) {
    out[i] = payload[i] ^ maskKey[i % 4];
  }
  return out;
}

export function encodeFrame(
  opcode: number,
  payload: Buffer = Buffer.alloc(0),
  options: EncodeOptions = {},
): Buffer {
  const { mask } = options;
  if (mask && mask.length !== 4) {
    throw new RangeError('Mask key must be exactly 4 bytes');
  }

  const length = payload.length;
  let header: Buffer;

  if (length < LENGTH_16) {
    header = Buffer.alloc(2);
    header[1] = length;
  } else if (length < 0x10000) {
    header = Buffer.alloc(4);
    header[1] = LENGTH_16;
    header.writeUInt16BE(length, 2);
  } else {
    header = Buffer.alloc(10);
    header[1] = LENGTH_64;
    header.writeBigUInt64BE(BigInt(length), 2);
  }

  header[0] = FIN_BIT | (opcode & 0x0f);

  if (!mask) {
    return Buffer.concat([header, payload]);
  }

  header[1] |= MASK_BIT;
  return Buffer.concat([header, mask, applyMask(payload, mask)]);
}

export function encodeTextFrame(text: string): Buffer {
  return encodeFrame(Opcode.TEXT, Buffer.from(text, 'utf8'));
}

/**
 * Close frame carrying an optional status code
 */
export function encodeCloseFrame(code?: number): Buffer {
  if (code === undefined) {
    return encodeFrame(Opcode.CLOSE);
  }
  const payload = Buffer.alloc(2);
  payload.writeUInt16BE(code, 0);
  return encodeFrame(Opcode.CLOSE, payload);
}

/**
 * Incremental decoder over a byte stream.
 *
 * Socket chunks rarely line up with frame boundaries, so bytes are buffered
 * until a full frame is present. Bytes left over when the stream ends mean
 * the peer went away mid-frame.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly maxPayloadBytes: number = Number.MAX_SAFE_INTEGER) {}

  push(chunk: Buffer): Frame[] {
    this.buffer =
      this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    const frames: Frame[] = [];
    let frame = this.readFrame();
    while (frame) {
      frames.push(frame);
      frame = this.readFrame();
    }
    return frames;
  }

  hasPartialFrame(): boolean {
    return this.buffer.length > 0;
  }

  bufferedBytes(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
  }

  private readFrame(): Frame | null {
    const buf = this.buffer;
    if (buf.length < 2) {
      return null;
    }

    const first = buf[0];
    const second = buf[1];
    const masked = (second & MASK_BIT) === MASK_BIT;
    let length = second & 0x7f;
    let offset = 2;

    if (length === LENGTH_16) {
      if (buf.length < offset + 2) return null;
      length = buf.readUInt16BE(offset);
      offset += 2;
    } else if (length === LENGTH_64) {
      if (buf.length < offset + 8) return null;
      const wide = buf.readBigUInt64BE(offset);
      if (wide > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw new FrameDecodeError(`Frame length ${wide} is not addressable`);
      }
      length = Number(wide);
      offset += 8;
    }

    if (length > this.maxPayloadBytes) {
      throw new FrameDecodeError(
        `Frame payload of ${length} bytes exceeds limit of ${this.maxPayloadBytes}`,
      );
    }

    let maskKey: Buffer | null = null;
    if (masked) {
      if (buf.length < offset + 4) return null;
      maskKey = buf.subarray(offset, offset + 4);
      offset += 4;
    }

    if (buf.length < offset + length) {
      return null;
    }

    const raw = buf.subarray(offset, offset + length);
    const payload = maskKey ? applyMask(raw, maskKey) : Buffer.from(raw);
    this.buffer = buf.subarray(offset + length);

    return {
      fin: (first & FIN_BIT) === FIN_BIT,
      opcode: first & 0x0f,
      masked,
      payload,
    };
  }
}
