/**
 * Framed binary protocol spoken between `termlink connect` and `termlink serve`.
 *
 * Every frame is a fixed 5-byte header followed by the payload:
 *   [type u8][length u32BE][payload...]
 *
 *   0x00  Data       raw PTY bytes
 *   0x01  Resize     [rows u32BE][cols u32BE]
 *   0x02  Exit       empty
 *   0x10  Handshake  UTF-8 JSON {token?, rows?, cols?, cmd?}
 *   0xFF  Error      UTF-8 text
 */

import { truncatedFrameError } from "../../errors/index.ts";

export const MsgData = 0x00;
export const MsgResize = 0x01;
export const MsgExit = 0x02;
export const MsgHandshake = 0x10;
export const MsgError = 0xff;

export const HEADER_SIZE = 5;
export const RESIZE_PAYLOAD_SIZE = 8;

const MAX_U32 = 0xffff_ffff;

export type KnownFrameType =
  | typeof MsgData
  | typeof MsgResize
  | typeof MsgExit
  | typeof MsgHandshake
  | typeof MsgError;

export interface Frame {
  /** Type byte; values outside {@link KnownFrameType} are carried through untouched. */
  type: number;
  payload: Buffer;
}

export interface WindowSize {
  rows: number;
  cols: number;
}

export function encodeFrame(type: number, payload: string | Buffer = Buffer.alloc(0)): Buffer {
  const body = typeof payload === "string" ? Buffer.from(payload, "utf8") : payload;
  const out = Buffer.allocUnsafe(HEADER_SIZE + body.length);
  out[0] = type & 0xff;
  out.writeUInt32BE(body.length, 1);
  body.copy(out, HEADER_SIZE);
  return out;
}

/**
 * Incremental decoder. Feed it arbitrary chunks; it hands back every frame
 * completed so far and keeps the remainder buffered. Chunks of a partial frame
 * are only joined once the whole frame has arrived.
 */
export class FrameDecoder {
  private chunks: Buffer[] = [];
  private buffered = 0;
  /** Payload length of the frame at the head of the buffer, once its header is in. */
  private headLength: number | null = null;

  /** Bytes held for a frame that is not complete yet. */
  get pending(): number {
    return this.buffered;
  }

  push(chunk: Buffer): Frame[] {
    if (chunk.length > 0) {
      this.chunks.push(chunk);
      this.buffered += chunk.length;
    }

    const frames: Frame[] = [];
    let frame = this.next();
    while (frame) {
      frames.push(frame);
      frame = this.next();
    }
    return frames;
  }

  /** Declared payload length of the buffered header, or null before 5 bytes arrived. */
  peekLength(): number | null {
    if (this.headLength === null && this.buffered >= HEADER_SIZE) {
      this.headLength = this.readHeader().readUInt32BE(1);
    }
    return this.headLength;
  }

  /** Signal end of stream. Throws if a partial frame is still buffered. */
  end(): void {
    if (this.buffered === 0) return;
    const length = this.peekLength();
    const expected = length === null ? HEADER_SIZE : HEADER_SIZE + length;
    throw truncatedFrameError(this.buffered, expected);
  }

  private next(): Frame | null {
    const length = this.peekLength();
    if (length === null) return null;
    const total = HEADER_SIZE + length;
    if (this.buffered < total) return null;

    if (this.chunks.length > 1) {
      this.chunks = [Buffer.concat(this.chunks, this.buffered)];
    }
    const buf = this.chunks[0];
    if (!buf) return null;

    const frame: Frame = {
      type: buf[0],
      payload: Buffer.from(buf.subarray(HEADER_SIZE, total)),
    };
    const rest = buf.subarray(total);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    this.headLength = null;
    return frame;
  }

  /** First HEADER_SIZE buffered bytes, copied out of however many chunks hold them. */
  private readHeader(): Buffer {
    const first = this.chunks[0];
    if (first && first.length >= HEADER_SIZE) return first;

    const header = Buffer.alloc(HEADER_SIZE);
    let offset = 0;
    for (const chunk of this.chunks) {
      offset += chunk.copy(header, offset, 0, Math.min(chunk.length, HEADER_SIZE - offset));
      if (offset === HEADER_SIZE) break;
    }
    return header;
  }
}

/** Decode exactly one frame from `bytes`; trailing bytes are ignored. */
export function decodeFrame(bytes: Buffer): Frame {
  const decoder = new FrameDecoder();
  const [frame] = decoder.push(bytes);
  if (frame) return frame;
  decoder.end();
  // end() only returns when nothing was buffered
  throw truncatedFrameError(0, HEADER_SIZE);
}

export function encodeResize(rows: number, cols: number): Buffer {
  const out = Buffer.allocUnsafe(RESIZE_PAYLOAD_SIZE);
  out.writeUInt32BE(clampU32(rows), 0);
  out.writeUInt32BE(clampU32(cols), 4);
  return encodeFrame(MsgResize, out);
}

export function parseResize(payload: Buffer): WindowSize | null {
  if (payload.length !== RESIZE_PAYLOAD_SIZE) return null;
  return { rows: payload.readUInt32BE(0), cols: payload.readUInt32BE(4) };
}

export function encodeData(data: string | Buffer): Buffer {
  return encodeFrame(MsgData, data);
}

export function encodeExit(): Buffer {
  return encodeFrame(MsgExit);
}

export function encodeError(message: string): Buffer {
  return encodeFrame(MsgError, message);
}

export function frameTypeName(type: number): string {
  switch (type) {
    case MsgData:
      return "data";
    case MsgResize:
      return "resize";
    case MsgExit:
      return "exit";
    case MsgHandshake:
      return "handshake";
    case MsgError:
      return "error";
    default:
      return `0x${type.toString(16).padStart(2, "0")}`;
  }
}

function clampU32(value: number): number {
  if (!Number.isFinite(value) || value < 0) return 0;
  return Math.min(Math.trunc(value), MAX_U32);
}
