import type { Readable } from "node:stream";
import {
  ProtocolError,
  frameTooLargeError,
  socketError,
  truncatedFrameError,
} from "../../errors/index.ts";
import { FrameDecoder, HEADER_SIZE, type Frame } from "./frame.ts";

export const DEFAULT_MAX_PAYLOAD = 16 * 1024 * 1024;

/** Frames queued before the source stream is paused. */
const HIGH_WATER_FRAMES = 64;

export interface FrameReaderOptions {
  maxPayload?: number;
}

interface Waiter {
  resolve: (frame: Frame) => void;
  reject: (error: Error) => void;
}

/**
 * Pull-style frame reader over a byte stream (usually a socket).
 *
 * `read()` resolves with the next complete frame. When the stream ends before
 * a whole frame was buffered it rejects with `ERR_PROTOCOL_TRUNCATED`; check
 * `ProtocolError.isCleanEof` to tell a hang-up from a cut-off frame.
 */
export class FrameReader {
  private readonly decoder = new FrameDecoder();
  private readonly queue: Frame[] = [];
  private readonly maxPayload: number;
  private waiter: Waiter | null = null;
  private failure: Error | null = null;
  private detached = false;

  constructor(
    private readonly stream: Readable,
    options?: FrameReaderOptions,
  ) {
    this.maxPayload = options?.maxPayload ?? DEFAULT_MAX_PAYLOAD;
    stream.on("data", this.onData);
    stream.on("end", this.onEnd);
    stream.on("close", this.onEnd);
    stream.on("error", this.onError);
  }

  read(): Promise<Frame> {
    const frame = this.queue.shift();
    if (frame) {
      if (this.queue.length < HIGH_WATER_FRAMES && this.stream.isPaused() && !this.detached) {
        this.stream.resume();
      }
      return Promise.resolve(frame);
    }
    if (this.failure) return Promise.reject(this.failure);
    if (this.waiter) {
      return Promise.reject(new Error("FrameReader.read() called while a read is pending"));
    }
    return new Promise<Frame>((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  /** Stop listening to the stream. A pending read rejects as truncated. */
  detach(): void {
    if (this.detached) return;
    this.detached = true;
    this.stream.off("data", this.onData);
    this.stream.off("end", this.onEnd);
    this.stream.off("close", this.onEnd);
    this.stream.off("error", this.onError);
    this.fail(truncatedFrameError(this.decoder.pending, HEADER_SIZE));
  }

  private readonly onData = (chunk: Buffer | string): void => {
    if (this.failure) return;
    const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    let frames: Frame[];
    try {
      frames = this.decoder.push(bytes);
    } catch (error) {
      this.fail(error instanceof Error ? error : new Error(String(error)));
      return;
    }

    for (const frame of frames) this.deliver(frame);

    const declared = this.decoder.peekLength();
    if (declared !== null && declared > this.maxPayload) {
      this.fail(frameTooLargeError(declared, this.maxPayload));
      this.stream.pause();
      return;
    }

    if (this.queue.length >= HIGH_WATER_FRAMES) this.stream.pause();
  };

  private readonly onEnd = (): void => {
    if (this.failure) return;
    try {
      this.decoder.end();
      this.fail(truncatedFrameError(0, HEADER_SIZE));
    } catch (error) {
      this.fail(error instanceof ProtocolError ? error : truncatedFrameError(this.decoder.pending, HEADER_SIZE));
    }
  };

  private readonly onError = (error: Error): void => {
    this.fail(socketError(error));
  };

  private deliver(frame: Frame): void {
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve(frame);
      return;
    }
    this.queue.push(frame);
  }

  private fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    if (this.waiter) {
      const { reject } = this.waiter;
      this.waiter = null;
      reject(error);
    }
  }
}
