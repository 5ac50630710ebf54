// In-memory QUIC stream halves.

import type { RecvStream, SendStream } from "@tuic-mux/core";
import { type Channel, createChannel } from "./channel.ts";
import { LoopbackError } from "./error.ts";

/** State shared by the two ends of one stream direction. */
interface Pipe {
  chunks: Channel<Uint8Array>;
  /** Code the receiver stopped the stream with, if it did. */
  stopCode: number | null;
}

/**
 * Write half of an in-memory stream.
 *
 * Chunks are copied on write, so callers may reuse their buffers.
 */
export class LoopbackSendStream implements SendStream {
  private done = false;

  constructor(private readonly pipe: Pipe) {}

  async write(chunk: Uint8Array): Promise<void> {
    this.checkWritable();
    this.pipe.chunks.send(chunk.slice());
  }

  async finish(): Promise<void> {
    this.checkWritable();
    this.done = true;
    this.pipe.chunks.close();
  }

  reset(code: number): void {
    if (this.done) return;
    this.done = true;
    this.pipe.chunks.fail(LoopbackError.reset(code));
  }

  private checkWritable(): void {
    if (this.pipe.stopCode !== null) throw LoopbackError.stopped(this.pipe.stopCode);
    if (this.done) throw LoopbackError.finished();
  }
}

/**
 * Read half of an in-memory stream.
 */
export class LoopbackRecvStream implements RecvStream {
  private leftover: Uint8Array | null = null;

  constructor(private readonly pipe: Pipe) {}

  async read(maxLength: number): Promise<Uint8Array | null> {
    if (this.pipe.stopCode !== null) throw LoopbackError.stopped(this.pipe.stopCode);

    const chunk = this.leftover ?? (await this.nextChunk());
    this.leftover = null;
    if (chunk === null) return null;

    if (chunk.length > maxLength) {
      this.leftover = chunk.subarray(maxLength);
      return chunk.subarray(0, maxLength);
    }
    return chunk;
  }

  stop(code: number): void {
    if (this.pipe.stopCode !== null) return;
    this.pipe.stopCode = code;
    this.leftover = null;
    this.pipe.chunks.close();
  }

  /** Whether this end has been stopped. */
  get isStopped(): boolean {
    return this.pipe.stopCode !== null;
  }

  private async nextChunk(): Promise<Uint8Array | null> {
    for (;;) {
      const chunk = await this.pipe.chunks.recv();
      if (chunk === null || chunk.length > 0) return chunk;
    }
  }
}

/** Create the two ends of one stream direction. */
export function createStreamPair(): [LoopbackSendStream, LoopbackRecvStream] {
  const pipe: Pipe = { chunks: createChannel<Uint8Array>(), stopCode: null };
  return [new LoopbackSendStream(pipe), new LoopbackRecvStream(pipe)];
}
