// Relayed TCP session over a bidirectional stream.

import { type Address, formatAddress } from "@tuic-mux/wire";
import { ConnectionError } from "./error.ts";
import type { TaskRegistration } from "./model/task_counter.ts";
import type { RecvStream, SendStream } from "./transport.ts";

/** Stream error code used when a session is destroyed. */
export const CONNECT_DESTROY_CODE = 0;

/**
 * One relayed TCP-style session.
 *
 * Owns both halves of its bidirectional stream. The connect-task
 * registration is released once the write half is closed and the read half
 * has reached end of stream, or on `destroy()`.
 */
export class Connect {
  private writeClosed = false;
  private readEnded = false;

  constructor(
    private readonly send: SendStream,
    private readonly recv: RecvStream,
    readonly addr: Address,
    private readonly registration: TaskRegistration,
  ) {}

  /** Target address as `host:port`. */
  get target(): string {
    return formatAddress(this.addr);
  }

  /** Whether the session has released its task registration. */
  get isFinished(): boolean {
    return this.registration.isReleased;
  }

  /**
   * Read up to `maxLength` bytes. Returns null at end of stream.
   *
   * @throws ConnectionError (io)
   */
  async read(maxLength = 65536): Promise<Uint8Array | null> {
    if (this.readEnded) return null;
    let chunk: Uint8Array | null;
    try {
      chunk = await this.recv.read(maxLength);
    } catch (e) {
      throw ConnectionError.io(e);
    }
    if (chunk === null) {
      this.readEnded = true;
      this.releaseIfDone();
    }
    return chunk;
  }

  /**
   * Write a chunk to the peer.
   *
   * @throws ConnectionError (io)
   */
  async write(chunk: Uint8Array): Promise<void> {
    if (this.writeClosed) {
      throw ConnectionError.io(new Error("write half already closed"));
    }
    try {
      await this.send.write(chunk);
    } catch (e) {
      throw ConnectionError.io(e);
    }
  }

  /**
   * Finish the write half. The peer reads end of stream; reading from this
   * side continues.
   *
   * @throws ConnectionError (io)
   */
  async close(): Promise<void> {
    if (this.writeClosed) return;
    this.writeClosed = true;
    try {
      await this.send.finish();
    } catch (e) {
      throw ConnectionError.io(e);
    } finally {
      this.releaseIfDone();
    }
  }

  /** Reset the write half, stop the read half and release the registration. */
  destroy(code = CONNECT_DESTROY_CODE): void {
    if (!this.writeClosed) {
      this.writeClosed = true;
      this.send.reset(code);
    }
    if (!this.readEnded) {
      this.readEnded = true;
      this.recv.stop(code);
    }
    this.registration.release();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array, void, undefined> {
    for (;;) {
      const chunk = await this.read();
      if (chunk === null) return;
      yield chunk;
    }
  }

  private releaseIfDone(): void {
    if (this.writeClosed && this.readEnded) {
      this.registration.release();
    }
  }
}
