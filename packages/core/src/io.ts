// Exact reads over a QUIC receive stream.

import type { ByteSource } from "@tuic-mux/wire";
import type { RecvStream } from "./transport.ts";

/**
 * Read exactly `length` bytes from a stream.
 *
 * Returns null if the stream ends first; bytes read before that are dropped.
 */
export async function readExact(recv: RecvStream, length: number): Promise<Uint8Array | null> {
  const out = new Uint8Array(length);
  let filled = 0;
  while (filled < length) {
    const chunk = await recv.read(length - filled);
    if (chunk === null) return null;
    out.set(chunk, filled);
    filled += chunk.length;
  }
  return out;
}

/** Adapt a receive stream to the header reader's byte source. */
export function streamSource(recv: RecvStream): ByteSource {
  return {
    readExact: (length) => readExact(recv, length),
  };
}
