// Connection configuration.

import type { ConnectionModelOptions } from "./model/connection.ts";
import type { ConnectionObserver } from "./observer.ts";

/** Largest fragment (header included) sent on a unidirectional stream. */
export const DEFAULT_QUIC_MAX_PACKET_SIZE = 0xffff;

export interface ConnectionOptions {
  /**
   * Per-fragment size limit for `packetQuic`, header included.
   * Defaults to 65535, which is also the maximum.
   */
  quicMaxPacketSize?: number;

  /** Observers notified of sent, accepted and rejected commands. */
  observers?: ConnectionObserver[];

  /** Clock for reassembly buffer ages. Defaults to `Date.now`. */
  now?: ConnectionModelOptions["now"];
}

export interface ResolvedConnectionOptions {
  quicMaxPacketSize: number;
  observers: readonly ConnectionObserver[];
  now: () => number;
}

/**
 * Fill in defaults and validate.
 *
 * @throws RangeError if `quicMaxPacketSize` is not an integer in 1..65535
 */
export function resolveConnectionOptions(options: ConnectionOptions = {}): ResolvedConnectionOptions {
  const quicMaxPacketSize = options.quicMaxPacketSize ?? DEFAULT_QUIC_MAX_PACKET_SIZE;
  if (
    !Number.isInteger(quicMaxPacketSize) ||
    quicMaxPacketSize < 1 ||
    quicMaxPacketSize > DEFAULT_QUIC_MAX_PACKET_SIZE
  ) {
    throw new RangeError(`quicMaxPacketSize must be an integer in 1..65535, got ${quicMaxPacketSize}`);
  }

  return {
    quicMaxPacketSize,
    observers: [...(options.observers ?? [])],
    now: options.now ?? Date.now,
  };
}
