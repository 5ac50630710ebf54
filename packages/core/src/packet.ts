// Inbound UDP packet fragment.

import type { Address } from "@tuic-mux/wire";
import { ConnectionError, assertNever } from "./error.ts";
import { readExact } from "./io.ts";
import type { InboundPacket } from "./model/connection.ts";
import { AssembleError } from "./model/errors.ts";
import type { AssembledPacket } from "./model/udp_session.ts";
import type { RecvStream } from "./transport.ts";

/** Where a fragment's bytes come from. */
export type PacketSource =
  /** Still on a unidirectional stream, right after the header. */
  | { kind: "quic"; recv: RecvStream }
  /** Already in memory, sliced out of a datagram. */
  | { kind: "native"; payload: Uint8Array };

/** Stream error code used when a stream-sourced packet is discarded. */
export const PACKET_DISCARD_CODE = 0;

/**
 * One received fragment of a UDP packet.
 *
 * The fragment's bytes are not read until `accept()`, which can be called
 * once.
 */
export class Packet {
  private consumed = false;

  constructor(
    private readonly model: InboundPacket,
    private readonly source: PacketSource,
  ) {}

  get assocId(): number {
    return this.model.assocId;
  }

  get pktId(): number {
    return this.model.pktId;
  }

  get fragTotal(): number {
    return this.model.fragTotal;
  }

  get fragId(): number {
    return this.model.fragId;
  }

  get size(): number {
    return this.model.size;
  }

  /** Destination address; `None` on every fragment but the first. */
  get addr(): Address {
    return this.model.addr;
  }

  get sourceKind(): PacketSource["kind"] {
    return this.source.kind;
  }

  /**
   * Read this fragment and merge it into the association's reassembly state.
   *
   * Resolves to the whole packet once every fragment has arrived, otherwise
   * to null.
   *
   * @throws ConnectionError (io, assemble, alreadyAccepted)
   */
  async accept(): Promise<AssembledPacket | null> {
    if (this.consumed) throw ConnectionError.alreadyAccepted();
    this.consumed = true;

    const payload = await this.payload();
    try {
      return this.model.assemble(payload);
    } catch (e) {
      if (e instanceof AssembleError) throw ConnectionError.assemble(e);
      throw e;
    }
  }

  /** Give up on this fragment. A stream source is stopped unread. */
  discard(code = PACKET_DISCARD_CODE): void {
    if (this.consumed) return;
    this.consumed = true;
    if (this.source.kind === "quic") {
      this.source.recv.stop(code);
    }
  }

  private async payload(): Promise<Uint8Array> {
    const source = this.source;
    switch (source.kind) {
      case "native":
        return source.payload;
      case "quic": {
        let bytes: Uint8Array | null;
        try {
          bytes = await readExact(source.recv, this.model.size);
        } catch (e) {
          throw ConnectionError.io(e);
        }
        if (bytes === null) {
          throw ConnectionError.io(
            new Error(`stream ended before ${this.model.size} bytes of packet data`),
          );
        }
        return bytes;
      }
      default:
        return assertNever(source);
    }
  }
}
