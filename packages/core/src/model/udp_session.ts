// Per-association state: outbound packet ids and inbound reassembly.

import { type Address, type HeaderPacket, concat } from "@tuic-mux/wire";
import { AssembleError } from "./errors.ts";

/** A fully reassembled UDP datagram. */
export interface AssembledPacket {
  payload: Uint8Array;
  addr: Address;
  assocId: number;
}

interface ReassemblyBuffer {
  fragTotal: number;
  fragments: Array<Uint8Array | undefined>;
  received: number;
  addr: Address | null;
  createdAt: number;
}

/**
 * State for one UDP association.
 *
 * Each association numbers its own outbound packets (16-bit, wrapping) and
 * keeps one reassembly buffer per inbound packet id until every fragment of
 * that packet has arrived.
 */
export class UdpSession {
  private nextPktId = 0;
  private buffers = new Map<number, ReassemblyBuffer>();

  constructor(readonly assocId: number) {}

  /** Allocate the id for the next outbound packet. */
  allocatePktId(): number {
    const id = this.nextPktId;
    this.nextPktId = (this.nextPktId + 1) & 0xffff;
    return id;
  }

  /** Number of packets with some but not all fragments received. */
  get pendingCount(): number {
    return this.buffers.size;
  }

  /**
   * Merge one fragment.
   *
   * Returns the packet once its last fragment arrives, otherwise null.
   *
   * @throws AssembleError
   */
  assemble(header: HeaderPacket, payload: Uint8Array, now: number): AssembledPacket | null {
    if (payload.length !== header.size) {
      throw AssembleError.sizeMismatch(header.size, payload.length);
    }
    if (header.fragId >= header.fragTotal) {
      throw AssembleError.invalidFragmentId(header.fragTotal, header.fragId);
    }
    if (header.fragId === 0 && header.addr.tag === "None") {
      throw AssembleError.addressMissing();
    }
    if (header.fragId !== 0 && header.addr.tag !== "None") {
      throw AssembleError.unexpectedAddress(header.fragId);
    }

    if (header.fragTotal === 1) {
      return { payload, addr: header.addr, assocId: this.assocId };
    }

    let buf = this.buffers.get(header.pktId);
    if (!buf) {
      buf = {
        fragTotal: header.fragTotal,
        fragments: new Array<Uint8Array | undefined>(header.fragTotal),
        received: 0,
        addr: null,
        createdAt: now,
      };
      this.buffers.set(header.pktId, buf);
    } else if (buf.fragTotal !== header.fragTotal) {
      throw AssembleError.fragmentTotalMismatch(buf.fragTotal, header.fragTotal);
    }

    if (buf.fragments[header.fragId] !== undefined) {
      throw AssembleError.duplicatedFragment(header.fragId);
    }
    buf.fragments[header.fragId] = payload;
    buf.received++;
    if (header.fragId === 0) {
      buf.addr = header.addr;
    }

    if (buf.received < buf.fragTotal || buf.addr === null) {
      return null;
    }

    this.buffers.delete(header.pktId);
    const parts: Uint8Array[] = [];
    for (const part of buf.fragments) {
      if (part !== undefined) parts.push(part);
    }
    return { payload: concat(...parts), addr: buf.addr, assocId: this.assocId };
  }

  /**
   * Drop reassembly buffers at least `timeoutMs` old.
   *
   * @returns Number of buffers dropped
   */
  collectGarbage(timeoutMs: number, now: number): number {
    let dropped = 0;
    for (const [pktId, buf] of this.buffers) {
      if (now - buf.createdAt >= timeoutMs) {
        this.buffers.delete(pktId);
        dropped++;
      }
    }
    return dropped;
  }
}
