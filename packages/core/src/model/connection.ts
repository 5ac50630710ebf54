// Protocol model: command state, associations, counters.
//
// Everything here is synchronous. The connection façade drives it and does
// the transport I/O around it.

import {
  type Address,
  type HeaderAuthenticate,
  type HeaderConnect,
  type HeaderDissociate,
  type HeaderHeartbeat,
  type HeaderPacket,
  TOKEN_LENGTH,
  headerAuthenticate,
  headerConnect,
  headerDissociate,
  headerHeartbeat,
} from "@tuic-mux/wire";
import { type Fragment, fragmentPayload, planFragments } from "./fragments.ts";
import { TaskCounter, type TaskRegistration } from "./task_counter.ts";
import { type AssembledPacket, UdpSession } from "./udp_session.ts";

export interface ConnectionModelOptions {
  /** Clock used to stamp reassembly buffers. Defaults to `Date.now`. */
  now?: () => number;
}

/**
 * A connect task, on either side of the connection.
 *
 * Holds the connect-task registration until released.
 */
export class ConnectTask {
  constructor(
    readonly addr: Address,
    readonly registration: TaskRegistration,
  ) {}

  /** Header to send for an outbound connect. */
  get header(): HeaderConnect {
    return headerConnect(this.addr);
  }
}

/**
 * An outbound packet: one association, one packet id, any number of fragments.
 */
export class OutboundPacket {
  constructor(
    readonly assocId: number,
    readonly pktId: number,
    readonly addr: Address,
    readonly maxPacketSize: number,
  ) {}

  /** Number of fragments `payloadLength` bytes will be split into. */
  fragmentCount(payloadLength: number): number {
    return planFragments(this.addr, this.maxPacketSize, payloadLength).total;
  }

  /**
   * Split a payload into fragments for this packet.
   *
   * @throws FragmentError
   */
  fragments(payload: Uint8Array): Fragment[] {
    return Array.from(fragmentPayload(this.assocId, this.pktId, this.addr, this.maxPacketSize, payload));
  }
}

/**
 * An inbound packet fragment registered with its association.
 */
export class InboundPacket {
  constructor(
    readonly header: HeaderPacket,
    private readonly session: UdpSession,
    private readonly now: () => number,
  ) {}

  get assocId(): number {
    return this.header.assocId;
  }

  get pktId(): number {
    return this.header.pktId;
  }

  get fragTotal(): number {
    return this.header.fragTotal;
  }

  get fragId(): number {
    return this.header.fragId;
  }

  get size(): number {
    return this.header.size;
  }

  get addr(): Address {
    return this.header.addr;
  }

  /**
   * Merge this fragment's bytes into the association's reassembly state.
   *
   * @throws AssembleError
   */
  assemble(payload: Uint8Array): AssembledPacket | null {
    return this.session.assemble(this.header, payload, this.now());
  }
}

/**
 * Protocol state of one connection.
 */
export class ConnectionModel {
  private readonly connects = new TaskCounter();
  private readonly sessions = new Map<number, UdpSession>();
  private readonly now: () => number;

  constructor(options: ConnectionModelOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  // ==========================================================================
  // Send side
  // ==========================================================================

  sendAuthenticate(token: Uint8Array): HeaderAuthenticate {
    if (token.length !== TOKEN_LENGTH) {
      throw new RangeError(`token must be ${TOKEN_LENGTH} bytes, got ${token.length}`);
    }
    return headerAuthenticate(token);
  }

  sendConnect(addr: Address): ConnectTask {
    return new ConnectTask(addr, this.connects.register());
  }

  /**
   * Start an outbound packet on an association, creating the association
   * if it does not exist yet.
   */
  sendPacket(assocId: number, addr: Address, maxPacketSize: number): OutboundPacket {
    const session = this.session(assocId);
    return new OutboundPacket(assocId, session.allocatePktId(), addr, maxPacketSize);
  }

  sendDissociate(assocId: number): HeaderDissociate {
    this.sessions.delete(assocId);
    return headerDissociate(assocId);
  }

  sendHeartbeat(): HeaderHeartbeat {
    return headerHeartbeat();
  }

  // ==========================================================================
  // Receive side
  // ==========================================================================

  recvAuthenticate(header: HeaderAuthenticate): Uint8Array {
    return header.token;
  }

  recvConnect(header: HeaderConnect): ConnectTask {
    return new ConnectTask(header.addr, this.connects.register());
  }

  /**
   * Register an inbound fragment for a known association.
   *
   * Returns null if the association does not exist.
   */
  recvPacket(header: HeaderPacket): InboundPacket | null {
    const session = this.sessions.get(header.assocId);
    if (!session) return null;
    return new InboundPacket(header, session, this.now);
  }

  /** Register an inbound fragment, creating the association if needed. */
  recvPacketUnrestricted(header: HeaderPacket): InboundPacket {
    return new InboundPacket(header, this.session(header.assocId), this.now);
  }

  recvDissociate(header: HeaderDissociate): number {
    this.sessions.delete(header.assocId);
    return header.assocId;
  }

  recvHeartbeat(_header: HeaderHeartbeat): void {}

  // ==========================================================================
  // Bookkeeping
  // ==========================================================================

  /** Connect tasks registered and not yet released. */
  taskConnectCount(): number {
    return this.connects.count;
  }

  /** Live UDP associations. */
  taskAssociateCount(): number {
    return this.sessions.size;
  }

  /** Whether an association exists. */
  hasAssociation(assocId: number): boolean {
    return this.sessions.has(assocId);
  }

  /**
   * Drop every reassembly buffer at least `timeoutMs` old.
   *
   * @returns Number of buffers dropped
   */
  collectGarbage(timeoutMs: number): number {
    const now = this.now();
    let dropped = 0;
    for (const session of this.sessions.values()) {
      dropped += session.collectGarbage(timeoutMs, now);
    }
    return dropped;
  }

  private session(assocId: number): UdpSession {
    let session = this.sessions.get(assocId);
    if (!session) {
      session = new UdpSession(assocId);
      this.sessions.set(assocId, session);
    }
    return session;
  }
}
