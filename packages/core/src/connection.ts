// TUIC connection façade.
//
// Turns outbound commands into model calls plus transport writes, and
// classifies inbound channels into tasks. The caller accepts streams and
// datagrams from the QUIC connection itself and hands each one over; the
// façade never polls the transport.
//
// Role-specific behaviour lives in two classes:
// - ClientConnection: authenticate, connect, dissociate; accepts packets
//   for associations it opened
// - ServerConnection: accepts authenticate, connect, dissociate, heartbeat
//   and packets for any association

import {
  type Address,
  type Header,
  commandName,
  concat,
  encodeHeader,
} from "@tuic-mux/wire";
import { Connect } from "./connect.ts";
import {
  datagramPayload,
  decodeDatagramHeader,
  readBiHeader,
  readUniHeader,
} from "./dispatch.ts";
import { ConnectionError, assertNever } from "./error.ts";
import { ConnectionModel } from "./model/connection.ts";
import { FragmentError } from "./model/errors.ts";
import { type Fragment, planFragments } from "./model/fragments.ts";
import type { ChannelKind, CommandEvent, ConnectionObserver, Role } from "./observer.ts";
import {
  type ConnectionOptions,
  type ResolvedConnectionOptions,
  resolveConnectionOptions,
} from "./options.ts";
import { Packet } from "./packet.ts";
import type { Task } from "./task.ts";
import {
  type BiStream,
  type QuicConnection,
  type RecvStream,
  type SendStream,
  SendDatagramError,
} from "./transport.ts";

/** Stream error code used when a stream is abandoned after a failed write. */
const ABANDON_CODE = 0;

/** The fragment size field is a u16, so no fragment may exceed this. */
const MAX_FRAGMENT_LIMIT = 0xffff;

/**
 * Model and settings shared by a connection and its clones.
 */
export class ConnectionState {
  readonly model: ConnectionModel;

  constructor(readonly options: ResolvedConnectionOptions) {
    this.model = new ConnectionModel({ now: options.now });
  }
}

/**
 * Operations shared by both roles.
 */
export abstract class Connection {
  abstract readonly role: Role;

  protected readonly state: ConnectionState;

  protected constructor(
    protected readonly quic: QuicConnection,
    options: ConnectionOptions | ConnectionState,
  ) {
    this.state =
      options instanceof ConnectionState ? options : new ConnectionState(resolveConnectionOptions(options));
  }

  protected get model(): ConnectionModel {
    return this.state.model;
  }

  /** The QUIC connection this façade sends on. It is shared, not owned. */
  getTransport(): QuicConnection {
    return this.quic;
  }

  /** A second façade over the same model and transport. */
  abstract clone(): Connection;

  /**
   * Classify an accepted unidirectional stream. Only the header is read.
   *
   * @throws ConnectionError
   */
  abstract acceptUniStream(recv: RecvStream): Promise<Task>;

  /**
   * Classify an accepted bidirectional stream. Only the header is read.
   *
   * @throws ConnectionError
   */
  abstract acceptBiStream(send: SendStream, recv: RecvStream): Promise<Task>;

  /**
   * Classify a received datagram.
   *
   * @throws ConnectionError
   */
  abstract acceptDatagram(datagram: Uint8Array): Task;

  // ==========================================================================
  // Shared senders
  // ==========================================================================

  /**
   * Send a UDP packet as datagrams, fragmented to the transport's maximum
   * datagram size.
   *
   * @throws ConnectionError (sendDatagram, fragment)
   */
  packetNative(payload: Uint8Array, addr: Address, assocId: number): void {
    const max = this.quic.maxDatagramSize();
    if (max === null) {
      throw ConnectionError.sendDatagram(SendDatagramError.disabled());
    }

    const fragments = this.outbound(payload, addr, assocId, Math.min(max, MAX_FRAGMENT_LIMIT));
    for (const fragment of fragments) {
      this.sendDatagram(concat(encodeHeader(fragment.header), fragment.payload));
    }
    this.emitPacketSent("datagram", fragments);
  }

  /**
   * Send a UDP packet over unidirectional streams, one stream per fragment.
   *
   * @throws ConnectionError (connection, io, fragment)
   */
  async packetQuic(payload: Uint8Array, addr: Address, assocId: number): Promise<void> {
    const fragments = this.outbound(payload, addr, assocId, this.state.options.quicMaxPacketSize);
    for (const fragment of fragments) {
      const bytes = concat(encodeHeader(fragment.header), fragment.payload);
      const send = await this.openUni();
      await this.writeAndFinish(send, bytes);
    }
    this.emitPacketSent("uni", fragments);
  }

  /**
   * Send a heartbeat datagram.
   *
   * @throws ConnectionError (sendDatagram)
   */
  heartbeat(): void {
    const header = this.model.sendHeartbeat();
    this.sendDatagram(encodeHeader(header));
    this.emitSent({ role: this.role, command: "heartbeat", channel: "datagram" });
  }

  // ==========================================================================
  // Bookkeeping
  // ==========================================================================

  /** Connect sessions not yet finished. */
  taskConnectCount(): number {
    return this.model.taskConnectCount();
  }

  /** Live UDP associations. */
  taskAssociateCount(): number {
    return this.model.taskAssociateCount();
  }

  /**
   * Drop incomplete packets whose first fragment arrived at least
   * `timeoutMs` ago. Associations are kept.
   *
   * @returns Number of incomplete packets dropped
   */
  collectGarbage(timeoutMs: number): number {
    return this.model.collectGarbage(timeoutMs);
  }

  // ==========================================================================
  // Helpers for subclasses
  // ==========================================================================

  protected async openUni(): Promise<SendStream> {
    try {
      return await this.quic.openUni();
    } catch (e) {
      throw ConnectionError.connection(e);
    }
  }

  protected async openBi(): Promise<BiStream> {
    try {
      return await this.quic.openBi();
    } catch (e) {
      throw ConnectionError.connection(e);
    }
  }

  protected async writeAndFinish(send: SendStream, bytes: Uint8Array): Promise<void> {
    try {
      await send.write(bytes);
      await send.finish();
    } catch (e) {
      send.reset(ABANDON_CODE);
      throw ConnectionError.io(e);
    }
  }

  protected emitSent(event: CommandEvent): void {
    for (const observer of this.state.options.observers) {
      notify("sent", () => observer.sent?.(event));
    }
  }

  /** Run a classification, reporting its outcome to observers. */
  protected async observeAccept(channel: ChannelKind, classify: () => Promise<Task>): Promise<Task> {
    let task: Task;
    try {
      task = await classify();
    } catch (e) {
      this.emitRejected(channel, e);
      throw e;
    }
    this.emitAccepted(channel, task);
    return task;
  }

  protected observeAcceptSync(channel: ChannelKind, classify: () => Task): Task {
    let task: Task;
    try {
      task = classify();
    } catch (e) {
      this.emitRejected(channel, e);
      throw e;
    }
    this.emitAccepted(channel, task);
    return task;
  }

  private outbound(payload: Uint8Array, addr: Address, assocId: number, limit: number): Fragment[] {
    if (!Number.isInteger(assocId) || assocId < 0 || assocId > 0xffff) {
      throw new RangeError(`assocId must be a u16, got ${assocId}`);
    }
    try {
      planFragments(addr, limit, payload.length);
    } catch (e) {
      if (e instanceof FragmentError) throw ConnectionError.fragment(e);
      throw e;
    }
    return this.model.sendPacket(assocId, addr, limit).fragments(payload);
  }

  private sendDatagram(bytes: Uint8Array): void {
    try {
      this.quic.sendDatagram(bytes);
    } catch (e) {
      if (e instanceof SendDatagramError) throw ConnectionError.sendDatagram(e);
      throw ConnectionError.connection(e);
    }
  }

  private emitPacketSent(channel: ChannelKind, fragments: Fragment[]): void {
    const first = fragments[0];
    if (first === undefined) return;
    this.emitSent({
      role: this.role,
      command: "packet",
      channel,
      addr: first.header.addr,
      assocId: first.header.assocId,
      pktId: first.header.pktId,
      fragTotal: first.header.fragTotal,
    });
  }

  private emitAccepted(channel: ChannelKind, task: Task): void {
    const observers = this.state.options.observers;
    if (observers.length === 0) return;
    const event = taskEvent(this.role, channel, task);
    for (const observer of observers) {
      notify("accepted", () => observer.accepted?.(event));
    }
  }

  private emitRejected(channel: ChannelKind, error: unknown): void {
    if (!(error instanceof ConnectionError)) return;
    const event = { role: this.role, channel, error };
    for (const observer of this.state.options.observers) {
      notify("rejected", () => observer.rejected?.(event));
    }
  }
}

/**
 * Run one observer hook. Whatever the hook throws is reported on stderr and
 * goes no further: the task or error being observed is what the caller gets.
 */
function notify(hook: keyof ConnectionObserver, call: () => void): void {
  try {
    call();
  } catch (e) {
    console.error(`[tuic] ${hook} observer threw`, e);
  }
}

function taskEvent(role: Role, channel: ChannelKind, task: Task): CommandEvent {
  switch (task.kind) {
    case "authenticate":
    case "heartbeat":
      return { role, command: task.kind, channel };
    case "connect":
      return { role, command: "connect", channel, addr: task.connect.addr };
    case "dissociate":
      return { role, command: "dissociate", channel, assocId: task.assocId };
    case "packet": {
      const packet = task.packet;
      return {
        role,
        command: "packet",
        channel,
        addr: packet.addr,
        assocId: packet.assocId,
        pktId: packet.pktId,
        fragTotal: packet.fragTotal,
        fragId: packet.fragId,
      };
    }
    default:
      return assertNever(task);
  }
}

function badUni(header: Header, recv: RecvStream): ConnectionError {
  return ConnectionError.badCommandUniStream(commandName(header), recv);
}

function badBi(header: Header, send: SendStream, recv: RecvStream): ConnectionError {
  return ConnectionError.badCommandBiStream(commandName(header), send, recv);
}

function badDatagram(header: Header, datagram: Uint8Array): ConnectionError {
  return ConnectionError.badCommandDatagram(commandName(header), datagram);
}

// ============================================================================
// Client
// ============================================================================

/**
 * Client side of a TUIC connection.
 *
 * @example
 * ```typescript
 * const conn = new ClientConnection(quic);
 * await conn.authenticate(token);
 * const session = await conn.connect(parseAddress("example.com:443"));
 * await session.write(request);
 * ```
 */
export class ClientConnection extends Connection {
  readonly role = "client" as const;

  constructor(quic: QuicConnection, options: ConnectionOptions | ConnectionState = {}) {
    super(quic, options);
  }

  clone(): ClientConnection {
    return new ClientConnection(this.quic, this.state);
  }

  /**
   * Send the authentication token on a fresh unidirectional stream.
   *
   * @throws RangeError if the token is not 32 bytes
   * @throws ConnectionError (connection, io)
   */
  async authenticate(token: Uint8Array): Promise<void> {
    const header = this.model.sendAuthenticate(token);
    const send = await this.openUni();
    await this.writeAndFinish(send, encodeHeader(header));
    this.emitSent({ role: this.role, command: "authenticate", channel: "uni" });
  }

  /**
   * Open a relayed TCP session to `addr`.
   *
   * Returns as soon as the header is written; the peer's reply is not
   * awaited.
   *
   * @throws RangeError if the address does not fit the header
   * @throws ConnectionError (connection, io)
   */
  async connect(addr: Address): Promise<Connect> {
    const task = this.model.sendConnect(addr);

    let header: Uint8Array;
    try {
      header = encodeHeader(task.header);
    } catch (e) {
      task.registration.release();
      throw e;
    }

    let stream: BiStream;
    try {
      stream = await this.openBi();
    } catch (e) {
      task.registration.release();
      throw e;
    }

    try {
      await stream.send.write(header);
    } catch (e) {
      task.registration.release();
      stream.send.reset(ABANDON_CODE);
      stream.recv.stop(ABANDON_CODE);
      throw ConnectionError.io(e);
    }

    this.emitSent({ role: this.role, command: "connect", channel: "bi", addr });
    return new Connect(stream.send, stream.recv, addr, task.registration);
  }

  /**
   * Drop a UDP association and tell the server.
   *
   * @throws ConnectionError (connection, io)
   */
  async dissociate(assocId: number): Promise<void> {
    const header = this.model.sendDissociate(assocId);
    const send = await this.openUni();
    await this.writeAndFinish(send, encodeHeader(header));
    this.emitSent({ role: this.role, command: "dissociate", channel: "uni", assocId });
  }

  acceptUniStream(recv: RecvStream): Promise<Task> {
    return this.observeAccept("uni", async () => {
      const header = await readUniHeader(recv);
      switch (header.tag) {
        case "Packet": {
          const packet = this.model.recvPacket(header);
          if (packet === null) {
            recv.stop(ABANDON_CODE);
            throw ConnectionError.invalidUdpSession(header.assocId);
          }
          return { kind: "packet", packet: new Packet(packet, { kind: "quic", recv }) };
        }
        case "Authenticate":
        case "Connect":
        case "Dissociate":
        case "Heartbeat":
          throw badUni(header, recv);
        default:
          return assertNever(header);
      }
    });
  }

  acceptBiStream(send: SendStream, recv: RecvStream): Promise<Task> {
    return this.observeAccept("bi", async () => {
      const header = await readBiHeader(send, recv);
      switch (header.tag) {
        case "Authenticate":
        case "Connect":
        case "Packet":
        case "Dissociate":
        case "Heartbeat":
          throw badBi(header, send, recv);
        default:
          return assertNever(header);
      }
    });
  }

  acceptDatagram(datagram: Uint8Array): Task {
    return this.observeAcceptSync("datagram", () => {
      const { header, offset } = decodeDatagramHeader(datagram);
      switch (header.tag) {
        case "Packet": {
          const payload = datagramPayload(header, datagram, offset);
          const packet = this.model.recvPacket(header);
          if (packet === null) throw ConnectionError.invalidUdpSession(header.assocId);
          return { kind: "packet", packet: new Packet(packet, { kind: "native", payload }) };
        }
        case "Authenticate":
        case "Connect":
        case "Dissociate":
        case "Heartbeat":
          throw badDatagram(header, datagram);
        default:
          return assertNever(header);
      }
    });
  }
}

// ============================================================================
// Server
// ============================================================================

/**
 * Server side of a TUIC connection.
 *
 * Associations are created from inbound traffic; the server never opens
 * one itself.
 */
export class ServerConnection extends Connection {
  readonly role = "server" as const;

  constructor(quic: QuicConnection, options: ConnectionOptions | ConnectionState = {}) {
    super(quic, options);
  }

  clone(): ServerConnection {
    return new ServerConnection(this.quic, this.state);
  }

  acceptUniStream(recv: RecvStream): Promise<Task> {
    return this.observeAccept("uni", async () => {
      const header = await readUniHeader(recv);
      switch (header.tag) {
        case "Authenticate":
          return { kind: "authenticate", token: this.model.recvAuthenticate(header) };
        case "Packet": {
          const packet = this.model.recvPacketUnrestricted(header);
          return { kind: "packet", packet: new Packet(packet, { kind: "quic", recv }) };
        }
        case "Dissociate":
          return { kind: "dissociate", assocId: this.model.recvDissociate(header) };
        case "Connect":
        case "Heartbeat":
          throw badUni(header, recv);
        default:
          return assertNever(header);
      }
    });
  }

  acceptBiStream(send: SendStream, recv: RecvStream): Promise<Task> {
    return this.observeAccept("bi", async () => {
      const header = await readBiHeader(send, recv);
      switch (header.tag) {
        case "Connect": {
          const task = this.model.recvConnect(header);
          return { kind: "connect", connect: new Connect(send, recv, task.addr, task.registration) };
        }
        case "Authenticate":
        case "Packet":
        case "Dissociate":
        case "Heartbeat":
          throw badBi(header, send, recv);
        default:
          return assertNever(header);
      }
    });
  }

  acceptDatagram(datagram: Uint8Array): Task {
    return this.observeAcceptSync("datagram", () => {
      const { header, offset } = decodeDatagramHeader(datagram);
      switch (header.tag) {
        case "Packet": {
          const payload = datagramPayload(header, datagram, offset);
          const packet = this.model.recvPacketUnrestricted(header);
          return { kind: "packet", packet: new Packet(packet, { kind: "native", payload }) };
        }
        case "Heartbeat":
          this.model.recvHeartbeat(header);
          return { kind: "heartbeat" };
        case "Authenticate":
        case "Connect":
        case "Dissociate":
          throw badDatagram(header, datagram);
        default:
          return assertNever(header);
      }
    });
  }
}
