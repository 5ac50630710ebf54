// In-process QUIC connection pair.
//
// Everything one endpoint opens or sends is queued for the other endpoint
// to accept. Datagrams are delivered reliably and in order, which is a
// superset of what QUIC promises.

import { type BiStream, type QuicConnection, type SendStream, SendDatagramError } from "@tuic-mux/core";
import { type Channel, createChannel } from "./channel.ts";
import { LoopbackError } from "./error.ts";
import { type LoopbackRecvStream, createStreamPair } from "./stream.ts";

/** Default datagram size limit, a typical QUIC value. */
export const DEFAULT_MAX_DATAGRAM_SIZE = 1200;

export interface LoopbackOptions {
  /**
   * Largest datagram either endpoint may send. Defaults to 1200.
   * null disables datagrams.
   */
  maxDatagramSize?: number | null;
}

/** An accepted bidirectional stream, as seen by the accepting side. */
export interface LoopbackBiStream {
  send: SendStream;
  recv: LoopbackRecvStream;
}

/**
 * One endpoint of a loopback pair.
 */
export class LoopbackConnection implements QuicConnection {
  private readonly uni: Channel<LoopbackRecvStream> = createChannel();
  private readonly bi: Channel<LoopbackBiStream> = createChannel();
  private readonly datagrams: Channel<Uint8Array> = createChannel();
  private peer: LoopbackConnection | null = null;
  private closed = false;

  constructor(private readonly datagramLimit: number | null) {}

  /** Connect two endpoints. */
  static link(a: LoopbackConnection, b: LoopbackConnection): void {
    a.peer = b;
    b.peer = a;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async openUni(): Promise<SendStream> {
    const peer = this.livePeer();
    const [send, recv] = createStreamPair();
    peer.uni.send(recv);
    return send;
  }

  async openBi(): Promise<BiStream> {
    const peer = this.livePeer();
    const [localSend, peerRecv] = createStreamPair();
    const [peerSend, localRecv] = createStreamPair();
    peer.bi.send({ send: peerSend, recv: peerRecv });
    return { send: localSend, recv: localRecv };
  }

  sendDatagram(data: Uint8Array): void {
    if (this.closed || this.peer === null || this.peer.closed) {
      throw SendDatagramError.connectionLost();
    }
    if (this.datagramLimit === null) {
      throw SendDatagramError.disabled();
    }
    if (data.length > this.datagramLimit) {
      throw SendDatagramError.tooLarge(data.length, this.datagramLimit);
    }
    this.peer.datagrams.send(data.slice());
  }

  maxDatagramSize(): number | null {
    return this.datagramLimit;
  }

  /** Next unidirectional stream the peer opened, or null once closed. */
  acceptUni(): Promise<LoopbackRecvStream | null> {
    return this.uni.recv();
  }

  /** Next bidirectional stream the peer opened, or null once closed. */
  acceptBi(): Promise<LoopbackBiStream | null> {
    return this.bi.recv();
  }

  /** Next datagram the peer sent, or null once closed. */
  readDatagram(): Promise<Uint8Array | null> {
    return this.datagrams.recv();
  }

  /**
   * Close both endpoints. Anything already queued can still be accepted;
   * nothing new can be opened or sent.
   */
  close(): void {
    for (const endpoint of [this, this.peer]) {
      if (endpoint === null || endpoint.closed) continue;
      endpoint.closed = true;
      endpoint.uni.close();
      endpoint.bi.close();
      endpoint.datagrams.close();
    }
  }

  private livePeer(): LoopbackConnection {
    if (this.closed || this.peer === null || this.peer.closed) {
      throw LoopbackError.closed();
    }
    return this.peer;
  }
}

/**
 * Create two connected endpoints, conventionally `[client, server]`.
 *
 * @throws RangeError if `maxDatagramSize` is not a positive integer or null
 */
export function loopbackPair(options: LoopbackOptions = {}): [LoopbackConnection, LoopbackConnection] {
  const limit = options.maxDatagramSize === undefined ? DEFAULT_MAX_DATAGRAM_SIZE : options.maxDatagramSize;
  if (limit !== null && (!Number.isInteger(limit) || limit < 1)) {
    throw new RangeError(`maxDatagramSize must be a positive integer or null, got ${limit}`);
  }

  const a = new LoopbackConnection(limit);
  const b = new LoopbackConnection(limit);
  LoopbackConnection.link(a, b);
  return [a, b];
}
