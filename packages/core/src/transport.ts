/**
 * QUIC transport abstraction.
 *
 * This module defines the slice of a QUIC connection the adapter needs:
 * opening streams, sending datagrams and querying the datagram size limit.
 * Accepting inbound streams and datagrams stays with the caller, who hands
 * each one to the connection for classification.
 *
 * Implementations:
 * - LoopbackConnection (@tuic-mux/loopback) for in-process pairs
 * - any QUIC binding that can be wrapped in these interfaces
 */

/** Write half of a QUIC stream. */
export interface SendStream {
  /** Write a chunk; resolves once the transport has taken it. */
  write(chunk: Uint8Array): Promise<void>;

  /** Gracefully finish the stream (the peer sees end of stream). */
  finish(): Promise<void>;

  /** Abruptly terminate the stream with an application error code. */
  reset(code: number): void;
}

/** Read half of a QUIC stream. */
export interface RecvStream {
  /**
   * Read up to `maxLength` bytes.
   *
   * Returns null at end of stream.
   */
  read(maxLength: number): Promise<Uint8Array | null>;

  /** Tell the peer to stop sending, discarding anything unread. */
  stop(code: number): void;
}

/** Both halves of a bidirectional stream. */
export interface BiStream {
  send: SendStream;
  recv: RecvStream;
}

/**
 * Interface for the QUIC connection a TUIC connection runs over.
 */
export interface QuicConnection {
  /** Open a unidirectional stream. */
  openUni(): Promise<SendStream>;

  /** Open a bidirectional stream. */
  openBi(): Promise<BiStream>;

  /**
   * Send an unreliable datagram.
   *
   * @throws SendDatagramError
   */
  sendDatagram(data: Uint8Array): void;

  /**
   * Largest datagram payload the connection can currently send.
   *
   * Returns null when datagrams are unsupported by the peer or disabled
   * locally.
   */
  maxDatagramSize(): number | null;
}

/** Reason a datagram could not be sent. */
export type SendDatagramErrorKind = "unsupportedByPeer" | "disabled" | "tooLarge" | "connectionLost";

/** Error thrown by `QuicConnection.sendDatagram`. */
export class SendDatagramError extends Error {
  constructor(
    public readonly kind: SendDatagramErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "SendDatagramError";
  }

  static unsupportedByPeer(): SendDatagramError {
    return new SendDatagramError("unsupportedByPeer", "datagrams not supported by peer");
  }

  static disabled(): SendDatagramError {
    return new SendDatagramError("disabled", "datagram support disabled");
  }

  static tooLarge(size: number, max: number): SendDatagramError {
    return new SendDatagramError("tooLarge", `datagram of ${size} bytes exceeds limit of ${max}`);
  }

  static connectionLost(): SendDatagramError {
    return new SendDatagramError("connectionLost", "connection lost");
  }
}
