// Connection-level errors.
//
// Every failure the façade reports is a ConnectionError. Errors raised while
// classifying an inbound channel carry that channel, so the caller decides
// whether to reset it, drain it or hand it elsewhere.

import type { CommandName, UnmarshalError } from "@tuic-mux/wire";
import type { AssembleError, FragmentError } from "./model/errors.ts";
import type { RecvStream, SendDatagramError, SendStream } from "./transport.ts";

export type ConnectionErrorDetail =
  | { kind: "io"; cause: unknown }
  | { kind: "connection"; cause: unknown }
  | { kind: "sendDatagram"; error: SendDatagramError }
  | { kind: "payloadLength"; expected: number; actual: number }
  | { kind: "invalidUdpSession"; assocId: number }
  | { kind: "assemble"; error: AssembleError }
  | { kind: "fragment"; error: FragmentError }
  | { kind: "unmarshalUniStream"; error: UnmarshalError; recv: RecvStream }
  | { kind: "unmarshalBiStream"; error: UnmarshalError; send: SendStream; recv: RecvStream }
  | { kind: "unmarshalDatagram"; error: UnmarshalError; datagram: Uint8Array }
  | { kind: "badCommandUniStream"; command: CommandName; recv: RecvStream }
  | { kind: "badCommandBiStream"; command: CommandName; send: SendStream; recv: RecvStream }
  | { kind: "badCommandDatagram"; command: CommandName; datagram: Uint8Array }
  | { kind: "alreadyAccepted" };

export type ConnectionErrorKind = ConnectionErrorDetail["kind"];

export class ConnectionError extends Error {
  constructor(
    public readonly detail: ConnectionErrorDetail,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "ConnectionError";
  }

  get kind(): ConnectionErrorKind {
    return this.detail.kind;
  }

  /**
   * Reset or stop every channel attached to this error.
   *
   * Does nothing for errors that carry no channel.
   */
  discardChannels(code: number): void {
    const detail = this.detail;
    switch (detail.kind) {
      case "unmarshalUniStream":
      case "badCommandUniStream":
        detail.recv.stop(code);
        return;
      case "unmarshalBiStream":
      case "badCommandBiStream":
        detail.send.reset(code);
        detail.recv.stop(code);
        return;
      default:
        return;
    }
  }

  static io(cause: unknown): ConnectionError {
    return new ConnectionError({ kind: "io", cause }, `io error: ${describe(cause)}`, cause);
  }

  static connection(cause: unknown): ConnectionError {
    return new ConnectionError(
      { kind: "connection", cause },
      `connection error: ${describe(cause)}`,
      cause,
    );
  }

  static sendDatagram(error: SendDatagramError): ConnectionError {
    return new ConnectionError(
      { kind: "sendDatagram", error },
      `failed to send datagram: ${error.message}`,
      error,
    );
  }

  static payloadLength(expected: number, actual: number): ConnectionError {
    return new ConnectionError(
      { kind: "payloadLength", expected, actual },
      `datagram payload length mismatch: expected ${expected} bytes, got ${actual}`,
    );
  }

  static invalidUdpSession(assocId: number): ConnectionError {
    return new ConnectionError(
      { kind: "invalidUdpSession", assocId },
      `invalid UDP session: ${assocId}`,
    );
  }

  static assemble(error: AssembleError): ConnectionError {
    return new ConnectionError({ kind: "assemble", error }, error.message, error);
  }

  static fragment(error: FragmentError): ConnectionError {
    return new ConnectionError({ kind: "fragment", error }, error.message, error);
  }

  static unmarshalUniStream(error: UnmarshalError, recv: RecvStream): ConnectionError {
    return new ConnectionError(
      { kind: "unmarshalUniStream", error, recv },
      `failed to decode unidirectional stream header: ${error.message}`,
      error,
    );
  }

  static unmarshalBiStream(error: UnmarshalError, send: SendStream, recv: RecvStream): ConnectionError {
    return new ConnectionError(
      { kind: "unmarshalBiStream", error, send, recv },
      `failed to decode bidirectional stream header: ${error.message}`,
      error,
    );
  }

  static unmarshalDatagram(error: UnmarshalError, datagram: Uint8Array): ConnectionError {
    return new ConnectionError(
      { kind: "unmarshalDatagram", error, datagram },
      `failed to decode datagram header: ${error.message}`,
      error,
    );
  }

  static badCommandUniStream(command: CommandName, recv: RecvStream): ConnectionError {
    return new ConnectionError(
      { kind: "badCommandUniStream", command, recv },
      `received bad command ${command} on unidirectional stream`,
    );
  }

  static badCommandBiStream(command: CommandName, send: SendStream, recv: RecvStream): ConnectionError {
    return new ConnectionError(
      { kind: "badCommandBiStream", command, send, recv },
      `received bad command ${command} on bidirectional stream`,
    );
  }

  static badCommandDatagram(command: CommandName, datagram: Uint8Array): ConnectionError {
    return new ConnectionError(
      { kind: "badCommandDatagram", command, datagram },
      `received bad command ${command} in datagram`,
    );
  }

  static alreadyAccepted(): ConnectionError {
    return new ConnectionError({ kind: "alreadyAccepted" }, "packet already accepted");
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** Exhaustiveness check for switch statements over tagged unions. */
export function assertNever(value: never): never {
  throw new Error(`unexpected value: ${JSON.stringify(value)}`);
}
