// TUIC connection adapter
//
// Multiplexes TUIC commands over a QUIC connection and classifies the
// channels the peer opens.

// ============================================================================
// Connections
// ============================================================================

export { Connection, ClientConnection, ServerConnection, ConnectionState } from "./connection.ts";
export type { Task, TaskKind } from "./task.ts";
export { Connect, CONNECT_DESTROY_CODE } from "./connect.ts";
export { Packet, type PacketSource, PACKET_DISCARD_CODE } from "./packet.ts";
export {
  ConnectionError,
  type ConnectionErrorDetail,
  type ConnectionErrorKind,
  assertNever,
} from "./error.ts";

// ============================================================================
// Transport
// ============================================================================

export {
  type QuicConnection,
  type SendStream,
  type RecvStream,
  type BiStream,
  SendDatagramError,
  type SendDatagramErrorKind,
} from "./transport.ts";
export { readExact, streamSource } from "./io.ts";
export {
  type DatagramHeader,
  readUniHeader,
  readBiHeader,
  decodeDatagramHeader,
  datagramPayload,
} from "./dispatch.ts";

// ============================================================================
// Configuration and observability
// ============================================================================

export {
  type ConnectionOptions,
  type ResolvedConnectionOptions,
  DEFAULT_QUIC_MAX_PACKET_SIZE,
  resolveConnectionOptions,
} from "./options.ts";
export type {
  Role,
  ChannelKind,
  CommandEvent,
  RejectionEvent,
  ConnectionObserver,
} from "./observer.ts";
export { type LoggingOptions, loggingObserver, isEnabled } from "./logging.ts";

// ============================================================================
// Protocol model
// ============================================================================

export * from "./model/index.ts";

// ============================================================================
// Wire format (re-exported)
// ============================================================================

export * from "@tuic-mux/wire";
