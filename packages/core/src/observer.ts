// Connection observers.
//
// Observers see every command a connection sends, every task it produces
// from an inbound channel and every inbound channel it rejects. They are
// the hook for logging and tracing.

import type { Address, CommandName } from "@tuic-mux/wire";
import type { ConnectionError } from "./error.ts";

export type Role = "client" | "server";

/** QUIC channel kind a command travelled on. */
export type ChannelKind = "uni" | "bi" | "datagram";

/**
 * A command sent or accepted.
 *
 * Only the fields that apply to the command are set. Tokens are never
 * included.
 */
export interface CommandEvent {
  readonly role: Role;
  readonly command: CommandName;
  readonly channel: ChannelKind;
  readonly addr?: Address;
  readonly assocId?: number;
  readonly pktId?: number;
  /** For packets: fragment total (sent) or fragment id (accepted). */
  readonly fragTotal?: number;
  readonly fragId?: number;
}

/** An inbound channel that could not be turned into a task. */
export interface RejectionEvent {
  readonly role: Role;
  readonly channel: ChannelKind;
  readonly error: ConnectionError;
}

/**
 * Connection observer interface.
 *
 * All hooks are optional and synchronous. A hook that throws is reported
 * with `console.error`; the operation it observed carries on unchanged.
 *
 * @example
 * ```typescript
 * const counting: ConnectionObserver = {
 *   accepted(event) {
 *     counts[event.command] = (counts[event.command] ?? 0) + 1;
 *   },
 * };
 * const conn = new ServerConnection(quic, { observers: [counting] });
 * ```
 */
export interface ConnectionObserver {
  /** Called after a command has been handed to the transport. */
  sent?(event: CommandEvent): void;

  /** Called when an inbound channel has been classified into a task. */
  accepted?(event: CommandEvent): void;

  /** Called when an inbound channel fails classification. */
  rejected?(event: RejectionEvent): void;
}
