// Inbound tasks.

import type { Connect } from "./connect.ts";
import type { Packet } from "./packet.ts";

/**
 * What an inbound channel turned out to carry.
 *
 * Produced by the connection's `accept*` methods; combinations the
 * protocol does not allow are errors, never tasks.
 */
export type Task =
  | { kind: "authenticate"; token: Uint8Array }
  | { kind: "connect"; connect: Connect }
  | { kind: "packet"; packet: Packet }
  | { kind: "dissociate"; assocId: number }
  | { kind: "heartbeat" };

export type TaskKind = Task["kind"];
