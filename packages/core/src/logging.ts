// Logging observer for TUIC connections.
//
// Logs connection events as structured objects.
// Uses the DEBUG environment variable pattern matching of npm's debug package.

import { formatAddress } from "@tuic-mux/wire";
import type { CommandEvent, ConnectionObserver, RejectionEvent } from "./observer.ts";

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "tuic:conn".
   * Logging is enabled when DEBUG matches this namespace.
   * Supports patterns like "tuic:*" or "*".
   */
  namespace?: string;

  /**
   * Log target addresses. Defaults to true.
   */
  logAddresses?: boolean;
}

interface DebugFilter {
  readonly include: RegExp[];
  readonly exclude: RegExp[];
}

let cached: { debug: string; filter: DebugFilter } | null = null;

/** Compile a DEBUG value; `*` matches any run of characters. */
function compileFilter(debug: string): DebugFilter {
  const filter: DebugFilter = { include: [], exclude: [] };
  for (const name of debug.split(/[\s,]+/)) {
    if (name === "" || name === "-") continue;
    const negated = name.startsWith("-");
    const body = (negated ? name.slice(1) : name)
      .split("*")
      .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
      .join(".*");
    (negated ? filter.exclude : filter.include).push(new RegExp(`^${body}$`));
  }
  return filter;
}

/**
 * Check if a namespace is enabled by a DEBUG value.
 *
 * Names are separated by commas or spaces. A name prefixed with `-` excludes
 * matching namespaces wherever it appears in the list.
 */
export function isEnabled(namespace: string, debug: string | undefined = process.env.DEBUG): boolean {
  if (!debug) return false;
  let entry = cached;
  if (entry === null || entry.debug !== debug) {
    entry = { debug, filter: compileFilter(debug) };
    cached = entry;
  }

  const { include, exclude } = entry.filter;
  if (exclude.some((re) => re.test(namespace))) return false;
  return include.some((re) => re.test(namespace));
}

/**
 * Create an observer that logs connection traffic.
 * Logging is controlled by DEBUG (like npm's debug package), checked on
 * every event.
 *
 * ```sh
 * DEBUG='tuic:*' node server.js     # all tuic logging
 * DEBUG='*,-tuic:conn' node app.js  # everything except connections
 * ```
 *
 * Logs structured objects:
 * - Sent: { type: "sent", role, command, channel, ... }
 * - Accepted: { type: "accepted", role, command, channel, ... }
 * - Rejected: { type: "rejected", role, channel, error: { kind, message } }
 *
 * @example
 * ```typescript
 * const conn = new ClientConnection(quic, { observers: [loggingObserver()] });
 * ```
 */
export function loggingObserver(options: LoggingOptions = {}): ConnectionObserver {
  const namespace = options.namespace ?? "tuic:conn";
  const logAddresses = options.logAddresses ?? true;

  const describe = (type: "sent" | "accepted", event: CommandEvent): Record<string, unknown> => {
    const logObj: Record<string, unknown> = {
      type,
      role: event.role,
      command: event.command,
      channel: event.channel,
    };
    if (event.assocId !== undefined) logObj.assocId = event.assocId;
    if (event.pktId !== undefined) logObj.pktId = event.pktId;
    if (event.fragTotal !== undefined) logObj.fragTotal = event.fragTotal;
    if (event.fragId !== undefined) logObj.fragId = event.fragId;
    if (logAddresses && event.addr !== undefined && event.addr.tag !== "None") {
      logObj.addr = formatAddress(event.addr);
    }
    return logObj;
  };

  return {
    sent(event: CommandEvent): void {
      if (!isEnabled(namespace)) return;
      console.log(`[${namespace}] → ${event.command} (${event.channel})`, describe("sent", event));
    },

    accepted(event: CommandEvent): void {
      if (!isEnabled(namespace)) return;
      console.log(`[${namespace}] ← ${event.command} (${event.channel})`, describe("accepted", event));
    },

    rejected(event: RejectionEvent): void {
      if (!isEnabled(namespace)) return;
      console.log(`[${namespace}] ✗ ${event.channel}`, {
        type: "rejected",
        role: event.role,
        channel: event.channel,
        error: { kind: event.error.kind, message: event.error.message },
      });
    },
  };
}
