// TUIC v5 wire types for TypeScript.
//
// Every command starts with a two-byte prefix (version, command type)
// followed by a command-specific body. Addresses share one encoding across
// the commands that carry them.

// ============================================================================
// Discriminants
// ============================================================================

/** Protocol version byte carried by every header. */
export const VERSION = 0x05;

/** Length of the authentication token carried by `Authenticate`. */
export const TOKEN_LENGTH = 32;

/** Command type byte. */
export const CommandDiscriminant = {
  Authenticate: 0x00,
  Connect: 0x01,
  Packet: 0x02,
  Dissociate: 0x03,
  Heartbeat: 0x04,
} as const;

/** Address type byte. */
export const AddressDiscriminant = {
  None: 0xff,
  Domain: 0x00,
  Ipv4: 0x01,
  Ipv6: 0x02,
} as const;

// ============================================================================
// Address
// ============================================================================

/**
 * No address. Used by every packet fragment after the first, since the
 * destination only needs to travel once per packet.
 */
export interface AddressNone {
  tag: "None";
}

/** Domain name and port. The name is at most 255 bytes of UTF-8. */
export interface AddressDomain {
  tag: "Domain";
  domain: string;
  port: number;
}

/** IPv4 address in dotted-decimal form, and port. */
export interface AddressIpv4 {
  tag: "Ipv4";
  ip: string;
  port: number;
}

/** IPv6 address in RFC 5952 form, and port. */
export interface AddressIpv6 {
  tag: "Ipv6";
  ip: string;
  port: number;
}

export type Address = AddressNone | AddressDomain | AddressIpv4 | AddressIpv6;

// ============================================================================
// Header
// ============================================================================

/** Authenticate (0x00): client proves it holds the shared secret. */
export interface HeaderAuthenticate {
  tag: "Authenticate";
  token: Uint8Array;
}

/** Connect (0x01): open a relayed TCP stream to `addr`. */
export interface HeaderConnect {
  tag: "Connect";
  addr: Address;
}

/**
 * Packet (0x02): one fragment of a relayed UDP datagram.
 *
 * `size` is the length of the fragment bytes that follow the header.
 */
export interface HeaderPacket {
  tag: "Packet";
  assocId: number;
  pktId: number;
  fragTotal: number;
  fragId: number;
  size: number;
  addr: Address;
}

/** Dissociate (0x03): drop all state for a UDP association. */
export interface HeaderDissociate {
  tag: "Dissociate";
  assocId: number;
}

/** Heartbeat (0x04): keep the connection alive. */
export interface HeaderHeartbeat {
  tag: "Heartbeat";
}

export type Header =
  | HeaderAuthenticate
  | HeaderConnect
  | HeaderPacket
  | HeaderDissociate
  | HeaderHeartbeat;

/** Lower-case command name, as used in error messages and logs. */
export type CommandName = "authenticate" | "connect" | "packet" | "dissociate" | "heartbeat";

/** Get the command name of a header. */
export function commandName(header: Header): CommandName {
  switch (header.tag) {
    case "Authenticate":
      return "authenticate";
    case "Connect":
      return "connect";
    case "Packet":
      return "packet";
    case "Dissociate":
      return "dissociate";
    case "Heartbeat":
      return "heartbeat";
  }
}

// ============================================================================
// Factory functions
// ============================================================================

export function addressNone(): AddressNone {
  return { tag: "None" };
}

export function addressDomain(domain: string, port: number): AddressDomain {
  return { tag: "Domain", domain, port };
}

export function addressIpv4(ip: string, port: number): AddressIpv4 {
  return { tag: "Ipv4", ip, port };
}

export function addressIpv6(ip: string, port: number): AddressIpv6 {
  return { tag: "Ipv6", ip, port };
}

export function headerAuthenticate(token: Uint8Array): HeaderAuthenticate {
  return { tag: "Authenticate", token };
}

export function headerConnect(addr: Address): HeaderConnect {
  return { tag: "Connect", addr };
}

export function headerPacket(
  assocId: number,
  pktId: number,
  fragTotal: number,
  fragId: number,
  size: number,
  addr: Address,
): HeaderPacket {
  return { tag: "Packet", assocId, pktId, fragTotal, fragId, size, addr };
}

export function headerDissociate(assocId: number): HeaderDissociate {
  return { tag: "Dissociate", assocId };
}

export function headerHeartbeat(): HeaderHeartbeat {
  return { tag: "Heartbeat" };
}
