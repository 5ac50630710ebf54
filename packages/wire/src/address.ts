// Address encoding, decoding and text form.

import ipaddr from "ipaddr.js";

import { type Address, AddressDiscriminant, addressDomain, addressIpv4, addressIpv6, addressNone } from "./types.ts";
import { assertU16, view } from "./binary.ts";
import { UnmarshalError } from "./unmarshal_error.ts";

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/** Maximum length of a domain name on the wire, in bytes. */
export const MAX_DOMAIN_LENGTH = 0xff;

/** Encoded length of an address, type byte included. */
export function addressLength(addr: Address): number {
  switch (addr.tag) {
    case "None":
      return 1;
    case "Domain":
      return 1 + 1 + utf8Encoder.encode(addr.domain).length + 2;
    case "Ipv4":
      return 1 + 4 + 2;
    case "Ipv6":
      return 1 + 16 + 2;
  }
}

/**
 * Write an address into `buf` at `offset`.
 *
 * @returns The offset just past the address
 * @throws RangeError if the port or domain length does not fit the format
 */
export function writeAddress(addr: Address, buf: Uint8Array, offset: number): number {
  const dv = view(buf);
  switch (addr.tag) {
    case "None":
      dv.setUint8(offset, AddressDiscriminant.None);
      return offset + 1;
    case "Domain": {
      const name = utf8Encoder.encode(addr.domain);
      if (name.length > MAX_DOMAIN_LENGTH) {
        throw new RangeError(`domain too long: ${name.length} bytes`);
      }
      assertU16("port", addr.port);
      dv.setUint8(offset, AddressDiscriminant.Domain);
      dv.setUint8(offset + 1, name.length);
      buf.set(name, offset + 2);
      dv.setUint16(offset + 2 + name.length, addr.port);
      return offset + 2 + name.length + 2;
    }
    case "Ipv4": {
      assertU16("port", addr.port);
      dv.setUint8(offset, AddressDiscriminant.Ipv4);
      buf.set(ipaddr.IPv4.parse(addr.ip).toByteArray(), offset + 1);
      dv.setUint16(offset + 5, addr.port);
      return offset + 7;
    }
    case "Ipv6": {
      assertU16("port", addr.port);
      dv.setUint8(offset, AddressDiscriminant.Ipv6);
      buf.set(ipaddr.IPv6.parse(addr.ip).toByteArray(), offset + 1);
      dv.setUint16(offset + 17, addr.port);
      return offset + 19;
    }
  }
}

/**
 * Incremental address parser.
 *
 * Yields the number of bytes it needs next and receives exactly that many,
 * so the same logic drives both buffer decoding and stream reading without
 * ever asking for bytes past the end of the address.
 */
export function* addressParser(): Generator<number, Address, Uint8Array> {
  const typeByte = (yield 1)[0];
  switch (typeByte) {
    case AddressDiscriminant.None:
      return addressNone();
    case AddressDiscriminant.Domain: {
      const len = (yield 1)[0];
      const rest = yield len + 2;
      let domain: string;
      try {
        domain = utf8Decoder.decode(rest.subarray(0, len));
      } catch {
        throw UnmarshalError.invalidEncoding();
      }
      return addressDomain(domain, readPort(rest, len));
    }
    case AddressDiscriminant.Ipv4: {
      const rest = yield 4 + 2;
      const ip = ipaddr.fromByteArray(Array.from(rest.subarray(0, 4))).toString();
      return addressIpv4(ip, readPort(rest, 4));
    }
    case AddressDiscriminant.Ipv6: {
      const rest = yield 16 + 2;
      const ip = ipaddr.fromByteArray(Array.from(rest.subarray(0, 16))).toString();
      return addressIpv6(ip, readPort(rest, 16));
    }
    default:
      throw UnmarshalError.invalidAddressType(typeByte);
  }
}

function readPort(bytes: Uint8Array, offset: number): number {
  return view(bytes).getUint16(offset);
}

/**
 * Format an address as `host:port`.
 *
 * IPv6 hosts are bracketed; the `None` address formats as `none`.
 */
export function formatAddress(addr: Address): string {
  switch (addr.tag) {
    case "None":
      return "none";
    case "Domain":
      return `${addr.domain}:${addr.port}`;
    case "Ipv4":
      return `${addr.ip}:${addr.port}`;
    case "Ipv6":
      return `[${addr.ip}]:${addr.port}`;
  }
}

/**
 * Parse `host:port` (or `[v6]:port`) into an address.
 *
 * IP literals become `Ipv4`/`Ipv6` addresses in canonical form; any other
 * host is kept as a domain name.
 *
 * @throws RangeError if the text has no port or the port is not a u16
 */
export function parseAddress(text: string): Address {
  const lastColon = text.lastIndexOf(":");
  if (lastColon < 0) {
    throw new RangeError(`missing port in address: ${text}`);
  }
  let host = text.slice(0, lastColon);
  const portText = text.slice(lastColon + 1);
  if (!/^\d{1,5}$/.test(portText)) {
    throw new RangeError(`invalid port in address: ${text}`);
  }
  const port = Number(portText);
  assertU16("port", port);

  if (host.startsWith("[") && host.endsWith("]")) {
    host = host.slice(1, -1);
    if (!ipaddr.IPv6.isValid(host)) {
      throw new RangeError(`invalid IPv6 address: ${host}`);
    }
    return addressIpv6(ipaddr.IPv6.parse(host).toString(), port);
  }
  if (ipaddr.IPv4.isValidFourPartDecimal(host)) {
    return addressIpv4(ipaddr.IPv4.parse(host).toString(), port);
  }
  if (host.length === 0) {
    throw new RangeError(`missing host in address: ${text}`);
  }
  return addressDomain(host, port);
}
