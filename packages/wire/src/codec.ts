// Header codec.
//
// Decoding is written once, as an incremental parser that asks for the
// exact number of bytes it needs next. `decodeHeader` feeds it from a
// buffer; `readHeader` feeds it from an async byte source such as a QUIC
// stream, so a stream is never read past the end of its header.

import {
  type Header,
  type HeaderPacket,
  CommandDiscriminant,
  TOKEN_LENGTH,
  VERSION,
  headerAuthenticate,
  headerConnect,
  headerDissociate,
  headerHeartbeat,
  headerPacket,
} from "./types.ts";
import { addressLength, addressParser, writeAddress } from "./address.ts";
import { type DecodeResult, assertU16, assertU8, view } from "./binary.ts";
import { UnmarshalError } from "./unmarshal_error.ts";

/** Length of the fixed part of a packet header body (before the address). */
const PACKET_FIXED_LENGTH = 8;

/**
 * Async source of bytes a header can be read from.
 */
export interface ByteSource {
  /**
   * Read exactly `length` bytes.
   *
   * Returns null if the source ends before `length` bytes are available.
   */
  readExact(length: number): Promise<Uint8Array | null>;
}

// ============================================================================
// Encoding
// ============================================================================

/** Encoded length of a header, version and command bytes included. */
export function headerLength(header: Header): number {
  switch (header.tag) {
    case "Authenticate":
      return 2 + TOKEN_LENGTH;
    case "Connect":
      return 2 + addressLength(header.addr);
    case "Packet":
      return 2 + PACKET_FIXED_LENGTH + addressLength(header.addr);
    case "Dissociate":
      return 2 + 2;
    case "Heartbeat":
      return 2;
  }
}

/**
 * Write a header into `buf` at `offset`.
 *
 * @returns The offset just past the header
 * @throws RangeError if a field does not fit its wire width
 */
export function writeHeader(header: Header, buf: Uint8Array, offset = 0): number {
  const dv = view(buf);
  dv.setUint8(offset, VERSION);
  const body = offset + 2;

  switch (header.tag) {
    case "Authenticate":
      if (header.token.length !== TOKEN_LENGTH) {
        throw new RangeError(`token must be ${TOKEN_LENGTH} bytes, got ${header.token.length}`);
      }
      dv.setUint8(offset + 1, CommandDiscriminant.Authenticate);
      buf.set(header.token, body);
      return body + TOKEN_LENGTH;
    case "Connect":
      dv.setUint8(offset + 1, CommandDiscriminant.Connect);
      return writeAddress(header.addr, buf, body);
    case "Packet":
      dv.setUint8(offset + 1, CommandDiscriminant.Packet);
      writePacketFields(header, dv, body);
      return writeAddress(header.addr, buf, body + PACKET_FIXED_LENGTH);
    case "Dissociate":
      assertU16("assocId", header.assocId);
      dv.setUint8(offset + 1, CommandDiscriminant.Dissociate);
      dv.setUint16(body, header.assocId);
      return body + 2;
    case "Heartbeat":
      dv.setUint8(offset + 1, CommandDiscriminant.Heartbeat);
      return body;
  }
}

function writePacketFields(header: HeaderPacket, dv: DataView, offset: number): void {
  assertU16("assocId", header.assocId);
  assertU16("pktId", header.pktId);
  assertU8("fragTotal", header.fragTotal);
  assertU8("fragId", header.fragId);
  assertU16("size", header.size);
  dv.setUint16(offset, header.assocId);
  dv.setUint16(offset + 2, header.pktId);
  dv.setUint8(offset + 4, header.fragTotal);
  dv.setUint8(offset + 5, header.fragId);
  dv.setUint16(offset + 6, header.size);
}

/** Encode a header to a fresh buffer. */
export function encodeHeader(header: Header): Uint8Array {
  const buf = new Uint8Array(headerLength(header));
  writeHeader(header, buf, 0);
  return buf;
}

// ============================================================================
// Decoding
// ============================================================================

/** Incremental header parser. See `addressParser` for the protocol. */
export function* headerParser(): Generator<number, Header, Uint8Array> {
  const prefix = yield 2;
  if (prefix[0] !== VERSION) {
    throw UnmarshalError.invalidVersion(prefix[0]);
  }

  const command = prefix[1];
  switch (command) {
    case CommandDiscriminant.Authenticate: {
      const token = yield TOKEN_LENGTH;
      return headerAuthenticate(token.slice());
    }
    case CommandDiscriminant.Connect: {
      const addr = yield* addressParser();
      return headerConnect(addr);
    }
    case CommandDiscriminant.Packet: {
      const fixed = view(yield PACKET_FIXED_LENGTH);
      const addr = yield* addressParser();
      return headerPacket(
        fixed.getUint16(0),
        fixed.getUint16(2),
        fixed.getUint8(4),
        fixed.getUint8(5),
        fixed.getUint16(6),
        addr,
      );
    }
    case CommandDiscriminant.Dissociate: {
      const assocId = view(yield 2).getUint16(0);
      return headerDissociate(assocId);
    }
    case CommandDiscriminant.Heartbeat:
      return headerHeartbeat();
    default:
      throw UnmarshalError.invalidCommand(command);
  }
}

/**
 * Decode a header from a buffer.
 *
 * @param buf - Buffer to decode from
 * @param offset - Starting offset (default: 0)
 * @returns Decoded header and the offset of the first byte after it
 * @throws UnmarshalError
 */
export function decodeHeader(buf: Uint8Array, offset = 0): DecodeResult<Header> {
  const parser = headerParser();
  let next = offset;
  let step = parser.next();
  while (!step.done) {
    const need = step.value;
    if (next + need > buf.length) {
      throw UnmarshalError.unexpectedEof();
    }
    const chunk = buf.subarray(next, next + need);
    next += need;
    step = parser.next(chunk);
  }
  return { value: step.value, next };
}

/**
 * Read a header from an async byte source.
 *
 * Reads exactly the bytes the header occupies and nothing more.
 *
 * @throws UnmarshalError (`io` wraps a failure of the source itself)
 */
export async function readHeader(source: ByteSource): Promise<Header> {
  const parser = headerParser();
  let step = parser.next();
  while (!step.done) {
    let chunk: Uint8Array | null;
    try {
      chunk = await source.readExact(step.value);
    } catch (e) {
      throw UnmarshalError.io(e);
    }
    if (chunk === null) {
      throw UnmarshalError.unexpectedEof();
    }
    step = parser.next(chunk);
  }
  return step.value;
}
