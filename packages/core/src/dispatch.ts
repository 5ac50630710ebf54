// Header decoding for inbound channels.
//
// Each helper decodes the header at the front of one channel kind and, on
// failure, hands the channel back inside the error.

import {
  type Header,
  type HeaderPacket,
  UnmarshalError,
  decodeHeader,
  readHeader,
} from "@tuic-mux/wire";
import { ConnectionError } from "./error.ts";
import { streamSource } from "./io.ts";
import type { RecvStream, SendStream } from "./transport.ts";

/** A header decoded from the front of a datagram. */
export interface DatagramHeader {
  header: Header;
  /** Offset of the first byte after the header. */
  offset: number;
}

/**
 * Read the header at the front of a unidirectional stream, leaving the rest
 * of the stream unread.
 *
 * @throws ConnectionError (unmarshalUniStream)
 */
export async function readUniHeader(recv: RecvStream): Promise<Header> {
  try {
    return await readHeader(streamSource(recv));
  } catch (e) {
    if (e instanceof UnmarshalError) throw ConnectionError.unmarshalUniStream(e, recv);
    throw e;
  }
}

/**
 * Read the header at the front of a bidirectional stream's receive half.
 *
 * @throws ConnectionError (unmarshalBiStream)
 */
export async function readBiHeader(send: SendStream, recv: RecvStream): Promise<Header> {
  try {
    return await readHeader(streamSource(recv));
  } catch (e) {
    if (e instanceof UnmarshalError) throw ConnectionError.unmarshalBiStream(e, send, recv);
    throw e;
  }
}

/**
 * Decode the header at the front of a datagram.
 *
 * @throws ConnectionError (unmarshalDatagram)
 */
export function decodeDatagramHeader(datagram: Uint8Array): DatagramHeader {
  try {
    const { value, next } = decodeHeader(datagram);
    return { header: value, offset: next };
  } catch (e) {
    if (e instanceof UnmarshalError) throw ConnectionError.unmarshalDatagram(e, datagram);
    throw e;
  }
}

/**
 * Slice a packet's fragment bytes out of the datagram it arrived in.
 *
 * Bytes past the declared size are ignored.
 *
 * @throws ConnectionError (payloadLength) if the datagram is too short
 */
export function datagramPayload(header: HeaderPacket, datagram: Uint8Array, offset: number): Uint8Array {
  const end = offset + header.size;
  if (end > datagram.length) {
    throw ConnectionError.payloadLength(header.size, datagram.length - offset);
  }
  return datagram.subarray(offset, end);
}
