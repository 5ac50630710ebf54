// Outbound packet fragmentation.
//
// The destination address travels in the first fragment only; every later
// fragment carries the None address, so it has a shorter header and room
// for more payload under the same size limit.

import {
  type Address,
  type HeaderPacket,
  addressNone,
  headerLength,
  headerPacket,
} from "@tuic-mux/wire";
import { FragmentError } from "./errors.ts";

/** Most fragments a packet can be split into (the total is a u8). */
export const MAX_FRAGMENTS = 0xff;

/** One fragment ready to be written: header plus its slice of the payload. */
export interface Fragment {
  header: HeaderPacket;
  payload: Uint8Array;
}

/** How a payload of a given length is split. */
export interface FragmentPlan {
  /** Number of fragments. */
  total: number;
  /** Payload capacity of the first fragment. */
  firstSize: number;
  /** Payload capacity of every later fragment. */
  restSize: number;
}

/**
 * Work out how a payload is split under a per-fragment size limit.
 *
 * `maxPacketSize` bounds header plus fragment bytes.
 *
 * @throws FragmentError
 */
export function planFragments(addr: Address, maxPacketSize: number, payloadLength: number): FragmentPlan {
  const firstSize = maxPacketSize - headerLength(headerPacket(0, 0, 0, 0, 0, addr));
  const restSize = maxPacketSize - headerLength(headerPacket(0, 0, 0, 0, 0, addressNone()));

  if (firstSize <= 0) {
    throw FragmentError.sizeTooSmall(maxPacketSize);
  }
  if (payloadLength <= firstSize) {
    return { total: 1, firstSize, restSize };
  }

  const total = 1 + Math.ceil((payloadLength - firstSize) / restSize);
  if (total > MAX_FRAGMENTS) {
    throw FragmentError.tooManyFragments(total);
  }
  return { total, firstSize, restSize };
}

/**
 * Split a payload into fragments.
 *
 * The plan is computed before the first fragment is produced, so an
 * unsendable payload fails before anything reaches the wire.
 *
 * @throws FragmentError
 */
export function* fragmentPayload(
  assocId: number,
  pktId: number,
  addr: Address,
  maxPacketSize: number,
  payload: Uint8Array,
): Generator<Fragment, void, undefined> {
  const plan = planFragments(addr, maxPacketSize, payload.length);

  let start = 0;
  for (let fragId = 0; fragId < plan.total; fragId++) {
    const capacity = fragId === 0 ? plan.firstSize : plan.restSize;
    const end = Math.min(start + capacity, payload.length);
    const slice = payload.subarray(start, end);
    yield {
      header: headerPacket(
        assocId,
        pktId,
        plan.total,
        fragId,
        slice.length,
        fragId === 0 ? addr : addressNone(),
      ),
      payload: slice,
    };
    start = end;
  }
}
