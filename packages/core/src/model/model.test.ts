// Tests for the protocol model: fragmentation, reassembly, counters, GC

import { describe, it, expect } from "vitest";
import {
  type Address,
  addressIpv4,
  addressNone,
  headerPacket,
  TOKEN_LENGTH,
} from "@tuic-mux/wire";
import { ConnectionModel } from "./connection.ts";
import { AssembleError, FragmentError } from "./errors.ts";
import { fragmentPayload, planFragments } from "./fragments.ts";
import { UdpSession } from "./udp_session.ts";

// Packet header is 17 bytes with this address and 11 with None.
const ADDR: Address = addressIpv4("10.0.0.1", 8080);

function bytes(length: number): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => i & 0xff);
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected an error");
}

describe("planFragments", () => {
  it("keeps a payload that fits the first fragment whole", () => {
    expect(planFragments(ADDR, 27, 10)).toEqual({ total: 1, firstSize: 10, restSize: 16 });
  });

  it("sends an empty payload as one fragment", () => {
    expect(planFragments(ADDR, 27, 0).total).toBe(1);
  });

  it("counts later fragments with the shorter header", () => {
    expect(planFragments(ADDR, 27, 11).total).toBe(2);
    expect(planFragments(ADDR, 27, 42).total).toBe(3);
    expect(planFragments(ADDR, 27, 43).total).toBe(4);
  });

  it("rejects a limit with no room for data", () => {
    const error = catchError(() => planFragments(ADDR, 17, 1));
    expect(error).toBeInstanceOf(FragmentError);
    expect(error).toMatchObject({ kind: "sizeTooSmall" });
  });

  it("allows 255 fragments but not 256", () => {
    expect(planFragments(ADDR, 18, 1779).total).toBe(255);
    const error = catchError(() => planFragments(ADDR, 18, 1780));
    expect(error).toBeInstanceOf(FragmentError);
    expect(error).toMatchObject({ kind: "tooManyFragments" });
  });
});

describe("fragmentPayload", () => {
  it("puts the address on fragment 0 only", () => {
    const payload = bytes(42);
    const fragments = Array.from(fragmentPayload(7, 3, ADDR, 27, payload));

    expect(fragments.map((f) => f.header.fragId)).toEqual([0, 1, 2]);
    expect(fragments.map((f) => f.header.fragTotal)).toEqual([3, 3, 3]);
    expect(fragments.map((f) => f.header.size)).toEqual([10, 16, 16]);
    expect(fragments[0].header.addr).toEqual(ADDR);
    expect(fragments[1].header.addr).toEqual(addressNone());
    expect(fragments[2].header.addr).toEqual(addressNone());
    expect(fragments.every((f) => f.header.assocId === 7 && f.header.pktId === 3)).toBe(true);
    expect(Array.from(fragments[1].payload)).toEqual(Array.from(payload.subarray(10, 26)));
  });
});

describe("UdpSession", () => {
  it("wraps packet ids at 16 bits", () => {
    const session = new UdpSession(1);
    for (let i = 0; i < 0xffff; i++) session.allocatePktId();
    expect(session.allocatePktId()).toBe(0xffff);
    expect(session.allocatePktId()).toBe(0);
  });

  it("returns a single-fragment packet without buffering", () => {
    const session = new UdpSession(4);
    const header = headerPacket(4, 0, 1, 0, 3, ADDR);
    const packet = session.assemble(header, Uint8Array.of(1, 2, 3), 0);

    expect(packet).toEqual({ payload: Uint8Array.of(1, 2, 3), addr: ADDR, assocId: 4 });
    expect(session.pendingCount).toBe(0);
  });

  it("reassembles fragments in any order", () => {
    const payload = bytes(42);
    const fragments = Array.from(fragmentPayload(9, 0, ADDR, 27, payload));
    const session = new UdpSession(9);

    expect(session.assemble(fragments[2].header, fragments[2].payload, 0)).toBeNull();
    expect(session.assemble(fragments[0].header, fragments[0].payload, 0)).toBeNull();
    expect(session.pendingCount).toBe(1);

    const packet = session.assemble(fragments[1].header, fragments[1].payload, 0);
    expect(packet?.addr).toEqual(ADDR);
    expect(packet?.assocId).toBe(9);
    expect(Array.from(packet?.payload ?? [])).toEqual(Array.from(payload));
    expect(session.pendingCount).toBe(0);
  });

  it.each([
    ["sizeMismatch", headerPacket(1, 0, 1, 0, 5, ADDR), 4],
    ["invalidFragmentId", headerPacket(1, 0, 2, 2, 1, addressNone()), 1],
    ["addressMissing", headerPacket(1, 0, 2, 0, 1, addressNone()), 1],
    ["unexpectedAddress", headerPacket(1, 0, 2, 1, 1, ADDR), 1],
  ] as const)("rejects %s", (kind, header, length) => {
    const session = new UdpSession(1);
    const error = catchError(() => session.assemble(header, new Uint8Array(length), 0));
    expect(error).toBeInstanceOf(AssembleError);
    expect(error).toMatchObject({ kind });
  });

  it("rejects a fragment total that changes mid-packet", () => {
    const session = new UdpSession(1);
    session.assemble(headerPacket(1, 8, 3, 0, 1, ADDR), new Uint8Array(1), 0);
    const error = catchError(() =>
      session.assemble(headerPacket(1, 8, 2, 1, 1, addressNone()), new Uint8Array(1), 0),
    );
    expect(error).toMatchObject({ kind: "fragmentTotalMismatch" });
  });

  it("rejects a duplicated fragment", () => {
    const session = new UdpSession(1);
    const header = headerPacket(1, 8, 3, 1, 1, addressNone());
    session.assemble(header, new Uint8Array(1), 0);
    const error = catchError(() => session.assemble(header, new Uint8Array(1), 0));
    expect(error).toMatchObject({ kind: "duplicatedFragment" });
  });
});

describe("ConnectionModel", () => {
  it("counts connect tasks until released once", () => {
    const model = new ConnectionModel();
    const first = model.sendConnect(ADDR);
    model.sendConnect(ADDR);
    expect(model.taskConnectCount()).toBe(2);

    first.registration.release();
    first.registration.release();
    expect(model.taskConnectCount()).toBe(1);
    expect(first.registration.isReleased).toBe(true);
  });

  it("builds the connect header from the task address", () => {
    const task = new ConnectionModel().recvConnect({ tag: "Connect", addr: ADDR });
    expect(task.header).toEqual({ tag: "Connect", addr: ADDR });
  });

  it("creates associations on send and removes them on dissociate", () => {
    const model = new ConnectionModel();
    const first = model.sendPacket(3, ADDR, 1200);
    const second = model.sendPacket(3, ADDR, 1200);
    expect([first.pktId, second.pktId]).toEqual([0, 1]);
    expect(model.taskAssociateCount()).toBe(1);

    expect(model.sendDissociate(3)).toEqual({ tag: "Dissociate", assocId: 3 });
    expect(model.taskAssociateCount()).toBe(0);
  });

  it("only registers inbound packets for known associations", () => {
    const model = new ConnectionModel();
    const header = headerPacket(5, 0, 1, 0, 0, ADDR);
    expect(model.recvPacket(header)).toBeNull();

    model.sendPacket(5, ADDR, 1200);
    expect(model.recvPacket(header)?.assocId).toBe(5);
  });

  it("creates associations from unrestricted inbound packets", () => {
    const model = new ConnectionModel();
    model.recvPacketUnrestricted(headerPacket(6, 0, 1, 0, 0, ADDR));
    expect(model.hasAssociation(6)).toBe(true);
    expect(model.recvDissociate({ tag: "Dissociate", assocId: 6 })).toBe(6);
    expect(model.hasAssociation(6)).toBe(false);
  });

  it("rejects tokens of the wrong length", () => {
    const model = new ConnectionModel();
    expect(() => model.sendAuthenticate(new Uint8Array(TOKEN_LENGTH - 1))).toThrow(RangeError);
    expect(model.sendAuthenticate(new Uint8Array(TOKEN_LENGTH)).tag).toBe("Authenticate");
  });

  it("reports the fragment count of an outbound packet", () => {
    const packet = new ConnectionModel().sendPacket(1, ADDR, 27);
    expect(packet.fragmentCount(42)).toBe(3);
    expect(packet.fragments(bytes(42))).toHaveLength(3);
  });

  it("drops reassembly buffers once they reach the timeout", () => {
    let now = 1000;
    const model = new ConnectionModel({ now: () => now });
    const first = model.recvPacketUnrestricted(headerPacket(2, 5, 2, 0, 1, ADDR));
    expect(first.assemble(new Uint8Array(1))).toBeNull();

    now = 1500;
    expect(model.collectGarbage(1000)).toBe(0);

    now = 2000;
    expect(model.collectGarbage(1000)).toBe(1);
    expect(model.taskAssociateCount()).toBe(1);

    // The late fragment starts a fresh buffer instead of completing the packet
    const second = model.recvPacketUnrestricted(headerPacket(2, 5, 2, 1, 1, addressNone()));
    expect(second.assemble(new Uint8Array(1))).toBeNull();
    expect(model.collectGarbage(0)).toBe(1);
  });
});
