import { describe, expect, it } from "vitest";

import {
  type Header,
  AddressDiscriminant,
  CommandDiscriminant,
  TOKEN_LENGTH,
  VERSION,
  addressDomain,
  addressIpv4,
  addressIpv6,
  addressNone,
  commandName,
  headerAuthenticate,
  headerConnect,
  headerDissociate,
  headerHeartbeat,
  headerPacket,
} from "./types.ts";
import { type ByteSource, decodeHeader, encodeHeader, headerLength, readHeader } from "./codec.ts";
import { UnmarshalError } from "./unmarshal_error.ts";

const ascii = (s: string) => Array.from(new TextEncoder().encode(s));

function bufferSource(bytes: Uint8Array): ByteSource & { position: number } {
  return {
    position: 0,
    async readExact(length: number) {
      if (this.position + length > bytes.length) {
        this.position = bytes.length;
        return null;
      }
      const out = bytes.slice(this.position, this.position + length);
      this.position += length;
      return out;
    },
  };
}

function decodeError(bytes: number[]): UnmarshalError {
  try {
    decodeHeader(new Uint8Array(bytes));
  } catch (e) {
    if (e instanceof UnmarshalError) return e;
    throw e;
  }
  throw new Error("expected decodeHeader to fail");
}

describe("wire discriminants", () => {
  it("has the v5 command and address bytes", () => {
    expect(VERSION).toBe(0x05);
    expect(CommandDiscriminant.Authenticate).toBe(0x00);
    expect(CommandDiscriminant.Connect).toBe(0x01);
    expect(CommandDiscriminant.Packet).toBe(0x02);
    expect(CommandDiscriminant.Dissociate).toBe(0x03);
    expect(CommandDiscriminant.Heartbeat).toBe(0x04);
    expect(AddressDiscriminant.None).toBe(0xff);
    expect(AddressDiscriminant.Domain).toBe(0x00);
    expect(AddressDiscriminant.Ipv4).toBe(0x01);
    expect(AddressDiscriminant.Ipv6).toBe(0x02);
  });

  it("names every command", () => {
    expect(commandName(headerAuthenticate(new Uint8Array(TOKEN_LENGTH)))).toBe("authenticate");
    expect(commandName(headerConnect(addressNone()))).toBe("connect");
    expect(commandName(headerPacket(0, 0, 1, 0, 0, addressNone()))).toBe("packet");
    expect(commandName(headerDissociate(0))).toBe("dissociate");
    expect(commandName(headerHeartbeat())).toBe("heartbeat");
  });
});

describe("header encoding", () => {
  it("encodes connect to a domain", () => {
    const bytes = encodeHeader(headerConnect(addressDomain("example.com", 443)));
    expect(Array.from(bytes)).toEqual([0x05, 0x01, 0x00, 11, ...ascii("example.com"), 0x01, 0xbb]);
  });

  it("encodes a packet fragment to an IPv4 address", () => {
    const bytes = encodeHeader(headerPacket(7, 1, 2, 0, 5, addressIpv4("10.0.0.1", 8080)));
    expect(Array.from(bytes)).toEqual([
      0x05, 0x02, 0x00, 0x07, 0x00, 0x01, 0x02, 0x00, 0x00, 0x05, 0x01, 10, 0, 0, 1, 0x1f, 0x90,
    ]);
  });

  it("encodes a packet fragment without an address", () => {
    const bytes = encodeHeader(headerPacket(0x0102, 0x0304, 3, 2, 0x0506, addressNone()));
    expect(Array.from(bytes)).toEqual([0x05, 0x02, 0x01, 0x02, 0x03, 0x04, 3, 2, 0x05, 0x06, 0xff]);
  });

  it("encodes dissociate and heartbeat", () => {
    expect(Array.from(encodeHeader(headerDissociate(0x1234)))).toEqual([0x05, 0x03, 0x12, 0x34]);
    expect(Array.from(encodeHeader(headerHeartbeat()))).toEqual([0x05, 0x04]);
  });

  it("encodes authenticate with its token", () => {
    const token = new Uint8Array(TOKEN_LENGTH).fill(0xab);
    const bytes = encodeHeader(headerAuthenticate(token));
    expect(bytes.length).toBe(34);
    expect(bytes[0]).toBe(0x05);
    expect(bytes[1]).toBe(0x00);
    expect(Array.from(bytes.subarray(2))).toEqual(Array.from(token));
  });

  it("rejects a token of the wrong length", () => {
    expect(() => encodeHeader(headerAuthenticate(new Uint8Array(16)))).toThrow(RangeError);
  });

  it("rejects fields wider than their wire width", () => {
    expect(() => encodeHeader(headerDissociate(0x10000))).toThrow(RangeError);
    expect(() => encodeHeader(headerPacket(1, 1, 256, 0, 0, addressNone()))).toThrow(RangeError);
    expect(() => encodeHeader(headerConnect(addressDomain("a".repeat(256), 80)))).toThrow(RangeError);
  });

  it("reports the encoded length", () => {
    expect(headerLength(headerHeartbeat())).toBe(2);
    expect(headerLength(headerDissociate(1))).toBe(4);
    expect(headerLength(headerPacket(1, 1, 1, 0, 0, addressNone()))).toBe(11);
    expect(headerLength(headerPacket(1, 1, 1, 0, 0, addressIpv6("::1", 53)))).toBe(29);
  });
});

describe("header decoding", () => {
  it("decodes every command back to the same header", () => {
    const headers: Header[] = [
      headerAuthenticate(new Uint8Array(TOKEN_LENGTH).fill(7)),
      headerConnect(addressDomain("example.com", 443)),
      headerConnect(addressIpv6("2001:db8::1", 80)),
      headerPacket(7, 9, 3, 1, 1200, addressNone()),
      headerPacket(7, 9, 3, 0, 1200, addressIpv4("192.168.1.2", 53)),
      headerDissociate(65535),
      headerHeartbeat(),
    ];

    for (const header of headers) {
      const encoded = encodeHeader(header);
      const decoded = decodeHeader(encoded);
      expect(decoded.next).toBe(encoded.length);
      expect(decoded.value).toEqual(header);
    }
  });

  it("decodes from an offset and stops at the end of the header", () => {
    const buf = new Uint8Array([0xee, 0x05, 0x03, 0x00, 0x2a, 0x99, 0x98]);
    const decoded = decodeHeader(buf, 1);
    expect(decoded.value).toEqual(headerDissociate(42));
    expect(decoded.next).toBe(5);
  });

  it("rejects an unknown version", () => {
    const err = decodeError([0x04, 0x04]);
    expect(err.kind).toBe("invalidVersion");
    expect(err.message).toBe("invalid version: 4");
  });

  it("rejects an unknown command", () => {
    const err = decodeError([0x05, 0x09]);
    expect(err.kind).toBe("invalidCommand");
    expect(err.message).toBe("invalid command: 9");
  });

  it("rejects an unknown address type", () => {
    const err = decodeError([0x05, 0x01, 0x07]);
    expect(err.kind).toBe("invalidAddressType");
  });

  it("rejects a domain that is not UTF-8", () => {
    const err = decodeError([0x05, 0x01, 0x00, 0x03, 0xff, 0xfe, 0xfd, 0x00, 0x50]);
    expect(err.kind).toBe("invalidEncoding");
  });

  it("rejects a truncated header", () => {
    expect(decodeError([0x05]).kind).toBe("unexpectedEof");
    expect(decodeError([0x05, 0x02, 0x00, 0x07]).kind).toBe("unexpectedEof");
    expect(decodeError([0x05, 0x00, 1, 2, 3]).kind).toBe("unexpectedEof");
  });
});

describe("readHeader", () => {
  it("reads exactly the header and leaves the body in the source", async () => {
    const header = encodeHeader(headerPacket(1, 2, 1, 0, 3, addressDomain("a.test", 9)));
    const source = bufferSource(new Uint8Array([...header, 0x61, 0x62, 0x63]));

    const decoded = await readHeader(source);

    expect(decoded).toEqual(headerPacket(1, 2, 1, 0, 3, addressDomain("a.test", 9)));
    expect(source.position).toBe(header.length);
  });

  it("fails with unexpectedEof when the source ends inside the header", async () => {
    const source = bufferSource(new Uint8Array([0x05, 0x03, 0x00]));
    await expect(readHeader(source)).rejects.toMatchObject({ kind: "unexpectedEof" });
  });

  it("wraps source failures as io errors", async () => {
    const cause = new Error("stream reset");
    const source: ByteSource = {
      readExact: () => Promise.reject(cause),
    };

    const err = await readHeader(source).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UnmarshalError);
    expect(err).toMatchObject({ kind: "io", cause, message: "read error: stream reset" });
  });
});
