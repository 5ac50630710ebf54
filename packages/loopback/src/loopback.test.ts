// Tests for the in-memory transport

import { describe, it, expect } from "vitest";
import { createChannel } from "./channel.ts";
import { loopbackPair } from "./connection.ts";
import { LoopbackError } from "./error.ts";
import { createStreamPair } from "./stream.ts";

const text = (s: string): Uint8Array => new TextEncoder().encode(s);

describe("createChannel", () => {
  it("delivers buffered values before the end marker", async () => {
    const channel = createChannel<number>();
    channel.send(1);
    channel.send(2);
    channel.close();

    expect(await channel.recv()).toBe(1);
    expect(await channel.recv()).toBe(2);
    expect(await channel.recv()).toBeNull();
    expect(channel.send(3)).toBe(false);
  });

  it("wakes a waiting receiver", async () => {
    const channel = createChannel<string>();
    const pending = channel.recv();
    channel.send("late");
    expect(await pending).toBe("late");
  });

  it("rejects waiting and later receivers on failure", async () => {
    const channel = createChannel<number>();
    const pending = channel.recv();
    channel.fail(new Error("boom"));

    await expect(pending).rejects.toThrow("boom");
    await expect(channel.recv()).rejects.toThrow("boom");
    expect(channel.isClosed()).toBe(true);
  });
});

describe("stream pair", () => {
  it("splits chunks to the requested read size", async () => {
    const [send, recv] = createStreamPair();
    await send.write(text("abcdef"));
    await send.finish();

    expect(await recv.read(4)).toEqual(text("abcd"));
    expect(await recv.read(4)).toEqual(text("ef"));
    expect(await recv.read(4)).toBeNull();
  });

  it("copies chunks on write", async () => {
    const [send, recv] = createStreamPair();
    const chunk = Uint8Array.of(1, 2, 3);
    await send.write(chunk);
    chunk[0] = 9;

    expect(Array.from((await recv.read(10)) ?? [])).toEqual([1, 2, 3]);
  });

  it("skips empty chunks", async () => {
    const [send, recv] = createStreamPair();
    await send.write(new Uint8Array(0));
    await send.write(Uint8Array.of(4));
    expect(Array.from((await recv.read(10)) ?? [])).toEqual([4]);
  });

  it("surfaces a reset to the reader", async () => {
    const [send, recv] = createStreamPair();
    await send.write(text("lost"));
    send.reset(42);

    const error = await recv.read(10).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(LoopbackError);
    expect(error).toMatchObject({ kind: "reset", code: 42 });
  });

  it("refuses writes after the reader stops", async () => {
    const [send, recv] = createStreamPair();
    recv.stop(3);

    expect(recv.isStopped).toBe(true);
    await expect(send.write(text("x"))).rejects.toMatchObject({ kind: "stopped", code: 3 });
    await expect(recv.read(1)).rejects.toMatchObject({ kind: "stopped" });
  });

  it("refuses writes after finish", async () => {
    const [send] = createStreamPair();
    await send.finish();
    await expect(send.write(text("x"))).rejects.toMatchObject({ kind: "finished" });
  });
});

describe("loopbackPair", () => {
  it("hands unidirectional streams to the peer", async () => {
    const [a, b] = loopbackPair();
    const send = await a.openUni();
    await send.write(text("uni"));
    await send.finish();

    const recv = await b.acceptUni();
    expect(await recv?.read(10)).toEqual(text("uni"));
    expect(await recv?.read(10)).toBeNull();
  });

  it("connects both directions of a bidirectional stream", async () => {
    const [a, b] = loopbackPair();
    const local = await a.openBi();
    const remote = await b.acceptBi();
    if (!remote) throw new Error("no stream");

    await local.send.write(text("ping"));
    await remote.send.write(text("pong"));
    expect(await remote.recv.read(10)).toEqual(text("ping"));
    expect(await local.recv.read(10)).toEqual(text("pong"));
  });

  it("delivers datagrams up to the size limit", async () => {
    const [a, b] = loopbackPair({ maxDatagramSize: 4 });
    expect(a.maxDatagramSize()).toBe(4);

    a.sendDatagram(Uint8Array.of(1, 2, 3, 4));
    expect(Array.from((await b.readDatagram()) ?? [])).toEqual([1, 2, 3, 4]);
    expect(() => a.sendDatagram(new Uint8Array(5))).toThrow("datagram of 5 bytes exceeds limit of 4");
  });

  it("reports disabled datagrams", () => {
    const [a] = loopbackPair({ maxDatagramSize: null });
    expect(a.maxDatagramSize()).toBeNull();
    expect(() => a.sendDatagram(new Uint8Array(1))).toThrow("datagram support disabled");
  });

  it("stops everything after close", async () => {
    const [a, b] = loopbackPair();
    b.close();

    expect(a.isClosed).toBe(true);
    expect(() => a.sendDatagram(new Uint8Array(1))).toThrow("connection lost");
    await expect(a.openUni()).rejects.toMatchObject({ kind: "closed" });
    expect(await a.acceptUni()).toBeNull();
  });

  it("rejects a bad datagram size", () => {
    expect(() => loopbackPair({ maxDatagramSize: 0 })).toThrow(RangeError);
  });
});
