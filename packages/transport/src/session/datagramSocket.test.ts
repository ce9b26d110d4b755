import { describe, it, expect, afterEach } from "vitest";
import { createSocket, Socket } from "dgram";
import type { EventEmitter } from "events";
import { createUdpSocket, UdpSocket, type UdpSocketOptions } from "./datagramSocket.js";

const LOOPBACK = "127.0.0.1";

const cleanups: (() => Promise<void>)[] = [];

async function bind(options: UdpSocketOptions): Promise<UdpSocket> {
  const socket = await createUdpSocket({ host: LOOPBACK, ...options });
  cleanups.push(() => {
    const done = closed(socket);
    socket.close();
    return done;
  });
  return socket;
}

/**
 * Plain dgram socket for the far end, bound before the adapter under test
 */
function bindRaw(): Promise<Socket> {
  return new Promise((resolve) => {
    const socket = createSocket("udp4");
    socket.bind(0, LOOPBACK, () => resolve(socket));
    cleanups.push(
      () => new Promise<void>((done) => socket.close(() => done()))
    );
  });
}

function sendRaw(socket: Socket, text: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.send(Buffer.from(text, "utf8"), port, LOOPBACK, (err) =>
      err ? reject(err) : resolve()
    );
  });
}

function nextMessage(socket: EventEmitter): Promise<Buffer> {
  return new Promise((resolve) => socket.once("message", resolve));
}

function closed(socket: UdpSocket): Promise<void> {
  return new Promise((resolve) => socket.once("close", () => resolve()));
}

afterEach(async () => {
  await Promise.all(cleanups.splice(0).map((cleanup) => cleanup()));
});

describe("UdpSocket", () => {
  it("delivers a datagram to the configured peer", async () => {
    const receiver = await bind({});
    const sender = await bind({ remotePort: receiver.address().port, remoteHost: LOOPBACK });
    const received = nextMessage(receiver);

    sender.send(Buffer.from([0, 2, 0x41, 0x42]));

    expect(Array.from(await received)).toEqual([0, 2, 0x41, 0x42]);
  });

  it("drops datagrams from senders other than the peer", async () => {
    const peer = await bindRaw();
    const stranger = await bindRaw();
    const receiver = await bind({ remotePort: peer.address().port, remoteHost: LOOPBACK });
    const port = receiver.address().port;

    const received: string[] = [];
    receiver.on("message", (datagram: Buffer) => received.push(datagram.toString("utf8")));
    const fromPeer = nextMessage(receiver);

    await sendRaw(stranger, "stranger", port);
    await sendRaw(peer, "peer", port);

    expect((await fromPeer).toString("utf8")).toBe("peer");
    expect(received).toEqual(["peer"]);
  });

  it("closes only after queued sends have gone out", async () => {
    const receiver = await bindRaw();
    const sender = await createUdpSocket({
      host: LOOPBACK,
      remotePort: receiver.address().port,
      remoteHost: LOOPBACK,
    });
    const received = nextMessage(receiver);
    const senderClosed = closed(sender);

    sender.send(Buffer.from("last words", "utf8"));
    sender.close();

    await senderClosed;
    expect((await received).toString("utf8")).toBe("last words");
  });

  it("refuses to send without a remote peer", async () => {
    const socket = await bind({});

    expect(() => socket.send(Buffer.from([0, 0]))).toThrow("No remote peer configured");
  });

  it("rejects when the local port is taken", async () => {
    const first = await bind({});

    await expect(
      createUdpSocket({ host: LOOPBACK, port: first.address().port })
    ).rejects.toThrow(/EADDRINUSE/);
  });
});
