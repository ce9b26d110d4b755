import { describe, it, expect, vi } from "vitest";
import { EventEmitter } from "events";
import { DatagramSession, SessionState } from "./datagramSession.js";
import type { DatagramSocket } from "./datagramSocket.js";
import {
  CodecError,
  MessageTooLargeError,
} from "../../../protocol/src/errors.js";
import { jsonCodec } from "../../../protocol/src/codec.js";

/**
 * In-process socket that delivers each send() to its peer synchronously
 */
class MemorySocket extends EventEmitter implements DatagramSocket {
  peer: MemorySocket | null = null;
  sent: Buffer[] = [];

  send(datagram: Buffer): void {
    this.sent.push(datagram);
    this.peer?.emit("message", Buffer.from(datagram));
  }

  close(): void {
    this.emit("close");
  }
}

function socketPair(): [MemorySocket, MemorySocket] {
  const a = new MemorySocket();
  const b = new MemorySocket();
  a.peer = b;
  b.peer = a;
  return [a, b];
}

const bytes = (s: string) => Buffer.from(s, "utf8");

describe("DatagramSession", () => {
  it("delivers packed messages to the peer in order", () => {
    const [a, b] = socketPair();
    const sender = new DatagramSession(a, 10, "sender");
    const receiver = new DatagramSession(b, 10, "receiver");

    const received: string[] = [];
    receiver.on("message", (message: Buffer) => received.push(message.toString("utf8")));

    const sent = sender.send([bytes("AB"), bytes("CDE"), bytes("F")]);

    expect(sent).toBe(2);
    expect(received).toEqual(["AB", "CDE", "F"]);
    expect(sender.getStats()).toMatchObject({
      messagesSent: 3,
      datagramsSent: 2,
      bytesSent: 12,
    });
    expect(receiver.getStats()).toMatchObject({
      messagesReceived: 3,
      datagramsReceived: 2,
      bytesReceived: 12,
    });
  });

  it("reports each datagram it sends", () => {
    const [a] = socketPair();
    const session = new DatagramSession(a, 10, "s");
    const onDatagram = vi.fn();
    session.on("datagram", onDatagram);

    session.send([bytes("AB"), bytes("CDE"), bytes("F")]);

    expect(onDatagram.mock.calls).toEqual([
      ["out", 0, 9],
      ["out", 1, 3],
    ]);
  });

  it("sends earlier messages before rejecting an oversized one", () => {
    const [a, b] = socketPair();
    const sender = new DatagramSession(a, 10, "sender");
    const receiver = new DatagramSession(b, 10, "receiver");
    const received: string[] = [];
    receiver.on("message", (message: Buffer) => received.push(message.toString("utf8")));

    expect(() => sender.send([bytes("AB"), Buffer.alloc(9)])).toThrow(
      MessageTooLargeError
    );
    expect(received).toEqual(["AB"]);
    expect(sender.getStats()).toMatchObject({ messagesSent: 1, datagramsSent: 1 });
    expect(sender.getState()).toBe(SessionState.OPEN);
  });

  it("closes on a malformed datagram", () => {
    const [a, b] = socketPair();
    const receiver = new DatagramSession(b, 10, "receiver");
    const onError = vi.fn();
    const onClose = vi.fn();
    receiver.on("error", onError);
    receiver.on("close", onClose);

    a.send(Buffer.from([0, 5, 1]));

    expect(onError).toHaveBeenCalledWith({
      type: "protocol",
      reason:
        "Malformed frame in datagram 0 at offset 0: prefix claims 5 payload bytes, 1 remain",
      fatal: true,
    });
    expect(receiver.getState()).toBe(SessionState.CLOSED);
    expect(onClose).toHaveBeenCalledTimes(1);
  });

  it("closes on an oversized datagram and ignores later ones", () => {
    const [a, b] = socketPair();
    const receiver = new DatagramSession(b, 4, "receiver");
    const onError = vi.fn();
    const onMessage = vi.fn();
    receiver.on("error", onError);
    receiver.on("message", onMessage);

    a.send(Buffer.alloc(5));
    a.send(Buffer.from([0, 1, 0x41]));

    expect(onError).toHaveBeenCalledWith({
      type: "protocol",
      reason: "Datagram 0 oversized: 5 bytes, limit is 4",
      fatal: true,
    });
    expect(onMessage).not.toHaveBeenCalled();
    expect(receiver.getStats().datagramsReceived).toBe(1);
  });

  it("walks OPEN → CLOSING → CLOSED and drops sends afterwards", () => {
    const [a] = socketPair();
    const session = new DatagramSession(a, 10, "s");
    const states: SessionState[] = [];
    session.on("state", (state: SessionState) => states.push(state));

    session.close();
    session.close();

    expect(states).toEqual([SessionState.CLOSING, SessionState.CLOSED]);
    expect(session.send([bytes("AB")])).toBe(0);
    expect(a.sent).toEqual([]);
  });

  it("reports socket send failures as transport errors", () => {
    const [a] = socketPair();
    a.send = () => {
      throw new Error("socket gone");
    };
    const session = new DatagramSession(a, 10, "s");
    const onError = vi.fn();
    session.on("error", onError);

    expect(session.send([bytes("AB")])).toBe(0);
    expect(onError).toHaveBeenCalledWith({
      type: "transport",
      reason: "socket gone",
      fatal: false,
    });
  });

  it("counts only messages in datagrams the socket accepted", () => {
    const [a] = socketPair();
    const deliver = a.send.bind(a);
    let calls = 0;
    a.send = (datagram: Buffer) => {
      if (++calls > 1) throw new Error("socket gone");
      deliver(datagram);
    };
    const session = new DatagramSession(a, 10, "s");
    session.on("error", vi.fn());

    expect(session.send([bytes("AB"), bytes("CDE"), bytes("F")])).toBe(1);
    expect(session.getStats()).toMatchObject({
      messagesSent: 2,
      datagramsSent: 1,
      bytesSent: 9,
    });
  });

  it("lets message listener errors propagate without closing", () => {
    const [a, b] = socketPair();
    const receiver = new DatagramSession(b, 10, "receiver");
    const codec = jsonCodec<{ id: number }>();
    const decoded: { id: number }[] = [];
    const onError = vi.fn();
    receiver.on("error", onError);
    receiver.on("message", (message: Buffer) => decoded.push(codec.decode(message)));

    expect(() => a.send(Buffer.from([0, 2, 0x7b, 0x7b]))).toThrow(CodecError);
    expect(onError).not.toHaveBeenCalled();
    expect(receiver.getState()).toBe(SessionState.OPEN);

    a.send(Buffer.concat([Buffer.from([0, 8]), bytes('{"id":7}')]));

    expect(decoded).toEqual([{ id: 7 }]);
    expect(receiver.getStats().messagesReceived).toBe(2);
  });
});
