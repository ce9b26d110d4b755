/**
 * Message codecs and typed chunking helpers
 *
 * The chunker only sees bytes. These helpers put a MessageCodec in front of
 * it so callers can pack and unpack typed messages directly.
 */

import { chunkMessages } from "./chunker.js";
import { dechunkDatagrams, readDatagram } from "./dechunker.js";
import { CodecError } from "./errors.js";
import type { ChunkerConfig, MessageCodec } from "./types.js";

/**
 * UTF-8 JSON payloads
 */
export function jsonCodec<T>(): MessageCodec<T> {
  return {
    encode(message: T): Uint8Array {
      const json = JSON.stringify(message);
      if (json === undefined) {
        throw new CodecError("Message is not JSON-serializable");
      }
      return Buffer.from(json, "utf8");
    },
    decode(bytes: Buffer): T {
      try {
        return JSON.parse(bytes.toString("utf8"));
      } catch (err) {
        throw new CodecError(`Invalid JSON payload: ${err}`, err);
      }
    },
  };
}

export const utf8Codec: MessageCodec<string> = {
  encode: (message) => Buffer.from(message, "utf8"),
  decode: (bytes) => bytes.toString("utf8"),
};

// Raw bytes; decoded messages are views over the datagram
export const binaryCodec: MessageCodec<Buffer> = {
  encode: (message) => message,
  decode: (bytes) => bytes,
};

/**
 * Encode typed messages and pack them into datagrams
 */
export function serializeToDatagrams<T>(
  messages: Iterable<T>,
  codec: MessageCodec<T>,
  config: ChunkerConfig | number
): Generator<Buffer, void, undefined> {
  return chunkMessages(encodeEach(messages, codec), config);
}

/**
 * Decode every message of a single datagram
 */
export function deserializeDatagram<T>(
  datagram: Uint8Array,
  codec: MessageCodec<T>,
  datagramIndex: number = 0
): T[] {
  const messages: T[] = [];
  for (const bytes of readDatagram(datagram, datagramIndex)) {
    messages.push(codec.decode(bytes));
  }
  return messages;
}

/**
 * Unpack datagrams and decode each message, lazily
 */
export function deserializeDatagrams<T>(
  datagrams: Iterable<Uint8Array>,
  codec: MessageCodec<T>,
  config: ChunkerConfig | number
): Generator<T, void, undefined> {
  return decodeEach(dechunkDatagrams(datagrams, config), codec);
}

function* encodeEach<T>(
  messages: Iterable<T>,
  codec: MessageCodec<T>
): Generator<Uint8Array, void, undefined> {
  for (const message of messages) {
    yield codec.encode(message);
  }
}

function* decodeEach<T>(
  messages: Iterable<Buffer>,
  codec: MessageCodec<T>
): Generator<T, void, undefined> {
  for (const bytes of messages) {
    yield codec.decode(bytes);
  }
}
