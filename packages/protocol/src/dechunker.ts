/**
 * Datagram Dechunker (decoder)
 *
 * Splits received datagrams back into messages. Every datagram is parsed on
 * its own: the chunker never lets a frame cross a datagram boundary, so no
 * state carries over from one datagram to the next.
 */

import { PREFIX_SIZE, DecodeState } from "./constants.js";
import { resolveConfig } from "./config.js";
import { readFrameHeader } from "./frame.js";
import { MalformedFrameError, OversizedDatagramError } from "./errors.js";
import type { ByteSource, ChunkerConfig } from "./types.js";

/**
 * Parse the frames of one datagram
 *
 * State machine: READING_PREFIX → READING_PAYLOAD → (READING_PREFIX | DATAGRAM_EXHAUSTED).
 * Messages are yielded as views over the datagram's memory.
 *
 * @param datagram - One received datagram
 * @param datagramIndex - Position in the stream, used in error reports
 * @throws MalformedFrameError when a prefix or payload overruns the datagram
 */
export function* readDatagram(
  datagram: Uint8Array,
  datagramIndex: number = 0
): Generator<Buffer, void, undefined> {
  const buffer = toBuffer(datagram);
  let state: DecodeState = DecodeState.READING_PREFIX;
  let frameStart = 0;
  let cursor = 0;
  let payloadLength = 0;

  while (state !== DecodeState.DATAGRAM_EXHAUSTED) {
    const remaining = buffer.length - cursor;

    switch (state) {
      case DecodeState.READING_PREFIX:
        if (remaining === 0) {
          state = DecodeState.DATAGRAM_EXHAUSTED;
          break;
        }
        if (remaining < PREFIX_SIZE) {
          throw new MalformedFrameError(
            datagramIndex,
            cursor,
            `${remaining} trailing byte(s), prefix needs ${PREFIX_SIZE}`
          );
        }
        frameStart = cursor;
        payloadLength = readFrameHeader(buffer, cursor);
        cursor += PREFIX_SIZE;
        state = DecodeState.READING_PAYLOAD;
        break;

      case DecodeState.READING_PAYLOAD:
        if (payloadLength > remaining) {
          throw new MalformedFrameError(
            datagramIndex,
            frameStart,
            `prefix claims ${payloadLength} payload bytes, ${remaining} remain`
          );
        }
        yield buffer.subarray(cursor, cursor + payloadLength);
        cursor += payloadLength;
        state = DecodeState.READING_PREFIX;
        break;
    }
  }
}

/**
 * Lazily reconstruct messages from an ordered sequence of datagrams
 *
 * Configuration is validated immediately. Messages from datagrams before a
 * bad one are yielded before the error is thrown.
 */
export function dechunkDatagrams(
  datagrams: Iterable<Uint8Array>,
  config: ChunkerConfig | number
): Generator<Buffer, void, undefined> {
  const resolved = resolveConfig(config);
  return unpackSync(datagrams, resolved);
}

/**
 * Async variant of dechunkDatagrams for streamed sources
 */
export function dechunkDatagramsAsync(
  datagrams: ByteSource,
  config: ChunkerConfig | number
): AsyncGenerator<Buffer, void, undefined> {
  const resolved = resolveConfig(config);
  return unpackAsync(datagrams, resolved);
}

/**
 * Reject a datagram larger than the agreed size
 */
export function assertDatagramSize(
  datagram: Uint8Array,
  datagramIndex: number,
  config: ChunkerConfig
): void {
  if (datagram.length > config.maxDatagramSize) {
    throw new OversizedDatagramError(
      datagramIndex,
      datagram.length,
      config.maxDatagramSize
    );
  }
}

function* unpackSync(
  datagrams: Iterable<Uint8Array>,
  config: ChunkerConfig
): Generator<Buffer, void, undefined> {
  let index = 0;
  for (const datagram of datagrams) {
    assertDatagramSize(datagram, index, config);
    yield* readDatagram(datagram, index);
    index++;
  }
}

async function* unpackAsync(
  datagrams: ByteSource,
  config: ChunkerConfig
): AsyncGenerator<Buffer, void, undefined> {
  let index = 0;
  for await (const datagram of datagrams) {
    assertDatagramSize(datagram, index, config);
    yield* readDatagram(datagram, index);
    index++;
  }
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes)
    ? bytes
    : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
