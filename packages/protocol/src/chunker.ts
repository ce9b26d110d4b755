/**
 * Datagram Chunker (encoder)
 *
 * Packs length-prefixed frames into datagrams of at most maxDatagramSize
 * bytes using greedy first-fit. A frame is never split across datagrams.
 */

import { resolveConfig, frameSize } from "./config.js";
import { encodeFrame } from "./frame.js";
import { MessageTooLargeError } from "./errors.js";
import type { ByteSource, ChunkerConfig } from "./types.js";

/**
 * Push-style accumulator behind the sequence transforms.
 *
 * Holds at most one open datagram. Completed datagrams are handed back
 * to the caller immediately and never retained.
 */
export class DatagramChunker {
  private readonly config: ChunkerConfig;
  private frames: Buffer[] = [];
  private currentSize: number = 0;
  private messagesSeen: number = 0;

  constructor(config: ChunkerConfig | number) {
    this.config = resolveConfig(config);
  }

  /**
   * Add a message
   *
   * @returns the datagram that was closed to make room, if any
   * @throws MessageTooLargeError if the framed message exceeds maxDatagramSize
   */
  push(message: Uint8Array): Buffer | undefined {
    const index = this.messagesSeen++;
    const size = frameSize(message.length);

    if (size > this.config.maxDatagramSize) {
      throw new MessageTooLargeError(
        index,
        message.length,
        this.config.maxMessageSize
      );
    }

    let completed: Buffer | undefined;
    if (
      this.currentSize > 0 &&
      this.currentSize + size > this.config.maxDatagramSize
    ) {
      completed = this.flush();
    }

    this.frames.push(encodeFrame(message));
    this.currentSize += size;

    return completed;
  }

  /**
   * Close the open datagram
   *
   * @returns the datagram, or undefined when nothing is buffered
   */
  flush(): Buffer | undefined {
    if (this.currentSize === 0) {
      return undefined;
    }

    const datagram = Buffer.concat(this.frames, this.currentSize);
    this.frames = [];
    this.currentSize = 0;
    return datagram;
  }

  /**
   * Bytes buffered in the open datagram
   */
  get pendingBytes(): number {
    return this.currentSize;
  }

  /**
   * Number of push calls so far, rejected messages included
   */
  get messageCount(): number {
    return this.messagesSeen;
  }
}

/**
 * Lazily pack messages into datagrams
 *
 * Configuration is validated immediately. If a message is too large, the
 * datagrams holding every earlier message are yielded first, then the
 * MessageTooLargeError is thrown.
 */
export function chunkMessages(
  messages: Iterable<Uint8Array>,
  config: ChunkerConfig | number
): Generator<Buffer, void, undefined> {
  const chunker = new DatagramChunker(config);
  return packSync(messages, chunker);
}

/**
 * Async variant of chunkMessages for streamed sources
 */
export function chunkMessagesAsync(
  messages: ByteSource,
  config: ChunkerConfig | number
): AsyncGenerator<Buffer, void, undefined> {
  const chunker = new DatagramChunker(config);
  return packAsync(messages, chunker);
}

function* packSync(
  messages: Iterable<Uint8Array>,
  chunker: DatagramChunker
): Generator<Buffer, void, undefined> {
  for (const message of messages) {
    let completed: Buffer | undefined;
    try {
      completed = chunker.push(message);
    } catch (err) {
      const pending = chunker.flush();
      if (pending) yield pending;
      throw err;
    }
    if (completed) yield completed;
  }

  const last = chunker.flush();
  if (last) yield last;
}

async function* packAsync(
  messages: ByteSource,
  chunker: DatagramChunker
): AsyncGenerator<Buffer, void, undefined> {
  for await (const message of messages) {
    let completed: Buffer | undefined;
    try {
      completed = chunker.push(message);
    } catch (err) {
      const pending = chunker.flush();
      if (pending) yield pending;
      throw err;
    }
    if (completed) yield completed;
  }

  const last = chunker.flush();
  if (last) yield last;
}
