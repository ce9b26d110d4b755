/**
 * Protocol Type Definitions
 */

/**
 * Session-wide size agreement, shared read-only by both ends
 */
export type ChunkerConfig = {
  readonly maxDatagramSize: number; // Upper bound on every datagram
  readonly maxMessageSize: number; // maxDatagramSize - PREFIX_SIZE
};

/**
 * Turns typed messages into the bytes that get framed, and back
 */
export interface MessageCodec<T> {
  encode(message: T): Uint8Array;
  decode(bytes: Buffer): T;
}

/**
 * Anything a sequence of buffers can be pulled from
 */
export type ByteSource = Iterable<Uint8Array> | AsyncIterable<Uint8Array>;
