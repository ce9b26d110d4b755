/**
 * Frame Encoding
 *
 * Implements the frame layout:
 * | length (2B) | payload (length bytes) |
 *
 * The length field uses Big Endian (network byte order).
 */

import { PREFIX_SIZE, MAX_PAYLOAD_LENGTH } from "./constants.js";

/**
 * Encode a message as a single frame
 *
 * @param message - Serialized message bytes
 */
export function encodeFrame(message: Uint8Array): Buffer {
  if (message.length > MAX_PAYLOAD_LENGTH) {
    throw new RangeError(
      `Frame payload too long: ${message.length} bytes, limit is ${MAX_PAYLOAD_LENGTH}`
    );
  }

  const buffer = Buffer.alloc(PREFIX_SIZE + message.length);
  buffer.writeUInt16BE(message.length, 0);
  buffer.set(message, PREFIX_SIZE);

  return buffer;
}

/**
 * Read the payload length of the frame starting at offset
 *
 * Caller guarantees at least PREFIX_SIZE bytes remain.
 */
export function readFrameHeader(datagram: Buffer, offset: number): number {
  return datagram.readUInt16BE(offset);
}
