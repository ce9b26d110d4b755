/**
 * Protocol Constants
 *
 * Defines frame layout, size limits and decoder states.
 */

// Frame structure sizes
export const PREFIX_SIZE = 2; // length(2), Big Endian
export const MAX_PAYLOAD_LENGTH = 0xffff; // largest value the prefix can hold
export const MAX_DATAGRAM_SIZE = PREFIX_SIZE + MAX_PAYLOAD_LENGTH;

// Fits a single UDP datagram on typical Internet paths without IP fragmentation
export const DEFAULT_MAX_DATAGRAM_SIZE = 1200;

// Decoder states, per datagram
export enum DecodeState {
  READING_PREFIX = "READING_PREFIX",
  READING_PAYLOAD = "READING_PAYLOAD",
  DATAGRAM_EXHAUSTED = "DATAGRAM_EXHAUSTED",
}
