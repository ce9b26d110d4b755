export {
  PREFIX_SIZE,
  MAX_PAYLOAD_LENGTH,
  MAX_DATAGRAM_SIZE,
  DEFAULT_MAX_DATAGRAM_SIZE,
  DecodeState,
} from "./constants.js";
export {
  ErrorLevel,
  ChunkerError,
  InvalidConfigurationError,
  MessageTooLargeError,
  OversizedDatagramError,
  MalformedFrameError,
  CodecError,
} from "./errors.js";
export type { ChunkerConfig, MessageCodec, ByteSource } from "./types.js";
export { createChunkerConfig, resolveConfig, frameSize } from "./config.js";
export { encodeFrame, readFrameHeader } from "./frame.js";
export {
  DatagramChunker,
  chunkMessages,
  chunkMessagesAsync,
} from "./chunker.js";
export {
  readDatagram,
  dechunkDatagrams,
  dechunkDatagramsAsync,
  assertDatagramSize,
} from "./dechunker.js";
export {
  jsonCodec,
  utf8Codec,
  binaryCodec,
  serializeToDatagrams,
  deserializeDatagram,
  deserializeDatagrams,
} from "./codec.js";
