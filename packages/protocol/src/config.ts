/**
 * Size configuration and validation helpers
 */

import { PREFIX_SIZE, MAX_DATAGRAM_SIZE } from "./constants.js";
import { InvalidConfigurationError } from "./errors.js";
import type { ChunkerConfig } from "./types.js";

/**
 * Validate a max datagram size and build the shared config
 *
 * @throws InvalidConfigurationError if the size cannot hold a frame prefix
 * plus at least one payload byte, or exceeds what the prefix can describe
 */
export function createChunkerConfig(maxDatagramSize: number): ChunkerConfig {
  if (!Number.isSafeInteger(maxDatagramSize)) {
    throw new InvalidConfigurationError(maxDatagramSize, "must be an integer");
  }
  if (maxDatagramSize <= PREFIX_SIZE) {
    throw new InvalidConfigurationError(
      maxDatagramSize,
      `must be greater than the ${PREFIX_SIZE}-byte frame prefix`
    );
  }
  if (maxDatagramSize > MAX_DATAGRAM_SIZE) {
    throw new InvalidConfigurationError(
      maxDatagramSize,
      `must not exceed ${MAX_DATAGRAM_SIZE}`
    );
  }

  return Object.freeze({
    maxDatagramSize,
    maxMessageSize: maxDatagramSize - PREFIX_SIZE,
  });
}

/**
 * Accept either a raw size or a config object, validating both
 */
export function resolveConfig(config: ChunkerConfig | number): ChunkerConfig {
  const size = typeof config === "number" ? config : config.maxDatagramSize;
  return createChunkerConfig(size);
}

/**
 * Bytes a message occupies on the wire once framed
 */
export function frameSize(messageLength: number): number {
  return PREFIX_SIZE + messageLength;
}
