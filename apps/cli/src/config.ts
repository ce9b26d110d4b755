/**
 * CLI configuration
 */

import { DEFAULT_MAX_DATAGRAM_SIZE } from "../../../packages/protocol/src/constants.js";

export const config = {
  maxDatagramSize: parseInt(
    process.env.CHUNKER_MAX_DATAGRAM_SIZE || String(DEFAULT_MAX_DATAGRAM_SIZE),
    10
  ),
  host: process.env.CHUNKER_HOST || "127.0.0.1",
  debug: process.env.CHUNKER_DEBUG === "1",
};
