#!/usr/bin/env node
/**
 * Datagram Chunker CLI Entry Point
 *
 * Usage:
 *   datagram-chunker encode [maxDatagramSize]
 *   datagram-chunker decode [maxDatagramSize]
 *   datagram-chunker send <port> [host]
 *   datagram-chunker listen <port> [host]
 */

import { ChunkerCLI } from "./cli.js";
import { config } from "./config.js";
import { logger } from "./observability/logger.js";
import { ChunkerError } from "../../../packages/protocol/src/errors.js";

const USAGE = "Usage: datagram-chunker <encode|decode> [maxDatagramSize] | <send|listen> <port> [host]";

async function main(argv: string[]): Promise<void> {
  const [command, ...args] = argv;

  switch (command) {
    case "encode":
    case "decode": {
      const size = parseInt(args[0] || String(config.maxDatagramSize), 10);
      const cli = new ChunkerCLI(size);
      await (command === "encode" ? cli.encode() : cli.decode());
      cli.metrics.print();
      return;
    }

    case "send":
    case "listen": {
      const port = parseInt(args[0] || "", 10);
      if (Number.isNaN(port)) {
        throw new Error(USAGE);
      }
      const host = args[1] || config.host;
      const cli = new ChunkerCLI(config.maxDatagramSize);

      // Graceful shutdown
      process.on("SIGINT", () => {
        logger.info("Received SIGINT, closing session...");
        cli.stop();
      });

      await (command === "send" ? cli.send(port, host) : cli.listen(port, host));
      cli.metrics.print();
      return;
    }

    default:
      throw new Error(USAGE);
  }
}

main(process.argv.slice(2)).catch((err) => {
  if (err instanceof ChunkerError) {
    logger.error(err.message, { error: err.name, level: err.level });
  } else {
    logger.error(err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
});
