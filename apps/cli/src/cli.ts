import * as readline from "readline";
import type { Readable, Writable } from "stream";
import { createChunkerConfig } from "../../../packages/protocol/src/config.js";
import { chunkMessagesAsync } from "../../../packages/protocol/src/chunker.js";
import { dechunkDatagramsAsync } from "../../../packages/protocol/src/dechunker.js";
import { CodecError } from "../../../packages/protocol/src/errors.js";
import type { ChunkerConfig } from "../../../packages/protocol/src/types.js";
import {
  DatagramSession,
  SessionState,
  type SessionEvents,
} from "../../../packages/transport/src/session/datagramSession.js";
import { createUdpSocket } from "../../../packages/transport/src/session/datagramSocket.js";
import { Metrics } from "./observability/metrics.js";
import { logger } from "./observability/logger.js";

export type CliStreams = {
  input: Readable;
  output: Writable;
};

const HEX_LINE = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * Line-oriented front end for the chunker
 *
 * Messages are UTF-8 lines; datagrams are hex lines.
 */
export class ChunkerCLI {
  private readonly config: ChunkerConfig;
  private readonly streams: CliStreams;
  private session: DatagramSession | null = null;
  private bound: { address: string; port: number } | null = null;
  readonly metrics: Metrics;

  constructor(
    maxDatagramSize: number,
    streams: CliStreams = { input: process.stdin, output: process.stdout }
  ) {
    this.config = createChunkerConfig(maxDatagramSize);
    this.streams = streams;
    this.metrics = new Metrics(this.config.maxDatagramSize);
  }

  /**
   * Message lines in, hex datagram lines out
   */
  async encode(): Promise<void> {
    let index = 0;
    for await (const datagram of chunkMessagesAsync(
      this.messageLines(),
      this.config
    )) {
      this.metrics.datagramProcessed(datagram.length);
      logger.datagram("out", index++, datagram.length, this.config.maxDatagramSize);
      this.writeLine(datagram.toString("hex"));
    }
  }

  /**
   * Hex datagram lines in, message lines out
   */
  async decode(): Promise<void> {
    for await (const message of dechunkDatagramsAsync(
      this.datagramLines(),
      this.config
    )) {
      this.metrics.messageProcessed(message.length);
      this.writeLine(message.toString("utf8"));
    }
  }

  /**
   * Pack stdin lines and send them to a UDP peer
   */
  async send(port: number, host: string): Promise<void> {
    const messages: Buffer[] = [];
    for await (const message of this.messageLines()) {
      messages.push(message);
    }

    const socket = await createUdpSocket({ remotePort: port, remoteHost: host });
    const session = this.openSession(new DatagramSession(socket, this.config, "send"));
    const closed = this.waitForClose(session);

    // Close waits for in-flight sends, so a failure surfaces only after
    // the datagrams that made it out are on the wire.
    let failure: unknown = null;
    try {
      const sent = session.send(messages);
      logger.info(`Sent ${messages.length} message(s) in ${sent} datagram(s) to ${host}:${port}`);
    } catch (err) {
      failure = err;
    }

    session.close();
    await closed;

    if (failure !== null) {
      throw failure;
    }
  }

  /**
   * Print every message received on a UDP port until stopped
   */
  async listen(port: number, host: string): Promise<void> {
    const socket = await createUdpSocket({ port, host });
    const session = this.openSession(new DatagramSession(socket, this.config, "listen"));
    this.bound = socket.address();
    const { address, port: boundPort } = this.bound;

    session.on("message", (message: Buffer) => {
      this.metrics.messageProcessed(message.length);
      this.writeLine(message.toString("utf8"));
    });

    logger.info(`Listening on ${address}:${boundPort}`);
    await this.waitForClose(session);
    this.bound = null;
  }

  /**
   * Address the listener is bound to, once bound
   */
  listeningAddress(): { address: string; port: number } | null {
    return this.bound;
  }

  /**
   * Close the active session, if any
   */
  stop(): void {
    this.session?.close();
  }

  /**
   * Wire logging and metrics to a session
   */
  private openSession(session: DatagramSession): DatagramSession {
    this.session = session;

    const onDatagram: SessionEvents["datagram"] = (direction, index, size) => {
      this.metrics.datagramProcessed(size);
      logger.datagram(direction, index, size, this.config.maxDatagramSize);
    };
    const onError: SessionEvents["error"] = (error) => {
      logger.error(`[${session.sessionId}] ${error.type} error: ${error.reason}`, {
        fatal: error.fatal,
      });
    };

    session.on("datagram", onDatagram);
    session.on("error", onError);
    session.on("state", (state: SessionState) => {
      logger.stateTransition(session.sessionId, state);
    });

    return session;
  }

  private waitForClose(session: DatagramSession): Promise<void> {
    return new Promise((resolve) => {
      session.once("close", () => resolve());
    });
  }

  private async *lines(): AsyncGenerator<string, void, undefined> {
    const rl = readline.createInterface({
      input: this.streams.input,
      crlfDelay: Infinity,
    });

    try {
      for await (const line of rl) {
        yield line;
      }
    } finally {
      rl.close();
    }
  }

  private async *messageLines(): AsyncGenerator<Buffer, void, undefined> {
    for await (const line of this.lines()) {
      const message = Buffer.from(line, "utf8");
      this.metrics.messageProcessed(message.length);
      yield message;
    }
  }

  private async *datagramLines(): AsyncGenerator<Buffer, void, undefined> {
    let lineNumber = 0;
    for await (const line of this.lines()) {
      lineNumber++;
      const hex = line.trim();
      if (!HEX_LINE.test(hex)) {
        throw new CodecError(`Line ${lineNumber} is not valid hex`);
      }

      const datagram = Buffer.from(hex, "hex");
      this.metrics.datagramProcessed(datagram.length);
      yield datagram;
    }
  }

  private writeLine(line: string): void {
    this.streams.output.write(`${line}\n`);
  }
}
