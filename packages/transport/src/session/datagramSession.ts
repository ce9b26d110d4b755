import { EventEmitter } from "events";
import { chunkMessages } from "../../../protocol/src/chunker.js";
import {
  assertDatagramSize,
  readDatagram,
} from "../../../protocol/src/dechunker.js";
import { resolveConfig } from "../../../protocol/src/config.js";
import {
  MalformedFrameError,
  MessageTooLargeError,
  OversizedDatagramError,
} from "../../../protocol/src/errors.js";
import type { ChunkerConfig } from "../../../protocol/src/types.js";
import type { DatagramSocket } from "./datagramSocket.js";

export enum SessionState {
  OPEN = "OPEN",
  CLOSING = "CLOSING",
  CLOSED = "CLOSED",
}

export type SessionStats = {
  sessionId: string;
  state: SessionState;
  messagesSent: number;
  messagesReceived: number;
  datagramsSent: number;
  datagramsReceived: number;
  bytesSent: number;
  bytesReceived: number;
};

export type SessionError = {
  type: "transport" | "protocol";
  reason: string;
  fatal: boolean;
};

export interface SessionEvents {
  message: (message: Buffer) => void;
  datagram: (direction: "in" | "out", index: number, size: number) => void;
  error: (error: SessionError) => void;
  close: (stats: SessionStats) => void;
  state: (state: SessionState) => void;
}

/**
 * DatagramSession runs the chunker and dechunker over one datagram socket.
 *
 * Responsibilities:
 * - Pack outgoing messages into datagrams and hand them to the socket
 * - Unpack each received datagram and emit its messages in order
 * - State machine enforcement (OPEN → CLOSING → CLOSED)
 *
 * Does NOT:
 * - Reorder, deduplicate or retransmit datagrams
 * - Interpret message contents
 */
export class DatagramSession extends EventEmitter {
  private socket: DatagramSocket;
  private state: SessionState = SessionState.OPEN;
  private readonly config: ChunkerConfig;
  public readonly sessionId: string;

  // Statistics
  private messagesSent: number = 0;
  private messagesReceived: number = 0;
  private datagramsSent: number = 0;
  private datagramsReceived: number = 0;
  private bytesSent: number = 0;
  private bytesReceived: number = 0;

  constructor(
    socket: DatagramSocket,
    config: ChunkerConfig | number,
    sessionId: string
  ) {
    super();
    this.socket = socket;
    this.config = resolveConfig(config);
    this.sessionId = sessionId;
    this.wireSocket();
  }

  /**
   * Bind socket events to session behavior
   */
  private wireSocket(): void {
    this.socket.on("message", (datagram: Buffer) => {
      if (this.state === SessionState.CLOSED) return;
      this.onDatagram(datagram);
    });

    this.socket.on("close", () => {
      this.handleClose();
    });

    this.socket.on("error", (err: Error) => {
      this.emit("error", {
        type: "transport",
        reason: err.message,
        fatal: true,
      });
      this.close();
    });
  }

  /**
   * Unpack one received datagram
   *
   * A protocol violation is fatal: the session closes and later datagrams
   * are ignored, since there is no way to resynchronize. Errors thrown by
   * message listeners are not protocol violations and propagate as-is.
   */
  private onDatagram(datagram: Buffer): void {
    const index = this.datagramsReceived++;
    this.bytesReceived += datagram.length;
    this.emit("datagram", "in", index, datagram.length);

    const frames = this.parse(datagram, index);
    while (this.state !== SessionState.CLOSED) {
      let next: IteratorResult<Buffer, void>;
      try {
        next = frames.next();
      } catch (err) {
        if (
          !(err instanceof MalformedFrameError) &&
          !(err instanceof OversizedDatagramError)
        ) {
          throw err;
        }
        this.protocolError(err);
        return;
      }

      if (next.done) return;
      this.messagesReceived++;
      this.emit("message", next.value);
    }
  }

  private *parse(datagram: Buffer, index: number): Generator<Buffer, void, undefined> {
    assertDatagramSize(datagram, index, this.config);
    yield* readDatagram(datagram, index);
  }

  private protocolError(err: Error): void {
    const error: SessionError = {
      type: "protocol",
      reason: err.message,
      fatal: true,
    };
    this.emit("error", error);
    this.close();
  }

  /**
   * Pack and send messages
   * Counts only messages in datagrams the socket accepted.
   *
   * @returns number of datagrams sent
   * @throws MessageTooLargeError after sending the datagrams that hold every
   * earlier message
   */
  send(messages: Iterable<Uint8Array>): number {
    if (this.state !== SessionState.OPEN) {
      // Silently drop if not in writable state
      return 0;
    }

    let sent = 0;

    try {
      for (const datagram of chunkMessages(messages, this.config)) {
        this.socket.send(datagram);
        this.emit("datagram", "out", this.datagramsSent, datagram.length);
        this.datagramsSent++;
        this.bytesSent += datagram.length;
        this.messagesSent += countFrames(datagram);
        sent++;
      }
    } catch (err) {
      if (err instanceof MessageTooLargeError) {
        throw err;
      }

      this.emit("error", {
        type: "transport",
        reason: err instanceof Error ? err.message : String(err),
        fatal: false,
      });
    }

    return sent;
  }

  /**
   * Close the session
   */
  close(): void {
    if (
      this.state === SessionState.CLOSING ||
      this.state === SessionState.CLOSED
    ) {
      return;
    }

    this.transition(SessionState.CLOSING);
    this.socket.close();
  }

  /**
   * Handle socket close event
   */
  private handleClose(): void {
    if (this.state === SessionState.CLOSED) return;

    this.transition(SessionState.CLOSED);
    this.emit("close", this.getStats());
  }

  /**
   * Transition to a new state
   */
  private transition(next: SessionState): void {
    if (this.state === next) return;

    const allowed = this.isTransitionAllowed(this.state, next);
    if (!allowed) {
      throw new Error(`Invalid state transition: ${this.state} → ${next}`);
    }

    this.state = next;
    this.emit("state", next);
  }

  /**
   * Check if a state transition is valid
   */
  private isTransitionAllowed(from: SessionState, to: SessionState): boolean {
    const transitions: Record<SessionState, SessionState[]> = {
      [SessionState.OPEN]: [SessionState.CLOSING, SessionState.CLOSED],
      [SessionState.CLOSING]: [SessionState.CLOSED],
      [SessionState.CLOSED]: [],
    };

    return transitions[from].includes(to);
  }

  /**
   * Get current session state
   */
  getState(): SessionState {
    return this.state;
  }

  /**
   * Get session statistics
   */
  getStats(): SessionStats {
    return {
      sessionId: this.sessionId,
      state: this.state,
      messagesSent: this.messagesSent,
      messagesReceived: this.messagesReceived,
      datagramsSent: this.datagramsSent,
      datagramsReceived: this.datagramsReceived,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
    };
  }
}

function countFrames(datagram: Buffer): number {
  let frames = 0;
  for (const _ of readDatagram(datagram)) frames++;
  return frames;
}
