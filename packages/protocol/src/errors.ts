/**
 * Chunker Error Classes
 */

export enum ErrorLevel {
  INFO = "INFO",
  CRITICAL = "CRITICAL",
}

export class ChunkerError extends Error {
  readonly level: ErrorLevel;

  constructor(message: string, level: ErrorLevel = ErrorLevel.CRITICAL) {
    super(message);
    this.name = "ChunkerError";
    this.level = level;
  }
}

export class InvalidConfigurationError extends ChunkerError {
  constructor(readonly maxDatagramSize: number, reason: string) {
    super(`Invalid max datagram size ${maxDatagramSize}: ${reason}`);
    this.name = "InvalidConfigurationError";
  }
}

export class MessageTooLargeError extends ChunkerError {
  constructor(
    readonly messageIndex: number,
    readonly size: number,
    readonly maxMessageSize: number
  ) {
    super(
      `Message ${messageIndex} too large: ${size} bytes, limit is ${maxMessageSize}`
    );
    this.name = "MessageTooLargeError";
  }
}

export class OversizedDatagramError extends ChunkerError {
  constructor(
    readonly datagramIndex: number,
    readonly size: number,
    readonly maxDatagramSize: number
  ) {
    super(
      `Datagram ${datagramIndex} oversized: ${size} bytes, limit is ${maxDatagramSize}`
    );
    this.name = "OversizedDatagramError";
  }
}

export class MalformedFrameError extends ChunkerError {
  constructor(
    readonly datagramIndex: number,
    readonly offset: number,
    reason: string
  ) {
    super(`Malformed frame in datagram ${datagramIndex} at offset ${offset}: ${reason}`);
    this.name = "MalformedFrameError";
  }
}

export class CodecError extends ChunkerError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorLevel.INFO);
    this.name = "CodecError";
    this.cause = cause;
  }
}
