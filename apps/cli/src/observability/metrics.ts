/**
 * Packing metrics tracking
 */

export type MetricsSnapshot = {
  messages: number;
  datagrams: number;
  payloadBytes: string;
  datagramBytes: string;
  fillRatio: string;
};

export class Metrics {
  private messages: number = 0;
  private datagrams: number = 0;
  private payloadBytes: number = 0;
  private datagramBytes: number = 0;

  constructor(private readonly maxDatagramSize: number) {}

  /**
   * Track one message on either side of the chunker
   */
  messageProcessed(bytes: number): void {
    this.messages++;
    this.payloadBytes += bytes;
  }

  /**
   * Track one datagram on either side of the chunker
   */
  datagramProcessed(bytes: number): void {
    this.datagrams++;
    this.datagramBytes += bytes;
  }

  /**
   * Get current metrics snapshot
   */
  getSnapshot(): MetricsSnapshot {
    const capacity = this.datagrams * this.maxDatagramSize;

    return {
      messages: this.messages,
      datagrams: this.datagrams,
      payloadBytes: this.formatBytes(this.payloadBytes),
      datagramBytes: this.formatBytes(this.datagramBytes),
      fillRatio:
        capacity > 0
          ? `${((this.datagramBytes / capacity) * 100).toFixed(2)}%`
          : "0.00%",
    };
  }

  /**
   * Format bytes to human-readable
   */
  private formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes}B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)}KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)}MB`;
  }

  /**
   * Print metrics to stderr
   */
  print(): void {
    const snapshot = this.getSnapshot();
    console.error("\n📊 Packing Metrics:");
    console.error(`  Messages:        ${snapshot.messages}`);
    console.error(`  Datagrams:       ${snapshot.datagrams}`);
    console.error(`  Payload Bytes:   ${snapshot.payloadBytes}`);
    console.error(`  Datagram Bytes:  ${snapshot.datagramBytes}`);
    console.error(`  Fill Ratio:      ${snapshot.fillRatio}`);
    console.error();
  }
}
