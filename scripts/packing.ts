#!/usr/bin/env tsx
/**
 * Packing Benchmark Script
 *
 * Packs a large batch of random-sized messages and unpacks them again.
 * This measures:
 * - Datagram fill ratio under greedy first-fit
 * - Encode and decode throughput (messages/sec)
 * - Round-trip integrity over many datagrams
 */

import { chunkMessages } from "../packages/protocol/src/chunker.js";
import { dechunkDatagrams } from "../packages/protocol/src/dechunker.js";
import { createChunkerConfig } from "../packages/protocol/src/config.js";

// Configuration
const CONFIG = {
  maxDatagramSize: 1200,
  messageCount: 200_000,
  minMessageSize: 0,
  maxMessageSize: 400, // Skewed small, like game state or telemetry updates
};

class PackingBenchmark {
  private readonly config = createChunkerConfig(CONFIG.maxDatagramSize);
  private stats = {
    datagrams: 0,
    datagramBytes: 0,
    payloadBytes: 0,
    encodeMs: 0,
    decodeMs: 0,
    mismatches: 0,
  };

  /**
   * Run the benchmark
   */
  run(): void {
    console.log("📦 Packing Benchmark Starting...");
    console.log(`Messages: ${CONFIG.messageCount}`);
    console.log(`Max datagram size: ${CONFIG.maxDatagramSize}B`);
    console.log();

    const messages = this.generateMessages();

    let start = performance.now();
    const datagrams = Array.from(chunkMessages(messages, this.config));
    this.stats.encodeMs = performance.now() - start;

    for (const datagram of datagrams) {
      this.stats.datagrams++;
      this.stats.datagramBytes += datagram.length;
    }

    start = performance.now();
    let index = 0;
    for (const message of dechunkDatagrams(datagrams, this.config)) {
      const original = messages[index++];
      if (!original || !message.equals(original)) {
        this.stats.mismatches++;
      }
    }
    this.stats.decodeMs = performance.now() - start;

    if (index !== messages.length) {
      this.stats.mismatches += Math.abs(messages.length - index);
    }

    this.printStats();
  }

  /**
   * Random payloads with a bias toward small sizes
   */
  private generateMessages(): Buffer[] {
    const messages: Buffer[] = [];
    const span = CONFIG.maxMessageSize - CONFIG.minMessageSize;

    for (let i = 0; i < CONFIG.messageCount; i++) {
      const size = CONFIG.minMessageSize + Math.floor(Math.random() ** 2 * span);
      const message = Buffer.alloc(size, i % 256);
      this.stats.payloadBytes += size;
      messages.push(message);
    }

    return messages;
  }

  /**
   * Print benchmark statistics
   */
  private printStats(): void {
    const capacity = this.stats.datagrams * CONFIG.maxDatagramSize;

    console.log("📊 Packing Results:");
    console.log(`  Datagrams:            ${this.stats.datagrams}`);
    console.log(`  Payload Bytes:        ${this.formatBytes(this.stats.payloadBytes)}`);
    console.log(`  Datagram Bytes:       ${this.formatBytes(this.stats.datagramBytes)}`);
    console.log(
      `  Fill Ratio:           ${((this.stats.datagramBytes / capacity) * 100).toFixed(2)}%`
    );
    console.log(
      `  Encode:               ${this.rate(this.stats.encodeMs)} messages/sec`
    );
    console.log(
      `  Decode:               ${this.rate(this.stats.decodeMs)} messages/sec`
    );
    console.log();

    if (this.stats.mismatches === 0) {
      console.log("✅ Round trip intact");
    } else {
      console.log(`❌ ${this.stats.mismatches} message(s) did not round-trip`);
      process.exitCode = 1;
    }
  }

  private rate(ms: number): string {
    return ms > 0 ? ((CONFIG.messageCount / ms) * 1000).toFixed(0) : "∞";
  }

  /**
   * Format bytes to human-readable
   */
  private formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes}B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)}KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)}MB`;
  }
}

new PackingBenchmark().run();
