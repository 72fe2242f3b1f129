/**
 * Stub synthesizer for testing or when no engine is configured: records chunks, plays nothing, and
 * reports drained as soon as a chunk has been fed.
 */

import type { TextChunk } from "../../pipeline/chunking-flusher";
import type { ISpeechSynthesizer } from "./types";

export class StubSynthesizer implements ISpeechSynthesizer {
  readonly sampleRate = 22050;
  readonly fed: TextChunk[] = [];
  private lastFeedAt: number | null = null;

  constructor(private readonly now: () => number = Date.now) {}

  async start(): Promise<void> {}

  async feed(chunk: TextChunk): Promise<void> {
    this.fed.push(chunk);
    this.lastFeedAt = this.now();
  }

  drainedSince(): number {
    return this.lastFeedAt === null ? Infinity : this.now() - this.lastFeedAt;
  }

  takeFailure(): Error | null {
    return null;
  }

  async close(): Promise<void> {}
}
