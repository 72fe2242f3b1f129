/**
 * Stub ASR adapter for testing or when no provider is configured.
 * Returns the configured transcript (empty by default).
 */

import type { IASR, TranscriptResult } from "./types";

export class StubASR implements IASR {
  calls = 0;

  constructor(private readonly text = "") {}

  async transcribe(_audioBuffer: Buffer, _format?: string): Promise<TranscriptResult> {
    this.calls++;
    return { text: this.text };
  }
}
