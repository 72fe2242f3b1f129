/**
 * Scripted completion backend for tests and for running the head without network access.
 * Each step waits `delayMs` after the previous one, then yields its text or throws its error.
 */

import type { ICompletionBackend, Message, CompletionOptions } from "./types";

export type StubStep = { delayMs: number; text: string } | { delayMs: number; error: Error };

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class StubCompletionBackend implements ICompletionBackend {
  /** Number of stream() calls so far; tests use it to check which candidates were started. */
  calls = 0;
  lastMessages: readonly Message[] = [];
  lastOptions: CompletionOptions | null = null;

  constructor(readonly name: string, private readonly steps: readonly StubStep[] = []) {}

  /** Backend that speaks `reply` word by word, 40 ms apart. */
  static fromReply(name: string, reply: string, stepMs = 40): StubCompletionBackend {
    const words = reply.split(/(?<= )/).filter(Boolean);
    return new StubCompletionBackend(
      name,
      words.map((text) => ({ delayMs: stepMs, text }))
    );
  }

  async *stream(messages: readonly Message[], options: CompletionOptions): AsyncIterable<string> {
    this.calls++;
    this.lastMessages = messages;
    this.lastOptions = options;
    for (const step of this.steps) {
      if (step.delayMs > 0) await sleep(step.delayMs);
      if ("error" in step) throw step.error;
      yield step.text;
    }
  }
}
