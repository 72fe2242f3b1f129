/**
 * Anthropic Claude backend.
 */

import Anthropic from "@anthropic-ai/sdk";
import { classifyBackendError } from "../../errors";
import type { ICompletionBackend, Message, CompletionOptions } from "./types";

export interface AnthropicCompletionConfig {
  name: string;
  model: string;
  timeoutMs: number;
  fallbackApiKey?: string;
}

export class AnthropicCompletionBackend implements ICompletionBackend {
  readonly name: string;
  private readonly clients = new Map<string, Anthropic>();

  constructor(private readonly cfg: AnthropicCompletionConfig) {
    this.name = cfg.name;
  }

  async *stream(messages: readonly Message[], options: CompletionOptions): AsyncIterable<string> {
    const client = this.clientFor(options.apiKey ?? this.cfg.fallbackApiKey ?? "");
    const system = messages
      .filter((m) => m.role === "system")
      .map((m) => m.content)
      .join("\n\n");
    const msgs = messages.flatMap((m): Anthropic.MessageParam[] =>
      m.role === "system" ? [] : [{ role: m.role, content: m.content }]
    );
    try {
      const streamResult = client.messages.stream({
        model: this.cfg.model,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        // The Messages API rejects whitespace-only stop sequences.
        stop_sequences: options.stop.filter((s) => s.trim() !== ""),
        system: system || undefined,
        messages: msgs,
      });
      for await (const event of streamResult) {
        if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
          yield event.delta.text;
        }
      }
    } catch (err) {
      throw classifyBackendError(err, this.name);
    }
  }

  private clientFor(apiKey: string): Anthropic {
    const cached = this.clients.get(apiKey);
    if (cached) return cached;
    const client = new Anthropic({ apiKey, timeout: this.cfg.timeoutMs, maxRetries: 0 });
    this.clients.set(apiKey, client);
    return client;
  }
}
