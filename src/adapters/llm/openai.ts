/**
 * OpenAI-compatible Chat Completions backend (OpenRouter by default).
 */

import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { classifyBackendError } from "../../errors";
import type { ICompletionBackend, Message, CompletionOptions } from "./types";

export interface OpenAICompletionConfig {
  name: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
  /** Used when the active profile has no key for this candidate. */
  fallbackApiKey?: string;
  /** Sent on every request; OpenRouter uses these for attribution. */
  headers?: Record<string, string>;
}

function toChatParam(m: Message): ChatCompletionMessageParam {
  switch (m.role) {
    case "system":
      return { role: "system", content: m.content };
    case "assistant":
      return { role: "assistant", content: m.content };
    default:
      return { role: "user", content: m.content };
  }
}

export class OpenAICompletionBackend implements ICompletionBackend {
  readonly name: string;
  private readonly clients = new Map<string, OpenAI>();

  constructor(private readonly cfg: OpenAICompletionConfig) {
    this.name = cfg.name;
  }

  async *stream(messages: readonly Message[], options: CompletionOptions): AsyncIterable<string> {
    const client = this.clientFor(options.apiKey ?? this.cfg.fallbackApiKey ?? "");
    try {
      const streamResult = await client.chat.completions.create({
        model: this.cfg.model,
        messages: messages.map(toChatParam),
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        stop: [...options.stop],
        stream: true,
      });
      for await (const chunk of streamResult) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) yield delta;
      }
    } catch (err) {
      throw classifyBackendError(err, this.name);
    }
  }

  private clientFor(apiKey: string): OpenAI {
    const cached = this.clients.get(apiKey);
    if (cached) return cached;
    const client = new OpenAI({
      apiKey,
      baseURL: this.cfg.baseUrl,
      timeout: this.cfg.timeoutMs,
      maxRetries: 0,
      defaultHeaders: this.cfg.headers,
    });
    this.clients.set(apiKey, client);
    return client;
  }
}
