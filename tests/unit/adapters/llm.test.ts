/**
 * Unit tests for completion backends (SDKs mocked) and the factory.
 */

import OpenAI from "openai";
import Anthropic from "@anthropic-ai/sdk";
import {
  AnthropicCompletionBackend,
  OpenAICompletionBackend,
  StubCompletionBackend,
  createCompletionBackend,
  createCompletionBackends,
  toMessages,
} from "../../../src/adapters/llm";
import { loadConfig } from "../../../src/config";
import { QuotaOrAuthError } from "../../../src/errors";

const mockCreate = jest.fn();
const mockAnthropicStream = jest.fn();

jest.mock("openai", () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({ chat: { completions: { create: mockCreate } } })),
}));

jest.mock("@anthropic-ai/sdk", () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({ messages: { stream: mockAnthropicStream } })),
}));

async function* items<T>(values: T[]): AsyncGenerator<T> {
  for (const v of values) yield v;
}

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const t of stream) out.push(t);
  return out;
}

const options = { maxTokens: 48, temperature: 0.4, stop: ["\n\n", "You:"] };
const messages = toMessages({ systemMessages: ["Be brief.", "No emojis."], priorHistory: [], userMessage: "Hi" });

beforeEach(() => {
  mockCreate.mockReset();
  mockAnthropicStream.mockReset();
  jest.mocked(OpenAI).mockClear();
  jest.mocked(Anthropic).mockClear();
});

describe("OpenAICompletionBackend", () => {
  const cfg = { name: "primary", model: "openai/gpt-4o-mini", baseUrl: "https://example.test/v1", timeoutMs: 20000, fallbackApiKey: "test-fallback" };

  it("streams delta content and skips empty deltas", async () => {
    mockCreate.mockResolvedValue(
      items([
        { choices: [{ delta: { content: "Hello" } }] },
        { choices: [{ delta: {} }] },
        { choices: [] },
        { choices: [{ delta: { content: " there." } }] },
      ])
    );
    const backend = new OpenAICompletionBackend(cfg);
    expect(await collect(backend.stream(messages, options))).toEqual(["Hello", " there."]);
    expect(mockCreate).toHaveBeenCalledWith({
      model: "openai/gpt-4o-mini",
      messages: [
        { role: "system", content: "Be brief." },
        { role: "system", content: "No emojis." },
        { role: "user", content: "Hi" },
      ],
      max_tokens: 48,
      temperature: 0.4,
      stop: ["\n\n", "You:"],
      stream: true,
    });
  });

  it("prefers the profile key and caches one client per key", async () => {
    mockCreate.mockImplementation(async () => items([]));
    const backend = new OpenAICompletionBackend(cfg);
    await collect(backend.stream(messages, { ...options, apiKey: "test-profile" }));
    await collect(backend.stream(messages, { ...options, apiKey: "test-profile" }));
    await collect(backend.stream(messages, options));

    const ctor = jest.mocked(OpenAI);
    expect(ctor).toHaveBeenCalledTimes(2);
    expect(ctor.mock.calls[0][0]).toEqual({
      apiKey: "test-profile",
      baseURL: "https://example.test/v1",
      timeout: 20000,
      maxRetries: 0,
      defaultHeaders: undefined,
    });
    expect(ctor.mock.calls[1][0]?.apiKey).toBe("test-fallback");
  });

  it("rethrows rate-limit failures as QuotaOrAuthError", async () => {
    mockCreate.mockRejectedValue(Object.assign(new Error("Too Many Requests"), { status: 429 }));
    const backend = new OpenAICompletionBackend(cfg);
    const err = await collect(backend.stream(messages, options)).then(
      () => null,
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(QuotaOrAuthError);
    if (err instanceof QuotaOrAuthError) {
      expect(err.message).toBe("Too Many Requests");
      expect(err.candidate).toBe(cfg.name);
    }
  });

  it("passes other failures through unchanged", async () => {
    const boom = new Error("socket hang up");
    mockCreate.mockRejectedValue(boom);
    const backend = new OpenAICompletionBackend(cfg);
    await expect(collect(backend.stream(messages, options))).rejects.toBe(boom);
  });
});

describe("AnthropicCompletionBackend", () => {
  it("joins system messages and yields text deltas only", async () => {
    mockAnthropicStream.mockReturnValue(
      items([
        { type: "message_start" },
        { type: "content_block_delta", delta: { type: "text_delta", text: "Hi" } },
        { type: "content_block_delta", delta: { type: "input_json_delta", partial_json: "{" } },
        { type: "content_block_delta", delta: { type: "text_delta", text: "!" } },
      ])
    );
    const backend = new AnthropicCompletionBackend({ name: "smart", model: "claude-3-5-haiku-latest", timeoutMs: 20000 });
    expect(await collect(backend.stream(messages, { ...options, apiKey: "test-secret" }))).toEqual(["Hi", "!"]);
    expect(mockAnthropicStream).toHaveBeenCalledWith({
      model: "claude-3-5-haiku-latest",
      max_tokens: 48,
      temperature: 0.4,
      stop_sequences: ["You:"],
      system: "Be brief.\n\nNo emojis.",
      messages: [{ role: "user", content: "Hi" }],
    });
    expect(jest.mocked(Anthropic).mock.calls[0][0]).toEqual({ apiKey: "test-secret", timeout: 20000, maxRetries: 0 });
  });

  it("rethrows credential failures as QuotaOrAuthError", async () => {
    mockAnthropicStream.mockImplementation(() => {
      throw Object.assign(new Error("invalid x-api-key"), { status: 401 });
    });
    const backend = new AnthropicCompletionBackend({ name: "smart", model: "claude-3-5-haiku-latest", timeoutMs: 20000 });
    await expect(collect(backend.stream(messages, options))).rejects.toBeInstanceOf(QuotaOrAuthError);
  });
});

describe("StubCompletionBackend", () => {
  it("speaks a reply word by word", async () => {
    const backend = StubCompletionBackend.fromReply("stub", "Nice to meet you.", 0);
    expect(await collect(backend.stream(messages, options))).toEqual(["Nice ", "to ", "meet ", "you."]);
    expect(backend.calls).toBe(1);
  });
});

describe("createCompletionBackend", () => {
  const config = loadConfig({
    TTS_PROVIDER: "stub",
    ASR_PROVIDER: "stub",
    LLM_CANDIDATES: "fast=openai/gpt-4o-mini,smart=anthropic:claude-3-5-haiku-latest,local=stub:Hello there.",
  });

  it("builds one backend per candidate by kind", () => {
    const backends = createCompletionBackends(config);
    expect(backends.map((b) => b.name)).toEqual(["fast", "smart", "local"]);
    expect(backends[0]).toBeInstanceOf(OpenAICompletionBackend);
    expect(backends[1]).toBeInstanceOf(AnthropicCompletionBackend);
    expect(backends[2]).toBeInstanceOf(StubCompletionBackend);
  });

  it("uses the scripted reply for stub candidates", async () => {
    const backend = createCompletionBackend({ name: "local", kind: "stub", model: "stub:Hello there." }, config);
    expect((await collect(backend.stream(messages, options))).join("")).toBe("Hello there.");
  });
});
