/**
 * Completion backend factory: one backend per configured candidate.
 */

import type { AppConfig, CompletionCandidateConfig } from "../../config";
import type { ICompletionBackend } from "./types";
import { StubCompletionBackend } from "./stub";
import { OpenAICompletionBackend } from "./openai";
import { AnthropicCompletionBackend } from "./anthropic";

export type { ICompletionBackend, Message, MessageRole, ConversationTurn, CompletionOptions } from "./types";
export { toMessages } from "./types";
export { StubCompletionBackend } from "./stub";
export type { StubStep } from "./stub";
export { OpenAICompletionBackend } from "./openai";
export { AnthropicCompletionBackend } from "./anthropic";
export { ProfileStore } from "./profiles";
export type { CredentialProfile } from "./profiles";

const DEFAULT_STUB_REPLY = "I am running without a language model right now. Can you try again later?";

export function createCompletionBackend(candidate: CompletionCandidateConfig, config: AppConfig): ICompletionBackend {
  const { baseUrl, requestTimeoutMs, apiKey, anthropicApiKey } = config.llm;
  switch (candidate.kind) {
    case "anthropic":
      return new AnthropicCompletionBackend({
        name: candidate.name,
        model: candidate.model,
        timeoutMs: requestTimeoutMs,
        fallbackApiKey: anthropicApiKey,
      });
    case "stub": {
      const reply = candidate.model.startsWith("stub:") ? candidate.model.slice("stub:".length).trim() : "";
      return StubCompletionBackend.fromReply(candidate.name, reply || DEFAULT_STUB_REPLY);
    }
    default:
      return new OpenAICompletionBackend({
        name: candidate.name,
        model: candidate.model,
        baseUrl,
        timeoutMs: requestTimeoutMs,
        fallbackApiKey: apiKey,
        headers: { "HTTP-Referer": "http://localhost:3000", "X-Title": `${config.persona.assistantName} Tutor` },
      });
  }
}

export function createCompletionBackends(config: AppConfig): ICompletionBackend[] {
  return config.llm.candidates.map((c) => createCompletionBackend(c, config));
}
