/**
 * Completion backend types. A backend streams text deltas for one conversation turn; the hedged client
 * races several of them.
 */

export type MessageRole = "system" | "user" | "assistant";

export interface Message {
  role: MessageRole;
  content: string;
}

/** Frozen on construction; see PromptManager.buildTurn. */
export interface ConversationTurn {
  readonly systemMessages: readonly string[];
  readonly priorHistory: readonly Message[];
  readonly userMessage: string;
}

export interface CompletionOptions {
  maxTokens: number;
  temperature: number;
  stop: readonly string[];
  /** Resolved per turn from the active credential profile. */
  apiKey?: string;
}

export interface ICompletionBackend {
  /** Candidate name: used in logs and as the key name inside a credential profile. */
  readonly name: string;
  /** Stream text deltas. Errors surface from the iterator. */
  stream(messages: readonly Message[], options: CompletionOptions): AsyncIterable<string>;
}

export function toMessages(turn: ConversationTurn): Message[] {
  return [
    ...turn.systemMessages.map((content): Message => ({ role: "system", content })),
    ...turn.priorHistory.map((m) => ({ role: m.role, content: m.content })),
    { role: "user", content: turn.userMessage },
  ];
}
