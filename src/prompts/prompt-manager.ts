import type { ConversationTurn, Message } from "../adapters/llm/types";
import type { SessionMemorySnapshot } from "../memory/types";

export interface LessonContext {
  studentName: string;
  studentLevel: string;
  lessonTitle: string;
  lessonObjective: string;
}

export interface PromptManagerConfig {
  assistantName: string;
  /** Replaces the built-in general tutor prompt (not the lesson prompt). */
  systemPrompt?: string;
  /** Prior messages carried into each turn. */
  historyMessages: number;
}

/** Openers the tutor tends to repeat; earlier replies starting with these are left out of context. */
const STALE_OPENERS = ["in this lesson", "we will learn"];

export function generalSystemPrompt(assistantName: string): string {
  return [
    `You are ${assistantName}, a friendly AI English Teacher.`,
    "Rules: 1-2 sentences (at most 40 words) + end with ONE short question. " +
      "No emojis. Avoid the '*' character. Do not repeat yourself.",
  ].join("\n");
}

export function lessonSystemPrompt(assistantName: string, lesson: LessonContext): string {
  return [
    `You are ${assistantName} teaching ${lesson.studentName} (Level: ${lesson.studentLevel}).`,
    `Current Lesson: ${lesson.lessonTitle}`,
    `Objective: ${lesson.lessonObjective}`,
    "Rules (MANDATORY):",
    "- BASE ANSWERS ONLY on lesson content the user is studying now. If not present, say: " +
      '"The lesson text doesn\'t say yet." and ask a tiny guiding question.',
    "- 1-2 sentences MAX (at most 40 words total) + end with ONE short question.",
    "- NO emojis. NO asterisks '*'.",
    "- Do NOT start with phrases like 'In this lesson,' 'We will learn,' or repeat prior lines.",
    "- Avoid repeating yourself or re-stating the same example.",
  ].join("\n");
}

/**
 * PromptManager
 *
 * Centralizes how a ConversationTurn is built so persona and lesson rules can evolve without touching
 * the orchestrator.
 */
export class PromptManager {
  constructor(private readonly cfg: PromptManagerConfig) {}

  buildTurn(userMessage: string, snapshot: SessionMemorySnapshot, lesson?: LessonContext): ConversationTurn {
    const system = lesson
      ? lessonSystemPrompt(this.cfg.assistantName, lesson)
      : this.cfg.systemPrompt ?? generalSystemPrompt(this.cfg.assistantName);
    const recent = this.cfg.historyMessages > 0 ? snapshot.turns.slice(-this.cfg.historyMessages) : [];
    const priorHistory: Message[] = recent
      .filter((t) => !(t.role === "assistant" && STALE_OPENERS.some((p) => t.content.toLowerCase().startsWith(p))))
      .map((t) => Object.freeze({ role: t.role, content: t.content }));
    return Object.freeze({
      systemMessages: Object.freeze([system]),
      priorHistory: Object.freeze(priorHistory),
      userMessage: userMessage.trim(),
    });
  }
}
