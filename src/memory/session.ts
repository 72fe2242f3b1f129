/**
 * In-memory session buffer: rolling transcript capped at a message count.
 */

import type { MemoryRole, MemoryTurn, SessionMemorySnapshot, ISessionMemory } from "./types";

export interface SessionMemoryConfig {
  /** Max number of recent messages to keep (user and assistant each count as one). */
  maxMessages: number;
  now?: () => number;
}

export class SessionMemory implements ISessionMemory {
  private turns: MemoryTurn[] = [];
  private readonly maxMessages: number;
  private readonly now: () => number;

  constructor(config: SessionMemoryConfig) {
    this.maxMessages = config.maxMessages;
    this.now = config.now ?? Date.now;
  }

  append(role: MemoryRole, content: string): void {
    if (!content.trim()) return;
    this.turns.push({ role, content: content.trim(), timestamp: this.now() });
    while (this.turns.length > this.maxMessages) {
      this.turns.shift();
    }
  }

  getSnapshot(): SessionMemorySnapshot {
    return { turns: [...this.turns] };
  }

  clear(): void {
    this.turns = [];
  }
}
