/**
 * Session memory types for the tutor.
 * Rolling transcript of recent user/assistant messages.
 */

export type MemoryRole = "user" | "assistant";

export interface MemoryTurn {
  role: MemoryRole;
  content: string;
  timestamp: number;
}

export interface SessionMemorySnapshot {
  /** Recent messages, oldest first. */
  turns: MemoryTurn[];
}

export interface ISessionMemory {
  /** Append a user or assistant message. */
  append(role: MemoryRole, content: string): void;

  /** Recent messages for completion context. */
  getSnapshot(): SessionMemorySnapshot;

  /** Clear all (e.g. new student session). */
  clear(): void;
}
