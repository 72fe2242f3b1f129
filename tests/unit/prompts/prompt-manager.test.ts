/**
 * Unit tests for PromptManager.
 */

import { PromptManager, generalSystemPrompt, lessonSystemPrompt, type LessonContext } from "../../../src/prompts/prompt-manager";
import type { SessionMemorySnapshot } from "../../../src/memory/types";

const lesson: LessonContext = {
  studentName: "Sam",
  studentLevel: "beginner",
  lessonTitle: "Past tense",
  lessonObjective: "Use regular past-tense verbs",
};

function snapshot(...pairs: Array<["user" | "assistant", string]>): SessionMemorySnapshot {
  return { turns: pairs.map(([role, content], i) => ({ role, content, timestamp: i })) };
}

describe("PromptManager", () => {
  it("uses the general tutor prompt by default", () => {
    const pm = new PromptManager({ assistantName: "Lingo", historyMessages: 6 });
    const turn = pm.buildTurn("  What is a verb?  ", snapshot());
    expect(turn.systemMessages).toEqual([generalSystemPrompt("Lingo")]);
    expect(turn.systemMessages[0].startsWith("You are Lingo, a friendly AI English Teacher.")).toBe(true);
    expect(turn.priorHistory).toEqual([]);
    expect(turn.userMessage).toBe("What is a verb?");
  });

  it("prefers a configured system prompt outside lessons", () => {
    const pm = new PromptManager({ assistantName: "Lingo", systemPrompt: "Be brief.", historyMessages: 6 });
    expect(pm.buildTurn("hi", snapshot()).systemMessages).toEqual(["Be brief."]);
    expect(pm.buildTurn("hi", snapshot(), lesson).systemMessages).toEqual([lessonSystemPrompt("Lingo", lesson)]);
  });

  it("fills the lesson prompt from the lesson context", () => {
    const lines = lessonSystemPrompt("Lingo", lesson).split("\n");
    expect(lines.slice(0, 3)).toEqual([
      "You are Lingo teaching Sam (Level: beginner).",
      "Current Lesson: Past tense",
      "Objective: Use regular past-tense verbs",
    ]);
  });

  it("keeps only the most recent history messages", () => {
    const pm = new PromptManager({ assistantName: "Lingo", historyMessages: 2 });
    const turn = pm.buildTurn("next", snapshot(["user", "one"], ["assistant", "two"], ["user", "three"]));
    expect(turn.priorHistory).toEqual([
      { role: "assistant", content: "two" },
      { role: "user", content: "three" },
    ]);
  });

  it("carries no history when historyMessages is 0", () => {
    const pm = new PromptManager({ assistantName: "Lingo", historyMessages: 0 });
    expect(pm.buildTurn("next", snapshot(["user", "one"])).priorHistory).toEqual([]);
  });

  it("leaves out assistant replies that start with a stale opener", () => {
    const pm = new PromptManager({ assistantName: "Lingo", historyMessages: 10 });
    const turn = pm.buildTurn(
      "ok",
      snapshot(
        ["assistant", "In this lesson, we practise verbs."],
        ["user", "We will learn a lot"],
        ["assistant", "We will learn the past tense."],
        ["assistant", "Great job! What did you do yesterday?"]
      )
    );
    expect(turn.priorHistory).toEqual([
      { role: "user", content: "We will learn a lot" },
      { role: "assistant", content: "Great job! What did you do yesterday?" },
    ]);
  });

  it("returns a frozen turn", () => {
    const pm = new PromptManager({ assistantName: "Lingo", historyMessages: 4 });
    const turn = pm.buildTurn("hi", snapshot(["user", "a"]));
    expect(Object.isFrozen(turn)).toBe(true);
    expect(Object.isFrozen(turn.systemMessages)).toBe(true);
    expect(Object.isFrozen(turn.priorHistory)).toBe(true);
    expect(Object.isFrozen(turn.priorHistory[0])).toBe(true);
  });
});
