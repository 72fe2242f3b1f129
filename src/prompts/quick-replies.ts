/**
 * Canned answers for typed small talk, answered without a completion call.
 * Matching is on whole words, so "this" does not count as "hi".
 */

export interface QuickReplyOptions {
  now?: () => Date;
  /** Returns an index in [0, n). */
  pick?: (n: number) => number;
}

const GREETINGS = [
  "Hello there! How can I help you today?",
  "Hi! What would you like to know?",
  "Greetings! What's on your mind?",
];

function hasPhrase(text: string, phrases: readonly string[]): boolean {
  return phrases.some((p) => new RegExp(`\\b${p.replace(/[.*+?^${}()|[\]\\']/g, "\\$&")}\\b`).test(text));
}

const pad = (n: number) => String(n).padStart(2, "0");

export class QuickReplies {
  private readonly now: () => Date;
  private readonly pick: (n: number) => number;

  constructor(opts: QuickReplyOptions = {}) {
    this.now = opts.now ?? (() => new Date());
    this.pick = opts.pick ?? ((n) => Math.floor(Math.random() * n));
  }

  /** Reply for a typed message, or null when it should go to the completion backends. */
  match(message: string): string | null {
    const text = message.trim().toLowerCase();
    if (!text) return null;
    if (hasPhrase(text, ["hello", "hi", "hey"])) return GREETINGS[this.pick(GREETINGS.length)];
    if (hasPhrase(text, ["how are you", "how's it going"])) return "I'm doing well and ready to help! How are you?";
    if (hasPhrase(text, ["bye", "goodbye", "see you"])) return "Goodbye! Feel free to come back if you have more questions.";
    const d = this.now();
    if (hasPhrase(text, ["time"])) return `The current time is ${pad(d.getHours())}:${pad(d.getMinutes())}.`;
    if (hasPhrase(text, ["date"])) return `Today's date is ${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}.`;
    return null;
  }
}
