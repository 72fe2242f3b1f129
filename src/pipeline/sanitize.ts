/**
 * Fragment cleanup for speakable output: the synthesizer reads glyphs and markdown emphasis aloud, and
 * some backends replay earlier tokens after a hiccup.
 */

const EMOJI_RE = /[\u{1F300}-\u{1F6FF}\u{1F900}-\u{1F9FF}\u{1FA70}-\u{1FAFF}\u{2700}-\u{27BF}]+/gu;

export function sanitizeFragment(text: string): string {
  if (!text) return text;
  return text.replace(EMOJI_RE, "").replace(/\*/g, "");
}

/**
 * Drops a fragment when it appears verbatim in the trailing window of text already let through.
 * Fragments shorter than `minChars` always pass: short tokens like "the " repeat legitimately.
 */
export class ReplayFilter {
  private emitted = "";

  constructor(private readonly windowChars: number, private readonly minChars: number) {}

  accept(fragment: string): boolean {
    if (!fragment) return false;
    if (this.windowChars > 0 && fragment.length >= this.minChars && this.emitted.slice(-this.windowChars).includes(fragment)) {
      return false;
    }
    this.emitted = (this.emitted + fragment).slice(-Math.max(this.windowChars, 1));
    return true;
  }
}
