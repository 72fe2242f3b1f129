/**
 * Turns a fragment stream into speakable chunks.
 * A fragment ending in . ? or ! flushes the buffer as sentence-final. Otherwise the buffer flushes
 * (non-final) once `maxWords` spaces have been seen or more than `maxIntervalMs` passed since the last
 * flush, so long unpunctuated spans still reach the synthesizer.
 */

export interface TextChunk {
  text: string;
  isSentenceFinal: boolean;
}

export interface ChunkingConfig {
  maxWords: number;
  maxIntervalMs: number;
}

const SENTENCE_END = /[.?!]$/;

/** Accumulates everything a turn said; committed to the display only after playback drains. */
export class FullReplyBuffer {
  private readonly parts: string[] = [];

  append(text: string): void {
    if (text) this.parts.push(text);
  }

  text(): string {
    return this.parts.join("").trim();
  }

  get isEmpty(): boolean {
    return this.text().length === 0;
  }
}

export class ChunkingFlusher {
  constructor(private readonly config: ChunkingConfig, private readonly now: () => number = Date.now) {}

  async *chunks(fragments: AsyncIterable<string>, reply?: FullReplyBuffer): AsyncGenerator<TextChunk, void, undefined> {
    let buffer = "";
    let words = 0;
    let lastFlush = this.now();

    const take = (isSentenceFinal: boolean): TextChunk | null => {
      const text = buffer.trim();
      buffer = "";
      words = 0;
      lastFlush = this.now();
      if (!text) return null;
      return { text, isSentenceFinal };
    };

    for await (const fragment of fragments) {
      if (!fragment) continue;
      reply?.append(fragment);
      buffer += fragment;
      words += fragment.split(" ").length - 1;

      let chunk: TextChunk | null = null;
      if (SENTENCE_END.test(fragment)) {
        chunk = take(true);
      } else if (words >= this.config.maxWords || this.now() - lastFlush > this.config.maxIntervalMs) {
        chunk = take(false);
      }
      if (chunk) yield chunk;
    }

    const rest = take(true);
    if (rest) yield rest;
  }
}
