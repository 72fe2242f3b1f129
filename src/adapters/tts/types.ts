/**
 * Speech synthesizer contract. Implementations can be swapped via config (Piper, Google Cloud, stub).
 *
 * feed() writes one chunk; the synthesizer owns its audio sink and reports playback drain through
 * drainedSince() so callers can tell "audio finished" apart from "no more text queued".
 */

import type { TextChunk } from "../../pipeline/chunking-flusher";
import type { Resource } from "../../resource";

export interface ISpeechSynthesizer extends Resource {
  readonly sampleRate: number;
  /** Rejects with SynthesisPipeError when the engine cannot take the chunk. */
  feed(chunk: TextChunk): Promise<void>;
  /** ms since the last audio finished playing; 0 while audio is pending, Infinity before any feed. */
  drainedSince(): number;
  /** Asynchronous failure since the last call (engine died with text pending); cleared on read. */
  takeFailure(): Error | null;
}

/** Text worth sending to an engine: at least one letter or digit. */
export function isSpeakable(text: string): boolean {
  return /[\p{L}\p{N}]/u.test(text);
}
