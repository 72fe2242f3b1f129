/**
 * ASR (Automatic Speech Recognition) adapter types.
 * Implementations can be swapped via config (local Whisper worker, OpenAI Whisper, stub).
 */

export interface TranscriptResult {
  /** Transcribed text. */
  text: string;
  /** Optional language code. */
  language?: string;
  /** Audio duration the transcript covers, when the engine reports it. */
  durationMs?: number;
}

/**
 * ASR adapter interface: one finished utterance in, transcript out.
 */
export interface IASR {
  /**
   * @param audioBuffer - WAV bytes, or raw PCM16 mono when format is "pcm16".
   * @param format - "wav" (default) or "pcm16".
   */
  transcribe(audioBuffer: Buffer, format?: string): Promise<TranscriptResult>;
  /** Release worker processes. */
  close?(): Promise<void>;
}
