/**
 * Google Cloud Text-to-Speech synthesizer using the official Node client and Application Default
 * Credentials (GOOGLE_APPLICATION_CREDENTIALS service account JSON).
 * Each chunk is synthesized to LINEAR16 and written to the sink in feed order.
 */

import { TextToSpeechClient } from "@google-cloud/text-to-speech";
import type { TextChunk } from "../../pipeline/chunking-flusher";
import { PlaybackClock, type AudioSink } from "../../audio/output-sink";
import { SynthesisPipeError } from "../../errors";
import { isSpeakable, type ISpeechSynthesizer } from "./types";
import { WriterLock } from "./piper";

export interface GoogleCloudSynthesizerConfig {
  voiceName: string;
  languageCode?: string;
  sampleRate?: number;
}

/** Minimal surface of TextToSpeechClient used here; tests pass a fake. */
export interface SynthesizeSpeechClient {
  synthesizeSpeech(request: {
    input: { text: string };
    voice: { name: string; languageCode: string };
    audioConfig: { audioEncoding: "LINEAR16"; sampleRateHertz: number };
  }): Promise<[{ audioContent?: Uint8Array | string | null }, ...unknown[]]>;
}

const WAV_HEADER_BYTES = 44;

/** LINEAR16 responses carry a WAV header; the sink wants bare PCM. */
export function stripWavHeader(audio: Buffer): Buffer {
  if (audio.length >= WAV_HEADER_BYTES && audio.subarray(0, 4).toString("ascii") === "RIFF") {
    return audio.subarray(WAV_HEADER_BYTES);
  }
  return audio;
}

export class GoogleCloudSynthesizer implements ISpeechSynthesizer {
  readonly sampleRate: number;
  private readonly lock = new WriterLock();
  private readonly clock: PlaybackClock;

  constructor(
    private readonly config: GoogleCloudSynthesizerConfig,
    private readonly sink: AudioSink,
    private readonly client: SynthesizeSpeechClient = new TextToSpeechClient(),
    now: () => number = Date.now
  ) {
    this.sampleRate = config.sampleRate ?? 24000;
    this.clock = new PlaybackClock(this.sampleRate, now);
  }

  async start(): Promise<void> {
    await this.sink.start();
  }

  feed(chunk: TextChunk): Promise<void> {
    const text = chunk.text.trim();
    if (!isSpeakable(text)) return Promise.resolve();
    this.clock.noteFed();
    return this.lock.run(async () => {
      let content: Uint8Array | string | null | undefined;
      try {
        const [response] = await this.client.synthesizeSpeech({
          input: { text },
          voice: { name: this.config.voiceName, languageCode: this.config.languageCode ?? "en-US" },
          audioConfig: { audioEncoding: "LINEAR16", sampleRateHertz: this.sampleRate },
        });
        content = response.audioContent;
      } catch (err) {
        this.clock.clearPending();
        throw new SynthesisPipeError("Google TTS request failed", { cause: err });
      }
      const pcm = stripWavHeader(typeof content === "string" ? Buffer.from(content, "base64") : Buffer.from(content ?? []));
      if (pcm.length === 0) {
        this.clock.clearPending();
        return;
      }
      this.sink.write(pcm);
      this.clock.noteAudio(pcm.length);
    });
  }

  drainedSince(): number {
    return this.clock.drainedSince();
  }

  takeFailure(): Error | null {
    return this.clock.takeFailure();
  }

  async close(): Promise<void> {
    await this.sink.close();
  }
}
