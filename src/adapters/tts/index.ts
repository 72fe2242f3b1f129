/**
 * Synthesizer factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import { AplaySink } from "../../audio/output-sink";
import type { ISpeechSynthesizer } from "./types";
import { StubSynthesizer } from "./stub";
import { GoogleCloudSynthesizer } from "./google-cloud";
import { PiperSynthesizer, resolvePiperSampleRate } from "./piper";

export type { ISpeechSynthesizer } from "./types";
export { isSpeakable } from "./types";
export { StubSynthesizer } from "./stub";
export { GoogleCloudSynthesizer } from "./google-cloud";
export { PiperSynthesizer, resolvePiperSampleRate, WriterLock } from "./piper";

const GOOGLE_SAMPLE_RATE = 24000;

export function createSynthesizer(config: AppConfig): ISpeechSynthesizer {
  const { provider, piperBin, piperVoice, piperSampleRate, piperSentenceSilence, googleVoiceName } = config.tts;
  const playbackCommand = config.audio.playbackCommand;
  if (provider === "piper" && piperVoice) {
    const sampleRate = resolvePiperSampleRate(piperVoice, piperSampleRate);
    return new PiperSynthesizer(
      { bin: piperBin, voice: piperVoice, sampleRate, sentenceSilence: piperSentenceSilence },
      new AplaySink({ sampleRate, command: playbackCommand })
    );
  }
  if (provider === "google") {
    return new GoogleCloudSynthesizer(
      { voiceName: googleVoiceName, sampleRate: GOOGLE_SAMPLE_RATE },
      new AplaySink({ sampleRate: GOOGLE_SAMPLE_RATE, command: playbackCommand })
    );
  }
  return new StubSynthesizer();
}
