/**
 * Voice-activity classification for one PCM frame (mono 16-bit, 10/20/30 ms).
 * Uses webrtcvad (npm 1.0.1) when available; falls back to energy-based VAD if native module fails to load.
 * The recorder adds its own calibrated energy gate on top of whichever classifier is active.
 */

import { rmsInt16 } from "../audio/pcm";
import { logger } from "../logging";

/** RMS threshold for energy-based fallback (16-bit PCM): below = silence. */
export const FALLBACK_ENERGY_THRESHOLD = 500;

export interface SpeechClassifier {
  readonly kind: "webrtcvad" | "energy";
  /** May throw on malformed frames; callers treat a throw as non-speech. */
  isSpeech(frame: Buffer, sampleRateHz: number): boolean;
}

type VadMethod = (...args: unknown[]) => unknown;

function methodOf(target: unknown, key: string): VadMethod | null {
  if (typeof target !== "object" || target === null || !(key in target)) return null;
  const value: unknown = Reflect.get(target, key);
  return typeof value === "function" ? (...args: unknown[]) => Reflect.apply(value, target, args) : null;
}

function instantiate(mod: unknown): unknown {
  if (typeof mod === "function") return mod();
  const factory = methodOf(mod, "default");
  return factory ? factory() : mod;
}

function loadWebRtcVad(aggressiveness: number): SpeechClassifier | null {
  try {
    // eslint-disable-next-line @typescript-eslint/no-var-requires
    const vad = instantiate(require("webrtcvad"));
    const isVoice = methodOf(vad, "isVoice");
    if (!isVoice) return null;
    methodOf(vad, "setMode")?.(aggressiveness);
    return {
      kind: "webrtcvad",
      isSpeech: (frame, sampleRateHz) => isVoice(frame, sampleRateHz) === true,
    };
  } catch (err) {
    logger.warn(
      { event: "VAD_NATIVE_UNAVAILABLE", err: err instanceof Error ? err.message : String(err) },
      "webrtcvad failed to load; using energy classifier"
    );
    return null;
  }
}

/** Simple energy-based VAD: RMS above threshold = speech. */
export function energyClassifier(threshold = FALLBACK_ENERGY_THRESHOLD): SpeechClassifier {
  return {
    kind: "energy",
    isSpeech: (frame) => rmsInt16(frame) > threshold,
  };
}

export function createSpeechClassifier(aggressiveness: number): SpeechClassifier {
  const native = loadWebRtcVad(aggressiveness);
  const classifier = native ?? energyClassifier();
  logger.info({ event: "VAD_CLASSIFIER", kind: classifier.kind, aggressiveness }, "Voice-activity classifier ready");
  return classifier;
}
