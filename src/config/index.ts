/**
 * Env-based configuration for the voice turn pipeline.
 * Load from .env.local (or process.env). Do not commit secrets; API keys live in keys.json profiles.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";
import { ConfigError } from "../errors";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type AsrProvider = "whisper-local" | "openai" | "stub";
export type TtsProvider = "piper" | "google" | "stub";
export type CompletionKind = "openai" | "anthropic" | "stub";

export interface CompletionCandidateConfig {
  /** Label used in logs and as the key name inside a credential profile. */
  name: string;
  kind: CompletionKind;
  model: string;
}

export interface RecorderConfig {
  sampleRate: number;
  frameMs: number;
  /** webrtcvad mode 0-3 (3 = most aggressive at rejecting non-speech). */
  aggressiveness: number;
  silenceMs: number;
  maxRecordMs: number;
  energyMargin: number;
  energyMin: number;
  energyMax: number;
  calibrationMs: number;
}

export interface AppConfig {
  audio: {
    sampleRate: number;
    inputDevice?: string;
    captureCommand: string;
    playbackCommand: string;
  };

  recorder: RecorderConfig;

  /** STT (speech-to-text) provider and options */
  asr: {
    provider: AsrProvider;
    openaiApiKey?: string;
    whisperModel: string;
    whisperPythonPath?: string;
  };

  /** Completion race: candidates[0..1] race from the start, candidates[2] is the watchdog backup. */
  llm: {
    baseUrl: string;
    candidates: CompletionCandidateConfig[];
    apiKey?: string;
    anthropicApiKey?: string;
    keysFile: string;
    settingsFile: string;
    firstTokenTimeoutMs: number;
    maxTokens: number;
    temperature: number;
    requestTimeoutMs: number;
    dedupeWindowChars: number;
    dedupeMinChars: number;
    historyMessages: number;
    stop: string[];
  };

  chunking: {
    maxWords: number;
    maxIntervalMs: number;
  };

  /** TTS (text-to-speech) provider and drain detection */
  tts: {
    provider: TtsProvider;
    piperBin: string;
    piperVoice?: string;
    piperSampleRate?: number;
    piperSentenceSilence: number;
    googleVoiceName: string;
    drainHoldOffMs: number;
    drainPollMs: number;
  };

  /** Head actuator and face tracker */
  head: {
    actuatorPort?: string;
    actuatorBaud: number;
    stopGestureGapMs: number;
    trackerResumeDelayMs: number;
    trackerCommand?: string;
  };

  persona: {
    assistantName: string;
    systemPrompt?: string;
  };
}

type Env = Record<string, string | undefined>;

export const DEFAULT_CANDIDATES =
  "primary=openai/gpt-4o-mini,secondary=mistralai/mistral-7b-instruct,backup=meta-llama/llama-3.1-8b-instruct";

function getEnv(env: Env, key: string, defaultValue?: string): string | undefined {
  const v = env[key];
  if (v === undefined || v.trim() === "") return defaultValue;
  return v.trim();
}

/** Unset = default; set but unparsable = NaN, reported by validateConfig. */
function getNumber(env: Env, key: string, defaultValue: number): number {
  const v = getEnv(env, key);
  if (v === undefined) return defaultValue;
  return Number(v);
}

function getOptionalNumber(env: Env, key: string): number | undefined {
  const v = getEnv(env, key);
  return v === undefined ? undefined : Number(v);
}

function pick<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  return allowed.find((a) => a === value) ?? fallback;
}

/**
 * Parse `name=model` entries. A model prefixed with `anthropic:` uses the Anthropic SDK, `stub` a
 * scripted backend; everything else goes to the OpenAI-compatible endpoint.
 */
export function parseCandidates(raw: string): CompletionCandidateConfig[] {
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry, i): CompletionCandidateConfig => {
      const eq = entry.indexOf("=");
      const name = eq > 0 ? entry.slice(0, eq).trim() : `candidate-${i + 1}`;
      const model = eq > 0 ? entry.slice(eq + 1).trim() : entry;
      if (model.startsWith("anthropic:")) return { name, kind: "anthropic", model: model.slice("anthropic:".length) };
      if (model === "stub" || model.startsWith("stub:")) return { name, kind: "stub", model };
      return { name, kind: "openai", model };
    });
}

/**
 * Build config from environment variables and validate it.
 * ASR_PROVIDER and TTS_PROVIDER select adapters; LLM_CANDIDATES lists the raced backends.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const sampleRate = getNumber(env, "AUDIO_SAMPLE_RATE", 16000);
  const assistantName = getEnv(env, "ASSISTANT_NAME", "Lingo") ?? "Lingo";
  const stop = getEnv(env, "LLM_STOP");

  const config: AppConfig = {
    audio: {
      sampleRate,
      inputDevice: getEnv(env, "AUDIO_INPUT_DEVICE"),
      captureCommand: getEnv(env, "AUDIO_CAPTURE_CMD", "arecord") ?? "arecord",
      playbackCommand: getEnv(env, "AUDIO_PLAYBACK_CMD", "aplay") ?? "aplay",
    },
    recorder: {
      sampleRate,
      frameMs: getNumber(env, "VAD_FRAME_MS", 30),
      aggressiveness: getNumber(env, "VAD_AGGRESSIVENESS", 3),
      silenceMs: getNumber(env, "VAD_SILENCE_MS", 1200),
      maxRecordMs: getNumber(env, "VAD_MAX_RECORD_MS", 10_000),
      energyMargin: getNumber(env, "VAD_ENERGY_MARGIN", 2.0),
      energyMin: getNumber(env, "VAD_ENERGY_MIN", 2200),
      energyMax: getNumber(env, "VAD_ENERGY_MAX", 6000),
      calibrationMs: getNumber(env, "VAD_CALIBRATION_MS", 500),
    },
    asr: {
      provider: pick(getEnv(env, "ASR_PROVIDER"), ["whisper-local", "openai", "stub"] as const, "whisper-local"),
      openaiApiKey: getEnv(env, "OPENAI_API_KEY"),
      whisperModel: getEnv(env, "WHISPER_MODEL", "tiny.en") ?? "tiny.en",
      whisperPythonPath: getEnv(env, "WHISPER_PYTHON_PATH"),
    },
    llm: {
      baseUrl: getEnv(env, "LLM_BASE_URL", "https://openrouter.ai/api/v1") ?? "https://openrouter.ai/api/v1",
      candidates: parseCandidates(getEnv(env, "LLM_CANDIDATES", DEFAULT_CANDIDATES) ?? DEFAULT_CANDIDATES),
      apiKey: getEnv(env, "LLM_API_KEY"),
      anthropicApiKey: getEnv(env, "ANTHROPIC_API_KEY"),
      keysFile: getEnv(env, "LLM_KEYS_FILE", "keys.json") ?? "keys.json",
      settingsFile: getEnv(env, "LLM_SETTINGS_FILE", "settings.json") ?? "settings.json",
      firstTokenTimeoutMs: getNumber(env, "LLM_FIRST_TOKEN_TIMEOUT_MS", 6000),
      maxTokens: getNumber(env, "LLM_MAX_TOKENS", 48),
      temperature: getNumber(env, "LLM_TEMPERATURE", 0.4),
      requestTimeoutMs: getNumber(env, "LLM_REQUEST_TIMEOUT_MS", 20_000),
      dedupeWindowChars: getNumber(env, "LLM_DEDUPE_WINDOW_CHARS", 1024),
      dedupeMinChars: getNumber(env, "LLM_DEDUPE_MIN_CHARS", 12),
      historyMessages: getNumber(env, "LLM_HISTORY_MESSAGES", 4),
      // "|"-separated so the default paragraph break can be written as \n\n in .env files.
      stop: stop
        ? stop.split("|").map((s) => s.replace(/\\n/g, "\n")).filter(Boolean)
        : ["\n\n", "Question:", "Q:", `${assistantName}:`, "You:"],
    },
    chunking: {
      maxWords: getNumber(env, "CHUNK_MAX_WORDS", 10),
      maxIntervalMs: getNumber(env, "CHUNK_MAX_INTERVAL_MS", 900),
    },
    tts: {
      provider: pick(getEnv(env, "TTS_PROVIDER"), ["piper", "google", "stub"] as const, "piper"),
      piperBin: getEnv(env, "PIPER_BIN", "piper") ?? "piper",
      piperVoice: getEnv(env, "PIPER_VOICE"),
      piperSampleRate: getOptionalNumber(env, "PIPER_SAMPLE_RATE"),
      piperSentenceSilence: getNumber(env, "PIPER_SENTENCE_SILENCE", 0.25),
      googleVoiceName: getEnv(env, "GOOGLE_TTS_VOICE_NAME", "en-US-Neural2-D") ?? "en-US-Neural2-D",
      drainHoldOffMs: getNumber(env, "TTS_DRAIN_HOLDOFF_MS", 600),
      drainPollMs: getNumber(env, "TTS_DRAIN_POLL_MS", 40),
    },
    head: {
      actuatorPort: getEnv(env, "ACTUATOR_PORT"),
      actuatorBaud: getNumber(env, "ACTUATOR_BAUD", 115200),
      stopGestureGapMs: getNumber(env, "STOP_GESTURE_GAP_MS", 120),
      trackerResumeDelayMs: getNumber(env, "TRACKER_RESUME_DELAY_MS", 5000),
      trackerCommand: getEnv(env, "TRACKER_CMD"),
    },
    persona: {
      assistantName,
      systemPrompt: getEnv(env, "SYSTEM_PROMPT"),
    },
  };

  validateConfig(config);
  return config;
}

/** Throws ConfigError listing every problem found. */
export function validateConfig(config: AppConfig): void {
  const problems: string[] = [];
  const positive = (label: string, n: number) => {
    if (!Number.isFinite(n) || n <= 0) problems.push(`${label} must be a positive number (got ${n})`);
  };
  const nonNegative = (label: string, n: number) => {
    if (!Number.isFinite(n) || n < 0) problems.push(`${label} must be >= 0 (got ${n})`);
  };

  const r = config.recorder;
  if (![8000, 16000, 32000, 48000].includes(r.sampleRate)) {
    problems.push(`AUDIO_SAMPLE_RATE must be 8000, 16000, 32000 or 48000 (got ${r.sampleRate})`);
  }
  if (![10, 20, 30].includes(r.frameMs)) problems.push(`VAD_FRAME_MS must be 10, 20 or 30 (got ${r.frameMs})`);
  if (!Number.isInteger(r.aggressiveness) || r.aggressiveness < 0 || r.aggressiveness > 3) {
    problems.push(`VAD_AGGRESSIVENESS must be an integer 0-3 (got ${r.aggressiveness})`);
  }
  positive("VAD_SILENCE_MS", r.silenceMs);
  positive("VAD_MAX_RECORD_MS", r.maxRecordMs);
  positive("VAD_CALIBRATION_MS", r.calibrationMs);
  positive("VAD_ENERGY_MARGIN", r.energyMargin);
  nonNegative("VAD_ENERGY_MIN", r.energyMin);
  nonNegative("VAD_ENERGY_MAX", r.energyMax);
  if (r.energyMin > r.energyMax) problems.push(`VAD_ENERGY_MIN (${r.energyMin}) must not exceed VAD_ENERGY_MAX (${r.energyMax})`);
  if (r.calibrationMs >= r.maxRecordMs) problems.push("VAD_CALIBRATION_MS must be shorter than VAD_MAX_RECORD_MS");

  const l = config.llm;
  if (l.candidates.length < 2) problems.push(`LLM_CANDIDATES needs at least two entries (got ${l.candidates.length})`);
  const names = new Set(l.candidates.map((c) => c.name));
  if (names.size !== l.candidates.length) problems.push("LLM_CANDIDATES names must be unique");
  positive("LLM_FIRST_TOKEN_TIMEOUT_MS", l.firstTokenTimeoutMs);
  positive("LLM_REQUEST_TIMEOUT_MS", l.requestTimeoutMs);
  if (!Number.isInteger(l.maxTokens) || l.maxTokens <= 0) problems.push(`LLM_MAX_TOKENS must be a positive integer (got ${l.maxTokens})`);
  if (!Number.isFinite(l.temperature) || l.temperature < 0 || l.temperature > 2) {
    problems.push(`LLM_TEMPERATURE must be within 0-2 (got ${l.temperature})`);
  }
  nonNegative("LLM_DEDUPE_WINDOW_CHARS", l.dedupeWindowChars);
  positive("LLM_DEDUPE_MIN_CHARS", l.dedupeMinChars);
  nonNegative("LLM_HISTORY_MESSAGES", l.historyMessages);

  if (!Number.isInteger(config.chunking.maxWords) || config.chunking.maxWords < 1) {
    problems.push(`CHUNK_MAX_WORDS must be a positive integer (got ${config.chunking.maxWords})`);
  }
  positive("CHUNK_MAX_INTERVAL_MS", config.chunking.maxIntervalMs);

  const t = config.tts;
  if (t.provider === "piper" && !t.piperVoice) problems.push("PIPER_VOICE is required when TTS_PROVIDER=piper");
  if (t.piperSampleRate !== undefined) positive("PIPER_SAMPLE_RATE", t.piperSampleRate);
  nonNegative("PIPER_SENTENCE_SILENCE", t.piperSentenceSilence);
  positive("TTS_DRAIN_HOLDOFF_MS", t.drainHoldOffMs);
  positive("TTS_DRAIN_POLL_MS", t.drainPollMs);

  positive("ACTUATOR_BAUD", config.head.actuatorBaud);
  nonNegative("STOP_GESTURE_GAP_MS", config.head.stopGestureGapMs);
  nonNegative("TRACKER_RESUME_DELAY_MS", config.head.trackerResumeDelayMs);

  if (config.asr.provider === "openai" && !config.asr.openaiApiKey) {
    problems.push("OPENAI_API_KEY is required when ASR_PROVIDER=openai");
  }

  if (problems.length > 0) throw new ConfigError(problems);
}
