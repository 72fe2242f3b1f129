/**
 * Persistent Piper synthesizer.
 *
 * One `piper --output-raw` process per session; chunks go in on stdin (newline = sentence end, space =
 * more text coming) and raw PCM comes out on stdout, which we pump into the audio sink. A broken pipe
 * restarts the process once and retries the write.
 */

import * as fs from "fs";
import * as path from "path";
import type { TextChunk } from "../../pipeline/chunking-flusher";
import { PlaybackClock, type AudioSink } from "../../audio/output-sink";
import { spawnPiped, type PipedChild, type SpawnFn } from "../../audio/child";
import { SynthesisPipeError, toError } from "../../errors";
import { logger } from "../../logging";
import { isSpeakable, type ISpeechSynthesizer } from "./types";

export const DEFAULT_PIPER_SAMPLE_RATE = 22050;

export interface PiperConfig {
  bin: string;
  voice: string;
  sampleRate?: number;
  sentenceSilence: number;
}

function sampleRateFrom(meta: unknown): number | undefined {
  if (typeof meta !== "object" || meta === null) return undefined;
  if ("sample_rate" in meta && Number.isInteger(meta.sample_rate)) return Number(meta.sample_rate);
  if ("audio" in meta && typeof meta.audio === "object" && meta.audio !== null && "sample_rate" in meta.audio) {
    const sr = meta.audio.sample_rate;
    if (Number.isInteger(sr)) return Number(sr);
  }
  return undefined;
}

/** Override, else the voice's .onnx.json / .json metadata, else 22050. */
export function resolvePiperSampleRate(voicePath: string, override?: number): number {
  if (override !== undefined) return override;
  const { dir, name } = path.parse(voicePath);
  for (const candidate of [`${voicePath}.json`, path.join(dir, `${name}.json`)]) {
    if (!fs.existsSync(candidate)) continue;
    try {
      const sr = sampleRateFrom(JSON.parse(fs.readFileSync(candidate, "utf8")));
      if (sr !== undefined) return sr;
    } catch (err) {
      logger.warn({ event: "PIPER_VOICE_META_INVALID", path: candidate, err: toError(err).message }, "Unreadable voice metadata");
    }
  }
  return DEFAULT_PIPER_SAMPLE_RATE;
}

/** Serializes async sections; a failed section does not block the next one. */
export class WriterLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

export class PiperSynthesizer implements ISpeechSynthesizer {
  readonly sampleRate: number;
  private child: PipedChild | null = null;
  private readonly lock = new WriterLock();
  private readonly clock: PlaybackClock;

  constructor(
    private readonly config: PiperConfig,
    private readonly sink: AudioSink,
    private readonly spawnFn: SpawnFn = spawnPiped,
    now: () => number = Date.now
  ) {
    this.sampleRate = resolvePiperSampleRate(config.voice, config.sampleRate);
    this.clock = new PlaybackClock(this.sampleRate, now);
  }

  async start(): Promise<void> {
    await this.sink.start();
    await this.spawnPiper();
  }

  feed(chunk: TextChunk): Promise<void> {
    const text = chunk.text.trim();
    if (!isSpeakable(text)) return Promise.resolve();
    const payload = text + (chunk.isSentenceFinal ? "\n" : " ");
    this.clock.noteFed();
    return this.lock.run(() => this.writeWithRestart(payload));
  }

  drainedSince(): number {
    return this.clock.drainedSince();
  }

  takeFailure(): Error | null {
    return this.clock.takeFailure();
  }

  async close(): Promise<void> {
    this.stopPiper();
    await this.sink.close();
  }

  private async writeWithRestart(payload: string): Promise<void> {
    try {
      await this.write(payload);
    } catch (err) {
      logger.warn({ event: "PIPER_RESTART", err: toError(err).message }, "Piper pipe broken; restarting once");
      try {
        this.stopPiper();
        await this.spawnPiper();
        await this.write(payload);
      } catch (retryErr) {
        this.clock.clearPending();
        throw new SynthesisPipeError("Piper pipe broken after restart", { cause: retryErr });
      }
    }
  }

  private write(payload: string): Promise<void> {
    const child = this.child;
    if (!child || child.exitCode !== null || child.signalCode !== null || child.stdin.destroyed || !child.stdin.writable) {
      return Promise.reject(new Error("Piper stdin is not writable"));
    }
    return new Promise<void>((resolve, reject) => {
      child.stdin.write(payload, "utf8", (err) => (err ? reject(err) : resolve()));
    });
  }

  private async spawnPiper(): Promise<void> {
    const args = ["--model", this.config.voice, "--output-raw", "--sentence_silence", String(this.config.sentenceSilence)];
    let child: PipedChild;
    try {
      child = this.spawnFn(this.config.bin, args);
    } catch (err) {
      throw new SynthesisPipeError(`Cannot start ${this.config.bin}`, { cause: err });
    }
    await new Promise<void>((resolve, reject) => {
      child.once("spawn", () => resolve());
      child.once("error", (err: Error) => reject(new SynthesisPipeError(`Cannot start ${this.config.bin}: ${err.message}`, { cause: err })));
    });

    child.stdin.on("error", (err) => logger.warn({ event: "PIPER_STDIN_ERROR", err: err.message }, "Piper stdin error"));
    child.stdout.on("data", (pcm: Buffer) => {
      if (pcm.length === 0) return;
      this.sink.write(pcm);
      this.clock.noteAudio(pcm.length);
    });
    child.stderr.on("data", (buf: Buffer) => {
      const msg = buf.toString("utf8").trim();
      if (msg) logger.debug({ event: "PIPER_STDERR", msg }, "piper stderr");
    });
    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      if (this.child !== child) return;
      this.child = null;
      logger.warn({ event: "PIPER_EXIT", code, signal, pending: this.clock.isAwaitingAudio }, "Piper exited");
      // Text it accepted but never voiced is lost; the next feed respawns the process.
      if (this.clock.isAwaitingAudio) {
        this.clock.markFailed(new SynthesisPipeError(`Piper exited with text pending (code=${code}, signal=${signal})`));
      }
    });
    this.child = child;
    logger.info({ event: "PIPER_START", voice: this.config.voice, sampleRate: this.sampleRate }, "Piper started");
  }

  private stopPiper(): void {
    const child = this.child;
    if (!child) return;
    this.child = null;
    child.stdout.removeAllListeners("data");
    if (!child.stdin.destroyed) child.stdin.end();
    if (child.exitCode === null) child.kill("SIGTERM");
  }
}
