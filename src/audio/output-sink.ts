/**
 * Audio output: raw PCM into a playback program (aplay by default), plus the clock that estimates
 * when the queued audio will have finished playing.
 */

import { DeviceError } from "../errors";
import { logger } from "../logging";
import type { Resource } from "../resource";
import { spawnPiped, type PipedChild, type SpawnFn } from "./child";
import { pcmDurationMs } from "./pcm";

export interface AudioSink extends Resource {
  write(pcm: Buffer): void;
}


/**
 * Tracks audio handed to the device. `drainedSince()` is
 *   Infinity before anything was fed,
 *   0 while fed text has not produced audio yet or queued audio is still playing,
 *   otherwise ms since the estimated end of playback.
 */
export class PlaybackClock {
  private fed = false;
  private awaitingAudio = false;
  private playbackEndsAt = 0;
  private failure: Error | null = null;

  constructor(private readonly sampleRate: number, private readonly now: () => number = Date.now) {}

  noteFed(): void {
    this.fed = true;
    this.awaitingAudio = true;
  }

  noteAudio(byteLength: number): void {
    if (byteLength <= 0) return;
    const t = this.now();
    this.playbackEndsAt = Math.max(t, this.playbackEndsAt) + pcmDurationMs(byteLength, this.sampleRate);
    this.awaitingAudio = false;
  }

  /** Forget pending text, e.g. after the producing process died. */
  clearPending(): void {
    this.awaitingAudio = false;
  }

  /** Text was accepted but will never play; reported once through takeFailure(). */
  markFailed(err: Error): void {
    this.awaitingAudio = false;
    this.failure = err;
  }

  get isAwaitingAudio(): boolean {
    return this.awaitingAudio;
  }

  takeFailure(): Error | null {
    const err = this.failure;
    this.failure = null;
    return err;
  }

  drainedSince(): number {
    if (!this.fed) return Infinity;
    if (this.awaitingAudio) return 0;
    return Math.max(0, this.now() - this.playbackEndsAt);
  }
}

export interface AplaySinkConfig {
  sampleRate: number;
  command?: string;
}

export class AplaySink implements AudioSink {
  private child: PipedChild | null = null;

  constructor(private readonly config: AplaySinkConfig, private readonly spawnFn: SpawnFn = spawnPiped) {}

  async start(): Promise<void> {
    if (this.child) return;
    const command = this.config.command ?? "aplay";
    const args = ["-q", "-r", String(this.config.sampleRate), "-f", "S16_LE", "-t", "raw", "-c", "1"];
    const child = this.spawnFn(command, args);
    await new Promise<void>((resolve, reject) => {
      child.once("spawn", () => resolve());
      child.once("error", (err: Error) => reject(new DeviceError(`Cannot open output device: ${err.message}`, command, { cause: err })));
    });
    child.stdin.on("error", (err) => logger.warn({ event: "PLAYBACK_PIPE_ERROR", err: err.message }, "Playback pipe error"));
    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      if (this.child === child) this.child = null;
      logger.debug({ event: "PLAYBACK_EXIT", code, signal }, "Playback program exited");
    });
    this.child = child;
    logger.debug({ event: "PLAYBACK_START", command, sampleRate: this.config.sampleRate }, "Playback started");
  }

  write(pcm: Buffer): void {
    const child = this.child;
    if (!child || !child.stdin.writable) {
      logger.warn({ event: "PLAYBACK_DROPPED", bytes: pcm.length }, "Playback not running; audio dropped");
      return;
    }
    child.stdin.write(pcm);
  }

  async close(): Promise<void> {
    const child = this.child;
    if (!child) return;
    this.child = null;
    child.stdin.end();
    if (child.exitCode === null) child.kill("SIGTERM");
  }
}
