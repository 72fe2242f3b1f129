/**
 * Microphone frame source: a capture program (arecord by default) writes raw PCM to stdout and we
 * re-frame it into fixed-size frames for the recorder.
 */

import { DeviceError } from "../errors";
import { logger } from "../logging";
import { spawnPiped, type PipedChild, type SpawnFn } from "./child";
import { frameSizeBytes } from "./pcm";

export type FrameHandler = (frame: Buffer) => void;
export type FrameErrorHandler = (err: Error) => void;

export interface AudioFrameSource {
  readonly sampleRate: number;
  readonly frameMs: number;
  /** Begin delivering frames. Rejects with DeviceError if the device cannot open. */
  start(onFrame: FrameHandler, onError: FrameErrorHandler): Promise<void>;
  /** Stop delivery and release the device. Safe to call when not started. */
  stop(): Promise<void>;
}

export interface MicrophoneConfig {
  sampleRate: number;
  frameMs: number;
  device?: string;
  command?: string;
}

/** Accumulates arbitrary byte chunks and hands out whole frames. */
export class FrameAssembler {
  private pending: Buffer = Buffer.alloc(0);

  constructor(private readonly frameBytes: number) {}

  push(chunk: Buffer, onFrame: FrameHandler): void {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    let offset = 0;
    while (offset + this.frameBytes <= this.pending.length) {
      onFrame(this.pending.subarray(offset, offset + this.frameBytes));
      offset += this.frameBytes;
    }
    this.pending = Buffer.from(this.pending.subarray(offset));
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
  }
}

export class MicrophoneFrameSource implements AudioFrameSource {
  readonly sampleRate: number;
  readonly frameMs: number;
  private child: PipedChild | null = null;
  private readonly assembler: FrameAssembler;

  constructor(private readonly config: MicrophoneConfig, private readonly spawnFn: SpawnFn = spawnPiped) {
    this.sampleRate = config.sampleRate;
    this.frameMs = config.frameMs;
    this.assembler = new FrameAssembler(frameSizeBytes(config.sampleRate, config.frameMs));
  }

  async start(onFrame: FrameHandler, onError: FrameErrorHandler): Promise<void> {
    if (this.child) throw new DeviceError("Capture already running", this.deviceLabel());
    const command = this.config.command ?? "arecord";
    const args = ["-q", "-f", "S16_LE", "-r", String(this.sampleRate), "-c", "1", "-t", "raw"];
    if (this.config.device) args.push("-D", this.config.device);

    this.assembler.reset();
    let child: PipedChild;
    try {
      child = this.spawnFn(command, args);
    } catch (err) {
      throw new DeviceError(`Cannot start ${command}`, this.deviceLabel(), { cause: err });
    }
    this.child = child;

    await new Promise<void>((resolve, reject) => {
      child.once("spawn", () => resolve());
      child.once("error", (err: Error) => {
        this.child = null;
        reject(new DeviceError(`Cannot open input device: ${err.message}`, this.deviceLabel(), { cause: err }));
      });
    });

    logger.debug({ event: "CAPTURE_START", command, device: this.deviceLabel() }, "Microphone capture started");
    child.stdout.on("data", (chunk: Buffer) => this.assembler.push(chunk, onFrame));
    child.stderr.on("data", (buf: Buffer) => {
      const msg = buf.toString("utf8").trim();
      if (msg) logger.warn({ event: "CAPTURE_STDERR", msg }, "Capture program stderr");
    });
    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      if (this.child !== child) return;
      this.child = null;
      onError(new DeviceError(`Capture exited unexpectedly (code=${code}, signal=${signal})`, this.deviceLabel()));
    });
  }

  async stop(): Promise<void> {
    const child = this.child;
    if (!child) return;
    this.child = null;
    child.stdout.removeAllListeners("data");
    if (child.exitCode === null) child.kill("SIGTERM");
    logger.debug({ event: "CAPTURE_STOP" }, "Microphone capture stopped");
  }

  private deviceLabel(): string {
    return this.config.device ?? "default";
  }
}
