/**
 * Local Whisper ASR adapter.
 *
 * Uses a long-lived Python worker running faster-whisper so the model stays loaded between turns.
 * - Node writes the utterance to a temp WAV file.
 * - The worker returns the transcript via JSONL over stdio.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import * as readline from "readline";
import type { IASR, TranscriptResult } from "./types";
import { spawnPiped, type PipedChild, type SpawnFn } from "../../audio/child";
import { pcmToWav } from "../../audio/pcm";
import { SttError, toError } from "../../errors";
import { logger } from "../../logging";

export interface WhisperLocalConfig {
  /** Whisper model name or path (e.g. tiny.en, base.en). */
  model: string;
  /** Optional python interpreter path (defaults to python3). */
  pythonPath?: string;
  /** Worker script; defaults to scripts/whisper_local_worker.py under the working directory. */
  scriptPath?: string;
  /** Sample rate assumed for "pcm16" input. */
  sampleRateHz?: number;
}

type WorkerMessage =
  | { kind: "ready"; model: string }
  | { kind: "result"; id: number; text: string; language?: string; durationMs?: number }
  | { kind: "error"; id: number; error: string };

function field(obj: object, key: string): unknown {
  return key in obj ? Reflect.get(obj, key) : undefined;
}

/** Parse one JSONL line from the worker; null when it is not a message we understand. */
export function parseWorkerLine(line: string): WorkerMessage | null {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof data !== "object" || data === null) return null;
  if (field(data, "event") === "READY") return { kind: "ready", model: String(field(data, "model") ?? "") };
  const id = field(data, "id");
  if (typeof id !== "number") return null;
  if (field(data, "ok") === false) {
    const error = field(data, "error");
    return { kind: "error", id, error: typeof error === "string" && error ? error : "Unknown worker error" };
  }
  const result = field(data, "result");
  if (typeof result !== "object" || result === null) return { kind: "result", id, text: "" };
  const text = field(result, "text");
  const language = field(result, "language");
  const duration = field(result, "duration");
  return {
    kind: "result",
    id,
    text: typeof text === "string" ? text.trim() : "",
    language: typeof language === "string" ? language : undefined,
    durationMs: typeof duration === "number" ? duration * 1000 : undefined,
  };
}

export class WhisperLocalASR implements IASR {
  private worker: PipedChild | null = null;
  private rl: readline.Interface | null = null;
  private nextId = 1;
  private readonly pending = new Map<number, { resolve: (r: TranscriptResult) => void; reject: (e: Error) => void }>();

  constructor(private readonly config: WhisperLocalConfig, private readonly spawnFn: SpawnFn = spawnPiped) {}

  /**
   * Supported formats:
   * - "wav" (default)
   * - "pcm16" (mono 16-bit little-endian at config.sampleRateHz, default 16 kHz)
   */
  async transcribe(audioBuffer: Buffer, format: string = "wav"): Promise<TranscriptResult> {
    const wav = this.normalizeToWav(audioBuffer, format);
    const tmpPath = path.join(os.tmpdir(), `whisper-local-${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2)}.wav`);
    try {
      await fs.promises.writeFile(tmpPath, wav);
      return await this.transcribeFile(tmpPath);
    } finally {
      await fs.promises.unlink(tmpPath).catch((err: unknown) =>
        logger.debug({ event: "WHISPER_LOCAL_TMP_CLEANUP_FAILED", err: toError(err).message }, "whisper-local: temp cleanup failed")
      );
    }
  }

  async close(): Promise<void> {
    this.stopWorker(new SttError("whisper-local worker closed"));
  }

  private normalizeToWav(audioBuffer: Buffer, format: string): Buffer {
    const fmt = (format || "wav").toLowerCase();
    if (fmt === "wav") return audioBuffer;
    if (fmt === "pcm16" || fmt === "pcm") return pcmToWav(audioBuffer, this.config.sampleRateHz ?? 16000);
    throw new SttError(`WhisperLocalASR: unsupported format '${format}'. Supported: wav | pcm16`);
  }

  private async transcribeFile(audioPath: string): Promise<TranscriptResult> {
    const worker = this.ensureWorker();
    const id = this.nextId++;
    const startedAt = Date.now();
    logger.debug({ event: "WHISPER_LOCAL_REQUEST", id, audioPath }, "whisper-local: sending transcribe request to worker");

    const p = new Promise<TranscriptResult>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
    });
    worker.stdin.write(JSON.stringify({ id, op: "transcribe", audioPath }) + "\n");

    try {
      const result = await p;
      logger.info(
        { event: "WHISPER_LOCAL_RESULT", id, textLength: result.text.length, durationMs: Date.now() - startedAt },
        "whisper-local: transcription completed"
      );
      return result;
    } catch (e) {
      logger.error({ event: "WHISPER_LOCAL_ERROR", id, err: toError(e).message }, "whisper-local: transcription failed");
      throw e;
    }
  }

  private ensureWorker(): PipedChild {
    if (this.worker && this.worker.exitCode === null) return this.worker;
    return this.startWorker();
  }

  private startWorker(): PipedChild {
    this.stopWorker(new SttError("whisper-local worker restarted"));

    const model = this.config.model.trim() || "tiny.en";
    const python = (this.config.pythonPath ?? "python3").trim();
    const scriptPath = this.config.scriptPath ?? path.resolve(process.cwd(), "scripts", "whisper_local_worker.py");
    if (!fs.existsSync(scriptPath)) {
      throw new SttError(`WhisperLocalASR: worker script not found at ${scriptPath}`);
    }

    logger.info({ event: "WHISPER_LOCAL_WORKER_START", python, model, scriptPath }, "whisper-local: starting worker");
    const child = this.spawnFn(python, [scriptPath, "--model", model]);
    this.worker = child;

    const failAll = (reason: string) => {
      for (const [id, pending] of this.pending.entries()) {
        pending.reject(new SttError(`${reason} (id=${id})`));
      }
      this.pending.clear();
    };

    child.on("error", (err: Error) => {
      logger.error({ event: "WHISPER_LOCAL_WORKER_SPAWN_FAILED", err: err.message }, "whisper-local: worker failed to start");
      if (this.worker === child) this.worker = null;
      failAll(`whisper-local worker failed to start: ${err.message}`);
    });

    child.on("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      logger.warn({ event: "WHISPER_LOCAL_WORKER_EXIT", code, signal }, "whisper-local: worker exited");
      if (this.worker !== child) return;
      failAll(`whisper-local worker exited (code=${code}, signal=${signal})`);
      this.worker = null;
      this.rl?.close();
      this.rl = null;
    });

    // EPIPE once the worker has gone away.
    child.stdin.on("error", (err: Error) => {
      logger.warn({ event: "WHISPER_LOCAL_WORKER_STDIN_ERROR", err: err.message }, "whisper-local: worker stdin error");
      if (this.worker !== child) return;
      failAll(`whisper-local worker stdin error: ${err.message}`);
      this.stopWorker(new SttError("whisper-local worker stdin closed"));
    });

    child.stderr.on("data", (buf: Buffer) => {
      const msg = buf.toString("utf8").trim();
      if (msg) logger.warn({ event: "WHISPER_LOCAL_WORKER_STDERR", msg }, "whisper-local: worker stderr");
    });

    const rl = readline.createInterface({ input: child.stdout });
    this.rl = rl;
    rl.on("line", (line) => this.handleLine(line));
    return child;
  }

  private handleLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) return;
    const msg = parseWorkerLine(trimmed);
    if (!msg) {
      logger.warn({ event: "WHISPER_LOCAL_WORKER_BAD_JSON", line: trimmed }, "whisper-local: could not parse worker JSON");
      return;
    }
    if (msg.kind === "ready") {
      logger.info({ event: "WHISPER_LOCAL_WORKER_READY", model: msg.model }, "whisper-local: worker ready");
      return;
    }
    const pending = this.pending.get(msg.id);
    if (!pending) {
      logger.debug({ event: "WHISPER_LOCAL_WORKER_UNMATCHED", id: msg.id }, "whisper-local: received response for unknown request id");
      return;
    }
    this.pending.delete(msg.id);
    if (msg.kind === "error") {
      pending.reject(new SttError(msg.error));
      return;
    }
    pending.resolve({ text: msg.text, language: msg.language, durationMs: msg.durationMs });
  }

  private stopWorker(reason: Error): void {
    for (const pending of this.pending.values()) pending.reject(reason);
    this.pending.clear();
    this.rl?.close();
    this.rl = null;
    const worker = this.worker;
    this.worker = null;
    if (worker && worker.exitCode === null) worker.kill();
  }
}
