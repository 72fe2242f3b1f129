/**
 * OpenAI Whisper API ASR adapter.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import OpenAI from "openai";
import { SttError, toError } from "../../errors";
import { logger } from "../../logging";
import type { IASR, TranscriptResult } from "./types";

export interface OpenAIWhisperConfig {
  apiKey: string;
  model?: string;
}

export class OpenAIWhisperASR implements IASR {
  private client: OpenAI;

  constructor(private readonly config: OpenAIWhisperConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
  }

  async transcribe(audioBuffer: Buffer, format: string = "wav"): Promise<TranscriptResult> {
    const ext = format === "webm" ? "webm" : "wav";
    const tmpPath = path.join(os.tmpdir(), `whisper-${process.pid}-${Date.now()}.${ext}`);
    try {
      await fs.promises.writeFile(tmpPath, audioBuffer);
      const transcription = await this.client.audio.transcriptions.create({
        file: fs.createReadStream(tmpPath),
        model: this.config.model ?? "whisper-1",
        response_format: "verbose_json",
      });
      const seconds = Number(transcription.duration);
      return {
        text: transcription.text ?? "",
        language: transcription.language,
        durationMs: Number.isFinite(seconds) ? seconds * 1000 : undefined,
      };
    } catch (err) {
      throw new SttError(`OpenAI transcription failed: ${toError(err).message}`, { cause: err });
    } finally {
      await fs.promises.unlink(tmpPath).catch((err: unknown) =>
        logger.debug({ event: "WHISPER_TMP_CLEANUP_FAILED", err: toError(err).message }, "Temp file cleanup failed")
      );
    }
  }
}
