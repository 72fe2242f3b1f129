/**
 * Silence-bounded utterance capture.
 *
 * The first calibration window only measures background RMS; the energy threshold is the upper median
 * of those samples times the margin, clamped to [energyMin, energyMax]. After that a frame counts as
 * speech only when the classifier says so AND its RMS clears the threshold. Trailing silence is counted
 * once voice has been heard; recording stops when it reaches silenceMs or the total reaches maxRecordMs.
 */

import type { RecorderConfig } from "../config";
import type { AudioFrameSource } from "../audio/frame-source";
import { frameSizeBytes, median, pcmDurationMs, rmsInt16 } from "../audio/pcm";
import { DeviceError, toError } from "../errors";
import { logger } from "../logging";
import type { SpeechClassifier } from "./vad";

export interface Utterance {
  sampleRate: number;
  channels: 1;
  /** Empty when no speech was detected. */
  pcm: Buffer;
  durationMs: number;
}

export interface CalibrationState {
  samplesCollected: number;
  rmsSamples: number[];
  energyThreshold: number | null;
}

export type RecordStopReason = "silence" | "max_duration" | "wall_clock";

export class VoiceActivityRecorder {
  private readonly frameBytes: number;
  private readonly calibrationFrames: number;
  private readonly silenceFramesNeeded: number;
  private readonly maxFrames: number;

  constructor(
    private readonly config: RecorderConfig,
    private readonly source: AudioFrameSource,
    private readonly classifier: SpeechClassifier
  ) {
    this.frameBytes = frameSizeBytes(config.sampleRate, config.frameMs);
    this.calibrationFrames = Math.max(1, Math.floor(config.calibrationMs / config.frameMs));
    this.silenceFramesNeeded = Math.max(1, Math.floor(config.silenceMs / config.frameMs));
    this.maxFrames = Math.floor(config.maxRecordMs / config.frameMs);
  }

  /** Threshold from calibration RMS samples. */
  static thresholdFor(rmsSamples: readonly number[], config: Pick<RecorderConfig, "energyMargin" | "energyMin" | "energyMax">): number {
    const base = median(rmsSamples);
    return Math.max(config.energyMin, Math.min(config.energyMax, base * config.energyMargin));
  }

  record(): Promise<Utterance> {
    const { sampleRate, frameMs } = this.config;
    const frames: Buffer[] = [];
    const calibration: CalibrationState = { samplesCollected: 0, rmsSamples: [], energyThreshold: null };
    let voiced = false;
    let trailing = 0;
    let total = 0;

    return new Promise<Utterance>((resolve, reject) => {
      let settled = false;

      const finish = (reason: RecordStopReason | Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(guard);
        const build = (): Utterance => {
          const pcm = voiced ? Buffer.concat(frames) : Buffer.alloc(0);
          frames.length = 0;
          return { sampleRate, channels: 1, pcm, durationMs: pcmDurationMs(pcm.length, sampleRate) };
        };
        const settle = (): void => {
          if (reason instanceof Error) {
            frames.length = 0;
            reject(reason);
            return;
          }
          const utterance = build();
          logger.info(
            { event: "RECORD_STOP", reason, frames: total, voiced, threshold: calibration.energyThreshold, durationMs: utterance.durationMs },
            "Recording stopped"
          );
          resolve(utterance);
        };
        this.source.stop().then(settle, (err: unknown) => {
          logger.warn({ event: "CAPTURE_STOP_FAILED", err: toError(err).message }, "Failed to stop capture cleanly");
          settle();
        });
      };

      const onFrame = (frame: Buffer): void => {
        if (settled || frame.length < this.frameBytes) return;
        frames.push(Buffer.from(frame));
        total++;
        const rms = rmsInt16(frame);

        if (calibration.energyThreshold === null) {
          calibration.rmsSamples.push(rms);
          calibration.samplesCollected++;
          if (calibration.samplesCollected >= this.calibrationFrames) {
            calibration.energyThreshold = VoiceActivityRecorder.thresholdFor(calibration.rmsSamples, this.config);
            logger.debug(
              { event: "VAD_CALIBRATED", floor: median(calibration.rmsSamples), threshold: calibration.energyThreshold },
              "Energy gate calibrated"
            );
          }
        } else {
          let speech = false;
          try {
            speech = this.classifier.isSpeech(frame, sampleRate) && rms >= calibration.energyThreshold;
          } catch (err) {
            logger.debug({ event: "VAD_CLASSIFY_FAILED", err: toError(err).message }, "Classifier threw; frame treated as silence");
          }
          if (speech) {
            voiced = true;
            trailing = 0;
          } else if (voiced) {
            trailing = Math.min(this.silenceFramesNeeded, trailing + 1);
          }
        }

        if (voiced && trailing >= this.silenceFramesNeeded) finish("silence");
        else if (total >= this.maxFrames) finish("max_duration");
      };

      const guard = setTimeout(() => finish("wall_clock"), this.config.maxRecordMs);

      logger.debug({ event: "RECORD_START", sampleRate, frameMs, classifier: this.classifier.kind }, "Recording started");
      this.source
        .start(onFrame, (err) => finish(err instanceof DeviceError ? err : new DeviceError(err.message, "input", { cause: err })))
        .catch((err: unknown) => {
          const e = toError(err);
          finish(e instanceof DeviceError ? e : new DeviceError(e.message, "input", { cause: e }));
        });
    });
  }
}
