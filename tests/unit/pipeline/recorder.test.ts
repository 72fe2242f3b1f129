/**
 * Unit tests for the voice-activity recorder, driven by a scripted frame source.
 */

import type { AudioFrameSource, FrameErrorHandler, FrameHandler } from "../../../src/audio/frame-source";
import { constantFrame } from "../../../src/audio/pcm";
import type { RecorderConfig } from "../../../src/config";
import { DeviceError } from "../../../src/errors";
import { VoiceActivityRecorder } from "../../../src/pipeline/recorder";
import type { SpeechClassifier } from "../../../src/pipeline/vad";

class ScriptedSource implements AudioFrameSource {
  readonly sampleRate = 16000;
  readonly frameMs = 10;
  onFrame: FrameHandler | null = null;
  onError: FrameErrorHandler | null = null;
  stops = 0;
  startError: Error | null = null;

  async start(onFrame: FrameHandler, onError: FrameErrorHandler): Promise<void> {
    if (this.startError) throw this.startError;
    this.onFrame = onFrame;
    this.onError = onError;
  }

  async stop(): Promise<void> {
    this.stops++;
  }

  push(value: number, count = 1): void {
    for (let i = 0; i < count; i++) this.onFrame?.(constantFrame(16000, 10, value));
  }
}

const config: RecorderConfig = {
  sampleRate: 16000,
  frameMs: 10,
  aggressiveness: 3,
  calibrationMs: 30,
  silenceMs: 30,
  maxRecordMs: 200,
  energyMargin: 2,
  energyMin: 100,
  energyMax: 6000,
};

const alwaysSpeech: SpeechClassifier = { kind: "energy", isSpeech: () => true };
const FRAME_BYTES = 320;

async function started(source: ScriptedSource): Promise<void> {
  // start() is awaited inside record(); let it settle.
  await Promise.resolve();
  await Promise.resolve();
  expect(source.onFrame).not.toBeNull();
}

describe("VoiceActivityRecorder.thresholdFor", () => {
  it("scales the upper median and clamps it", () => {
    const limits = { energyMargin: 2, energyMin: 2200, energyMax: 6000 };
    expect(VoiceActivityRecorder.thresholdFor([100, 5000, 200], limits)).toBe(2200);
    expect(VoiceActivityRecorder.thresholdFor([1500, 1600, 1400], limits)).toBe(3000);
    expect(VoiceActivityRecorder.thresholdFor([4000, 4000], limits)).toBe(6000);
  });
});

describe("VoiceActivityRecorder.record", () => {
  it("stops after trailing silence and keeps every frame", async () => {
    const source = new ScriptedSource();
    const recorder = new VoiceActivityRecorder(config, source, alwaysSpeech);
    const pending = recorder.record();
    await started(source);

    source.push(100, 3); // calibration: threshold = clamp(100 * 2) = 200
    source.push(1000, 5);
    source.push(0, 3);
    source.push(1000, 4); // after stop; ignored

    const utterance = await pending;
    expect(utterance.pcm.length).toBe(11 * FRAME_BYTES);
    expect(utterance.durationMs).toBe(110);
    expect(utterance.sampleRate).toBe(16000);
    expect(source.stops).toBe(1);
  });

  it("resets the silence count when speech returns", async () => {
    const source = new ScriptedSource();
    const pending = new VoiceActivityRecorder(config, source, alwaysSpeech).record();
    await started(source);

    source.push(100, 3);
    source.push(1000, 1);
    source.push(0, 2);
    source.push(1000, 1);
    source.push(0, 3);

    expect((await pending).pcm.length).toBe(10 * FRAME_BYTES);
  });

  it("returns empty audio when only background noise arrives", async () => {
    const source = new ScriptedSource();
    const pending = new VoiceActivityRecorder(config, source, alwaysSpeech).record();
    await started(source);

    source.push(100, 20); // max 200 ms = 20 frames; 100 never clears the 200 threshold
    const utterance = await pending;
    expect(utterance.pcm.length).toBe(0);
    expect(utterance.durationMs).toBe(0);
  });

  it("ignores loud frames the classifier rejects", async () => {
    const source = new ScriptedSource();
    const silent: SpeechClassifier = { kind: "energy", isSpeech: () => false };
    const pending = new VoiceActivityRecorder(config, source, silent).record();
    await started(source);

    source.push(100, 3);
    source.push(5000, 17);
    expect((await pending).pcm.length).toBe(0);
  });

  it("treats a classifier throw as silence", async () => {
    const source = new ScriptedSource();
    const broken: SpeechClassifier = {
      kind: "webrtcvad",
      isSpeech: () => {
        throw new Error("bad frame");
      },
    };
    const pending = new VoiceActivityRecorder(config, source, broken).record();
    await started(source);

    source.push(100, 3);
    source.push(5000, 17);
    expect((await pending).pcm.length).toBe(0);
  });

  it("stops at the frame cap even while speech continues", async () => {
    const source = new ScriptedSource();
    const pending = new VoiceActivityRecorder(config, source, alwaysSpeech).record();
    await started(source);

    source.push(100, 3);
    source.push(3000, 30);
    expect((await pending).pcm.length).toBe(20 * FRAME_BYTES);
  });

  it("skips short frames", async () => {
    const source = new ScriptedSource();
    const pending = new VoiceActivityRecorder(config, source, alwaysSpeech).record();
    await started(source);

    source.onFrame?.(Buffer.alloc(100));
    source.push(100, 3);
    source.push(1000, 1);
    source.push(0, 3);
    expect((await pending).pcm.length).toBe(7 * FRAME_BYTES);
  });

  it("rejects with DeviceError when the source cannot start", async () => {
    const source = new ScriptedSource();
    source.startError = new Error("no such device");
    await expect(new VoiceActivityRecorder(config, source, alwaysSpeech).record()).rejects.toBeInstanceOf(DeviceError);
  });

  it("rejects when the source reports a failure mid-recording", async () => {
    const source = new ScriptedSource();
    const pending = new VoiceActivityRecorder(config, source, alwaysSpeech).record();
    await started(source);

    source.onError?.(new DeviceError("capture exited", "default"));
    await expect(pending).rejects.toThrow("capture exited");
  });

  describe("wall clock", () => {
    beforeEach(() => jest.useFakeTimers());
    afterEach(() => jest.useRealTimers());

    it("stops at maxRecordMs when frames stop arriving", async () => {
      const source = new ScriptedSource();
      const pending = new VoiceActivityRecorder(config, source, alwaysSpeech).record();
      await started(source);
      source.push(100, 3);
      source.push(1000, 2);

      await jest.advanceTimersByTimeAsync(200);
      expect((await pending).pcm.length).toBe(5 * FRAME_BYTES);
    });
  });
});
