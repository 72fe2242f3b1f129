import { AplaySink, PlaybackClock } from "../../../src/audio/output-sink";
import { DeviceError } from "../../../src/errors";
import { fakeSpawner } from "../../helpers/fake-child";

describe("PlaybackClock", () => {
  it("is Infinity before anything was fed", () => {
    expect(new PlaybackClock(16000, () => 0).drainedSince()).toBe(Infinity);
  });

  it("is 0 while fed text has produced no audio yet", () => {
    const clock = new PlaybackClock(16000, () => 1000);
    clock.noteFed();
    expect(clock.drainedSince()).toBe(0);
  });

  it("counts from the estimated end of playback", () => {
    let t = 1000;
    const clock = new PlaybackClock(16000, () => t);
    clock.noteFed();
    clock.noteAudio(32000); // 1 s of audio, ends at 2000
    expect(clock.drainedSince()).toBe(0);
    t = 1500;
    clock.noteAudio(16000); // queued behind the first: ends at 2500
    t = 2400;
    expect(clock.drainedSince()).toBe(0);
    t = 3100;
    expect(clock.drainedSince()).toBe(600);
  });

  it("returns to 0 when more text is fed", () => {
    let t = 0;
    const clock = new PlaybackClock(16000, () => t);
    clock.noteFed();
    clock.noteAudio(3200);
    t = 1000;
    expect(clock.drainedSince()).toBe(900);
    clock.noteFed();
    expect(clock.drainedSince()).toBe(0);
    clock.clearPending();
    expect(clock.drainedSince()).toBe(900);
  });

  it("hands a failure out once and stops waiting for audio", () => {
    const clock = new PlaybackClock(16000, () => 500);
    clock.noteFed();
    clock.markFailed(new Error("engine gone"));
    expect(clock.isAwaitingAudio).toBe(false);
    expect(clock.drainedSince()).toBe(500);
    expect(clock.takeFailure()?.message).toBe("engine gone");
    expect(clock.takeFailure()).toBeNull();
  });
});

describe("AplaySink", () => {
  it("pipes PCM into the playback program", async () => {
    const { spawn, children } = fakeSpawner();
    const sink = new AplaySink({ sampleRate: 22050 }, spawn);
    await sink.start();
    expect(children[0].command).toBe("aplay");
    expect(children[0].args).toEqual(["-q", "-r", "22050", "-f", "S16_LE", "-t", "raw", "-c", "1"]);

    const received: Buffer[] = [];
    children[0].stdin.removeAllListeners("data");
    children[0].stdin.on("data", (b: Buffer) => received.push(b));
    sink.write(Buffer.from([1, 2, 3, 4]));
    await new Promise((r) => setImmediate(r));
    expect(Buffer.concat(received)).toEqual(Buffer.from([1, 2, 3, 4]));

    await sink.close();
    expect(children[0].killSignals).toEqual(["SIGTERM"]);
  });

  it("drops audio when not running", () => {
    const sink = new AplaySink({ sampleRate: 22050 }, fakeSpawner().spawn);
    expect(() => sink.write(Buffer.alloc(10))).not.toThrow();
  });

  it("fails start with DeviceError", async () => {
    const { spawn } = fakeSpawner((c) => void c.failSoon("no audio device"));
    await expect(new AplaySink({ sampleRate: 22050 }, spawn).start()).rejects.toBeInstanceOf(DeviceError);
  });
});
