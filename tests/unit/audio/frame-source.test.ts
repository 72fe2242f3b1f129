import { FrameAssembler, MicrophoneFrameSource } from "../../../src/audio/frame-source";
import { DeviceError } from "../../../src/errors";
import { fakeSpawner } from "../../helpers/fake-child";

describe("FrameAssembler", () => {
  it("re-frames arbitrary chunk sizes", () => {
    const frames: number[][] = [];
    const assembler = new FrameAssembler(4);
    const onFrame = (f: Buffer) => frames.push([...f]);
    assembler.push(Buffer.from([1, 2, 3]), onFrame);
    assembler.push(Buffer.from([4, 5, 6, 7, 8, 9]), onFrame);
    assembler.push(Buffer.from([10]), onFrame);
    expect(frames).toEqual([
      [1, 2, 3, 4],
      [5, 6, 7, 8],
    ]);
    assembler.reset();
    assembler.push(Buffer.from([11, 12, 13, 14]), onFrame);
    expect(frames[2]).toEqual([11, 12, 13, 14]);
  });
});

describe("MicrophoneFrameSource", () => {
  it("spawns the capture program with the configured rate and device", async () => {
    const { spawn, children } = fakeSpawner();
    const source = new MicrophoneFrameSource({ sampleRate: 16000, frameMs: 10, device: "hw:1,0" }, spawn);
    await source.start(() => undefined, () => undefined);
    expect(children[0].command).toBe("arecord");
    expect(children[0].args).toEqual(["-q", "-f", "S16_LE", "-r", "16000", "-c", "1", "-t", "raw", "-D", "hw:1,0"]);
    await source.stop();
    expect(children[0].killSignals).toEqual(["SIGTERM"]);
  });

  it("delivers whole frames from stdout", async () => {
    const { spawn, children } = fakeSpawner();
    const source = new MicrophoneFrameSource({ sampleRate: 16000, frameMs: 10 }, spawn);
    const sizes: number[] = [];
    await source.start((f) => sizes.push(f.length), () => undefined);
    children[0].stdout.write(Buffer.alloc(500));
    children[0].stdout.write(Buffer.alloc(500));
    await new Promise((r) => setImmediate(r));
    expect(sizes).toEqual([320, 320, 320]);
    await source.stop();
  });

  it("rejects with DeviceError when the program cannot start", async () => {
    const { spawn } = fakeSpawner((c) => void c.failSoon("spawn arecord ENOENT"));
    const source = new MicrophoneFrameSource({ sampleRate: 16000, frameMs: 10 }, spawn);
    await expect(source.start(() => undefined, () => undefined)).rejects.toBeInstanceOf(DeviceError);
  });

  it("reports an unexpected exit through onError", async () => {
    const { spawn, children } = fakeSpawner();
    const source = new MicrophoneFrameSource({ sampleRate: 16000, frameMs: 10 }, spawn);
    const errors: Error[] = [];
    await source.start(() => undefined, (e) => errors.push(e));
    children[0].exit(1);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(DeviceError);
    expect(errors[0].message).toBe("Capture exited unexpectedly (code=1, signal=null)");
  });

  it("does not report its own stop as a failure", async () => {
    const { spawn } = fakeSpawner();
    const source = new MicrophoneFrameSource({ sampleRate: 16000, frameMs: 10 }, spawn);
    const errors: Error[] = [];
    await source.start(() => undefined, (e) => errors.push(e));
    await source.stop();
    expect(errors).toEqual([]);
  });
});
