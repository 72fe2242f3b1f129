import { FaceTrackerController } from "../../../src/tracking/face-tracker";
import type { GestureCommand, IGestureActuator } from "../../../src/actuator";
import { FakeChild } from "../../helpers/fake-child";

class RecordingActuator implements IGestureActuator {
  readonly sent: string[] = [];
  async start(): Promise<void> {}
  send(command: GestureCommand | string): void {
    this.sent.push(command);
  }
  async close(): Promise<void> {}
}

function trackerSpawner() {
  const children: FakeChild[] = [];
  const spawn = (command: string) => {
    const child = new FakeChild(command, []);
    children.push(child);
    return child;
  };
  return { spawn, children };
}

describe("FaceTrackerController", () => {
  it("starts paused and sends track_on once on start", async () => {
    const actuator = new RecordingActuator();
    const tracker = new FaceTrackerController(actuator);
    expect(tracker.isPaused).toBe(true);
    await tracker.start();
    tracker.resume();
    expect(tracker.isPaused).toBe(false);
    expect(actuator.sent).toEqual(["track_on"]);
  });

  it("sends one track_off per pause and one track_on per resume", async () => {
    const actuator = new RecordingActuator();
    const tracker = new FaceTrackerController(actuator);
    await tracker.start();
    tracker.pause();
    tracker.pause();
    tracker.resume();
    expect(actuator.sent).toEqual(["track_on", "track_off", "track_on"]);
  });

  it("runs the tracker command only while resumed", async () => {
    const actuator = new RecordingActuator();
    const { spawn, children } = trackerSpawner();
    const tracker = new FaceTrackerController(actuator, { command: "python3 track.py" }, spawn);

    await tracker.start();
    expect(children.map((c) => c.command)).toEqual(["python3 track.py"]);

    tracker.pause();
    expect(children[0].killSignals).toEqual(["SIGTERM"]);

    tracker.resume();
    expect(children).toHaveLength(2);

    await tracker.close();
    expect(children[1].killSignals).toEqual(["SIGTERM"]);
    expect(actuator.sent).toEqual(["track_on", "track_off", "track_on", "track_off"]);
  });

  it("respawns after the tracker exits on its own", async () => {
    const { spawn, children } = trackerSpawner();
    const tracker = new FaceTrackerController(new RecordingActuator(), { command: "track" }, spawn);
    await tracker.start();
    children[0].exit(1);
    tracker.pause();
    expect(children[0].killSignals).toEqual([]);
    tracker.resume();
    expect(children).toHaveLength(2);
  });
});
