/**
 * Face-tracking control. The tracker loop itself is an external program (TRACKER_CMD) that owns the
 * camera while it runs; pausing stops it so the camera is released for anything else.
 * `track_on` / `track_off` go to the head once per transition.
 */

import { spawn } from "child_process";
import type { ChildHandle } from "../audio/child";
import type { IGestureActuator } from "../actuator/types";
import { logger } from "../logging";
import type { Resource } from "../resource";

export interface IFaceTracker extends Resource {
  pause(): void;
  resume(): void;
  readonly isPaused: boolean;
}

export interface FaceTrackerConfig {
  /** Shell command for the tracker loop; unset = head-side tracking only. */
  command?: string;
}

export type TrackerSpawnFn = (command: string) => ChildHandle;

const defaultSpawn: TrackerSpawnFn = (command) => spawn(command, { shell: true, stdio: "ignore" });

export class FaceTrackerController implements IFaceTracker {
  private child: ChildHandle | null = null;
  private paused = true;
  private trackOnSent = false;

  constructor(
    private readonly actuator: IGestureActuator,
    private readonly config: FaceTrackerConfig = {},
    private readonly spawnFn: TrackerSpawnFn = defaultSpawn
  ) {}

  get isPaused(): boolean {
    return this.paused;
  }

  async start(): Promise<void> {
    this.resume();
  }

  pause(): void {
    if (this.paused) return;
    this.paused = true;
    if (this.trackOnSent) {
      this.actuator.send("track_off");
      this.trackOnSent = false;
    }
    this.stopProcess();
    logger.debug({ event: "TRACKER_PAUSED" }, "Face tracking paused");
  }

  resume(): void {
    if (!this.paused) return;
    this.paused = false;
    this.startProcess();
    if (!this.trackOnSent) {
      this.actuator.send("track_on");
      this.trackOnSent = true;
    }
    logger.debug({ event: "TRACKER_RESUMED" }, "Face tracking resumed");
  }

  async close(): Promise<void> {
    this.pause();
  }

  private startProcess(): void {
    const command = this.config.command;
    if (!command || this.child) return;
    const child = this.spawnFn(command);
    child.on("error", (err: Error) => logger.warn({ event: "TRACKER_SPAWN_FAILED", err: err.message }, "Face tracker failed to start"));
    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      if (this.child === child) this.child = null;
      logger.debug({ event: "TRACKER_EXIT", code, signal }, "Face tracker exited");
    });
    this.child = child;
  }

  private stopProcess(): void {
    const child = this.child;
    this.child = null;
    if (child && child.exitCode === null) child.kill("SIGTERM");
  }
}
