/**
 * The part of a spawned child process the device adapters touch. Real processes come from
 * child_process.spawn; tests hand in EventEmitter fakes with PassThrough pipes.
 */

import { spawn } from "child_process";
import type { EventEmitter } from "events";
import type { Readable, Writable } from "stream";

export interface ChildHandle extends EventEmitter {
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export interface PipedChild extends ChildHandle {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
}

export type SpawnFn = (command: string, args: string[]) => PipedChild;

export const spawnPiped: SpawnFn = (command, args) => spawn(command, args, { stdio: ["pipe", "pipe", "pipe"] });
