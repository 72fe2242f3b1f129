/**
 * Head actuator: opaque newline-terminated command strings, no acknowledgement awaited.
 */

import type { Resource } from "../resource";

/** Commands the pipeline sends; the board accepts others (set_* tuning) as free text. */
export type GestureCommand = "listen_left" | "listen_right" | "think" | "talk" | "stop" | "park" | "track_off" | "track_on";

export interface IGestureActuator extends Resource {
  /** Fire-and-forget. Never throws; delivery failures are logged. */
  send(command: GestureCommand | string): void;
}

/** Duration settings pushed to the board at startup (ms). */
export interface ActuatorTimings {
  totalListenMs: number;
  returnMs: number;
  totalThinkMs: number;
}

export const DEFAULT_ACTUATOR_TIMINGS: ActuatorTimings = { totalListenMs: 6000, returnMs: 2500, totalThinkMs: 10000 };

export function startupCommands(t: ActuatorTimings): string[] {
  return [`set_total_listen ${t.totalListenMs}`, `set_return ${t.returnMs}`, `set_total_think ${t.totalThinkMs}`];
}
