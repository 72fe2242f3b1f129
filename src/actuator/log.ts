import { logger } from "../logging";
import type { GestureCommand, IGestureActuator } from "./types";

/** Used when no serial port is configured: gestures only show up in the logs. */
export class LogGestureActuator implements IGestureActuator {
  async start(): Promise<void> {
    logger.info({ event: "ACTUATOR_LOG_ONLY" }, "No actuator port configured; gestures are logged only");
  }

  send(command: GestureCommand | string): void {
    logger.info({ event: "GESTURE_SENT", command, transport: "log" }, "Gesture");
  }

  async close(): Promise<void> {}
}
