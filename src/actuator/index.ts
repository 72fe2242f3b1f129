import type { AppConfig } from "../config";
import { LogGestureActuator } from "./log";
import { SerialGestureActuator } from "./serial";
import type { IGestureActuator } from "./types";

export type { GestureCommand, IGestureActuator, ActuatorTimings } from "./types";
export { DEFAULT_ACTUATOR_TIMINGS, startupCommands } from "./types";
export { LogGestureActuator } from "./log";
export { SerialGestureActuator, SerialPortLink, rankPorts, autoPickPort } from "./serial";
export type { SerialLink } from "./serial";

export function createActuator(config: AppConfig): IGestureActuator {
  const { actuatorPort, actuatorBaud } = config.head;
  if (actuatorPort) return new SerialGestureActuator({ port: actuatorPort, baud: actuatorBaud });
  return new LogGestureActuator();
}
