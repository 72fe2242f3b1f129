/**
 * Serial head actuator (Arduino-class board over USB serial).
 *
 * Opening the port usually resets the board, so we wait for it to boot, drop DTR/RTS so later opens
 * do not reset it again, park the head twice and push the duration settings.
 */

import { SerialPort, ReadlineParser } from "serialport";
import { DeviceError, toError } from "../errors";
import { logger } from "../logging";
import { DEFAULT_ACTUATOR_TIMINGS, startupCommands, type ActuatorTimings, type GestureCommand, type IGestureActuator } from "./types";

/** Byte-level link to the board; the serialport implementation is below, tests pass a fake. */
export interface SerialLink {
  readonly path: string;
  open(): Promise<void>;
  write(line: string): Promise<void>;
  close(): Promise<void>;
  onLine(handler: (line: string) => void): void;
}

export interface SerialActuatorConfig {
  /** Device path, or "auto" to pick the first ACM/USB port. */
  port: string;
  baud: number;
  /** Wait after open for the board to finish resetting. */
  bootDelayMs?: number;
  /** Gap between the two startup park commands. */
  parkGapMs?: number;
  timings?: ActuatorTimings;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** ACM (official boards) first, then USB (CH340 clones), then by name. */
export function rankPorts(paths: readonly string[]): string[] {
  const rank = (p: string) => (p.includes("ACM") ? 0 : p.includes("USB") ? 1 : 2);
  return [...paths].sort((a, b) => rank(a) - rank(b) || a.localeCompare(b));
}

export async function autoPickPort(): Promise<string> {
  const ports = await SerialPort.list();
  const [first] = rankPorts(ports.map((p) => p.path));
  if (!first) throw new DeviceError("No serial ports found for the head actuator", "serial");
  return first;
}

export class SerialPortLink implements SerialLink {
  private readonly port: SerialPort;
  private readonly lineHandlers: Array<(line: string) => void> = [];

  constructor(readonly path: string, baudRate: number) {
    this.port = new SerialPort({ path, baudRate, autoOpen: false, rtscts: false });
    const parser = this.port.pipe(new ReadlineParser({ delimiter: "\n" }));
    parser.on("data", (line: string) => {
      for (const h of this.lineHandlers) h(line.replace(/\r$/, ""));
    });
    this.port.on("error", (err) => logger.warn({ event: "SERIAL_ERROR", path, err: err.message }, "Serial port error"));
  }

  open(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.open((err) => {
        if (err) {
          reject(new DeviceError(`Cannot open serial port ${this.path}: ${err.message}`, this.path, { cause: err }));
          return;
        }
        this.port.set({ dtr: false, rts: false }, (setErr) => {
          if (setErr) logger.debug({ event: "SERIAL_SET_FAILED", err: setErr.message }, "Could not clear DTR/RTS");
          resolve();
        });
      });
    });
  }

  write(line: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.port.isOpen) {
        reject(new DeviceError("Serial port not open", this.path));
        return;
      }
      this.port.write(line, (err) => (err ? reject(err) : resolve()));
    });
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.port.isOpen) {
        resolve();
        return;
      }
      this.port.close((err) => {
        if (err) logger.warn({ event: "SERIAL_CLOSE_FAILED", err: err.message }, "Serial close failed");
        resolve();
      });
    });
  }

  onLine(handler: (line: string) => void): void {
    this.lineHandlers.push(handler);
  }
}

export type SerialLinkFactory = (path: string, baud: number) => SerialLink;

export class SerialGestureActuator implements IGestureActuator {
  private link: SerialLink | null = null;

  constructor(
    private readonly config: SerialActuatorConfig,
    private readonly linkFactory: SerialLinkFactory = (path, baud) => new SerialPortLink(path, baud),
    private readonly resolvePort: () => Promise<string> = autoPickPort
  ) {}

  async start(): Promise<void> {
    const path = this.config.port === "auto" ? await this.resolvePort() : this.config.port;
    const link = this.linkFactory(path, this.config.baud);
    await link.open();
    link.onLine((line) => logger.debug({ event: "ACTUATOR_LINE", line }, "Head says"));
    this.link = link;
    logger.info({ event: "ACTUATOR_CONNECTED", path, baud: this.config.baud }, "Head actuator connected");

    await sleep(this.config.bootDelayMs ?? 1500);
    const gap = this.config.parkGapMs ?? 120;
    this.send("park");
    await sleep(gap);
    this.send("park");
    await sleep(gap);
    for (const cmd of startupCommands(this.config.timings ?? DEFAULT_ACTUATOR_TIMINGS)) this.send(cmd);
  }

  send(command: GestureCommand | string): void {
    const link = this.link;
    const line = command.trim();
    if (!link) {
      logger.warn({ event: "GESTURE_DROPPED", command: line }, "Actuator not connected; gesture dropped");
      return;
    }
    logger.info({ event: "GESTURE_SENT", command: line, transport: "serial" }, "Gesture");
    link.write(line + "\n").catch((err: unknown) =>
      logger.warn({ event: "GESTURE_SEND_FAILED", command: line, err: toError(err).message }, "Gesture write failed")
    );
  }

  async close(): Promise<void> {
    const link = this.link;
    this.link = null;
    if (link) await link.close();
  }
}
