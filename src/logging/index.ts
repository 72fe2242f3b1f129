/**
 * Structured logging for the voice turn pipeline.
 * Logs recorder, STT, completion race, synthesizer, gesture and turn events. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL  - debug | info | warn | error | silent (default: info, silent under jest)
 *   LOG_FILE   - If set, append all logs to this path (creates dirs if needed). Useful on the head's
 *                board where the terminal is shared with the interactive prompt.
 */

import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function envLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  const match = LOG_LEVELS.find((l) => l === raw);
  if (match) return match;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

const defaultConfig: LoggerConfig = {
  level: envLevel(),
  pretty: process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test",
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true, destination: 2 } }),
    });
  } else {
    streams.push({ stream: process.stderr });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Log STT result (length only; transcripts can carry a student's name). */
export function logSttResult(log: pino.Logger, textLength: number, durationMs?: number): void {
  log.info({ event: "STT_RESULT", textLength, durationMs }, "STT completed");
}

/** Log a finished completion race. */
export function logCompletion(log: pino.Logger, winner: string | null, responseLength: number, durationMs?: number): void {
  log.info({ event: "LLM_COMPLETION", winner, responseLength, durationMs }, "Completion race finished");
}

/** Log turn start/end. */
export function logTurn(log: pino.Logger, phase: "start" | "end", turnId: string): void {
  log.info({ event: "TURN", phase, turnId }, phase === "start" ? "Turn start" : "Turn end");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, code: "code" in err ? err.code : undefined, stack: err.stack, ...context }, "Error");
}
