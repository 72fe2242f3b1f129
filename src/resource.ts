/**
 * Lifecycle for long-lived collaborators (synthesizer process, STT worker, serial port, sinks).
 */

import type { Logger } from "pino";
import { toError } from "./errors";

export interface Resource {
  start(): Promise<void>;
  close(): Promise<void>;
}

/** Close in reverse order; a failing close is logged and the rest still run. */
export async function closeAll(resources: readonly Resource[], log: Logger): Promise<void> {
  for (const r of [...resources].reverse()) {
    try {
      await r.close();
    } catch (err) {
      log.warn({ event: "RESOURCE_CLOSE_FAILED", err: toError(err).message }, "Resource failed to close");
    }
  }
}
