/**
 * Per-turn latency metrics.
 * One TURN_METRICS line per turn; the last record is kept for /stats.
 */

import { logger } from "../logging";

export type TurnOutcome = "completed" | "no_speech" | "empty_transcript" | "quick_reply" | "failed";

/** Last turn timing (ms). */
export interface TurnMetrics {
  turnId: string;
  source: "voice" | "typed";
  outcome: TurnOutcome;
  recordMs?: number;
  sttLatencyMs?: number;
  /** Race start to the winning first fragment. */
  firstTokenMs?: number;
  /** Turn start to the first chunk handed to the synthesizer (primary KPI). */
  firstChunkMs?: number;
  /** Sentinel to drained playback. */
  drainWaitMs?: number;
  totalMs?: number;
  winner?: string | null;
  responseChars?: number;
}

let lastTurnMetrics: TurnMetrics | null = null;

export function recordTurnMetrics(metrics: TurnMetrics): void {
  lastTurnMetrics = { ...metrics };
  logger.info(
    {
      event: "TURN_METRICS",
      turn_id: metrics.turnId,
      source: metrics.source,
      outcome: metrics.outcome,
      record_ms: metrics.recordMs,
      stt_latency_ms: metrics.sttLatencyMs,
      first_token_ms: metrics.firstTokenMs,
      first_chunk_ms: metrics.firstChunkMs,
      drain_wait_ms: metrics.drainWaitMs,
      total_ms: metrics.totalMs,
      winner: metrics.winner,
      response_chars: metrics.responseChars,
    },
    "Turn latency"
  );
}

export function getLastTurnMetrics(): TurnMetrics | null {
  return lastTurnMetrics ? { ...lastTurnMetrics } : null;
}
