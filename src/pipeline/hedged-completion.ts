/**
 * Hedged completion: race two backends, keep whichever emits first, cancel the rest.
 *
 * Candidates 0 and 1 start immediately. If no candidate has produced a fragment after
 * `firstTokenTimeoutMs`, candidate 2 (the backup) joins the race; it also joins as soon as both
 * primaries have finished without a winner. The winner is decided synchronously on the first
 * sanitized fragment any candidate receives, so at most one candidate's text is ever yielded.
 * Losers notice their abort signal on their next token and stop reading.
 */

import type { CompletionOptions, ConversationTurn, ICompletionBackend, Message } from "../adapters/llm/types";
import { toMessages } from "../adapters/llm/types";
import { BackendError, isQuotaOrAuthError, toError } from "../errors";
import { logger } from "../logging";
import { AsyncQueue } from "./async-queue";
import { ReplayFilter, sanitizeFragment } from "./sanitize";

export interface HedgedCompletionConfig {
  firstTokenTimeoutMs: number;
  maxTokens: number;
  temperature: number;
  stop: readonly string[];
  dedupeWindowChars: number;
  dedupeMinChars: number;
}

/** Where per-candidate API keys come from (ProfileStore in production). */
export interface CredentialSource {
  activeLabel(): string;
  keyFor(candidate: string): string | undefined;
}

export interface RaceSummary {
  winner: string | null;
  /** ms from race start to the winning fragment. */
  firstTokenMs: number | null;
  started: string[];
  quotaFailures: string[];
  failures: string[];
  advisory: boolean;
}

/** What the orchestrator needs from a completion source. */
export interface ICompletionClient {
  stream(turn: ConversationTurn): AsyncIterable<string>;
  readonly lastRace?: RaceSummary | null;
}

const BACKUP_INDEX = 2;

type RaceEvent = { kind: "fragment"; index: number; text: string } | { kind: "done"; index: number };

/** Shared per-request race state; only `claim` mutates `winner`. */
class ProviderRace {
  winner: number | null = null;
  firstTokenAt: number | null = null;
  readonly startedAt = Date.now();
  readonly started: number[] = [];
  readonly controllers: AbortController[];
  readonly quotaFailures: number[] = [];
  readonly failures: number[] = [];

  constructor(size: number) {
    this.controllers = Array.from({ length: size }, () => new AbortController());
  }

  /** True when `index` is (or just became) the winner. */
  claim(index: number): boolean {
    if (this.winner === null) {
      this.winner = index;
      this.firstTokenAt = Date.now();
      this.controllers.forEach((c, i) => {
        if (i !== index) c.abort();
      });
      return true;
    }
    return this.winner === index;
  }

  cancelAll(): void {
    for (const c of this.controllers) c.abort();
  }
}

export function quotaAdvisory(profileLabel: string): string {
  return (
    `[API Notice] The current account "${profileLabel}" appears to be rate-limited or out of quota. ` +
    "Please switch to another API profile, then try again."
  );
}

export class HedgedCompletionClient implements ICompletionClient {
  lastRace: RaceSummary | null = null;

  constructor(
    private readonly backends: readonly ICompletionBackend[],
    private readonly config: HedgedCompletionConfig,
    private readonly credentials?: CredentialSource
  ) {
    if (backends.length < 2) throw new Error("HedgedCompletionClient needs at least two backends");
  }

  async *stream(turn: ConversationTurn): AsyncGenerator<string, void, undefined> {
    const messages = toMessages(turn);
    const race = new ProviderRace(this.backends.length);
    const events = new AsyncQueue<RaceEvent>();
    const filter = new ReplayFilter(this.config.dedupeWindowChars, this.config.dedupeMinChars);
    let finished = 0;
    let advisory = false;

    const start = (index: number): void => {
      if (index >= this.backends.length || race.started.includes(index)) return;
      race.started.push(index);
      logger.debug({ event: "CANDIDATE_START", candidate: this.backends[index].name, index }, "Completion candidate started");
      void this.runCandidate(index, messages, race, events);
    };

    start(0);
    start(1);
    const watchdog = setTimeout(() => {
      if (race.winner !== null) return;
      logger.warn(
        { event: "FIRST_TOKEN_TIMEOUT", timeoutMs: this.config.firstTokenTimeoutMs },
        "No first token from primaries; starting backup candidate"
      );
      start(BACKUP_INDEX);
    }, this.config.firstTokenTimeoutMs);

    try {
      for await (const ev of events.iterate()) {
        if (ev.kind === "done") {
          finished++;
          // The winner finishing ends the race; losers notice their abort on their own.
          if (race.winner === ev.index) break;
          if (finished < race.started.length) continue;
          if (race.winner === null && !race.started.includes(BACKUP_INDEX) && this.backends.length > BACKUP_INDEX) {
            logger.warn({ event: "PRIMARIES_EXHAUSTED" }, "Both primary candidates finished without output; starting backup");
            start(BACKUP_INDEX);
            continue;
          }
          break;
        }
        if (!filter.accept(ev.text)) {
          logger.debug({ event: "FRAGMENT_REPLAY_DROPPED", length: ev.text.length }, "Dropped replayed fragment");
          continue;
        }
        yield ev.text;
      }

      if (race.winner === null) {
        if (race.quotaFailures.length > 0) {
          advisory = true;
          yield quotaAdvisory(this.credentials?.activeLabel() ?? "default");
        } else if (race.failures.length > 0 && race.failures.length === race.started.length) {
          throw new BackendError(
            "All completion candidates failed",
            race.started.map((i) => this.backends[i].name)
          );
        }
      }
    } finally {
      clearTimeout(watchdog);
      race.cancelAll();
      events.end();
      const names = (ids: number[]) => ids.map((i) => this.backends[i].name);
      this.lastRace = {
        winner: race.winner === null ? null : this.backends[race.winner].name,
        firstTokenMs: race.firstTokenAt === null ? null : race.firstTokenAt - race.startedAt,
        started: names(race.started),
        quotaFailures: names(race.quotaFailures),
        failures: names(race.failures),
        advisory,
      };
      logger.info({ event: "RACE_END", ...this.lastRace }, "Completion race ended");
    }
  }

  private async runCandidate(index: number, messages: readonly Message[], race: ProviderRace, events: AsyncQueue<RaceEvent>): Promise<void> {
    const backend = this.backends[index];
    const signal = race.controllers[index].signal;
    const options: CompletionOptions = {
      maxTokens: this.config.maxTokens,
      temperature: this.config.temperature,
      stop: this.config.stop,
      apiKey: this.credentials?.keyFor(backend.name),
    };
    try {
      for await (const raw of backend.stream(messages, options)) {
        if (signal.aborted) break;
        const text = sanitizeFragment(raw);
        if (!text) continue;
        const wasUndecided = race.winner === null;
        if (!race.claim(index)) break;
        if (wasUndecided) {
          logger.info(
            { event: "RACE_WINNER", candidate: backend.name, index, firstTokenMs: Date.now() - race.startedAt },
            "Completion candidate won the race"
          );
        }
        events.push({ kind: "fragment", index, text });
      }
    } catch (err) {
      const e = toError(err);
      if (signal.aborted) {
        logger.debug({ event: "CANDIDATE_CANCELLED", candidate: backend.name, err: e.message }, "Cancelled candidate errored");
      } else if (race.winner !== null && race.winner !== index) {
        logger.debug({ event: "CANDIDATE_LOST_ERROR", candidate: backend.name, err: e.message }, "Losing candidate errored");
      } else if (isQuotaOrAuthError(e)) {
        race.quotaFailures.push(index);
        logger.warn({ event: "CANDIDATE_QUOTA_OR_AUTH", candidate: backend.name, err: e.message }, "Candidate hit quota or auth error");
      } else {
        race.failures.push(index);
        logger.warn({ event: "CANDIDATE_FAILED", candidate: backend.name, err: e.message }, "Completion candidate failed");
      }
    } finally {
      events.push({ kind: "done", index });
    }
  }
}
