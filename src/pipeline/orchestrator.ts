/**
 * TurnOrchestrator: the IDLE -> LISTENING -> THINKING -> TALKING -> IDLE state machine.
 *
 * Drives the head's gestures, records, transcribes, streams the hedged completion through the
 * chunking flusher into the synthesizer, and commits the reply to the display only after playback
 * has drained. The drain wait holds only that finalize step: the turn stops being busy once the reply
 * has been streamed, and a new trigger commits the pending reply at once. Face tracking is paused for
 * the whole turn and resumed after an idle settle delay.
 */

import { randomUUID } from "crypto";
import type { IASR } from "../adapters/asr";
import { isSpeakable, type ISpeechSynthesizer } from "../adapters/tts/types";
import type { IGestureActuator, GestureCommand } from "../actuator/types";
import type { IFaceTracker } from "../tracking/face-tracker";
import type { IDisplaySurface } from "../display/console";
import type { ISessionMemory } from "../memory/types";
import type { PromptManager, LessonContext } from "../prompts/prompt-manager";
import type { QuickReplies } from "../prompts/quick-replies";
import { pcmToWav } from "../audio/pcm";
import { SttError, toError } from "../errors";
import { logger, logError, logSttResult, logTurn, logCompletion } from "../logging";
import { recordTurnMetrics, type TurnMetrics } from "../metrics";
import { ChunkingFlusher, FullReplyBuffer } from "./chunking-flusher";
import type { ICompletionClient } from "./hedged-completion";
import type { Utterance } from "./recorder";
import type { PipelineCallbacks, TurnResult, TurnState } from "./types";

export interface UtteranceSource {
  record(): Promise<Utterance>;
}

export interface TurnOrchestratorDeps {
  recorder: UtteranceSource;
  stt: IASR;
  completion: ICompletionClient;
  flusher: ChunkingFlusher;
  synthesizer: Pick<ISpeechSynthesizer, "feed" | "drainedSince" | "takeFailure">;
  actuator: Pick<IGestureActuator, "send">;
  tracker: Pick<IFaceTracker, "pause" | "resume">;
  display: IDisplaySurface;
  prompts: PromptManager;
  memory: ISessionMemory;
  quickReplies?: QuickReplies;
}

export interface TurnOrchestratorConfig {
  drainHoldOffMs: number;
  drainPollMs: number;
  stopGestureGapMs: number;
  trackerResumeDelayMs: number;
  thinkingStatus?: string;
}

const EMPTY_TRANSCRIPT_NOTICE = "(No speech detected)";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Reply streamed and waiting for playback to drain before it reaches the display. */
interface PendingCommit {
  readonly text: string;
  settled: boolean;
}

async function* single(text: string): AsyncGenerator<string, void, undefined> {
  yield text;
}

export class TurnOrchestrator {
  private state: TurnState = "IDLE";
  /** Turn holding the trigger; 0 when free. */
  private activeTurn = 0;
  private turnCounter = 0;
  private closed = false;
  private resumeTimer: ReturnType<typeof setTimeout> | null = null;
  private pendingCommit: PendingCommit | null = null;
  private lesson: LessonContext | undefined;

  constructor(
    private readonly deps: TurnOrchestratorDeps,
    private readonly config: TurnOrchestratorConfig,
    private readonly callbacks: PipelineCallbacks = {},
    private readonly random: () => number = Math.random
  ) {}

  getState(): TurnState {
    return this.state;
  }

  get isBusy(): boolean {
    return this.activeTurn !== 0;
  }

  /** Switches the system prompt to the lesson variant; undefined returns to free conversation. */
  setLessonContext(lesson: LessonContext | undefined): void {
    this.lesson = lesson;
  }

  /** Speak trigger: record one utterance and answer it. Resolves after the finalize step. */
  async speak(): Promise<TurnResult> {
    const turn = this.claimTurn();
    if (turn === null) return "busy";
    const turnId = randomUUID();
    const metrics: TurnMetrics = { turnId, source: "voice", outcome: "completed" };
    const startedAt = Date.now();
    logTurn(logger, "start", turnId);
    try {
      this.beginTurn();
      this.gesture(this.random() < 0.5 ? "listen_left" : "listen_right");
      this.setState("LISTENING");

      const utterance = await this.deps.recorder.record();
      metrics.recordMs = Date.now() - startedAt;
      if (utterance.pcm.length === 0) {
        logger.info({ event: "NO_SPEECH", turnId }, "No speech detected; back to idle");
        this.gesture("stop");
        this.finishIdle();
        return this.done(metrics, startedAt, "no_speech");
      }

      this.enterThinking();
      const sttStart = Date.now();
      const text = await this.transcribe(utterance);
      metrics.sttLatencyMs = Date.now() - sttStart;
      logSttResult(logger, text.length, metrics.sttLatencyMs);
      if (!text) {
        this.deps.display.setStatus(null);
        this.deps.display.showNotice(EMPTY_TRANSCRIPT_NOTICE);
        this.gesture("stop");
        this.finishIdle();
        return this.done(metrics, startedAt, "empty_transcript");
      }

      this.acceptUserText(text);
      const prompt = this.deps.prompts.buildTurn(text, this.deps.memory.getSnapshot(), this.lesson);
      this.deps.memory.append("user", text);
      await this.respond(this.deps.completion.stream(prompt), metrics, startedAt, true, turn);
      return this.done(metrics, startedAt, "completed");
    } catch (err) {
      await this.fail(toError(err), turnId, turn);
      return this.done(metrics, startedAt, "failed");
    } finally {
      this.releaseTurn(turn);
      logTurn(logger, "end", turnId);
    }
  }

  /** Typed path: no recording or STT; small talk is answered locally. */
  async submitText(raw: string): Promise<TurnResult> {
    const text = raw.trim();
    if (!text) return "empty_transcript";
    const turn = this.claimTurn();
    if (turn === null) return "busy";
    const turnId = randomUUID();
    const metrics: TurnMetrics = { turnId, source: "typed", outcome: "completed" };
    const startedAt = Date.now();
    logTurn(logger, "start", turnId);
    try {
      this.beginTurn();
      this.acceptUserText(text);
      this.enterThinking();

      const quick = this.deps.quickReplies?.match(text) ?? null;
      if (quick !== null) {
        this.deps.memory.append("user", text);
        await this.respond(single(quick), metrics, startedAt, false, turn);
        return this.done(metrics, startedAt, "quick_reply");
      }
      const prompt = this.deps.prompts.buildTurn(text, this.deps.memory.getSnapshot(), this.lesson);
      this.deps.memory.append("user", text);
      await this.respond(this.deps.completion.stream(prompt), metrics, startedAt, true, turn);
      return this.done(metrics, startedAt, "completed");
    } catch (err) {
      await this.fail(toError(err), turnId, turn);
      return this.done(metrics, startedAt, "failed");
    } finally {
      this.releaseTurn(turn);
      logTurn(logger, "end", turnId);
    }
  }

  /** Stop scheduling work; a pending drain wait gives up without committing. */
  async close(): Promise<void> {
    this.closed = true;
    this.cancelResume();
  }

  private async respond(
    fragments: AsyncIterable<string>,
    metrics: TurnMetrics,
    startedAt: number,
    fromBackend: boolean,
    turn: number
  ): Promise<void> {
    const reply = new FullReplyBuffer();
    let talking = false;

    for await (const chunk of this.deps.flusher.chunks(fragments, reply)) {
      if (!isSpeakable(chunk.text)) continue;
      await this.deps.synthesizer.feed(chunk);
      if (metrics.firstChunkMs === undefined) metrics.firstChunkMs = Date.now() - startedAt;
      if (!talking && this.state === "THINKING") {
        talking = true;
        this.deps.display.setStatus(null);
        this.gesture("talk");
        this.setState("TALKING");
      }
    }

    const race = fromBackend ? this.deps.completion.lastRace ?? null : null;
    metrics.winner = race?.winner ?? null;
    metrics.firstTokenMs = race?.firstTokenMs ?? undefined;
    const replyText = reply.text();
    metrics.responseChars = replyText.length;
    if (fromBackend) logCompletion(logger, metrics.winner, replyText.length, Date.now() - startedAt);
    if (replyText && !race?.advisory) this.deps.memory.append("assistant", replyText);

    const commit: PendingCommit = { text: replyText, settled: false };
    this.pendingCommit = commit;
    this.releaseTurn(turn);

    const drainStart = Date.now();
    const drained = await this.waitForDrain(commit);
    metrics.drainWaitMs = Date.now() - drainStart;
    // A newer turn already committed the reply and owns the head.
    if (commit.settled) return;

    this.deps.display.setStatus(null);
    this.settle(commit, drained);
    await this.finishTurn(turn);
  }

  /**
   * Resolves true once playback has been silent for the hold-off; false when closed or when a newer
   * turn took over. Throws the synthesizer's failure if its engine died with text pending.
   */
  private async waitForDrain(commit: PendingCommit): Promise<boolean> {
    while (!this.closed && !commit.settled) {
      const failure = this.deps.synthesizer.takeFailure();
      if (failure) {
        this.settle(commit, false);
        throw failure;
      }
      if (this.deps.synthesizer.drainedSince() >= this.config.drainHoldOffMs) return true;
      await sleep(this.config.drainPollMs);
    }
    return false;
  }

  /** Marks the commit done; shows the reply when `show` is set. */
  private settle(commit: PendingCommit, show: boolean): void {
    if (commit.settled) return;
    commit.settled = true;
    if (this.pendingCommit === commit) this.pendingCommit = null;
    if (!show || !commit.text) return;
    this.deps.display.showAssistant(commit.text);
    this.callbacks.onAgentReply?.(commit.text);
  }

  private async transcribe(utterance: Utterance): Promise<string> {
    try {
      const result = await this.deps.stt.transcribe(pcmToWav(utterance.pcm, utterance.sampleRate), "wav");
      return result.text.trim();
    } catch (err) {
      throw err instanceof SttError ? err : new SttError(`Transcription failed: ${toError(err).message}`, { cause: err });
    }
  }

  private claimTurn(): number | null {
    if (this.activeTurn !== 0 || this.closed) return null;
    this.turnCounter++;
    this.activeTurn = this.turnCounter;
    return this.activeTurn;
  }

  private releaseTurn(turn: number): void {
    if (this.activeTurn === turn) this.activeTurn = 0;
  }

  /** True while no newer turn has started. */
  private isCurrent(turn: number): boolean {
    return this.turnCounter === turn;
  }

  private beginTurn(): void {
    this.cancelResume();
    const pending = this.pendingCommit;
    if (pending) {
      logger.info({ event: "COMMIT_BEFORE_DRAIN" }, "New turn started; committing the previous reply now");
      this.settle(pending, true);
    }
    const stale = this.deps.synthesizer.takeFailure();
    if (stale) logger.warn({ event: "SYNTH_FAILURE_DISCARDED", err: stale.message }, "Dropping synthesizer failure from an earlier turn");
    this.deps.tracker.pause();
  }

  private enterThinking(): void {
    this.gesture("think");
    this.setState("THINKING");
    this.deps.display.setStatus(this.config.thinkingStatus ?? "Thinking…");
  }

  private acceptUserText(text: string): void {
    this.deps.display.showUser(text);
    this.callbacks.onUserTranscript?.(text);
  }

  private async fail(err: Error, turnId: string, turn: number): Promise<void> {
    logError(logger, err, { turnId, state: this.state });
    this.callbacks.onError?.(err);
    this.deps.display.setStatus(null);
    this.deps.display.showNotice(`[Error: ${err.message}]`);
    await this.finishTurn(turn);
  }

  /** stop, gap, stop, then IDLE; steps after the gap are skipped once a newer turn has started. */
  private async finishTurn(turn: number): Promise<void> {
    this.gesture("stop");
    await sleep(this.config.stopGestureGapMs);
    if (!this.isCurrent(turn)) return;
    this.gesture("stop");
    this.finishIdle();
  }

  private finishIdle(): void {
    this.setState("IDLE");
    this.scheduleResume();
  }

  private scheduleResume(): void {
    this.cancelResume();
    if (this.closed) return;
    this.resumeTimer = setTimeout(() => {
      this.resumeTimer = null;
      if (this.state === "IDLE" && !this.isBusy) this.deps.tracker.resume();
    }, this.config.trackerResumeDelayMs);
  }

  private cancelResume(): void {
    if (this.resumeTimer) clearTimeout(this.resumeTimer);
    this.resumeTimer = null;
  }

  private gesture(command: GestureCommand): void {
    this.deps.actuator.send(command);
  }

  private setState(next: TurnState): void {
    const prev = this.state;
    if (prev === next) return;
    this.state = next;
    logger.info({ event: "TURN_STATE", from: prev, to: next }, "Turn state");
    this.callbacks.onStateChange?.(next, prev);
  }

  private done(metrics: TurnMetrics, startedAt: number, outcome: TurnMetrics["outcome"]): TurnResult {
    recordTurnMetrics({ ...metrics, outcome, totalMs: Date.now() - startedAt });
    return outcome;
  }
}
