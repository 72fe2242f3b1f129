#!/usr/bin/env node
/**
 * Entry point: load config, bring up the head, synthesizer and tracker, then drive turns from the terminal.
 * Enter on an empty line = speak trigger; any other line is a typed turn. Slash commands:
 *   /profile              rotate to the next API credential profile
 *   /stats                timings of the last turn
 *   /lesson T | O | S | L  lesson mode (title, objective, student, level); "/lesson off" leaves it
 *   /quit                 shut down
 */

import * as readline from "readline";
import { loadConfig, type AppConfig } from "./config";
import { createASR } from "./adapters/asr";
import { createCompletionBackends, ProfileStore } from "./adapters/llm";
import { createSynthesizer } from "./adapters/tts";
import { createActuator } from "./actuator";
import { MicrophoneFrameSource } from "./audio/frame-source";
import { ConsoleDisplay } from "./display/console";
import { SessionMemory } from "./memory/session";
import { ChunkingFlusher } from "./pipeline/chunking-flusher";
import { HedgedCompletionClient } from "./pipeline/hedged-completion";
import { TurnOrchestrator } from "./pipeline/orchestrator";
import { VoiceActivityRecorder } from "./pipeline/recorder";
import { createSpeechClassifier } from "./pipeline/vad";
import { PromptManager, type LessonContext } from "./prompts/prompt-manager";
import { QuickReplies } from "./prompts/quick-replies";
import { FaceTrackerController } from "./tracking/face-tracker";
import { getLastTurnMetrics, type TurnMetrics } from "./metrics";
import { closeAll, type Resource } from "./resource";
import { logger, logError } from "./logging";
import { toError } from "./errors";

const MEMORY_MAX_MESSAGES = 40;

/** "/lesson Title | Objective | Student | Level"; missing fields fall back to neutral defaults. */
export function parseLessonCommand(args: string): LessonContext | undefined | "invalid" {
  const trimmed = args.trim();
  if (trimmed === "off") return undefined;
  const [lessonTitle, lessonObjective, studentName, studentLevel] = trimmed.split("|").map((s) => s.trim());
  if (!lessonTitle || !lessonObjective) return "invalid";
  return {
    lessonTitle,
    lessonObjective,
    studentName: studentName || "the student",
    studentLevel: studentLevel || "beginner",
  };
}

export function formatTurnMetrics(m: TurnMetrics | null): string {
  if (!m) return "No turns yet.";
  const ms = (v: number | undefined) => (v === undefined ? "-" : `${v} ms`);
  return [
    `Last turn (${m.source}, ${m.outcome}): winner=${m.winner ?? "-"}`,
    `  stt ${ms(m.sttLatencyMs)}, first token ${ms(m.firstTokenMs)}, first audio ${ms(m.firstChunkMs)}, total ${ms(m.totalMs)}`,
  ].join("\n");
}

function buildOrchestrator(config: AppConfig, profiles: ProfileStore, display: ConsoleDisplay) {
  const actuator = createActuator(config);
  const synthesizer = createSynthesizer(config);
  const tracker = new FaceTrackerController(actuator, { command: config.head.trackerCommand });
  const stt = createASR(config);

  const source = new MicrophoneFrameSource({
    sampleRate: config.recorder.sampleRate,
    frameMs: config.recorder.frameMs,
    device: config.audio.inputDevice,
    command: config.audio.captureCommand,
  });
  const recorder = new VoiceActivityRecorder(config.recorder, source, createSpeechClassifier(config.recorder.aggressiveness));

  const completion = new HedgedCompletionClient(
    createCompletionBackends(config),
    {
      firstTokenTimeoutMs: config.llm.firstTokenTimeoutMs,
      maxTokens: config.llm.maxTokens,
      temperature: config.llm.temperature,
      stop: config.llm.stop,
      dedupeWindowChars: config.llm.dedupeWindowChars,
      dedupeMinChars: config.llm.dedupeMinChars,
    },
    profiles
  );

  const orchestrator = new TurnOrchestrator(
    {
      recorder,
      stt,
      completion,
      flusher: new ChunkingFlusher(config.chunking),
      synthesizer,
      actuator,
      tracker,
      display,
      prompts: new PromptManager({
        assistantName: config.persona.assistantName,
        systemPrompt: config.persona.systemPrompt,
        historyMessages: config.llm.historyMessages,
      }),
      memory: new SessionMemory({ maxMessages: MEMORY_MAX_MESSAGES }),
      quickReplies: new QuickReplies(),
    },
    {
      drainHoldOffMs: config.tts.drainHoldOffMs,
      drainPollMs: config.tts.drainPollMs,
      stopGestureGapMs: config.head.stopGestureGapMs,
      trackerResumeDelayMs: config.head.trackerResumeDelayMs,
    },
    {
      onStateChange: (next, prev) => logger.debug({ event: "STATE_CHANGE", from: prev, to: next }, "State change"),
      onUserTranscript: (text) => logger.info({ event: "USER_TRANSCRIPT", textLength: text.length }, "User said something"),
      onAgentReply: (text) => logger.info({ event: "AGENT_REPLY", textLength: text.length }, "Agent replied"),
    }
  );

  const sttResource: Resource = {
    start: async () => undefined,
    close: async () => {
      await stt.close?.();
    },
  };
  // Start order: head first (startup gestures), then audio out, then tracking; closed in reverse.
  const resources: Resource[] = [actuator, synthesizer, tracker, sttResource];
  return { orchestrator, resources };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const profiles = ProfileStore.load({ keysFile: config.llm.keysFile, settingsFile: config.llm.settingsFile });
  const display = new ConsoleDisplay({ assistantName: config.persona.assistantName });
  const { orchestrator, resources } = buildOrchestrator(config, profiles, display);

  const started: Resource[] = [];
  for (const r of resources) {
    await r.start();
    started.push(r);
  }
  logger.info(
    { event: "READY", candidates: config.llm.candidates.map((c) => c.name), profile: profiles.activeLabel() },
    "Voice pipeline ready"
  );
  display.showNotice(`Press Enter to talk to ${config.persona.assistantName}, or type a message. /quit exits.`);

  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  let shuttingDown = false;

  const shutdown = async (code: number): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    rl.close();
    display.setStatus(null);
    await orchestrator.close();
    await closeAll(started, logger);
    logger.info({ event: "SHUTDOWN" }, "Voice pipeline stopped");
    process.exit(code);
  };

  const runTurn = (turn: Promise<unknown>) => {
    turn.catch((err) => logError(logger, toError(err), { event: "TURN_UNHANDLED" }));
  };

  rl.on("line", (line) => {
    const input = line.trim();
    if (input === "/quit") {
      void shutdown(0);
      return;
    }
    if (input === "/profile") {
      display.showNotice(`Switched API profile to: ${profiles.next()}`);
      return;
    }
    if (input === "/stats") {
      display.showNotice(formatTurnMetrics(getLastTurnMetrics()));
      return;
    }
    if (input.startsWith("/lesson")) {
      const lesson = parseLessonCommand(input.slice("/lesson".length));
      if (lesson === "invalid") {
        display.showNotice("Usage: /lesson <title> | <objective> [| <student> | <level>]  or  /lesson off");
        return;
      }
      orchestrator.setLessonContext(lesson);
      display.showNotice(lesson ? `Lesson mode: ${lesson.lessonTitle}` : "Lesson mode off");
      return;
    }
    if (orchestrator.isBusy) {
      display.showNotice("(Still answering; please wait.)");
      return;
    }
    runTurn(input ? orchestrator.submitText(input) : orchestrator.speak());
  });
  rl.on("close", () => void shutdown(0));

  process.on("SIGINT", () => void shutdown(0));
  process.on("SIGTERM", () => void shutdown(0));
}

if (require.main === module) {
  main().catch((err) => {
    logError(logger, toError(err));
    process.exit(1);
  });
}
