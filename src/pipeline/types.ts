/**
 * Turn state and callbacks shared by the orchestrator and its hosts (CLI, tests).
 */

export type TurnState = "IDLE" | "LISTENING" | "THINKING" | "TALKING";

export type TurnResult = "busy" | "no_speech" | "empty_transcript" | "quick_reply" | "completed" | "failed";

export interface PipelineCallbacks {
  onStateChange?: (next: TurnState, prev: TurnState) => void;
  /** Transcript of what the user said (or typed). */
  onUserTranscript?: (text: string) => void;
  /** Full reply, after playback drained. */
  onAgentReply?: (text: string) => void;
  onError?: (err: Error) => void;
}
