/**
 * Pipeline types: turn results and callbacks.
 */

import type { VoiceOptions } from "../adapters/tts";
import type { AudioArtifact } from "../delivery/types";

export type ResponseAction = "none" | "voice_enabled" | "voice_disabled";

export interface ResponseResult {
  success: boolean;
  /** Full source text, never shortened. Empty only when success is false. */
  displayText: string;
  /** Present only when synthesis succeeded and the audio was stored. */
  audio?: AudioArtifact;
  /** Text handed to the synthesizer; undefined when no synthesis was attempted. */
  audioText?: string;
  timedOut: boolean;
  truncated: boolean;
  action: ResponseAction;
  /** Voice output flag after this turn. */
  voiceEnabled: boolean;
  /** Diagnostic only: why the turn or its audio failed. */
  error?: string;
}

export interface RespondOptions {
  /** Synthesize even when voice output is disabled. */
  force?: boolean;
  /** Per-turn voice profile override (e.g. speakingRate). */
  voice?: VoiceOptions;
}

export interface TranscribeOptions {
  /** Defaults to the configured language. */
  language?: string;
  format?: string;
}

export interface TranscriptionResult {
  success: boolean;
  /** Recognized text; empty when the utterance was a control signal. */
  text: string;
  language?: string;
  confidence?: number;
  durationSec: number;
  action: ResponseAction;
  voiceEnabled: boolean;
  error?: string;
}

/** Agent reply for a recognized utterance: fixed text, or produced from the transcript. */
export type AgentReply = string | ((transcript: string) => Promise<string>);

export interface ConversationTurnResult {
  success: boolean;
  transcription: TranscriptionResult;
  /** Absent when recognition failed or the utterance was a control signal. */
  response?: ResponseResult;
  error?: string;
}

export interface PipelineCallbacks {
  /** Called with recognized user text (after control-signal handling). */
  onUserTranscript?(text: string): void;
  /** Called when a reply is about to be delivered. */
  onAgentReply?(text: string): void;
  /** Called after a control signal or explicit call changed the voice flag. */
  onVoiceToggle?(enabled: boolean): void;
}
