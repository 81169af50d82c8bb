/**
 * Per-turn metrics. Logged as one TURN_METRICS line per turn; the last record is kept for inspection.
 */

import { logger } from "../logging";
import type { ResponseAction } from "../pipeline/types";

export interface TurnMetrics {
  /** Turn ID for correlation with TURN start/end logs. */
  turnId?: string;
  sessionKey?: string;
  action?: ResponseAction;
  voiceEnabled?: boolean;
  /** Wall time of the guarded synthesis call (ms); undefined when none ran. */
  ttsLatencyMs?: number;
  truncated?: boolean;
  timedOut?: boolean;
  audioBytes?: number;
  audioDurationSec?: number;
  /** Display text length (UTF-16 units). */
  textLength?: number;
  /** Spoken text length (UTF-16 units). */
  spokenLength?: number;
}

let lastTurnMetrics: TurnMetrics = {};

export function recordTurnMetrics(metrics: TurnMetrics): void {
  lastTurnMetrics = { ...metrics };
  logger.info(
    {
      event: "TURN_METRICS",
      turn_id: metrics.turnId,
      session_key: metrics.sessionKey,
      action: metrics.action,
      voice_enabled: metrics.voiceEnabled,
      tts_latency_ms: metrics.ttsLatencyMs,
      truncated: metrics.truncated,
      timed_out: metrics.timedOut,
      audio_bytes: metrics.audioBytes,
      audio_duration_sec: metrics.audioDurationSec,
      text_length: metrics.textLength,
      spoken_length: metrics.spokenLength,
    },
    "Turn metrics"
  );
}

export function getLastTurnMetrics(): TurnMetrics {
  return { ...lastTurnMetrics };
}
