/**
 * Wire config into adapters, stores and the session manager.
 */

import type { AppConfig } from "./config";
import { createASR, type IASR } from "./adapters/asr";
import { createTTS, type ITTS } from "./adapters/tts";
import { FileArtifactSink, type ArtifactSink } from "./delivery/artifacts";
import { FileStateStore, type StateStore } from "./voice/state-store";
import { orchestratorConfigFrom } from "./pipeline/orchestrator";
import { VoiceSessionManager } from "./session/manager";
import { logger } from "./logging";

export interface App {
  config: AppConfig;
  asr: IASR;
  tts: ITTS;
  store: StateStore;
  artifacts: ArtifactSink;
  sessions: VoiceSessionManager;
}

export interface AppOverrides {
  asr?: IASR;
  tts?: ITTS;
  store?: StateStore;
  artifacts?: ArtifactSink;
}

export function createApp(config: AppConfig, overrides: AppOverrides = {}): App {
  const asr = overrides.asr ?? createASR(config);
  const tts = overrides.tts ?? createTTS(config);
  const store = overrides.store ?? new FileStateStore(config.voice.stateDir);
  const artifacts = overrides.artifacts ?? new FileArtifactSink(config.voice.outputDir);
  const sessions = new VoiceSessionManager({
    asr,
    tts,
    store,
    artifacts,
    orchestrator: orchestratorConfigFrom(config),
    callbacksFor: (sessionId) => ({
      onUserTranscript: (text) => logger.info({ event: "USER_TRANSCRIPT", sessionId, textLength: text.length }, "User said something"),
      onAgentReply: (text) => logger.info({ event: "AGENT_REPLY", sessionId, textLength: text.length }, "Agent replied"),
      onVoiceToggle: (enabled) => logger.info({ event: "VOICE_OUTPUT_CHANGED", sessionId, enabled }, "Voice output changed"),
    }),
  });
  return { config, asr, tts, store, artifacts, sessions };
}
