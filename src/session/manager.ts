/**
 * VoiceSessionManager: one VoiceOutputState + ResponseOrchestrator per session.
 * Turns of the same session run strictly in order; different sessions run independently.
 */

import type { IASR } from "../adapters/asr";
import type { ITTS } from "../adapters/tts";
import type { ArtifactSink } from "../delivery/artifacts";
import type {
  AgentReply,
  ConversationTurnResult,
  PipelineCallbacks,
  RespondOptions,
  ResponseResult,
  TranscribeOptions,
  TranscriptionResult,
} from "../pipeline/types";
import type { StateStore } from "../voice/state-store";
import { ResponseOrchestrator, type OrchestratorConfig } from "../pipeline/orchestrator";
import { VoiceOutputState } from "../voice/output-state";
import { SerialQueue } from "./serial-queue";
import { logger } from "../logging";

export interface VoiceSessionManagerConfig {
  asr: IASR;
  tts: ITTS;
  store: StateStore;
  artifacts: ArtifactSink;
  orchestrator: OrchestratorConfig;
  /** Per-session pipeline callbacks (e.g. to tag logs with the session id). */
  callbacksFor?: (sessionId: string) => PipelineCallbacks;
}

export class VoiceSession {
  readonly state: VoiceOutputState;
  readonly orchestrator: ResponseOrchestrator;
  private readonly queue = new SerialQueue();

  constructor(
    readonly id: string,
    config: VoiceSessionManagerConfig
  ) {
    this.state = new VoiceOutputState({ key: id, store: config.store, statusText: config.orchestrator.status });
    this.orchestrator = new ResponseOrchestrator(
      config.asr,
      config.tts,
      this.state,
      config.artifacts,
      config.orchestrator,
      config.callbacksFor?.(id) ?? {}
    );
  }

  /** Queue work behind this session's earlier turns. */
  run<T>(op: (orchestrator: ResponseOrchestrator) => Promise<T>): Promise<T> {
    return this.queue.run(() => op(this.orchestrator));
  }

  get pendingTurns(): number {
    return this.queue.size;
  }
}

export class VoiceSessionManager {
  private readonly sessions = new Map<string, VoiceSession>();

  constructor(private readonly config: VoiceSessionManagerConfig) {}

  /** Get or create the session; its voice flag is loaded from the store on first use. */
  session(sessionId: string): VoiceSession {
    const id = sessionId.trim();
    if (!id) throw new Error("sessionId must be non-empty");
    let s = this.sessions.get(id);
    if (!s) {
      s = new VoiceSession(id, this.config);
      this.sessions.set(id, s);
      logger.debug({ event: "SESSION_CREATED", sessionKey: id }, "Voice session created");
    }
    return s;
  }

  respond(sessionId: string, text: string, options?: RespondOptions): Promise<ResponseResult> {
    return this.session(sessionId).run((o) => o.respond(text, options));
  }

  transcribe(sessionId: string, audio: Buffer, options?: TranscribeOptions): Promise<TranscriptionResult> {
    return this.session(sessionId).run((o) => o.transcribe(audio, options));
  }

  conversationTurn(
    sessionId: string,
    audio: Buffer,
    reply: AgentReply,
    options?: { transcribe?: TranscribeOptions; respond?: RespondOptions }
  ): Promise<ConversationTurnResult> {
    return this.session(sessionId).run((o) => o.conversationTurn(audio, reply, options));
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId.trim());
  }

  /**
   * Forget the in-memory session once its queued turns finish.
   * The persisted flag stays in the store and is reloaded if the session comes back.
   */
  async end(sessionId: string): Promise<void> {
    const id = sessionId.trim();
    const s = this.sessions.get(id);
    if (!s) return;
    // Turns may be queued while draining; the session stays registered until its queue is empty.
    do {
      await s.run(async () => undefined);
    } while (s.pendingTurns > 0);
    if (this.sessions.get(id) === s) this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }
}
