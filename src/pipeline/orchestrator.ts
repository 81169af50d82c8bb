/**
 * ResponseOrchestrator: decides, per outgoing turn, whether to speak and how long to wait for it.
 *
 * Turn flow: control signal? -> toggle + acknowledgement
 *            otherwise -> read voice flag -> (enabled) budget text -> guarded synthesis -> store artifact
 * The full reply text is always returned for display; audio is best-effort.
 */

import * as crypto from "crypto";
import type { AppConfig, ControlTokenConfig } from "../config";
import type { IASR, TranscriptResult } from "../adapters/asr";
import type { ITTS, VoiceOptions } from "../adapters/tts";
import type { ArtifactSink } from "../delivery/artifacts";
import type { AudioArtifact } from "../delivery/types";
import type {
  AgentReply,
  ConversationTurnResult,
  PipelineCallbacks,
  RespondOptions,
  ResponseAction,
  ResponseResult,
  TranscribeOptions,
  TranscriptionResult,
} from "./types";
import type { VoiceOutputState } from "../voice/output-state";
import { ControlSignalParser, type ControlSignal } from "../voice/control-signal";
import { TextBudgetPolicy } from "../voice/text-budget";
import { SynthesisGuard } from "../voice/synthesis-guard";
import { recordTurnMetrics } from "../metrics";
import { errMessage, logAsrResult, logger, logTurn } from "../logging";
import { DEFAULT_ASR_TIMEOUT_MS, DEFAULT_DISABLED_ACK, DEFAULT_ENABLED_ACK, DEFAULT_TRUNCATION_MARKER } from "../config";

function withTimeout<T>(p: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
    p.then((v) => { clearTimeout(timer); resolve(v); }, (e) => { clearTimeout(timer); reject(e); });
  });
}

export interface OrchestratorConfig {
  /** Bound on one synthesizer call. */
  ttsTimeoutMs: number;
  /** Max graphemes spoken per turn (marker included). */
  truncationLimitChars: number;
  truncationMarker?: string;
  /** Language hint for recognition and the default voice. */
  defaultLanguage: string;
  control?: Partial<ControlTokenConfig>;
  ack?: { enabled: string; disabled: string };
  /** Status lines for statusInfo(); the state's own lines are used when absent. */
  status?: { enabled: string; disabled: string };
  /** Default voice profile for every synthesis. */
  voice?: VoiceOptions;
  timeouts?: { asrMs?: number };
}

/** Map app config onto orchestrator settings. */
export function orchestratorConfigFrom(config: AppConfig): OrchestratorConfig {
  const { voice, asr, tts } = config;
  return {
    ttsTimeoutMs: Math.round(voice.timeoutSeconds * 1000),
    truncationLimitChars: voice.truncationLimitChars,
    truncationMarker: voice.truncationMarker,
    defaultLanguage: voice.defaultLanguage,
    control: voice.control,
    ack: voice.ack,
    status: voice.status,
    voice: { languageCode: voice.defaultLanguage, speakingRate: tts.speakingRate },
    timeouts: { asrMs: asr.timeoutMs },
  };
}

interface SpokenPart {
  audio?: AudioArtifact;
  audioText: string;
  timedOut: boolean;
  truncated: boolean;
  error?: string;
  ttsLatencyMs: number;
}

interface TurnOutput {
  result: ResponseResult;
  ttsLatencyMs?: number;
}

function toAction(signal: Exclude<ControlSignal, "none">): ResponseAction {
  return signal === "enable" ? "voice_enabled" : "voice_disabled";
}

export class ResponseOrchestrator {
  private readonly parser: ControlSignalParser;
  private readonly budget: TextBudgetPolicy;
  private readonly guard: SynthesisGuard;
  private readonly ack: { enabled: string; disabled: string };
  private readonly asrTimeoutMs: number;

  constructor(
    private readonly asr: IASR,
    tts: ITTS,
    private readonly state: VoiceOutputState,
    private readonly artifacts: ArtifactSink,
    private readonly config: OrchestratorConfig,
    private readonly callbacks: PipelineCallbacks = {}
  ) {
    this.parser = new ControlSignalParser(config.control);
    this.budget = new TextBudgetPolicy(config.truncationMarker ?? DEFAULT_TRUNCATION_MARKER);
    this.guard = new SynthesisGuard(tts, { languageCode: config.defaultLanguage, ...config.voice });
    this.ack = config.ack ?? { enabled: DEFAULT_ENABLED_ACK, disabled: DEFAULT_DISABLED_ACK };
    this.asrTimeoutMs = config.timeouts?.asrMs ?? DEFAULT_ASR_TIMEOUT_MS;
  }

  /**
   * Produce the deliverable for one outgoing turn.
   * Resolves with success=false only when there is no text to respond with.
   */
  async respond(text: string, options: RespondOptions = {}): Promise<ResponseResult> {
    const turnId = crypto.randomUUID();
    logTurn(logger, "start", turnId);
    try {
      const { result, ttsLatencyMs } = await this.runTurn(text, options);
      recordTurnMetrics({
        ttsLatencyMs,
        turnId,
        sessionKey: this.state.key,
        action: result.action,
        voiceEnabled: result.voiceEnabled,
        truncated: result.truncated,
        timedOut: result.timedOut,
        audioBytes: result.audio?.byteLength,
        audioDurationSec: result.audio?.durationSec,
        textLength: result.displayText.length,
        spokenLength: result.audioText?.length,
      });
      return result;
    } finally {
      logTurn(logger, "end", turnId);
    }
  }

  private async runTurn(text: string, options: RespondOptions): Promise<TurnOutput> {
    const signal = this.parser.parse(text);
    if (signal !== "none") return this.applyControl(signal, options);

    if (!text.trim()) {
      return {
        result: {
          success: false,
          displayText: "",
          timedOut: false,
          truncated: false,
          action: "none",
          voiceEnabled: await this.state.get(),
          error: "missing_text",
        },
      };
    }

    const voiceEnabled = await this.state.get();
    this.callbacks.onAgentReply?.(text);
    if (!voiceEnabled && !options.force) {
      return { result: { success: true, displayText: text, timedOut: false, truncated: false, action: "none", voiceEnabled } };
    }

    const spoken = await this.speak(text, options.voice);
    return { result: this.assemble(text, "none", voiceEnabled, spoken), ttsLatencyMs: spoken.ttsLatencyMs };
  }

  /** Toggle turn: acknowledge, and speak the acknowledgement when voice was just enabled. */
  private async applyControl(signal: Exclude<ControlSignal, "none">, options: RespondOptions): Promise<TurnOutput> {
    const enable = signal === "enable";
    await this.state.set(enable);
    this.callbacks.onVoiceToggle?.(enable);
    const voiceEnabled = await this.state.get();
    const ack = enable ? this.ack.enabled : this.ack.disabled;
    if (!voiceEnabled) {
      return { result: { success: true, displayText: ack, timedOut: false, truncated: false, action: toAction(signal), voiceEnabled } };
    }
    const spoken = await this.speak(ack, options.voice);
    return { result: this.assemble(ack, toAction(signal), voiceEnabled, spoken), ttsLatencyMs: spoken.ttsLatencyMs };
  }

  private assemble(displayText: string, action: ResponseAction, voiceEnabled: boolean, spoken: SpokenPart): ResponseResult {
    const result: ResponseResult = {
      success: true,
      displayText,
      audioText: spoken.audioText,
      timedOut: spoken.timedOut,
      truncated: spoken.truncated,
      action,
      voiceEnabled,
    };
    if (spoken.audio) result.audio = spoken.audio;
    if (spoken.error) result.error = spoken.error;
    return result;
  }

  private async speak(text: string, voice?: VoiceOptions): Promise<SpokenPart> {
    const { spokenText, truncated } = this.budget.apply(text, this.config.truncationLimitChars);
    const outcome = await this.guard.synthesizeWithTimeout(spokenText, this.config.ttsTimeoutMs, voice);
    if (!outcome.success) {
      return {
        audioText: spokenText,
        truncated,
        timedOut: outcome.timedOut,
        error: outcome.error,
        ttsLatencyMs: outcome.elapsedMs,
      };
    }
    try {
      const audio = await this.artifacts.save(outcome.speech);
      return { audio, audioText: spokenText, truncated, timedOut: false, ttsLatencyMs: outcome.elapsedMs };
    } catch (err) {
      logger.warn({ event: "ARTIFACT_SAVE_FAILED", err: errMessage(err) }, "Synthesized audio could not be stored");
      return { audioText: spokenText, truncated, timedOut: false, error: errMessage(err), ttsLatencyMs: outcome.elapsedMs };
    }
  }

  /**
   * Recognize a user utterance. A recognized control token toggles voice output
   * and comes back as empty text with the action set.
   */
  async transcribe(audio: Buffer, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    const language = options.language ?? this.config.defaultLanguage;
    const asrStart = Date.now();
    let transcript: TranscriptResult;
    try {
      transcript = await withTimeout(this.asr.recognize(audio, { languageHint: language, format: options.format }), this.asrTimeoutMs, "ASR");
    } catch (err) {
      logger.warn({ event: "ASR_FAILED", err: errMessage(err) }, "ASR failed");
      return {
        success: false,
        text: "",
        durationSec: 0,
        action: "none",
        voiceEnabled: await this.state.get(),
        error: errMessage(err),
      };
    }
    const text = transcript.text.trim();
    logAsrResult(logger, text.length, Date.now() - asrStart);

    const base = {
      success: true,
      language: transcript.language ?? language,
      confidence: transcript.confidence,
      durationSec: transcript.durationSec ?? 0,
    };
    const signal = this.parser.parse(text);
    if (signal !== "none") {
      const enable = signal === "enable";
      await this.state.set(enable);
      this.callbacks.onVoiceToggle?.(enable);
      return { ...base, text: "", action: toAction(signal), voiceEnabled: await this.state.get() };
    }
    this.callbacks.onUserTranscript?.(text);
    return { ...base, text, action: "none", voiceEnabled: await this.state.get() };
  }

  /**
   * Recognize the user's audio, then respond with the agent's reply.
   * The reply is not requested when recognition failed, heard nothing, or heard a control token.
   */
  async conversationTurn(
    audio: Buffer,
    reply: AgentReply,
    options: { transcribe?: TranscribeOptions; respond?: RespondOptions } = {}
  ): Promise<ConversationTurnResult> {
    const transcription = await this.transcribe(audio, options.transcribe);
    if (!transcription.success) return { success: false, transcription, error: transcription.error };
    if (transcription.action !== "none") return { success: true, transcription };
    if (!transcription.text) return { success: false, transcription, error: "empty_transcript" };

    let replyText: string;
    try {
      replyText = typeof reply === "string" ? reply : await reply(transcription.text);
    } catch (err) {
      logger.warn({ event: "AGENT_REPLY_FAILED", err: errMessage(err) }, "Agent reply failed");
      return { success: false, transcription, error: errMessage(err) };
    }
    const response = await this.respond(replyText, options.respond);
    return response.success
      ? { success: true, transcription, response }
      : { success: false, transcription, response, error: response.error };
  }

  async enableVoice(): Promise<void> {
    await this.state.set(true);
    this.callbacks.onVoiceToggle?.(true);
  }

  async disableVoice(): Promise<void> {
    await this.state.set(false);
    this.callbacks.onVoiceToggle?.(false);
  }

  async toggleVoice(): Promise<boolean> {
    const enabled = await this.state.toggle();
    this.callbacks.onVoiceToggle?.(enabled);
    return enabled;
  }

  isVoiceEnabled(): Promise<boolean> {
    return this.state.get();
  }

  async statusInfo(): Promise<string> {
    const { status } = this.config;
    if (!status) return this.state.statusInfo();
    return (await this.state.get()) ? status.enabled : status.disabled;
  }
}
