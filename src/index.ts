/**
 * Public API of the voice reply broker.
 */

export * from "./config";
export { createApp, type App, type AppOverrides } from "./app";
export * from "./adapters/asr";
export * from "./adapters/tts";
export * from "./delivery/types";
export * from "./delivery/artifacts";
export * from "./delivery/channel";
export * from "./pipeline/types";
export { ResponseOrchestrator, orchestratorConfigFrom, type OrchestratorConfig } from "./pipeline/orchestrator";
export { VoiceSession, VoiceSessionManager, type VoiceSessionManagerConfig } from "./session/manager";
export { SerialQueue } from "./session/serial-queue";
export { ControlSignalParser, type ControlSignal } from "./voice/control-signal";
export { VoiceOutputState, type VoiceOutputStateOptions } from "./voice/output-state";
export * from "./voice/state-store";
export { TextBudgetPolicy, graphemeLength, graphemes, type BudgetedText } from "./voice/text-budget";
export { SynthesisGuard, SynthesisTimeoutError, type SynthesisOutcome } from "./voice/synthesis-guard";
export { getLastTurnMetrics, type TurnMetrics } from "./metrics";
export { createLogger, logger } from "./logging";
