/**
 * Unit tests for ResponseOrchestrator turn handling.
 */

import { ResponseOrchestrator, orchestratorConfigFrom, type OrchestratorConfig } from "../../../src/pipeline/orchestrator";
import { MemoryArtifactSink, type ArtifactSink } from "../../../src/delivery/artifacts";
import { VoiceOutputState } from "../../../src/voice/output-state";
import { MemoryStateStore } from "../../../src/voice/state-store";
import { getLastTurnMetrics } from "../../../src/metrics";
import type { PipelineCallbacks } from "../../../src/pipeline/types";
import { FakeASR, FakeTTS, makeConfig, never } from "../../helpers";

const ENABLED_ACK = "語音輸出已開啟";
const DISABLED_ACK = "語音輸出已關閉";

function baseConfig(overrides: Partial<OrchestratorConfig> = {}): OrchestratorConfig {
  return { ...orchestratorConfigFrom(makeConfig()), ...overrides };
}

function setup(
  options: {
    tts?: FakeTTS;
    asr?: FakeASR;
    artifacts?: ArtifactSink;
    config?: Partial<OrchestratorConfig>;
    callbacks?: PipelineCallbacks;
  } = {}
) {
  const tts = options.tts ?? new FakeTTS();
  const asr = options.asr ?? new FakeASR(async () => ({ text: "" }));
  const artifacts = options.artifacts ?? new MemoryArtifactSink();
  const state = new VoiceOutputState({ key: "session-1", store: new MemoryStateStore() });
  const orchestrator = new ResponseOrchestrator(asr, tts, state, artifacts, baseConfig(options.config), options.callbacks);
  return { tts, asr, artifacts, state, orchestrator };
}

describe("orchestratorConfigFrom", () => {
  it("converts seconds to milliseconds and carries the voice defaults", () => {
    const config = orchestratorConfigFrom(makeConfig({ timeoutSeconds: 2.5 }));
    expect(config.ttsTimeoutMs).toBe(2500);
    expect(config.truncationLimitChars).toBe(33);
    expect(config.voice).toEqual({ languageCode: "yue", speakingRate: undefined });
    expect(config.status).toEqual({ enabled: "語音輸出: 開啟", disabled: "語音輸出: 關閉" });
  });

  it("carries the recognition timeout from config", () => {
    const base = makeConfig();
    const config = orchestratorConfigFrom({ ...base, asr: { provider: "stub", timeoutMs: 1500 } });
    expect(config.timeouts).toEqual({ asrMs: 1500 });
  });
});

describe("ResponseOrchestrator.respond", () => {
  it("returns text only when voice output is disabled", async () => {
    const { orchestrator, tts } = setup();
    const result = await orchestrator.respond("你好");
    expect(result).toEqual({
      success: true,
      displayText: "你好",
      timedOut: false,
      truncated: false,
      action: "none",
      voiceEnabled: false,
    });
    expect(tts.calls).toHaveLength(0);
  });

  it("speaks a truncated prefix but displays the full text", async () => {
    const { orchestrator, state, tts } = setup();
    await state.set(true);
    const text = "測".repeat(80);
    const result = await orchestrator.respond(text);
    expect(result.success).toBe(true);
    expect(result.displayText).toBe(text);
    expect(result.audioText).toBe("測".repeat(32) + "…");
    expect(result.truncated).toBe(true);
    expect(result.audio).toEqual({ uri: "memory://voice/1", byteLength: 100, durationSec: 0.5, format: "wav" });
    expect(tts.calls[0].text).toBe("測".repeat(32) + "…");
  });

  it("keeps short replies whole", async () => {
    const { orchestrator, state } = setup();
    await state.set(true);
    const result = await orchestrator.respond("好的");
    expect(result.audioText).toBe("好的");
    expect(result.truncated).toBe(false);
  });

  it("delivers text when synthesis exceeds the timeout", async () => {
    const { orchestrator, state } = setup({ tts: new FakeTTS(() => never()), config: { ttsTimeoutMs: 100 } });
    await state.set(true);
    const started = Date.now();
    const result = await orchestrator.respond("這是一段回覆");
    expect(Date.now() - started).toBeLessThan(1000);
    expect(result).toMatchObject({
      success: true,
      displayText: "這是一段回覆",
      timedOut: true,
      error: "Synthesis timeout after 0.1s",
    });
    expect(result.audio).toBeUndefined();
  });

  it("reports a synthesizer failure without failing the turn", async () => {
    const tts = new FakeTTS(async () => { throw new Error("quota exceeded"); });
    const { orchestrator, state } = setup({ tts });
    await state.set(true);
    const result = await orchestrator.respond("你好");
    expect(result).toMatchObject({ success: true, displayText: "你好", timedOut: false, error: "quota exceeded" });
    expect(result.audio).toBeUndefined();
  });

  it("reports an artifact save failure without failing the turn", async () => {
    const artifacts: ArtifactSink = { save: async () => { throw new Error("disk full"); } };
    const { orchestrator, state } = setup({ artifacts });
    await state.set(true);
    const result = await orchestrator.respond("你好");
    expect(result).toMatchObject({ success: true, audioText: "你好", timedOut: false, error: "disk full" });
    expect(result.audio).toBeUndefined();
  });

  it("enables voice on the enable token and speaks the acknowledgement", async () => {
    const { orchestrator, state, tts } = setup();
    const result = await orchestrator.respond("（");
    expect(await state.get()).toBe(true);
    expect(result).toMatchObject({ success: true, action: "voice_enabled", voiceEnabled: true, displayText: ENABLED_ACK });
    expect(result.audio?.uri).toBe("memory://voice/1");
    expect(tts.calls.map((c) => c.text)).toEqual([ENABLED_ACK]);
  });

  it("accepts a token surrounded by whitespace", async () => {
    const { orchestrator, state } = setup();
    const result = await orchestrator.respond("  （\n");
    expect(result.action).toBe("voice_enabled");
    expect(await state.get()).toBe(true);
  });

  it("keeps the toggle when the acknowledgement cannot be synthesized", async () => {
    const { orchestrator, state } = setup({ tts: new FakeTTS(async () => { throw new Error("offline"); }) });
    const result = await orchestrator.respond("（");
    expect(result).toMatchObject({ success: true, action: "voice_enabled", voiceEnabled: true, error: "offline" });
    expect(result.audio).toBeUndefined();
    expect(await state.get()).toBe(true);
  });

  it("disables voice without calling the synthesizer", async () => {
    const { orchestrator, state, tts } = setup();
    await state.set(true);
    const result = await orchestrator.respond("）");
    expect(result).toEqual({
      success: true,
      displayText: DISABLED_ACK,
      timedOut: false,
      truncated: false,
      action: "voice_disabled",
      voiceEnabled: false,
    });
    expect(tts.calls).toHaveLength(0);
    expect(await state.get()).toBe(false);
  });

  it("treats a token inside a sentence as ordinary text", async () => {
    const { orchestrator, state } = setup();
    const result = await orchestrator.respond("（備註）請稍等");
    expect(result).toMatchObject({ action: "none", displayText: "（備註）請稍等", voiceEnabled: false });
    expect(await state.get()).toBe(false);
  });

  it("fails with missing_text on blank input", async () => {
    const { orchestrator, tts } = setup();
    const result = await orchestrator.respond("   ");
    expect(result).toEqual({
      success: false,
      displayText: "",
      timedOut: false,
      truncated: false,
      action: "none",
      voiceEnabled: false,
      error: "missing_text",
    });
    expect(tts.calls).toHaveLength(0);
  });

  it("speaks while disabled when forced, leaving the flag alone", async () => {
    const { orchestrator, tts } = setup();
    const result = await orchestrator.respond("你好", { force: true });
    expect(result.audio?.byteLength).toBe(100);
    expect(result.voiceEnabled).toBe(false);
    expect(tts.calls).toHaveLength(1);
  });

  it("passes the default and per-turn voice to the synthesizer", async () => {
    const { orchestrator, state, tts } = setup();
    await state.set(true);
    await orchestrator.respond("你好", { voice: { speakingRate: 1.5 } });
    expect(tts.calls[0].options).toMatchObject({ languageCode: "yue", speakingRate: 1.5 });
  });

  it("honours configured tokens and acknowledgements", async () => {
    const { orchestrator } = setup({
      config: { control: { enableToken: "/voice on", disableToken: "/voice off" }, ack: { enabled: "on", disabled: "off" } },
    });
    expect((await orchestrator.respond("/voice on")).displayText).toBe("on");
    expect((await orchestrator.respond("（")).action).toBe("none");
  });

  it("fires callbacks for replies and toggles", async () => {
    const onAgentReply = jest.fn();
    const onVoiceToggle = jest.fn();
    const { orchestrator } = setup({ callbacks: { onAgentReply, onVoiceToggle } });
    await orchestrator.respond("（");
    await orchestrator.respond("你好");
    expect(onVoiceToggle).toHaveBeenCalledWith(true);
    expect(onAgentReply).toHaveBeenCalledTimes(1);
    expect(onAgentReply).toHaveBeenCalledWith("你好");
  });

  it("records metrics for the turn", async () => {
    const { orchestrator, state } = setup();
    await state.set(true);
    await orchestrator.respond("測".repeat(40));
    expect(getLastTurnMetrics()).toMatchObject({
      sessionKey: "session-1",
      action: "none",
      voiceEnabled: true,
      truncated: true,
      timedOut: false,
      audioBytes: 100,
      textLength: 40,
      spokenLength: 33,
    });
  });
});

describe("ResponseOrchestrator.transcribe", () => {
  it("returns trimmed text and forwards the language hint", async () => {
    const asr = new FakeASR(async () => ({ text: " 你好 ", language: "yue", confidence: 0.9, durationSec: 1.2 }));
    const onUserTranscript = jest.fn();
    const { orchestrator } = setup({ asr, callbacks: { onUserTranscript } });
    const result = await orchestrator.transcribe(Buffer.from("audio"), { format: "wav" });
    expect(result).toEqual({
      success: true,
      text: "你好",
      language: "yue",
      confidence: 0.9,
      durationSec: 1.2,
      action: "none",
      voiceEnabled: false,
    });
    expect(asr.calls[0].options).toEqual({ languageHint: "yue", format: "wav" });
    expect(onUserTranscript).toHaveBeenCalledWith("你好");
  });

  it("applies a spoken control token and returns empty text", async () => {
    const asr = new FakeASR(async () => ({ text: "（" }));
    const { orchestrator, state } = setup({ asr });
    const result = await orchestrator.transcribe(Buffer.from("audio"));
    expect(result).toMatchObject({ success: true, text: "", action: "voice_enabled", voiceEnabled: true });
    expect(await state.get()).toBe(true);
  });

  it("returns a failure when recognition throws", async () => {
    const asr = new FakeASR(async () => { throw new Error("bad audio"); });
    const { orchestrator } = setup({ asr });
    const result = await orchestrator.transcribe(Buffer.from("audio"));
    expect(result).toEqual({
      success: false,
      text: "",
      durationSec: 0,
      action: "none",
      voiceEnabled: false,
      error: "bad audio",
    });
  });

  it("bounds recognition with the configured timeout", async () => {
    const config = orchestratorConfigFrom({ ...makeConfig(), asr: { provider: "stub", timeoutMs: 20 } });
    const { orchestrator } = setup({ asr: new FakeASR(() => never()), config });
    const result = await orchestrator.transcribe(Buffer.from("audio"));
    expect(result.error).toBe("ASR timed out after 20ms");
  });
});

describe("ResponseOrchestrator.conversationTurn", () => {
  it("transcribes, asks for a reply, then responds", async () => {
    const asr = new FakeASR(async () => ({ text: "今日天氣點樣" }));
    const reply = jest.fn(async (transcript: string) => `你問：${transcript}`);
    const { orchestrator } = setup({ asr });
    const turn = await orchestrator.conversationTurn(Buffer.from("audio"), reply);
    expect(reply).toHaveBeenCalledWith("今日天氣點樣");
    expect(turn.success).toBe(true);
    expect(turn.response?.displayText).toBe("你問：今日天氣點樣");
  });

  it("does not ask for a reply when nothing was heard", async () => {
    const reply = jest.fn(async () => "unused");
    const { orchestrator } = setup({ asr: new FakeASR(async () => ({ text: "  " })) });
    const turn = await orchestrator.conversationTurn(Buffer.from("audio"), reply);
    expect(turn).toMatchObject({ success: false, error: "empty_transcript" });
    expect(reply).not.toHaveBeenCalled();
  });

  it("stops after a spoken control token", async () => {
    const reply = jest.fn(async () => "unused");
    const { orchestrator } = setup({ asr: new FakeASR(async () => ({ text: "（" })) });
    const turn = await orchestrator.conversationTurn(Buffer.from("audio"), reply);
    expect(turn.success).toBe(true);
    expect(turn.response).toBeUndefined();
    expect(turn.transcription.action).toBe("voice_enabled");
    expect(reply).not.toHaveBeenCalled();
  });

  it("reports a failing reply function", async () => {
    const { orchestrator } = setup({ asr: new FakeASR(async () => ({ text: "你好" })) });
    const turn = await orchestrator.conversationTurn(Buffer.from("audio"), async () => {
      throw new Error("agent offline");
    });
    expect(turn).toMatchObject({ success: false, error: "agent offline" });
  });

  it("accepts a fixed reply string", async () => {
    const { orchestrator } = setup({ asr: new FakeASR(async () => ({ text: "你好" })) });
    const turn = await orchestrator.conversationTurn(Buffer.from("audio"), "收到");
    expect(turn.response?.displayText).toBe("收到");
  });
});

describe("ResponseOrchestrator voice controls", () => {
  it("reports status with the configured lines", async () => {
    const { orchestrator } = setup({ config: { status: { enabled: "voice: on", disabled: "voice: off" } } });
    expect(await orchestrator.statusInfo()).toBe("voice: off");
    await orchestrator.enableVoice();
    expect(await orchestrator.statusInfo()).toBe("voice: on");
  });

  it("enables, toggles and reports status", async () => {
    const onVoiceToggle = jest.fn();
    const { orchestrator } = setup({ callbacks: { onVoiceToggle } });
    await orchestrator.enableVoice();
    expect(await orchestrator.isVoiceEnabled()).toBe(true);
    expect(await orchestrator.toggleVoice()).toBe(false);
    expect(await orchestrator.statusInfo()).toBe("語音輸出: 關閉");
    await orchestrator.disableVoice();
    expect(onVoiceToggle.mock.calls).toEqual([[true], [false], [false]]);
  });
});
