/**
 * SynthesisGuard: one synthesizer call raced against a wall-clock timer.
 * Timeouts and errors come back as outcomes, never as rejections.
 */

import type { ITTS, SynthesizedSpeech, VoiceOptions } from "../adapters/tts";
import { errMessage, logger, logTtsCall } from "../logging";

export type SynthesisOutcome =
  | { success: true; speech: SynthesizedSpeech; elapsedMs: number }
  | { success: false; timedOut: boolean; error: string; elapsedMs: number };

export class SynthesisTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Synthesis timeout after ${(timeoutMs / 1000).toFixed(1)}s`);
    this.name = "SynthesisTimeoutError";
  }
}

type Settled = { kind: "done"; speech: SynthesizedSpeech } | { kind: "failed"; err: unknown } | { kind: "timeout" };

export class SynthesisGuard {
  /**
   * @param voice - Profile merged under any per-call override.
   */
  constructor(
    private readonly tts: ITTS,
    private readonly voice: VoiceOptions = {}
  ) {}

  /**
   * Resolves within `timeoutMs` plus timer latency. On timeout the adapter's signal is aborted;
   * an adapter that ignores it keeps running and its result is dropped.
   */
  async synthesizeWithTimeout(text: string, timeoutMs: number, voice?: VoiceOptions): Promise<SynthesisOutcome> {
    const startedAt = Date.now();
    const controller = new AbortController();
    let call: Promise<SynthesizedSpeech>;
    try {
      call = this.tts.synthesize(text, { ...this.voice, ...voice, signal: controller.signal });
    } catch (err) {
      return this.failed(err, startedAt, text.length);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<Settled>((resolve) => {
      timer = setTimeout(() => resolve({ kind: "timeout" }), Math.max(0, timeoutMs));
    });
    const settled = call.then(
      (speech): Settled => ({ kind: "done", speech }),
      (err: unknown): Settled => ({ kind: "failed", err })
    );

    let result: Settled;
    try {
      result = await Promise.race([settled, deadline]);
    } finally {
      clearTimeout(timer);
    }
    const elapsedMs = Date.now() - startedAt;

    if (result.kind === "timeout") {
      const timeoutErr = new SynthesisTimeoutError(timeoutMs);
      controller.abort(timeoutErr);
      void settled.then((late) => {
        logger.debug(
          { event: "TTS_LATE_RESULT", outcome: late.kind, afterMs: Date.now() - startedAt },
          "Synthesis finished after timeout; result discarded"
        );
      });
      logger.warn({ event: "TTS_TIMEOUT", timeoutMs, elapsedMs, textLength: text.length }, "TTS timed out");
      return { success: false, timedOut: true, error: timeoutErr.message, elapsedMs };
    }
    if (result.kind === "failed") return this.failed(result.err, startedAt, text.length);

    logTtsCall(logger, text.length, result.speech.audio.length, elapsedMs);
    return { success: true, speech: result.speech, elapsedMs };
  }

  private failed(err: unknown, startedAt: number, textLength: number): SynthesisOutcome {
    const elapsedMs = Date.now() - startedAt;
    logger.warn({ event: "TTS_FAILED", err: errMessage(err), elapsedMs, textLength }, "TTS failed");
    return { success: false, timedOut: false, error: errMessage(err), elapsedMs };
  }
}
