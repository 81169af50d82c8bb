/**
 * Shared fakes for unit and integration tests.
 */

import type { AppConfig } from "../src/config";
import type { IASR, RecognizeOptions, TranscriptResult } from "../src/adapters/asr";
import type { ITTS, SynthesizedSpeech, SynthesizeOptions } from "../src/adapters/tts";
import type { StateStore, VoiceOutputRecord } from "../src/voice/state-store";

export function speechOf(bytes: number, durationSec = 0.5): SynthesizedSpeech {
  return { audio: Buffer.alloc(bytes), durationSec, format: "wav" };
}

type SynthImpl = (text: string, options?: SynthesizeOptions) => Promise<SynthesizedSpeech>;

export class FakeTTS implements ITTS {
  readonly calls: Array<{ text: string; options?: SynthesizeOptions }> = [];

  constructor(private readonly impl: SynthImpl = async () => speechOf(100)) {}

  synthesize(text: string, options?: SynthesizeOptions): Promise<SynthesizedSpeech> {
    this.calls.push({ text, options });
    return this.impl(text, options);
  }
}

export class FakeASR implements IASR {
  readonly calls: Array<{ audio: Buffer; options?: RecognizeOptions }> = [];

  constructor(private readonly impl: () => Promise<TranscriptResult>) {}

  recognize(audio: Buffer, options?: RecognizeOptions): Promise<TranscriptResult> {
    this.calls.push({ audio, options });
    return this.impl();
  }
}

/** A store whose reads and/or writes fail. */
export class BrokenStateStore implements StateStore {
  writes = 0;

  constructor(
    private readonly failReads: boolean,
    private readonly failWrites: boolean
  ) {}

  async read(): Promise<VoiceOutputRecord | undefined> {
    if (this.failReads) throw new Error("disk unreadable");
    return undefined;
  }

  async write(): Promise<void> {
    this.writes++;
    if (this.failWrites) throw new Error("disk full");
  }
}

/** Never settles; for timeout tests. */
export function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Let queued promise callbacks run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function makeConfig(overrides: Partial<AppConfig["voice"]> = {}): AppConfig {
  return {
    voice: {
      timeoutSeconds: 50,
      truncationLimitChars: 33,
      truncationMarker: "…",
      defaultLanguage: "yue",
      control: { enableToken: "（", disableToken: "）", match: "exact" },
      ack: { enabled: "語音輸出已開啟", disabled: "語音輸出已關閉" },
      status: { enabled: "語音輸出: 開啟", disabled: "語音輸出: 關閉" },
      stateDir: ".voice-state",
      outputDir: "voice-output",
      ...overrides,
    },
    asr: { provider: "stub" },
    tts: { provider: "stub" },
  };
}
