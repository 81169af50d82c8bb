/**
 * Stub TTS adapter for testing or when no provider is configured.
 * Returns an empty WAV (silence, zero duration).
 */

import type { ITTS, SynthesizedSpeech, SynthesizeOptions } from "./types";
import { pcmToWav } from "../../pipeline/audio-utils";

export class StubTTS implements ITTS {
  async synthesize(_text: string, options?: SynthesizeOptions): Promise<SynthesizedSpeech> {
    return {
      audio: pcmToWav(Buffer.alloc(0), options?.sampleRateHz ?? 24000),
      durationSec: 0,
      format: "wav",
    };
  }
}
