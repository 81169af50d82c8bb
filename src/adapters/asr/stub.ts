/**
 * Stub ASR adapter for testing or when no provider is configured.
 * Returns empty transcript.
 */

import type { IASR, RecognizeOptions, TranscriptResult } from "./types";

export class StubASR implements IASR {
  async recognize(_audio: Buffer, options?: RecognizeOptions): Promise<TranscriptResult> {
    return { text: "", language: options?.languageHint, durationSec: 0 };
  }
}
