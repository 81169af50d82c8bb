/**
 * ASR (Automatic Speech Recognition) adapter types.
 * Implementations can be swapped via config (e.g. OpenAI Whisper, stub).
 */

export interface TranscriptSegment {
  /** Seconds from start of audio. */
  start: number;
  end: number;
  text: string;
}

export interface TranscriptResult {
  /** Transcribed text. */
  text: string;
  /** Optional language code reported by the provider. */
  language?: string;
  /** Optional 0..1 confidence, when the provider exposes one. */
  confidence?: number;
  /** Length of the recognized audio in seconds. */
  durationSec?: number;
  segments?: TranscriptSegment[];
}

export interface RecognizeOptions {
  /** Language hint (e.g. yue, en). Providers may map or ignore it. */
  languageHint?: string;
  /** Container hint (e.g. "wav", "ogg", "webm"). Provider-dependent. */
  format?: string;
}

/**
 * ASR adapter interface: audio buffer in, transcript out.
 */
export interface IASR {
  /**
   * Recognize speech in a complete audio clip.
   * @param audio - Encoded audio bytes (wav, ogg, ...).
   */
  recognize(audio: Buffer, options?: RecognizeOptions): Promise<TranscriptResult>;
}
