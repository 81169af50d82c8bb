/**
 * TTS (Text-to-Speech) adapter types.
 * Implementations can be swapped via config (e.g. Google Cloud, Azure, stub).
 */

export interface VoiceOptions {
  /** Voice name or id (provider-specific). */
  voiceName?: string;
  /** Language code (e.g. yue-HK, en-US). */
  languageCode?: string;
  /** Sample rate in Hz. */
  sampleRateHz?: number;
  /** Optional speaking rate (1.0 = normal). */
  speakingRate?: number;
}

export interface SynthesizeOptions extends VoiceOptions {
  /**
   * Fires when the caller stops waiting (e.g. SynthesisGuard timeout).
   * Adapters should forward it to their HTTP client; ignoring it is allowed, the result is then discarded.
   */
  signal?: AbortSignal;
}

export type AudioFormat = "wav" | "pcm";

/** One complete utterance. */
export interface SynthesizedSpeech {
  audio: Buffer;
  /** Playback length in seconds (0 when unknown). */
  durationSec: number;
  format: AudioFormat;
}

/**
 * TTS adapter interface: text in, one audio buffer out.
 * Only called through SynthesisGuard, which bounds the wait.
 */
export interface ITTS {
  synthesize(text: string, options?: SynthesizeOptions): Promise<SynthesizedSpeech>;
}
