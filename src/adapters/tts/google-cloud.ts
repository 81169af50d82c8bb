/**
 * Google Cloud Text-to-Speech adapter.
 * - With API key: REST API (env Google_Cloud_TTS_API_KEY or GOOGLE_CLOUD_TTS_API_KEY).
 * - Without API key: @google-cloud/text-to-speech client using Application Default
 *   Credentials (GOOGLE_APPLICATION_CREDENTIALS service account JSON), which avoids 401
 *   when the project does not allow API keys for TTS.
 */

import { TextToSpeechClient, protos } from "@google-cloud/text-to-speech";
import type { ITTS, SynthesizedSpeech, SynthesizeOptions } from "./types";
import { googleLocale } from "./locale";
import { wavDurationSec } from "../../pipeline/audio-utils";

type AudioConfig = protos.google.cloud.texttospeech.v1.IAudioConfig;

export interface GoogleCloudTTSConfig {
  apiKey: string;
  voiceName?: string;
  languageCode?: string;
}

const SYNTHESIZE_URL = "https://texttospeech.googleapis.com/v1/text:synthesize";
const DEFAULT_SAMPLE_RATE = 24000;

function buildAudioConfig(options?: SynthesizeOptions): AudioConfig {
  // LINEAR16 responses carry a WAV header.
  const audioConfig: AudioConfig = {
    audioEncoding: "LINEAR16",
    sampleRateHertz: options?.sampleRateHz ?? DEFAULT_SAMPLE_RATE,
  };
  if (options?.speakingRate != null) audioConfig.speakingRate = options.speakingRate;
  return audioConfig;
}

function toSpeech(audio: Buffer): SynthesizedSpeech {
  return { audio, durationSec: wavDurationSec(audio), format: "wav" };
}

/** TTS using REST API with API key. */
export class GoogleCloudTTS implements ITTS {
  constructor(private readonly config: GoogleCloudTTSConfig) {}

  async synthesize(text: string, options?: SynthesizeOptions): Promise<SynthesizedSpeech> {
    const languageCode = googleLocale(options?.languageCode ?? this.config.languageCode);
    const voice: { languageCode: string; name?: string } = { languageCode };
    const voiceName = options?.voiceName ?? this.config.voiceName;
    if (voiceName) voice.name = voiceName;
    const url = `${SYNTHESIZE_URL}?key=${encodeURIComponent(this.config.apiKey)}`;
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ input: { text }, voice, audioConfig: buildAudioConfig(options) }),
      signal: options?.signal,
    });
    if (!response.ok) {
      const errText = await response.text();
      throw new Error(`Google TTS failed: ${response.status} ${errText}`);
    }
    const data: unknown = await response.json();
    const b64 =
      typeof data === "object" && data !== null && "audioContent" in data && typeof data.audioContent === "string"
        ? data.audioContent
        : "";
    if (!b64) throw new Error("Google TTS failed: empty audioContent");
    return toSpeech(Buffer.from(b64, "base64"));
  }
}

/** TTS using official Node client and Application Default Credentials (OAuth2 / service account). */
export interface GoogleCloudTTSADCConfig {
  voiceName?: string;
  languageCode?: string;
}

export class GoogleCloudTTSADC implements ITTS {
  private readonly client: TextToSpeechClient;
  constructor(private readonly config: GoogleCloudTTSADCConfig = {}) {
    this.client = new TextToSpeechClient();
  }

  /** The gRPC client takes no AbortSignal; a timed-out call finishes in the background and is discarded. */
  async synthesize(text: string, options?: SynthesizeOptions): Promise<SynthesizedSpeech> {
    const languageCode = googleLocale(options?.languageCode ?? this.config.languageCode);
    const voiceName = options?.voiceName ?? this.config.voiceName;
    const [response] = await this.client.synthesizeSpeech({
      input: { text },
      voice: voiceName ? { name: voiceName, languageCode } : { languageCode },
      audioConfig: buildAudioConfig(options),
    });
    const content = response.audioContent;
    if (!content || !(content instanceof Uint8Array)) {
      throw new Error("Google TTS failed: empty audioContent");
    }
    return toSpeech(Buffer.from(content));
  }
}
