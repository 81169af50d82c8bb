/**
 * Azure Cognitive Services Text-to-Speech adapter (optional).
 * Uses REST API with subscription key.
 */

import type { ITTS, SynthesizedSpeech, SynthesizeOptions } from "./types";
import { azureLocale } from "./locale";
import { wavDurationSec } from "../../pipeline/audio-utils";

export interface AzureTTSConfig {
  key: string;
  region: string;
  voiceName?: string;
  languageCode?: string;
}

export class AzureTTS implements ITTS {
  constructor(private readonly config: AzureTTSConfig) {}

  async synthesize(text: string, options?: SynthesizeOptions): Promise<SynthesizedSpeech> {
    const voiceName = options?.voiceName ?? this.config.voiceName ?? "zh-HK-HiuMaanNeural";
    const lang = azureLocale(options?.languageCode ?? this.config.languageCode);
    const url = `https://${this.config.region}.tts.speech.microsoft.com/cognitiveservices/v1`;
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Ocp-Apim-Subscription-Key": this.config.key,
        "Content-Type": "application/ssml+xml",
        "X-Microsoft-OutputFormat": "riff-24khz-16bit-mono-pcm",
      },
      body: buildSsml(text, voiceName, lang, options?.speakingRate),
      signal: options?.signal,
    });
    if (!response.ok) throw new Error(`Azure TTS failed: ${response.status} ${response.statusText}`);
    const audio = Buffer.from(await response.arrayBuffer());
    return { audio, durationSec: wavDurationSec(audio), format: "wav" };
  }
}

export function buildSsml(text: string, voiceName: string, lang: string, speakingRate?: number): string {
  const body =
    speakingRate != null && speakingRate !== 1
      ? `<prosody rate='${speakingRate}'>${escapeXml(text)}</prosody>`
      : escapeXml(text);
  return `<speak version='1.0' xml:lang='${lang}'><voice name='${escapeXml(voiceName)}'>${body}</voice></speak>`;
}

function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
