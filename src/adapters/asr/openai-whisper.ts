/**
 * OpenAI Whisper API ASR adapter.
 */

import OpenAI, { toFile } from "openai";
import type { IASR, RecognizeOptions, TranscriptResult, TranscriptSegment } from "./types";

export interface OpenAIWhisperConfig {
  apiKey: string;
  model?: string;
  /** Initial prompt; helps the model stay in the expected language (e.g. Cantonese). */
  prompt?: string;
}

/** Whisper takes ISO-639-1 codes; Cantonese (yue) is recognized under zh. */
export function toWhisperLanguage(hint: string | undefined): string | undefined {
  if (!hint) return undefined;
  const base = hint.split("-")[0].toLowerCase();
  if (base === "yue") return "zh";
  return base.length === 2 ? base : undefined;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

/** Pull the fields we use out of a verbose_json transcription. */
export function parseVerboseTranscription(raw: unknown): TranscriptResult {
  if (!isRecord(raw)) return { text: "" };
  const text = typeof raw.text === "string" ? raw.text.trim() : "";
  const language = typeof raw.language === "string" ? raw.language : undefined;
  const durationSec = typeof raw.duration === "number" ? raw.duration : undefined;
  const segments: TranscriptSegment[] = [];
  const logprobs: number[] = [];
  if (Array.isArray(raw.segments)) {
    for (const seg of raw.segments) {
      if (!isRecord(seg)) continue;
      if (typeof seg.start !== "number" || typeof seg.end !== "number" || typeof seg.text !== "string") continue;
      segments.push({ start: seg.start, end: seg.end, text: seg.text.trim() });
      if (typeof seg.avg_logprob === "number") logprobs.push(seg.avg_logprob);
    }
  }
  const confidence =
    logprobs.length > 0 ? Math.exp(logprobs.reduce((a, b) => a + b, 0) / logprobs.length) : undefined;
  return { text, language, durationSec, segments, confidence };
}

export class OpenAIWhisperASR implements IASR {
  private client: OpenAI;

  constructor(private readonly config: OpenAIWhisperConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
  }

  async recognize(audio: Buffer, options?: RecognizeOptions): Promise<TranscriptResult> {
    const ext = options?.format ?? "wav";
    const file = await toFile(audio, `speech.${ext}`);
    const language = toWhisperLanguage(options?.languageHint);
    const raw: unknown = await this.client.audio.transcriptions.create({
      file,
      model: this.config.model ?? "whisper-1",
      response_format: "verbose_json",
      ...(language ? { language } : {}),
      ...(this.config.prompt ? { prompt: this.config.prompt } : {}),
    });
    return parseVerboseTranscription(raw);
  }
}
