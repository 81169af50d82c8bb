/**
 * Env-based configuration for the voice reply broker.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type AsrProvider = "openai" | "stub";
export type TtsProvider = "google" | "azure" | "stub";
export type ControlMatchMode = "exact" | "repeated";

const ASR_PROVIDERS: readonly AsrProvider[] = ["openai", "stub"];
const TTS_PROVIDERS: readonly TtsProvider[] = ["google", "azure", "stub"];
const CONTROL_MATCH_MODES: readonly ControlMatchMode[] = ["exact", "repeated"];

export const DEFAULT_TIMEOUT_SECONDS = 50;
export const DEFAULT_ASR_TIMEOUT_MS = 20_000;
export const DEFAULT_TRUNCATION_LIMIT_CHARS = 33;
export const DEFAULT_TRUNCATION_MARKER = "…";
export const DEFAULT_LANGUAGE = "yue";
export const DEFAULT_ENABLE_TOKEN = "（";
export const DEFAULT_DISABLE_TOKEN = "）";
export const DEFAULT_ENABLED_ACK = "語音輸出已開啟";
export const DEFAULT_DISABLED_ACK = "語音輸出已關閉";
export const DEFAULT_ENABLED_STATUS = "語音輸出: 開啟";
export const DEFAULT_DISABLED_STATUS = "語音輸出: 關閉";

export interface ControlTokenConfig {
  enableToken: string;
  disableToken: string;
  /** exact = trimmed input equals the token; repeated = trimmed input is one or more copies of it. */
  match: ControlMatchMode;
}

export interface VoiceConfig {
  /** Hard bound on one synthesizer call. */
  timeoutSeconds: number;
  /** Max graphemes handed to the synthesizer (marker included). */
  truncationLimitChars: number;
  truncationMarker: string;
  /** Language hint for recognition and synthesis (e.g. yue, en). */
  defaultLanguage: string;
  control: ControlTokenConfig;
  /** Acknowledgements shown (and, when enabling, spoken) on a control turn. */
  ack: { enabled: string; disabled: string };
  /** Status line reported for each value of the flag. */
  status: { enabled: string; disabled: string };
  /** Directory holding one toggle record per session. */
  stateDir: string;
  /** Directory receiving synthesized audio files. */
  outputDir: string;
}

export interface AppConfig {
  voice: VoiceConfig;

  /** ASR (speech-to-text) provider and options */
  asr: {
    provider: AsrProvider;
    openaiApiKey?: string;
    openaiModel?: string;
    /** Initial prompt biasing recognition toward the expected language/register. */
    prompt?: string;
    /** Bound on one recognition call (ms). */
    timeoutMs?: number;
  };

  /** TTS (text-to-speech) provider and options */
  tts: {
    provider: TtsProvider;
    googleApiKey?: string;
    googleVoiceName?: string;
    azureKey?: string;
    azureRegion?: string;
    azureVoiceName?: string;
    speakingRate?: number;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function pickOne<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const found = allowed.find((a) => a === value?.toLowerCase());
  return found ?? fallback;
}

function getPositiveNumber(key: string, fallback: number): number {
  const v = getEnv(key);
  if (v === undefined) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function getPositiveInt(key: string, fallback: number): number {
  const v = getEnv(key);
  if (v === undefined) return fallback;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < 1 ? fallback : n;
}

/** Reject settings the orchestrator cannot work with. */
export function validateConfig(config: AppConfig): AppConfig {
  const { control } = config.voice;
  if (!control.enableToken || !control.disableToken) {
    throw new Error("Invalid config: control tokens must be non-empty");
  }
  if (control.enableToken === control.disableToken) {
    throw new Error("Invalid config: VOICE_ENABLE_TOKEN and VOICE_DISABLE_TOKEN must differ");
  }
  if (!(config.voice.timeoutSeconds > 0)) {
    throw new Error("Invalid config: VOICE_TTS_TIMEOUT_SECONDS must be positive");
  }
  if (!Number.isInteger(config.voice.truncationLimitChars) || config.voice.truncationLimitChars < 1) {
    throw new Error("Invalid config: VOICE_TRUNCATION_LIMIT_CHARS must be a positive integer");
  }
  return config;
}

/**
 * Build config from environment variables.
 * ASR_PROVIDER and TTS_PROVIDER select adapters (openai, google, azure, stub).
 */
export function loadConfig(): AppConfig {
  const speakingRate = getEnv("VOICE_SPEAKING_RATE");
  const parsedRate = speakingRate === undefined ? undefined : Number(speakingRate);

  return validateConfig({
    voice: {
      timeoutSeconds: getPositiveNumber("VOICE_TTS_TIMEOUT_SECONDS", DEFAULT_TIMEOUT_SECONDS),
      truncationLimitChars: getPositiveInt("VOICE_TRUNCATION_LIMIT_CHARS", DEFAULT_TRUNCATION_LIMIT_CHARS),
      // Not trimmed: a marker may legitimately start with a space.
      truncationMarker: process.env.VOICE_TRUNCATION_MARKER ?? DEFAULT_TRUNCATION_MARKER,
      defaultLanguage: getEnv("VOICE_DEFAULT_LANGUAGE") || DEFAULT_LANGUAGE,
      control: {
        enableToken: getEnv("VOICE_ENABLE_TOKEN") || DEFAULT_ENABLE_TOKEN,
        disableToken: getEnv("VOICE_DISABLE_TOKEN") || DEFAULT_DISABLE_TOKEN,
        match: pickOne(getEnv("VOICE_CONTROL_MATCH"), CONTROL_MATCH_MODES, "exact"),
      },
      ack: {
        enabled: getEnv("VOICE_ENABLED_ACK") || DEFAULT_ENABLED_ACK,
        disabled: getEnv("VOICE_DISABLED_ACK") || DEFAULT_DISABLED_ACK,
      },
      status: {
        enabled: getEnv("VOICE_STATUS_ENABLED") || DEFAULT_ENABLED_STATUS,
        disabled: getEnv("VOICE_STATUS_DISABLED") || DEFAULT_DISABLED_STATUS,
      },
      stateDir: path.resolve(getEnv("VOICE_STATE_DIR") || ".voice-state"),
      outputDir: path.resolve(getEnv("VOICE_OUTPUT_DIR") || "voice-output"),
    },
    asr: {
      provider: pickOne(getEnv("ASR_PROVIDER"), ASR_PROVIDERS, "openai"),
      openaiApiKey: getEnv("OPENAI_API_KEY"),
      openaiModel: getEnv("OPENAI_ASR_MODEL") || "whisper-1",
      prompt: getEnv("ASR_PROMPT"),
      timeoutMs: getPositiveInt("ASR_TIMEOUT_MS", DEFAULT_ASR_TIMEOUT_MS),
    },
    tts: {
      provider: pickOne(getEnv("TTS_PROVIDER"), TTS_PROVIDERS, "google"),
      googleApiKey: getEnv("Google_Cloud_TTS_API_KEY") || getEnv("GOOGLE_CLOUD_TTS_API_KEY"),
      googleVoiceName: getEnv("GOOGLE_TTS_VOICE_NAME"),
      azureKey: getEnv("AZURE_TTS_KEY"),
      azureRegion: getEnv("AZURE_TTS_REGION"),
      azureVoiceName: getEnv("AZURE_TTS_VOICE_NAME"),
      speakingRate: parsedRate !== undefined && Number.isFinite(parsedRate) && parsedRate > 0 ? parsedRate : undefined,
    },
  });
}
