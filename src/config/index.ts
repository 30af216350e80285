/**
 * Env-based configuration for the voice service.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export const VAD_PROVIDERS = ["energy", "webrtc", "remote", "stub"] as const;
export const ASR_PROVIDERS = ["openai", "stub"] as const;
export const TTS_PROVIDERS = ["azure", "stub"] as const;

export type VadProvider = (typeof VAD_PROVIDERS)[number];
export type AsrProvider = (typeof ASR_PROVIDERS)[number];
export type TtsProvider = (typeof TTS_PROVIDERS)[number];

/** Tuning shared by every session; thresholds are per-call defaults. */
export interface VadTuning {
  /** Sample rate assumed when a request does not name one. */
  sampleRate: number;
  /** High threshold: a frame at or above it counts as voiced. */
  threshold: number;
  /** Low threshold: a frame at or below it counts as silence. */
  thresholdLow: number;
  /** Hysteresis window length (frames). */
  windowSize: number;
  /** Voiced frames within the window needed to confirm voice. */
  minVoicedFrames: number;
  /** Consecutive silent frames that end an utterance (16 x 60ms ~ 1s). */
  silenceFrames: number;
}

export interface AppConfig {
  server: {
    host: string;
    port: number;
    /** Largest accepted JSON body. */
    maxBodyBytes: number;
  };

  /** Frame classifier backend and session tuning */
  vad: VadTuning & {
    provider: VadProvider;
    /** webrtcvad aggressiveness 0-3 (0 = least aggressive). */
    webrtcMode: number;
    /** webrtcvad sub-frame length; the native module accepts 10, 20 or 30 ms. */
    webrtcFrameMs: number;
    /** RMS (16-bit scale) at which the energy classifier reports p = 0.5. */
    energyRms: number;
    /** Base URL of a remote inference sidecar (POST /classify, GET /health). */
    remoteUrl?: string;
    remoteTimeoutMs: number;
    /** Whether the sidecar tolerates concurrent calls; when false calls are serialized. */
    remoteConcurrent: boolean;
  };

  /** ASR (speech-to-text) provider and options */
  asr: {
    provider: AsrProvider;
    openaiApiKey?: string;
    openaiModel: string;
    defaultLanguage: string;
  };

  /** TTS (text-to-speech) provider and options */
  tts: {
    provider: TtsProvider;
    azureKey?: string;
    azureRegion?: string;
    defaultVoice: string;
    /** Locales kept when listing voices. */
    voiceLocales: string[];
    maxVoices: number;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getEnvInt(key: string, defaultValue: number, min = Number.MIN_SAFE_INTEGER, max = Number.MAX_SAFE_INTEGER): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < min || n > max ? defaultValue : n;
}

function getEnvProbability(key: string, defaultValue: number): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = Number(v);
  return Number.isFinite(n) && n >= 0 && n <= 1 ? n : defaultValue;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
  const v = getEnv(key)?.toLowerCase();
  if (v === undefined) return defaultValue;
  return v === "1" || v === "true" || v === "yes";
}

function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const v = getEnv(key)?.toLowerCase();
  return choices.find((c) => c === v) ?? defaultValue;
}

function getEnvList(key: string, defaultValue: string[]): string[] {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const items = v.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
  return items.length > 0 ? items : defaultValue;
}

/**
 * Build config from environment variables.
 * VAD_PROVIDER, ASR_PROVIDER, TTS_PROVIDER select adapters; unknown values fall back to defaults.
 */
export function loadConfig(): AppConfig {
  const threshold = getEnvProbability("VAD_THRESHOLD", 0.5);
  const thresholdLow = getEnvProbability("VAD_THRESHOLD_LOW", 0.15);
  const windowSize = getEnvInt("VAD_WINDOW_SIZE", 5, 1, 100);
  const minVoicedFrames = getEnvInt("VAD_MIN_VOICED_FRAMES", 3, 1, 100);
  const webrtcFrameMs = getEnvInt("VAD_WEBRTC_FRAME_MS", 20);

  return {
    server: {
      host: getEnv("HOST") || "127.0.0.1",
      port: getEnvInt("PORT", 8765, 0, 65535),
      maxBodyBytes: getEnvInt("MAX_BODY_BYTES", 10 * 1024 * 1024, 1024),
    },
    vad: {
      provider: getEnvChoice("VAD_PROVIDER", VAD_PROVIDERS, "webrtc"),
      sampleRate: getEnvInt("VAD_SAMPLE_RATE", 16000, 1),
      threshold,
      thresholdLow: thresholdLow <= threshold ? thresholdLow : threshold,
      windowSize,
      minVoicedFrames: Math.min(minVoicedFrames, windowSize),
      silenceFrames: getEnvInt("VAD_SILENCE_FRAMES", 16, 1),
      webrtcMode: getEnvInt("VAD_WEBRTC_MODE", 1, 0, 3),
      webrtcFrameMs: [10, 20, 30].includes(webrtcFrameMs) ? webrtcFrameMs : 20,
      energyRms: getEnvInt("VAD_ENERGY_RMS", 500, 1, 32767),
      remoteUrl: getEnv("VAD_REMOTE_URL"),
      remoteTimeoutMs: getEnvInt("VAD_REMOTE_TIMEOUT_MS", 2000, 1),
      remoteConcurrent: getEnvBool("VAD_REMOTE_CONCURRENT", false),
    },
    asr: {
      provider: getEnvChoice("ASR_PROVIDER", ASR_PROVIDERS, "openai"),
      openaiApiKey: getEnv("OPENAI_API_KEY"),
      openaiModel: getEnv("ASR_OPENAI_MODEL") || "whisper-1",
      defaultLanguage: getEnv("ASR_DEFAULT_LANGUAGE") || "zh",
    },
    tts: {
      provider: getEnvChoice("TTS_PROVIDER", TTS_PROVIDERS, "azure"),
      azureKey: getEnv("AZURE_TTS_KEY"),
      azureRegion: getEnv("AZURE_TTS_REGION"),
      defaultVoice: getEnv("TTS_DEFAULT_VOICE") || "zh-CN-XiaoxiaoNeural",
      voiceLocales: getEnvList("TTS_VOICE_LOCALES", ["zh-CN", "en-US"]),
      maxVoices: getEnvInt("TTS_MAX_VOICES", 20, 1),
    },
  };
}
