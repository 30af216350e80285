/**
 * TTS (Text-to-Speech) adapter types.
 * Implementations can be swapped via config (e.g. Azure Speech, stub).
 */

import { InvalidRequestError } from "../../errors";

/** Prosody parameters use SSML notation: rate/volume "+10%", pitch "-5Hz". */
export interface VoiceOptions {
  /** Voice short name (e.g. zh-CN-XiaoxiaoNeural). */
  voice: string;
  rate: string;
  pitch: string;
  volume: string;
}

export interface VoiceInfo {
  name: string;
  locale: string;
  gender: string;
  description: string;
}

/**
 * Voice catalogue lookup result. An empty list is a success; a provider failure is not
 * collapsed into one.
 */
export type VoiceListResult = { ok: true; voices: VoiceInfo[] } | { ok: false; error: string };

export interface VoiceListOptions {
  /** Keep voices whose locale is one of these (e.g. zh-CN, en-US). */
  locales?: string[];
  limit?: number;
}

/**
 * TTS adapter interface: text in, audio out (mp3).
 * Prefer streaming (synthesizeStream) when the provider supports it for lower latency.
 */
export interface ITTS {
  readonly name: string;
  synthesize(text: string, options: VoiceOptions): Promise<Buffer>;

  /**
   * Optional: yield audio chunks as the provider produces them.
   * Adapters that do not support this omit it; callers fall back to synthesize().
   */
  synthesizeStream?(text: string, options: VoiceOptions): AsyncIterable<Buffer>;

  listVoices(options?: VoiceListOptions): Promise<VoiceListResult>;
}

const PERCENT_RE = /^[+-]\d+%$/;
const HERTZ_RE = /^[+-]\d+Hz$/;

export const DEFAULT_PROSODY = { rate: "+0%", pitch: "+0Hz", volume: "+0%" } as const;

/** Fill prosody defaults and reject malformed values before they reach SSML. */
export function resolveVoiceOptions(input: Partial<VoiceOptions>, defaultVoice: string): VoiceOptions {
  const options: VoiceOptions = {
    voice: input.voice?.trim() || defaultVoice,
    rate: input.rate ?? DEFAULT_PROSODY.rate,
    pitch: input.pitch ?? DEFAULT_PROSODY.pitch,
    volume: input.volume ?? DEFAULT_PROSODY.volume,
  };
  if (!PERCENT_RE.test(options.rate)) throw new InvalidRequestError(`Invalid rate '${options.rate}' (expected e.g. +0%)`);
  if (!HERTZ_RE.test(options.pitch)) throw new InvalidRequestError(`Invalid pitch '${options.pitch}' (expected e.g. +0Hz)`);
  if (!PERCENT_RE.test(options.volume)) throw new InvalidRequestError(`Invalid volume '${options.volume}' (expected e.g. +0%)`);
  if (!/^[A-Za-z0-9-]+$/.test(options.voice)) throw new InvalidRequestError(`Invalid voice '${options.voice}'`);
  return options;
}

/**
 * Normalize TTS output to an async iterable of buffers for uniform consumption.
 */
export async function* ttsToStream(tts: ITTS, text: string, options: VoiceOptions): AsyncIterable<Buffer> {
  if (tts.synthesizeStream) {
    yield* tts.synthesizeStream(text, options);
    return;
  }
  yield await tts.synthesize(text, options);
}
