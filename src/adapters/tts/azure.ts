/**
 * Azure Cognitive Services Text-to-Speech adapter.
 * Uses REST API with subscription key; voices are the same Neural voices Edge exposes
 * (e.g. zh-CN-XiaoxiaoNeural), prosody goes through SSML.
 */

import { UpstreamFailureError, toError } from "../../errors";
import type { ITTS, VoiceInfo, VoiceListOptions, VoiceListResult, VoiceOptions } from "./types";

export interface AzureTTSConfig {
  key: string;
  region: string;
  /** X-Microsoft-OutputFormat; default 24kHz mono mp3. */
  outputFormat?: string;
}

const DEFAULT_OUTPUT_FORMAT = "audio-24khz-48kbitrate-mono-mp3";

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Locale is the first two dash-separated parts of the voice short name. */
function localeOf(voice: string): string {
  return voice.split("-").slice(0, 2).join("-");
}

export function buildSsml(text: string, options: VoiceOptions): string {
  return (
    `<speak version='1.0' xmlns='http://www.w3.org/2001/10/synthesis' xml:lang='${localeOf(options.voice)}'>` +
    `<voice name='${options.voice}'>` +
    `<prosody rate='${options.rate}' pitch='${options.pitch}' volume='${options.volume}'>${escapeXml(text)}</prosody>` +
    `</voice></speak>`
  );
}

function toVoiceInfo(entry: unknown): VoiceInfo | null {
  if (typeof entry !== "object" || entry === null) return null;
  const record = new Map<string, unknown>(Object.entries(entry));
  const field = (key: string): string => {
    const value = record.get(key);
    return typeof value === "string" ? value : "";
  };
  const name = field("ShortName");
  const locale = field("Locale");
  if (!name || !locale) return null;
  const displayName = field("DisplayName");
  const localName = field("LocalName");
  return {
    name,
    locale,
    gender: field("Gender"),
    description: localName && localName !== displayName ? `${displayName} (${localName})` : displayName,
  };
}

export class AzureTTS implements ITTS {
  readonly name = "azure";

  constructor(private readonly config: AzureTTSConfig) {}

  private get baseUrl(): string {
    return `https://${this.config.region}.tts.speech.microsoft.com/cognitiveservices`;
  }

  private async request(text: string, options: VoiceOptions): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/v1`, {
        method: "POST",
        headers: {
          "Ocp-Apim-Subscription-Key": this.config.key,
          "Content-Type": "application/ssml+xml",
          "X-Microsoft-OutputFormat": this.config.outputFormat ?? DEFAULT_OUTPUT_FORMAT,
        },
        body: buildSsml(text, options),
      });
    } catch (err) {
      const error = toError(err);
      throw new UpstreamFailureError(`Azure TTS request failed: ${error.message}`, { cause: error });
    }
    if (!response.ok) throw new UpstreamFailureError(`Azure TTS failed: ${response.status} ${response.statusText}`);
    return response;
  }

  async synthesize(text: string, options: VoiceOptions): Promise<Buffer> {
    const response = await this.request(text, options);
    const arrayBuffer = await response.arrayBuffer();
    return Buffer.from(arrayBuffer);
  }

  async *synthesizeStream(text: string, options: VoiceOptions): AsyncIterable<Buffer> {
    const response = await this.request(text, options);
    if (!response.body) return;
    const reader = response.body.getReader();
    let finished = false;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          finished = true;
          return;
        }
        if (value && value.length > 0) yield Buffer.from(value);
      }
    } finally {
      // Consumer stopped early: close the upstream connection.
      if (!finished) await reader.cancel();
      reader.releaseLock();
    }
  }

  async listVoices(options: VoiceListOptions = {}): Promise<VoiceListResult> {
    try {
      const response = await fetch(`${this.baseUrl}/voices/list`, {
        headers: { "Ocp-Apim-Subscription-Key": this.config.key },
      });
      if (!response.ok) return { ok: false, error: `Azure voice list failed: ${response.status} ${response.statusText}` };
      const data: unknown = await response.json();
      if (!Array.isArray(data)) return { ok: false, error: "Azure voice list response is not an array" };
      const locales = options.locales;
      const voices = data
        .map(toVoiceInfo)
        .filter((v): v is VoiceInfo => v !== null)
        .filter((v) => !locales || locales.includes(v.locale));
      return { ok: true, voices: options.limit !== undefined ? voices.slice(0, options.limit) : voices };
    } catch (err) {
      return { ok: false, error: `Azure voice list failed: ${toError(err).message}` };
    }
  }
}
