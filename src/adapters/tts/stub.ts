/**
 * Stub TTS adapter for testing or when no provider is configured.
 * Returns empty audio buffer (silence) and an empty voice catalogue.
 */

import type { ITTS, VoiceListResult, VoiceOptions } from "./types";

export class StubTTS implements ITTS {
  readonly name = "stub";

  async synthesize(_text: string, _options: VoiceOptions): Promise<Buffer> {
    return Buffer.alloc(0);
  }

  async listVoices(): Promise<VoiceListResult> {
    return { ok: true, voices: [] };
  }
}
