/**
 * TTS adapter factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { ITTS } from "./types";
import { StubTTS } from "./stub";
import { AzureTTS } from "./azure";

export type { ITTS, VoiceInfo, VoiceListOptions, VoiceListResult, VoiceOptions } from "./types";
export { DEFAULT_PROSODY, resolveVoiceOptions, ttsToStream } from "./types";
export { StubTTS } from "./stub";
export { AzureTTS, buildSsml, escapeXml } from "./azure";

export function createTTS(config: AppConfig): ITTS {
  const { provider, azureKey, azureRegion } = config.tts;
  if (provider === "azure" && azureKey && azureRegion) {
    return new AzureTTS({ key: azureKey, region: azureRegion });
  }
  return new StubTTS();
}
