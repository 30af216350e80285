/**
 * Stub ASR adapter for testing or when no provider is configured.
 * Returns empty transcript.
 */

import type { AudioFormat, IASR, TranscriptResult } from "./types";

export class StubASR implements IASR {
  readonly name = "stub";

  async transcribe(_audioBuffer: Buffer, _format: AudioFormat, language: string): Promise<TranscriptResult> {
    return { text: "", language };
  }
}
