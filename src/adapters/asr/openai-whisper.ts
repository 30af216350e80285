/**
 * OpenAI Whisper API ASR adapter.
 */

import OpenAI, { toFile } from "openai";
import { pcmToWav } from "../../audio/pcm-utils";
import { UpstreamFailureError, toError } from "../../errors";
import type { AudioFormat, IASR, TranscriptResult } from "./types";

export type UploadFile = Awaited<ReturnType<typeof toFile>>;

export interface TranscriptionParams {
  file: UploadFile;
  model: string;
  language: string;
}

/** The part of the OpenAI client this adapter calls (`client.audio.transcriptions`). */
export interface TranscriptionsApi {
  create(params: TranscriptionParams): PromiseLike<{ text: string }>;
}

export interface OpenAIWhisperConfig {
  apiKey: string;
  model?: string;
  /** Sample rate of raw "pcm" input. */
  pcmSampleRateHz?: number;
  /** Defaults to the transcriptions API of a client built from apiKey; tests pass a fake. */
  transcriptions?: TranscriptionsApi;
}

const UPLOAD_NAMES: Record<AudioFormat, string> = {
  pcm: "audio.wav",
  wav: "audio.wav",
  webm: "audio.webm",
  opus: "audio.ogg",
  mp3: "audio.mp3",
};

export class OpenAIWhisperASR implements IASR {
  readonly name = "openai";
  private readonly transcriptions: TranscriptionsApi;

  constructor(private readonly config: OpenAIWhisperConfig) {
    this.transcriptions = config.transcriptions ?? new OpenAI({ apiKey: config.apiKey }).audio.transcriptions;
  }

  async transcribe(audioBuffer: Buffer, format: AudioFormat, language: string): Promise<TranscriptResult> {
    // Whisper needs a container; raw PCM gets a WAV header.
    const body = format === "pcm" ? pcmToWav(audioBuffer, this.config.pcmSampleRateHz ?? 16000) : audioBuffer;
    try {
      const transcription = await this.transcriptions.create({
        file: await toFile(body, UPLOAD_NAMES[format]),
        model: this.config.model ?? "whisper-1",
        language,
      });
      return { text: transcription.text.trim(), language };
    } catch (err) {
      const error = toError(err);
      throw new UpstreamFailureError(`ASR processing failed: ${error.message}`, { cause: error });
    }
  }
}
