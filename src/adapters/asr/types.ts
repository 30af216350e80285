/**
 * ASR (Automatic Speech Recognition) adapter types.
 * Implementations can be swapped via config (e.g. OpenAI Whisper, stub).
 * Invoked once per finalized utterance; independent of VAD session state.
 */

export const AUDIO_FORMATS = ["pcm", "wav", "webm", "opus", "mp3"] as const;

/** "pcm" is 16kHz mono 16-bit little-endian, the format VAD sessions consume. */
export type AudioFormat = (typeof AUDIO_FORMATS)[number];

export function isAudioFormat(value: string): value is AudioFormat {
  return AUDIO_FORMATS.some((f) => f === value);
}

export interface TranscriptResult {
  /** Transcribed text. */
  text: string;
  /** Language code the text was recognized in. */
  language: string;
}

/**
 * ASR adapter interface: audio buffer in, transcript out.
 */
export interface IASR {
  readonly name: string;
  /**
   * Transcribe audio to text.
   * @param format - Container/encoding of audioBuffer.
   * @param language - Language hint (ISO-639-1, e.g. "zh", "en").
   */
  transcribe(audioBuffer: Buffer, format: AudioFormat, language: string): Promise<TranscriptResult>;
}
