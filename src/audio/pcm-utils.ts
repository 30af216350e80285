/**
 * PCM helpers: decoding frames for the classifier, WAV wrapping for ASR input.
 */

import { InvalidAudioError } from "../errors";

export const BYTES_PER_SAMPLE = 2;
const INT16_SCALE = 32768;
const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Interpret bytes as little-endian signed 16-bit PCM and normalize each sample to [-1, 1).
 * Throws InvalidAudioError when the buffer is not a whole number of samples.
 */
export function decodePcm16(pcm: Buffer): Float32Array {
  if (pcm.length % BYTES_PER_SAMPLE !== 0) {
    throw new InvalidAudioError(`Audio length ${pcm.length} is not a multiple of ${BYTES_PER_SAMPLE} bytes (16-bit samples)`);
  }
  const samples = new Float32Array(pcm.length / BYTES_PER_SAMPLE);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = pcm.readInt16LE(i * BYTES_PER_SAMPLE) / INT16_SCALE;
  }
  return samples;
}

/** Decode a base64 payload; Buffer.from alone silently skips invalid characters. */
export function decodeBase64Audio(data: string, field = "audio_data"): Buffer {
  const compact = data.replace(/\s+/g, "");
  if (compact.length % 4 !== 0 || !BASE64_RE.test(compact)) {
    throw new InvalidAudioError(`${field} is not valid base64`);
  }
  return Buffer.from(compact, "base64");
}

/**
 * Prepend a 44-byte WAV header to 16-bit mono PCM.
 * Sample rate typically 16000 for VAD-gated utterances.
 */
export function pcmToWav(pcm: Buffer, sampleRateHz: number): Buffer {
  const numChannels = 1;
  const bitsPerSample = 16;
  const byteRate = sampleRateHz * numChannels * (bitsPerSample / 8);
  const dataSize = pcm.length;
  const headerSize = 44;
  const fileSize = headerSize + dataSize;
  const header = Buffer.alloc(headerSize);
  header.write("RIFF", 0);
  header.writeUInt32LE(fileSize - 8, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE((numChannels * bitsPerSample) / 8, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataSize, 40);
  return Buffer.concat([header, pcm]);
}
