/**
 * One-shot detection for non-streaming callers: no window, no silence tracking.
 */

import { InvalidRequestError } from "../errors";
import type { FrameClassifierAdapter } from "./frame-classifier";

export interface DetectResult {
  hasVoice: boolean;
  probability: number;
}

export async function detectOnce(
  classifier: FrameClassifierAdapter,
  audio: Buffer,
  sampleRate: number,
  threshold: number,
  signal?: AbortSignal
): Promise<DetectResult> {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new InvalidRequestError(`threshold must be in [0, 1]; got ${threshold}`);
  }
  const probability = await classifier.classify(audio, sampleRate, signal);
  return { hasVoice: probability >= threshold, probability };
}
