/**
 * Energy-based classifier: needs no model, so it always loads.
 * Maps frame RMS to a probability that crosses 0.5 at the configured RMS.
 */

import type { ClassifierFrame, IFrameClassifier } from "./types";

/** RMS threshold (16-bit PCM scale) where the frame is as likely speech as not. */
const DEFAULT_RMS_THRESHOLD = 500;

export interface EnergyClassifierConfig {
  rmsThreshold?: number;
}

export class EnergyClassifier implements IFrameClassifier {
  readonly name = "energy";
  readonly concurrencySafe = true;
  private readonly reference: number;

  constructor(config: EnergyClassifierConfig = {}) {
    this.reference = (config.rmsThreshold ?? DEFAULT_RMS_THRESHOLD) / 32768;
  }

  async load(): Promise<void> {}

  /** p = rms^2 / (rms^2 + ref^2): 0 for digital silence, 0.5 at the threshold, approaching 1 above. */
  classify(frame: ClassifierFrame): number {
    const { samples } = frame;
    if (samples.length === 0) return 0;
    let sum = 0;
    for (let i = 0; i < samples.length; i++) {
      sum += samples[i] * samples[i];
    }
    const meanSquare = sum / samples.length;
    return meanSquare / (meanSquare + this.reference * this.reference);
  }
}
