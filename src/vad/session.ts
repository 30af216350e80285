/**
 * One streaming VAD session: a hysteresis window, a silence tracker and lifecycle flags.
 * Mutated only through apply(), which the registry calls under the session's lock once
 * the frame's probability is known, so an update is all-or-nothing.
 */

import { FrameOutOfOrderError, InvalidRequestError } from "../errors";
import { HysteresisWindow } from "./hysteresis-window";
import { SilenceTracker } from "./silence-tracker";

export interface SessionConfig {
  windowSize: number;
  minVoicedFrames: number;
  silenceFrames: number;
}

export interface Thresholds {
  threshold: number;
  thresholdLow: number;
}

export interface FrameEvent {
  probability: number;
  voiceConfirmed: boolean;
  speechEnded: boolean;
  sessionActive: true;
}

export interface SessionSnapshot {
  id: string;
  voiceWindow: boolean[];
  voicedCount: number;
  silenceRun: number;
  hasVoice: boolean;
  framesProcessed: number;
  lastSequence: number | null;
  createdAt: number;
}

function isProbability(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/** Fill missing thresholds from defaults and reject values a session cannot use. */
export function resolveThresholds(input: Partial<Thresholds>, defaults: Thresholds): Thresholds {
  const threshold = input.threshold ?? defaults.threshold;
  const thresholdLow = input.thresholdLow ?? defaults.thresholdLow;
  if (!isProbability(threshold)) throw new InvalidRequestError(`threshold must be in [0, 1]; got ${threshold}`);
  if (!isProbability(thresholdLow)) throw new InvalidRequestError(`threshold_low must be in [0, 1]; got ${thresholdLow}`);
  if (thresholdLow > threshold) {
    throw new InvalidRequestError(`threshold_low (${thresholdLow}) must not exceed threshold (${threshold})`);
  }
  return { threshold, thresholdLow };
}

export class VadSession {
  readonly createdAt = Date.now();
  private readonly window: HysteresisWindow;
  private readonly silence: SilenceTracker;
  private hasVoice = false;
  private framesProcessed = 0;
  private lastSequence: number | null = null;

  constructor(readonly id: string, config: SessionConfig) {
    this.window = new HysteresisWindow({ size: config.windowSize, minVoiced: config.minVoicedFrames });
    this.silence = new SilenceTracker(config.silenceFrames);
  }

  /** Reject a sequence number that is not after the last applied one. Gaps are fine. */
  checkSequence(sequence: number | undefined): void {
    if (sequence === undefined || this.lastSequence === null) return;
    if (sequence <= this.lastSequence) throw new FrameOutOfOrderError(sequence, this.lastSequence);
  }

  apply(probability: number, thresholds: Thresholds, sequence?: number): FrameEvent {
    this.checkSequence(sequence);
    const voiceConfirmed = this.window.update(probability, thresholds.threshold);
    const outcome = this.silence.update(probability, thresholds.thresholdLow, voiceConfirmed);
    if (outcome === "voice") this.hasVoice = true;
    else if (outcome === "ended") this.hasVoice = false;
    this.framesProcessed++;
    if (sequence !== undefined) this.lastSequence = sequence;
    return { probability, voiceConfirmed, speechEnded: outcome === "ended", sessionActive: true };
  }

  get voiceActive(): boolean {
    return this.hasVoice;
  }

  get frames(): number {
    return this.framesProcessed;
  }

  snapshot(): SessionSnapshot {
    return {
      id: this.id,
      voiceWindow: this.window.snapshot(),
      voicedCount: this.window.voicedCount,
      silenceRun: this.silence.silenceRun,
      hasVoice: this.hasVoice,
      framesProcessed: this.framesProcessed,
      lastSequence: this.lastSequence,
      createdAt: this.createdAt,
    };
  }
}
