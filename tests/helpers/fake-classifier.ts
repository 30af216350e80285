/**
 * Test classifiers. Frames carry their probability in the first sample so a test can
 * script a sequence of probabilities through real PCM bytes.
 */

import type { ClassifierFrame, IFrameClassifier } from "../../src/adapters/vad";

/** 60 ms at 16 kHz. */
export const FRAME_SAMPLES = 960;

/** A PCM frame whose first sample encodes `probability` (two-decimal precision). */
export function frameFor(probability: number, samples = FRAME_SAMPLES): Buffer {
  const frame = Buffer.alloc(samples * 2);
  frame.writeInt16LE(Math.min(32767, Math.round(probability * 32768)), 0);
  return frame;
}

/** Reads the probability back out of a frameFor() frame. */
export class ProbabilityClassifier implements IFrameClassifier {
  readonly name = "fake";
  calls = 0;

  constructor(readonly concurrencySafe = true) {}

  async load(): Promise<void> {}

  classify(frame: ClassifierFrame): number {
    this.calls++;
    return Math.round(Math.abs(frame.samples[0]) * 100) / 100;
  }
}

/** Backend whose load always fails. */
export class BrokenClassifier implements IFrameClassifier {
  readonly name = "broken";
  readonly concurrencySafe = true;

  async load(): Promise<void> {
    throw new Error("model file missing");
  }

  classify(): number {
    throw new Error("unreachable");
  }
}

interface PendingCall {
  frame: ClassifierFrame;
  resolve: (p: number) => void;
  reject: (err: Error) => void;
}

/**
 * Classifier whose calls stay pending until the test settles them, for ordering,
 * cancellation and failure tests.
 */
export class GatedClassifier implements IFrameClassifier {
  readonly name = "gated";
  readonly pending: PendingCall[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(readonly concurrencySafe = true) {}

  async load(): Promise<void> {}

  classify(frame: ClassifierFrame, signal?: AbortSignal): Promise<number> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    return new Promise<number>((resolve, reject) => {
      const done = () => {
        this.inFlight--;
      };
      const call: PendingCall = {
        frame,
        resolve: (p) => {
          done();
          resolve(p);
        },
        reject: (err) => {
          done();
          reject(err);
        },
      };
      signal?.addEventListener("abort", () => call.reject(new Error("aborted")), { once: true });
      this.pending.push(call);
    });
  }

  /** Settle the oldest pending call. */
  resolveNext(probability: number): void {
    const call = this.pending.shift();
    if (!call) throw new Error("no pending classifier call");
    call.resolve(probability);
  }

  rejectNext(err: Error): void {
    const call = this.pending.shift();
    if (!call) throw new Error("no pending classifier call");
    call.reject(err);
  }
}

/** Let every queued promise callback run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
