/**
 * Frame classifier backend types.
 * Implementations can be swapped via config (webrtcvad, energy, remote sidecar, stub).
 */

/** One frame handed to a backend, already validated as whole 16-bit samples. */
export interface ClassifierFrame {
  /** Raw little-endian int16 PCM. */
  pcm: Buffer;
  /** Same samples normalized to [-1, 1). */
  samples: Float32Array;
  sampleRate: number;
}

/**
 * Classifier backend: frame in, speech probability in [0, 1] out.
 *
 * Contract:
 * - `load()` runs once at startup; a rejection marks the model unavailable until restart.
 * - `classify()` must not retry internally; the caller owns retry policy.
 * - `concurrencySafe` is a promise made by the backend. When false the adapter never
 *   has two `classify()` calls in flight.
 */
export interface IFrameClassifier {
  readonly name: string;
  readonly concurrencySafe: boolean;
  load(): Promise<void>;
  classify(frame: ClassifierFrame, signal?: AbortSignal): number | Promise<number>;
}
