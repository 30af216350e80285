/**
 * Frame Classifier Adapter: validates and decodes raw PCM, guards model availability,
 * and turns backend errors into the service taxonomy.
 */

import type { Logger } from "pino";
import type { IFrameClassifier } from "../adapters/vad/types";
import { decodePcm16 } from "../audio/pcm-utils";
import {
  CancelledError,
  ClassifierFailureError,
  InvalidAudioError,
  ModelUnavailableError,
  isVoiceServiceError,
  throwIfAborted,
  toError,
} from "../errors";
import { logClassifierLoad, logger as defaultLogger } from "../logging";
import { recordClassifierCall } from "../metrics";

type LoadState = { status: "pending" } | { status: "loaded" } | { status: "failed"; error: Error };

export class FrameClassifierAdapter {
  private state: LoadState = { status: "pending" };
  /** Tail of the call queue; only used when the backend is not concurrency-safe. */
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly backend: IFrameClassifier,
    private readonly log: Logger = defaultLogger
  ) {}

  get provider(): string {
    return this.backend.name;
  }

  /**
   * Load the backend once at startup. A failure is recorded, not thrown: the service keeps
   * running and every classification reports ModelUnavailable.
   */
  async load(): Promise<boolean> {
    try {
      await this.backend.load();
      this.state = { status: "loaded" };
      logClassifierLoad(this.log, this.backend.name, true);
    } catch (err) {
      const error = toError(err);
      this.state = { status: "failed", error };
      logClassifierLoad(this.log, this.backend.name, false, error);
    }
    return this.state.status === "loaded";
  }

  isAvailable(): boolean {
    return this.state.status === "loaded";
  }

  /** Speech probability in [0, 1] for one frame of little-endian 16-bit PCM. */
  async classify(pcm: Buffer, sampleRate: number, signal?: AbortSignal): Promise<number> {
    if (this.state.status === "failed") {
      throw new ModelUnavailableError(`VAD model not loaded: ${this.state.error.message}`, { cause: this.state.error });
    }
    if (this.state.status !== "loaded") throw new ModelUnavailableError();
    if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
      throw new InvalidAudioError(`Sample rate must be a positive integer; got ${sampleRate}`);
    }
    if (pcm.length === 0) throw new InvalidAudioError("Audio frame is empty");
    const samples = decodePcm16(pcm);
    throwIfAborted(signal);

    const run = () => this.invoke({ pcm, samples, sampleRate }, signal);
    return this.backend.concurrencySafe ? run() : this.serialize(run);
  }

  private async invoke(frame: { pcm: Buffer; samples: Float32Array; sampleRate: number }, signal?: AbortSignal): Promise<number> {
    throwIfAborted(signal);
    const startedAt = Date.now();
    let probability: number;
    try {
      probability = await this.backend.classify(frame, signal);
    } catch (err) {
      const latencyMs = Date.now() - startedAt;
      if (signal?.aborted || (isVoiceServiceError(err) && err.kind === "Cancelled")) {
        recordClassifierCall(latencyMs, "cancelled");
        throw isVoiceServiceError(err) ? err : new CancelledError();
      }
      if (isVoiceServiceError(err)) {
        recordClassifierCall(latencyMs, err.status < 500 ? "rejected" : "failed");
        throw err;
      }
      recordClassifierCall(latencyMs, "failed");
      const error = toError(err);
      throw new ClassifierFailureError(`VAD classification failed: ${error.message}`, { cause: error });
    }
    if (!Number.isFinite(probability) || probability < 0 || probability > 1) {
      recordClassifierCall(Date.now() - startedAt, "failed");
      throw new ClassifierFailureError(`Classifier returned out-of-range probability: ${probability}`);
    }
    recordClassifierCall(Date.now() - startedAt, "ok");
    // A result that arrives after the caller gave up is discarded.
    throwIfAborted(signal);
    return probability;
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
