/**
 * Remote classifier: delegates inference to an HTTP sidecar hosting the acoustic model
 * (e.g. Silero behind a small inference server).
 *
 * Sidecar contract:
 *   GET  {baseUrl}/health   -> 200 {"vad_loaded": true}
 *   POST {baseUrl}/classify {"audio_data": "<base64 pcm16>", "sample_rate": 16000} -> {"probability": 0.93}
 */

import { CancelledError } from "../../errors";
import type { ClassifierFrame, IFrameClassifier } from "./types";

export interface RemoteClassifierConfig {
  baseUrl: string;
  timeoutMs?: number;
  /** Set when the sidecar is known to be safe for concurrent calls. */
  concurrent?: boolean;
}

function readProbability(data: unknown): number {
  if (typeof data === "object" && data !== null && "probability" in data && typeof data.probability === "number") {
    return data.probability;
  }
  throw new Error("Remote classifier response has no numeric probability");
}

export class RemoteClassifier implements IFrameClassifier {
  readonly name = "remote";
  readonly concurrencySafe: boolean;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: RemoteClassifierConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? 2000;
    this.concurrencySafe = config.concurrent ?? false;
  }

  async load(): Promise<void> {
    if (!this.baseUrl) throw new Error("Remote classifier URL is not configured (VAD_REMOTE_URL)");
    const response = await fetch(`${this.baseUrl}/health`, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!response.ok) throw new Error(`Remote classifier health check failed: ${response.status}`);
    const data: unknown = await response.json();
    if (typeof data === "object" && data !== null && "vad_loaded" in data && data.vad_loaded === false) {
      throw new Error("Remote classifier reports its model is not loaded");
    }
  }

  async classify(frame: ClassifierFrame, signal?: AbortSignal): Promise<number> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(`${this.baseUrl}/classify`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ audio_data: frame.pcm.toString("base64"), sample_rate: frame.sampleRate }),
        signal: controller.signal,
      });
      if (!response.ok) {
        const errText = await response.text();
        throw new Error(`Remote classifier failed: ${response.status} ${errText}`);
      }
      return readProbability(await response.json());
    } catch (err) {
      if (signal?.aborted) throw new CancelledError();
      if (controller.signal.aborted) throw new Error(`Remote classifier timed out after ${this.timeoutMs} ms`, { cause: err });
      throw err;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
