/**
 * webrtcvad classifier (npm webrtcvad, native module).
 *
 * The native VAD only judges 10/20/30 ms frames at 8/16/32/48 kHz and answers voiced or not.
 * A longer frame (e.g. the 60 ms frames clients send) is split into sub-frames and the
 * probability is the fraction of voiced sub-frames; a trailing partial sub-frame is ignored.
 */

import { InvalidAudioError } from "../../errors";
import type { ClassifierFrame, IFrameClassifier } from "./types";

const SUPPORTED_RATES = [8000, 16000, 32000, 48000];

interface NativeVad {
  isVoice(frame: Buffer, sampleRate: number): boolean;
  setMode?(mode: number): void;
}

function isNativeVad(value: unknown): value is NativeVad {
  return typeof value === "object" && value !== null && "isVoice" in value && typeof value.isVoice === "function";
}

/** The package has shipped as a factory, as a default-export factory and as a plain instance. */
function instantiate(mod: unknown): NativeVad | null {
  if (typeof mod === "function") {
    const vad: unknown = mod();
    return isNativeVad(vad) ? vad : null;
  }
  if (typeof mod === "object" && mod !== null && "default" in mod && typeof mod.default === "function") {
    const vad: unknown = mod.default();
    return isNativeVad(vad) ? vad : null;
  }
  return isNativeVad(mod) ? mod : null;
}

export interface WebRtcClassifierConfig {
  /** Aggressiveness 0-3 (0 = least aggressive, 3 = most). */
  mode?: number;
  /** Sub-frame length: 10, 20 or 30 ms. */
  frameMs?: number;
  /** Module loader; tests inject a fake in place of the native module. */
  loadModule?: () => unknown;
}

export class WebRtcClassifier implements IFrameClassifier {
  readonly name = "webrtc";
  // Synchronous native call on the event loop: never actually concurrent.
  readonly concurrencySafe = true;
  private vad: NativeVad | null = null;
  private readonly mode: number;
  private readonly frameMs: number;
  private readonly loadModule: () => unknown;

  constructor(config: WebRtcClassifierConfig = {}) {
    this.mode = config.mode ?? 1;
    this.frameMs = config.frameMs ?? 20;
    this.loadModule = config.loadModule ?? (() => require("webrtcvad"));
  }

  async load(): Promise<void> {
    const vad = instantiate(this.loadModule());
    if (!vad) throw new Error("webrtcvad module does not expose isVoice()");
    vad.setMode?.(this.mode);
    this.vad = vad;
  }

  classify(frame: ClassifierFrame): number {
    if (!this.vad) throw new Error("webrtcvad not loaded");
    if (!SUPPORTED_RATES.includes(frame.sampleRate)) {
      throw new InvalidAudioError(`webrtcvad supports sample rates ${SUPPORTED_RATES.join(", ")}; got ${frame.sampleRate}`);
    }
    const subFrameBytes = ((frame.sampleRate * this.frameMs) / 1000) * 2;
    const count = Math.floor(frame.pcm.length / subFrameBytes);
    if (count === 0) {
      throw new InvalidAudioError(`Frame of ${frame.pcm.length} bytes is shorter than one ${this.frameMs} ms sub-frame (${subFrameBytes} bytes)`);
    }
    let voiced = 0;
    for (let i = 0; i < count; i++) {
      const sub = frame.pcm.subarray(i * subFrameBytes, (i + 1) * subFrameBytes);
      if (this.vad.isVoice(sub, frame.sampleRate)) voiced++;
    }
    return voiced / count;
  }
}
