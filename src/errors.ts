/**
 * Error taxonomy shared by the VAD core, the adapters and the HTTP layer.
 * Each kind is stable so callers can tell "retry me" from "fix your input".
 */

export type VoiceErrorKind =
  | "ModelUnavailable"
  | "InvalidAudio"
  | "InvalidRequest"
  | "SessionNotFound"
  | "ClassifierFailure"
  | "FrameOutOfOrder"
  | "Cancelled"
  | "UpstreamFailure"
  | "ShuttingDown"
  | "PayloadTooLarge";

const STATUS_BY_KIND: Record<VoiceErrorKind, number> = {
  ModelUnavailable: 503,
  InvalidAudio: 400,
  InvalidRequest: 400,
  SessionNotFound: 404,
  ClassifierFailure: 502,
  FrameOutOfOrder: 409,
  Cancelled: 499,
  UpstreamFailure: 502,
  ShuttingDown: 503,
  PayloadTooLarge: 413,
};

export class VoiceServiceError extends Error {
  readonly status: number;

  constructor(readonly kind: VoiceErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.status = STATUS_BY_KIND[kind];
  }
}

/** Classifier failed to load at startup; permanent until restart. */
export class ModelUnavailableError extends VoiceServiceError {
  constructor(message = "VAD model not loaded", options?: { cause?: unknown }) {
    super("ModelUnavailable", message, options);
  }
}

export class InvalidAudioError extends VoiceServiceError {
  constructor(message: string) {
    super("InvalidAudio", message);
  }
}

export class InvalidRequestError extends VoiceServiceError {
  constructor(message: string) {
    super("InvalidRequest", message);
  }
}

export class SessionNotFoundError extends VoiceServiceError {
  constructor(readonly sessionId: string) {
    super("SessionNotFound", `Session not found: ${sessionId}`);
  }
}

/** Transient inference error. Never retried internally. */
export class ClassifierFailureError extends VoiceServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ClassifierFailure", message, options);
  }
}

export class FrameOutOfOrderError extends VoiceServiceError {
  constructor(readonly sequence: number, readonly lastSequence: number) {
    super("FrameOutOfOrder", `Frame sequence ${sequence} is not after last applied sequence ${lastSequence}`);
  }
}

export class CancelledError extends VoiceServiceError {
  constructor(message = "Request cancelled") {
    super("Cancelled", message);
  }
}

/** ASR or TTS provider failed. */
export class UpstreamFailureError extends VoiceServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("UpstreamFailure", message, options);
  }
}

export class ShuttingDownError extends VoiceServiceError {
  constructor() {
    super("ShuttingDown", "Session registry is shut down");
  }
}

export class PayloadTooLargeError extends VoiceServiceError {
  constructor(limitBytes: number) {
    super("PayloadTooLarge", `Request body exceeds ${limitBytes} bytes`);
  }
}

export function isVoiceServiceError(err: unknown): err is VoiceServiceError {
  return err instanceof VoiceServiceError;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new CancelledError();
}
