/**
 * Session Registry: owns every live VAD session for the lifetime of the process.
 *
 * Every operation on an id runs under that id's lock, so start/process/end for one
 * session are applied in arrival order and never interleave. The lock is held across the
 * classifier call; frames of one session are ordered audio, so nothing is lost by waiting.
 */

import type { Logger } from "pino";
import { InvalidRequestError, SessionNotFoundError, ShuttingDownError } from "../errors";
import { logger as defaultLogger, logSessionEnd, logSessionStart, logSpeechEnded } from "../logging";
import { recordFrame, recordSessionEnd, recordSessionStart } from "../metrics";
import type { FrameClassifierAdapter } from "./frame-classifier";
import { KeyedLock } from "./keyed-lock";
import { VadSession, resolveThresholds, type FrameEvent, type SessionConfig, type SessionSnapshot, type Thresholds } from "./session";

export interface SessionRegistryConfig extends SessionConfig, Thresholds {
  /** Sample rate used when a frame does not name one. */
  sampleRate: number;
}

export interface ProcessFrameInput {
  audio: Buffer;
  sampleRate?: number;
  threshold?: number;
  thresholdLow?: number;
  /** Optional client sequence number; must increase across frames of a session. */
  sequence?: number;
  /** Aborts the classifier call; the session is left untouched. */
  signal?: AbortSignal;
}

export interface SessionStartResult {
  sessionId: string;
  /** True when a live session with this id was discarded. */
  replaced: boolean;
}

export interface SessionEndResult {
  sessionId: string;
  found: boolean;
  hadVoice: boolean;
}

function assertSessionId(id: string): void {
  if (typeof id !== "string" || id.trim() === "") throw new InvalidRequestError("session_id is required");
}

function assertSequence(sequence: number | undefined): void {
  if (sequence !== undefined && !Number.isSafeInteger(sequence)) {
    throw new InvalidRequestError(`sequence must be an integer; got ${sequence}`);
  }
}

export class SessionRegistry {
  private readonly sessions = new Map<string, VadSession>();
  private readonly locks = new KeyedLock();
  private closed = false;

  constructor(
    private readonly classifier: FrameClassifierAdapter,
    private readonly config: SessionRegistryConfig,
    private readonly log: Logger = defaultLogger
  ) {}

  /** Create a fresh session; an existing one with the same id is discarded (last start wins). */
  async start(id: string): Promise<SessionStartResult> {
    assertSessionId(id);
    this.assertOpen();
    return this.locks.run(id, async () => {
      this.assertOpen();
      const replaced = this.sessions.has(id);
      this.sessions.set(id, new VadSession(id, this.config));
      recordSessionStart(replaced);
      logSessionStart(this.log, id, replaced);
      return { sessionId: id, replaced };
    });
  }

  async process(id: string, input: ProcessFrameInput): Promise<FrameEvent> {
    assertSessionId(id);
    assertSequence(input.sequence);
    const thresholds = resolveThresholds(input, this.config);
    this.assertOpen();
    return this.locks.run(id, async () => {
      this.assertOpen();
      const session = this.sessions.get(id);
      if (!session) throw new SessionNotFoundError(id);
      // Reject a stale frame before paying for inference.
      session.checkSequence(input.sequence);
      const probability = await this.classifier.classify(input.audio, input.sampleRate ?? this.config.sampleRate, input.signal);
      const event = session.apply(probability, thresholds, input.sequence);
      recordFrame(event.speechEnded);
      if (event.speechEnded) logSpeechEnded(this.log, id, session.frames);
      return event;
    });
  }

  /** Remove a session. Ending an unknown id is not an error: double-end is expected from at-least-once callers. */
  async end(id: string): Promise<SessionEndResult> {
    assertSessionId(id);
    return this.locks.run(id, async () => {
      const session = this.sessions.get(id);
      this.sessions.delete(id);
      const result = { sessionId: id, found: session !== undefined, hadVoice: session?.voiceActive ?? false };
      recordSessionEnd(result.found);
      logSessionEnd(this.log, id, result.found, result.hadVoice);
      return result;
    });
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  snapshot(id: string): SessionSnapshot | undefined {
    return this.sessions.get(id)?.snapshot();
  }

  get size(): number {
    return this.sessions.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Refuse new work, wait for in-flight calls, then drop every session. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.locks.drain();
    const dropped = this.sessions.size;
    this.sessions.clear();
    this.log.info({ event: "VAD_REGISTRY_CLOSED", dropped }, "Session registry closed");
  }

  private assertOpen(): void {
    if (this.closed) throw new ShuttingDownError();
  }
}
