/**
 * In-process counters for the VAD engine.
 * Snapshot is served at GET /metrics; high-signal events are also logged.
 */

import { logger } from "../logging";

export interface VadMetrics {
  sessionsStarted: number;
  sessionsReplaced: number;
  sessionsEnded: number;
  /** session_end calls for ids that were already gone. */
  sessionsEndNotFound: number;
  framesProcessed: number;
  speechEndedEvents: number;
  classifierCalls: number;
  classifierFailures: number;
  /** Frames the backend refused as bad input (e.g. an unsupported sample rate). */
  classifierRejections: number;
  classifierCancellations: number;
  /** Latency of the most recent classifier call (ms). */
  lastClassifierLatencyMs?: number;
  maxClassifierLatencyMs?: number;
}

function emptyMetrics(): VadMetrics {
  return {
    sessionsStarted: 0,
    sessionsReplaced: 0,
    sessionsEnded: 0,
    sessionsEndNotFound: 0,
    framesProcessed: 0,
    speechEndedEvents: 0,
    classifierCalls: 0,
    classifierFailures: 0,
    classifierRejections: 0,
    classifierCancellations: 0,
  };
}

let metrics: VadMetrics = emptyMetrics();

export function recordSessionStart(replaced: boolean): void {
  metrics.sessionsStarted++;
  if (replaced) metrics.sessionsReplaced++;
}

export function recordSessionEnd(found: boolean): void {
  if (found) metrics.sessionsEnded++;
  else metrics.sessionsEndNotFound++;
}

export function recordFrame(speechEnded: boolean): void {
  metrics.framesProcessed++;
  if (speechEnded) metrics.speechEndedEvents++;
}

/** How a classifier call ended: "rejected" is the caller's input, "failed" the backend's fault. */
export type ClassifierOutcome = "ok" | "failed" | "rejected" | "cancelled";

export function recordClassifierCall(latencyMs: number, outcome: ClassifierOutcome): void {
  metrics.classifierCalls++;
  if (outcome === "failed") metrics.classifierFailures++;
  else if (outcome === "rejected") metrics.classifierRejections++;
  else if (outcome === "cancelled") metrics.classifierCancellations++;
  metrics.lastClassifierLatencyMs = latencyMs;
  if (metrics.maxClassifierLatencyMs === undefined || latencyMs > metrics.maxClassifierLatencyMs) {
    metrics.maxClassifierLatencyMs = latencyMs;
    if (latencyMs >= 1000) {
      logger.warn({ event: "VAD_CLASSIFIER_SLOW", latency_ms: latencyMs }, "Slowest classifier call so far");
    }
  }
}

export function getMetrics(): VadMetrics {
  return { ...metrics };
}

export function resetMetrics(): void {
  metrics = emptyMetrics();
}
