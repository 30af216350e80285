/**
 * Structured logging for the voice service.
 * Logs session lifecycle, classifier, ASR and TTS events with timestamps. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL   - silent | debug | info | warn | error (default: info; silent under NODE_ENV=test)
 *   LOG_FILE    - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["silent", "debug", "info", "warn", "error"];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const v = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === v);
}

const isTest = process.env.NODE_ENV === "test";

const defaultConfig: LoggerConfig = {
  level: parseLogLevel(process.env.LOG_LEVEL) ?? (isTest ? "silent" : "info"),
  pretty: process.env.NODE_ENV !== "production" && !isTest,
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

export function logSessionStart(log: pino.Logger, sessionId: string, replaced: boolean): void {
  log.info({ event: "VAD_SESSION_START", sessionId, replaced }, "VAD session started");
}

export function logSessionEnd(log: pino.Logger, sessionId: string, found: boolean, hadVoice: boolean): void {
  log.info({ event: "VAD_SESSION_END", sessionId, found, hadVoice }, found ? "VAD session ended" : "VAD session end ignored (not found)");
}

/** Utterance boundary: the silence run crossed the end threshold. */
export function logSpeechEnded(log: pino.Logger, sessionId: string, framesProcessed: number): void {
  log.info({ event: "VAD_SPEECH_ENDED", sessionId, framesProcessed }, "Speech ended");
}

export function logClassifierLoad(log: pino.Logger, provider: string, loaded: boolean, err?: Error): void {
  if (loaded) {
    log.info({ event: "VAD_MODEL_LOADED", provider }, "VAD classifier loaded");
  } else {
    log.error({ event: "VAD_MODEL_UNAVAILABLE", provider, err: err?.message }, "VAD classifier failed to load; VAD features disabled");
  }
}

/** Log ASR result (avoid logging full transcript in production if PII). */
export function logAsrResult(log: pino.Logger, textLength: number, durationMs?: number): void {
  log.info({ event: "ASR_RESULT", textLength, durationMs }, "ASR completed");
}

/** Log TTS call. */
export function logTtsCall(log: pino.Logger, textLength: number, audioBytes: number, durationMs?: number): void {
  log.info({ event: "TTS_CALL", textLength, audioBytes, durationMs }, "TTS completed");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, stack: err.stack, ...context }, "Error");
}
