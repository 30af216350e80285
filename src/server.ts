/**
 * HTTP API for the voice service. JSON bodies with base64 audio.
 *
 * GET  /health               liveness plus model/provider status
 * GET  /metrics              VAD counters
 * POST /vad                  one-shot detection
 * POST /vad/session/start    create (or reset) a streaming session
 * POST /vad/session/process  push one frame into a session
 * POST /vad/session/end      close a session (tolerates unknown ids)
 * POST /asr                  speech to text
 * GET  /tts/voices           voice catalogue
 * POST /tts                  text to speech (base64 mp3)
 * POST /tts/stream           text to speech (chunked audio/mpeg)
 */

import { once } from "events";
import * as http from "http";
import type { Logger } from "pino";
import type { AppConfig } from "./config";
import type { IASR } from "./adapters/asr";
import { isAudioFormat } from "./adapters/asr";
import type { ITTS } from "./adapters/tts";
import { resolveVoiceOptions, ttsToStream } from "./adapters/tts";
import { decodeBase64Audio } from "./audio/pcm-utils";
import {
  InvalidRequestError,
  PayloadTooLargeError,
  UpstreamFailureError,
  isVoiceServiceError,
  throwIfAborted,
  toError,
} from "./errors";
import { logAsrResult, logError, logTtsCall, logger as defaultLogger } from "./logging";
import { getMetrics } from "./metrics";
import type { FrameClassifierAdapter } from "./vad/frame-classifier";
import { detectOnce } from "./vad/detector";
import type { SessionRegistry } from "./vad/registry";

export const SERVICE_NAME = "voice-activity-service";

export interface VoiceServerDeps {
  config: AppConfig;
  classifier: FrameClassifierAdapter;
  registry: SessionRegistry;
  asr: IASR;
  tts: ITTS;
  log?: Logger;
}

type JsonBody = Record<string, unknown>;

interface RequestContext {
  req: http.IncomingMessage;
  res: http.ServerResponse;
  url: URL;
  /** Aborted when the client goes away before the response is finished. */
  signal: AbortSignal;
}

function isJsonBody(value: unknown): value is JsonBody {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonBody(req: http.IncomingMessage, limitBytes: number): Promise<JsonBody> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let failed = false;
    req.on("data", (chunk: Buffer) => {
      if (failed) return;
      size += chunk.length;
      if (size > limitBytes) {
        failed = true;
        reject(new PayloadTooLargeError(limitBytes));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (failed) return;
      const text = Buffer.concat(chunks).toString("utf8");
      if (!text.trim()) {
        resolve({});
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch {
        reject(new InvalidRequestError("Invalid JSON"));
        return;
      }
      if (isJsonBody(parsed)) resolve(parsed);
      else reject(new InvalidRequestError("JSON body must be an object"));
    });
    req.on("error", reject);
  });
}

function optionalString(body: JsonBody, key: string): string | undefined {
  const v = body[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") throw new InvalidRequestError(`${key} must be a string`);
  return v;
}

function requiredString(body: JsonBody, key: string): string {
  const v = optionalString(body, key);
  if (v === undefined || v === "") throw new InvalidRequestError(`${key} is required`);
  return v;
}

function optionalNumber(body: JsonBody, key: string): number | undefined {
  const v = body[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "number" || !Number.isFinite(v)) throw new InvalidRequestError(`${key} must be a number`);
  return v;
}

function sendJson(res: http.ServerResponse, status: number, data: unknown): void {
  res.setHeader("Content-Type", "application/json");
  res.writeHead(status);
  res.end(JSON.stringify(data));
}

export function createVoiceServer(deps: VoiceServerDeps): http.Server {
  const { config, classifier, registry, asr, tts } = deps;
  const log = deps.log ?? defaultLogger;
  const startedAt = Date.now();

  const readBody = (ctx: RequestContext) => parseJsonBody(ctx.req, config.server.maxBodyBytes);

  async function health(ctx: RequestContext): Promise<void> {
    sendJson(ctx.res, 200, {
      status: "ok",
      service: SERVICE_NAME,
      vad_loaded: classifier.isAvailable(),
      vad_provider: classifier.provider,
      asr_provider: asr.name,
      tts_provider: tts.name,
      active_sessions: registry.size,
      uptime_s: Math.round((Date.now() - startedAt) / 1000),
    });
  }

  async function detect(ctx: RequestContext): Promise<void> {
    const body = await readBody(ctx);
    const audio = decodeBase64Audio(requiredString(body, "audio_data"));
    const threshold = optionalNumber(body, "threshold") ?? config.vad.threshold;
    const sampleRate = optionalNumber(body, "sample_rate") ?? config.vad.sampleRate;
    const result = await detectOnce(classifier, audio, sampleRate, threshold, ctx.signal);
    sendJson(ctx.res, 200, { has_voice: result.hasVoice, probability: result.probability });
  }

  async function sessionStart(ctx: RequestContext): Promise<void> {
    const body = await readBody(ctx);
    const sessionId = ctx.url.searchParams.get("session_id") ?? requiredString(body, "session_id");
    const result = await registry.start(sessionId);
    sendJson(ctx.res, 200, { status: "started", session_id: result.sessionId, replaced: result.replaced });
  }

  async function sessionProcess(ctx: RequestContext): Promise<void> {
    const body = await readBody(ctx);
    const sessionId = requiredString(body, "session_id");
    const audio = decodeBase64Audio(requiredString(body, "audio_chunk"), "audio_chunk");
    const event = await registry.process(sessionId, {
      audio,
      sampleRate: optionalNumber(body, "sample_rate"),
      threshold: optionalNumber(body, "threshold"),
      thresholdLow: optionalNumber(body, "threshold_low"),
      sequence: optionalNumber(body, "sequence"),
      signal: ctx.signal,
    });
    sendJson(ctx.res, 200, {
      // has_voice is the confirmed (debounced) state, as existing clients read it.
      has_voice: event.voiceConfirmed,
      voice_confirmed: event.voiceConfirmed,
      probability: event.probability,
      speech_ended: event.speechEnded,
      session_active: event.sessionActive,
    });
  }

  async function sessionEnd(ctx: RequestContext): Promise<void> {
    const body = await readBody(ctx);
    const sessionId = ctx.url.searchParams.get("session_id") ?? requiredString(body, "session_id");
    const result = await registry.end(sessionId);
    sendJson(ctx.res, 200, {
      status: result.found ? "ended" : "not_found",
      session_id: result.sessionId,
      found: result.found,
      had_voice: result.hadVoice,
    });
  }

  async function speechToText(ctx: RequestContext): Promise<void> {
    const body = await readBody(ctx);
    const audio = decodeBase64Audio(requiredString(body, "audio_data"));
    const format = optionalString(body, "format") ?? "pcm";
    if (!isAudioFormat(format)) throw new InvalidRequestError(`Unsupported audio format '${format}'`);
    const language = optionalString(body, "language") || config.asr.defaultLanguage;
    const t0 = Date.now();
    const result = await asr.transcribe(audio, format, language);
    logAsrResult(log, result.text.length, Date.now() - t0);
    sendJson(ctx.res, 200, { text: result.text, language: result.language });
  }

  async function listVoices(ctx: RequestContext): Promise<void> {
    const result = await tts.listVoices({ locales: config.tts.voiceLocales, limit: config.tts.maxVoices });
    if (!result.ok) throw new UpstreamFailureError(result.error);
    sendJson(ctx.res, 200, { voices: result.voices });
  }

  async function readTtsRequest(ctx: RequestContext) {
    const body = await readBody(ctx);
    const text = requiredString(body, "text");
    const options = resolveVoiceOptions(
      {
        voice: optionalString(body, "voice"),
        rate: optionalString(body, "rate"),
        pitch: optionalString(body, "pitch"),
        volume: optionalString(body, "volume"),
      },
      config.tts.defaultVoice
    );
    return { text, options };
  }

  async function textToSpeech(ctx: RequestContext): Promise<void> {
    const { text, options } = await readTtsRequest(ctx);
    const t0 = Date.now();
    const audio = await tts.synthesize(text, options);
    logTtsCall(log, text.length, audio.length, Date.now() - t0);
    sendJson(ctx.res, 200, { audio_data: audio.toString("base64"), format: "mp3" });
  }

  async function textToSpeechStream(ctx: RequestContext): Promise<void> {
    const { text, options } = await readTtsRequest(ctx);
    const t0 = Date.now();
    const iterator = ttsToStream(tts, text, options)[Symbol.asyncIterator]();
    // Errors before the first chunk still get a JSON error response.
    const first = await iterator.next();
    ctx.res.writeHead(200, { "Content-Type": "audio/mpeg", "X-Content-Type-Options": "nosniff" });
    let totalBytes = 0;
    try {
      let next = first;
      while (!next.done) {
        throwIfAborted(ctx.signal);
        totalBytes += next.value.length;
        // Pull the next chunk only once the client has taken this one.
        if (!ctx.res.write(next.value)) await once(ctx.res, "drain", { signal: ctx.signal });
        next = await iterator.next();
      }
      ctx.res.end();
      logTtsCall(log, text.length, totalBytes, Date.now() - t0);
    } catch (err) {
      if (ctx.signal.aborted) {
        await iterator.return?.();
        log.debug({ event: "TTS_STREAM_ABORTED", bytesSent: totalBytes }, "Client went away mid-stream");
        return;
      }
      // Headers are gone; a truncated transfer is the only signal left for the client.
      const error = toError(err);
      logError(log, error, { event: "TTS_STREAM_FAILED", bytesSent: totalBytes });
      ctx.res.destroy(error);
    }
  }

  const routes: Record<string, (ctx: RequestContext) => Promise<void>> = {
    "GET /health": health,
    "GET /metrics": async (ctx) => sendJson(ctx.res, 200, getMetrics()),
    "POST /vad": detect,
    "POST /vad/session/start": sessionStart,
    "POST /vad/session/process": sessionProcess,
    "POST /vad/session/end": sessionEnd,
    "POST /asr": speechToText,
    "GET /tts/voices": listVoices,
    "POST /tts": textToSpeech,
    "POST /tts/stream": textToSpeechStream,
  };

  return http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "";
    const handler = routes[`${method} ${url.pathname}`];
    if (!handler) {
      sendJson(res, 404, { error: "NotFound", detail: `No route for ${method} ${url.pathname}` });
      return;
    }

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    handler({ req, res, url, signal: controller.signal }).catch((err: unknown) => {
      if (res.headersSent) {
        res.destroy();
        return;
      }
      if (controller.signal.aborted) {
        log.debug({ event: "REQUEST_ABORTED", route: url.pathname }, "Client went away");
        return;
      }
      if (isVoiceServiceError(err)) {
        if (err.status >= 500) log.warn({ event: "REQUEST_FAILED", route: url.pathname, kind: err.kind, err: err.message }, "Request failed");
        else log.debug({ event: "REQUEST_REJECTED", route: url.pathname, kind: err.kind, err: err.message }, "Request rejected");
        sendJson(res, err.status, { error: err.kind, detail: err.message });
        return;
      }
      const error = toError(err);
      logError(log, error, { route: url.pathname });
      sendJson(res, 500, { error: "Internal", detail: error.message });
    });
  });
}
