/**
 * Unit tests for config loading.
 */

import { loadConfig } from "../../../src/config";

const KEYS = [
  "HOST",
  "PORT",
  "VAD_PROVIDER",
  "VAD_THRESHOLD",
  "VAD_THRESHOLD_LOW",
  "VAD_WINDOW_SIZE",
  "VAD_MIN_VOICED_FRAMES",
  "VAD_SILENCE_FRAMES",
  "VAD_WEBRTC_FRAME_MS",
  "VAD_REMOTE_URL",
  "VAD_REMOTE_CONCURRENT",
  "ASR_PROVIDER",
  "ASR_DEFAULT_LANGUAGE",
  "TTS_PROVIDER",
  "TTS_VOICE_LOCALES",
];

describe("loadConfig", () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it("uses session defaults when nothing is set", () => {
    const { vad, server } = loadConfig();
    expect(server).toMatchObject({ host: "127.0.0.1", port: 8765 });
    expect(vad).toMatchObject({
      provider: "webrtc",
      sampleRate: 16000,
      threshold: 0.5,
      thresholdLow: 0.15,
      windowSize: 5,
      minVoicedFrames: 3,
      silenceFrames: 16,
      remoteConcurrent: false,
    });
    expect(vad.remoteUrl).toBeUndefined();
  });

  it("reads overrides from the environment", () => {
    process.env.PORT = "9000";
    process.env.VAD_PROVIDER = "Energy";
    process.env.VAD_THRESHOLD = "0.6";
    process.env.VAD_SILENCE_FRAMES = "20";
    process.env.VAD_REMOTE_CONCURRENT = "true";
    process.env.TTS_VOICE_LOCALES = "en-GB, ja-JP";
    const config = loadConfig();
    expect(config.server.port).toBe(9000);
    expect(config.vad.provider).toBe("energy");
    expect(config.vad.threshold).toBe(0.6);
    expect(config.vad.silenceFrames).toBe(20);
    expect(config.vad.remoteConcurrent).toBe(true);
    expect(config.tts.voiceLocales).toEqual(["en-GB", "ja-JP"]);
  });

  it("falls back to defaults for values it cannot use", () => {
    process.env.PORT = "not-a-port";
    process.env.VAD_PROVIDER = "silero-onnx";
    process.env.VAD_THRESHOLD = "1.5";
    process.env.VAD_WEBRTC_FRAME_MS = "25";
    process.env.ASR_PROVIDER = "deepgram";
    const config = loadConfig();
    expect(config.server.port).toBe(8765);
    expect(config.vad.provider).toBe("webrtc");
    expect(config.vad.threshold).toBe(0.5);
    expect(config.vad.webrtcFrameMs).toBe(20);
    expect(config.asr.provider).toBe("openai");
  });

  it("keeps the low threshold at or below the high one", () => {
    process.env.VAD_THRESHOLD = "0.4";
    process.env.VAD_THRESHOLD_LOW = "0.6";
    const { vad } = loadConfig();
    expect(vad.threshold).toBe(0.4);
    expect(vad.thresholdLow).toBe(0.4);
  });

  it("caps the voiced-frame count at the window size", () => {
    process.env.VAD_WINDOW_SIZE = "4";
    process.env.VAD_MIN_VOICED_FRAMES = "7";
    const { vad } = loadConfig();
    expect(vad.windowSize).toBe(4);
    expect(vad.minVoicedFrames).toBe(4);
  });
});
