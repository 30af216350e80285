import type { AppConfig } from "../../src/config";

/** Fixed config for tests; never reads the environment. */
export function testConfig(): AppConfig {
  return {
    server: { host: "127.0.0.1", port: 0, maxBodyBytes: 64 * 1024 },
    vad: {
      provider: "stub",
      sampleRate: 16000,
      threshold: 0.5,
      thresholdLow: 0.15,
      windowSize: 5,
      minVoicedFrames: 3,
      silenceFrames: 16,
      webrtcMode: 1,
      webrtcFrameMs: 20,
      energyRms: 500,
      remoteTimeoutMs: 2000,
      remoteConcurrent: false,
    },
    asr: { provider: "stub", openaiModel: "whisper-1", defaultLanguage: "zh" },
    tts: {
      provider: "stub",
      defaultVoice: "zh-CN-XiaoxiaoNeural",
      voiceLocales: ["zh-CN", "en-US"],
      maxVoices: 20,
    },
  };
}
