/**
 * Unit tests for ASR adapters (stub and factory).
 */

import { OpenAIWhisperASR, StubASR, createASR, isAudioFormat } from "../../../src/adapters/asr";
import type { TranscriptionParams } from "../../../src/adapters/asr/openai-whisper";
import { UpstreamFailureError } from "../../../src/errors";
import { testConfig } from "../../helpers/config";

describe("StubASR", () => {
  it("returns empty transcript in the requested language", async () => {
    const asr = new StubASR();
    const result = await asr.transcribe(Buffer.alloc(100), "pcm", "en");
    expect(result).toEqual({ text: "", language: "en" });
  });
});

describe("OpenAIWhisperASR", () => {
  function fakeTranscriptions(text: string) {
    return { create: jest.fn(async (_params: TranscriptionParams) => ({ text })) };
  }

  it("uploads raw PCM as a WAV file and trims the transcript", async () => {
    const transcriptions = fakeTranscriptions("  ni hao  ");
    const asr = new OpenAIWhisperASR({ apiKey: "test-secret", pcmSampleRateHz: 16000, transcriptions });
    await expect(asr.transcribe(Buffer.alloc(320), "pcm", "zh")).resolves.toEqual({ text: "ni hao", language: "zh" });

    const params = transcriptions.create.mock.calls[0][0];
    expect(params.model).toBe("whisper-1");
    expect(params.language).toBe("zh");
    expect(params.file.name).toBe("audio.wav");
    expect(params.file.size).toBe(364);
    expect(await params.file.slice(0, 4).text()).toBe("RIFF");
    expect(await params.file.slice(8, 12).text()).toBe("WAVE");
  });

  it("uploads container formats unchanged under their own name", async () => {
    const transcriptions = fakeTranscriptions("hello");
    const asr = new OpenAIWhisperASR({ apiKey: "test-secret", model: "whisper-large", transcriptions });
    await asr.transcribe(Buffer.from("webm-bytes"), "webm", "en");

    const params = transcriptions.create.mock.calls[0][0];
    expect(params.model).toBe("whisper-large");
    expect(params.file.name).toBe("audio.webm");
    expect(await params.file.text()).toBe("webm-bytes");
  });

  it("maps a provider error to UpstreamFailure", async () => {
    const transcriptions = {
      create: jest.fn(async (_params: TranscriptionParams): Promise<{ text: string }> => {
        throw new Error("429 quota exceeded");
      }),
    };
    const asr = new OpenAIWhisperASR({ apiKey: "test-secret", transcriptions });
    const err = await asr.transcribe(Buffer.alloc(320), "pcm", "zh").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamFailureError);
    expect(err).toHaveProperty("message", "ASR processing failed: 429 quota exceeded");
    expect(err).toHaveProperty("status", 502);
  });
});

describe("isAudioFormat", () => {
  it("accepts known containers only", () => {
    expect(isAudioFormat("pcm")).toBe(true);
    expect(isAudioFormat("webm")).toBe(true);
    expect(isAudioFormat("flac")).toBe(false);
    expect(isAudioFormat("PCM")).toBe(false);
  });
});

describe("createASR", () => {
  it("returns StubASR when provider is stub", () => {
    expect(createASR(testConfig())).toBeInstanceOf(StubASR);
  });

  it("returns StubASR when provider is openai but no api key", () => {
    const config = testConfig();
    config.asr.provider = "openai";
    expect(createASR(config)).toBeInstanceOf(StubASR);
  });

  it("returns OpenAIWhisperASR when provider is openai with a key", () => {
    const config = testConfig();
    config.asr.provider = "openai";
    config.asr.openaiApiKey = "test-secret";
    const asr = createASR(config);
    expect(asr).toBeInstanceOf(OpenAIWhisperASR);
    expect(asr.name).toBe("openai");
  });
});
