/**
 * Unit tests for TTS adapters (stub, Azure, ttsToStream, factory).
 */

import {
  AzureTTS,
  StubTTS,
  buildSsml,
  createTTS,
  escapeXml,
  resolveVoiceOptions,
  ttsToStream,
  type ITTS,
  type VoiceOptions,
} from "../../../src/adapters/tts";
import { InvalidRequestError } from "../../../src/errors";
import { testConfig } from "../../helpers/config";

const OPTIONS: VoiceOptions = { voice: "en-US-AriaNeural", rate: "+10%", pitch: "-5Hz", volume: "+0%" };

async function collect(stream: AsyncIterable<Buffer>): Promise<Buffer[]> {
  const chunks: Buffer[] = [];
  for await (const c of stream) chunks.push(c);
  return chunks;
}

describe("StubTTS", () => {
  it("returns empty buffer and no voices", async () => {
    const tts = new StubTTS();
    const result = await tts.synthesize("Hello", OPTIONS);
    expect(Buffer.isBuffer(result)).toBe(true);
    expect(result.length).toBe(0);
    await expect(tts.listVoices()).resolves.toEqual({ ok: true, voices: [] });
  });
});

describe("ttsToStream", () => {
  it("yields a single buffer when the adapter cannot stream", async () => {
    const buf = Buffer.from("abc");
    const tts: ITTS = {
      name: "fixed",
      synthesize: async () => buf,
      listVoices: async () => ({ ok: true, voices: [] }),
    };
    const chunks = await collect(ttsToStream(tts, "hi", OPTIONS));
    expect(chunks).toHaveLength(1);
    expect(chunks[0].equals(buf)).toBe(true);
  });

  it("passes streamed chunks through", async () => {
    const tts: ITTS = {
      name: "chunked",
      synthesize: async () => Buffer.alloc(0),
      async *synthesizeStream() {
        yield Buffer.from("a");
        yield Buffer.from("b");
      },
      listVoices: async () => ({ ok: true, voices: [] }),
    };
    const chunks = await collect(ttsToStream(tts, "hi", OPTIONS));
    expect(chunks.map((c) => c.toString())).toEqual(["a", "b"]);
  });
});

describe("resolveVoiceOptions", () => {
  it("fills defaults", () => {
    expect(resolveVoiceOptions({}, "zh-CN-XiaoxiaoNeural")).toEqual({
      voice: "zh-CN-XiaoxiaoNeural",
      rate: "+0%",
      pitch: "+0Hz",
      volume: "+0%",
    });
  });

  it("rejects malformed prosody and voice names", () => {
    expect(() => resolveVoiceOptions({ rate: "10%" }, "v")).toThrow(InvalidRequestError);
    expect(() => resolveVoiceOptions({ pitch: "+5%" }, "v")).toThrow("Invalid pitch '+5%'");
    expect(() => resolveVoiceOptions({ volume: "+5Hz" }, "v")).toThrow(InvalidRequestError);
    expect(() => resolveVoiceOptions({ voice: "en-US'/><x" }, "v")).toThrow(InvalidRequestError);
  });
});

describe("buildSsml", () => {
  it("escapes the text and applies prosody", () => {
    expect(escapeXml(`a<b & "c"`)).toBe("a&lt;b &amp; &quot;c&quot;");
    expect(buildSsml("1 < 2", OPTIONS)).toBe(
      "<speak version='1.0' xmlns='http://www.w3.org/2001/10/synthesis' xml:lang='en-US'>" +
        "<voice name='en-US-AriaNeural'>" +
        "<prosody rate='+10%' pitch='-5Hz' volume='+0%'>1 &lt; 2</prosody>" +
        "</voice></speak>"
    );
  });
});

describe("AzureTTS", () => {
  afterEach(() => jest.restoreAllMocks());

  const catalogue = [
    { ShortName: "zh-CN-XiaoxiaoNeural", Locale: "zh-CN", Gender: "Female", DisplayName: "Xiaoxiao", LocalName: "晓晓" },
    { ShortName: "en-US-AriaNeural", Locale: "en-US", Gender: "Female", DisplayName: "Aria", LocalName: "Aria" },
    { ShortName: "de-DE-KatjaNeural", Locale: "de-DE", Gender: "Female", DisplayName: "Katja", LocalName: "Katja" },
    { Locale: "fr-FR" },
  ];

  it("lists voices filtered by locale", async () => {
    const fetchSpy = jest
      .spyOn(globalThis, "fetch")
      .mockImplementation(async () => new Response(JSON.stringify(catalogue), { status: 200 }));
    const tts = new AzureTTS({ key: "test-secret", region: "eastus" });
    const result = await tts.listVoices({ locales: ["zh-CN", "en-US"] });
    expect(result).toEqual({
      ok: true,
      voices: [
        { name: "zh-CN-XiaoxiaoNeural", locale: "zh-CN", gender: "Female", description: "Xiaoxiao (晓晓)" },
        { name: "en-US-AriaNeural", locale: "en-US", gender: "Female", description: "Aria" },
      ],
    });
    expect(fetchSpy.mock.calls[0][0]).toBe("https://eastus.tts.speech.microsoft.com/cognitiveservices/voices/list");
  });

  it("applies the limit", async () => {
    jest.spyOn(globalThis, "fetch").mockImplementation(async () => new Response(JSON.stringify(catalogue), { status: 200 }));
    const result = await new AzureTTS({ key: "test-secret", region: "eastus" }).listVoices({ limit: 1 });
    expect(result.ok && result.voices.map((v) => v.name)).toEqual(["zh-CN-XiaoxiaoNeural"]);
  });

  it("reports a provider failure instead of an empty list", async () => {
    jest.spyOn(globalThis, "fetch").mockImplementation(async () => new Response("denied", { status: 401, statusText: "Unauthorized" }));
    const result = await new AzureTTS({ key: "test-secret", region: "eastus" }).listVoices();
    expect(result).toEqual({ ok: false, error: "Azure voice list failed: 401 Unauthorized" });
  });

  it("reports a network failure", async () => {
    jest.spyOn(globalThis, "fetch").mockRejectedValue(new Error("getaddrinfo ENOTFOUND"));
    const result = await new AzureTTS({ key: "test-secret", region: "eastus" }).listVoices();
    expect(result).toEqual({ ok: false, error: "Azure voice list failed: getaddrinfo ENOTFOUND" });
  });

  it("synthesizes from SSML", async () => {
    const fetchSpy = jest
      .spyOn(globalThis, "fetch")
      .mockImplementation(async () => new Response(new Uint8Array([1, 2, 3]), { status: 200 }));
    const audio = await new AzureTTS({ key: "test-secret", region: "eastus" }).synthesize("hi", OPTIONS);
    expect(audio).toEqual(Buffer.from([1, 2, 3]));
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe("https://eastus.tts.speech.microsoft.com/cognitiveservices/v1");
    expect(init?.body).toBe(buildSsml("hi", OPTIONS));
  });

  it("streams the response body", async () => {
    jest.spyOn(globalThis, "fetch").mockImplementation(async () => new Response(new Uint8Array([4, 5]), { status: 200 }));
    const chunks = await collect(ttsToStream(new AzureTTS({ key: "test-secret", region: "eastus" }), "hi", OPTIONS));
    expect(Buffer.concat(chunks)).toEqual(Buffer.from([4, 5]));
  });

  it("cancels the upstream body when the consumer stops early", async () => {
    let cancelled = false;
    async function* endless(): AsyncGenerator<Uint8Array> {
      try {
        for (;;) yield new Uint8Array([7]);
      } finally {
        cancelled = true;
      }
    }
    jest.spyOn(globalThis, "fetch").mockImplementation(async () => new Response(endless(), { status: 200 }));
    const tts = new AzureTTS({ key: "test-secret", region: "eastus" });
    for await (const chunk of tts.synthesizeStream("hi", OPTIONS)) {
      expect(chunk).toEqual(Buffer.from([7]));
      break;
    }
    expect(cancelled).toBe(true);
  });

  it("fails with an upstream error on a bad status", async () => {
    jest.spyOn(globalThis, "fetch").mockImplementation(async () => new Response("", { status: 500, statusText: "Server Error" }));
    await expect(new AzureTTS({ key: "test-secret", region: "eastus" }).synthesize("hi", OPTIONS)).rejects.toThrow(
      "Azure TTS failed: 500 Server Error"
    );
  });
});

describe("createTTS", () => {
  it("returns StubTTS when provider is stub", () => {
    expect(createTTS(testConfig())).toBeInstanceOf(StubTTS);
  });

  it("returns StubTTS for azure without credentials", () => {
    const config = testConfig();
    config.tts.provider = "azure";
    config.tts.azureKey = "test-secret";
    expect(createTTS(config)).toBeInstanceOf(StubTTS);
  });

  it("returns AzureTTS with key and region", () => {
    const config = testConfig();
    config.tts.provider = "azure";
    config.tts.azureKey = "test-secret";
    config.tts.azureRegion = "eastus";
    expect(createTTS(config)).toBeInstanceOf(AzureTTS);
  });
});
