import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      corsOrigin: "*",
      upstream: {
        apiKey: "",
        url: "wss://api.deepgram.com",
        model: "nova-2",
        diarize: false,
        sampleRate: 16000,
      },
      summarizer: {
        apiKey: null,
        model: "gpt-4o-mini",
      },
    });
  });

  it("reads credentials and overrides", () => {
    const config = loadConfig({
      DEEPGRAM_API_KEY: " test-upstream-key ",
      DEEPGRAM_MODEL: "nova-3",
      DEEPGRAM_DIARIZE: "Yes",
      AUDIO_SAMPLE_RATE: "48000",
      OPENAI_API_KEY: "test-summarizer-key",
      SUMMARIZER_MODEL: "gpt-4o",
      PORT: "9100",
    });

    expect(config.upstream.apiKey).toBe("test-upstream-key");
    expect(config.upstream.model).toBe("nova-3");
    expect(config.upstream.diarize).toBe(true);
    expect(config.upstream.sampleRate).toBe(48000);
    expect(config.summarizer).toEqual({ apiKey: "test-summarizer-key", model: "gpt-4o" });
    expect(config.port).toBe(9100);
  });

  it("treats a blank summarizer key as absent", () => {
    expect(loadConfig({ OPENAI_API_KEY: "   " }).summarizer.apiKey).toBeNull();
  });

  it("rejects invalid values, naming each variable", () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: "not-a-port", DEEPGRAM_DIARIZE: "maybe" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues.some((issue) => issue.startsWith("PORT:"))).toBe(true);
    expect(issues).toContain("DEEPGRAM_DIARIZE: Expected one of true/false/1/0/yes/no");
  });
});
