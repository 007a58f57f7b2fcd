import { describe, expect, it } from "vitest";
import { ErrorCodes } from "../../utils/error";
import { loadConfig } from "../index";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      chunkDurationSeconds: 2,
      sampleRate: 16000,
      contextWindowSize: 5,
      updateContextIntervalTurns: 3,
      maxSummaryLength: 200,
      audioDeviceIndex: 0,
      shutdownGraceMs: 3000,
      sourceLanguage: "ja",
      targetLanguage: "zh-TW",
      silenceThreshold: 0.01,
      logging: { level: "info" },
    });
    expect(config.openai).toEqual({
      apiKey: undefined,
      baseURL: undefined,
      recognitionModel: "whisper-1",
      translationModel: "gpt-4o-mini",
      temperature: 0.3,
      maxTokens: 200,
    });
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({
      SUBTITLE_CHUNK_DURATION_SECONDS: "1.5",
      SUBTITLE_CONTEXT_WINDOW_SIZE: "8",
      SUBTITLE_AUDIO_DEVICE_INDEX: "2",
      OPENAI_API_KEY: "test-secret",
      LOG_LEVEL: "debug",
    });

    expect(config.chunkDurationSeconds).toBe(1.5);
    expect(config.contextWindowSize).toBe(8);
    expect(config.audioDeviceIndex).toBe(2);
    expect(config.openai.apiKey).toBe("test-secret");
    expect(config.logging.level).toBe("debug");
  });

  it("treats blank variables as unset", () => {
    const config = loadConfig({ SUBTITLE_SAMPLE_RATE: "  ", OPENAI_API_KEY: "" });

    expect(config.sampleRate).toBe(16000);
    expect(config.openai.apiKey).toBeUndefined();
  });

  it("lists every invalid variable", () => {
    let error: unknown;
    try {
      loadConfig({ SUBTITLE_CHUNK_DURATION_SECONDS: "0", SUBTITLE_CONTEXT_WINDOW_SIZE: "abc" });
    } catch (caught) {
      error = caught;
    }

    expect(error).toMatchObject({
      code: ErrorCodes.INVALID_CONFIG,
      metadata: {
        component: "config",
        issues: [
          "chunkDurationSeconds: Number must be greater than 0",
          "contextWindowSize: Expected number, received nan",
        ],
      },
    });
  });
});
