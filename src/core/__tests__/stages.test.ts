import { describe, expect, it, vi } from "vitest";
import { LoggingService } from "../../services/logging/LoggingService";
import type { AudioChunk, DisplayMessage, RecognitionResult, TranslationResult } from "../../types";
import { ErrorCodes, ErrorSeverity } from "../../utils/error";
import { ContextManager } from "../ContextManager";
import { DisplayStage } from "../DisplayStage";
import { RecognitionStage } from "../RecognitionStage";
import { TranslationStage } from "../TranslationStage";
import { DictionaryTranslationEngine, ScriptedRecognitionEngine } from "./fakes";

const logger = LoggingService.silent();

const CHUNK: AudioChunk = {
  sequence: 0,
  samples: new Float32Array(4),
  sampleRate: 16000,
  durationSeconds: 0.00025,
  isFinal: false,
};

function result(segmentId: string, tokenIndex: number, text: string, isFinalSegment = false): RecognitionResult {
  return { chunkSequence: 0, segmentId, tokenIndex, text, isFinalSegment };
}

describe("RecognitionStage", () => {
  it("emits results in engine order", async () => {
    const script = [result("a", 0, "は"), result("a", 1, "はい"), result("a", 2, "はい", true)];
    const stage = new RecognitionStage(new ScriptedRecognitionEngine(() => script), logger);
    const emitted: RecognitionResult[] = [];

    const outcome = await stage.handle(CHUNK, async (output) => {
      emitted.push(output);
    });

    expect(outcome).toEqual({ status: "ok", produced: 3 });
    expect(emitted).toEqual(script);
  });

  it("drops results that go backwards or arrive after the final", async () => {
    const script = [
      result("a", 0, "は"),
      result("a", 2, "はいは"),
      result("a", 1, "はい"),
      result("a", 3, "はいはい", true),
      result("a", 4, "はいはいは"),
    ];
    const stage = new RecognitionStage(new ScriptedRecognitionEngine(() => script), logger);
    const emitted: string[] = [];

    await stage.handle(CHUNK, async (output) => {
      emitted.push(output.text);
    });

    expect(emitted).toEqual(["は", "はいは", "はいはい"]);
  });

  it("forgets the oldest segments that never get a final", async () => {
    const script = Array.from({ length: 40 }, (_, index) => result(`s${index}`, 0, "は"));
    const stage = new RecognitionStage(new ScriptedRecognitionEngine(() => script), logger);
    const emitted: string[] = [];

    await stage.handle(CHUNK, async (output) => {
      emitted.push(output.segmentId);
    });
    expect(stage.openSegments).toBe(32);

    // s0 was forgotten, so its token order starts over; s39 is still tracked.
    const replay = new RecognitionStage(
      new ScriptedRecognitionEngine(() => [...script, result("s0", 0, "は"), result("s39", 0, "は")]),
      logger
    );
    const replayed: string[] = [];
    await replay.handle(CHUNK, async (output) => {
      replayed.push(output.segmentId);
    });

    expect(emitted).toHaveLength(40);
    expect(replayed.slice(40)).toEqual(["s0"]);
    expect(replay.openSegments).toBe(32);
  });

  it("reports engine failures as transient", async () => {
    const engine = new ScriptedRecognitionEngine(() => {
      throw new Error("decoder crashed");
    });
    const stage = new RecognitionStage(engine, logger);

    const outcome = await stage.handle(CHUNK, async () => undefined);

    expect(outcome).toMatchObject({
      status: "transient",
      error: {
        code: ErrorCodes.RECOGNITION_FAILED,
        severity: ErrorSeverity.MEDIUM,
        metadata: { chunkSequence: 0, originalError: "decoder crashed" },
      },
    });
  });
});

describe("TranslationStage", () => {
  function setup(dictionary: Record<string, string> = { はい: "是" }) {
    const engine = new DictionaryTranslationEngine(dictionary);
    const context = new ContextManager({ logger });
    const stage = new TranslationStage(engine, context, logger);
    const emitted: TranslationResult[] = [];
    const emit = async (output: TranslationResult): Promise<void> => {
      emitted.push(output);
    };
    return { engine, context, stage, emitted, emit };
  }

  it("translates a final segment and records the turn", async () => {
    const { context, stage, emitted, emit } = setup();

    const outcome = await stage.handle(result("a", 1, " はい ", true), emit);

    expect(outcome).toEqual({ status: "ok", produced: 1 });
    expect(emitted).toEqual([
      {
        segmentId: "a",
        originalText: "はい",
        translatedText: "是",
        context: { summary: "", entries: [] },
        contextSummary: "",
      },
    ]);
    expect((await context.snapshot()).entries).toHaveLength(1);
  });

  it("ignores partial segments", async () => {
    const { engine, stage, emitted, emit } = setup();

    expect(await stage.handle(result("a", 0, "は"), emit)).toEqual({ status: "ok", produced: 0 });
    expect(engine.requests).toEqual([]);
    expect(emitted).toEqual([]);
  });

  it("skips an empty translation without recording it", async () => {
    const { context, stage, emitted, emit } = setup({ はい: "  " });

    const outcome = await stage.handle(result("a", 1, "はい", true), emit);

    expect(outcome).toMatchObject({
      status: "transient",
      error: { code: ErrorCodes.TRANSLATION_FAILED, severity: ErrorSeverity.LOW },
    });
    expect(emitted).toEqual([]);
    expect((await context.snapshot()).entries).toEqual([]);
  });
});

describe("DisplayStage", () => {
  it("delivers each message on a later tick", async () => {
    const deliver = vi.fn();
    const stage = new DisplayStage(deliver);
    const message: DisplayMessage = { kind: "partial", text: "は", segmentId: "a", chunkSequence: 0 };

    const handling = stage.handle(message);
    expect(deliver).not.toHaveBeenCalled();

    expect(await handling).toEqual({ status: "ok", produced: 0 });
    expect(deliver).toHaveBeenCalledWith(message);
  });

  it("turns a display error into a transient failure", async () => {
    const stage = new DisplayStage(() => {
      throw new Error("terminal closed");
    });

    const outcome = await stage.handle({
      kind: "partial",
      text: "は",
      segmentId: "a",
      chunkSequence: 0,
    });

    expect(outcome).toMatchObject({
      status: "transient",
      error: { code: ErrorCodes.DISPLAY_FAILED },
    });
  });
});
