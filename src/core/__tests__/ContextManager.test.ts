import { describe, expect, it, vi } from "vitest";
import { LoggingService } from "../../services/logging/LoggingService";
import { ErrorCodes } from "../../utils/error";
import { ContextManager } from "../ContextManager";

function createManager(
  overrides: Partial<ConstructorParameters<typeof ContextManager>[0]> = {}
): ContextManager {
  return new ContextManager({ logger: LoggingService.silent(), ...overrides });
}

async function recordTurns(manager: ContextManager, count: number): Promise<void> {
  for (let i = 1; i <= count; i++) {
    await manager.recordTurn({ originalText: `原文${i}`, translatedText: `譯文${i}` });
  }
}

describe("ContextManager", () => {
  it("keeps at most windowSize entries and evicts the oldest first", async () => {
    const manager = createManager({ windowSize: 3 });

    await recordTurns(manager, 5);
    const snapshot = await manager.snapshot();

    expect(snapshot.entries.map((entry) => entry.sequenceId)).toEqual([3, 4, 5]);
    expect(snapshot.entries.map((entry) => entry.originalText)).toEqual(["原文3", "原文4", "原文5"]);
  });

  it("ignores blank originals", async () => {
    const manager = createManager();

    expect(await manager.recordTurn({ originalText: "   ", translatedText: "x" })).toBeNull();
    expect((await manager.snapshot()).entries).toEqual([]);
  });

  it("trims both texts of a turn", async () => {
    const manager = createManager();

    const entry = await manager.recordTurn({ originalText: " はい ", translatedText: " 是 " });

    expect(entry).toEqual({ sequenceId: 1, originalText: "はい", translatedText: "是" });
  });

  it("returns snapshots that later turns cannot change", async () => {
    const manager = createManager({ windowSize: 2 });
    await recordTurns(manager, 1);

    const before = await manager.snapshot();
    await recordTurns(manager, 3);

    expect(before.entries.map((entry) => entry.originalText)).toEqual(["原文1"]);
    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(before.entries)).toBe(true);
    expect(Object.isFrozen(before.entries[0])).toBe(true);
  });

  it("regenerates the summary every updateIntervalTurns turns", async () => {
    const strategy = vi.fn((window: readonly { originalText: string }[]) =>
      window.map((entry) => entry.originalText).join("|")
    );
    const manager = createManager({ updateIntervalTurns: 2, summaryStrategy: strategy });

    await recordTurns(manager, 1);
    expect((await manager.snapshot()).summary).toBe("");

    await recordTurns(manager, 1);
    expect(strategy).toHaveBeenCalledTimes(1);
    expect((await manager.snapshot()).summary).toBe("原文1|原文2");
  });

  it("uses the recent turns as the default summary", async () => {
    const manager = createManager({ updateIntervalTurns: 3 });

    await recordTurns(manager, 4);

    expect((await manager.snapshot()).summary).toBe("原文1 → 原文2 → 原文3");
  });

  it("limits the summary length", async () => {
    const manager = createManager({
      updateIntervalTurns: 1,
      maxSummaryLength: 20,
      summaryStrategy: () => "x".repeat(50),
    });

    await recordTurns(manager, 1);

    expect((await manager.snapshot()).summary).toBe(`${"x".repeat(20)}...`);
  });

  it("keeps the previous summary when the strategy fails", async () => {
    let calls = 0;
    const manager = createManager({
      updateIntervalTurns: 1,
      summaryStrategy: () => {
        calls++;
        if (calls > 1) {
          throw new Error("summarizer unavailable");
        }
        return "first";
      },
    });

    await recordTurns(manager, 2);

    expect((await manager.snapshot()).summary).toBe("first");
    expect((await manager.snapshot()).entries).toHaveLength(2);
  });

  it("serializes concurrent turns", async () => {
    const manager = createManager({ windowSize: 10 });

    await Promise.all(
      ["一", "二", "三", "四"].map((text) =>
        manager.recordTurn({ originalText: text, translatedText: text })
      )
    );

    const state = await manager.exportState();
    expect(state.entries.map((entry) => [entry.sequenceId, entry.originalText])).toEqual([
      [1, "一"],
      [2, "二"],
      [3, "三"],
      [4, "四"],
    ]);
    expect(state.turnCounter).toBe(4);
  });

  it("clears entries, summary and the turn counter", async () => {
    const manager = createManager({ updateIntervalTurns: 1 });
    await recordTurns(manager, 2);

    await manager.clear();

    expect(await manager.exportState()).toEqual({ entries: [], summary: "", turnCounter: 0 });
  });

  it("imports exported state into another manager", async () => {
    const source = createManager({ windowSize: 5 });
    await recordTurns(source, 4);
    const target = createManager({ windowSize: 2 });

    await target.importState(await source.exportState());

    const state = await target.exportState();
    expect(state.entries.map((entry) => entry.sequenceId)).toEqual([3, 4]);
    expect(state.turnCounter).toBe(4);
  });

  it("rejects malformed state", async () => {
    const manager = createManager();

    await expect(manager.importState({ entries: "nope" })).rejects.toMatchObject({
      code: ErrorCodes.CONTEXT_IMPORT_FAILED,
    });
  });

  it("rejects a window size below one", () => {
    expect(() => createManager({ windowSize: 0 })).toThrow(
      "Context window size and update interval must be at least 1"
    );
  });
});
