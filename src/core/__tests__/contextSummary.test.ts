import { describe, expect, it } from "vitest";
import type { ContextEntry } from "../../types";
import { formatContextSummary, limitSummary, recentTurnsSummary } from "../contextSummary";

function entries(...originals: string[]): ContextEntry[] {
  return originals.map((originalText, index) => ({
    sequenceId: index + 1,
    originalText,
    translatedText: `t${index + 1}`,
  }));
}

describe("recentTurnsSummary", () => {
  it("is empty for fewer than two turns", () => {
    expect(recentTurnsSummary(entries("一"))).toBe("");
  });

  it("joins the last three originals", () => {
    expect(recentTurnsSummary(entries("一", "二", "三", "四"))).toBe("二 → 三 → 四");
  });

  it("clips long originals", () => {
    const long = "あ".repeat(35);

    expect(recentTurnsSummary(entries("短い", long))).toBe(`短い → ${"あ".repeat(30)}...`);
  });
});

describe("limitSummary", () => {
  it("trims and keeps short summaries intact", () => {
    expect(limitSummary("  ok  ", 10)).toBe("ok");
  });

  it("clips at the limit", () => {
    expect(limitSummary("abcdefghij", 4)).toBe("abcd...");
  });
});

describe("formatContextSummary", () => {
  it("is empty for an empty context", () => {
    expect(formatContextSummary({ summary: "", entries: [] })).toBe("");
  });

  it("lists the two most recent originals", () => {
    expect(formatContextSummary({ summary: "", entries: entries("一", "二", "三") })).toBe(
      "Recent:\n- 二\n- 三"
    );
  });

  it("puts the summary first", () => {
    expect(formatContextSummary({ summary: "挨拶", entries: entries("一") })).toBe(
      "Context: 挨拶\n\nRecent:\n- 一"
    );
  });

  it("shows a summary without entries on its own", () => {
    expect(formatContextSummary({ summary: "挨拶", entries: [] })).toBe("Context: 挨拶");
  });
});
