import type { ContextEntry, ContextSnapshot } from "../types";

/**
 * Produces the rolling summary from the current window. Must be
 * deterministic for a given window.
 */
export type SummaryStrategy = (
  window: readonly ContextEntry[]
) => string | Promise<string>;

const SUMMARY_TURNS = 3;
const SUMMARY_TURN_LENGTH = 30;

function clip(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

export const recentTurnsSummary: SummaryStrategy = (window) => {
  if (window.length < 2) {
    return "";
  }

  return window
    .slice(-SUMMARY_TURNS)
    .map((entry) => clip(entry.originalText, SUMMARY_TURN_LENGTH))
    .join(" → ");
};

export function limitSummary(summary: string, maxLength: number): string {
  return clip(summary.trim(), maxLength);
}

// Display form of a snapshot: the summary line, then the most recent originals.
export function formatContextSummary(
  snapshot: ContextSnapshot,
  recentCount = 2
): string {
  const recent = snapshot.entries.slice(-recentCount);
  const recentBlock = recent.length
    ? ["Recent:", ...recent.map((entry) => `- ${entry.originalText}`)].join("\n")
    : "";

  if (!snapshot.summary) {
    return recentBlock;
  }

  return recentBlock
    ? `Context: ${snapshot.summary}\n\n${recentBlock}`
    : `Context: ${snapshot.summary}`;
}
