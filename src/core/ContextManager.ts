import { EventEmitter } from "events";
import { z } from "zod";
import type { LoggingService } from "../services/logging/LoggingService";
import type {
  ContextEntry,
  ContextSnapshot,
  ContextState,
  ContextTurn,
} from "../types";
import { Mutex } from "../utils/Mutex";
import {
  SubtitlePipelineError,
  ErrorCodes,
  ErrorSeverity,
  toPipelineError,
} from "../utils/error";
import { limitSummary, recentTurnsSummary, type SummaryStrategy } from "./contextSummary";

export interface ContextManagerOptions {
  windowSize?: number;
  updateIntervalTurns?: number;
  maxSummaryLength?: number;
  summaryStrategy?: SummaryStrategy;
  logger: LoggingService;
}

export interface ContextManagerEvents {
  turnRecorded: (entry: ContextEntry) => void;
  summaryUpdated: (summary: string) => void;
  cleared: () => void;
}

const contextStateSchema = z.object({
  entries: z.array(
    z.object({
      sequenceId: z.number().int().nonnegative(),
      originalText: z.string(),
      translatedText: z.string(),
    })
  ),
  summary: z.string(),
  turnCounter: z.number().int().nonnegative(),
});

function freezeEntry(entry: ContextEntry): ContextEntry {
  return Object.freeze({
    sequenceId: entry.sequenceId,
    originalText: entry.originalText,
    translatedText: entry.translatedText,
  });
}

/**
 * Rolling window of recent (original, translation) turns plus a summary
 * regenerated every `updateIntervalTurns` turns. All reads and writes go
 * through one mutex, so a snapshot never observes a half-applied turn.
 */
export class ContextManager extends EventEmitter {
  readonly windowSize: number;
  readonly updateIntervalTurns: number;
  readonly maxSummaryLength: number;
  private readonly summaryStrategy: SummaryStrategy;
  private readonly logger: LoggingService;
  private readonly mutex = new Mutex();
  private window: ContextEntry[] = [];
  private summary = "";
  private turnCounter = 0;

  constructor(options: ContextManagerOptions) {
    super();
    this.windowSize = options.windowSize ?? 5;
    this.updateIntervalTurns = options.updateIntervalTurns ?? 3;
    this.maxSummaryLength = options.maxSummaryLength ?? 200;
    this.summaryStrategy = options.summaryStrategy ?? recentTurnsSummary;
    this.logger = options.logger.child("ContextManager");

    if (this.windowSize < 1 || this.updateIntervalTurns < 1) {
      throw new SubtitlePipelineError(
        "Context window size and update interval must be at least 1",
        ErrorCodes.INVALID_CONFIG,
        ErrorSeverity.CRITICAL,
        {
          component: "ContextManager",
          windowSize: this.windowSize,
          updateIntervalTurns: this.updateIntervalTurns,
        }
      );
    }

    this.logger.info("Context manager initialized", {
      windowSize: this.windowSize,
      updateIntervalTurns: this.updateIntervalTurns,
    });
  }

  snapshot(): Promise<ContextSnapshot> {
    return this.mutex.runExclusive(() => this.takeSnapshot());
  }

  recordTurn(turn: ContextTurn): Promise<ContextEntry | null> {
    return this.mutex.runExclusive(async () => {
      const originalText = turn.originalText.trim();
      if (!originalText) {
        return null;
      }

      this.turnCounter++;
      const entry = freezeEntry({
        sequenceId: this.turnCounter,
        originalText,
        translatedText: turn.translatedText.trim(),
      });

      this.window.push(entry);
      while (this.window.length > this.windowSize) {
        this.window.shift();
      }

      this.logger.debug("Recorded turn", {
        sequenceId: entry.sequenceId,
        windowLength: this.window.length,
      });
      this.emit("turnRecorded", entry);

      if (this.turnCounter % this.updateIntervalTurns === 0) {
        await this.regenerateSummary();
      }

      return entry;
    });
  }

  clear(): Promise<void> {
    return this.mutex.runExclusive(() => {
      this.window = [];
      this.summary = "";
      this.turnCounter = 0;
      this.logger.info("Context cleared");
      this.emit("cleared");
    });
  }

  exportState(): Promise<ContextState> {
    return this.mutex.runExclusive(() => ({
      entries: this.window.map((entry) => ({ ...entry })),
      summary: this.summary,
      turnCounter: this.turnCounter,
    }));
  }

  importState(state: unknown): Promise<void> {
    return this.mutex.runExclusive(() => {
      const parsed = contextStateSchema.safeParse(state);
      if (!parsed.success) {
        throw new SubtitlePipelineError(
          "Invalid context state",
          ErrorCodes.CONTEXT_IMPORT_FAILED,
          ErrorSeverity.MEDIUM,
          {
            component: "ContextManager",
            issues: parsed.error.errors.map((issue) => issue.message),
          }
        );
      }

      this.window = parsed.data.entries.slice(-this.windowSize).map(freezeEntry);
      this.summary = limitSummary(parsed.data.summary, this.maxSummaryLength);
      this.turnCounter = parsed.data.turnCounter;
      this.logger.info("Context imported", {
        entries: this.window.length,
        turnCounter: this.turnCounter,
      });
    });
  }

  on<K extends keyof ContextManagerEvents>(
    event: K,
    listener: ContextManagerEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof ContextManagerEvents>(
    event: K,
    ...args: Parameters<ContextManagerEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  private takeSnapshot(): ContextSnapshot {
    return Object.freeze({
      summary: this.summary,
      entries: Object.freeze([...this.window]),
    });
  }

  // A failing strategy keeps the previous summary.
  private async regenerateSummary(): Promise<void> {
    try {
      const summary = await this.summaryStrategy(this.takeSnapshot().entries);
      this.summary = limitSummary(summary, this.maxSummaryLength);
      this.logger.debug("Context summary updated", { summary: this.summary });
      this.emit("summaryUpdated", this.summary);
    } catch (error) {
      this.logger.error(
        toPipelineError(
          error,
          "Failed to update context summary",
          ErrorCodes.CONTEXT_SUMMARY_FAILED,
          ErrorSeverity.MEDIUM,
          { component: "ContextManager", turnCounter: this.turnCounter }
        )
      );
    }
  }
}
