import type { LoggingService } from "../services/logging/LoggingService";
import type { AudioChunk, RecognitionResult } from "../types";
import type { RecognitionEngine } from "../types/engines";
import { ErrorCodes } from "../utils/error";
import { failureOutcome, type Emit, type StageHandler, type StageOutcome } from "./StageWorker";

const SEGMENT_MEMORY = 32;

/**
 * Runs each chunk through the recognition engine and emits its results as
 * they arrive. Results that break per-segment token order are dropped.
 */
export class RecognitionStage implements StageHandler<AudioChunk, RecognitionResult> {
  private readonly logger: LoggingService;
  private lastTokenIndex = new Map<string, number>();
  private finishedSegments: string[] = [];

  constructor(
    private readonly engine: RecognitionEngine,
    logger: LoggingService
  ) {
    this.logger = logger.child("RecognitionStage");
  }

  async handle(chunk: AudioChunk, emit: Emit<RecognitionResult>): Promise<StageOutcome> {
    let produced = 0;

    try {
      for await (const result of this.engine.transcribe(chunk)) {
        if (!this.accept(result)) {
          continue;
        }
        await emit(result);
        produced++;
      }
    } catch (error) {
      return failureOutcome(error, "Recognition failed", ErrorCodes.RECOGNITION_FAILED, {
        component: "RecognitionStage",
        chunkSequence: chunk.sequence,
        emitted: produced,
      });
    }

    this.logger.debug("Chunk recognized", {
      chunkSequence: chunk.sequence,
      isFinal: chunk.isFinal,
      results: produced,
    });
    return { status: "ok", produced };
  }

  /** Segments with partial results and no final yet. */
  get openSegments(): number {
    return this.lastTokenIndex.size;
  }

  reset(): void {
    this.lastTokenIndex.clear();
    this.finishedSegments = [];
  }

  private accept(result: RecognitionResult): boolean {
    if (this.finishedSegments.includes(result.segmentId)) {
      this.logger.warn("Dropped result for an already finalized segment", {
        segmentId: result.segmentId,
        tokenIndex: result.tokenIndex,
      });
      return false;
    }

    const last = this.lastTokenIndex.get(result.segmentId);
    if (last !== undefined && result.tokenIndex <= last) {
      this.logger.warn("Dropped out-of-order recognition result", {
        segmentId: result.segmentId,
        tokenIndex: result.tokenIndex,
        lastTokenIndex: last,
      });
      return false;
    }

    if (result.isFinalSegment) {
      this.lastTokenIndex.delete(result.segmentId);
      this.finishedSegments.push(result.segmentId);
      if (this.finishedSegments.length > SEGMENT_MEMORY) {
        this.finishedSegments.shift();
      }
    } else {
      this.lastTokenIndex.set(result.segmentId, result.tokenIndex);
      // Segments the engine never finalizes age out oldest first.
      if (this.lastTokenIndex.size > SEGMENT_MEMORY) {
        for (const segmentId of this.lastTokenIndex.keys()) {
          this.lastTokenIndex.delete(segmentId);
          break;
        }
      }
    }
    return true;
  }
}
