import type { LoggingService } from "../services/logging/LoggingService";
import type { RecognitionResult, TranslationRequest, TranslationResult } from "../types";
import type { TranslationEngine } from "../types/engines";
import { SubtitlePipelineError, ErrorCodes, ErrorSeverity } from "../utils/error";
import type { ContextManager } from "./ContextManager";
import { formatContextSummary } from "./contextSummary";
import { failureOutcome, type Emit, type StageHandler, type StageOutcome } from "./StageWorker";

/**
 * Translates finalized utterances against a snapshot of the rolling context,
 * then records the new turn. The emitted result carries the snapshot that
 * was used, not the context as it stands afterwards.
 */
export class TranslationStage implements StageHandler<RecognitionResult, TranslationResult> {
  private readonly logger: LoggingService;

  constructor(
    private readonly engine: TranslationEngine,
    private readonly context: ContextManager,
    logger: LoggingService
  ) {
    this.logger = logger.child("TranslationStage");
  }

  async handle(
    segment: RecognitionResult,
    emit: Emit<TranslationResult>
  ): Promise<StageOutcome> {
    if (!segment.isFinalSegment) {
      this.logger.debug("Skipped partial segment", { segmentId: segment.segmentId });
      return { status: "ok", produced: 0 };
    }

    const text = segment.text.trim();
    if (!text) {
      return { status: "ok", produced: 0 };
    }

    try {
      const request: TranslationRequest = {
        text,
        segmentId: segment.segmentId,
        context: await this.context.snapshot(),
      };

      const translation = (await this.engine.translate(request.text, request.context)).trim();
      if (!translation) {
        return {
          status: "transient",
          error: new SubtitlePipelineError(
            "Translation engine returned no text",
            ErrorCodes.TRANSLATION_FAILED,
            ErrorSeverity.LOW,
            { component: "TranslationStage", segmentId: segment.segmentId }
          ),
        };
      }

      await this.context.recordTurn({ originalText: text, translatedText: translation });
      await emit({
        segmentId: request.segmentId,
        originalText: request.text,
        translatedText: translation,
        context: request.context,
        contextSummary: formatContextSummary(request.context),
      });
    } catch (error) {
      return failureOutcome(error, "Translation failed", ErrorCodes.TRANSLATION_FAILED, {
        component: "TranslationStage",
        segmentId: segment.segmentId,
      });
    }

    return { status: "ok", produced: 1 };
  }
}
