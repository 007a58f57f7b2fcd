import type { PipelineConfig } from "../config";
import { PcmStreamAudioSource } from "../services/audio/PcmStreamAudioSource";
import { ConsoleSubtitleDisplay } from "../services/display/ConsoleSubtitleDisplay";
import type { LoggingService } from "../services/logging/LoggingService";
import { OpenAIRecognitionEngine } from "../services/recognition/OpenAIRecognitionEngine";
import { OpenAITranslationEngine } from "../services/translation/OpenAITranslationEngine";
import type {
  AudioSource,
  DisplaySink,
  RecognitionEngine,
  TranslationEngine,
} from "../types/engines";
import type { SummaryStrategy } from "./contextSummary";
import { SubtitlePipeline } from "./SubtitlePipeline";

export interface PipelineOverrides {
  audioSource?: AudioSource;
  recognitionEngine?: RecognitionEngine;
  translationEngine?: TranslationEngine;
  display?: DisplaySink;
  summaryStrategy?: SummaryStrategy;
}

export function buildPipeline(
  config: PipelineConfig,
  logger: LoggingService,
  overrides: PipelineOverrides = {}
): SubtitlePipeline {
  const { openai } = config;

  return new SubtitlePipeline({
    config,
    logger,
    audioSource:
      overrides.audioSource ??
      new PcmStreamAudioSource({
        input: process.stdin,
        sampleRate: config.sampleRate,
        logger,
      }),
    recognitionEngine:
      overrides.recognitionEngine ??
      new OpenAIRecognitionEngine({
        apiKey: openai.apiKey,
        baseURL: openai.baseURL,
        model: openai.recognitionModel,
        language: config.sourceLanguage,
        silenceThreshold: config.silenceThreshold,
        logger,
      }),
    translationEngine:
      overrides.translationEngine ??
      new OpenAITranslationEngine({
        apiKey: openai.apiKey,
        baseURL: openai.baseURL,
        model: openai.translationModel,
        sourceLanguage: config.sourceLanguage,
        targetLanguage: config.targetLanguage,
        temperature: openai.temperature,
        maxTokens: openai.maxTokens,
        logger,
      }),
    display: overrides.display ?? new ConsoleSubtitleDisplay(),
    summaryStrategy: overrides.summaryStrategy,
  });
}
