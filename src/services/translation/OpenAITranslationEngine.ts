import { OpenAI } from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { LoggingService } from "../logging/LoggingService";
import type { ContextSnapshot } from "../../types";
import type { TranslationEngine } from "../../types/engines";
import { formatContextSummary } from "../../core/contextSummary";
import { SubtitlePipelineError, ErrorCodes, ErrorSeverity } from "../../utils/error";

export interface OpenAITranslationEngineOptions {
  apiKey?: string;
  baseURL?: string;
  model: string;
  sourceLanguage: string;
  targetLanguage: string;
  temperature: number;
  maxTokens: number;
  logger: LoggingService;
}

const LANGUAGE_NAMES: Record<string, string> = {
  ja: "Japanese",
  en: "English",
  ko: "Korean",
  zh: "Chinese",
  "zh-TW": "Traditional Chinese",
  "zh-CN": "Simplified Chinese",
  fr: "French",
  de: "German",
  es: "Spanish",
};

export function languageName(code: string): string {
  return LANGUAGE_NAMES[code] ?? code;
}

const WARM_UP_PROBE = "こんにちは";

export function buildTranslationMessages(
  text: string,
  context: ContextSnapshot,
  sourceLanguage: string,
  targetLanguage: string
): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [
    {
      role: "system",
      content:
        `You translate live ${languageName(sourceLanguage)} speech into ` +
        `${languageName(targetLanguage)} subtitles. Reply with the translation only.`,
    },
  ];

  const contextBlock = formatContextSummary(context);
  if (contextBlock) {
    messages.push({
      role: "system",
      content: `Conversation so far:\n${contextBlock}`,
    });
  }

  messages.push({ role: "user", content: text });
  return messages;
}

export class OpenAITranslationEngine implements TranslationEngine {
  private readonly client: OpenAI | null;
  private readonly options: OpenAITranslationEngineOptions;
  private readonly logger: LoggingService;

  constructor(options: OpenAITranslationEngineOptions) {
    this.options = options;
    this.logger = options.logger.child("OpenAITranslationEngine");
    this.client = options.apiKey
      ? new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL })
      : null;
  }

  async loadModel(): Promise<boolean> {
    if (!this.client) {
      this.logger.warn("OPENAI_API_KEY is not set");
      return false;
    }

    const model = await this.client.models.retrieve(this.options.model);
    this.logger.info("Translation model available", { model: model.id });
    return true;
  }

  async warmUp(): Promise<void> {
    const probe = await this.translate(WARM_UP_PROBE, { summary: "", entries: [] });
    this.logger.debug("Translation warm-up finished", { probe });
  }

  async translate(text: string, context: ContextSnapshot): Promise<string> {
    if (!this.client) {
      throw new SubtitlePipelineError(
        "Translation engine has no API client",
        ErrorCodes.INVALID_STATE,
        ErrorSeverity.CRITICAL,
        { component: "OpenAITranslationEngine" }
      );
    }

    const completion = await this.client.chat.completions.create({
      model: this.options.model,
      messages: buildTranslationMessages(
        text,
        context,
        this.options.sourceLanguage,
        this.options.targetLanguage
      ),
      temperature: this.options.temperature,
      max_tokens: this.options.maxTokens,
    });

    return completion.choices[0]?.message?.content?.trim() ?? "";
  }
}
