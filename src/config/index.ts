import { z } from "zod";
import { SubtitlePipelineError, ErrorCodes, ErrorSeverity } from "../utils/error";

export const DEFAULT_SOURCE_LANGUAGE = "ja";
export const DEFAULT_TARGET_LANGUAGE = "zh-TW";

// Internal tuning: small enough that buffering stays within about one chunk of latency.
export const QUEUE_CAPACITIES = {
  audio: 2,
  segments: 2,
  display: 4,
} as const;

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const configSchema = z.object({
  chunkDurationSeconds: z.coerce.number().positive().max(30).default(2.0),
  sampleRate: z.coerce.number().int().min(8000).max(48000).default(16000),
  contextWindowSize: z.coerce.number().int().min(1).max(50).default(5),
  updateContextIntervalTurns: z.coerce.number().int().min(1).default(3),
  maxSummaryLength: z.coerce.number().int().min(20).max(2000).default(200),
  audioDeviceIndex: z.coerce.number().int().min(0).default(0),
  shutdownGraceMs: z.coerce.number().int().min(100).max(60000).default(3000),
  sourceLanguage: z.string().min(1).default(DEFAULT_SOURCE_LANGUAGE),
  targetLanguage: z.string().min(1).default(DEFAULT_TARGET_LANGUAGE),
  silenceThreshold: z.coerce.number().min(0).max(1).default(0.01),
  openai: z.object({
    apiKey: optionalString,
    baseURL: optionalString,
    recognitionModel: z.string().min(1).default("whisper-1"),
    translationModel: z.string().min(1).default("gpt-4o-mini"),
    temperature: z.coerce.number().min(0).max(2).default(0.3),
    maxTokens: z.coerce.number().int().min(16).max(4096).default(200),
  }),
  logging: z.object({
    level: z.enum(["debug", "info", "warn", "error"]).default("info"),
    dir: optionalString,
  }),
});

export type PipelineConfig = z.output<typeof configSchema>;

type Env = Record<string, string | undefined>;

// Empty variables fall back to the schema defaults.
function read(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function loadConfig(env: Env = process.env): PipelineConfig {
  const result = configSchema.safeParse({
    chunkDurationSeconds: read(env, "SUBTITLE_CHUNK_DURATION_SECONDS"),
    sampleRate: read(env, "SUBTITLE_SAMPLE_RATE"),
    contextWindowSize: read(env, "SUBTITLE_CONTEXT_WINDOW_SIZE"),
    updateContextIntervalTurns: read(env, "SUBTITLE_UPDATE_CONTEXT_INTERVAL"),
    maxSummaryLength: read(env, "SUBTITLE_MAX_SUMMARY_LENGTH"),
    audioDeviceIndex: read(env, "SUBTITLE_AUDIO_DEVICE_INDEX"),
    shutdownGraceMs: read(env, "SUBTITLE_SHUTDOWN_GRACE_MS"),
    sourceLanguage: read(env, "SUBTITLE_SOURCE_LANGUAGE"),
    targetLanguage: read(env, "SUBTITLE_TARGET_LANGUAGE"),
    silenceThreshold: read(env, "SUBTITLE_SILENCE_THRESHOLD"),
    openai: {
      apiKey: read(env, "OPENAI_API_KEY"),
      baseURL: read(env, "OPENAI_BASE_URL"),
      recognitionModel: read(env, "SUBTITLE_RECOGNITION_MODEL"),
      translationModel: read(env, "SUBTITLE_TRANSLATION_MODEL"),
      temperature: read(env, "SUBTITLE_TRANSLATION_TEMPERATURE"),
      maxTokens: read(env, "SUBTITLE_TRANSLATION_MAX_TOKENS"),
    },
    logging: {
      level: read(env, "LOG_LEVEL"),
      dir: read(env, "LOG_DIR"),
    },
  });

  if (!result.success) {
    const issues = result.error.errors.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new SubtitlePipelineError(
      `Invalid configuration: ${issues.join("; ")}`,
      ErrorCodes.INVALID_CONFIG,
      ErrorSeverity.CRITICAL,
      { component: "config", issues }
    );
  }

  return result.data;
}
