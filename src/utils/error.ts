export enum ErrorCodes {
  // Startup Errors
  MODEL_LOAD_FAILED = "MODEL_LOAD_FAILED",
  WARM_UP_FAILED = "WARM_UP_FAILED",
  AUDIO_SOURCE_FAILED = "AUDIO_SOURCE_FAILED",
  INVALID_CONFIG = "INVALID_CONFIG",

  // Stage Errors
  RECOGNITION_FAILED = "RECOGNITION_FAILED",
  TRANSLATION_FAILED = "TRANSLATION_FAILED",
  DISPLAY_FAILED = "DISPLAY_FAILED",

  // Queue Errors
  QUEUE_OVERFLOW = "QUEUE_OVERFLOW",
  QUEUE_CLOSED = "QUEUE_CLOSED",

  // Lifecycle Errors
  INVALID_STATE = "INVALID_STATE",
  SHUTDOWN_TIMEOUT = "SHUTDOWN_TIMEOUT",

  // Context Errors
  CONTEXT_SUMMARY_FAILED = "CONTEXT_SUMMARY_FAILED",
  CONTEXT_IMPORT_FAILED = "CONTEXT_IMPORT_FAILED",
}

export enum ErrorSeverity {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
  CRITICAL = "critical",
}

export interface ErrorMetadata {
  component: string;
  originalError?: string;
  [key: string]: unknown;
}

export class SubtitlePipelineError extends Error {
  code: ErrorCodes;
  severity: ErrorSeverity;
  metadata: ErrorMetadata;

  constructor(
    message: string,
    code: ErrorCodes,
    severity: ErrorSeverity,
    metadata: Partial<ErrorMetadata>
  ) {
    super(message);
    this.name = "SubtitlePipelineError";
    this.code = code;
    this.severity = severity;
    this.metadata = {
      ...metadata,
      component: metadata.component || "unknown",
    };
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Wraps anything thrown by a collaborator, leaving our own errors untouched.
export function toPipelineError(
  error: unknown,
  message: string,
  code: ErrorCodes,
  severity: ErrorSeverity,
  metadata: Partial<ErrorMetadata>
): SubtitlePipelineError {
  if (error instanceof SubtitlePipelineError) {
    return error;
  }

  return new SubtitlePipelineError(message, code, severity, {
    ...metadata,
    originalError: describeError(error),
  });
}
