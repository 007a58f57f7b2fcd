// Audio
export interface AudioChunk {
  sequence: number;
  samples: Float32Array;
  sampleRate: number;
  durationSeconds: number;
  isFinal: boolean;
}

export interface AudioDevice {
  index: number;
  name: string;
  channelCount: number;
  sampleRate: number;
}

// Recognition
export interface RecognitionResult {
  chunkSequence: number;
  segmentId: string;
  tokenIndex: number;
  text: string;
  isFinalSegment: boolean;
}

// Context
export interface ContextEntry {
  readonly sequenceId: number;
  readonly originalText: string;
  readonly translatedText: string;
}

export interface ContextTurn {
  originalText: string;
  translatedText: string;
}

export interface ContextSnapshot {
  readonly summary: string;
  readonly entries: readonly ContextEntry[];
}

export interface ContextState {
  entries: ContextEntry[];
  summary: string;
  turnCounter: number;
}

// Translation
export interface TranslationRequest {
  readonly text: string;
  readonly segmentId: string;
  readonly context: ContextSnapshot;
}

export interface TranslationResult {
  segmentId: string;
  originalText: string;
  translatedText: string;
  context: ContextSnapshot;
  contextSummary: string;
}

// Display
export type DisplayMessage =
  | {
      kind: "partial";
      text: string;
      segmentId: string;
      chunkSequence: number;
    }
  | {
      kind: "translation";
      result: TranslationResult;
    };
