import type {
  AudioChunk,
  AudioDevice,
  ContextSnapshot,
  RecognitionResult,
} from "./index";

/**
 * Receives raw mono samples from an audio source. A source must wait for a
 * returned promise before delivering the next buffer.
 */
export type SampleSink = (samples: Float32Array) => void | Promise<void>;

export interface AudioSource {
  listDevices(): Promise<AudioDevice[]>;
  start(deviceIndex: number, sink: SampleSink): Promise<void>;
  stop(): Promise<void>;
}

export interface RecognitionEngine {
  loadModel(): Promise<boolean>;
  warmUp(): Promise<void>;
  /**
   * Yields partial results as recognition proceeds, then one result with
   * `isFinalSegment` set per completed utterance.
   */
  transcribe(chunk: AudioChunk): AsyncIterable<RecognitionResult>;
}

export interface TranslationEngine {
  loadModel(): Promise<boolean>;
  warmUp(): Promise<void>;
  translate(text: string, context: ContextSnapshot): Promise<string>;
}

export interface DisplaySink {
  ready?(): Promise<void>;
  onPartial(text: string): void;
  onTranslation(original: string, translation: string, contextSummary: string): void;
}
