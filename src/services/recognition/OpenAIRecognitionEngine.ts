import { OpenAI, toFile } from "openai";
import { v4 as uuidv4 } from "uuid";
import type { LoggingService } from "../logging/LoggingService";
import type { AudioChunk, RecognitionResult } from "../../types";
import type { RecognitionEngine } from "../../types/engines";
import { SubtitlePipelineError, ErrorCodes, ErrorSeverity } from "../../utils/error";
import { encodeWav, rootMeanSquare } from "../../utils/wav";

export interface OpenAIRecognitionEngineOptions {
  apiKey?: string;
  baseURL?: string;
  model: string;
  language: string;
  silenceThreshold: number;
  logger: LoggingService;
}

// Unspaced scripts (Japanese, Chinese) are revealed a character at a time.
export function splitTokens(text: string): string[] {
  return /\s/.test(text) ? text.split(/\s+/).filter(Boolean) : Array.from(text);
}

function joinTokens(tokens: string[], spaced: boolean): string {
  return tokens.join(spaced ? " " : "");
}

/**
 * Recognition backed by the OpenAI transcription endpoint. Each chunk is
 * uploaded as a WAV file; the returned text is replayed as growing partials
 * followed by one final segment.
 */
export class OpenAIRecognitionEngine implements RecognitionEngine {
  private readonly client: OpenAI | null;
  private readonly options: OpenAIRecognitionEngineOptions;
  private readonly logger: LoggingService;

  constructor(options: OpenAIRecognitionEngineOptions) {
    this.options = options;
    this.logger = options.logger.child("OpenAIRecognitionEngine");
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
    this.logger.info("Recognition model available", { model: model.id });
    return true;
  }

  async warmUp(): Promise<void> {
    // The endpoint keeps no per-session state, so only the local encoder runs.
    const probe = encodeWav(new Float32Array(1600), 16000);
    this.logger.debug("Recognition warm-up finished", { bytes: probe.length });
  }

  async *transcribe(chunk: AudioChunk): AsyncIterable<RecognitionResult> {
    const energy = rootMeanSquare(chunk.samples);
    if (energy < this.options.silenceThreshold) {
      this.logger.debug("Skipped silent chunk", { sequence: chunk.sequence, energy });
      return;
    }

    const text = await this.request(chunk);
    if (!text) {
      return;
    }

    const segmentId = uuidv4();
    const spaced = /\s/.test(text);
    const tokens = splitTokens(text);

    for (let index = 0; index < tokens.length; index++) {
      yield {
        chunkSequence: chunk.sequence,
        segmentId,
        tokenIndex: index,
        text: joinTokens(tokens.slice(0, index + 1), spaced),
        isFinalSegment: false,
      };
    }

    yield {
      chunkSequence: chunk.sequence,
      segmentId,
      tokenIndex: tokens.length,
      text,
      isFinalSegment: true,
    };
  }

  private async request(chunk: AudioChunk): Promise<string> {
    if (!this.client) {
      throw new SubtitlePipelineError(
        "Recognition engine has no API client",
        ErrorCodes.INVALID_STATE,
        ErrorSeverity.CRITICAL,
        { component: "OpenAIRecognitionEngine" }
      );
    }

    const file = await toFile(
      encodeWav(chunk.samples, chunk.sampleRate),
      `chunk-${chunk.sequence}.wav`,
      { type: "audio/wav" }
    );
    const transcription = await this.client.audio.transcriptions.create({
      file,
      model: this.options.model,
      // The endpoint takes ISO-639-1 codes, so "zh-TW" is sent as "zh".
      language: this.options.language.split("-")[0],
    });

    return transcription.text.trim();
  }
}
