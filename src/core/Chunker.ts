import type { AudioChunk } from "../types";
import { SubtitlePipelineError, ErrorCodes, ErrorSeverity } from "../utils/error";

export interface ChunkerOptions {
  sampleRate: number;
  chunkDurationSeconds: number;
}

/**
 * Slices a continuous sample stream into fixed-duration chunks. Every chunk
 * except the flush chunk holds exactly `samplesPerChunk` samples.
 */
export class Chunker {
  readonly sampleRate: number;
  readonly samplesPerChunk: number;
  private pending: Float32Array[] = [];
  private pendingLength = 0;
  private nextSequence = 0;
  private flushed = false;

  constructor(options: ChunkerOptions) {
    if (!(options.chunkDurationSeconds > 0) || !(options.sampleRate > 0)) {
      throw new SubtitlePipelineError(
        "Chunk duration and sample rate must be positive",
        ErrorCodes.INVALID_CONFIG,
        ErrorSeverity.CRITICAL,
        { component: "Chunker", ...options }
      );
    }

    this.sampleRate = options.sampleRate;
    this.samplesPerChunk = Math.max(
      1,
      Math.round(options.chunkDurationSeconds * options.sampleRate)
    );
  }

  get pendingSamples(): number {
    return this.pendingLength;
  }

  push(samples: Float32Array): AudioChunk[] {
    if (this.flushed) {
      throw new SubtitlePipelineError(
        "Cannot push audio after the chunker was flushed",
        ErrorCodes.INVALID_STATE,
        ErrorSeverity.HIGH,
        { component: "Chunker" }
      );
    }

    if (samples.length === 0) {
      return [];
    }

    this.pending.push(samples.slice());
    this.pendingLength += samples.length;

    const chunks: AudioChunk[] = [];
    while (this.pendingLength >= this.samplesPerChunk) {
      chunks.push(this.emit(this.take(this.samplesPerChunk), false));
    }
    return chunks;
  }

  flush(): AudioChunk | null {
    if (this.flushed) {
      return null;
    }
    this.flushed = true;

    // An empty remainder is suppressed and does not consume a sequence number.
    if (this.pendingLength === 0) {
      return null;
    }
    return this.emit(this.take(this.pendingLength), true);
  }

  reset(): void {
    this.pending = [];
    this.pendingLength = 0;
    this.nextSequence = 0;
    this.flushed = false;
  }

  private emit(samples: Float32Array, isFinal: boolean): AudioChunk {
    return {
      sequence: this.nextSequence++,
      samples,
      sampleRate: this.sampleRate,
      durationSeconds: samples.length / this.sampleRate,
      isFinal,
    };
  }

  // Removes `count` samples from the front of the accumulator.
  private take(count: number): Float32Array {
    const out = new Float32Array(count);
    let offset = 0;

    while (offset < count) {
      const head = this.pending[0];
      const needed = count - offset;

      if (head.length <= needed) {
        out.set(head, offset);
        offset += head.length;
        this.pending.shift();
      } else {
        out.set(head.subarray(0, needed), offset);
        this.pending[0] = head.subarray(needed);
        offset += needed;
      }
    }

    this.pendingLength -= count;
    return out;
  }
}
