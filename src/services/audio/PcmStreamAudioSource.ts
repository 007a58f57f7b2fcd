import { EventEmitter } from "events";
import type { Readable } from "stream";
import type { LoggingService } from "../logging/LoggingService";
import type { AudioDevice } from "../../types";
import type { AudioSource, SampleSink } from "../../types/engines";
import {
  SubtitlePipelineError,
  ErrorCodes,
  ErrorSeverity,
  toPipelineError,
} from "../../utils/error";

export interface PcmStreamAudioSourceOptions {
  input: Readable;
  sampleRate: number;
  logger: LoggingService;
  deviceName?: string;
}

export interface PcmStreamAudioSourceEvents {
  ended: () => void;
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof Uint8Array) {
    return Buffer.from(data);
  }
  return Buffer.from(String(data), "binary");
}

/**
 * Captures signed 16-bit little-endian mono PCM from a readable stream, such
 * as `ffmpeg -f s16le -ac 1 -` piped into stdin. The stream is the only
 * device this source offers.
 */
export class PcmStreamAudioSource extends EventEmitter implements AudioSource {
  private readonly input: Readable;
  private readonly sampleRate: number;
  private readonly deviceName: string;
  private readonly logger: LoggingService;
  private pending: Buffer = Buffer.alloc(0);
  private reading: Promise<void> | null = null;
  private stopped = false;

  constructor(options: PcmStreamAudioSourceOptions) {
    super();
    this.input = options.input;
    this.sampleRate = options.sampleRate;
    this.deviceName = options.deviceName ?? "stdin";
    this.logger = options.logger.child("PcmStreamAudioSource");
  }

  async listDevices(): Promise<AudioDevice[]> {
    return [
      {
        index: 0,
        name: this.deviceName,
        channelCount: 1,
        sampleRate: this.sampleRate,
      },
    ];
  }

  async start(deviceIndex: number, sink: SampleSink): Promise<void> {
    if (deviceIndex !== 0) {
      throw new SubtitlePipelineError(
        `Unknown audio device ${deviceIndex}`,
        ErrorCodes.AUDIO_SOURCE_FAILED,
        ErrorSeverity.CRITICAL,
        { component: "PcmStreamAudioSource", deviceIndex }
      );
    }
    if (this.reading) {
      throw new SubtitlePipelineError(
        "Audio source already started",
        ErrorCodes.INVALID_STATE,
        ErrorSeverity.CRITICAL,
        { component: "PcmStreamAudioSource" }
      );
    }

    this.stopped = false;
    this.pending = Buffer.alloc(0);
    this.reading = this.pump(sink);
    this.logger.info("Capturing audio", { device: this.deviceName, sampleRate: this.sampleRate });
  }

  async stop(): Promise<void> {
    if (!this.reading) {
      return;
    }

    this.stopped = true;
    this.input.destroy();
    await this.reading;
    this.reading = null;
    this.logger.info("Audio capture stopped");
  }

  /** Converts a byte buffer to samples, keeping an odd trailing byte for next time. */
  decode(data: Buffer): Float32Array {
    const bytes = this.pending.length ? Buffer.concat([this.pending, data]) : data;
    const usable = bytes.length - (bytes.length % 2);
    this.pending = Buffer.from(bytes.subarray(usable));

    const samples = new Float32Array(usable / 2);
    for (let i = 0; i < samples.length; i++) {
      samples[i] = bytes.readInt16LE(i * 2) / 32768;
    }
    return samples;
  }

  on<K extends keyof PcmStreamAudioSourceEvents>(
    event: K,
    listener: PcmStreamAudioSourceEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof PcmStreamAudioSourceEvents>(
    event: K,
    ...args: Parameters<PcmStreamAudioSourceEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  // Awaiting the sink inside the loop pauses the stream while the pipeline is
  // applying backpressure.
  private async pump(sink: SampleSink): Promise<void> {
    try {
      for await (const data of this.input) {
        if (this.stopped) {
          break;
        }
        const samples = this.decode(toBuffer(data));
        if (samples.length > 0) {
          await sink(samples);
        }
      }
    } catch (error) {
      if (!this.stopped) {
        this.logger.error(
          toPipelineError(
            error,
            "Audio stream failed",
            ErrorCodes.AUDIO_SOURCE_FAILED,
            ErrorSeverity.HIGH,
            { component: "PcmStreamAudioSource" }
          )
        );
      }
    }

    if (!this.stopped) {
      this.logger.info("Audio stream ended");
      this.emit("ended");
    }
  }
}
