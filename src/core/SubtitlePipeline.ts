import { EventEmitter } from "events";
import { QUEUE_CAPACITIES, type PipelineConfig } from "../config";
import type { LoggingService } from "../services/logging/LoggingService";
import type {
  AudioChunk,
  DisplayMessage,
  RecognitionResult,
  TranslationResult,
} from "../types";
import type {
  AudioSource,
  DisplaySink,
  RecognitionEngine,
  TranslationEngine,
} from "../types/engines";
import type {
  PipelineState,
  PipelineStats,
  StateTransition,
  StopReport,
} from "../types/pipelineState";
import {
  SubtitlePipelineError,
  ErrorCodes,
  ErrorSeverity,
  describeError,
  toPipelineError,
} from "../utils/error";
import { BoundedQueue, type DropInfo, type PutResult } from "./BoundedQueue";
import { Chunker } from "./Chunker";
import { ContextManager } from "./ContextManager";
import type { SummaryStrategy } from "./contextSummary";
import { DisplayStage } from "./DisplayStage";
import { RecognitionStage } from "./RecognitionStage";
import { StageWorker } from "./StageWorker";
import { TranslationStage } from "./TranslationStage";

export interface SubtitlePipelineOptions {
  config: PipelineConfig;
  logger: LoggingService;
  audioSource: AudioSource;
  recognitionEngine: RecognitionEngine;
  translationEngine: TranslationEngine;
  display: DisplaySink;
  contextManager?: ContextManager;
  summaryStrategy?: SummaryStrategy;
}

export interface PipelineEvents {
  stateChanged: (from: PipelineState, to: PipelineState) => void;
  partial: (text: string) => void;
  translation: (original: string, translation: string, contextSummary: string) => void;
  dropped: (info: DropInfo) => void;
  shutdownTimeout: (workers: string[]) => void;
  fatal: (error: SubtitlePipelineError) => void;
}

interface PipelineSession {
  audioQueue: BoundedQueue<AudioChunk>;
  segmentQueue: BoundedQueue<RecognitionResult>;
  displayQueue: BoundedQueue<DisplayMessage>;
  recognitionWorker: StageWorker<AudioChunk, RecognitionResult>;
  translationWorker: StageWorker<RecognitionResult, TranslationResult>;
  displayWorker: StageWorker<DisplayMessage, never>;
  acceptingAudio: boolean;
  // Sink calls run one after another on this chain, so chunks reach the
  // audio queue in capture order and stop can wait for the last one.
  ingesting: Promise<void>;
  discardedAtShutdown: number;
}

type EngineLoader = Pick<RecognitionEngine, "loadModel" | "warmUp">;

// Extra time the display loop gets to show finished translations after an
// upstream stage has used up the grace period.
const DISPLAY_DRAIN_MS = 500;

const TRANSITIONS: StateTransition[] = [
  { from: "idle", to: "starting" },
  { from: "stopped", to: "starting" },
  { from: "starting", to: "running" },
  { from: "starting", to: "error" },
  { from: "running", to: "stopping" },
  { from: "stopping", to: "stopped" },
];

async function settleWithin(task: Promise<void>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
  });
  try {
    return await Promise.race([task.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Owns the queues and workers of one audio → recognition → translation →
 * display run. Finalized items are never dropped: their producers wait for
 * queue space. Only partial recognition text may be evicted on the way to
 * the display.
 */
export class SubtitlePipeline extends EventEmitter {
  readonly context: ContextManager;
  private readonly config: PipelineConfig;
  private readonly logger: LoggingService;
  private readonly audioSource: AudioSource;
  private readonly recognitionEngine: RecognitionEngine;
  private readonly translationEngine: TranslationEngine;
  private readonly display: DisplaySink;
  private readonly chunker: Chunker;
  private readonly recognitionStage: RecognitionStage;
  private currentState: PipelineState = "idle";
  private session: PipelineSession | null = null;
  private starting: Promise<boolean> | null = null;
  private stopping: Promise<StopReport> | null = null;

  constructor(options: SubtitlePipelineOptions) {
    super();
    this.config = options.config;
    this.logger = options.logger.child("SubtitlePipeline");
    this.audioSource = options.audioSource;
    this.recognitionEngine = options.recognitionEngine;
    this.translationEngine = options.translationEngine;
    this.display = options.display;
    this.context =
      options.contextManager ??
      new ContextManager({
        windowSize: options.config.contextWindowSize,
        updateIntervalTurns: options.config.updateContextIntervalTurns,
        maxSummaryLength: options.config.maxSummaryLength,
        summaryStrategy: options.summaryStrategy,
        logger: options.logger,
      });
    this.chunker = new Chunker({
      sampleRate: options.config.sampleRate,
      chunkDurationSeconds: options.config.chunkDurationSeconds,
    });
    this.recognitionStage = new RecognitionStage(this.recognitionEngine, options.logger);
  }

  get state(): PipelineState {
    return this.currentState;
  }

  onPartial(listener: PipelineEvents["partial"]): () => void {
    this.on("partial", listener);
    return () => this.off("partial", listener);
  }

  onTranslation(listener: PipelineEvents["translation"]): () => void {
    this.on("translation", listener);
    return () => this.off("translation", listener);
  }

  start(deviceIndex: number = this.config.audioDeviceIndex): Promise<boolean> {
    if (this.currentState !== "idle" && this.currentState !== "stopped") {
      this.logger.warn("Start ignored", { state: this.currentState });
      return Promise.resolve(false);
    }

    const starting = this.launch(deviceIndex).finally(() => {
      this.starting = null;
    });
    this.starting = starting;
    return starting;
  }

  /**
   * Stops capture, flushes the last partial chunk and lets each stage drain
   * before closing its output. Whatever is still busy when the grace period
   * ends is abandoned. A stop issued during start takes effect once start
   * has settled.
   */
  stop(): Promise<StopReport> {
    if (this.stopping) {
      return this.stopping;
    }

    if (this.starting) {
      return this.starting.then(() => this.stop());
    }

    if (this.currentState !== "running") {
      return Promise.resolve({ alreadyStopped: true, timedOut: [] });
    }

    this.stopping = this.shutdown().finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  private async launch(deviceIndex: number): Promise<boolean> {
    this.transition("starting");
    const session = this.createSession();
    this.session = session;

    try {
      await this.prepareDisplay();
      session.displayWorker.start();

      await this.loadEngine("translation", this.translationEngine);
      session.translationWorker.start();

      await this.loadEngine("recognition", this.recognitionEngine);
      session.recognitionWorker.start();

      this.chunker.reset();
      this.recognitionStage.reset();
      session.acceptingAudio = true;
      await this.startAudio(deviceIndex, session);
    } catch (error) {
      this.logger.error(
        toPipelineError(
          error,
          "Pipeline failed to start",
          ErrorCodes.MODEL_LOAD_FAILED,
          ErrorSeverity.CRITICAL,
          { component: "SubtitlePipeline" }
        )
      );
      session.acceptingAudio = false;
      await this.haltSession(session);
      this.transition("error");
      return false;
    }

    this.transition("running");
    this.logger.info("Pipeline running", { deviceIndex });
    return true;
  }

  getStats(): PipelineStats {
    const session = this.session;
    if (!session) {
      return {
        state: this.currentState,
        queues: {},
        workers: {},
        droppedPartials: 0,
        droppedFinalized: 0,
        discardedAtShutdown: 0,
      };
    }

    const queues = [session.audioQueue, session.segmentQueue, session.displayQueue];
    const workers = [
      session.recognitionWorker,
      session.translationWorker,
      session.displayWorker,
    ];

    return {
      state: this.currentState,
      queues: Object.fromEntries(
        queues.map((queue) => [
          queue.name,
          { size: queue.size, capacity: queue.capacity, dropped: queue.droppedCount },
        ])
      ),
      workers: Object.fromEntries(workers.map((worker) => [worker.name, worker.getStats()])),
      droppedPartials: session.displayQueue.droppedCount,
      droppedFinalized: session.audioQueue.droppedCount + session.segmentQueue.droppedCount,
      discardedAtShutdown:
        session.discardedAtShutdown +
        workers.reduce((total, worker) => total + worker.discardedCount, 0),
    };
  }

  runningWorkerCount(): number {
    const session = this.session;
    if (!session) {
      return 0;
    }
    return [session.recognitionWorker, session.translationWorker, session.displayWorker].filter(
      (worker) => worker.running
    ).length;
  }

  on<K extends keyof PipelineEvents>(event: K, listener: PipelineEvents[K]): this {
    return super.on(event, listener);
  }

  off<K extends keyof PipelineEvents>(event: K, listener: PipelineEvents[K]): this {
    return super.off(event, listener);
  }

  emit<K extends keyof PipelineEvents>(
    event: K,
    ...args: Parameters<PipelineEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  private transition(to: PipelineState): void {
    const from = this.currentState;
    const allowed = TRANSITIONS.some((t) => t.from === from && t.to === to);
    if (!allowed) {
      throw new SubtitlePipelineError(
        `Illegal pipeline transition ${from} -> ${to}`,
        ErrorCodes.INVALID_STATE,
        ErrorSeverity.HIGH,
        { component: "SubtitlePipeline", from, to }
      );
    }

    this.currentState = to;
    this.logger.debug(`State transition: ${from} -> ${to}`);
    this.emit("stateChanged", from, to);
  }

  private createSession(): PipelineSession {
    const logger = this.logger;
    const audioQueue = new BoundedQueue<AudioChunk>({
      name: "audio",
      capacity: QUEUE_CAPACITIES.audio,
      logger,
    });
    const segmentQueue = new BoundedQueue<RecognitionResult>({
      name: "segments",
      capacity: QUEUE_CAPACITIES.segments,
      logger,
    });
    const displayQueue = new BoundedQueue<DisplayMessage>({
      name: "display",
      capacity: QUEUE_CAPACITIES.display,
      logger,
      isDroppable: (message) => message.kind === "partial",
    });
    displayQueue.on("dropped", (info) => this.emit("dropped", info));

    const onFatal = (error: SubtitlePipelineError): void => this.handleFatal(error);

    return {
      audioQueue,
      segmentQueue,
      displayQueue,
      recognitionWorker: new StageWorker({
        name: "recognition",
        input: audioQueue,
        handler: this.recognitionStage,
        forward: (result, signal): Promise<PutResult> =>
          result.isFinalSegment
            ? segmentQueue.put(result, signal)
            : displayQueue.put(
                {
                  kind: "partial",
                  text: result.text,
                  segmentId: result.segmentId,
                  chunkSequence: result.chunkSequence,
                },
                signal
              ),
        logger,
        onFatal,
      }),
      translationWorker: new StageWorker({
        name: "translation",
        input: segmentQueue,
        handler: new TranslationStage(this.translationEngine, this.context, logger),
        forward: (result, signal) => displayQueue.put({ kind: "translation", result }, signal),
        logger,
        onFatal,
      }),
      displayWorker: new StageWorker<DisplayMessage, never>({
        name: "display",
        input: displayQueue,
        handler: new DisplayStage((message) => this.deliver(message)),
        forward: () => Promise.resolve<PutResult>("enqueued"),
        logger,
        onFatal,
      }),
      acceptingAudio: false,
      ingesting: Promise.resolve(),
      discardedAtShutdown: 0,
    };
  }

  private deliver(message: DisplayMessage): void {
    if (message.kind === "partial") {
      this.display.onPartial(message.text);
      this.emit("partial", message.text);
      return;
    }

    const { originalText, translatedText, contextSummary } = message.result;
    this.display.onTranslation(originalText, translatedText, contextSummary);
    this.emit("translation", originalText, translatedText, contextSummary);
  }

  private async prepareDisplay(): Promise<void> {
    try {
      await this.display.ready?.();
    } catch (error) {
      throw toPipelineError(
        error,
        "Display failed to become ready",
        ErrorCodes.DISPLAY_FAILED,
        ErrorSeverity.CRITICAL,
        { component: "SubtitlePipeline" }
      );
    }
  }

  private async loadEngine(stage: string, engine: EngineLoader): Promise<void> {
    let loaded: boolean;
    try {
      loaded = await engine.loadModel();
    } catch (error) {
      throw toPipelineError(
        error,
        `Failed to load ${stage} model`,
        ErrorCodes.MODEL_LOAD_FAILED,
        ErrorSeverity.CRITICAL,
        { component: "SubtitlePipeline", stage }
      );
    }

    if (!loaded) {
      throw new SubtitlePipelineError(
        `The ${stage} model did not load`,
        ErrorCodes.MODEL_LOAD_FAILED,
        ErrorSeverity.CRITICAL,
        { component: "SubtitlePipeline", stage }
      );
    }

    try {
      await engine.warmUp();
    } catch (error) {
      this.logger.error(
        toPipelineError(
          error,
          `Warm-up of the ${stage} model failed`,
          ErrorCodes.WARM_UP_FAILED,
          ErrorSeverity.MEDIUM,
          { component: "SubtitlePipeline", stage }
        )
      );
    }

    this.logger.info(`${stage} model ready`);
  }

  private async startAudio(deviceIndex: number, session: PipelineSession): Promise<void> {
    try {
      await this.audioSource.start(deviceIndex, (samples) => this.ingest(samples, session));
    } catch (error) {
      throw toPipelineError(
        error,
        "Audio source failed to start",
        ErrorCodes.AUDIO_SOURCE_FAILED,
        ErrorSeverity.CRITICAL,
        { component: "SubtitlePipeline", deviceIndex }
      );
    }
  }

  private ingest(samples: Float32Array, session: PipelineSession): Promise<void> {
    if (!session.acceptingAudio) {
      return Promise.resolve();
    }

    const next = session.ingesting.then(async () => {
      for (const chunk of this.chunker.push(samples)) {
        await this.submitChunk(chunk, session);
      }
    });
    // A failure reaches the source through `next`; the chain only keeps order.
    session.ingesting = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  private async submitChunk(
    chunk: AudioChunk,
    session: PipelineSession,
    signal?: AbortSignal
  ): Promise<void> {
    const result = await session.audioQueue.put(chunk, signal);
    if (result === "closed") {
      session.discardedAtShutdown++;
      this.logger.warn("Audio chunk discarded at shutdown", {
        sequence: chunk.sequence,
        isFinal: chunk.isFinal,
      });
    }
  }

  private async shutdown(): Promise<StopReport> {
    this.transition("stopping");
    const session = this.session;
    const timedOut: string[] = [];

    if (session) {
      const deadline = Date.now() + this.config.shutdownGraceMs;
      await this.stopAudio(session, deadline);
      await this.drainStages(session, deadline, timedOut);
    }

    if (timedOut.length > 0) {
      this.logger.error(
        new SubtitlePipelineError(
          "Workers did not stop within the grace period and were abandoned",
          ErrorCodes.SHUTDOWN_TIMEOUT,
          ErrorSeverity.HIGH,
          {
            component: "SubtitlePipeline",
            workers: timedOut,
            graceMs: this.config.shutdownGraceMs,
          }
        )
      );
      this.emit("shutdownTimeout", timedOut);
    }

    this.transition("stopped");
    this.logger.info("Pipeline stopped", { ...this.getStats() });
    return { alreadyStopped: false, timedOut };
  }

  private async stopAudio(session: PipelineSession, deadline: number): Promise<void> {
    try {
      const stopped = await settleWithin(this.audioSource.stop(), deadline - Date.now());
      if (!stopped) {
        this.logger.warn("Audio source did not stop within the grace period");
      }
    } catch (error) {
      this.logger.error(
        toPipelineError(
          error,
          "Audio source failed to stop",
          ErrorCodes.AUDIO_SOURCE_FAILED,
          ErrorSeverity.MEDIUM,
          { component: "SubtitlePipeline" }
        )
      );
    }

    session.acceptingAudio = false;
    if (!(await settleWithin(session.ingesting, deadline - Date.now()))) {
      this.logger.warn("Captured audio was still queuing when the grace period ended");
    }

    const finalChunk = this.chunker.flush();
    if (finalChunk) {
      const remaining = Math.max(0, deadline - Date.now());
      await this.submitChunk(finalChunk, session, AbortSignal.timeout(remaining));
    }
  }

  // Closes each queue in dependency order and waits for its consumer to drain
  // it. Once the deadline passes, the remaining stages are stopped hard.
  private async drainStages(
    session: PipelineSession,
    deadline: number,
    timedOut: string[]
  ): Promise<void> {
    const stages = [
      { queue: session.audioQueue, worker: session.recognitionWorker, lateDrainMs: 0 },
      { queue: session.segmentQueue, worker: session.translationWorker, lateDrainMs: 0 },
      {
        queue: session.displayQueue,
        worker: session.displayWorker,
        lateDrainMs: DISPLAY_DRAIN_MS,
      },
    ];
    let expired = false;

    for (const { queue, worker, lateDrainMs } of stages) {
      queue.close();
      worker.requestStop({ drain: true });

      const budget = expired ? lateDrainMs : deadline - Date.now();
      if (budget > 0 && (await worker.join(budget))) {
        continue;
      }
      expired = true;

      worker.requestStop({ drain: false });
      const discarded = queue.clear();
      if (discarded > 0) {
        session.discardedAtShutdown += discarded;
        this.logger.warn("Queued items discarded at shutdown", {
          queue: queue.name,
          discarded,
        });
      }

      if (!(await worker.join(0))) {
        worker.abandon();
        timedOut.push(worker.name);
      }
    }
  }

  // Used when start fails: nothing has been fed yet, so stop everything hard.
  private async haltSession(session: PipelineSession): Promise<void> {
    const workers = [
      session.recognitionWorker,
      session.translationWorker,
      session.displayWorker,
    ];

    for (const worker of workers) {
      worker.requestStop({ drain: false });
    }
    for (const queue of [session.audioQueue, session.segmentQueue, session.displayQueue]) {
      queue.close();
      queue.clear();
    }
    for (const worker of workers) {
      if (!(await worker.join(this.config.shutdownGraceMs))) {
        worker.abandon();
      }
    }
  }

  private handleFatal(error: SubtitlePipelineError): void {
    this.emit("fatal", error);
    if (this.currentState !== "running") {
      return;
    }

    this.logger.warn("Stopping pipeline after a fatal stage error", { code: error.code });
    this.stop().catch((stopError: unknown) => {
      this.logger.warn("Stop after fatal error failed", { error: describeError(stopError) });
    });
  }
}
