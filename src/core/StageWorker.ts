import type { LoggingService } from "../services/logging/LoggingService";
import type { WorkerStats } from "../types/pipelineState";
import {
  SubtitlePipelineError,
  ErrorCodes,
  ErrorSeverity,
  toPipelineError,
} from "../utils/error";
import type { BoundedQueue, PutResult } from "./BoundedQueue";

export type StageOutcome =
  | { status: "ok"; produced: number }
  | { status: "transient"; error: SubtitlePipelineError }
  | { status: "fatal"; error: SubtitlePipelineError };

export type Emit<TOut> = (output: TOut) => Promise<void>;

export interface StageHandler<TIn, TOut> {
  handle(item: TIn, emit: Emit<TOut>): Promise<StageOutcome>;
}

export type ForwardPort<TOut> = (
  output: TOut,
  signal: AbortSignal
) => Promise<PutResult>;

export interface StageWorkerOptions<TIn, TOut> {
  name: string;
  input: BoundedQueue<TIn>;
  handler: StageHandler<TIn, TOut>;
  forward: ForwardPort<TOut>;
  logger: LoggingService;
  onFatal?: (error: SubtitlePipelineError) => void;
}

export interface StopOptions {
  /** Keep taking items until the input queue is closed and empty. */
  drain: boolean;
}

/**
 * Converts a thrown value into an outcome. Critical pipeline errors halt the
 * worker; anything else skips the current item.
 */
export function failureOutcome(
  error: unknown,
  message: string,
  code: ErrorCodes,
  metadata: { component: string; [key: string]: unknown }
): StageOutcome {
  const wrapped = toPipelineError(error, message, code, ErrorSeverity.MEDIUM, metadata);
  return wrapped.severity === ErrorSeverity.CRITICAL
    ? { status: "fatal", error: wrapped }
    : { status: "transient", error: wrapped };
}

/**
 * One worker per stage: takes items from its input queue in FIFO order, runs
 * the handler on each, and forwards whatever the handler emits. A stop
 * request is observed only between items.
 */
export class StageWorker<TIn, TOut> {
  readonly name: string;
  private readonly options: StageWorkerOptions<TIn, TOut>;
  private readonly logger: LoggingService;
  private readonly abortController = new AbortController();
  private loop: Promise<void> | null = null;
  private isRunning = false;
  private stopRequested = false;
  private hardStop = false;
  private isAbandoned = false;
  private processed = 0;
  private failed = 0;
  private discarded = 0;

  constructor(options: StageWorkerOptions<TIn, TOut>) {
    this.name = options.name;
    this.options = options;
    this.logger = options.logger.child(`StageWorker:${options.name}`);
  }

  get running(): boolean {
    return this.isRunning;
  }

  get abandoned(): boolean {
    return this.isAbandoned;
  }

  get discardedCount(): number {
    return this.discarded;
  }

  getStats(): WorkerStats {
    return {
      running: this.isRunning,
      processed: this.processed,
      failed: this.failed,
      abandoned: this.isAbandoned,
    };
  }

  start(): void {
    if (this.loop) {
      this.logger.warn("Worker already started");
      return;
    }

    this.isRunning = true;
    this.loop = this.run().finally(() => {
      this.isRunning = false;
    });
  }

  requestStop(options: StopOptions): void {
    this.stopRequested = true;
    if (!options.drain) {
      this.hardStop = true;
      // Releases a forward blocked on a full downstream queue.
      this.abortController.abort();
    }
  }

  /** Resolves false when the worker is still busy after `timeoutMs`. */
  async join(timeoutMs: number): Promise<boolean> {
    if (!this.loop) {
      return true;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
    });
    const finished = await Promise.race([this.loop.then(() => true), timeout]);
    clearTimeout(timer);
    return finished;
  }

  abandon(): void {
    if (!this.isRunning) {
      return;
    }
    this.isAbandoned = true;
    this.requestStop({ drain: false });
    this.logger.warn("Worker abandoned while an item was still in flight", {
      processed: this.processed,
    });
  }

  private async run(): Promise<void> {
    this.logger.debug("Worker started");

    while (!this.hardStop) {
      const next = await this.options.input.take();
      if (next.done) {
        break;
      }

      if (this.hardStop) {
        this.discarded++;
        this.logger.warn("Discarded queued item at shutdown", {
          discarded: this.discarded,
        });
        break;
      }

      const outcome = await this.process(next.value);

      switch (outcome.status) {
        case "ok":
          this.processed++;
          break;
        case "transient":
          this.failed++;
          this.logger.warn("Item failed, skipping", {
            code: outcome.error.code,
            error: outcome.error.message,
            originalError: outcome.error.metadata.originalError,
          });
          break;
        case "fatal":
          this.failed++;
          this.logger.error(outcome.error);
          this.hardStop = true;
          this.options.onFatal?.(outcome.error);
          break;
      }
    }

    this.logger.debug("Worker stopped", {
      processed: this.processed,
      failed: this.failed,
    });
  }

  private async process(item: TIn): Promise<StageOutcome> {
    try {
      return await this.options.handler.handle(item, (output) =>
        this.forwardOutput(output)
      );
    } catch (error) {
      return failureOutcome(error, "Stage handler failed", ErrorCodes.INVALID_STATE, {
        component: this.name,
      });
    }
  }

  private async forwardOutput(output: TOut): Promise<void> {
    if (this.isAbandoned) {
      this.discarded++;
      this.logger.warn("Discarded output of abandoned worker", {
        discarded: this.discarded,
      });
      return;
    }

    const result = await this.options.forward(output, this.abortController.signal);
    if (result !== "closed") {
      return;
    }

    if (this.stopRequested) {
      this.discarded++;
      this.logger.warn("Discarded output at shutdown", { discarded: this.discarded });
      return;
    }

    throw new SubtitlePipelineError(
      `Downstream queue closed under running worker ${this.name}`,
      ErrorCodes.QUEUE_CLOSED,
      ErrorSeverity.CRITICAL,
      { component: this.name }
    );
  }
}
