import { EventEmitter } from "events";
import type { LoggingService } from "../services/logging/LoggingService";
import { SubtitlePipelineError, ErrorCodes, ErrorSeverity } from "../utils/error";

export type PutResult = "enqueued" | "dropped" | "closed";

export type TakeResult<T> = { done: false; value: T } | { done: true };

export interface DropInfo {
  queue: string;
  total: number;
}

export interface BoundedQueueEvents {
  dropped: (info: DropInfo) => void;
  closed: (queue: string) => void;
}

export interface BoundedQueueOptions<T> {
  name: string;
  capacity: number;
  logger: LoggingService;
  /** Items for which this returns true may be evicted under overload. */
  isDroppable?: (item: T) => boolean;
}

interface PendingPut<T> {
  item: T;
  resolve: (result: PutResult) => void;
}

/**
 * Small FIFO queue between pipeline stages. Finalized items make the producer
 * wait for space; droppable items evict the oldest droppable entry instead.
 */
export class BoundedQueue<T> extends EventEmitter {
  readonly name: string;
  readonly capacity: number;
  private readonly logger: LoggingService;
  private readonly isDroppable: (item: T) => boolean;
  private items: T[] = [];
  private putters: PendingPut<T>[] = [];
  private takers: Array<(result: TakeResult<T>) => void> = [];
  private isClosed = false;
  private dropped = 0;

  constructor(options: BoundedQueueOptions<T>) {
    super();
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new SubtitlePipelineError(
        `Queue ${options.name} needs a positive capacity`,
        ErrorCodes.INVALID_CONFIG,
        ErrorSeverity.CRITICAL,
        { component: "BoundedQueue", capacity: options.capacity }
      );
    }

    this.name = options.name;
    this.capacity = options.capacity;
    this.logger = options.logger;
    this.isDroppable = options.isDroppable ?? (() => false);
  }

  get size(): number {
    return this.items.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  put(item: T, signal?: AbortSignal): Promise<PutResult> {
    if (this.isClosed || signal?.aborted) {
      return Promise.resolve("closed");
    }

    const taker = this.takers.shift();
    if (taker) {
      taker({ done: false, value: item });
      return Promise.resolve("enqueued");
    }

    if (this.items.length < this.capacity) {
      this.enqueue(item);
      return Promise.resolve("enqueued");
    }

    if (this.isDroppable(item)) {
      return Promise.resolve(this.admitDroppable(item));
    }

    return new Promise<PutResult>((resolve) => {
      const pending: PendingPut<T> = {
        item,
        resolve: (result) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(result);
        },
      };
      const onAbort = (): void => {
        const index = this.putters.indexOf(pending);
        if (index !== -1) {
          this.putters.splice(index, 1);
          pending.resolve("closed");
        }
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.putters.push(pending);
    });
  }

  take(): Promise<TakeResult<T>> {
    if (this.items.length > 0) {
      const value = this.items[0];
      this.items.splice(0, 1);
      this.admitWaitingPutter();
      return Promise.resolve({ done: false, value });
    }

    if (this.isClosed) {
      return Promise.resolve({ done: true });
    }

    return new Promise((resolve) => {
      this.takers.push(resolve);
    });
  }

  /**
   * Rejects further puts and releases every waiter. Items already queued can
   * still be taken; takers see `done` once the queue is drained.
   */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;

    for (const putter of this.putters.splice(0)) {
      putter.resolve("closed");
    }
    for (const taker of this.takers.splice(0)) {
      taker({ done: true });
    }

    this.emit("closed", this.name);
  }

  clear(): number {
    const discarded = this.items.length;
    this.items = [];
    while (this.putters.length > 0 && this.items.length < this.capacity) {
      this.admitWaitingPutter();
    }
    return discarded;
  }

  on<K extends keyof BoundedQueueEvents>(
    event: K,
    listener: BoundedQueueEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof BoundedQueueEvents>(
    event: K,
    ...args: Parameters<BoundedQueueEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  private enqueue(item: T): void {
    if (this.items.length >= this.capacity && !this.isDroppable(item)) {
      throw new SubtitlePipelineError(
        `Finalized item overflowed queue ${this.name}`,
        ErrorCodes.QUEUE_OVERFLOW,
        ErrorSeverity.CRITICAL,
        { component: "BoundedQueue", queue: this.name, capacity: this.capacity }
      );
    }
    this.items.push(item);
  }

  private admitWaitingPutter(): void {
    const putter = this.putters.shift();
    if (!putter) {
      return;
    }
    this.enqueue(putter.item);
    putter.resolve("enqueued");
  }

  // Favors recency: evicts the oldest droppable entry, or drops the newcomer
  // when everything queued is finalized.
  private admitDroppable(item: T): PutResult {
    const victim = this.items.findIndex((queued) => this.isDroppable(queued));
    this.recordDrop();

    if (victim === -1) {
      return "dropped";
    }

    this.items.splice(victim, 1);
    this.items.push(item);
    return "enqueued";
  }

  private recordDrop(): void {
    this.dropped++;
    this.logger.warn("Dropped partial item under overload", {
      queue: this.name,
      droppedTotal: this.dropped,
    });
    this.emit("dropped", { queue: this.name, total: this.dropped });
  }
}
