import { describe, expect, it, vi } from "vitest";
import { LoggingService } from "../../services/logging/LoggingService";
import { SubtitlePipelineError, ErrorCodes, ErrorSeverity } from "../../utils/error";
import { BoundedQueue } from "../BoundedQueue";
import { StageWorker, failureOutcome, type StageHandler } from "../StageWorker";
import { deferred } from "./fakes";

const logger = LoggingService.silent();

function queue<T>(name: string, capacity = 4): BoundedQueue<T> {
  return new BoundedQueue<T>({ name, capacity, logger });
}

// Doubles each number; odd inputs over 100 fail transiently, negative ones fatally.
const doubler: StageHandler<number, number> = {
  async handle(item, emit) {
    if (item < 0) {
      return failureOutcome(
        new SubtitlePipelineError("negative", ErrorCodes.INVALID_STATE, ErrorSeverity.CRITICAL, {
          component: "doubler",
        }),
        "failed",
        ErrorCodes.INVALID_STATE,
        { component: "doubler" }
      );
    }
    if (item > 100 && item % 2 === 1) {
      throw new Error("odd and large");
    }
    await emit(item * 2);
    return { status: "ok", produced: 1 };
  },
};

describe("failureOutcome", () => {
  it("treats foreign errors as transient", () => {
    const outcome = failureOutcome(new Error("boom"), "Stage failed", ErrorCodes.TRANSLATION_FAILED, {
      component: "test",
    });

    expect(outcome.status).toBe("transient");
    expect(outcome).toMatchObject({
      error: {
        message: "Stage failed",
        code: ErrorCodes.TRANSLATION_FAILED,
        metadata: { component: "test", originalError: "boom" },
      },
    });
  });

  it("treats critical pipeline errors as fatal", () => {
    const error = new SubtitlePipelineError("gone", ErrorCodes.QUEUE_CLOSED, ErrorSeverity.CRITICAL, {
      component: "test",
    });

    expect(failureOutcome(error, "ignored", ErrorCodes.INVALID_STATE, { component: "x" })).toEqual({
      status: "fatal",
      error,
    });
  });
});

describe("StageWorker", () => {
  it("processes items in order and forwards outputs", async () => {
    const input = queue<number>("in");
    const output = queue<number>("out");
    const worker = new StageWorker({
      name: "double",
      input,
      handler: doubler,
      forward: (value, signal) => output.put(value, signal),
      logger,
    });

    worker.start();
    await input.put(1);
    await input.put(2);
    await input.put(3);
    input.close();
    worker.requestStop({ drain: true });

    expect(await worker.join(1000)).toBe(true);
    expect([output.size, worker.getStats()]).toEqual([
      3,
      { running: false, processed: 3, failed: 0, abandoned: false },
    ]);
    expect(await output.take()).toEqual({ done: false, value: 2 });
  });

  it("skips an item that fails and keeps going", async () => {
    const input = queue<number>("in");
    const outputs: number[] = [];
    const worker = new StageWorker({
      name: "double",
      input,
      handler: doubler,
      forward: async (value) => {
        outputs.push(value);
        return "enqueued";
      },
      logger,
    });

    worker.start();
    await input.put(101);
    await input.put(4);
    input.close();

    expect(await worker.join(1000)).toBe(true);
    expect(outputs).toEqual([8]);
    expect(worker.getStats()).toMatchObject({ processed: 1, failed: 1 });
  });

  it("halts and reports a fatal outcome", async () => {
    const input = queue<number>("in");
    const onFatal = vi.fn();
    const worker = new StageWorker({
      name: "double",
      input,
      handler: doubler,
      forward: async () => "enqueued",
      logger,
      onFatal,
    });

    worker.start();
    await input.put(-1);
    await input.put(5);

    expect(await worker.join(1000)).toBe(true);
    expect(onFatal).toHaveBeenCalledTimes(1);
    expect(onFatal.mock.calls[0][0].message).toBe("negative");
    expect(input.size).toBe(1);
  });

  it("treats a closed downstream queue as fatal while running", async () => {
    const input = queue<number>("in");
    const output = queue<number>("out");
    output.close();
    const onFatal = vi.fn();
    const worker = new StageWorker({
      name: "double",
      input,
      handler: doubler,
      forward: (value, signal) => output.put(value, signal),
      logger,
      onFatal,
    });

    worker.start();
    await input.put(1);

    expect(await worker.join(1000)).toBe(true);
    expect(onFatal.mock.calls[0][0].code).toBe(ErrorCodes.QUEUE_CLOSED);
  });

  it("unblocks a forward waiting on a full queue when stopped hard", async () => {
    const input = queue<number>("in");
    const output = queue<number>("out", 1);
    await output.put(0);
    const worker = new StageWorker({
      name: "double",
      input,
      handler: doubler,
      forward: (value, signal) => output.put(value, signal),
      logger,
    });

    worker.start();
    await input.put(1);
    await vi.waitFor(() => {
      expect(input.size).toBe(0);
    });

    worker.requestStop({ drain: false });

    expect(await worker.join(1000)).toBe(true);
    expect(worker.discardedCount).toBe(1);
    expect(output.size).toBe(1);
  });

  it("reports a worker stuck in its handler and discards its late output", async () => {
    const input = queue<number>("in");
    const gate = deferred();
    const outputs: number[] = [];
    const worker = new StageWorker<number, number>({
      name: "slow",
      input,
      handler: {
        async handle(item, emit) {
          await gate.promise;
          await emit(item);
          return { status: "ok", produced: 1 };
        },
      },
      forward: async (value) => {
        outputs.push(value);
        return "enqueued";
      },
      logger,
    });

    worker.start();
    await input.put(7);
    input.close();

    expect(await worker.join(20)).toBe(false);
    worker.abandon();
    gate.resolve();

    expect(await worker.join(1000)).toBe(true);
    expect(outputs).toEqual([]);
    expect(worker.getStats()).toMatchObject({ abandoned: true, running: false });
  });
});
