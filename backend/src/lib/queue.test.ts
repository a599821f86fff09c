import { beforeEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "./logger";
import { BullPreviewQueue, createPreviewQueue, LocalPreviewQueue, QUEUE_NAME } from "./queue";

type FakeJob = { id?: string; data: { assetId: string } };

const bull = vi.hoisted(() => {
  const queueNames: string[] = [];
  const processors: Array<(job: FakeJob) => Promise<unknown>> = [];
  return {
    add: vi.fn(),
    queueClose: vi.fn(),
    workerClose: vi.fn(),
    workerOn: vi.fn(),
    quit: vi.fn(),
    queueNames,
    processors,
  };
});

vi.mock("bullmq", () => ({
  Queue: vi.fn().mockImplementation(function (name: string) {
    bull.queueNames.push(name);
    return { add: bull.add, close: bull.queueClose };
  }),
  Worker: vi
    .fn()
    .mockImplementation(function (_name: string, processor: (job: FakeJob) => Promise<unknown>) {
      bull.processors.push(processor);
      return { on: bull.workerOn, close: bull.workerClose };
    }),
}));

vi.mock("ioredis", () => ({
  default: vi.fn().mockImplementation(function () {
    return { quit: bull.quit };
  }),
}));

const logger = createLogger("silent");

describe("LocalPreviewQueue", () => {
  it("collapses duplicate requests while a task is in flight", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const processor = vi.fn(async () => {
      await gate;
    });
    const queue = new LocalPreviewQueue(processor, logger);

    await queue.schedule("a");
    await queue.schedule("a");
    expect(queue.pending).toBe(1);

    release();
    expect(await queue.settled("a")).toEqual({ assetId: "a", ok: true });
    expect(processor).toHaveBeenCalledTimes(1);
    expect(queue.pending).toBe(0);
  });

  it("reports failures and accepts a retry", async () => {
    const processor = vi
      .fn<(assetId: string) => Promise<unknown>>()
      .mockRejectedValueOnce(new Error("encode failed"))
      .mockResolvedValueOnce("created");
    const queue = new LocalPreviewQueue(processor, logger);

    await queue.schedule("a");
    const failed = await queue.settled("a");
    expect(failed?.ok).toBe(false);
    expect(failed?.error?.message).toBe("encode failed");

    await queue.schedule("a");
    expect(await queue.settled("a")).toEqual({ assetId: "a", ok: true });
    expect(processor).toHaveBeenCalledTimes(2);
  });

  it("resolves settled immediately when nothing runs", async () => {
    const queue = new LocalPreviewQueue(async () => undefined, logger);
    expect(await queue.settled("missing")).toBeUndefined();
  });

  it("waits for every task on close", async () => {
    const done: string[] = [];
    const queue = new LocalPreviewQueue(async (assetId) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      done.push(assetId);
    }, logger);

    await queue.schedule("a");
    await queue.schedule("b");
    await queue.close();
    expect(done.sort()).toEqual(["a", "b"]);
  });
});

describe("BullPreviewQueue", () => {
  beforeEach(() => {
    bull.add.mockReset();
    bull.processors.length = 0;
    bull.queueNames.length = 0;
  });

  it("is chosen when a Redis URL is configured", () => {
    const processor = vi.fn(async () => undefined);
    expect(createPreviewQueue("redis://localhost:6379", processor, logger)).toBeInstanceOf(
      BullPreviewQueue,
    );
    expect(createPreviewQueue(undefined, processor, logger)).toBeInstanceOf(LocalPreviewQueue);
    expect(bull.queueNames).toEqual([QUEUE_NAME]);
  });

  it("deduplicates jobs by asset id", async () => {
    const queue = new BullPreviewQueue("redis://localhost:6379", vi.fn(), logger);
    await queue.schedule("abc");

    expect(bull.add).toHaveBeenCalledWith(
      "preview",
      { assetId: "abc" },
      expect.objectContaining({
        jobId: "preview-abc",
        removeOnComplete: true,
        removeOnFail: true,
      }),
    );
  });

  it("hands jobs to the preview processor", async () => {
    const processor = vi.fn(async () => "created");
    new BullPreviewQueue("redis://localhost:6379", processor, logger);

    const worker = bull.processors[0];
    expect(worker).toBeDefined();
    await worker?.({ id: "preview-abc", data: { assetId: "abc" } });
    expect(processor).toHaveBeenCalledWith("abc");
  });

  it("listens for worker errors", () => {
    bull.workerOn.mockClear();
    new BullPreviewQueue("redis://localhost:6379", vi.fn(), logger);
    const events = bull.workerOn.mock.calls.map((call: unknown[]) => call[0]);
    expect(events).toEqual(["completed", "failed", "error"]);
  });

  it("closes the worker, the queue and the connection", async () => {
    const queue = new BullPreviewQueue("redis://localhost:6379", vi.fn(), logger);
    await queue.close();
    expect(bull.workerClose).toHaveBeenCalled();
    expect(bull.queueClose).toHaveBeenCalled();
    expect(bull.quit).toHaveBeenCalled();
  });
});
