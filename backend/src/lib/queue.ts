import { type Job, Queue, Worker } from "bullmq";
import IORedis from "ioredis";
import type { PreviewJobData } from "../types";
import type { Logger } from "./logger";

export const QUEUE_NAME = "video-preview-queue";

export type PreviewProcessor = (assetId: string) => Promise<unknown>;

export interface PreviewTaskResult {
  assetId: string;
  ok: boolean;
  error?: Error;
}

/**
 * Background preview transcodes. At most one task per asset is queued or
 * running at any time; scheduling an asset that is already in flight is a no-op.
 */
export interface PreviewQueue {
  schedule(assetId: string): Promise<void>;
  close(): Promise<void>;
}

// Runs tasks on the event loop of this process
export class LocalPreviewQueue implements PreviewQueue {
  private readonly inFlight = new Map<string, Promise<PreviewTaskResult>>();
  private readonly log: Logger;

  constructor(
    private readonly processor: PreviewProcessor,
    logger: Logger,
  ) {
    this.log = logger.child({ module: "preview-queue" });
  }

  async schedule(assetId: string): Promise<void> {
    if (this.inFlight.has(assetId)) {
      this.log.debug({ assetId }, "Preview already in flight");
      return;
    }

    const task = this.run(assetId).finally(() => {
      this.inFlight.delete(assetId);
    });
    this.inFlight.set(assetId, task);
  }

  /** Resolves once the in-flight task for the asset ends; undefined when none runs. */
  settled(assetId: string): Promise<PreviewTaskResult | undefined> {
    return this.inFlight.get(assetId) ?? Promise.resolve(undefined);
  }

  get pending(): number {
    return this.inFlight.size;
  }

  async onIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight.values());
    }
  }

  async close(): Promise<void> {
    await this.onIdle();
  }

  private async run(assetId: string): Promise<PreviewTaskResult> {
    // yield so the scheduling request answers before the transcode starts
    await Promise.resolve();
    this.log.info({ assetId }, "Starting preview job");
    try {
      await this.processor(assetId);
      this.log.info({ assetId }, "Preview job completed");
      return { assetId, ok: true };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.log.error({ assetId, err: failure }, "Preview job failed");
      return { assetId, ok: false, error: failure };
    }
  }
}

// Redis-backed queue; the worker still runs inside this process
export class BullPreviewQueue implements PreviewQueue {
  private readonly connection: IORedis;
  private readonly queue: Queue<PreviewJobData>;
  private readonly worker: Worker<PreviewJobData>;
  private readonly log: Logger;

  constructor(redisUrl: string, processor: PreviewProcessor, logger: Logger) {
    this.log = logger.child({ module: "preview-queue" });

    this.connection = new IORedis(redisUrl, {
      maxRetriesPerRequest: null,
    });

    this.queue = new Queue<PreviewJobData>(QUEUE_NAME, {
      connection: this.connection,
    });

    this.worker = new Worker<PreviewJobData>(
      QUEUE_NAME,
      async (job: Job<PreviewJobData>) => {
        this.log.info({ jobId: job.id, assetId: job.data.assetId }, "Starting preview job");
        await processor(job.data.assetId);
      },
      {
        connection: this.connection,
        concurrency: 1,
        drainDelay: 5000,
        lockDuration: 60000,
        lockRenewTime: 15000,
        metrics: {
          maxDataPoints: 0,
        },
      },
    );

    this.worker.on("completed", (job) => {
      this.log.info({ jobId: job.id }, "Preview job completed");
    });
    this.worker.on("failed", (job, error) => {
      this.log.error({ jobId: job?.id, err: error }, "Preview job failed");
    });
    this.worker.on("error", (error) => {
      this.log.error({ err: error }, "Preview worker error");
    });
  }

  async schedule(assetId: string): Promise<void> {
    // a job id that is still queued or active makes BullMQ ignore the add
    await this.queue.add(
      "preview",
      { assetId },
      {
        jobId: `preview-${assetId}`,
        attempts: 2,
        backoff: { type: "exponential", delay: 1000 },
        removeOnComplete: true,
        removeOnFail: true,
      },
    );
  }

  async close(): Promise<void> {
    await this.worker.close();
    await this.queue.close();
    await this.connection.quit();
  }
}

export const createPreviewQueue = (
  redisUrl: string | undefined,
  processor: PreviewProcessor,
  logger: Logger,
): PreviewQueue =>
  redisUrl
    ? new BullPreviewQueue(redisUrl, processor, logger)
    : new LocalPreviewQueue(processor, logger);
