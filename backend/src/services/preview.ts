import { mkdir, rename, rm } from "fs/promises";
import path from "path";
import { classifyFailure, SourceMissingError } from "../errors";
import { type ArtifactLocator, pathExists } from "../lib/artifacts";
import type { Logger } from "../lib/logger";
import type { EncodeOptions, MediaEngine } from "../lib/media";
import { KeyedMutex } from "../lib/mutex";
import type { PreviewQueue } from "../lib/queue";
import type { AssetRegistry } from "../lib/registry";
import type { PreviewState, PreviewStatus } from "../types";

export interface PreviewSettings {
  maxHeight: number;
  videoBitrate: string;
  preset: string;
}

export type PreviewOutcome = "created" | "existing";

export interface PreviewServiceDeps {
  registry: AssetRegistry;
  locator: ArtifactLocator;
  engine: MediaEngine;
  queue: PreviewQueue;
  settings: PreviewSettings;
  logger: Logger;
  mutex?: KeyedMutex;
}

export class PreviewService {
  private readonly registry: AssetRegistry;
  private readonly locator: ArtifactLocator;
  private readonly engine: MediaEngine;
  private readonly queue: PreviewQueue;
  private readonly settings: PreviewSettings;
  private readonly mutex: KeyedMutex;
  private readonly log: Logger;

  constructor(deps: PreviewServiceDeps) {
    this.registry = deps.registry;
    this.locator = deps.locator;
    this.engine = deps.engine;
    this.queue = deps.queue;
    this.settings = deps.settings;
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.log = deps.logger.child({ module: "preview" });
  }

  encodeOptions(): EncodeOptions {
    return {
      videoCodec: "libx264",
      audioCodec: "aac",
      preset: this.settings.preset,
      container: "mp4",
      maxHeight: this.settings.maxHeight,
      videoBitrate: this.settings.videoBitrate,
      pixelFormat: "yuv420p",
      profile: "baseline",
      fastStart: true,
    };
  }

  /** Marks the asset pending and hands it to the queue unless a preview exists or is underway. */
  async requestPreview(id: string): Promise<PreviewState> {
    const asset = await this.registry.lookup(id);
    if (await pathExists(this.locator.previewPath(id))) {
      this.registry.update(id, { previewState: "ready" });
      return "ready";
    }
    if (asset.previewState === "pending") return "pending";

    this.registry.update(id, { previewState: "pending" });
    try {
      await this.queue.schedule(id);
    } catch (error) {
      this.registry.update(id, { previewState: "absent" });
      throw error;
    }
    return "pending";
  }

  /**
   * Produces the preview for an asset. Calls for one asset are serialized, and
   * an existing preview file short-circuits, so one transcode runs per asset.
   */
  generate(id: string): Promise<PreviewOutcome> {
    return this.mutex.runExclusive(`preview:${id}`, async () => {
      const asset = await this.registry.lookup(id);
      const finalPath = this.locator.previewPath(id);

      if (await pathExists(finalPath)) {
        this.registry.update(id, { previewState: "ready" });
        return "existing";
      }
      if (!(await pathExists(asset.sourcePath))) {
        this.registry.update(id, { previewState: "absent" });
        throw new SourceMissingError(asset.sourcePath);
      }

      this.registry.update(id, { previewState: "pending" });
      const tempPath = this.locator.tempPathFor(finalPath);
      try {
        await mkdir(path.dirname(finalPath), { recursive: true });
        await this.engine.encodeRange({
          sourcePath: asset.sourcePath,
          outputPath: tempPath,
          options: this.encodeOptions(),
        });
        await rename(tempPath, finalPath);
      } catch (error) {
        await rm(tempPath, { force: true });
        this.registry.update(id, { previewState: "absent" });
        throw classifyFailure(error, { operation: "preview", path: finalPath });
      }

      // deleted while we were transcoding: do not leave an orphan behind
      if (!this.registry.has(id) || !(await pathExists(asset.sourcePath))) {
        await rm(finalPath, { force: true });
        this.log.warn({ assetId: id }, "Asset removed during preview transcode");
        throw new SourceMissingError(asset.sourcePath);
      }

      this.registry.update(id, { previewState: "ready" });
      this.log.info({ assetId: id, path: finalPath }, "Preview ready");
      return "created";
    });
  }

  async status(id: string): Promise<PreviewStatus> {
    const asset = await this.registry.lookup(id);
    const exists = await pathExists(this.locator.previewPath(id));
    if (exists && asset.previewState !== "ready") {
      this.registry.update(id, { previewState: "ready" });
    }
    return {
      videoId: id,
      exists,
      browserPlayable: asset.browserPlayable,
      usePreview: !asset.browserPlayable && exists,
      state: exists ? "ready" : asset.previewState,
    };
  }

  previewPath(id: string): string {
    return this.locator.previewPath(id);
  }
}
