import type { AppConfig } from "./config";
import { ArtifactLocator } from "./lib/artifacts";
import { createLogger, type Logger } from "./lib/logger";
import { FfmpegMediaEngine, type MediaEngine } from "./lib/media";
import { createPreviewQueue, type PreviewQueue } from "./lib/queue";
import { AssetRegistry } from "./lib/registry";
import { AssetService } from "./services/assets";
import { CleanupService } from "./services/cleanup";
import { PreviewService } from "./services/preview";
import { TrimService } from "./services/trim";

export interface AppContext {
  config: AppConfig;
  logger: Logger;
  locator: ArtifactLocator;
  registry: AssetRegistry;
  engine: MediaEngine;
  queue: PreviewQueue;
  assets: AssetService;
  trims: TrimService;
  previews: PreviewService;
  cleanup: CleanupService;
}

export interface ContextOverrides {
  logger?: Logger;
  engine?: MediaEngine;
  createQueue?: (processor: (assetId: string) => Promise<unknown>, logger: Logger) => PreviewQueue;
}

export function createContext(config: AppConfig, overrides: ContextOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const locator = new ArtifactLocator(config.dirs);
  const registry = new AssetRegistry(locator);
  const engine = overrides.engine ?? new FfmpegMediaEngine(config.media, logger);

  // the queue calls back into the preview service built right after it
  const processor = (assetId: string) => previews.generate(assetId);
  const queue = overrides.createQueue
    ? overrides.createQueue(processor, logger)
    : createPreviewQueue(config.redisUrl, processor, logger);

  const previews: PreviewService = new PreviewService({
    registry,
    locator,
    engine,
    queue,
    logger,
    settings: {
      maxHeight: config.preview.maxHeight,
      videoBitrate: config.preview.videoBitrate,
      preset: config.trim.preset,
    },
  });

  const assets = new AssetService({
    registry,
    locator,
    engine,
    logger,
    requestPreview: (assetId) => previews.requestPreview(assetId),
    maxUploadBytes: config.maxUploadBytes,
  });

  const trims = new TrimService({
    registry,
    locator,
    engine,
    assets,
    logger,
    settings: config.trim,
  });

  const cleanup = new CleanupService(registry, locator, logger);

  return { config, logger, locator, registry, engine, queue, assets, trims, previews, cleanup };
}
