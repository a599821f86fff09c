import { createWriteStream } from "fs";
import { mkdir, rename, rm } from "fs/promises";
import path from "path";
import type { Readable } from "stream";
import { pipeline } from "stream/promises";
import { classifyFailure, InvalidInputError } from "../errors";
import {
  type ArtifactLocator,
  ALLOWED_EXTENSIONS,
  fileExtension,
  generateAssetId,
  isAllowedVideoFile,
  OUTPUT_EXTENSION,
  sanitizeFilename,
} from "../lib/artifacts";
import type { Logger } from "../lib/logger";
import { isBrowserPlayableCodec, type MediaEngine } from "../lib/media";
import { KeyedMutex } from "../lib/mutex";
import type { AssetRegistry } from "../lib/registry";
import { formatTimestamp } from "../lib/timestamps";
import type { Asset } from "../types";

export interface IngestRequest {
  filename: string | undefined;
  // multipart file streams end early and set `truncated` past the size limit
  stream: Readable & { truncated?: boolean };
}

export interface DurationInfo {
  duration: number;
  durationStr: string;
}

// Called for every upload whose codec a browser cannot play
export type PreviewRequester = (assetId: string) => Promise<unknown>;

export interface AssetServiceDeps {
  registry: AssetRegistry;
  locator: ArtifactLocator;
  engine: MediaEngine;
  logger: Logger;
  requestPreview?: PreviewRequester;
  maxUploadBytes: number;
  mutex?: KeyedMutex;
}

export class AssetService {
  private readonly registry: AssetRegistry;
  private readonly locator: ArtifactLocator;
  private readonly engine: MediaEngine;
  private readonly mutex: KeyedMutex;
  private readonly log: Logger;
  private readonly requestPreview?: PreviewRequester;
  private readonly maxUploadBytes: number;

  constructor(deps: AssetServiceDeps) {
    this.registry = deps.registry;
    this.locator = deps.locator;
    this.engine = deps.engine;
    this.requestPreview = deps.requestPreview;
    this.maxUploadBytes = deps.maxUploadBytes;
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.log = deps.logger.child({ module: "assets" });
  }

  /**
   * Stores an upload under a fresh id. The duration is left at 0 and probed on
   * first use; the codec is probed here so a preview can start right away.
   */
  async ingest(request: IngestRequest): Promise<Asset> {
    const rawName = request.filename?.trim() ?? "";
    if (!rawName) {
      request.stream.resume();
      throw new InvalidInputError("No file selected", "MissingFile");
    }
    if (!isAllowedVideoFile(rawName)) {
      request.stream.resume();
      throw new InvalidInputError(
        `Invalid file type. Allowed: ${[...ALLOWED_EXTENSIONS].join(", ")}`,
        "DisallowedExtension",
      );
    }

    const id = generateAssetId();
    const extension = fileExtension(rawName) ?? OUTPUT_EXTENSION;
    const sanitized = sanitizeFilename(rawName);
    // a name reduced to nothing but its extension gets a generic stem
    const filename = fileExtension(sanitized) === extension ? sanitized : `video.${extension}`;
    const sourcePath = this.locator.sourcePath(id, filename);
    const tempPath = this.locator.tempPathFor(sourcePath);

    try {
      await mkdir(path.dirname(sourcePath), { recursive: true });
      await pipeline(request.stream, createWriteStream(tempPath));
      if (request.stream.truncated) {
        throw new InvalidInputError(
          `File too large. Maximum size is ${this.maxUploadBytes} bytes`,
          "FileTooLarge",
        );
      }
      await rename(tempPath, sourcePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw classifyFailure(error, { operation: "upload", path: path.dirname(sourcePath) });
    }

    const codec = await this.probeCodec(sourcePath);
    const asset: Asset = {
      id,
      originalFilename: filename,
      sourcePath,
      durationSeconds: 0,
      browserPlayable: isBrowserPlayableCodec(codec),
      codec,
      previewState: "absent",
    };
    this.registry.register(asset);
    this.log.info({ assetId: id, filename, codec }, "Video uploaded");

    if (!asset.browserPlayable && this.requestPreview) {
      try {
        await this.requestPreview(id);
      } catch (error) {
        // the preview stays absent and is retried on the next preview request
        this.log.error({ assetId: id, err: error }, "Could not schedule preview");
      }
    }
    return this.registry.lookup(id);
  }

  async getDuration(id: string): Promise<DurationInfo> {
    const asset = await this.registry.lookup(id);
    if (asset.durationSeconds > 0) {
      return { duration: asset.durationSeconds, durationStr: formatTimestamp(asset.durationSeconds) };
    }

    const duration = await this.mutex.runExclusive(`duration:${id}`, async () => {
      if (asset.durationSeconds > 0) return asset.durationSeconds;
      try {
        const probed = await this.engine.probeDuration(asset.sourcePath);
        if (probed > 0) this.registry.update(id, { durationSeconds: probed });
        return probed;
      } catch (error) {
        this.log.warn({ assetId: id, err: error }, "Duration probe failed");
        return 0;
      }
    });
    return { duration, durationStr: formatTimestamp(duration) };
  }

  async resolveSource(id: string): Promise<Asset> {
    return this.registry.lookup(id);
  }

  private async probeCodec(sourcePath: string): Promise<string | null> {
    try {
      return await this.engine.probeVideoCodec(sourcePath);
    } catch (error) {
      this.log.warn({ path: sourcePath, err: error }, "Codec probe failed, assuming playable");
      return null;
    }
  }
}
