import { mkdir, rename, rm } from "fs/promises";
import path from "path";
import { classifyFailure, InvalidRangeError, SourceMissingError } from "../errors";
import {
  type ArtifactLocator,
  fileStem,
  OUTPUT_EXTENSION,
  pathExists,
  sanitizeFilename,
} from "../lib/artifacts";
import type { Logger } from "../lib/logger";
import type { EncodeOptions, MediaEngine } from "../lib/media";
import { KeyedMutex } from "../lib/mutex";
import type { AssetRegistry } from "../lib/registry";
import { parseTimestamp } from "../lib/timestamps";
import type { AssetService } from "./assets";

export interface TrimRequest {
  id: string;
  start?: string | number;
  end?: string | number | null;
  outputName?: string;
}

export interface TrimResult {
  id: string;
  outputName: string;
  path: string;
  // requested window, before any buffer is applied
  startSeconds: number;
  endSeconds: number;
  // window handed to the encoder
  encodedStart: number;
  encodedEnd: number;
}

export interface TrimSettings {
  bufferSeconds: number;
  preset: string;
}

export interface TrimWindow {
  start: number;
  end: number;
}

/**
 * Widens `[start, end]` by `buffer` on both sides, clamped to `[0, duration]`.
 * A zero duration means unknown and leaves the end unclamped.
 */
export function applyTrimBuffer(
  window: TrimWindow,
  buffer: number,
  duration: number,
): TrimWindow {
  if (buffer <= 0) return { ...window };
  const start = Math.max(0, window.start - buffer);
  const widenedEnd = window.end + buffer;
  const end = duration > 0 ? Math.min(duration, widenedEnd) : widenedEnd;
  return { start, end };
}

export function buildTrimOutputName(
  customName: string | undefined,
  originalFilename: string,
): string {
  const custom = sanitizeFilename(customName?.trim() ?? "");
  if (custom) return `${custom}.${OUTPUT_EXTENSION}`;
  return `${fileStem(originalFilename)}_trimmed.${OUTPUT_EXTENSION}`;
}

export interface TrimServiceDeps {
  registry: AssetRegistry;
  locator: ArtifactLocator;
  engine: MediaEngine;
  assets: AssetService;
  settings: TrimSettings;
  logger: Logger;
  mutex?: KeyedMutex;
}

export class TrimService {
  private readonly registry: AssetRegistry;
  private readonly locator: ArtifactLocator;
  private readonly engine: MediaEngine;
  private readonly assets: AssetService;
  private readonly settings: TrimSettings;
  private readonly mutex: KeyedMutex;
  private readonly log: Logger;

  constructor(deps: TrimServiceDeps) {
    this.registry = deps.registry;
    this.locator = deps.locator;
    this.engine = deps.engine;
    this.assets = deps.assets;
    this.settings = deps.settings;
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.log = deps.logger.child({ module: "trim" });
  }

  encodeOptions(): EncodeOptions {
    return {
      videoCodec: "libx264",
      audioCodec: "aac",
      preset: this.settings.preset,
      container: "mp4",
      pixelFormat: "yuv420p",
      fastStart: true,
    };
  }

  async trim(request: TrimRequest): Promise<TrimResult> {
    const asset = await this.registry.lookup(request.id);

    if (!(await pathExists(asset.sourcePath))) {
      throw new SourceMissingError(asset.sourcePath);
    }

    const start = parseTimestamp(request.start ?? "0s");
    const rawEnd = request.end;
    const hasEnd = rawEnd !== undefined && rawEnd !== null && rawEnd !== "";
    let end = hasEnd ? parseTimestamp(rawEnd) : 0;

    let duration = asset.durationSeconds;
    if (duration <= 0 && (!hasEnd || this.settings.bufferSeconds > 0)) {
      duration = (await this.assets.getDuration(asset.id)).duration;
    }
    if (!hasEnd) {
      end = duration;
    } else if (duration > 0) {
      end = Math.min(end, duration);
    }

    if (start >= end) {
      throw new InvalidRangeError(start, end);
    }

    const encoded = applyTrimBuffer({ start, end }, this.settings.bufferSeconds, duration);
    const outputName = buildTrimOutputName(request.outputName, asset.originalFilename);
    const finalPath = this.locator.trimOutputPath(asset.id, outputName);

    await this.mutex.runExclusive(finalPath, async () => {
      const tempPath = this.locator.tempPathFor(finalPath);
      try {
        await mkdir(path.dirname(finalPath), { recursive: true });
        await this.engine.encodeRange({
          sourcePath: asset.sourcePath,
          outputPath: tempPath,
          startSeconds: encoded.start,
          endSeconds: encoded.end,
          options: this.encodeOptions(),
        });
        await rename(tempPath, finalPath);
      } catch (error) {
        await rm(tempPath, { force: true });
        const failure = classifyFailure(error, { operation: "trim", path: finalPath });
        this.log.error({ assetId: asset.id, err: failure }, "Trim failed");
        throw failure;
      }

      // deleted while we were encoding: do not leave an orphan behind
      if (!this.registry.has(asset.id) || !(await pathExists(asset.sourcePath))) {
        await rm(finalPath, { force: true });
        this.log.warn({ assetId: asset.id }, "Asset removed during trim");
        throw new SourceMissingError(asset.sourcePath);
      }
    });

    this.registry.update(asset.id, { trimOutput: { path: finalPath, name: outputName } });
    this.log.info(
      { assetId: asset.id, outputName, start: encoded.start, end: encoded.end },
      "Trim complete",
    );

    return {
      id: asset.id,
      outputName,
      path: finalPath,
      startSeconds: start,
      endSeconds: end,
      encodedStart: encoded.start,
      encodedEnd: encoded.end,
    };
  }
}
