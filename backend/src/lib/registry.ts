import { stat } from "fs/promises";
import path from "path";
import { DuplicateIdError, isErrnoException, NotFoundError } from "../errors";
import type { Asset, AssetPatch } from "../types";
import { ArtifactLocator, parseArtifactName } from "./artifacts";

/**
 * In-memory index of uploaded assets. The upload directory stays the source of
 * truth: a miss falls back to `recover`, which rebuilds the entry from the
 * `{id}_` prefixed files so lookups keep working across restarts.
 *
 * Entries are only mutated synchronously, so handlers interleaving on the event
 * loop always see whole records. While an id is being removed, recovery treats
 * it as absent so a lookup cannot resurrect a half-deleted asset.
 */
export class AssetRegistry {
  private readonly assets = new Map<string, Asset>();
  private readonly removing = new Map<string, number>();
  // bumped whenever a removal starts or ends; a recovery spanning a bump rescans
  private removalEpoch = 0;

  constructor(private readonly locator: ArtifactLocator) {}

  get size(): number {
    return this.assets.size;
  }

  has(id: string): boolean {
    return this.assets.has(id);
  }

  register(asset: Asset): void {
    if (this.assets.has(asset.id)) {
      throw new DuplicateIdError(asset.id);
    }
    this.assets.set(asset.id, { ...asset });
  }

  async lookup(id: string): Promise<Asset> {
    const cached = this.assets.get(id);
    if (cached) return cached;

    const recovered = await this.recover(id);
    if (!recovered) throw new NotFoundError(id);
    return recovered;
  }

  /** Rebuilds an asset from disk. Duration and codec are not persisted and come back unknown. */
  async recover(id: string): Promise<Asset | null> {
    if (this.removing.has(id)) return null;
    const epoch = this.removalEpoch;

    const [source] = await this.locator.findArtifacts("source", id);
    if (!source) return null;

    const parsed = parseArtifactName(path.basename(source));
    const previews = await this.locator.findArtifacts("preview", id);
    const hasPreview = previews.includes(this.locator.previewPath(id));
    const trimOutput = await this.newestTrimOutput(id);

    if (this.removing.has(id)) return null;
    if (epoch !== this.removalEpoch) return this.recover(id);

    // another request may have recovered it while we were reading the disk
    const raced = this.assets.get(id);
    if (raced) return raced;

    const asset: Asset = {
      id,
      originalFilename: parsed?.name ?? path.basename(source),
      sourcePath: source,
      durationSeconds: 0,
      // previews are only produced for sources a browser cannot play
      browserPlayable: !hasPreview,
      codec: null,
      previewState: hasPreview ? "ready" : "absent",
      trimOutput,
    };
    this.assets.set(id, asset);
    return asset;
  }

  update(id: string, patch: AssetPatch): Asset | undefined {
    const asset = this.assets.get(id);
    if (!asset) return undefined;
    Object.assign(asset, patch);
    return asset;
  }

  remove(id: string): void {
    this.assets.delete(id);
  }

  /** Forgets the asset and keeps it unrecoverable until `task` settles. */
  async removeWhile<T>(id: string, task: () => Promise<T>): Promise<T> {
    this.removing.set(id, (this.removing.get(id) ?? 0) + 1);
    this.removalEpoch += 1;
    this.assets.delete(id);
    try {
      return await task();
    } finally {
      const remaining = (this.removing.get(id) ?? 1) - 1;
      if (remaining > 0) this.removing.set(id, remaining);
      else this.removing.delete(id);
      this.removalEpoch += 1;
      this.assets.delete(id);
    }
  }

  clear(): void {
    this.assets.clear();
  }

  private async newestTrimOutput(id: string): Promise<Asset["trimOutput"]> {
    const outputs = await this.locator.findArtifacts("trim", id);
    let newest: { path: string; mtime: number } | undefined;
    for (const output of outputs) {
      const info = await this.statIfPresent(output);
      if (!info) continue;
      if (!newest || info.mtimeMs > newest.mtime) {
        newest = { path: output, mtime: info.mtimeMs };
      }
    }
    if (!newest) return undefined;
    const parsed = parseArtifactName(path.basename(newest.path));
    return { path: newest.path, name: parsed?.name ?? path.basename(newest.path) };
  }

  // a concurrent delete may remove a file between the scan and the stat
  private async statIfPresent(filePath: string) {
    try {
      return await stat(filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") return null;
      throw error;
    }
  }
}
