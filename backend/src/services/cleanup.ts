import { rm } from "fs/promises";
import { isErrnoException } from "../errors";
import { type ArtifactKind, type ArtifactLocator, isAssetId } from "../lib/artifacts";
import type { Logger } from "../lib/logger";
import type { AssetRegistry } from "../lib/registry";

export interface CleanupReport {
  removed: string[];
  failed: { path: string; error: string }[];
}

const ARTIFACT_KINDS: ArtifactKind[] = ["source", "trim", "preview"];

export class CleanupService {
  private readonly log: Logger;

  constructor(
    private readonly registry: AssetRegistry,
    private readonly locator: ArtifactLocator,
    logger: Logger,
  ) {
    this.log = logger.child({ module: "cleanup" });
  }

  /**
   * Removes every artifact of an asset and forgets it. Each file is removed on
   * its own; unknown ids and already missing files are not errors.
   */
  async delete(id: string): Promise<CleanupReport> {
    const report: CleanupReport = { removed: [], failed: [] };
    const targets = new Set<string>();

    // registry entries may point at files a scan cannot see (e.g. an unknown id shape)
    const known = this.registry.has(id) ? await this.registry.lookup(id) : undefined;
    if (known) {
      targets.add(known.sourcePath);
      if (known.trimOutput) targets.add(known.trimOutput.path);
      targets.add(this.locator.previewPath(id));
    }

    // the entry stays unrecoverable until every file is gone, so an in-flight
    // preview or trim discards its output and lookups report NotFound
    await this.registry.removeWhile(id, async () => {
      // scanned once the entry is gone, so outputs renamed earlier are included
      if (isAssetId(id)) {
        for (const kind of ARTIFACT_KINDS) {
          for (const found of await this.locator.findArtifacts(kind, id)) {
            targets.add(found);
          }
        }
      }
      for (const target of targets) {
        try {
          await rm(target);
          report.removed.push(target);
        } catch (error) {
          if (isErrnoException(error) && error.code === "ENOENT") continue;
          const message = error instanceof Error ? error.message : String(error);
          this.log.warn({ assetId: id, path: target, err: error }, "Could not remove artifact");
          report.failed.push({ path: target, error: message });
        }
      }
    });

    if (report.removed.length > 0) {
      this.log.info({ assetId: id, removed: report.removed.length }, "Video deleted");
    }
    return report;
  }
}
