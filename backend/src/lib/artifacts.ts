import { randomBytes, randomUUID } from "crypto";
import { access, mkdir, readdir } from "fs/promises";
import path from "path";
import { isErrnoException } from "../errors";

/*
 * Every artifact on disk is named `{id}_{name}`:
 *
 *   uploads/{id}_{sanitized original filename}
 *   output/{id}_{output name}.mp4
 *   previews/{id}_preview.mp4
 *
 * Temporary files are `.{final basename}.{8 hex}.part` in the same directory,
 * so an `{id}_` prefix scan never sees a half-written file.
 */

export type ArtifactKind = "source" | "trim" | "preview";

export interface ArtifactDirs {
  uploads: string;
  outputs: string;
  previews: string;
}

export const ALLOWED_EXTENSIONS = new Set([
  "mp4",
  "avi",
  "mov",
  "mkv",
  "wmv",
  "flv",
  "webm",
  "mts",
]);

export const OUTPUT_EXTENSION = "mp4";
const PREVIEW_SUFFIX = `preview.${OUTPUT_EXTENSION}`;
const ASSET_ID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export const generateAssetId = (): string => randomUUID();

export const isAssetId = (value: string): boolean => ASSET_ID_PATTERN.test(value);

export const pathExists = async (filePath: string): Promise<boolean> => {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
};

export function sanitizeFilename(filename: string): string {
  const ascii = filename.normalize("NFKD").replace(/[^\x20-\x7e]/g, "");
  const flattened = ascii.replace(/[/\\]/g, " ");
  return flattened
    .split(/\s+/)
    .filter(Boolean)
    .join("_")
    .replace(/[^A-Za-z0-9_.-]/g, "")
    .replace(/^[._]+|[._]+$/g, "");
}

export function fileExtension(filename: string): string | null {
  const dot = filename.lastIndexOf(".");
  if (dot < 0 || dot === filename.length - 1) return null;
  return filename.slice(dot + 1).toLowerCase();
}

export const isAllowedVideoFile = (filename: string): boolean => {
  const ext = fileExtension(filename);
  return ext !== null && ALLOWED_EXTENSIONS.has(ext);
};

export function fileStem(filename: string): string {
  const ext = path.extname(filename);
  return ext ? filename.slice(0, -ext.length) : filename;
}

/** Splits `{id}_{name}` back into its parts; null for anything else. */
export function parseArtifactName(basename: string): { id: string; name: string } | null {
  const separator = basename.indexOf("_");
  if (separator <= 0) return null;
  const id = basename.slice(0, separator);
  const name = basename.slice(separator + 1);
  if (!isAssetId(id) || !name) return null;
  return { id, name };
}

export class ArtifactLocator {
  constructor(private readonly dirs: ArtifactDirs) {}

  directory(kind: ArtifactKind): string {
    switch (kind) {
      case "source":
        return this.dirs.uploads;
      case "trim":
        return this.dirs.outputs;
      case "preview":
        return this.dirs.previews;
    }
  }

  sourcePath(id: string, filename: string): string {
    return path.join(this.dirs.uploads, `${id}_${filename}`);
  }

  trimOutputPath(id: string, outputName: string): string {
    return path.join(this.dirs.outputs, `${id}_${outputName}`);
  }

  previewPath(id: string): string {
    return path.join(this.dirs.previews, `${id}_${PREVIEW_SUFFIX}`);
  }

  tempPathFor(finalPath: string): string {
    const token = randomBytes(4).toString("hex");
    return path.join(path.dirname(finalPath), `.${path.basename(finalPath)}.${token}.part`);
  }

  async ensureDirectories(): Promise<void> {
    for (const dir of Object.values(this.dirs)) {
      await mkdir(dir, { recursive: true });
    }
  }

  async findArtifacts(kind: ArtifactKind, id: string): Promise<string[]> {
    if (!isAssetId(id)) return [];
    const dir = this.directory(kind);
    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") return [];
      throw error;
    }
    const prefix = `${id}_`;
    return entries
      .filter((entry) => entry.startsWith(prefix))
      .sort()
      .map((entry) => path.join(dir, entry));
  }
}
