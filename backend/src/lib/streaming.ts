import type { FastifyReply, FastifyRequest } from "fastify";
import { createReadStream } from "fs";
import { stat } from "fs/promises";
import path from "path";
import { isErrnoException, SourceMissingError } from "../errors";

export type ByteRange = { start: number; end: number };

const VIDEO_MIME_TYPES: Record<string, string> = {
  ".mp4": "video/mp4",
  ".mkv": "video/x-matroska",
  ".avi": "video/x-msvideo",
  ".mov": "video/quicktime",
  ".webm": "video/webm",
  ".mts": "video/mp2t",
  ".wmv": "video/x-ms-wmv",
  ".flv": "video/x-flv",
};

export const videoMimeType = (filePath: string): string =>
  VIDEO_MIME_TYPES[path.extname(filePath).toLowerCase()] ?? "video/mp4";

/** Parses a single `bytes=` range. Null when absent or unsatisfiable. */
export function parseRangeHeader(header: string | undefined, size: number): ByteRange | null {
  if (!header || size <= 0) return null;
  const match = /^bytes=(\d*)-(\d*)$/.exec(header.trim());
  if (!match) return null;
  const startRaw = match[1];
  const endRaw = match[2];
  const start = startRaw ? Number(startRaw) : null;
  const end = endRaw ? Number(endRaw) : null;
  if (start === null && end === null) return null;

  if (start === null) {
    const suffix = end ?? 0;
    if (suffix <= 0) return null;
    return { start: Math.max(size - suffix, 0), end: size - 1 };
  }

  const rangeEnd = end === null || end >= size ? size - 1 : end;
  if (start > rangeEnd) return null;
  return { start, end: rangeEnd };
}

export interface SendFileOptions {
  contentType?: string;
  downloadName?: string;
}

export async function sendVideoFile(
  req: FastifyRequest,
  reply: FastifyReply,
  filePath: string,
  options: SendFileOptions = {},
): Promise<FastifyReply> {
  let size: number;
  try {
    size = (await stat(filePath)).size;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new SourceMissingError(filePath);
    }
    throw error;
  }

  reply
    .header("Accept-Ranges", "bytes")
    .header("Content-Type", options.contentType ?? videoMimeType(filePath));
  if (options.downloadName) {
    reply.header(
      "Content-Disposition",
      `attachment; filename="${options.downloadName.replace(/"/g, "")}"`,
    );
  }

  const rangeHeader = req.headers.range;
  if (rangeHeader !== undefined) {
    const range = parseRangeHeader(rangeHeader, size);
    if (!range) {
      return reply.code(416).header("Content-Range", `bytes */${size}`).send();
    }
    return reply
      .code(206)
      .header("Content-Range", `bytes ${range.start}-${range.end}/${size}`)
      .header("Content-Length", String(range.end - range.start + 1))
      .send(createReadStream(filePath, { start: range.start, end: range.end }));
  }

  return reply
    .header("Content-Length", String(size))
    .send(createReadStream(filePath));
}
