import { spawn } from "child_process";
import { MediaEngineError } from "../errors";
import type { Logger } from "./logger";

export const BROWSER_PLAYABLE_CODECS = new Set(["h264", "avc1", "vp8", "vp9", "av1"]);

export function isBrowserPlayableCodec(codec: string | null): boolean {
  // unknown codecs are assumed playable
  if (!codec) return true;
  return BROWSER_PLAYABLE_CODECS.has(codec.trim().toLowerCase());
}

export interface EncodeOptions {
  videoCodec: string;
  audioCodec: string;
  preset: string;
  container: "mp4";
  maxHeight?: number;
  videoBitrate?: string;
  pixelFormat?: string;
  profile?: string;
  fastStart?: boolean;
}

export interface EncodeRequest {
  sourcePath: string;
  outputPath: string;
  startSeconds?: number;
  endSeconds?: number;
  options: EncodeOptions;
}

export interface MediaEngine {
  probeDuration(path: string): Promise<number>;
  probeVideoCodec(path: string): Promise<string | null>;
  encodeRange(request: EncodeRequest): Promise<void>;
}

interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

const STDERR_TAIL_CHARS = 2000;

function runProcess(binary: string, args: string[], log: Logger): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    log.debug({ binary, args }, "Spawning media process");

    const child = spawn(binary, args, {
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    child.stdout.on("data", (d: Buffer) => {
      stdout += d.toString();
    });
    child.stderr.on("data", (d: Buffer) => {
      stderr += d.toString();
      if (stderr.length > STDERR_TAIL_CHARS * 4) {
        stderr = stderr.slice(-STDERR_TAIL_CHARS * 2);
      }
    });

    child.on("error", (error) => {
      reject(
        new MediaEngineError(`Failed to start ${binary}: ${error.message}`, null, stderr),
      );
    });
    child.on("close", (code) => {
      resolve({ exitCode: code, stdout, stderr });
    });
  });
}

export function buildEncodeArgs(request: EncodeRequest): string[] {
  const { sourcePath, outputPath, startSeconds, endSeconds, options } = request;
  const args = ["-hide_banner", "-nostdin", "-y"];

  if (startSeconds !== undefined && startSeconds > 0) {
    args.push("-ss", startSeconds.toFixed(3));
  }
  args.push("-i", sourcePath);
  if (endSeconds !== undefined) {
    const length = endSeconds - (startSeconds ?? 0);
    args.push("-t", length.toFixed(3));
  }

  if (options.maxHeight !== undefined) {
    // -2 keeps the width even and the aspect ratio intact; never upscales
    args.push("-vf", `scale=-2:'min(ih,${options.maxHeight})'`);
  }

  args.push("-c:v", options.videoCodec, "-preset", options.preset);
  if (options.profile) args.push("-profile:v", options.profile);
  if (options.pixelFormat) args.push("-pix_fmt", options.pixelFormat);
  if (options.videoBitrate) args.push("-b:v", options.videoBitrate);
  args.push("-c:a", options.audioCodec);
  if (options.fastStart) args.push("-movflags", "+faststart");
  args.push("-f", options.container, outputPath);

  return args;
}

export function parseProbeDuration(stdout: string): number {
  const payload: unknown = JSON.parse(stdout);
  if (typeof payload !== "object" || payload === null || !("format" in payload)) {
    return 0;
  }
  const format = payload.format;
  if (typeof format !== "object" || format === null || !("duration" in format)) {
    return 0;
  }
  const duration = Number.parseFloat(String(format.duration));
  return Number.isFinite(duration) && duration > 0 ? duration : 0;
}

export function parseProbeCodec(stdout: string): string | null {
  const payload: unknown = JSON.parse(stdout);
  if (typeof payload !== "object" || payload === null || !("streams" in payload)) {
    return null;
  }
  const streams = payload.streams;
  if (!Array.isArray(streams) || streams.length === 0) return null;
  const stream: unknown = streams[0];
  if (typeof stream !== "object" || stream === null) return null;
  if ("codec_name" in stream && typeof stream.codec_name === "string" && stream.codec_name) {
    return stream.codec_name.toLowerCase();
  }
  if (
    "codec_tag_string" in stream &&
    typeof stream.codec_tag_string === "string" &&
    stream.codec_tag_string
  ) {
    return stream.codec_tag_string.toLowerCase();
  }
  return null;
}

export class FfmpegMediaEngine implements MediaEngine {
  private readonly log: Logger;

  constructor(
    private readonly paths: { ffmpegPath: string; ffprobePath: string },
    logger: Logger,
  ) {
    this.log = logger.child({ module: "media" });
  }

  private async probe(args: string[]): Promise<string> {
    const result = await runProcess(this.paths.ffprobePath, args, this.log);
    if (result.exitCode !== 0) {
      throw new MediaEngineError(
        `ffprobe failed with exit code ${result.exitCode}`,
        result.exitCode,
        result.stderr.slice(-STDERR_TAIL_CHARS),
      );
    }
    return result.stdout;
  }

  async probeDuration(path: string): Promise<number> {
    const stdout = await this.probe([
      "-v",
      "error",
      "-show_entries",
      "format=duration",
      "-of",
      "json",
      path,
    ]);
    return parseProbeDuration(stdout);
  }

  async probeVideoCodec(path: string): Promise<string | null> {
    const stdout = await this.probe([
      "-v",
      "error",
      "-select_streams",
      "v:0",
      "-show_entries",
      "stream=codec_name,codec_tag_string",
      "-of",
      "json",
      path,
    ]);
    return parseProbeCodec(stdout);
  }

  async encodeRange(request: EncodeRequest): Promise<void> {
    const args = buildEncodeArgs(request);
    const result = await runProcess(this.paths.ffmpegPath, args, this.log);
    if (result.exitCode !== 0) {
      const stderr = result.stderr.slice(-STDERR_TAIL_CHARS);
      this.log.debug({ stderr }, "ffmpeg stderr");
      this.log.error({ exitCode: result.exitCode }, "ffmpeg encode failed");
      throw new MediaEngineError(
        `FFmpeg failed with exit code ${result.exitCode}`,
        result.exitCode,
        stderr,
      );
    }
  }
}
