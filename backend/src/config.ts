import dotenv from "dotenv";
import fs from "fs";
import os from "os";
import path from "path";

dotenv.config();

type Env = Record<string, string | undefined>;

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  maxUploadBytes: number;
  dirs: {
    data: string;
    uploads: string;
    outputs: string;
    previews: string;
  };
  trim: {
    bufferSeconds: number;
    preset: string;
  };
  preview: {
    maxHeight: number;
    videoBitrate: string;
  };
  media: {
    ffmpegPath: string;
    ffprobePath: string;
  };
  redisUrl?: string;
}

const readNumber = (env: Env, key: string, fallback: number) => {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid environment variable: ${key}=${raw}`);
  }
  return value;
};

const readString = (env: Env, key: string, fallback: string) =>
  env[key]?.trim() || fallback;

// Containers keep their data beside the app, desktop installs in the home directory.
export function resolveDataDir(env: Env): string {
  const explicit = env.DATA_DIR?.trim();
  if (explicit) return path.resolve(explicit);
  if (env.RENDER || fs.existsSync("/.dockerenv")) return "/app";
  return path.join(os.homedir(), "VideoTrimmer");
}

export function loadConfig(env: Env = process.env): AppConfig {
  const data = resolveDataDir(env);
  const redisUrl = env.REDIS_URL?.trim();

  return {
    port: readNumber(env, "PORT", 8080),
    host: readString(env, "HOST", "0.0.0.0"),
    logLevel: readString(env, "LOG_LEVEL", "info"),
    maxUploadBytes: readNumber(env, "MAX_UPLOAD_BYTES", 500 * 1024 * 1024),
    dirs: {
      data,
      uploads: path.join(data, "uploads"),
      outputs: path.join(data, "output"),
      previews: path.join(data, "previews"),
    },
    trim: {
      bufferSeconds: readNumber(env, "TRIM_BUFFER_SECONDS", 0),
      preset: readString(env, "ENCODE_PRESET", "ultrafast"),
    },
    preview: {
      maxHeight: readNumber(env, "PREVIEW_MAX_HEIGHT", 720),
      videoBitrate: readString(env, "PREVIEW_VIDEO_BITRATE", "2000k"),
    },
    media: {
      ffmpegPath: readString(env, "FFMPEG_PATH", "ffmpeg"),
      ffprobePath: readString(env, "FFPROBE_PATH", "ffprobe"),
    },
    redisUrl: redisUrl || undefined,
  };
}
