import type { FastifyBaseLogger } from "fastify";
import pino from "pino";

// Shared by Fastify and the services so request logs and job logs use one stream
export type Logger = FastifyBaseLogger;

export const createLogger = (level: string): Logger =>
  pino({
    level,
    base: { service: "video-trimmer" },
  });
