import Fastify, { FastifyReply, FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import { z, ZodError } from "zod";
import type { AppContext } from "./context";
import { InvalidInputError, TrimmerError } from "./errors";
import { sendVideoFile } from "./lib/streaming";
import { formatTimestamp } from "./lib/timestamps";
import type { TrimRequestBody, UploadResponse } from "./types";

type IdParams = { Params: { id: string } };

const timestampField = z.union([z.string(), z.number()]);

const trimBodySchema = z.object({
  id: z.string().min(1),
  start: timestampField.optional(),
  end: timestampField.nullable().optional(),
  output_name: z.string().optional(),
}) satisfies z.ZodType<TrimRequestBody>;

export async function buildServer(ctx: AppContext) {
  const server = Fastify({
    logger: ctx.logger,
    bodyLimit: 1048576,
  });

  await server.register(cors, {
    origin: "*",
    methods: ["GET", "POST", "PUT", "DELETE"],
  });
  await server.register(multipart, {
    limits: { fileSize: ctx.config.maxUploadBytes, files: 1 },
  });

  server.setErrorHandler((error, req, reply) => {
    if (error instanceof TrimmerError) {
      if (error.statusCode >= 500) req.log.error({ err: error }, error.message);
      return reply.code(error.statusCode).send({ error: error.message, kind: error.kind });
    }
    if (error instanceof ZodError) {
      const detail = error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      return reply.code(400).send({ error: detail.join("; "), kind: "InvalidInput" });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: error.message, kind: "InvalidInput" });
    }
    req.log.error(error);
    return reply.code(500).send({ error: "Internal Server Error" });
  });

  server.get("/", async () => {
    return { status: "OK", service: "Video Trimmer" };
  });

  // 1. upload a video
  server.post("/upload", async (req: FastifyRequest, reply: FastifyReply) => {
    const file = await req.file();
    if (!file) {
      throw new InvalidInputError("No file provided", "MissingFile");
    }

    const asset = await ctx.assets.ingest({ filename: file.filename, stream: file.file });
    const body: UploadResponse = {
      id: asset.id,
      filename: asset.originalFilename,
      duration: asset.durationSeconds,
      duration_str: formatTimestamp(asset.durationSeconds),
      browser_playable: asset.browserPlayable,
      preview_state: asset.previewState,
    };
    return reply.send(body);
  });

  // 2. trim
  server.post("/trim", async (req, reply) => {
    const body = trimBodySchema.parse(req.body);
    const result = await ctx.trims.trim({
      id: body.id,
      start: body.start,
      end: body.end,
      outputName: body.output_name,
    });
    return reply.send({ success: true, id: result.id, output_name: result.outputName });
  });

  server.get<IdParams>("/download/:id", async (req, reply) => {
    const asset = await ctx.registry.lookup(req.params.id);
    if (!asset.trimOutput) {
      throw new InvalidInputError("Video not yet trimmed", "NotTrimmed");
    }
    return sendVideoFile(req, reply, asset.trimOutput.path, {
      contentType: "video/mp4",
      downloadName: asset.trimOutput.name,
    });
  });

  server.get<IdParams>("/duration/:id", async (req, reply) => {
    const { duration, durationStr } = await ctx.assets.getDuration(req.params.id);
    return reply.send({ duration, duration_str: durationStr });
  });

  server.get<IdParams>("/video/:id", async (req, reply) => {
    const asset = await ctx.assets.resolveSource(req.params.id);
    return sendVideoFile(req, reply, asset.sourcePath);
  });

  // 3. browser-compatible preview
  server.get<IdParams>("/preview/:id", async (req, reply) => {
    const { id } = req.params;
    const status = await ctx.previews.status(id);
    if (status.exists) {
      return sendVideoFile(req, reply, ctx.previews.previewPath(id), { contentType: "video/mp4" });
    }
    const state = await ctx.previews.requestPreview(id);
    return reply.code(202).send({ video_id: id, status: state });
  });

  server.get<IdParams>("/preview/status/:id", async (req, reply) => {
    const status = await ctx.previews.status(req.params.id);
    return reply.send({
      video_id: status.videoId,
      exists: status.exists,
      browser_playable: status.browserPlayable,
      use_preview: status.usePreview,
      state: status.state,
    });
  });

  server.delete<IdParams>("/delete/:id", async (req, reply) => {
    await ctx.cleanup.delete(req.params.id);
    return reply.send({ success: true });
  });

  server.addHook("onClose", async () => {
    await ctx.queue.close();
  });

  return server;
}
