import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildServer } from "./app";
import { generateAssetId } from "./lib/artifacts";
import { fakeVideo } from "./testing/fake-media-engine";
import { createHarness, type Harness, multipartBody } from "./testing/harness";

describe("HTTP API", () => {
  let h: Harness;
  let server: FastifyInstance;

  const uploadVideo = async (filename: string, meta: Record<string, string | number>) => {
    const { payload, headers } = multipartBody("file", filename, fakeVideo(meta));
    return server.inject({ method: "POST", url: "/upload", payload, headers });
  };

  beforeEach(async () => {
    h = await createHarness();
    server = await buildServer(h.ctx);
  });

  afterEach(async () => {
    await server.close();
    await h.dispose();
  });

  it("answers the health check", async () => {
    const res = await server.inject({ method: "GET", url: "/" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "OK", service: "Video Trimmer" });
  });

  it("walks an unplayable upload through preview, trim, download and delete", async () => {
    const upload = await uploadVideo("clip.mov", { codec: "hevc", duration: 10 });
    expect(upload.statusCode).toBe(200);
    const uploaded = upload.json<{ id: string }>();
    const id = uploaded.id;
    expect(upload.json()).toEqual({
      id,
      filename: "clip.mov",
      duration: 0,
      duration_str: "0.000s",
      browser_playable: false,
      preview_state: "pending",
    });

    await h.queue.onIdle();
    const status = await server.inject({ method: "GET", url: `/preview/status/${id}` });
    expect(status.json()).toEqual({
      video_id: id,
      exists: true,
      browser_playable: false,
      use_preview: true,
      state: "ready",
    });

    const preview = await server.inject({ method: "GET", url: `/preview/${id}` });
    expect(preview.statusCode).toBe(200);
    expect(preview.headers["content-type"]).toBe("video/mp4");

    const trim = await server.inject({
      method: "POST",
      url: "/trim",
      payload: { id, start: "2.000s", end: "7.000s" },
    });
    expect(trim.statusCode).toBe(200);
    expect(trim.json()).toEqual({ success: true, id, output_name: "clip_trimmed.mp4" });

    const download = await server.inject({ method: "GET", url: `/download/${id}` });
    expect(download.statusCode).toBe(200);
    expect(download.headers["content-disposition"]).toBe(
      'attachment; filename="clip_trimmed.mp4"',
    );
    expect(download.body).toBe(fakeVideo({ codec: "h264", duration: 5 }));

    const duration = await server.inject({ method: "GET", url: `/duration/${id}` });
    expect(duration.json()).toEqual({ duration: 10, duration_str: "10.000s" });

    const deleted = await server.inject({ method: "DELETE", url: `/delete/${id}` });
    expect(deleted.json()).toEqual({ success: true });

    for (const url of [`/video/${id}`, `/preview/${id}`]) {
      const res = await server.inject({ method: "GET", url });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: "Video not found", kind: "NotFound" });
    }
  });

  it("accepts a preview request before the preview exists", async () => {
    const upload = await uploadVideo("clip.mp4", { codec: "h264", duration: 10 });
    const { id } = upload.json<{ id: string }>();

    const res = await server.inject({ method: "GET", url: `/preview/${id}` });
    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ video_id: id, status: "pending" });
  });

  it("rejects disallowed file types", async () => {
    const res = await uploadVideo("notes.txt", { codec: "h264" });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "Invalid file type. Allowed: mp4, avi, mov, mkv, wmv, flv, webm, mts",
      kind: "InvalidInput",
    });
  });

  it("validates trim requests", async () => {
    const upload = await uploadVideo("clip.mp4", { codec: "h264", duration: 10 });
    const { id } = upload.json<{ id: string }>();

    const range = await server.inject({
      method: "POST",
      url: "/trim",
      payload: { id, start: "5s", end: "5s" },
    });
    expect(range.statusCode).toBe(400);
    expect(range.json()).toEqual({
      error: "Start time must be before end time (5.000s >= 5.000s)",
      kind: "InvalidRange",
    });

    const missingId = await server.inject({
      method: "POST",
      url: "/trim",
      payload: { start: "1s", end: "2s" },
    });
    expect(missingId.statusCode).toBe(400);
    expect(missingId.json<{ kind: string }>().kind).toBe("InvalidInput");

    const unknown = await server.inject({
      method: "POST",
      url: "/trim",
      payload: { id: generateAssetId(), start: "1s", end: "2s" },
    });
    expect(unknown.statusCode).toBe(404);
  });

  it("serves byte ranges of the source", async () => {
    const upload = await uploadVideo("clip.mp4", { codec: "h264", duration: 10 });
    const { id } = upload.json<{ id: string }>();
    const size = Buffer.byteLength(fakeVideo({ codec: "h264", duration: 10 }));

    const res = await server.inject({
      method: "GET",
      url: `/video/${id}`,
      headers: { range: "bytes=0-3" },
    });
    expect(res.statusCode).toBe(206);
    expect(res.headers["content-range"]).toBe(`bytes 0-3/${size}`);
    expect(res.headers["accept-ranges"]).toBe("bytes");
    expect(res.body).toBe("code");

    const unsatisfiable = await server.inject({
      method: "GET",
      url: `/video/${id}`,
      headers: { range: `bytes=${size}-` },
    });
    expect(unsatisfiable.statusCode).toBe(416);
  });

  it("refuses downloads before a trim", async () => {
    const upload = await uploadVideo("clip.mp4", { codec: "h264", duration: 10 });
    const { id } = upload.json<{ id: string }>();

    const res = await server.inject({ method: "GET", url: `/download/${id}` });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "Video not yet trimmed", kind: "InvalidInput" });
  });

  it("treats deleting an unknown id as success", async () => {
    const res = await server.inject({ method: "DELETE", url: `/delete/${generateAssetId()}` });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ success: true });
  });

  it("serves assets recovered from disk after a restart", async () => {
    const upload = await uploadVideo("clip.mp4", { codec: "h264", duration: 10 });
    const { id } = upload.json<{ id: string }>();
    h.ctx.registry.clear();

    const video = await server.inject({ method: "GET", url: `/video/${id}` });
    expect(video.statusCode).toBe(200);
    expect(video.body).toBe(fakeVideo({ codec: "h264", duration: 10 }));

    const duration = await server.inject({ method: "GET", url: `/duration/${id}` });
    expect(duration.json()).toEqual({ duration: 10, duration_str: "10.000s" });
  });
});

describe("HTTP API with a small upload limit", () => {
  let h: Harness;
  let server: FastifyInstance;

  beforeEach(async () => {
    h = await createHarness({ MAX_UPLOAD_BYTES: "10" });
    server = await buildServer(h.ctx);
  });

  afterEach(async () => {
    await server.close();
    await h.dispose();
  });

  it("rejects oversized uploads without storing them", async () => {
    const content = fakeVideo({ codec: "h264", duration: 10 });
    expect(Buffer.byteLength(content)).toBeGreaterThan(10);
    const { payload, headers } = multipartBody("file", "clip.mp4", content);

    const res = await server.inject({ method: "POST", url: "/upload", payload, headers });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "File too large. Maximum size is 10 bytes",
      kind: "InvalidInput",
    });
    expect(h.ctx.registry.size).toBe(0);
    expect(await h.list(h.ctx.config.dirs.uploads)).toEqual([]);
  });
});
