export type ErrorKind =
  | "NotFound"
  | "InvalidInput"
  | "InvalidRange"
  | "SourceMissing"
  | "EngineFailure"
  | "ResourceExhausted"
  | "DuplicateId";

export class TrimmerError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = "TrimmerError";
  }
}

export class NotFoundError extends TrimmerError {
  constructor(public readonly assetId: string) {
    super("Video not found", "NotFound", 404);
    this.name = "NotFoundError";
  }
}

export class InvalidInputError extends TrimmerError {
  constructor(
    message: string,
    public readonly reason:
      | "InvalidTimestamp"
      | "MissingFile"
      | "DisallowedExtension"
      | "FileTooLarge"
      | "NotTrimmed"
      | "BadRequest" = "BadRequest",
  ) {
    super(message, "InvalidInput", 400);
    this.name = "InvalidInputError";
  }
}

export class InvalidRangeError extends TrimmerError {
  constructor(
    public readonly start: number,
    public readonly end: number,
  ) {
    super(
      `Start time must be before end time (${start.toFixed(3)}s >= ${end.toFixed(3)}s)`,
      "InvalidRange",
      400,
    );
    this.name = "InvalidRangeError";
  }
}

export class SourceMissingError extends TrimmerError {
  constructor(public readonly sourcePath: string) {
    super(`Source file not found: ${sourcePath}`, "SourceMissing", 400);
    this.name = "SourceMissingError";
  }
}

export class EngineFailureError extends TrimmerError {
  constructor(message: string) {
    super(message, "EngineFailure", 500);
    this.name = "EngineFailureError";
  }
}

export class ResourceExhaustedError extends TrimmerError {
  constructor(
    public readonly reason: "disk_full" | "permission",
    public readonly location: string,
  ) {
    super(
      reason === "disk_full"
        ? "No space left on device. Please free up disk space and try again."
        : `Permission denied. Cannot write to: ${location}. Check the folder permissions.`,
      "ResourceExhausted",
      reason === "disk_full" ? 507 : 500,
    );
    this.name = "ResourceExhaustedError";
  }
}

export class DuplicateIdError extends TrimmerError {
  constructor(public readonly assetId: string) {
    super(`Asset id already registered: ${assetId}`, "DuplicateId", 409);
    this.name = "DuplicateIdError";
  }
}

// Raised by the media engine when ffmpeg/ffprobe exits non-zero or cannot start
export class MediaEngineError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(message);
    this.name = "MediaEngineError";
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

export interface FailureContext {
  operation: "upload" | "trim" | "preview";
  path: string;
}

export function classifyFailure(error: unknown, context: FailureContext): Error {
  if (error instanceof TrimmerError) return error;

  const code = isErrnoException(error) ? error.code : undefined;
  const stderr = error instanceof MediaEngineError ? error.stderr : "";
  const location = context.path;

  if (code === "ENOSPC" || /No space left on device/i.test(stderr)) {
    return new ResourceExhaustedError("disk_full", location);
  }
  if (code === "EACCES" || code === "EPERM" || /Permission denied/i.test(stderr)) {
    return new ResourceExhaustedError("permission", location);
  }
  if (code === "EPIPE") {
    return new EngineFailureError(
      `Video encoding was interrupted (broken pipe) while writing ${location}. Check disk space and permissions.`,
    );
  }
  if (error instanceof MediaEngineError) {
    return new EngineFailureError(`${error.message} (${context.operation}: ${location})`);
  }
  if (context.operation === "upload") {
    return error instanceof Error ? error : new Error(String(error));
  }
  const detail = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  return new EngineFailureError(`${detail} (${context.operation}: ${location})`);
}
