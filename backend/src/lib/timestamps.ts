import { InvalidInputError } from "../errors";

const TIMESTAMP_PATTERN = /^(\d+(?:\.\d*)?|\.\d+)\s*s?$/i;

/**
 * Parses a seconds timestamp such as `"12.500s"`, `"7"` or `7.25`.
 * The trailing `s` unit is optional; negative and non-numeric values throw.
 */
export function parseTimestamp(value: string | number): number {
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidInputError(`Invalid timestamp: ${value}`, "InvalidTimestamp");
    }
    return value;
  }
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  const digits = match?.[1];
  if (!digits) {
    throw new InvalidInputError(`Invalid timestamp: "${value}"`, "InvalidTimestamp");
  }
  const seconds = Number.parseFloat(digits);
  if (!Number.isFinite(seconds)) {
    throw new InvalidInputError(`Invalid timestamp: "${value}"`, "InvalidTimestamp");
  }
  return seconds;
}

export function formatTimestamp(seconds: number): string {
  const safe = Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
  const whole = Math.floor(safe);
  const ms = Math.floor((safe - whole) * 1000);
  return `${whole}.${String(ms).padStart(3, "0")}s`;
}
