import os from "node:os";
import path from "node:path";

const MS_PER_HOUR = 3_600_000;
const ISO_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})(T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?(Z|[+-]\d{2}:?\d{2})?$/;
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

export function roundTo(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function formatHours(value?: number): string {
  if (typeof value !== "number" || Number.isNaN(value)) {
    return "-";
  }
  return `${roundTo(value, 1)}h`;
}

export function hoursBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / MS_PER_HOUR;
}

export function parseMaybeNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  // Plain decimals only: Number() would also take hex, exponents and padding.
  if (typeof value === "string" && DECIMAL.test(value)) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

// ISO-8601 dates and date-times only; Date's lenient parser would accept
// strings like "March 3". Tags are written in UTC, so a missing offset means UTC.
export function parseTimestamp(value?: string): Date | undefined {
  const match = value ? ISO_TIMESTAMP.exec(value.trim()) : null;
  if (!match) {
    return undefined;
  }
  const [, date, time, offset] = match;
  if (!time && offset) {
    return undefined;
  }
  const parsed = new Date(time ? `${date}${time}${offset ?? "Z"}` : `${date}T00:00:00Z`);
  if (Number.isNaN(parsed.getTime())) {
    return undefined;
  }
  return parsed;
}

export function normalizeInputPath(inputPath: string): string {
  const trimmed = inputPath.trim();
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return trimmed;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function stringField(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}
