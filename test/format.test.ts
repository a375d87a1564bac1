import test from "node:test";
import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { fixedClock } from "../src/lib/clock";
import { formatDuration, formatTimestamp, renderDetails } from "../src/lib/format";
import { formatHours, hoursBetween, normalizeInputPath, parseMaybeNumber, parseTimestamp, roundTo } from "../src/lib/utils";

test("renderDetails aligns values after the longest label", () => {
  const rendered = renderDetails([
    ["machine", "i-0123456789abcdef0"],
    ["state", "running"]
  ]);
  assert.equal(rendered, "machine: i-0123456789abcdef0\nstate:   running");
  assert.equal(renderDetails([]), "");
});

test("formatDuration picks the largest useful unit", () => {
  assert.equal(formatDuration(4.5), "4h 30m");
  assert.equal(formatDuration(0.25), "15m");
  assert.equal(formatDuration(26.5), "1d 2h 30m");
  assert.equal(formatDuration(-2), "0m");
  assert.equal(formatDuration(undefined), "-");
  assert.equal(formatDuration(Number.POSITIVE_INFINITY), "-");
});

test("formatHours rounds to one decimal", () => {
  assert.equal(formatHours(4.5), "4.5h");
  assert.equal(formatHours(6.0166), "6h");
  assert.equal(formatHours(undefined), "-");
  assert.equal(formatHours(Number.NaN), "-");
  assert.equal(roundTo(2.346), 2.35);
});

test("formatTimestamp prints ISO or a dash", () => {
  assert.equal(formatTimestamp(new Date("2026-10-18T12:00:00Z")), "2026-10-18T12:00:00.000Z");
  assert.equal(formatTimestamp(undefined), "-");
});

test("parseTimestamp accepts ISO dates and date-times, reading a missing offset as UTC", () => {
  assert.equal(parseTimestamp("2026-10-18T07:30:00.000Z")?.toISOString(), "2026-10-18T07:30:00.000Z");
  assert.equal(parseTimestamp("2026-10-18T09:30:00+02:00")?.toISOString(), "2026-10-18T07:30:00.000Z");
  assert.equal(parseTimestamp("2026-10-18T07:30Z")?.toISOString(), "2026-10-18T07:30:00.000Z");
  assert.equal(parseTimestamp("March 3"), undefined);
  assert.equal(parseTimestamp("2026-10-18")?.toISOString(), "2026-10-18T00:00:00.000Z");
  assert.equal(parseTimestamp("2026-10-18T07:30:00")?.toISOString(), "2026-10-18T07:30:00.000Z");
  assert.equal(parseTimestamp("2026-10-18T07:30:00.250")?.toISOString(), "2026-10-18T07:30:00.250Z");
  assert.equal(parseTimestamp("2026-10-18Z"), undefined);
  assert.equal(parseTimestamp("18/10/2026"), undefined);
  assert.equal(parseTimestamp("2026-13-45T07:30:00Z"), undefined);
  assert.equal(parseTimestamp(undefined), undefined);
});

test("parseMaybeNumber takes plain decimals only", () => {
  assert.equal(parseMaybeNumber("2.5"), 2.5);
  assert.equal(parseMaybeNumber(3), 3);
  assert.equal(parseMaybeNumber(""), undefined);
  assert.equal(parseMaybeNumber("NaN"), undefined);
  assert.equal(parseMaybeNumber("Infinity"), undefined);
  assert.equal(parseMaybeNumber("0x10"), undefined);
  assert.equal(parseMaybeNumber("1e3"), undefined);
  assert.equal(parseMaybeNumber(" 2 "), undefined);
  assert.equal(parseMaybeNumber("-1.5"), -1.5);
  assert.equal(parseMaybeNumber(null), undefined);
});

test("hoursBetween measures fractional hours", () => {
  assert.equal(hoursBetween(new Date("2026-10-18T07:30:00Z"), new Date("2026-10-18T12:00:00Z")), 4.5);
});

test("normalizeInputPath expands the home directory", () => {
  assert.equal(normalizeInputPath("~"), os.homedir());
  assert.equal(normalizeInputPath(" ~/devbox.json "), path.join(os.homedir(), "devbox.json"));
  assert.equal(normalizeInputPath("./config.json"), "./config.json");
});

test("fixedClock returns fresh copies of one instant", () => {
  const clock = fixedClock("2026-10-18T12:00:00.000Z");
  const first = clock();
  first.setUTCHours(0);
  assert.equal(clock().toISOString(), "2026-10-18T12:00:00.000Z");
});
