import fs from "node:fs";
import path from "node:path";
import { isRecord, stringField } from "./utils";

export interface PackageMeta {
  name?: string;
  version?: string;
  description?: string;
}

// Sources run from src/lib, the build from dist/src/lib.
const PACKAGE_JSON_CANDIDATES = [
  path.resolve(__dirname, "../../package.json"),
  path.resolve(__dirname, "../../../package.json")
];

export function readPackageMeta(candidates: string[] = PACKAGE_JSON_CANDIDATES): PackageMeta {
  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) {
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(candidate, "utf8"));
    } catch {
      continue;
    }
    if (!isRecord(parsed)) {
      continue;
    }
    return {
      name: stringField(parsed.name),
      version: stringField(parsed.version),
      description: stringField(parsed.description)
    };
  }

  return {};
}
