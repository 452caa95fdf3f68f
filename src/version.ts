import { createRequire } from "node:module";

const CORE_PACKAGE_NAME = "bannerwatch";

// Sources run from src/, the build from dist/src/.
const PACKAGE_JSON_CANDIDATES = [
  "../package.json",
  "../../package.json",
  "../../../package.json",
] as const;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readVersionFromPackageJson(moduleUrl: string): string | null {
  const require = createRequire(moduleUrl);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    let parsed: unknown;
    try {
      parsed = require(candidate);
    } catch {
      continue;
    }
    if (!isObject(parsed) || parsed.name !== CORE_PACKAGE_NAME) continue;
    const version = typeof parsed.version === "string" ? parsed.version.trim() : "";
    if (version) return version;
  }
  return null;
}

export const VERSION = readVersionFromPackageJson(import.meta.url) ?? "0.0.0";
