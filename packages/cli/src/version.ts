import { readFileSync } from "node:fs";

function readVersion(): string {
  try {
    const manifest: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
    if (typeof manifest === "object" && manifest !== null && "version" in manifest && typeof manifest.version === "string") {
      return manifest.version;
    }
  } catch {
    // Built output has no package.json beside it
  }
  return "0.0.0-dev";
}

export const version = readVersion();
