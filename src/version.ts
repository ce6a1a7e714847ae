import { readFileSync } from "node:fs";

function readVersionFromPackageJson(): string | null {
  // src/ when run from sources, dist/src/ when built.
  for (const relative of ["../package.json", "../../package.json"]) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(new URL(relative, import.meta.url), "utf-8"));
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    } catch {
      continue;
    }
  }
  return null;
}

// Single source of truth for the current resource-viewer version.
export const VERSION = process.env.RESOURCE_VIEWER_VERSION || readVersionFromPackageJson() || "0.0.0";
