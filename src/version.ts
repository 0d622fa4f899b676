import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

function readPackageVersion(relative: string): string | undefined {
  const pkgPath = new URL(relative, import.meta.url);
  const pkg: unknown = JSON.parse(readFileSync(fileURLToPath(pkgPath), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return undefined;
}

/**
 * Service version, reported by /healthz and the boot log.
 *
 * Read from package.json relative to this file: ../ from src/ (tsx, tests)
 * and ../../ from dist/src/ (built). SERVICE_VERSION overrides both.
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  ((): string => {
    for (const relative of ["../package.json", "../../package.json"]) {
      try {
        const version = readPackageVersion(relative);
        if (version) return version;
      } catch {
        continue;
      }
    }
    return "0.0.0";
  })();
