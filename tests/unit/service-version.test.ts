/**
 * SERVICE_VERSION resolution
 *
 * Version must come from package.json in dev (tsx, vitest) and in the
 * built layout; "0.0.0" means the path lookup failed.
 */

import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { SERVICE_VERSION } from "../../src/version.js";

describe("SERVICE_VERSION", () => {
  it("resolves to the package.json version", () => {
    const pkgPath = new URL("../../package.json", import.meta.url);
    const pkg: { version: string } = JSON.parse(readFileSync(fileURLToPath(pkgPath), "utf-8"));

    expect(SERVICE_VERSION).toBe(process.env.SERVICE_VERSION ?? pkg.version);
    expect(SERVICE_VERSION).not.toBe("0.0.0");
  });
});
