/**
 * Constants module for dockerfile-kit.
 */

import { readFileSync } from "node:fs";

// === Version (SSOT: package.json) ===
function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export const VERSION: string = readVersion();

// === Naming (SSOT) ===
export const CLI_NAME = "dockerfile-kit";
