import { readFileSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { VersionOptions } from "../types.js";
import { findPackageRoot } from "../../util/findPackageRoot.js";
import { RECSWEEP_VERSION } from "../../config/constants.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export async function versionCommand(_options: VersionOptions): Promise<void> {
  console.log(`recsweep version: ${getVersion()}`);
  console.log("");
  console.log("Environment:");
  console.log(`  Node.js: ${process.version}`);
  console.log(`  Platform: ${process.platform}`);
  console.log(`  Arch: ${process.arch}`);
}

function getVersion(): string {
  try {
    const pkg: unknown = JSON.parse(
      readFileSync(resolve(findPackageRoot(__dirname), "package.json"), "utf-8"),
    );
    if (
      pkg !== null &&
      typeof pkg === "object" &&
      "version" in pkg &&
      typeof pkg.version === "string"
    ) {
      return pkg.version;
    }
    return RECSWEEP_VERSION;
  } catch {
    return RECSWEEP_VERSION;
  }
}
