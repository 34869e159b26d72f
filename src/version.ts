import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

const OWN_PACKAGE_JSON = (() => {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  return path.join(dir, "..", "package.json");
})();

export function getVersion(): string {
  try {
    const raw = fs.readFileSync(OWN_PACKAGE_JSON, "utf-8");
    const pkg: unknown = JSON.parse(raw);
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}
