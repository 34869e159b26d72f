import * as fs from "node:fs";
import * as path from "node:path";

export type PackageManager = "bun" | "pnpm" | "yarn" | "npm";

export const PACKAGE_MANAGERS: readonly PackageManager[] = ["bun", "pnpm", "yarn", "npm"];

const LOCK_FILES: Array<[PackageManager, string[]]> = [
  ["bun", ["bun.lockb", "bun.lock"]],
  ["pnpm", ["pnpm-lock.yaml"]],
  ["yarn", ["yarn.lock"]],
];

export function detectPackageManager(rootDir: string): PackageManager {
  for (const [manager, files] of LOCK_FILES) {
    if (files.some((f) => fs.existsSync(path.join(rootDir, f)))) return manager;
  }
  return "npm";
}

export function isPackageManager(name: string): name is PackageManager {
  return PACKAGE_MANAGERS.some((m) => m === name);
}

export function addCommand(manager: PackageManager, packages: string): string {
  return manager === "npm" ? `npm install ${packages}` : `${manager} add ${packages}`;
}
