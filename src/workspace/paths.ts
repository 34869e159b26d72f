import * as fs from "node:fs";
import * as path from "node:path";

/** Model output may use either separator; normalize to the host's. */
export function normalizeSeparators(p: string): string {
  return path.sep === "\\" ? p.replace(/\//g, "\\") : p.replace(/\\/g, "/");
}

export function isInside(rootDir: string, target: string): boolean {
  const rel = path.relative(rootDir, target);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/**
 * Where `target` really lands once symlinks are followed: the real path of its
 * deepest existing ancestor with the missing tail appended. Undefined when the
 * chain passes through a dangling link, whose destination cannot be checked.
 */
export function realLocation(target: string): string | undefined {
  const tail: string[] = [];
  let current = target;
  for (;;) {
    if (fs.existsSync(current)) return path.join(fs.realpathSync.native(current), ...tail);
    if (fs.lstatSync(current, { throwIfNoEntry: false })?.isSymbolicLink()) return undefined;
    const parent = path.dirname(current);
    if (parent === current) return target;
    tail.unshift(path.basename(current));
    current = parent;
  }
}

/**
 * Resolves `target` against `cwd`. Returns undefined when the result lies
 * outside `rootDir`, either by name or through a symlink.
 */
export function resolveInRoot(rootDir: string, cwd: string, target: string): string | undefined {
  const unquoted = target.trim().replace(/^(["'])(.*)\1$/, "$2");
  const resolved = path.resolve(cwd, normalizeSeparators(unquoted));
  if (!isInside(rootDir, resolved)) return undefined;
  const real = realLocation(resolved);
  const realRoot = realLocation(rootDir);
  return real !== undefined && realRoot !== undefined && isInside(realRoot, real) ? resolved : undefined;
}

/** Root-relative path with forward slashes, "." for the root itself. */
export function relativeToRoot(rootDir: string, target: string): string {
  const rel = path.relative(rootDir, target).split(path.sep).join("/");
  return rel || ".";
}
