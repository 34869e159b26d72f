import * as fs from "node:fs";
import * as path from "node:path";
import { minimatch } from "minimatch";

export type GlobRule = {
  pattern: string;
  negate: boolean;
  dirOnly: boolean;
  /** Patterns without a slash match a name at any depth. */
  anywhere: boolean;
};

export type IgnoreRuleSet = {
  readonly exactNames: ReadonlySet<string>;
  readonly extensions: ReadonlySet<string>;
  readonly globPatterns: readonly GlobRule[];
};

export const DEFAULT_IGNORED_NAMES = [
  "node_modules",
  "__pycache__",
  ".git",
  ".vs",
  ".vscode",
  ".idea",
  ".sigil",
  ".next",
  ".nuxt",
  ".output",
  "dist",
  "build",
  "coverage",
  "package-lock.json",
  "yarn.lock",
  "pnpm-lock.yaml",
  "bun.lockb",
  "bun.lock",
  ".env",
  ".DS_Store",
  "Thumbs.db",
];

export const DEFAULT_IGNORED_EXTENSIONS = [
  ".png", ".jpg", ".jpeg", ".gif", ".ico", ".svg", ".webp",
  ".woff", ".woff2", ".ttf", ".eot", ".otf",
  ".exe", ".dll", ".so", ".dylib", ".pyc", ".class", ".jar",
  ".pdf", ".zip", ".tar", ".gz",
];

/** Converts one .gitignore line into a rule; blank lines and comments yield undefined. */
export function toGlobRule(line: string): GlobRule | undefined {
  let s = line.trim();
  if (!s || s.startsWith("#")) return undefined;
  const negate = s.startsWith("!");
  if (negate) s = s.slice(1);
  const dirOnly = s.endsWith("/");
  s = s.replace(/\/+$/, "");
  const anchored = s.startsWith("/");
  s = s.replace(/^\/+/, "");
  if (!s) return undefined;
  return { pattern: s, negate, dirOnly, anywhere: !anchored && !s.includes("/") };
}

export function createIgnoreRules(options: {
  names?: Iterable<string>;
  extensions?: Iterable<string>;
  patterns?: Iterable<string>;
} = {}): IgnoreRuleSet {
  const globPatterns: GlobRule[] = [];
  for (const line of options.patterns ?? []) {
    const rule = toGlobRule(line);
    if (rule) globPatterns.push(Object.freeze(rule));
  }
  return Object.freeze({
    exactNames: new Set(options.names ?? DEFAULT_IGNORED_NAMES),
    extensions: new Set([...(options.extensions ?? DEFAULT_IGNORED_EXTENSIONS)].map((e) => e.toLowerCase())),
    globPatterns: Object.freeze(globPatterns),
  });
}

/** Default rules plus the project's .gitignore, when there is one. */
export function loadIgnoreRules(rootDir: string): IgnoreRuleSet {
  let patterns: string[] = [];
  try {
    patterns = fs.readFileSync(path.join(rootDir, ".gitignore"), "utf-8").split(/\r?\n/);
  } catch {
    // no .gitignore
  }
  return createIgnoreRules({ patterns });
}

function matchesGlob(relPath: string, isDirectory: boolean, rule: GlobRule): boolean {
  if (rule.dirOnly && !isDirectory) return false;
  return minimatch(relPath, rule.pattern, { dot: true, matchBase: rule.anywhere });
}

function ignoredEntry(relPath: string, isDirectory: boolean, rules: IgnoreRuleSet): boolean {
  const name = path.posix.basename(relPath);
  if (rules.exactNames.has(name)) return true;
  if (isDirectory && name.startsWith(".")) return true;
  if (!isDirectory && rules.extensions.has(path.posix.extname(name).toLowerCase())) return true;
  let ignored = false;
  for (const rule of rules.globPatterns) {
    if (matchesGlob(relPath, isDirectory, rule)) ignored = !rule.negate;
  }
  return ignored;
}

/**
 * Decides whether an entry is hidden from context scraping. `relPath` is
 * relative to the project root, with either separator; every ancestor
 * directory is checked too.
 */
export function isIgnored(relPath: string, isDirectory: boolean, rules: IgnoreRuleSet): boolean {
  const parts = relPath.split(/[\\/]+/).filter((p) => p && p !== ".");
  for (let i = 1; i <= parts.length; i++) {
    const sub = parts.slice(0, i).join("/");
    const dir = i < parts.length || isDirectory;
    if (ignoredEntry(sub, dir, rules)) return true;
  }
  return false;
}
