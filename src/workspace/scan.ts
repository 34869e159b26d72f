import * as fs from "node:fs";
import * as path from "node:path";
import { isIgnored, type IgnoreRuleSet } from "./ignore.js";
import { relativeToRoot } from "./paths.js";

export type ScanOptions = {
  rootDir: string;
  rules: IgnoreRuleSet;
  maxFileBytes: number;
};

type Entry = { name: string; abs: string; isDirectory: boolean; isLink: boolean };

function visibleEntries(dir: string, opts: ScanOptions): Entry[] {
  const dirents = fs.readdirSync(dir, { withFileTypes: true });
  return dirents
    .map((d) => ({
      name: d.name,
      abs: path.join(dir, d.name),
      isDirectory: d.isDirectory(),
      isLink: d.isSymbolicLink(),
    }))
    .filter((e) => !isIgnored(relativeToRoot(opts.rootDir, e.abs), e.isDirectory, opts.rules))
    .sort((a, b) => {
      if (a.isDirectory !== b.isDirectory) return a.isDirectory ? -1 : 1;
      const an = a.name.toLowerCase();
      const bn = b.name.toLowerCase();
      return an < bn ? -1 : an > bn ? 1 : 0;
    });
}

function treeLines(dir: string, prefix: string, opts: ScanOptions, out: string[]): void {
  let entries: Entry[];
  try {
    entries = visibleEntries(dir, opts);
  } catch {
    out.push(`${prefix}[access denied]`);
    return;
  }
  entries.forEach((entry, i) => {
    const last = i === entries.length - 1;
    out.push(`${prefix}${last ? "└── " : "├── "}${entry.name}${entry.isDirectory ? "/" : ""}`);
    if (entry.isDirectory) treeLines(entry.abs, prefix + (last ? "    " : "│   "), opts, out);
  });
}

/** Structural rendering of `dir`, without file contents. */
export function renderTree(dir: string, opts: ScanOptions): string {
  const lines: string[] = [];
  treeLines(dir, "", opts, lines);
  return lines.length > 0 ? lines.join("\n") : "(empty directory)";
}

/** One level of `dir`; directories carry a trailing slash. */
export function listEntries(dir: string, opts: ScanOptions): string {
  const entries = visibleEntries(dir, opts);
  if (entries.length === 0) return "(empty directory)";
  return entries.map((e) => (e.isDirectory ? `${e.name}/` : e.name)).join("\n");
}

function walkFiles(dir: string, opts: ScanOptions, out: string[]): void {
  let entries: Entry[];
  try {
    entries = visibleEntries(dir, opts);
  } catch {
    return;
  }
  // Links may point anywhere; contents are only read from real files under the root.
  for (const entry of entries) {
    if (entry.isDirectory) walkFiles(entry.abs, opts, out);
    else if (!entry.isLink) out.push(entry.abs);
  }
}

function formatKb(bytes: number): string {
  return `${Math.round(bytes / 1024)} KB`;
}

function fileSection(file: string, baseDir: string, opts: ScanOptions): string {
  const rel = path.relative(baseDir, file).split(path.sep).join("/");
  try {
    const size = fs.statSync(file).size;
    if (size > opts.maxFileBytes) {
      return `### File: \`${rel}\` (skipped: larger than ${formatKb(opts.maxFileBytes)})\n`;
    }
    const content = fs.readFileSync(file, "utf-8");
    if (content.includes("\u0000")) return `### File: \`${rel}\` (skipped: binary)\n`;
    const ext = path.extname(file).slice(1) || "text";
    return `### File: \`${rel}\`\n\`\`\`${ext}\n${content}\n\`\`\`\n`;
  } catch (err) {
    return `### File: \`${rel}\` (error reading: ${err instanceof Error ? err.message : String(err)})\n`;
  }
}

/** Concatenated contents of every visible file under `dir`, in tree order. */
export function renderFileContents(dir: string, opts: ScanOptions): string {
  const files: string[] = [];
  walkFiles(dir, opts, files);
  if (files.length === 0) return "(no readable files)";
  return files.map((f) => fileSection(f, dir, opts)).join("\n");
}

/** Structure plus contents of a subtree, used for directory reads. */
export function scrapeDirectory(dir: string, opts: ScanOptions): string {
  const name = path.basename(dir);
  return [
    `# Project Content: ${name}`,
    "",
    "## Folder Structure",
    "```",
    `${name}/`,
    renderTree(dir, opts),
    "```",
    "",
    "## File Contents",
    "",
    renderFileContents(dir, opts),
  ].join("\n");
}
