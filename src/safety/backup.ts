import * as fs from "node:fs";
import * as path from "node:path";
import { globSync } from "glob";
import { relativeToRoot } from "../workspace/paths.js";

export const BACKUP_DIR = path.join(".sigil", "backups");
export const MAX_TREE_BACKUP_FILES = 500;

// Reproducible or tool-owned trees are not worth archiving on delete.
const TREE_BACKUP_IGNORE = ["**/node_modules/**", "**/.git/**", "**/dist/**", "**/build/**", "**/.next/**"];

export type BackupRecord = {
  originalRelativePath: string;
  timestamp: string;
  backupPath: string;
};

export type TreeBackup =
  | { kind: "archived"; records: BackupRecord[] }
  | { kind: "skipped"; fileCount: number };

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

export function formatTimestamp(d: Date): string {
  return (
    `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}` +
    `_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}` +
    `_${pad(d.getMilliseconds(), 3)}`
  );
}

export function sanitizeRelativePath(rel: string): string {
  return rel.replace(/[\\/]+/g, "_");
}

function isExistsError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

export class BackupStore {
  readonly dir: string;

  constructor(
    readonly rootDir: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.dir = path.join(rootDir, BACKUP_DIR);
  }

  /** Copies an existing file aside. Never overwrites an earlier backup. */
  backup(file: string): BackupRecord {
    const originalRelativePath = relativeToRoot(this.rootDir, file);
    const base = sanitizeRelativePath(originalRelativePath);
    const stamp = formatTimestamp(this.now());
    fs.mkdirSync(this.dir, { recursive: true });
    for (let n = 0; ; n++) {
      const timestamp = n === 0 ? stamp : `${stamp}-${n}`;
      const backupPath = path.join(this.dir, `${base}_${timestamp}.bak`);
      try {
        fs.copyFileSync(file, backupPath, fs.constants.COPYFILE_EXCL);
        return { originalRelativePath, timestamp, backupPath };
      } catch (err) {
        if (!isExistsError(err)) throw err;
      }
    }
  }

  /** Files under `dir` that a directory delete would archive. */
  treeFiles(dir: string): string[] {
    return globSync("**/*", { cwd: dir, nodir: true, dot: true, ignore: TREE_BACKUP_IGNORE, absolute: true }).sort();
  }

  /** Backs up every file of a directory before it is removed, up to a cap. */
  backupTree(dir: string, maxFiles = MAX_TREE_BACKUP_FILES): TreeBackup {
    const files = this.treeFiles(dir);
    if (files.length > maxFiles) return { kind: "skipped", fileCount: files.length };
    return { kind: "archived", records: files.map((f) => this.backup(f)) };
  }
}
