import * as fs from "node:fs";
import * as path from "node:path";
import { globSync } from "glob";
import { errorMessage } from "../errors.js";
import { scanOptions } from "../context.js";
import { MAX_TREE_BACKUP_FILES } from "../safety/backup.js";
import { diffLines, diffStats } from "../safety/diff.js";
import { confirmAction } from "../safety/gate.js";
import { isInside, relativeToRoot, resolveInRoot } from "../workspace/paths.js";
import { scrapeDirectory } from "../workspace/scan.js";
import { denied, fail, ok, unchanged } from "./result.js";
import type { ActionHandler } from "./types.js";

function outsideRoot(target: string): string {
  return `Access denied: '${target}' is outside the project root.`;
}

export const readPath: ActionHandler = async (block, { state, deps }) => {
  const target = block.argumentLine;
  deps.reporter.action("READ", target);
  const abs = resolveInRoot(state.rootDir, state.cwd, target);
  if (!abs) return unchanged(state, fail(outsideRoot(target)));
  if (!fs.existsSync(abs)) return unchanged(state, fail(`Path '${target}' does not exist.`));
  if (fs.statSync(abs).isDirectory()) {
    deps.reporter.info(`Reading every file under ${relativeToRoot(state.rootDir, abs)}`);
    return unchanged(state, ok(`Contents of directory '${target}':`, scrapeDirectory(abs, scanOptions(state.rootDir, deps))));
  }
  return unchanged(state, ok(`Content of ${target}:`, fs.readFileSync(abs, "utf-8")));
};

export const writePath: ActionHandler = async (block, { state, deps, signal }) => {
  const target = block.argumentLine;
  const body = block.body ?? "";
  deps.reporter.action("WRITE", target);
  const abs = resolveInRoot(state.rootDir, state.cwd, target);
  if (!abs) return unchanged(state, fail(outsideRoot(target)));
  const exists = fs.existsSync(abs);
  if (exists && fs.statSync(abs).isDirectory()) {
    return unchanged(state, fail(`'${target}' is a directory; WRITE needs a file path.`));
  }

  const label = relativeToRoot(state.rootDir, abs);
  let summary = `${body.split("\n").length} line(s)`;
  if (exists) {
    try {
      const lines = diffLines(fs.readFileSync(abs, "utf-8"), body, label);
      if (lines.length === 0) deps.reporter.info(`No changes to ${label}`);
      else deps.reporter.diff(label, lines);
      const { added, removed } = diffStats(lines);
      summary = `+${added} -${removed}`;
    } catch (err) {
      deps.reporter.warn(`Could not diff ${label}: ${errorMessage(err)}`);
    }
  }

  if (!(await confirmAction(deps.prompter, exists ? "Apply changes?" : "Create file?", signal))) {
    return unchanged(state, denied(`User denied write to ${target}.`));
  }
  if (exists) {
    const record = deps.backups.backup(abs);
    deps.reporter.info(`Backup saved: ${path.basename(record.backupPath)}`);
  }
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, body, "utf-8");
  return unchanged(state, ok(`File ${label} ${exists ? "updated" : "created"}.`, summary));
};

function countFiles(dir: string): number {
  return globSync("**/*", { cwd: dir, nodir: true, dot: true }).length;
}

export const deletePath: ActionHandler = async (block, { state, deps, signal }) => {
  const target = block.argumentLine;
  deps.reporter.action("DELETE", target);
  const abs = resolveInRoot(state.rootDir, state.cwd, target);
  if (!abs) return unchanged(state, fail(outsideRoot(target)));
  if (abs === state.rootDir) return unchanged(state, fail("Refusing to delete the project root."));
  if (isInside(deps.backups.dir, abs) || isInside(abs, deps.backups.dir)) {
    return unchanged(state, fail("Refusing to delete the backup directory."));
  }
  if (isInside(abs, state.cwd)) {
    return unchanged(state, fail(`Refusing to delete '${target}': it contains the current directory.`));
  }
  if (!fs.existsSync(abs)) return unchanged(state, fail(`Path '${target}' does not exist.`));

  const label = relativeToRoot(state.rootDir, abs);
  if (!fs.statSync(abs).isDirectory()) {
    if (!(await confirmAction(deps.prompter, `Delete ${label}?`, signal))) {
      return unchanged(state, denied(`User denied deletion of ${target}.`));
    }
    const record = deps.backups.backup(abs);
    deps.reporter.info(`Backup saved: ${path.basename(record.backupPath)}`);
    fs.unlinkSync(abs);
    return unchanged(state, ok(`File ${label} deleted.`));
  }

  const total = countFiles(abs);
  deps.reporter.warn(`Directory ${label} contains ${total} file(s).`);
  const archivable = deps.backups.treeFiles(abs).length;
  if (archivable > MAX_TREE_BACKUP_FILES) {
    deps.reporter.warn(`Too many files (${archivable}) to back up; they will be removed without a backup.`);
  }
  if (!(await confirmAction(deps.prompter, `Delete directory ${label} and everything in it?`, signal))) {
    return unchanged(state, denied(`User denied deletion of ${target}.`));
  }
  const archive = deps.backups.backupTree(abs);
  const backedUp = archive.kind === "archived" ? archive.records.length : 0;
  if (archive.kind === "archived" && backedUp > 0) deps.reporter.info(`Backed up ${backedUp} file(s)`);
  fs.rmSync(abs, { recursive: true, force: true });
  return unchanged(state, ok(`Directory ${label} deleted.`, `${total} file(s) removed, ${backedUp} backed up.`));
};
