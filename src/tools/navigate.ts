import * as fs from "node:fs";
import { refreshContext, scanOptions } from "../context.js";
import { relativeToRoot, resolveInRoot } from "../workspace/paths.js";
import { listEntries, renderTree } from "../workspace/scan.js";
import { fail, ok, unchanged } from "./result.js";
import type { ActionDeps, ActionHandler, ActionOutcome, SessionState } from "./types.js";

/** Moves cwd inside the root and rebuilds the context entry; leaves state alone on failure. */
export function changeDirectory(target: string, state: SessionState, deps: ActionDeps): ActionOutcome {
  const dir = resolveInRoot(state.rootDir, state.cwd, target);
  if (!dir) return unchanged(state, fail(`Directory '${target}' is outside the project root.`));
  if (!fs.existsSync(dir)) return unchanged(state, fail(`Directory '${target}' does not exist.`));
  if (!fs.statSync(dir).isDirectory()) return unchanged(state, fail(`'${target}' is not a directory.`));
  const rel = relativeToRoot(state.rootDir, dir);
  const refreshed = refreshContext({ ...state, cwd: dir }, deps);
  deps.reporter.info(`Changed directory to ${rel}`);
  return { results: [ok(`Changed directory to ${rel}.`, refreshed.result.detail)], state: refreshed.state };
}

export const changeDirectoryAction: ActionHandler = async (block, { state, deps }) => {
  deps.reporter.action("CD", block.argumentLine);
  return changeDirectory(block.argumentLine, state, deps);
};

export const showTree: ActionHandler = async (_block, { state, deps }) => {
  deps.reporter.action("TREE", relativeToRoot(state.rootDir, state.cwd));
  const tree = renderTree(state.cwd, scanOptions(state.rootDir, deps));
  deps.reporter.output(tree);
  return unchanged(state, ok("Directory tree:", tree));
};

export const listFiles: ActionHandler = async (_block, { state, deps }) => {
  deps.reporter.action("LISTFILES", relativeToRoot(state.rootDir, state.cwd));
  const listing = listEntries(state.cwd, scanOptions(state.rootDir, deps));
  deps.reporter.output(listing);
  return unchanged(state, ok("Files in current directory:", listing));
};

export const refresh: ActionHandler = async (_block, { state, deps }) => {
  deps.reporter.action("REFRESH", relativeToRoot(state.rootDir, state.cwd));
  const { result, state: next } = refreshContext(state, deps);
  return { results: [result], state: next };
};
