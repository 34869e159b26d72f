import type { ChatMessage } from "./api.js";
import type { ActionDeps, ActionResult, SessionState } from "./tools/types.js";
import { relativeToRoot } from "./workspace/paths.js";
import { renderFileContents, renderTree, type ScanOptions } from "./workspace/scan.js";

export const CONTEXT_MARKER = "PROJECT CONTEXT SNAPSHOT";

function clock(d: Date): string {
  return [d.getHours(), d.getMinutes(), d.getSeconds()].map((n) => String(n).padStart(2, "0")).join(":");
}

export function scanOptions(rootDir: string, deps: Pick<ActionDeps, "ignore" | "settings">): ScanOptions {
  return { rootDir, rules: deps.ignore, maxFileBytes: deps.settings.maxFileBytes };
}

export function isContextEntry(message: ChatMessage): boolean {
  return message.role === "system" && message.content.startsWith(CONTEXT_MARKER);
}

export function findContextEntry(messages: readonly ChatMessage[]): number {
  return messages.findIndex(isContextEntry);
}

/** Scans `cwd` into the content of a context entry. */
export function buildContextSnapshot(
  rootDir: string,
  cwd: string,
  deps: Pick<ActionDeps, "ignore" | "settings" | "now">
): { content: string; tree: string } {
  const opts = scanOptions(rootDir, deps);
  const tree = renderTree(cwd, opts);
  const files = renderFileContents(cwd, opts);
  const content = [
    `${CONTEXT_MARKER} (updated ${clock(deps.now())})`,
    `Directory: ${relativeToRoot(rootDir, cwd)}`,
    "",
    "DIRECTORY STRUCTURE:",
    tree,
    "",
    "FILE CONTENTS:",
    files,
  ].join("\n");
  return { content, tree };
}

/** Replaces the context entry in place, or inserts it right after the leading instruction. */
export function withContextEntry(messages: readonly ChatMessage[], content: string): ChatMessage[] {
  const entry: ChatMessage = { role: "system", content };
  const next = [...messages];
  const i = findContextEntry(next);
  if (i >= 0) next[i] = entry;
  else next.splice(Math.min(1, next.length), 0, entry);
  return next;
}

export function refreshContext(
  state: SessionState,
  deps: Pick<ActionDeps, "ignore" | "settings" | "now">
): { result: ActionResult; state: SessionState } {
  const { content, tree } = buildContextSnapshot(state.rootDir, state.cwd, deps);
  return {
    result: { success: true, message: "Context refreshed.", detail: `Current structure:\n${tree}` },
    state: { ...state, messages: withContextEntry(state.messages, content) },
  };
}

function isPinned(message: ChatMessage, index: number): boolean {
  return (index === 0 && message.role === "system") || isContextEntry(message);
}

/**
 * Sliding window: keeps the leading instruction, the context entry and the
 * most recent `maxTurns` exchanges; the oldest other messages go first.
 */
export function pruneHistory(messages: readonly ChatMessage[], maxTurns: number): ChatMessage[] {
  const limit = maxTurns * 2;
  const movable = messages.filter((m, i) => !isPinned(m, i)).length;
  let drop = movable - limit;
  if (drop <= 0) return [...messages];
  return messages.filter((m, i) => {
    if (isPinned(m, i)) return true;
    if (drop > 0) {
      drop--;
      return false;
    }
    return true;
  });
}

export function estimateTokens(messages: readonly ChatMessage[]): number {
  let chars = 0;
  for (const m of messages) chars += m.content.length;
  return Math.round(chars / 4);
}
