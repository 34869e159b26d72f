export type ShellFamily = "unix" | "windows";

export function shellFamily(platform: NodeJS.Platform = process.platform): ShellFamily {
  return platform === "win32" ? "windows" : "unix";
}

type IdiomTable = ReadonlyArray<readonly [from: string, to: string]>;

const UNIX_TO_WINDOWS: IdiomTable = [
  ["ls", "dir /b"],
  ["ls -l", "dir"],
  ["ls -la", "dir /a"],
  ["ls -R", "tree /f /a"],
  ["pwd", "cd"],
  ["cat", "type"],
  ["cp", "copy"],
  ["mv", "move"],
  ["rm", "del"],
  ["rm -r", "rmdir /s /q"],
  ["rm -rf", "rmdir /s /q"],
  ["mkdir -p", "mkdir"],
  ["touch", "type nul >"],
  ["clear", "cls"],
  ["grep", "findstr"],
  ["which", "where"],
];

const WINDOWS_TO_UNIX: IdiomTable = [
  ["dir", "ls -l"],
  ["dir /b", "ls"],
  ["dir /a", "ls -la"],
  ["type", "cat"],
  ["copy", "cp"],
  ["move", "mv"],
  ["del", "rm"],
  ["del /s", "rm -rf"],
  ["del /s /q", "rm -rf"],
  ["rmdir /s /q", "rm -rf"],
  ["rd /s /q", "rm -rf"],
  ["findstr", "grep"],
  ["where", "which"],
  ["cls", "clear"],
];

function byLengthDesc(table: IdiomTable): IdiomTable {
  return [...table].sort((a, b) => b[0].length - a[0].length);
}

const TABLES: Record<ShellFamily, IdiomTable> = {
  windows: byLengthDesc(UNIX_TO_WINDOWS),
  unix: byLengthDesc(WINDOWS_TO_UNIX),
};

/**
 * True when `command` starts with `word` (case-insensitive) and the next
 * character is whitespace or the end of the string.
 */
export function startsWithWord(command: string, word: string): boolean {
  const head = command.slice(0, word.length);
  if (head.toLowerCase() !== word.toLowerCase()) return false;
  const next = command.charAt(word.length);
  return next === "" || /\s/.test(next);
}

export type Translation = { command: string; warnings: string[] };

/** Rewrites a foreign-shell idiom at the head of `command` for the host shell. */
export function translateCommand(command: string, family: ShellFamily = shellFamily()): Translation {
  const trimmed = command.trim();
  for (const [from, to] of TABLES[family]) {
    if (!startsWithWord(trimmed, from)) continue;
    const rest = trimmed.slice(from.length).trim();
    const converted = rest ? `${to} ${rest}` : to;
    return { command: converted, warnings: [`Auto-converted: ${trimmed} → ${converted}`] };
  }
  return { command: trimmed, warnings: [] };
}

/** A bare `cd <dir>` with no chaining; compound commands go to the shell. */
export function parseDirectoryChange(command: string): string | undefined {
  const trimmed = command.trim();
  if (!startsWithWord(trimmed, "cd")) return undefined;
  if (/&&|\|\||[;|]/.test(trimmed)) return undefined;
  const target = trimmed
    .slice(2)
    .trim()
    .replace(/^\/d\s+/i, "")
    .replace(/^(["'])(.*)\1$/, "$2");
  return target || undefined;
}
