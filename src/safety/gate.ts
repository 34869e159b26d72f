import type { Prompter } from "../tools/types.js";

export const ELEVATED_PHRASE = "confirm";

const DENYLIST = new Set([
  "format",
  "fdisk",
  "parted",
  "diskpart",
  "dd",
  "shutdown",
  "reboot",
  "halt",
  "poweroff",
]);

const SWEEPING_TARGETS = new Set(["/", "~", "~/", "$HOME", "${HOME}", ".", "..", "./", "../"]);

// Newlines and a lone "&" separate commands in sh and cmd as well.
function segments(command: string): string[] {
  return command
    .split(/&&|\|\||[;&|\r\n]/)
    .map((s) => s.trim())
    .filter(Boolean);
}

/** `/bin/rm` and `C:\Windows\format.com` name the same programs as `rm` and `format`. */
function programName(token: string): string {
  const base = token.split(/[\\/]/).pop() ?? token;
  return base.replace(/\.(exe|com|cmd|bat)$/i, "");
}

function tokensOf(segment: string): string[] {
  const tokens = segment.split(/\s+/).filter(Boolean);
  const head = tokens[0];
  if (head) tokens[0] = programName(head);
  while (tokens[0]?.toLowerCase() === "sudo") {
    tokens.shift();
    const next = tokens[0];
    if (next) tokens[0] = programName(next);
  }
  return tokens;
}

function unquote(token: string): string {
  return token.replace(/^["']+|["']+$/g, "");
}

function isDenylisted(head: string): boolean {
  const lower = head.toLowerCase();
  return DENYLIST.has(lower) || /^mkfs(\.|$)/.test(lower);
}

/** Targets of a recursive delete, or undefined when the segment is not one. */
function recursiveDeleteTargets(tokens: string[]): string[] | undefined {
  const [head = "", ...args] = tokens;
  const lower = head.toLowerCase();
  if (lower === "rm") {
    const recursive = args.some((a) => a === "--recursive" || /^-[a-zA-Z]*[rR][a-zA-Z]*$/.test(a));
    return recursive ? args.filter((a) => !a.startsWith("-")) : undefined;
  }
  if (lower === "rmdir" || lower === "rd" || lower === "del" || lower === "erase") {
    const recursive = args.some((a) => a.toLowerCase() === "/s");
    return recursive ? args.filter((a) => !/^\/[a-z]$/i.test(a)) : undefined;
  }
  if (lower === "remove-item") {
    const recursive = args.some((a) => a.toLowerCase() === "-recurse");
    return recursive ? args.filter((a) => !a.startsWith("-")) : undefined;
  }
  return undefined;
}

/** Root-level, home, current/parent directory, or wildcard targets. */
export function isSweepingTarget(target: string): boolean {
  const t = unquote(target);
  if (/[*?]/.test(t)) return true;
  if (SWEEPING_TARGETS.has(t)) return true;
  if (/^\/[^/]+\/?$/.test(t)) return true;
  if (/^[a-z]:([\\/]([^\\/]+[\\/]?)?)?$/i.test(t)) return true;
  return false;
}

export function isDangerous(command: string): boolean {
  for (const segment of segments(command)) {
    const tokens = tokensOf(segment);
    const head = tokens[0];
    if (!head) continue;
    if (isDenylisted(head)) return true;
    const targets = recursiveDeleteTargets(tokens);
    if (targets?.some(isSweepingTarget)) return true;
  }
  return false;
}

export function isAffirmative(answer: string): boolean {
  const a = answer.trim().toLowerCase();
  return a === "y" || a === "yes";
}

export async function confirmAction(prompter: Prompter, question: string, signal?: AbortSignal): Promise<boolean> {
  return isAffirmative(await prompter.ask(`${question} (y/n): `, signal));
}

/** Elevated confirmation; only the exact phrase passes. */
export async function confirmDangerous(prompter: Prompter, signal?: AbortSignal): Promise<boolean> {
  const answer = await prompter.ask(`DANGEROUS COMMAND! Type '${ELEVATED_PHRASE}' to proceed: `, signal);
  return answer.trim() === ELEVATED_PHRASE;
}
