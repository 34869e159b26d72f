/**
 * Slash commands understood at the prompt. The REPL resolves input through
 * `resolveCommand` and prints `/help` from this table.
 */

export type Command = {
  cmd: string;
  desc: string;
  aliases?: string[];
};

export const COMMANDS: Command[] = [
  { cmd: "/help", desc: "Show help", aliases: ["/?"] },
  { cmd: "/clear", desc: "Reset the conversation and re-scan the project", aliases: ["/c"] },
  { cmd: "/refresh", desc: "Re-scan the current directory into context", aliases: ["/r"] },
  { cmd: "/status", desc: "Show directory, package manager and history size" },
  { cmd: "/q", desc: "Quit", aliases: ["/exit", "/quit", "exit"] },
];

const aliasToCanonical = new Map<string, string>();
for (const c of COMMANDS) {
  aliasToCanonical.set(c.cmd.toLowerCase(), c.cmd);
  for (const a of c.aliases ?? []) {
    aliasToCanonical.set(a.toLowerCase().trim(), c.cmd);
  }
}

export function resolveCommand(input: string): string | null {
  const key = input.trim().toLowerCase();
  if (!key) return null;
  return aliasToCanonical.get(key) ?? null;
}

export function helpText(): string {
  const width = Math.max(...COMMANDS.map((c) => c.cmd.length));
  return COMMANDS.map((c) => {
    const aliases = c.aliases?.length ? ` (${c.aliases.join(", ")})` : "";
    return `${c.cmd.padEnd(width)}  ${c.desc}${aliases}`;
  }).join("\n");
}
