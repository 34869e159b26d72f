// Scaffolding tools prompt by default; a prompt nobody answers hangs RUN until its timeout.

export type Fixup = { command: string; warnings: string[] };

type FixRule = {
  name: string;
  matches: (lower: string) => boolean;
  fix: (command: string) => Fixup;
};

export function hasFlag(command: string, ...flags: string[]): boolean {
  const tokens = command.split(/\s+/);
  return flags.some((f) => tokens.some((t) => t === f || t.startsWith(`${f}=`)));
}

/** `npm create x` forwards flags to the generator only after a `--` separator. */
function appendArgs(command: string, args: string): string {
  if (/^npm\s+(create|init)\s/.test(command) && !/\s--(\s|$)/.test(command)) {
    return `${command} -- ${args}`;
  }
  return `${command} ${args}`;
}

const RULES: FixRule[] = [
  {
    name: "vite",
    matches: (lower) => /create[ -]vite/.test(lower),
    fix: (command) => {
      const warnings: string[] = [];
      let cmd = command;
      if (!hasFlag(cmd, "--yes", "-y")) {
        const withYes = cmd.replace(/^npm create\b/, "npm create --yes").replace(/^npx create-vite\b/, "npx --yes create-vite");
        if (withYes !== cmd) warnings.push("Vite detected. Adding --yes to skip the install prompt.");
        cmd = withYes;
      }
      if (!hasFlag(cmd, "--template", "-t")) {
        warnings.push("Vite detected without --template. Adding default react-ts.");
        cmd = appendArgs(cmd, "--template react-ts");
      }
      return { command: cmd, warnings };
    },
  },
  {
    name: "next",
    matches: (lower) => lower.includes("create-next-app"),
    fix: (command) =>
      hasFlag(command, "--yes", "-y")
        ? { command, warnings: [] }
        : { command: `${command} --yes`, warnings: ["Next.js detected. Adding --yes flag."] },
  },
  {
    name: "astro",
    matches: (lower) => /create[ -]astro/.test(lower),
    fix: (command) => {
      if (!hasFlag(command, "--template")) {
        return {
          command: appendArgs(command, "--template minimal --yes"),
          warnings: ["Astro detected. Adding --template minimal --yes."],
        };
      }
      if (!hasFlag(command, "--yes", "-y")) {
        return { command: appendArgs(command, "--yes"), warnings: ["Astro detected. Adding --yes flag."] };
      }
      return { command, warnings: [] };
    },
  },
  {
    name: "remix",
    matches: (lower) => lower.includes("create-remix"),
    fix: (command) =>
      hasFlag(command, "--template")
        ? { command, warnings: [] }
        : { command: `${command} --template remix`, warnings: ["Remix detected. Adding --template remix."] },
  },
  {
    name: "shadcn",
    matches: (lower) => lower.includes("shadcn"),
    fix: (command) =>
      hasFlag(command, "--yes", "-y")
        ? { command, warnings: [] }
        : { command: `${command} -y`, warnings: ["shadcn detected. Adding -y flag."] },
  },
  {
    name: "init",
    matches: (lower) => /^(npm|pnpm|yarn|bun)\s+init$/.test(lower.trim()),
    fix: (command) =>
      hasFlag(command, "--yes", "-y")
        ? { command, warnings: [] }
        : { command: `${command.trim()} -y`, warnings: ["Init command detected. Adding -y flag."] },
  },
  {
    name: "generic-create",
    matches: (lower) => /^(npm|npx|pnpm|yarn|bun)\s+create\b/.test(lower.trim()) || lower.includes("npx create-"),
    fix: (command) =>
      /\s--(\s|$)/.test(command) || hasFlag(command, "--yes", "-y")
        ? { command, warnings: [] }
        : {
            command,
            warnings: [
              "Interactive create command detected.",
              "Tip: use --yes, -y, or --template flags to avoid prompts.",
            ],
          },
  },
];

/** Applies the first matching rule; commands no rule knows pass through unchanged. */
export function makeNonInteractive(command: string): Fixup {
  const lower = command.toLowerCase();
  const rule = RULES.find((r) => r.matches(lower));
  return rule ? rule.fix(command) : { command, warnings: [] };
}
