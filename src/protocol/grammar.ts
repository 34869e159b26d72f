export const OPEN_MARKER = ">>>";
export const CLOSE_MARKER = "<<<";

export const VERBS = [
  "READ",
  "TREE",
  "LISTFILES",
  "WRITE",
  "CD",
  "DELETE",
  "RUN",
  "INSTALL",
  "CREATE",
  "SHADCN",
  "REFRESH",
] as const;

export type Verb = (typeof VERBS)[number];

export type CommandBlock = {
  verb: Verb;
  argumentLine: string;
  body?: string;
  /** Offset of the opening marker in the source text. */
  index: number;
};

type ArgumentRule = "none" | "required" | { tokens: number };

export type VerbRule = {
  /** Body runs until a line holding only the close marker. */
  body: boolean;
  args: ArgumentRule;
};

export const GRAMMAR: Record<Verb, VerbRule> = {
  READ: { body: false, args: "required" },
  TREE: { body: false, args: "none" },
  LISTFILES: { body: false, args: "none" },
  WRITE: { body: true, args: "required" },
  CD: { body: false, args: "required" },
  DELETE: { body: false, args: "required" },
  RUN: { body: false, args: "required" },
  INSTALL: { body: false, args: "required" },
  CREATE: { body: false, args: { tokens: 2 } },
  SHADCN: { body: false, args: "required" },
  REFRESH: { body: false, args: "none" },
};

/** Execution priority: context-gathering verbs before mutating ones. */
export function verbPriority(verb: Verb): number {
  return VERBS.indexOf(verb);
}

export function isVerb(token: string): token is Verb {
  return VERBS.some((verb) => verb === token);
}

export function verbRule(token: string): VerbRule | undefined {
  const upper = token.toUpperCase();
  return isVerb(upper) ? GRAMMAR[upper] : undefined;
}

/**
 * Splits the first `count` whitespace-separated tokens off an argument line.
 * The remainder (possibly empty) is returned untouched apart from trimming.
 */
export function splitArguments(line: string, count: number): { tokens: string[]; rest: string } {
  const tokens: string[] = [];
  let rest = line.trim();
  while (tokens.length < count && rest) {
    const m = rest.match(/^(\S+)\s*/);
    if (!m) break;
    tokens.push(m[1] ?? "");
    rest = rest.slice(m[0].length);
  }
  return { tokens, rest: rest.trim() };
}
