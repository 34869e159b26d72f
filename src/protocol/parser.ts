import { GRAMMAR, isVerb, splitArguments, verbPriority, type CommandBlock } from "./grammar.js";
import { BlockScanner } from "./scanner.js";

export type ParseResult = {
  /** Blocks in execution order (verb priority, then position). */
  blocks: CommandBlock[];
  /** The input with every closed block removed. */
  residual: string;
};

/** Parses the text between an open and a close marker. Malformed blocks yield undefined. */
export function parseBlock(inner: string, index: number): CommandBlock | undefined {
  const m = inner.match(/^\s*([A-Za-z]+)/);
  if (!m) return undefined;
  const verb = (m[1] ?? "").toUpperCase();
  if (!isVerb(verb)) return undefined;
  const after = inner.slice(m[0].length);
  if (after && !/^\s/.test(after)) return undefined;

  const rule = GRAMMAR[verb];
  if (rule.body) {
    const nl = after.indexOf("\n");
    if (nl === -1) return undefined;
    const argumentLine = after.slice(0, nl).trim();
    if (!argumentLine) return undefined;
    const body = after.slice(nl + 1).replace(/\r?\n$/, "");
    return { verb, argumentLine, body, index };
  }

  const argumentLine = after.trim();
  if (rule.args === "required" && !argumentLine) return undefined;
  if (typeof rule.args === "object" && splitArguments(argumentLine, rule.args.tokens).tokens.length < rule.args.tokens) {
    return undefined;
  }
  return { verb, argumentLine, index };
}

export function orderForExecution(blocks: CommandBlock[]): CommandBlock[] {
  return [...blocks].sort((a, b) => verbPriority(a.verb) - verbPriority(b.verb) || a.index - b.index);
}

export function parseCommands(text: string): ParseResult {
  const scanner = new BlockScanner();
  const events = [...scanner.feed(text), ...scanner.end()];
  const residual: string[] = [];
  const blocks: CommandBlock[] = [];
  for (const event of events) {
    if (event.type === "text") {
      residual.push(event.text);
      continue;
    }
    const block = parseBlock(event.inner, event.start);
    if (block) blocks.push(block);
  }
  return { blocks: orderForExecution(blocks), residual: residual.join("") };
}
