import { marked } from "marked";
import Table from "cli-table3";
import chalk from "chalk";
import boxen from "boxen";
import type { DiffLine } from "../safety/diff.js";
import type { ActionResult } from "../tools/types.js";
import { colors, hexColors, icons, theme } from "./theme.js";

const INDENT = "  ";
const codeStyle = (s: string) => chalk.hex(theme.syntax.code)(s);

export function stripAnsi(input: string): string {
  return input.replace(/\x1b\[[0-9;]*m/g, "");
}

function visibleLen(input: string): number {
  return stripAnsi(input).length;
}

function terminalWidth(): number {
  return Math.min(process.stdout.columns ?? 80, 100);
}

export function separator(): string {
  return colors.muted("─".repeat(terminalWidth()));
}

// Markdown tokens as plain records; marked's Token union carries loose generic members.
type MdNode = {
  type: string;
  text: string;
  raw: string;
  depth: number;
  ordered: boolean;
  start: number;
  lang: string;
  href: string;
  items: MdNode[];
  tokens: MdNode[];
  header: MdNode[];
  rows: MdNode[][];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function nodes(value: unknown): MdNode[] {
  return Array.isArray(value) ? value.map(toNode) : [];
}

function toNode(value: unknown): MdNode {
  const o = isRecord(value) ? value : {};
  const str = (k: string) => (typeof o[k] === "string" ? String(o[k]) : "");
  const num = (k: string, fallback: number) => (typeof o[k] === "number" ? Number(o[k]) : fallback);
  const rows = o.rows;
  return {
    type: str("type"),
    text: str("text"),
    raw: str("raw"),
    depth: num("depth", 2),
    ordered: o.ordered === true,
    start: num("start", 1),
    lang: str("lang"),
    href: str("href"),
    items: nodes(o.items),
    tokens: nodes(o.tokens),
    header: nodes(o.header),
    rows: Array.isArray(rows) ? rows.map(nodes) : [],
  };
}

function inline(tokens: MdNode[]): string {
  return tokens
    .map((t) => {
      switch (t.type) {
        case "strong":
          return chalk.bold(inline(t.tokens));
        case "em":
          return chalk.italic(inline(t.tokens));
        case "del":
          return chalk.strikethrough(inline(t.tokens));
        case "codespan":
          return codeStyle(t.text);
        case "br":
          return "\n";
        case "link": {
          const label = inline(t.tokens) || t.text || t.href;
          const styled = chalk.hex(theme.syntax.link).underline(label);
          return !t.href || label === t.href ? styled : `${styled}${colors.mutedDark(` (${t.href})`)}`;
        }
        case "html":
          return t.raw.replace(/<br\s*\/?>/gi, "\n").replace(/<[^>]+>/g, "");
        default:
          return t.tokens.length > 0 ? inline(t.tokens) : t.text || t.raw;
      }
    })
    .join("");
}

function heading(t: MdNode): string[] {
  const text = (inline(t.tokens) || t.text).trim();
  if (!text) return [];
  const style = chalk.hex(theme.syntax.heading).bold;
  if (t.depth <= 2) {
    const rule = colors.muted("─".repeat(Math.min(96, Math.max(24, visibleLen(text) + 8))));
    return [t.depth === 1 ? style.underline(text) : style(text), rule, ""];
  }
  return [t.depth === 3 ? style(text) : colors.accentDim(text), ""];
}

function codeBlock(t: MdNode): string[] {
  const body = t.text.replace(/\n$/, "") || "(empty)";
  const boxed = boxen(codeStyle(body), {
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    borderColor: hexColors.mutedDim,
    borderStyle: "round",
    title: t.lang.trim() ? ` ${t.lang.trim()} ` : " code ",
    titleAlignment: "left",
  });
  return [...boxed.split("\n"), ""];
}

function table(t: MdNode): string[] {
  const head = t.header.map((c) => inline(c.tokens) || c.text);
  const rows = t.rows.map((row) => row.map((c) => (inline(c.tokens) || c.text).replace(/\s+/g, " ").trim()));
  const cols = Math.max(head.length, ...rows.map((r) => r.length), 0);
  if (cols === 0) return [];
  const pad = (r: string[]) => [...r, ...Array<string>(Math.max(0, cols - r.length)).fill("")];
  const budget = Math.max(48, terminalWidth() - 8);
  const colWidth = Math.max(10, Math.floor(budget / cols) - 1);
  const widths = Array.from({ length: cols }, (_, i) =>
    Math.min(colWidth, Math.max(visibleLen(head[i] ?? ""), ...rows.map((r) => visibleLen(r[i] ?? ""))) + 2)
  );
  const tableView = new Table({
    head: pad(head).map((h) => chalk.bold(colors.accentPale(h))),
    colWidths: widths,
    wordWrap: true,
    style: { border: [], head: [] },
  });
  for (const row of rows) tableView.push(pad(row));
  return [...tableView.toString().split("\n"), ""];
}

function list(t: MdNode, indent: number): string[] {
  const out: string[] = [];
  t.items.forEach((item, i) => {
    const marker = t.ordered ? `${t.start + i}.` : "•";
    const [first = "", ...rest] = blocks(item.tokens, indent + 2, true);
    out.push(`${" ".repeat(indent)}${marker} ${first.trimStart()}`.trimEnd());
    const cont = " ".repeat(indent + marker.length + 1);
    for (const line of rest) out.push(`${cont}${line}`.trimEnd());
  });
  return out;
}

function blocks(tokens: MdNode[], indent = 0, compact = false): string[] {
  const out: string[] = [];
  const gap = () => {
    if (!compact) out.push("");
  };
  for (const t of tokens) {
    switch (t.type) {
      case "space":
        gap();
        break;
      case "heading":
        out.push(...heading(t));
        break;
      case "paragraph":
      case "text": {
        const line = t.tokens.length > 0 ? inline(t.tokens) : t.text;
        if (line.trim()) out.push(`${" ".repeat(indent)}${line}`.trimEnd());
        gap();
        break;
      }
      case "blockquote":
        for (const line of blocks(t.tokens, 0, true)) out.push(`${colors.muted(icons.pipe)} ${colors.muted(line)}`);
        gap();
        break;
      case "list":
        out.push(...list(t, indent));
        gap();
        break;
      case "code":
        out.push(...codeBlock(t));
        break;
      case "table":
        out.push(...table(t));
        break;
      case "hr":
        out.push(separator(), "");
        break;
      default: {
        const text = (t.text || t.raw).trim();
        if (text) out.push(`${" ".repeat(indent)}${text}`);
        gap();
      }
    }
  }
  while (out.length > 0 && out[out.length - 1] === "") out.pop();
  return out;
}

export function renderMarkdown(text: string): string {
  const normalized = text.replace(/\r\n/g, "\n").replace(/\t/g, "  ");
  const tokens = nodes(marked.lexer(normalized, { gfm: true, breaks: true }));
  return blocks(tokens).join("\n").replace(/\n{3,}/g, "\n\n").trimEnd();
}

export function header(title: string, subtitle: string): string {
  return boxen(`${chalk.bold(title)}\n${colors.muted(subtitle)}`, {
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    margin: { bottom: 1 },
    borderColor: hexColors.primary,
    borderStyle: "round",
  });
}

export function agentMessage(text: string): string {
  return `${colors.accentPale(icons.agent)} ${renderMarkdown(text.trim())}`;
}

export function actionLine(verb: string, target: string): string {
  return `${INDENT}${colors.accent(icons.action)} ${colors.accent(verb.toLowerCase())}${colors.mutedDark("(")}${colors.gray(target)}${colors.mutedDark(")")}`;
}

export function resultLine(result: ActionResult): string {
  const icon = result.success ? colors.success(icons.success) : colors.error(icons.error);
  const text = result.success ? colors.gray(result.message) : colors.error(result.message);
  return `${INDENT}${INDENT}${icon} ${text}`;
}

export function infoLine(text: string): string {
  return `${INDENT}${INDENT}${colors.muted(icons.info)} ${colors.muted(text)}`;
}

export function warnLine(text: string): string {
  return `${INDENT}${INDENT}${colors.warn(icons.warn)} ${colors.warn(text)}`;
}

export function outputBlock(text: string): string {
  return text
    .split("\n")
    .map((line) => `${INDENT}${INDENT}${colors.output(icons.pipe)} ${colors.dim(line)}`)
    .join("\n");
}

function diffLineStyle(line: DiffLine): string {
  switch (line.kind) {
    case "header":
      return chalk.bold(line.text);
    case "hunk":
      return colors.hunk(line.text);
    case "added":
      return colors.added(`+${line.text}`);
    case "removed":
      return colors.removed(`-${line.text}`);
    case "context":
      return colors.dim(` ${line.text}`);
  }
}

export function diffBlock(lines: readonly DiffLine[]): string {
  return lines.map((l) => `${INDENT}${INDENT}${diffLineStyle(l)}`).join("\n");
}
