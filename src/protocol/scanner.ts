import { CLOSE_MARKER, OPEN_MARKER, verbRule } from "./grammar.js";

export type ScanEvent =
  | { type: "text"; text: string }
  | { type: "block"; inner: string; start: number };

type ScanState = "text" | "open" | "closed";

type Close = { innerEnd: number; end: number };

function partialMarkerLength(s: string): number {
  for (let k = Math.min(OPEN_MARKER.length - 1, s.length); k > 0; k--) {
    if (OPEN_MARKER.startsWith(s.slice(-k))) return k;
  }
  return 0;
}

// A body-bearing block closes on a line holding nothing but the close marker.
// The match keeps the newline before the marker inside the block.
const OWN_LINE_CLOSE = /\n[ \t]*<<<[ \t]*(?=\r?\n|$)/g;

/**
 * Where the block opened at the start of `inner` ends. `"prose"` when the
 * open marker is not followed by a known verb; null while undecided.
 */
function findClose(inner: string, final: boolean): Close | "prose" | null {
  const verb = inner.match(/^\s*([A-Za-z]+)/);
  const undecided = verb ? verb[0].length === inner.length : !/\S/.test(inner);
  if (undecided && !final) return null;

  const rule = verb ? verbRule(verb[1] ?? "") : undefined;
  if (!rule) return "prose";
  if (!rule.body) {
    const i = inner.indexOf(CLOSE_MARKER);
    return i === -1 ? null : { innerEnd: i, end: i + CLOSE_MARKER.length };
  }

  const from = verb?.[0].length ?? 0;
  const headerEnd = inner.indexOf("\n", from);
  const headerClose = inner.indexOf(CLOSE_MARKER, from);
  if (headerClose !== -1 && (headerEnd === -1 || headerClose < headerEnd)) {
    return { innerEnd: headerClose, end: headerClose + CLOSE_MARKER.length };
  }
  if (headerEnd === -1) return null;

  OWN_LINE_CLOSE.lastIndex = headerEnd;
  const m = OWN_LINE_CLOSE.exec(inner);
  if (!m) return null;
  const end = m.index + m[0].length;
  // "<<<" at the very end of a partial stream may still grow into "<<<foo".
  if (end === inner.length && !final) return null;
  return { innerEnd: m.index + 1, end };
}

/**
 * Incremental scanner over streamed model output. Prose is released as soon as
 * it cannot be the start of an open marker; block text is released once the
 * block's close marker has been seen.
 */
export class BlockScanner {
  private state: ScanState = "text";
  private buffer = "";
  private offset = 0;
  private blockStart = 0;

  get inBlock(): boolean {
    return this.state === "open";
  }

  feed(chunk: string): ScanEvent[] {
    this.buffer += chunk;
    return this.drain(false);
  }

  end(): ScanEvent[] {
    const events = this.drain(true);
    if (this.state === "open") {
      // Unclosed block: hand the raw text back so the operator still sees it.
      events.push({ type: "text", text: OPEN_MARKER + this.buffer });
    } else if (this.buffer) {
      events.push({ type: "text", text: this.buffer });
    }
    this.state = "text";
    this.buffer = "";
    this.offset = 0;
    return events;
  }

  private consume(n: number): void {
    this.buffer = this.buffer.slice(n);
    this.offset += n;
  }

  private drain(final: boolean): ScanEvent[] {
    const events: ScanEvent[] = [];
    for (;;) {
      if (this.state === "closed") {
        if (this.buffer.startsWith("\r\n")) this.consume(2);
        else if (this.buffer.startsWith("\n")) this.consume(1);
        else if (!final && (this.buffer === "" || this.buffer === "\r")) break;
        this.state = "text";
        continue;
      }

      if (this.state === "text") {
        const i = this.buffer.indexOf(OPEN_MARKER);
        if (i === -1) {
          const keep = final ? 0 : partialMarkerLength(this.buffer);
          const text = this.buffer.slice(0, this.buffer.length - keep);
          if (text) events.push({ type: "text", text });
          this.consume(text.length);
          break;
        }
        if (i > 0) events.push({ type: "text", text: this.buffer.slice(0, i) });
        this.blockStart = this.offset + i;
        this.consume(i + OPEN_MARKER.length);
        this.state = "open";
        continue;
      }

      const close = findClose(this.buffer, final);
      if (!close) break;
      if (close === "prose") {
        events.push({ type: "text", text: OPEN_MARKER });
        this.state = "text";
        continue;
      }
      events.push({ type: "block", inner: this.buffer.slice(0, close.innerEnd), start: this.blockStart });
      this.consume(close.end);
      this.state = "closed";
    }
    return events;
  }
}
