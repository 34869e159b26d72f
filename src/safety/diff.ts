import { structuredPatch } from "diff";

export type DiffLineKind = "header" | "hunk" | "added" | "removed" | "context";

export type DiffLine = { kind: DiffLineKind; text: string };

/** Unified diff of two file versions, classified line by line. Empty when nothing changed. */
export function diffLines(oldContent: string, newContent: string, label: string): DiffLine[] {
  const patch = structuredPatch(`a/${label}`, `b/${label}`, oldContent, newContent, "", "", { context: 3 });
  if (patch.hunks.length === 0) return [];
  const lines: DiffLine[] = [
    { kind: "header", text: `--- a/${label}` },
    { kind: "header", text: `+++ b/${label}` },
  ];
  for (const hunk of patch.hunks) {
    lines.push({
      kind: "hunk",
      text: `@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@`,
    });
    for (const line of hunk.lines) {
      // "\ No newline at end of file" markers carry no content.
      if (line.startsWith("\\")) continue;
      const sign = line.charAt(0);
      const text = line.slice(1);
      if (sign === "+") lines.push({ kind: "added", text });
      else if (sign === "-") lines.push({ kind: "removed", text });
      else lines.push({ kind: "context", text });
    }
  }
  return lines;
}

export function diffStats(lines: readonly DiffLine[]): { added: number; removed: number } {
  let added = 0;
  let removed = 0;
  for (const l of lines) {
    if (l.kind === "added") added++;
    else if (l.kind === "removed") removed++;
  }
  return { added, removed };
}
