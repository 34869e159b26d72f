import type { Verb } from "../protocol/grammar.js";
import type { DiffLine } from "../safety/diff.js";
import type { ActionResult, Reporter } from "../tools/types.js";
import { actionLine, diffBlock, infoLine, outputBlock, resultLine, warnLine } from "./format.js";

type Sink = (line: string) => void;

/** Renders engine events to the terminal. */
export class ConsoleReporter implements Reporter {
  constructor(private readonly write: Sink = (line) => console.log(line)) {}

  action(verb: Verb, target: string): void {
    this.write(actionLine(verb, target));
  }

  info(text: string): void {
    this.write(infoLine(text));
  }

  warn(text: string): void {
    this.write(warnLine(text));
  }

  diff(label: string, lines: readonly DiffLine[]): void {
    this.write(infoLine(`Changes to ${label}:`));
    this.write(diffBlock(lines));
  }

  output(text: string): void {
    if (text.trim()) this.write(outputBlock(text));
  }

  result(result: ActionResult): void {
    this.write(resultLine(result));
  }
}
