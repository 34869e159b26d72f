import type { Interface } from "node:readline";
import { InterruptedError } from "../errors.js";
import type { Prompter } from "../tools/types.js";
import { colors } from "./theme.js";

/** Asks confirmation questions on the REPL's own readline interface. */
export class ReadlinePrompter implements Prompter {
  constructor(private readonly rl: Interface) {}

  ask(question: string, signal?: AbortSignal): Promise<string> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new InterruptedError());
        return;
      }
      // Input closing (Ctrl+D, end of a pipe) never answers the question.
      const onClose = (): void => {
        signal?.removeEventListener("abort", onAbort);
        reject(new InterruptedError("Input closed"));
      };
      const onAbort = (): void => {
        this.rl.off("close", onClose);
        reject(new InterruptedError());
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.rl.once("close", onClose);
      const options = signal ? { signal } : {};
      this.rl.question(`  ${colors.warn(question)}`, options, (answer) => {
        signal?.removeEventListener("abort", onAbort);
        this.rl.off("close", onClose);
        resolve(answer);
      });
    });
  }
}
