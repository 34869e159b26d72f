import { errorMessage, InterruptedError } from "../errors.js";
import type { CommandBlock, Verb } from "../protocol/grammar.js";
import { runShell } from "./bash.js";
import { deletePath, readPath, writePath } from "./file.js";
import { changeDirectoryAction, listFiles, refresh, showTree } from "./navigate.js";
import { addComponent, createProject, installPackages } from "./project.js";
import { fail } from "./result.js";
import type { ActionContext, ActionHandler, ActionOutcome, ActionResult } from "./types.js";

export const HANDLERS: Record<Verb, ActionHandler> = {
  READ: readPath,
  TREE: showTree,
  LISTFILES: listFiles,
  WRITE: writePath,
  CD: changeDirectoryAction,
  DELETE: deletePath,
  RUN: runShell,
  INSTALL: installPackages,
  CREATE: createProject,
  SHADCN: addComponent,
  REFRESH: refresh,
};

function isAbort(err: unknown, signal?: AbortSignal): boolean {
  return err instanceof InterruptedError || signal?.aborted === true;
}

/** Runs one block. Failures become results; an operator interrupt propagates. */
export async function dispatch(block: CommandBlock, ctx: ActionContext): Promise<ActionOutcome> {
  let outcome: ActionOutcome;
  try {
    outcome = await HANDLERS[block.verb](block, ctx);
  } catch (err) {
    if (isAbort(err, ctx.signal)) throw err instanceof InterruptedError ? err : new InterruptedError();
    outcome = { results: [fail(`${block.verb} error: ${errorMessage(err)}`)], state: ctx.state };
  }
  for (const result of outcome.results) ctx.deps.reporter.result(result);
  return outcome;
}

export function formatResult(result: ActionResult): string {
  const head = `${result.success ? "ok" : "error"}: ${result.message}`;
  return result.detail ? `${head}\n${result.detail}` : head;
}

/** The feedback message appended to history after a round of actions. */
export function formatFeedback(results: readonly ActionResult[]): string {
  return ["SYSTEM: Results:", ...results.map(formatResult)].join("\n\n");
}
