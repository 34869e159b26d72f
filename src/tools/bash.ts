import { spawn } from "node:child_process";
import { appendFile, mkdir } from "node:fs/promises";
import { closeSync, openSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import type { Verb } from "../protocol/grammar.js";
import { makeNonInteractive } from "../platform/interactive.js";
import { isServerCommand } from "../platform/server.js";
import { parseDirectoryChange, shellFamily, translateCommand } from "../platform/translate.js";
import { confirmAction, confirmDangerous, isAffirmative, isDangerous } from "../safety/gate.js";
import { changeDirectory } from "./navigate.js";
import { denied, fail, ok, unchanged } from "./result.js";
import type {
  ActionContext,
  ActionHandler,
  ActionOutcome,
  ActionResult,
  CommandRunner,
  DetachedLaunch,
  RunOutcome,
  RunRequest,
} from "./types.js";

const TERM_GRACE_MS = 2_000;
const JOBS_DIR = path.join(tmpdir(), "sigilcode-jobs");
const AUTO_ANSWER = "y\n";

function makeJobId(): string {
  const rand = Math.random().toString(36).slice(2, 8);
  return `job_${Date.now().toString(36)}_${rand}`;
}

function runProcess(request: RunRequest): Promise<RunOutcome> {
  return new Promise((resolve) => {
    const proc = spawn(request.command, { cwd: request.cwd, shell: true, stdio: ["pipe", "pipe", "pipe"] });
    const stdout: string[] = [];
    const stderr: string[] = [];
    let timedOut = false;
    let interrupted = false;
    let spawnError: string | undefined;
    let settled = false;
    let killTimer: NodeJS.Timeout | undefined;

    proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk.toString()));
    proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk.toString()));
    // The child may exit without reading stdin.
    proc.stdin.on("error", (err: NodeJS.ErrnoException) => {
      if (err.code !== "EPIPE") stderr.push(err.message);
    });
    proc.stdin.end(request.stdin ?? "");

    const terminate = (): void => {
      proc.kill("SIGTERM");
      killTimer = setTimeout(() => proc.kill("SIGKILL"), TERM_GRACE_MS);
    };
    const timer =
      request.timeoutMs === null
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            terminate();
          }, request.timeoutMs);
    const onAbort = (): void => {
      interrupted = true;
      terminate();
    };
    request.signal?.addEventListener("abort", onAbort, { once: true });

    const finish = (exitCode: number | null): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      clearTimeout(killTimer);
      request.signal?.removeEventListener("abort", onAbort);
      const outcome: RunOutcome = {
        exitCode,
        stdout: stdout.join(""),
        stderr: stderr.join(""),
        timedOut,
        interrupted,
      };
      resolve(spawnError === undefined ? outcome : { ...outcome, spawnError });
    };
    proc.on("error", (err) => {
      spawnError = err.message;
      finish(null);
    });
    proc.on("close", (code) => finish(code));
    if (request.signal?.aborted) onAbort();
  });
}

async function launchDetached(command: string, cwd: string): Promise<DetachedLaunch> {
  await mkdir(JOBS_DIR, { recursive: true });
  const id = makeJobId();
  const logPath = path.join(JOBS_DIR, `${id}.log`);
  await appendFile(logPath, `# sigilcode detached job ${id}\n# cwd: ${cwd}\n# cmd: ${command}\n\n`);
  const logFd = openSync(logPath, "a");
  const proc = spawn(command, {
    cwd,
    shell: true,
    detached: true,
    stdio: ["ignore", logFd, logFd],
  });
  closeSync(logFd);
  proc.unref();
  return { pid: proc.pid ?? -1, logPath };
}

export const shellRunner: CommandRunner = { run: runProcess, launchDetached };

function clip(text: string, max: number): string {
  const trimmed = text.trim();
  if (trimmed.length <= max) return trimmed;
  return `${trimmed.slice(0, max)}\n... (truncated, ${trimmed.length - max} more chars)`;
}

function describeRun(command: string, outcome: RunOutcome, ctx: ActionContext): ActionResult {
  const max = ctx.deps.settings.maxOutputChars;
  const output = `Out: ${clip(outcome.stdout, max)}\nErr: ${clip(outcome.stderr, max)}`;
  if (outcome.spawnError !== undefined) return fail(`Failed to start '${command}': ${outcome.spawnError}`);
  if (outcome.timedOut) {
    const secs = Math.round(ctx.deps.settings.runTimeoutMs / 1000);
    return fail(`Command timed out after ${secs}s: ${command}`, output);
  }
  if (outcome.interrupted) return fail(`User stopped the command (Ctrl+C): ${command}`, output);
  const detail = `Code: ${outcome.exitCode ?? "killed by signal"}\n${output}`;
  if (outcome.exitCode === 0) return ok(`Command succeeded: ${command}`, detail);
  return fail(`Command failed with exit code ${outcome.exitCode ?? "none"}: ${command}`, detail);
}

/** The full RUN pipeline; INSTALL, CREATE and SHADCN delegate here under their own verb. */
export async function runCommand(raw: string, ctx: ActionContext, verb: Verb = "RUN"): Promise<ActionOutcome> {
  const { state, deps, signal } = ctx;
  const { reporter, prompter } = deps;

  const cdTarget = parseDirectoryChange(raw);
  if (cdTarget !== undefined) {
    reporter.action(verb, raw.trim());
    return changeDirectory(cdTarget, state, deps);
  }

  const translated = translateCommand(raw.trim(), shellFamily(deps.platform));
  const fixed = makeNonInteractive(translated.command);
  const command = fixed.command;
  reporter.action(verb, command);
  for (const warning of [...translated.warnings, ...fixed.warnings]) reporter.warn(warning);

  const dangerous = isDangerous(command) || isDangerous(raw);
  if (dangerous && !(await confirmDangerous(prompter, signal))) {
    return unchanged(state, denied(`Blocked dangerous command: ${command}`));
  }

  let timeoutMs: number | null = deps.settings.runTimeoutMs;
  if (isServerCommand(command)) {
    reporter.warn(`'${command}' looks like a long-running server.`);
    const answer = await prompter.ask("Launch it in the background? (Y/n): ", signal);
    if (answer.trim() === "" || isAffirmative(answer)) {
      const launch = await deps.runner.launchDetached(command, state.cwd);
      reporter.info(`Logs: ${launch.logPath}`);
      return unchanged(state, ok(`Started '${command}' in the background (pid ${launch.pid}).`, `Logs: ${launch.logPath}`));
    }
    if (!(await confirmAction(prompter, "Run it here? The session will block until you interrupt it", signal))) {
      return unchanged(state, denied(`Skipped server command '${command}'; the user will start it manually.`));
    }
    timeoutMs = null;
  } else if (!(await confirmAction(prompter, "Execute?", signal))) {
    return unchanged(state, denied(`User denied command: ${command}`));
  }

  const outcome = await deps.runner.run({ command, cwd: state.cwd, timeoutMs, stdin: AUTO_ANSWER, signal });
  const shown = [outcome.stdout.trim(), outcome.stderr.trim()].filter(Boolean).join("\n");
  if (shown) reporter.output(clip(shown, deps.settings.maxOutputChars));
  return unchanged(state, describeRun(command, outcome, ctx));
}

export const runShell: ActionHandler = (block, ctx) => runCommand(block.argumentLine, ctx);
