import type { ChatMessage } from "../api.js";
import type { CommandBlock, Verb } from "../protocol/grammar.js";
import type { BackupStore } from "../safety/backup.js";
import type { DiffLine } from "../safety/diff.js";
import type { IgnoreRuleSet } from "../workspace/ignore.js";
import type { PackageManager } from "../workspace/packages.js";

export type ActionResult = {
  success: boolean;
  message: string;
  detail?: string;
  /** Set when the operator declined or the safety gate blocked the action. */
  denied?: boolean;
};

export type SessionState = {
  readonly rootDir: string;
  readonly cwd: string;
  readonly messages: readonly ChatMessage[];
  readonly packageManager: PackageManager;
};

export interface Prompter {
  /** Resolves with the operator's answer; rejects with InterruptedError when aborted. */
  ask(question: string, signal?: AbortSignal): Promise<string>;
}

export interface Reporter {
  action(verb: Verb, target: string): void;
  info(text: string): void;
  warn(text: string): void;
  diff(label: string, lines: readonly DiffLine[]): void;
  output(text: string): void;
  result(result: ActionResult): void;
}

export type RunRequest = {
  command: string;
  cwd: string;
  /** null runs until the process exits or the signal aborts it. */
  timeoutMs: number | null;
  stdin?: string;
  signal?: AbortSignal;
};

export type RunOutcome = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  interrupted: boolean;
  spawnError?: string;
};

export type DetachedLaunch = { pid: number; logPath: string };

export interface CommandRunner {
  run(request: RunRequest): Promise<RunOutcome>;
  launchDetached(command: string, cwd: string): Promise<DetachedLaunch>;
}

export type EngineSettings = {
  runTimeoutMs: number;
  maxFileBytes: number;
  maxOutputChars: number;
};

export type ActionDeps = {
  prompter: Prompter;
  reporter: Reporter;
  runner: CommandRunner;
  backups: BackupStore;
  ignore: IgnoreRuleSet;
  settings: EngineSettings;
  platform: NodeJS.Platform;
  now: () => Date;
};

export type ActionContext = {
  state: SessionState;
  deps: ActionDeps;
  signal?: AbortSignal;
};

export type ActionOutcome = {
  results: ActionResult[];
  state: SessionState;
};

export type ActionHandler = (block: CommandBlock, ctx: ActionContext) => Promise<ActionOutcome>;
