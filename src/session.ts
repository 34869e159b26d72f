import type { Backend, ChatMessage } from "./api.js";
import type { SessionSettings } from "./config.js";
import { buildContextSnapshot, estimateTokens, pruneHistory, refreshContext } from "./context.js";
import { errorMessage, InterruptedError } from "./errors.js";
import { buildInstructions } from "./protocol/instructions.js";
import { parseCommands } from "./protocol/parser.js";
import { BlockScanner, type ScanEvent } from "./protocol/scanner.js";
import { dispatch, formatFeedback } from "./tools/index.js";
import { TEMPLATES } from "./tools/project.js";
import type { ActionDeps, ActionResult, SessionState } from "./tools/types.js";
import type { PackageManager } from "./workspace/packages.js";
import { relativeToRoot } from "./workspace/paths.js";

/** Where the model's prose goes; blocks never reach it. */
export interface SessionView {
  streamText(text: string): void;
  streamEnd(): void;
  message(text: string): void;
  waiting(active: boolean): void;
}

export type SessionOptions = {
  backend: Backend;
  deps: ActionDeps;
  settings: SessionSettings;
  view: SessionView;
  rootDir: string;
  packageManager: PackageManager;
  /** Skip the initial project scan. */
  noContext?: boolean;
};

export type TurnOutcome = {
  rounds: number;
  results: ActionResult[];
  stop: "done" | "denied" | "limit" | "interrupted" | "error";
  error?: string;
};

export type SessionStatus = {
  cwd: string;
  packageManager: PackageManager;
  messages: number;
  tokens: number;
};

export class Session {
  private state: SessionState;
  private readonly deps: ActionDeps;

  constructor(private readonly options: SessionOptions) {
    this.deps = options.deps;
    const base: SessionState = {
      rootDir: options.rootDir,
      cwd: options.rootDir,
      messages: [],
      packageManager: options.packageManager,
    };
    this.state = { ...base, messages: this.freshHistory(base) };
  }

  get current(): SessionState {
    return this.state;
  }

  private freshHistory(state: SessionState): ChatMessage[] {
    const instruction: ChatMessage = {
      role: "system",
      content: buildInstructions({
        platform: this.deps.platform,
        packageManager: state.packageManager,
        cwd: relativeToRoot(state.rootDir, state.cwd),
        templates: TEMPLATES.map(([key]) => key),
      }),
    };
    if (this.options.noContext) return [instruction];
    const { content } = buildContextSnapshot(state.rootDir, state.cwd, this.deps);
    return [instruction, { role: "system", content }];
  }

  private append(message: ChatMessage): void {
    this.state = { ...this.state, messages: [...this.state.messages, message] };
  }

  /** Runs one operator instruction, then follow-up rounds while the model keeps issuing blocks. */
  async turn(instruction: string, signal?: AbortSignal): Promise<TurnOutcome> {
    const results: ActionResult[] = [];
    this.append({ role: "user", content: instruction });
    for (let round = 0; ; round++) {
      this.state = {
        ...this.state,
        messages: pruneHistory(this.state.messages, this.options.settings.maxHistoryTurns),
      };

      let reply: string;
      try {
        reply = await this.request(signal);
      } catch (err) {
        if (signal?.aborted) return { rounds: round, results, stop: "interrupted" };
        const error = errorMessage(err);
        this.deps.reporter.warn(`Backend request failed: ${error}`);
        return { rounds: round, results, stop: "error", error };
      }
      this.append({ role: "assistant", content: reply });

      const { blocks } = parseCommands(reply);
      if (blocks.length === 0) return { rounds: round + 1, results, stop: "done" };

      const roundResults: ActionResult[] = [];
      let interrupted = false;
      for (const block of blocks) {
        try {
          const outcome = await dispatch(block, { state: this.state, deps: this.deps, signal });
          this.state = outcome.state;
          roundResults.push(...outcome.results);
        } catch (err) {
          if (!(err instanceof InterruptedError)) throw err;
          interrupted = true;
        }
        if (interrupted || signal?.aborted) {
          interrupted = true;
          break;
        }
      }
      results.push(...roundResults);
      if (roundResults.length > 0) this.append({ role: "user", content: formatFeedback(roundResults) });

      if (interrupted) return { rounds: round + 1, results, stop: "interrupted" };
      if (roundResults.some((r) => r.denied)) return { rounds: round + 1, results, stop: "denied" };
      if (round >= this.options.settings.maxFollowUps) {
        this.deps.reporter.info("Follow-up limit reached; waiting for your next instruction.");
        return { rounds: round + 1, results, stop: "limit" };
      }
    }
  }

  private async request(signal?: AbortSignal): Promise<string> {
    const { backend, view, settings } = this.options;
    const messages = this.state.messages;
    if (settings.debug) {
      this.deps.reporter.info(`Request: ${messages.length} messages, ~${estimateTokens(messages)} tokens`);
    }
    if (!settings.stream) {
      view.waiting(true);
      let text: string;
      try {
        text = await backend.complete(messages, signal);
      } finally {
        view.waiting(false);
      }
      const prose = parseCommands(text).residual.trim();
      if (prose) view.message(prose);
      return text;
    }

    const scanner = new BlockScanner();
    const show = (events: ScanEvent[]): void => {
      for (const event of events) if (event.type === "text") view.streamText(event.text);
    };
    try {
      const text = await backend.stream(messages, (delta) => show(scanner.feed(delta)), signal);
      show(scanner.end());
      return text;
    } finally {
      view.streamEnd();
    }
  }

  refresh(): ActionResult {
    const { result, state } = refreshContext(this.state, this.deps);
    this.state = state;
    return result;
  }

  clear(): void {
    this.state = { ...this.state, messages: this.freshHistory(this.state) };
  }

  status(): SessionStatus {
    return {
      cwd: relativeToRoot(this.state.rootDir, this.state.cwd),
      packageManager: this.state.packageManager,
      messages: this.state.messages.length,
      tokens: estimateTokens(this.state.messages),
    };
  }
}
