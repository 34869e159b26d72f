import * as readline from "node:readline";
import gradient from "gradient-string";
import ora, { type Ora } from "ora";
import { createOpenRouterBackend, type Backend } from "./api.js";
import { helpText, resolveCommand } from "./commands.js";
import type { Settings } from "./config.js";
import { errorMessage } from "./errors.js";
import { BackupStore } from "./safety/backup.js";
import { Session, type SessionView } from "./session.js";
import { shellRunner } from "./tools/bash.js";
import type { ActionDeps } from "./tools/types.js";
import { agentMessage, colors, ConsoleReporter, header, hexColors, icons, ReadlinePrompter } from "./ui/index.js";
import { loadIgnoreRules } from "./workspace/ignore.js";
import { detectPackageManager } from "./workspace/packages.js";

const brandGradient = gradient([hexColors.primaryBright, hexColors.primary, hexColors.mutedDim]);

export type ReplOptions = {
  apiKey: string;
  model: string;
  rootDir: string;
  settings: Settings;
  noContext: boolean;
  version: string;
  backend?: Backend;
};

function createTerminalView(): SessionView {
  let spinner: Ora | undefined;
  let streaming = false;
  return {
    streamText(text) {
      if (!streaming) {
        process.stdout.write(`${colors.accentPale(icons.agent)} `);
        streaming = true;
      }
      process.stdout.write(text);
    },
    streamEnd() {
      if (streaming) process.stdout.write("\n");
      streaming = false;
    },
    message(text) {
      console.log(agentMessage(text));
    },
    waiting(active) {
      if (active) spinner = ora({ text: colors.muted("Thinking..."), color: "yellow" }).start();
      else spinner?.stop();
    },
  };
}

function nextLine(rl: readline.Interface, prompt: string): Promise<string | null> {
  return new Promise((resolve) => {
    const onClose = (): void => resolve(null);
    rl.once("close", onClose);
    rl.question(prompt, (answer) => {
      rl.off("close", onClose);
      resolve(answer);
    });
  });
}

/** Interactive loop; resolves with the process exit code. */
export async function runRepl(options: ReplOptions): Promise<number> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const reporter = new ConsoleReporter();
  const deps: ActionDeps = {
    prompter: new ReadlinePrompter(rl),
    reporter,
    runner: shellRunner,
    backups: new BackupStore(options.rootDir),
    ignore: loadIgnoreRules(options.rootDir),
    settings: options.settings.engine,
    platform: process.platform,
    now: () => new Date(),
  };
  const packageManager = detectPackageManager(options.rootDir);
  const session = new Session({
    backend: options.backend ?? createOpenRouterBackend(options.apiKey, options.model),
    deps,
    settings: options.settings.session,
    view: createTerminalView(),
    rootDir: options.rootDir,
    packageManager,
    noContext: options.noContext,
  });

  console.log(brandGradient(`\n  sigilcode v${options.version}`));
  console.log(
    header(options.rootDir, `model ${options.model} · ${packageManager} · /help for commands, Ctrl+C to stop a turn`)
  );

  let turn: AbortController | undefined;
  let exitCode = 0;
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });
  rl.on("SIGINT", () => {
    if (turn) {
      turn.abort();
      return;
    }
    exitCode = 130;
    rl.close();
  });

  for (;;) {
    if (closed) return exitCode;
    const line = await nextLine(rl, `${colors.accent(icons.prompt)} `);
    if (line === null) return exitCode;
    const input = line.trim();
    if (!input) continue;

    const command = input.startsWith("/") || input === "exit" ? resolveCommand(input) : null;
    if (command === "/q") {
      rl.close();
      return 0;
    }
    if (command === "/help") {
      console.log(colors.muted(helpText()));
      continue;
    }
    if (command === "/clear") {
      session.clear();
      reporter.info("Conversation cleared.");
      continue;
    }
    if (command === "/refresh") {
      reporter.result(session.refresh());
      continue;
    }
    if (command === "/status") {
      const s = session.status();
      reporter.info(`cwd ${s.cwd} · ${s.packageManager} · ${s.messages} messages · ~${s.tokens} tokens`);
      continue;
    }
    if (input.startsWith("/")) {
      reporter.warn(`Unknown command ${input}. Type /help.`);
      continue;
    }

    turn = new AbortController();
    try {
      const outcome = await session.turn(input, turn.signal);
      if (outcome.stop === "interrupted") reporter.warn("Interrupted.");
    } catch (err) {
      reporter.warn(`Turn failed: ${errorMessage(err)}`);
    } finally {
      turn = undefined;
    }
  }
}
