import * as fs from "node:fs";
import * as path from "node:path";
import { getApiKey } from "./config.js";
import { ConfigError } from "./errors.js";

export type CliArgs = {
  dir?: string;
  noContext: boolean;
  noStream: boolean;
  version: boolean;
  help: boolean;
};

export const USAGE = `Usage: sigilcode [dir] [options]

Options:
  --no-context   start without scanning the project into context
  --no-stream    wait for whole responses instead of streaming
  -v, --version  print the version
  -h, --help     show this help`;

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { noContext: false, noStream: false, version: false, help: false };
  for (const arg of argv) {
    if (arg === "--no-context") args.noContext = true;
    else if (arg === "--no-stream") args.noStream = true;
    else if (arg === "-v" || arg === "--version") args.version = true;
    else if (arg === "-h" || arg === "--help") args.help = true;
    else if (arg.startsWith("-")) throw new ConfigError(`Unknown option: ${arg}\n\n${USAGE}`, 2);
    else if (args.dir === undefined) args.dir = arg;
    else throw new ConfigError(`Unexpected argument: ${arg}\n\n${USAGE}`, 2);
  }
  return args;
}

/** Absolute project root; must be an existing, readable and writable directory. */
export function resolveRoot(dir: string | undefined, cwd: string = process.cwd()): string {
  const root = path.resolve(cwd, dir ?? ".");
  try {
    if (!fs.statSync(root).isDirectory()) throw new ConfigError(`Not a directory: ${root}`, 2);
    fs.accessSync(root, fs.constants.R_OK | fs.constants.W_OK);
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(`Cannot access project directory: ${root}`, 2);
  }
  return fs.realpathSync(root);
}

export function requireApiKey(): string {
  const apiKey = getApiKey();
  if (!apiKey) {
    throw new ConfigError(
      "OPENROUTER_API_KEY is not set. Add it to your environment or a .env file (get a key at https://openrouter.ai/keys).",
      1
    );
  }
  return apiKey;
}
