#!/usr/bin/env node
import "dotenv/config";
import { parseCliArgs, requireApiKey, resolveRoot, USAGE } from "./cli.js";
import { getModel, loadSettings } from "./config.js";
import { ConfigError, errorMessage } from "./errors.js";
import { runRepl } from "./repl.js";
import { colors } from "./ui/index.js";
import { getVersion } from "./version.js";

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.version) {
    console.log(getVersion());
    return 0;
  }
  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  const apiKey = requireApiKey();
  const rootDir = resolveRoot(args.dir);
  const settings = loadSettings();
  if (args.noStream) settings.session.stream = false;
  return runRepl({
    apiKey,
    model: getModel(),
    rootDir,
    settings,
    noContext: args.noContext,
    version: getVersion(),
  });
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(colors.error(`  ${errorMessage(err)}`));
    process.exit(err instanceof ConfigError ? err.exitCode : 1);
  }
);
