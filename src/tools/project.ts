import * as fs from "node:fs";
import { splitArguments } from "../protocol/grammar.js";
import { addCommand, isPackageManager } from "../workspace/packages.js";
import { resolveInRoot } from "../workspace/paths.js";
import { runCommand } from "./bash.js";
import { changeDirectory } from "./navigate.js";
import { fail, unchanged } from "./result.js";
import type { ActionHandler } from "./types.js";

/** Scaffolding commands by framework keyword; `{name}` is the project directory. */
export const TEMPLATES: ReadonlyArray<readonly [string, string]> = [
  ["vite-react", "npm create vite@latest {name} -- --template react"],
  ["vite-react-ts", "npm create vite@latest {name} -- --template react-ts"],
  ["vite-vue", "npm create vite@latest {name} -- --template vue"],
  ["vite-vue-ts", "npm create vite@latest {name} -- --template vue-ts"],
  ["vite-svelte", "npm create vite@latest {name} -- --template svelte"],
  ["vite-svelte-ts", "npm create vite@latest {name} -- --template svelte-ts"],
  ["next", "npx create-next-app@latest {name} --typescript --tailwind --app --yes"],
  ["next-js", "npx create-next-app@latest {name} --javascript --tailwind --app --yes"],
  ["next-pages", "npx create-next-app@latest {name} --typescript --tailwind --src-dir --yes"],
  ["astro", "npm create astro@latest {name} -- --template minimal --yes --install"],
  ["astro-blog", "npm create astro@latest {name} -- --template blog --yes --install"],
  ["remix", "npx create-remix@latest {name} --template remix --yes"],
  ["react", "npm create vite@latest {name} -- --template react-ts"],
  ["vue", "npm create vite@latest {name} -- --template vue-ts"],
  ["svelte", "npm create vite@latest {name} -- --template svelte-ts"],
  ["nuxt", "npx nuxi@latest init {name}"],
  ["expo", "npx create-expo-app@latest {name} --template blank-typescript"],
  ["t3", "npm create t3-app@latest {name} -- --noGit"],
  ["solid", "npx degit solidjs/templates/ts {name}"],
  ["qwik", "npm create qwik@latest {name}"],
];

export type TemplateMatch = {
  command: string;
  /** Template key used, undefined for the generic fallback. */
  template?: string;
};

/** Exact keyword first, then a substring match either way, then a generic `npm create`. */
export function resolveTemplate(framework: string, name: string, options = ""): TemplateMatch {
  const fw = framework.toLowerCase();
  const entry =
    TEMPLATES.find(([key]) => key === fw) ?? TEMPLATES.find(([key]) => key.includes(fw) || fw.includes(key));
  const base = entry
    ? entry[1].replace("{name}", name)
    : `npm create ${framework}@latest ${name} -- --yes`;
  const command = options.trim() ? `${base} ${options.trim()}` : base;
  return entry ? { command, template: entry[0] } : { command };
}

export const installPackages: ActionHandler = async (block, ctx) => {
  const manager = ctx.state.packageManager;
  const { tokens, rest } = splitArguments(block.argumentLine, 1);
  const first = tokens[0] ?? "";
  let packages = block.argumentLine.trim();
  if (isPackageManager(first.toLowerCase())) {
    if (!rest) return unchanged(ctx.state, fail("INSTALL needs at least one package name."));
    if (first.toLowerCase() !== manager) ctx.deps.reporter.info(`Using ${manager} (detected from lock file) instead of ${first}`);
    packages = rest;
  }
  return runCommand(addCommand(manager, packages), ctx, "INSTALL");
};

export const createProject: ActionHandler = async (block, ctx) => {
  const { state, deps } = ctx;
  const { tokens, rest } = splitArguments(block.argumentLine, 2);
  const [framework = "", name = ""] = tokens;
  const projectDir = resolveInRoot(state.rootDir, state.cwd, name);
  if (!projectDir || name === "..") {
    return unchanged(state, fail(`Project name '${name}' must stay inside the project root.`));
  }
  const match = resolveTemplate(framework, name, rest);
  if (match.template === undefined) deps.reporter.warn(`Unknown framework '${framework}'; using generic npm create.`);
  else if (match.template !== framework.toLowerCase()) deps.reporter.info(`Matched '${framework}' to template ${match.template}`);

  const existedBefore = fs.existsSync(projectDir);
  const run = await runCommand(match.command, ctx, "CREATE");
  const succeeded = run.results.every((r) => r.success);
  const appeared =
    fs.existsSync(projectDir) && fs.statSync(projectDir).isDirectory() && (!existedBefore || projectDir === state.cwd);
  if (!succeeded || !appeared) return run;

  deps.reporter.info(`Project created; entering ${name}`);
  const entered = changeDirectory(name, run.state, deps);
  return { results: [...run.results, ...entered.results], state: entered.state };
};

export const addComponent: ActionHandler = (block, ctx) =>
  runCommand(`npx shadcn@latest add ${block.argumentLine.trim()} -y`, ctx, "SHADCN");
