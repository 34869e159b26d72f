import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { InterruptedError } from "../errors.js";
import type { CommandBlock, Verb } from "../protocol/grammar.js";
import { FakeRunner, makeContext, makeDeps, makeTempDir, writeFiles, type TestDeps } from "../testing/fakes.js";
import { dispatch, formatFeedback } from "./index.js";
import { resolveTemplate } from "./project.js";
import type { ActionContext } from "./types.js";

const dirs: string[] = [];

function workspace(files: Record<string, string> = {}): string {
  const root = makeTempDir();
  dirs.push(root);
  writeFiles(root, files);
  return root;
}

afterEach(() => {
  for (const d of dirs.splice(0)) fs.rmSync(d, { recursive: true, force: true });
});

function block(verb: Verb, argumentLine: string, body?: string): CommandBlock {
  return body === undefined ? { verb, argumentLine, index: 0 } : { verb, argumentLine, body, index: 0 };
}

function backups(root: string): string[] {
  const dir = path.join(root, ".sigil", "backups");
  return fs.existsSync(dir) ? fs.readdirSync(dir).sort() : [];
}

describe("READ", () => {
  it("returns file text without prompting", async () => {
    const root = workspace({ "package.json": '{"name":"x"}' });
    const deps = makeDeps(root);
    const { results } = await dispatch(block("READ", "package.json"), makeContext(root, deps));
    expect(results).toEqual([{ success: true, message: "Content of package.json:", detail: '{"name":"x"}' }]);
    expect(deps.prompter.questions).toEqual([]);
  });

  it("refuses paths outside the root", async () => {
    const root = workspace();
    const { results } = await dispatch(block("READ", "../etc/passwd"), makeContext(root, makeDeps(root)));
    expect(results).toEqual([
      { success: false, message: "Access denied: '../etc/passwd' is outside the project root." },
    ]);
  });

  it("scrapes a directory", async () => {
    const root = workspace({ "src/a.ts": "a" });
    const { results } = await dispatch(block("READ", "src"), makeContext(root, makeDeps(root)));
    expect(results[0]?.detail?.split("\n")[0]).toBe("# Project Content: src");
  });

  it("reports a missing path", async () => {
    const root = workspace();
    const { results } = await dispatch(block("READ", "nope.txt"), makeContext(root, makeDeps(root)));
    expect(results[0]).toEqual({ success: false, message: "Path 'nope.txt' does not exist." });
  });
});

describe("root containment", () => {
  function linkedWorkspace(): { root: string; outside: string } {
    const root = workspace({ "src/a.ts": "a" });
    const outside = workspace({ "secret.txt": "TOP SECRET" });
    fs.symlinkSync(outside, path.join(root, "link"), "dir");
    return { root, outside };
  }

  it("refuses to READ through a symlink that leaves the root", async () => {
    const { root } = linkedWorkspace();
    const { results } = await dispatch(block("READ", "link/secret.txt"), makeContext(root, makeDeps(root)));
    expect(results).toEqual([
      { success: false, message: "Access denied: 'link/secret.txt' is outside the project root." },
    ]);
  });

  it("refuses to WRITE through a symlink that leaves the root", async () => {
    const { root, outside } = linkedWorkspace();
    const deps = makeDeps(root, { answers: ["y"] });
    const { results } = await dispatch(block("WRITE", "link/pwn.txt", "x"), makeContext(root, deps));
    expect(results).toEqual([
      { success: false, message: "Access denied: 'link/pwn.txt' is outside the project root." },
    ]);
    expect(deps.prompter.questions).toEqual([]);
    expect(fs.existsSync(path.join(outside, "pwn.txt"))).toBe(false);
  });

  it("refuses to WRITE to a parent directory", async () => {
    const root = workspace();
    const deps = makeDeps(root, { answers: ["y"] });
    const { results } = await dispatch(block("WRITE", "../escape.txt", "x"), makeContext(root, deps));
    expect(results).toEqual([
      { success: false, message: "Access denied: '../escape.txt' is outside the project root." },
    ]);
    expect(fs.existsSync(path.join(path.dirname(root), "escape.txt"))).toBe(false);
  });

  it("refuses to WRITE through a dangling symlink", async () => {
    const { root, outside } = linkedWorkspace();
    fs.symlinkSync(path.join(outside, "gone.txt"), path.join(root, "ghost.txt"));
    const deps = makeDeps(root, { answers: ["y"] });
    const { results } = await dispatch(block("WRITE", "ghost.txt", "x"), makeContext(root, deps));
    expect(results[0]?.message).toBe("Access denied: 'ghost.txt' is outside the project root.");
    expect(fs.existsSync(path.join(outside, "gone.txt"))).toBe(false);
  });

  it("refuses to CD or DELETE through a symlink that leaves the root", async () => {
    const { root, outside } = linkedWorkspace();
    const deps = makeDeps(root);
    const cd = await dispatch(block("CD", "link"), makeContext(root, deps));
    expect(cd.results).toEqual([{ success: false, message: "Directory 'link' is outside the project root." }]);
    expect(cd.state.cwd).toBe(root);
    const del = await dispatch(block("DELETE", "link/secret.txt"), makeContext(root, deps));
    expect(del.results[0]?.success).toBe(false);
    expect(fs.readFileSync(path.join(outside, "secret.txt"), "utf-8")).toBe("TOP SECRET");
    expect(deps.prompter.questions).toEqual([]);
  });

  it("does not read linked files when scraping a directory", async () => {
    const { root, outside } = linkedWorkspace();
    fs.symlinkSync(path.join(outside, "secret.txt"), path.join(root, "src", "leak.txt"));
    const { results } = await dispatch(block("READ", "src"), makeContext(root, makeDeps(root)));
    expect(results[0]?.success).toBe(true);
    expect(results[0]?.detail).not.toContain("TOP SECRET");
  });
});

describe("WRITE", () => {
  it("creates a new file and its parent directories", async () => {
    const root = workspace();
    const deps = makeDeps(root, { answers: ["y"] });
    const { results } = await dispatch(block("WRITE", "notes/a.txt", "hello"), makeContext(root, deps));
    expect(results).toEqual([{ success: true, message: "File notes/a.txt created.", detail: "1 line(s)" }]);
    expect(fs.readFileSync(path.join(root, "notes/a.txt"), "utf-8")).toBe("hello");
    expect(deps.prompter.questions).toEqual(["Create file? (y/n): "]);
    expect(backups(root)).toEqual([]);
  });

  it("shows a diff and backs up before overwriting", async () => {
    const root = workspace({ "a.txt": "foo" });
    const deps = makeDeps(root, { answers: ["y"] });
    const { results } = await dispatch(block("WRITE", "a.txt", "bar"), makeContext(root, deps));

    const [diff] = deps.reporter.diffs();
    expect(diff?.label).toBe("a.txt");
    expect(diff?.lines.filter((l) => l.kind === "removed" || l.kind === "added")).toEqual([
      { kind: "removed", text: "foo" },
      { kind: "added", text: "bar" },
    ]);
    expect(results).toEqual([{ success: true, message: "File a.txt updated.", detail: "+1 -1" }]);
    expect(fs.readFileSync(path.join(root, "a.txt"), "utf-8")).toBe("bar");
    expect(backups(root)).toEqual(["a.txt_20240102_030405_006.bak"]);
    expect(fs.readFileSync(path.join(root, ".sigil/backups/a.txt_20240102_030405_006.bak"), "utf-8")).toBe("foo");
  });

  it("leaves the file alone when denied", async () => {
    const root = workspace({ "a.txt": "foo" });
    const deps = makeDeps(root, { answers: ["n"] });
    const { results } = await dispatch(block("WRITE", "a.txt", "bar"), makeContext(root, deps));
    expect(results).toEqual([{ success: false, message: "User denied write to a.txt.", denied: true }]);
    expect(fs.readFileSync(path.join(root, "a.txt"), "utf-8")).toBe("foo");
    expect(backups(root)).toEqual([]);
  });

  it("rejects a directory target", async () => {
    const root = workspace({ "src/a.ts": "" });
    const { results } = await dispatch(block("WRITE", "src", "x"), makeContext(root, makeDeps(root)));
    expect(results[0]?.message).toBe("'src' is a directory; WRITE needs a file path.");
  });

  it("turns filesystem errors into a failed result", async () => {
    const root = workspace({ "a.txt": "" });
    const deps = makeDeps(root, { answers: ["y"] });
    const { results } = await dispatch(block("WRITE", "a.txt/b.txt", "x"), makeContext(root, deps));
    expect(results[0]?.success).toBe(false);
    expect(results[0]?.message.startsWith("WRITE error: ")).toBe(true);
  });
});

describe("DELETE", () => {
  it("backs up a file before removing it", async () => {
    const root = workspace({ "old.txt": "bye" });
    const deps = makeDeps(root, { answers: ["yes"] });
    const { results } = await dispatch(block("DELETE", "old.txt"), makeContext(root, deps));
    expect(results).toEqual([{ success: true, message: "File old.txt deleted." }]);
    expect(fs.existsSync(path.join(root, "old.txt"))).toBe(false);
    expect(backups(root)).toEqual(["old.txt_20240102_030405_006.bak"]);
  });

  it("reports the file count and archives a directory", async () => {
    const root = workspace({ "app/a.ts": "a", "app/lib/b.ts": "b" });
    const deps = makeDeps(root, { answers: ["y"] });
    const { results } = await dispatch(block("DELETE", "app"), makeContext(root, deps));
    expect(deps.reporter.texts("warn")).toEqual(["Directory app contains 2 file(s)."]);
    expect(results).toEqual([
      { success: true, message: "Directory app deleted.", detail: "2 file(s) removed, 2 backed up." },
    ]);
    expect(fs.existsSync(path.join(root, "app"))).toBe(false);
    expect(backups(root)).toEqual(["app_a.ts_20240102_030405_006.bak", "app_lib_b.ts_20240102_030405_006.bak"]);
  });

  it("refuses the root, the backups and the current directory", async () => {
    const root = workspace({ "src/a.ts": "" });
    const deps = makeDeps(root);
    const first = await dispatch(block("DELETE", "."), makeContext(root, deps));
    expect(first.results[0]?.message).toBe("Refusing to delete the project root.");
    const second = await dispatch(block("DELETE", ".sigil"), makeContext(root, deps));
    expect(second.results[0]?.message).toBe("Refusing to delete the backup directory.");
    const third = await dispatch(block("DELETE", "../src"), makeContext(root, deps, path.join(root, "src")));
    expect(third.results[0]?.message).toBe("Refusing to delete '../src': it contains the current directory.");
    expect(deps.prompter.questions).toEqual([]);
  });
});

describe("RUN", () => {
  it("blocks a dangerous command unless the exact phrase is typed", async () => {
    const root = workspace();
    const deps = makeDeps(root, { answers: ["yes"] });
    const { results } = await dispatch(block("RUN", "rm -rf /"), makeContext(root, deps));
    expect(results).toEqual([{ success: false, message: "Blocked dangerous command: rm -rf /", denied: true }]);
    expect(deps.runner.requests).toEqual([]);
  });

  it("gates every line of a multi-line command", async () => {
    const root = workspace();
    const deps = makeDeps(root, { answers: ["y"] });
    const { results } = await dispatch(block("RUN", "echo hi\nrm -rf /"), makeContext(root, deps));
    expect(results).toEqual([
      { success: false, message: "Blocked dangerous command: echo hi\nrm -rf /", denied: true },
    ]);
    expect(deps.prompter.questions).toEqual(["DANGEROUS COMMAND! Type 'confirm' to proceed: "]);
    expect(deps.runner.requests).toEqual([]);
  });

  it("keeps the recursive intent of a translated Windows delete", async () => {
    const root = workspace();
    const deps = makeDeps(root, { answers: ["y"] });
    const { results } = await dispatch(block("RUN", "del /s *"), makeContext(root, deps));
    expect(results).toEqual([{ success: false, message: "Blocked dangerous command: rm -rf *", denied: true }]);
    expect(deps.runner.requests).toEqual([]);
  });

  it("runs after confirmation and reports the exit code", async () => {
    const root = workspace();
    const runner = new FakeRunner(() => ({ stdout: "ok\n" }));
    const deps = makeDeps(root, { answers: ["y"], runner });
    const { results } = await dispatch(block("RUN", "npm test"), makeContext(root, deps));
    expect(results).toEqual([
      { success: true, message: "Command succeeded: npm test", detail: "Code: 0\nOut: ok\nErr: " },
    ]);
    expect(runner.requests).toEqual([
      { command: "npm test", cwd: root, timeoutMs: 300_000, stdin: "y\n", signal: undefined },
    ]);
    expect(deps.reporter.texts("output")).toEqual(["ok"]);
  });

  it("distinguishes failures, timeouts and interrupts", async () => {
    const root = workspace();
    const outcomes = [{ exitCode: 1, stderr: "boom" }, { exitCode: null, timedOut: true }, { exitCode: null, interrupted: true }];
    const runner = new FakeRunner(() => outcomes.shift() ?? {});
    const deps = makeDeps(root, { answers: ["y", "y", "y"], runner });
    const messages: string[] = [];
    for (let i = 0; i < 3; i++) {
      const { results } = await dispatch(block("RUN", "npm test"), makeContext(root, deps));
      messages.push(results[0]?.message ?? "");
    }
    expect(messages).toEqual([
      "Command failed with exit code 1: npm test",
      "Command timed out after 300s: npm test",
      "User stopped the command (Ctrl+C): npm test",
    ]);
  });

  it("does nothing when the operator declines", async () => {
    const root = workspace();
    const deps = makeDeps(root, { answers: ["n"] });
    const { results } = await dispatch(block("RUN", "npm test"), makeContext(root, deps));
    expect(results).toEqual([{ success: false, message: "User denied command: npm test", denied: true }]);
    expect(deps.runner.requests).toEqual([]);
  });

  it("translates foreign shell idioms before running", async () => {
    const root = workspace();
    const deps = makeDeps(root, { answers: ["y"], platform: "win32" });
    await dispatch(block("RUN", "ls -la"), makeContext(root, deps));
    expect(deps.runner.requests[0]?.command).toBe("dir /a");
    expect(deps.reporter.texts("warn")).toEqual(["Auto-converted: ls -la → dir /a"]);
  });

  it("handles cd inside the session and refreshes context", async () => {
    const root = workspace({ "src/a.ts": "a" });
    const deps = makeDeps(root);
    const { results, state } = await dispatch(block("RUN", "cd src"), makeContext(root, deps));
    expect(state.cwd).toBe(path.join(root, "src"));
    expect(results[0]?.message).toBe("Changed directory to src.");
    expect(results[0]?.detail).toBe("Current structure:\n└── a.ts");
    expect(state.messages[1]?.content.split("\n").slice(0, 2)).toEqual([
      "PROJECT CONTEXT SNAPSHOT (updated 03:04:05)",
      "Directory: src",
    ]);
    expect(deps.runner.requests).toEqual([]);
  });

  it("keeps cwd when cd would leave the root", async () => {
    const root = workspace();
    const ctx = makeContext(root, makeDeps(root));
    const { results, state } = await dispatch(block("RUN", "cd ../.."), ctx);
    expect(results[0]).toEqual({ success: false, message: "Directory '../..' is outside the project root." });
    expect(state).toBe(ctx.state);
  });

  it("offers to launch servers in the background", async () => {
    const root = workspace();
    const deps = makeDeps(root, { answers: [""] });
    const { results } = await dispatch(block("RUN", "npm run dev"), makeContext(root, deps));
    expect(results[0]?.message).toBe("Started 'npm run dev' in the background (pid 4242).");
    expect(deps.runner.detached).toEqual([{ command: "npm run dev", cwd: root }]);
    expect(deps.runner.requests).toEqual([]);
  });

  it("runs a server in the foreground without a timeout when asked twice", async () => {
    const root = workspace();
    const deps = makeDeps(root, { answers: ["n", "y"] });
    await dispatch(block("RUN", "npm run dev"), makeContext(root, deps));
    expect(deps.runner.requests[0]?.timeoutMs).toBeNull();
    expect(deps.prompter.questions).toEqual([
      "Launch it in the background? (Y/n): ",
      "Run it here? The session will block until you interrupt it (y/n): ",
    ]);
  });
});

describe("INSTALL, CREATE and SHADCN", () => {
  it("uses the detected package manager", async () => {
    const root = workspace();
    const deps = makeDeps(root, { answers: ["y", "y"] });
    await dispatch(block("INSTALL", "npm lodash"), makeContext(root, deps));
    const ctx: ActionContext = { ...makeContext(root, deps), state: { ...makeContext(root, deps).state, packageManager: "pnpm" } };
    await dispatch(block("INSTALL", "zod"), ctx);
    expect(deps.runner.requests.map((r) => r.command)).toEqual(["npm install lodash", "pnpm add zod"]);
  });

  it("scaffolds a project and enters it", async () => {
    const root = workspace();
    const runner = new FakeRunner((req) => {
      fs.mkdirSync(path.join(req.cwd, "app"));
      return {};
    });
    const deps: TestDeps = makeDeps(root, { answers: ["y"], runner });
    const { results, state } = await dispatch(block("CREATE", "vite-react app"), makeContext(root, deps));
    expect(runner.requests[0]?.command).toBe("npm create --yes vite@latest app -- --template react");
    expect(results.map((r) => r.message)).toEqual([
      "Command succeeded: npm create --yes vite@latest app -- --template react",
      "Changed directory to app.",
    ]);
    expect(state.cwd).toBe(path.join(root, "app"));
  });

  it("stays put when the scaffold produced no directory", async () => {
    const root = workspace();
    const deps = makeDeps(root, { answers: ["y"] });
    const { results, state } = await dispatch(block("CREATE", "foo bar"), makeContext(root, deps));
    expect(deps.runner.requests[0]?.command).toBe("npm create foo@latest bar -- --yes");
    expect(results).toHaveLength(1);
    expect(state.cwd).toBe(root);
  });

  it("adds shadcn components", async () => {
    const root = workspace();
    const deps = makeDeps(root, { answers: ["y"] });
    await dispatch(block("SHADCN", "button card"), makeContext(root, deps));
    expect(deps.runner.requests[0]?.command).toBe("npx shadcn@latest add button card -y");
  });
});

describe("resolveTemplate", () => {
  it("matches exactly, then by substring, then falls back", () => {
    expect(resolveTemplate("Next", "web")).toEqual({
      command: "npx create-next-app@latest web --typescript --tailwind --app --yes",
      template: "next",
    });
    expect(resolveTemplate("nextjs", "web").template).toBe("next");
    expect(resolveTemplate("vite", "web").template).toBe("vite-react");
    expect(resolveTemplate("svelte-kit", "web").template).toBe("svelte");
    expect(resolveTemplate("gatsby", "web")).toEqual({ command: "npm create gatsby@latest web -- --yes" });
  });

  it("appends free-form options", () => {
    expect(resolveTemplate("astro", "site", "--typescript strict").command).toBe(
      "npm create astro@latest site -- --template minimal --yes --install --typescript strict"
    );
  });
});

describe("inspection verbs", () => {
  it("lists the current directory", async () => {
    const root = workspace({ "src/a.ts": "", "README.md": "" });
    const tree = await dispatch(block("TREE", ""), makeContext(root, makeDeps(root)));
    expect(tree.results[0]).toEqual({ success: true, message: "Directory tree:", detail: "├── src/\n│   └── a.ts\n└── README.md" });
    const list = await dispatch(block("LISTFILES", ""), makeContext(root, makeDeps(root)));
    expect(list.results[0]?.detail).toBe("src/\nREADME.md");
  });

  it("replaces the context entry on refresh", async () => {
    const root = workspace({ "a.txt": "1" });
    const deps = makeDeps(root);
    const first = await dispatch(block("REFRESH", ""), makeContext(root, deps));
    const second = await dispatch(block("REFRESH", ""), { state: first.state, deps });
    expect(first.state.messages).toHaveLength(2);
    expect(second.state.messages).toEqual(first.state.messages);
  });
});

describe("dispatch", () => {
  it("lets an operator interrupt propagate", async () => {
    const root = workspace();
    const deps = makeDeps(root);
    deps.prompter.ask = async () => {
      throw new InterruptedError();
    };
    await expect(dispatch(block("RUN", "npm test"), makeContext(root, deps))).rejects.toBeInstanceOf(InterruptedError);
  });

  it("reports every result", async () => {
    const root = workspace();
    const deps = makeDeps(root);
    await dispatch(block("READ", "missing"), makeContext(root, deps));
    expect(deps.reporter.events.at(-1)).toEqual({
      kind: "result",
      result: { success: false, message: "Path 'missing' does not exist." },
    });
  });

  it("formats the feedback message", () => {
    expect(
      formatFeedback([
        { success: true, message: "Content of a.txt:", detail: "hi" },
        { success: false, message: "User denied command: ls", denied: true },
      ])
    ).toBe("SYSTEM: Results:\n\nok: Content of a.txt:\nhi\n\nerror: User denied command: ls");
  });
});
