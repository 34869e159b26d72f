import { describe, expect, it } from "vitest";
import { makeNonInteractive } from "./interactive.js";
import { isServerCommand } from "./server.js";
import { parseDirectoryChange, shellFamily, translateCommand } from "./translate.js";

describe("translateCommand", () => {
  it("prefers the longest matching idiom", () => {
    expect(translateCommand("ls -la src", "windows")).toEqual({
      command: "dir /a src",
      warnings: ["Auto-converted: ls -la src → dir /a src"],
    });
  });

  it("matches whole words only", () => {
    expect(translateCommand("lsof -i", "windows")).toEqual({ command: "lsof -i", warnings: [] });
    expect(translateCommand("typescript --version", "unix")).toEqual({ command: "typescript --version", warnings: [] });
  });

  it("maps Windows idioms to Unix case-insensitively", () => {
    expect(translateCommand("dir /b", "unix").command).toBe("ls");
    expect(translateCommand("DIR", "unix").command).toBe("ls -l");
    expect(translateCommand("rmdir /s /q build", "unix").command).toBe("rm -rf build");
    expect(translateCommand("del /s *.log", "unix").command).toBe("rm -rf *.log");
    expect(translateCommand("del /s /q tmp", "unix").command).toBe("rm -rf tmp");
    expect(translateCommand("del a.txt", "unix").command).toBe("rm a.txt");
  });

  it("leaves host-native commands alone", () => {
    expect(translateCommand("ls -la", "unix")).toEqual({ command: "ls -la", warnings: [] });
  });

  it("derives the shell family from the platform", () => {
    expect(shellFamily("win32")).toBe("windows");
    expect(shellFamily("darwin")).toBe("unix");
  });
});

describe("parseDirectoryChange", () => {
  it("recognizes a bare cd", () => {
    expect(parseDirectoryChange("cd src")).toBe("src");
    expect(parseDirectoryChange('cd "my dir"')).toBe("my dir");
    expect(parseDirectoryChange("cd /d D:\\work")).toBe("D:\\work");
  });

  it("leaves chained commands and look-alikes to the shell", () => {
    expect(parseDirectoryChange("cd src && npm i")).toBeUndefined();
    expect(parseDirectoryChange("cdk deploy")).toBeUndefined();
    expect(parseDirectoryChange("cd")).toBeUndefined();
  });
});

describe("makeNonInteractive", () => {
  it("adds --yes and a default template to Vite", () => {
    expect(makeNonInteractive("npm create vite@latest app")).toEqual({
      command: "npm create --yes vite@latest app -- --template react-ts",
      warnings: [
        "Vite detected. Adding --yes to skip the install prompt.",
        "Vite detected without --template. Adding default react-ts.",
      ],
    });
  });

  it("adds --yes to create-next-app", () => {
    expect(makeNonInteractive("npx create-next-app@latest web")).toEqual({
      command: "npx create-next-app@latest web --yes",
      warnings: ["Next.js detected. Adding --yes flag."],
    });
  });

  it("adds -y to a bare init", () => {
    expect(makeNonInteractive("npm init").command).toBe("npm init -y");
  });

  it("only warns about unknown create commands", () => {
    expect(makeNonInteractive("npm create foo")).toEqual({
      command: "npm create foo",
      warnings: ["Interactive create command detected.", "Tip: use --yes, -y, or --template flags to avoid prompts."],
    });
  });

  it("does not repeat flags that are present", () => {
    expect(makeNonInteractive("npx shadcn@latest add button -y")).toEqual({
      command: "npx shadcn@latest add button -y",
      warnings: [],
    });
  });
});

describe("isServerCommand", () => {
  it("spots dev servers and watchers", () => {
    expect(isServerCommand("npm run dev")).toBe(true);
    expect(isServerCommand("npx vite")).toBe(true);
    expect(isServerCommand("tsc --watch")).toBe(true);
  });

  it("ignores one-shot commands", () => {
    expect(isServerCommand("npm run build")).toBe(false);
    expect(isServerCommand("node server.js")).toBe(false);
  });
});
