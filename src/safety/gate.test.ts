import { describe, expect, it } from "vitest";
import { ScriptedPrompter } from "../testing/fakes.js";
import { confirmAction, confirmDangerous, isDangerous, isSweepingTarget } from "./gate.js";

describe("isDangerous", () => {
  it.each([
    "rm -rf /",
    "rm -rf *",
    "rm -r ~",
    "rm -rf /usr",
    "sudo mkfs.ext4 /dev/sda1",
    "ls && shutdown -h now",
    "rd /s /q C:\\",
    "Remove-Item -Recurse C:\\Users",
    "dd if=/dev/zero of=/dev/sda",
    "echo hi\nrm -rf /",
    "echo hi & rm -rf /",
    "/bin/rm -rf /",
    "sudo /sbin/mkfs.ext4 /dev/sdb",
    "del /s /q *",
  ])("flags %s", (command) => {
    expect(isDangerous(command)).toBe(true);
  });

  it.each(["rm -rf ./build", "rm file.txt", "rm -rf /usr/local/app", "echo dd", "npm run format", "npm test 2>&1"])(
    "allows %s",
    (command) => {
      expect(isDangerous(command)).toBe(false);
    }
  );
});

describe("isSweepingTarget", () => {
  it("covers roots, home and wildcards", () => {
    expect(isSweepingTarget("'/'")).toBe(true);
    expect(isSweepingTarget("$HOME")).toBe(true);
    expect(isSweepingTarget("..")).toBe(true);
    expect(isSweepingTarget("src/*.ts")).toBe(true);
    expect(isSweepingTarget("src")).toBe(false);
  });
});

describe("confirmations", () => {
  it("accepts y or yes in any case", async () => {
    const prompter = new ScriptedPrompter(["Y", " yes ", "", "no"]);
    expect(await confirmAction(prompter, "Execute?")).toBe(true);
    expect(await confirmAction(prompter, "Execute?")).toBe(true);
    expect(await confirmAction(prompter, "Execute?")).toBe(false);
    expect(await confirmAction(prompter, "Execute?")).toBe(false);
    expect(prompter.questions[0]).toBe("Execute? (y/n): ");
  });

  it("requires the exact elevated phrase for dangerous commands", async () => {
    const prompter = new ScriptedPrompter(["yes", "CONFIRM", " confirm "]);
    expect(await confirmDangerous(prompter)).toBe(false);
    expect(await confirmDangerous(prompter)).toBe(false);
    expect(await confirmDangerous(prompter)).toBe(true);
  });
});
