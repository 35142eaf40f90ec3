import { describe, expect, test } from "vitest";
import { Clipboard, clipboardCommands } from "../../../src/services/clipboard";
import { CommandError } from "../../../src/utils/command";
import { createFakeRunner } from "../../setup";

describe("clipboardCommands", () => {
  test("uses pbcopy on macOS", () => {
    expect(clipboardCommands("darwin").map((c) => c.command)).toEqual(["pbcopy"]);
  });

  test("tries wl-copy before xclip elsewhere", () => {
    expect(clipboardCommands("linux").map((c) => c.command)).toEqual(["wl-copy", "xclip"]);
  });
});

describe("Clipboard", () => {
  test("pipes the text to the copy command", async () => {
    const { run, calls } = createFakeRunner();

    await new Clipboard("darwin", run).copy("hello");

    expect(calls).toEqual([{ command: "pbcopy", args: [], input: "hello" }]);
  });

  test("moves on when a command is not installed", async () => {
    const { run, calls } = createFakeRunner(({ command }) => {
      if (command === "wl-copy") throw new CommandError("spawn wl-copy ENOENT", null, "", "ENOENT");
      return { stdout: "", stderr: "" };
    });

    await new Clipboard("linux", run).copy("hello");

    expect(calls.map((c) => c.command)).toEqual(["wl-copy", "xclip"]);
    expect(calls[1]?.args).toEqual(["-selection", "clipboard"]);
  });

  test("rejects when an installed command fails", async () => {
    const { run, calls } = createFakeRunner(() => {
      throw new CommandError("wl-copy exited with code 1", 1, "no display");
    });

    await expect(new Clipboard("linux", run).copy("hello")).rejects.toThrow("wl-copy exited with code 1");
    expect(calls).toHaveLength(1);
  });

  test("rejects when nothing is installed", async () => {
    const { run } = createFakeRunner(({ command }) => {
      throw new CommandError(`spawn ${command} ENOENT`, null, "", "ENOENT");
    });

    await expect(new Clipboard("linux", run).copy("hello")).rejects.toThrow("spawn xclip ENOENT");
  });
});
