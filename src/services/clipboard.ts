/**
 * System clipboard through the platform's copy command
 */

import type { CommandRunner } from "../utils/command";
import { CommandError, runCommand } from "../utils/command";

interface ClipboardCommand {
  command: string;
  args: string[];
}

export function clipboardCommands(platform: NodeJS.Platform): ClipboardCommand[] {
  if (platform === "darwin") {
    return [{ command: "pbcopy", args: [] }];
  }
  return [
    { command: "wl-copy", args: [] },
    { command: "xclip", args: ["-selection", "clipboard"] },
  ];
}

export class Clipboard {
  private commands: ClipboardCommand[];
  private run: CommandRunner;

  constructor(platform: NodeJS.Platform = process.platform, run: CommandRunner = runCommand) {
    this.commands = clipboardCommands(platform);
    this.run = run;
  }

  /**
   * Copy text with the first available command.
   * Rejects when none is installed or the last one fails.
   */
  async copy(text: string): Promise<void> {
    let lastError: unknown = new Error("No clipboard command available");

    for (const { command, args } of this.commands) {
      try {
        await this.run(command, args, { input: text });
        return;
      } catch (error) {
        lastError = error;
        // Not installed: try the next one
        if (error instanceof CommandError && error.spawnCode === "ENOENT") continue;
        throw error;
      }
    }

    throw lastError;
  }
}
