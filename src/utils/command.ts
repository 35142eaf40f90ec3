/**
 * Child process runner used by the injector and the clipboard
 */

import { spawn } from "child_process";

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export class CommandError extends Error {
  readonly exitCode: number | null;
  readonly stderr: string;

  /** Set when the executable itself could not be started */
  readonly spawnCode?: string;

  constructor(message: string, exitCode: number | null, stderr: string, spawnCode?: string) {
    super(message);
    this.name = "CommandError";
    this.exitCode = exitCode;
    this.stderr = stderr;
    this.spawnCode = spawnCode;
  }
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: { input?: string; timeoutMs?: number }
) => Promise<CommandResult>;

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Spawn a command, optionally feeding stdin, and collect its output.
 * Rejects with a CommandError on a non-zero exit or spawn failure.
 */
export const runCommand: CommandRunner = (command, args, options) => {
  return new Promise<CommandResult>((resolve, reject) => {
    const ac = new AbortController();
    const timer = setTimeout(() => {
      ac.abort();
    }, options?.timeoutMs ?? DEFAULT_TIMEOUT_MS);

    const child = spawn(command, args, {
      signal: ac.signal,
      stdio: [options?.input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";

    child.stdout?.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    child.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on("error", (error: NodeJS.ErrnoException) => {
      clearTimeout(timer);
      reject(new CommandError(`${command}: ${error.message}`, null, stderr, error.code));
    });

    child.on("close", (code) => {
      clearTimeout(timer);
      if (code === 0) {
        resolve({ stdout, stderr });
      } else {
        reject(new CommandError(`${command} exited with code ${code}`, code, stderr));
      }
    });

    if (options?.input !== undefined && child.stdin) {
      child.stdin.end(options.input);
    }
  });
};
