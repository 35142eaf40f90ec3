/**
 * TerminalInjector - types a response into the terminal hosting a session
 *
 * osascript drives macOS Terminal through System Events keystrokes, which
 * needs the Automation/Accessibility grant. tmux sends literal keys to the
 * pane whose process tree holds the session, and to no other pane. Denial
 * is tracked but never trusted for long: every inject attempts delivery
 * again.
 */

import type { Logger } from "pino";
import type { InjectionMethod } from "../types";
import type { CommandRunner } from "../utils/command";
import { CommandError, runCommand } from "../utils/command";
import { InjectionError } from "../utils/errors";
import { errorMessage } from "../utils/logger";

export type InjectionCapability = "unknown" | "granted" | "denied";

export type InjectionResult = { ok: true } | { ok: false; error: InjectionError };

/** AppleScript errors and messages meaning the automation grant is missing */
const DENIAL_PATTERNS = [
  /-1743\b/,
  /-1719\b/,
  /-25211\b/,
  /not authori[sz]ed/i,
  /not allowed assistive access/i,
];

/** How far up the process tree to look for a tmux pane */
const MAX_PROCESS_DEPTH = 16;

export function escapeAppleScript(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

export function keystrokeScript(text: string): string {
  return [
    'tell application "Terminal"',
    "  activate",
    "  delay 0.2",
    '  tell application "System Events"',
    `    keystroke "${escapeAppleScript(text)}"`,
    "    delay 0.1",
    "    keystroke return",
    "  end tell",
    "end tell",
  ].join("\n");
}

const PROBE_SCRIPT = [
  'tell application "System Events"',
  "  set frontApp to name of first application process whose frontmost is true",
  "end tell",
].join("\n");

function classifyFailure(error: unknown, command: string): InjectionError {
  if (error instanceof InjectionError) return error;

  if (error instanceof CommandError) {
    if (error.spawnCode === "ENOENT") {
      return new InjectionError("unsupported", `${command} is not installed`, { cause: error });
    }
    const detail = error.stderr.trim() || error.message;
    if (DENIAL_PATTERNS.some((pattern) => pattern.test(detail))) {
      return new InjectionError("denied", detail, { cause: error });
    }
    return new InjectionError("failed", detail, { cause: error });
  }

  return new InjectionError("failed", errorMessage(error), { cause: error });
}

export class TerminalInjector {
  private method: InjectionMethod;
  private log: Logger;
  private run: CommandRunner;
  private state: InjectionCapability = "unknown";

  constructor(method: InjectionMethod, logger: Logger, run: CommandRunner = runCommand) {
    this.method = method;
    this.log = logger;
    this.run = run;
  }

  get capability(): InjectionCapability {
    return this.state;
  }

  /**
   * Check the capability without typing anything
   */
  async probe(): Promise<InjectionCapability> {
    try {
      switch (this.method) {
        case "osascript":
          await this.run("osascript", [], { input: PROBE_SCRIPT });
          break;
        case "tmux":
          await this.run("tmux", ["list-panes", "-a"]);
          break;
        case "none":
          return this.state;
      }
      this.state = "granted";
    } catch (error) {
      const failure = classifyFailure(error, this.method);
      if (failure.kind === "denied") this.state = "denied";
      this.log.debug({ method: this.method, kind: failure.kind }, "Injection probe failed");
    }
    return this.state;
  }

  /**
   * Type `text` followed by Enter into the session's terminal
   */
  async inject(text: string, pid?: number): Promise<InjectionResult> {
    try {
      switch (this.method) {
        case "osascript":
          await this.run("osascript", [], { input: keystrokeScript(text) });
          break;
        case "tmux":
          await this.sendToTmux(text, pid);
          break;
        case "none":
          throw new InjectionError("unsupported", "Terminal injection is disabled");
      }
    } catch (error) {
      const failure = classifyFailure(error, this.method);
      if (failure.kind === "denied") {
        this.state = "denied";
      }
      this.log.warn({ method: this.method, kind: failure.kind, error: failure.message }, "Injection failed");
      return { ok: false, error: failure };
    }

    if (this.state !== "granted") {
      this.log.info({ method: this.method }, "Injection capability granted");
    }
    this.state = "granted";
    return { ok: true };
  }

  /**
   * Only the pane hosting the session is ever typed into; without one the
   * caller falls back to file and clipboard delivery
   */
  private async sendToTmux(text: string, pid?: number): Promise<void> {
    if (pid === undefined) {
      throw new InjectionError("failed", "Session has no pid to locate its tmux pane");
    }

    const pane = await this.findPane(pid);
    if (!pane) {
      throw new InjectionError("failed", `No tmux pane hosts pid ${pid}`);
    }

    await this.run("tmux", ["send-keys", "-t", pane, "-l", text]);
    await this.run("tmux", ["send-keys", "-t", pane, "Enter"]);
  }

  /**
   * Pane whose shell is the session process or one of its ancestors
   */
  private async findPane(pid: number): Promise<string | null> {
    const { stdout } = await this.run("tmux", ["list-panes", "-a", "-F", "#{pane_id} #{pane_pid}"]);

    const panes = new Map<number, string>();
    for (const line of stdout.split("\n")) {
      const [paneId, panePid] = line.trim().split(" ");
      const parsed = Number.parseInt(panePid ?? "", 10);
      if (paneId && Number.isFinite(parsed)) panes.set(parsed, paneId);
    }

    let current = pid;
    for (let depth = 0; depth < MAX_PROCESS_DEPTH && current > 1; depth++) {
      const pane = panes.get(current);
      if (pane) return pane;

      try {
        const { stdout: ppid } = await this.run("ps", ["-o", "ppid=", "-p", String(current)]);
        current = Number.parseInt(ppid.trim(), 10);
      } catch (error) {
        this.log.debug({ pid: current, error: errorMessage(error) }, "Process lookup failed");
        return null;
      }
      if (!Number.isFinite(current)) return null;
    }

    return null;
  }
}
