/**
 * TmuxControl — drives tmux one process per operation.
 * Nothing is read back from tmux; every call waits for its process to exit.
 */

import { execa } from "execa";
import { lastWindowTarget, windowTarget } from "./types.js";
import type { ControlOperation, IMultiplexerControl, IWindowOptions } from "./types.js";
import { logger } from "../utils/logger.js";
import { ControlOperationFailedError } from "../types/errors.js";
import type { Layout } from "../types/definition.js";

// ── Types ───────────────────────────────────────────────────────────────

export interface IRunOptions {
  /** Hand the terminal to the child, as `attach-session` needs. */
  readonly inheritStdio: boolean;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options: IRunOptions,
) => Promise<void>;

export interface ITmuxControlOptions {
  readonly binary?: string;
  readonly runner?: CommandRunner;
  readonly env?: Readonly<Record<string, string | undefined>>;
}

// ── Constants ───────────────────────────────────────────────────────────

const TMUX_BINARY = "tmux";
const ACTIVATION_KEY = "Enter";

// ── Argument building ───────────────────────────────────────────────────

export function buildTmuxArgs(operation: ControlOperation): string[] {
  switch (operation.kind) {
    case "create-session":
      return [
        "new-session", "-d",
        "-s", operation.session,
        "-n", operation.placeholder,
        ...rootArgs(operation.root),
      ];
    case "set-base-index":
      return ["set-option", "-t", operation.session, "base-index", String(operation.index)];
    case "create-window":
      return [
        "new-window", "-a",
        "-t", lastWindowTarget(operation.session),
        ...(operation.name !== undefined ? ["-n", operation.name] : []),
        ...rootArgs(operation.root),
      ];
    case "split-pane":
      return [
        "split-window",
        "-t", lastWindowTarget(operation.session),
        ...rootArgs(operation.root),
      ];
    case "send-keys":
      return ["send-keys", "-t", operation.target, operation.text, ACTIVATION_KEY];
    case "select-layout":
      return ["select-layout", "-t", operation.target, operation.layout];
    case "kill-window":
      return ["kill-window", "-t", operation.target];
    case "renumber-windows":
      return ["move-window", "-r", "-t", operation.session];
    case "attach":
      return operation.switchClient
        ? ["switch-client", "-t", operation.target]
        : ["attach-session", "-t", operation.target];
  }
}

function rootArgs(root: string | undefined): string[] {
  return root !== undefined ? ["-c", root] : [];
}

const execaRunner: CommandRunner = async (file, args, options) => {
  await execa(file, args, { stdio: options.inheritStdio ? "inherit" : "pipe" });
};

// ── TmuxControl ─────────────────────────────────────────────────────────

export class TmuxControl implements IMultiplexerControl {
  private readonly binary: string;
  private readonly runner: CommandRunner;
  private readonly env: Readonly<Record<string, string | undefined>>;

  constructor(options?: ITmuxControlOptions) {
    this.binary = options?.binary ?? TMUX_BINARY;
    this.runner = options?.runner ?? execaRunner;
    this.env = options?.env ?? process.env;
  }

  async createSession(name: string, placeholder: string, root?: string): Promise<void> {
    await this.run({ kind: "create-session", session: name, placeholder, root });
  }

  async setBaseIndex(session: string, index: number): Promise<void> {
    await this.run({ kind: "set-base-index", session, index });
  }

  async createWindow(session: string, options: IWindowOptions): Promise<void> {
    await this.run({ kind: "create-window", session, name: options.name, root: options.root });
  }

  async splitPane(session: string, root?: string): Promise<void> {
    await this.run({ kind: "split-pane", session, root });
  }

  async sendKeys(target: string, text: string): Promise<void> {
    await this.run({ kind: "send-keys", target, text });
  }

  async selectLayout(target: string, layout: Layout): Promise<void> {
    await this.run({ kind: "select-layout", target, layout });
  }

  async killWindow(session: string, window: string | number): Promise<void> {
    await this.run({ kind: "kill-window", target: windowTarget(session, window) });
  }

  async renumberWindows(session: string): Promise<void> {
    await this.run({ kind: "renumber-windows", session });
  }

  /**
   * Attach the terminal to the session. From inside tmux, attaching is refused,
   * so the current client is switched over instead.
   */
  async attach(session: string, window: number): Promise<void> {
    const tmuxEnv = this.env["TMUX"];
    const switchClient = tmuxEnv !== undefined && tmuxEnv.length > 0;
    await this.run(
      { kind: "attach", target: windowTarget(session, window), switchClient },
      !switchClient,
    );
  }

  // ── Private Helpers ─────────────────────────────────────────────────

  private async run(operation: ControlOperation, inheritStdio = false): Promise<void> {
    const args = buildTmuxArgs(operation);
    logger.debug({ operation: operation.kind, args }, "tmux operation");

    try {
      await this.runner(this.binary, args, { inheritStdio });
    } catch (error: unknown) {
      throw new ControlOperationFailedError(operation.kind, [this.binary, ...args], {
        cause: error,
      });
    }
  }
}
