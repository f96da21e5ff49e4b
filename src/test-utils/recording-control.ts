/**
 * In-memory IMultiplexerControl that records each operation as one line.
 */

import type { IMultiplexerControl, IWindowOptions } from "../multiplexer/types.js";
import { ControlOperationFailedError } from "../types/errors.js";
import type { Layout } from "../types/definition.js";

type ControlMethod = keyof IMultiplexerControl;

export class RecordingControl implements IMultiplexerControl {
  readonly calls: string[] = [];
  private readonly seen = new Map<ControlMethod, number>();

  /** Reject the nth (1-based) call of `method`. */
  constructor(private readonly failure?: { method: ControlMethod; occurrence?: number }) {}

  async createSession(name: string, placeholder: string, root?: string): Promise<void> {
    this.record("createSession", `create-session ${name} ${placeholder}${suffix("root", root)}`);
  }

  async setBaseIndex(session: string, index: number): Promise<void> {
    this.record("setBaseIndex", `set-base-index ${session} ${index}`);
  }

  async createWindow(session: string, options: IWindowOptions): Promise<void> {
    this.record(
      "createWindow",
      `create-window ${session}${suffix("name", options.name)}${suffix("root", options.root)}`,
    );
  }

  async splitPane(session: string, root?: string): Promise<void> {
    this.record("splitPane", `split-pane ${session}${suffix("root", root)}`);
  }

  async sendKeys(target: string, text: string): Promise<void> {
    this.record("sendKeys", `send-keys ${target} ${text}`);
  }

  async selectLayout(target: string, layout: Layout): Promise<void> {
    this.record("selectLayout", `select-layout ${target} ${layout}`);
  }

  async killWindow(session: string, window: string | number): Promise<void> {
    this.record("killWindow", `kill-window ${session}:${window}`);
  }

  async renumberWindows(session: string): Promise<void> {
    this.record("renumberWindows", `renumber ${session}`);
  }

  async attach(session: string, window: number): Promise<void> {
    this.record("attach", `attach ${session}:${window}`);
  }

  private record(method: ControlMethod, line: string): void {
    const count = (this.seen.get(method) ?? 0) + 1;
    this.seen.set(method, count);

    if (this.failure?.method === method && (this.failure.occurrence ?? 1) === count) {
      throw new ControlOperationFailedError(method, [line], { cause: new Error("exit code 1") });
    }
    this.calls.push(line);
  }
}

function suffix(key: string, value: string | undefined): string {
  return value !== undefined ? ` ${key}=${value}` : "";
}
