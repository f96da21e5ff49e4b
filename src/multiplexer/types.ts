/**
 * External multiplexer control interface.
 * Operations are stateful and order-dependent; each resolves once the
 * multiplexer has carried it out and rejects with ControlOperationFailedError.
 */

import type { Layout } from "../types/definition.js";

export interface IWindowOptions {
  readonly name?: string | undefined;
  readonly root?: string | undefined;
}

export interface IMultiplexerControl {
  /** Create a detached session whose only window is the named placeholder. */
  createSession(name: string, placeholder: string, root?: string): Promise<void>;
  /** Set the session's `base-index`, which renumbering counts from. */
  setBaseIndex(session: string, index: number): Promise<void>;
  /** Append a window after the session's last window. */
  createWindow(session: string, options: IWindowOptions): Promise<void>;
  /** Split the session's last window; the new pane becomes its active pane. */
  splitPane(session: string, root?: string): Promise<void>;
  /** Type `text` into the target's active pane, followed by Enter. */
  sendKeys(target: string, text: string): Promise<void>;
  selectLayout(target: string, layout: Layout): Promise<void>;
  killWindow(session: string, window: string | number): Promise<void>;
  /** Compact window indices into a contiguous run from the base index. */
  renumberWindows(session: string): Promise<void>;
  attach(session: string, window: number): Promise<void>;
}

// ── Operations ──────────────────────────────────────────────────────────

export type ControlOperation =
  | { readonly kind: "create-session"; readonly session: string; readonly placeholder: string; readonly root?: string | undefined }
  | { readonly kind: "set-base-index"; readonly session: string; readonly index: number }
  | { readonly kind: "create-window"; readonly session: string; readonly name?: string | undefined; readonly root?: string | undefined }
  | { readonly kind: "split-pane"; readonly session: string; readonly root?: string | undefined }
  | { readonly kind: "send-keys"; readonly target: string; readonly text: string }
  | { readonly kind: "select-layout"; readonly target: string; readonly layout: Layout }
  | { readonly kind: "kill-window"; readonly target: string }
  | { readonly kind: "renumber-windows"; readonly session: string }
  | { readonly kind: "attach"; readonly target: string; readonly switchClient: boolean };

// ── Targets ─────────────────────────────────────────────────────────────

export function windowTarget(session: string, window: string | number): string {
  return `${session}:${window}`;
}

/** The highest-numbered window, i.e. the one most recently appended. */
export function lastWindowTarget(session: string): string {
  return windowTarget(session, "{end}");
}
