/**
 * SessionRenderer — turns a session definition into tmux state.
 *
 * tmux has no "create session with this layout" primitive: windows and panes
 * can only be appended one at a time, and a session cannot exist without a
 * window. The renderer therefore walks the tree top-down, issuing one
 * operation at a time, with a throwaway placeholder window holding the
 * session open until the real windows exist.
 */

import { lastWindowTarget, windowTarget } from "../multiplexer/types.js";
import type { IMultiplexerControl } from "../multiplexer/types.js";
import { logger } from "../utils/logger.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import { ControlOperationFailedError } from "../types/errors.js";
import { PLACEHOLDER_WINDOW_NAME } from "../types/definition.js";
import type {
  IPaneDefinition,
  ISessionDefinition,
  IWindowDefinition,
} from "../types/definition.js";

// ── Types ───────────────────────────────────────────────────────────────

export interface IPlaceholderWindow {
  /** Kill target; tmux resolves it as an index first, then as a window name. */
  readonly label: string;
}

export interface IRendererOptions {
  readonly baseIndex?: number;
  readonly attach?: boolean;
}

export interface IRenderSummary {
  readonly session: string;
  readonly windows: number;
  readonly panes: number;
  /** Absent when nothing was attached. */
  readonly attachedTarget?: string | undefined;
}

// ── Constants ───────────────────────────────────────────────────────────

export const PLACEHOLDER_WINDOW: IPlaceholderWindow = { label: PLACEHOLDER_WINDOW_NAME };

// ── SessionRenderer ─────────────────────────────────────────────────────

export class SessionRenderer {
  private readonly baseIndex: number;
  private readonly shouldAttach: boolean;

  constructor(
    private readonly control: IMultiplexerControl,
    options?: IRendererOptions,
  ) {
    this.baseIndex = options?.baseIndex ?? DEFAULT_CONFIG.baseIndex;
    this.shouldAttach = options?.attach ?? DEFAULT_CONFIG.attach;
  }

  async render(session: ISessionDefinition): Promise<IRenderSummary> {
    const placeholder = await this.createSession(session);

    let panes = 0;
    for (const window of session.windows) {
      panes += await this.renderWindow(session, window);
    }

    const attachedTarget = await this.finalize(session, placeholder);

    logger.info(
      { session: session.name, windows: session.windows.length, panes },
      "Session rendered",
    );

    return {
      session: session.name,
      windows: session.windows.length,
      panes,
      ...(attachedTarget !== undefined ? { attachedTarget } : {}),
    };
  }

  // ── Steps ───────────────────────────────────────────────────────────

  private async createSession(session: ISessionDefinition): Promise<IPlaceholderWindow> {
    await this.control.createSession(session.name, PLACEHOLDER_WINDOW.label, session.root);
    // Renumbering counts from the session's base-index; the attach target must agree.
    await this.control.setBaseIndex(session.name, this.baseIndex);
    logger.debug({ session: session.name, root: session.root }, "Session created");
    return PLACEHOLDER_WINDOW;
  }

  /**
   * Create one window and its panes. Returns the number of panes it ended up with.
   */
  private async renderWindow(session: ISessionDefinition, window: IWindowDefinition): Promise<number> {
    const target = lastWindowTarget(session.name);

    await this.control.createWindow(session.name, {
      name: window.name,
      root: window.root ?? session.root,
    });

    if (window.cmd !== undefined) {
      await this.control.sendKeys(target, window.cmd);
    }

    const panes = window.panes ?? [];
    for (const [index, pane] of panes.entries()) {
      await this.renderPane(session, window, pane, index);
    }

    // Layouts act on the panes present when applied, so this comes last.
    await this.control.selectLayout(target, window.layout);

    logger.debug(
      { session: session.name, window: window.name, panes: panes.length, layout: window.layout },
      "Window rendered",
    );
    return Math.max(1, panes.length);
  }

  private async renderPane(
    session: ISessionDefinition,
    window: IWindowDefinition,
    pane: IPaneDefinition,
    index: number,
  ): Promise<void> {
    // A new window already has its first pane.
    if (index > 0) {
      await this.control.splitPane(session.name, window.root ?? session.root);
    }

    if (pane.command !== undefined) {
      await this.control.sendKeys(lastWindowTarget(session.name), pane.command);
    }
  }

  private async finalize(
    session: ISessionDefinition,
    placeholder: IPlaceholderWindow,
  ): Promise<string | undefined> {
    await this.control.killWindow(session.name, placeholder.label);

    if (session.windows.length === 0) {
      logger.warn(
        { session: session.name },
        "Session has no windows; tmux closes it with its placeholder, so renumbering will fail",
      );
    }

    try {
      await this.control.renumberWindows(session.name);
    } catch (error: unknown) {
      if (error instanceof ControlOperationFailedError && session.windows.length === 0) {
        error.diagnosticMessage =
          `Session "${session.name}" declares no windows. tmux closes a session once its last window is killed.`;
      }
      throw error;
    }

    if (!this.shouldAttach) {
      return undefined;
    }

    if (session.windows.length === 0) {
      logger.warn({ session: session.name }, "Session has no windows, not attaching");
      return undefined;
    }

    await this.control.attach(session.name, this.baseIndex);
    return windowTarget(session.name, this.baseIndex);
  }
}
