/**
 * Session definition types.
 * Session → Window* → Pane*, a strict containment tree decoded once from YAML.
 */

// ── Layout ───────────────────────────────────────────────────────────────

/** tmux's named layouts; the canonical string is the variant itself. */
export const LAYOUTS = [
  "tiled",
  "even-horizontal",
  "even-vertical",
  "main-horizontal",
  "main-vertical",
] as const;

export type Layout = (typeof LAYOUTS)[number];

// ── Placeholder ──────────────────────────────────────────────────────────

/**
 * Name of the window that holds a session open while it is built. Real
 * windows may not use it, or killing the placeholder would be ambiguous.
 */
export const PLACEHOLDER_WINDOW_NAME = "999";

// ── Definition Tree ──────────────────────────────────────────────────────

export interface IPaneDefinition {
  /** Startup command; an idle pane has none. */
  readonly command?: string | undefined;
}

export interface IWindowDefinition {
  readonly name?: string | undefined;
  readonly layout: Layout;
  readonly root?: string | undefined;
  readonly cmd?: string | undefined;
  readonly panes?: readonly IPaneDefinition[] | undefined;
}

export interface ISessionDefinition {
  readonly name: string;
  readonly root?: string | undefined;
  readonly windows: readonly IWindowDefinition[];
}
