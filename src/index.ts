/**
 * tmux-sprout — public API for programmatic usage.
 */

// ── Types ───────────────────────────────────────────────────────────────

export type {
  Layout,
  IPaneDefinition,
  IWindowDefinition,
  ISessionDefinition,
  ISproutConfig,
  IErrorContext,
} from "./types/index.js";

export {
  LAYOUTS,
  PLACEHOLDER_WINDOW_NAME,
  DEFAULT_CONFIG,
  SproutError,
  MalformedDefinitionError,
  DefinitionNotFoundError,
  ControlOperationFailedError,
  InvalidConfigError,
  formatErrorChain,
} from "./types/index.js";

// ── Definitions ─────────────────────────────────────────────────────────

export {
  isLayout,
  parseLayout,
  formatLayout,
  decodeDefinition,
  parseDefinition,
  validateSessionName,
  resolveDefinitionPath,
  loadDefinition,
  listDefinitions,
} from "./definition/index.js";
export type { IDecodeOptions, IResolveOptions } from "./definition/index.js";

// ── Multiplexer ─────────────────────────────────────────────────────────

export { TmuxControl, buildTmuxArgs, windowTarget, lastWindowTarget } from "./multiplexer/index.js";
export type {
  IMultiplexerControl,
  IWindowOptions,
  ControlOperation,
  CommandRunner,
  ITmuxControlOptions,
} from "./multiplexer/index.js";

// ── Renderer ────────────────────────────────────────────────────────────

export { SessionRenderer, PLACEHOLDER_WINDOW } from "./renderer/index.js";
export type { IPlaceholderWindow, IRendererOptions, IRenderSummary } from "./renderer/index.js";

// ── Configuration ───────────────────────────────────────────────────────

export { ConfigStore } from "./storage/index.js";
