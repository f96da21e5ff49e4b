/**
 * Multiplexer control barrel export
 */

export { windowTarget, lastWindowTarget } from "./types.js";
export type {
  IMultiplexerControl,
  IWindowOptions,
  ControlOperation,
} from "./types.js";
export { TmuxControl, buildTmuxArgs } from "./tmux-control.js";
export type { CommandRunner, IRunOptions, ITmuxControlOptions } from "./tmux-control.js";
