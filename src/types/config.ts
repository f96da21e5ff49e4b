/**
 * Runtime configuration types
 */

import type { Layout } from "./definition.js";

export interface ISproutConfig {
  /** tmux `base-index`; the first real window is addressed at this index after renumbering. */
  readonly baseIndex: number;
  /** Layout applied to windows that declare none. */
  readonly defaultLayout: Layout;
  readonly tmuxBinary: string;
  /** Attach to the session once it is built. */
  readonly attach: boolean;
}

export const DEFAULT_CONFIG: ISproutConfig = {
  baseIndex: 1,
  defaultLayout: "even-horizontal",
  tmuxBinary: "tmux",
  attach: true,
};
