/**
 * Renderer barrel export
 */

export { SessionRenderer, PLACEHOLDER_WINDOW } from "./session-renderer.js";
export type {
  IPlaceholderWindow,
  IRendererOptions,
  IRenderSummary,
} from "./session-renderer.js";
