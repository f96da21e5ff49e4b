/**
 * Types barrel export
 */

export { LAYOUTS, PLACEHOLDER_WINDOW_NAME } from "./definition.js";
export type {
  Layout,
  IPaneDefinition,
  IWindowDefinition,
  ISessionDefinition,
} from "./definition.js";

export { DEFAULT_CONFIG } from "./config.js";
export type { ISproutConfig } from "./config.js";

export {
  SproutError,
  MalformedDefinitionError,
  DefinitionNotFoundError,
  ControlOperationFailedError,
  InvalidConfigError,
  formatErrorChain,
} from "./errors.js";
export type { IErrorContext } from "./errors.js";
