/**
 * Definition model barrel export
 */

export { isLayout, parseLayout, formatLayout, describeLayoutIssue } from "./layout.js";
export {
  decodeDefinition,
  parseDefinition,
  validateSessionName,
  sessionNameSchema,
} from "./decoder.js";
export type { IDecodeOptions } from "./decoder.js";
export { resolveDefinitionPath, loadDefinition, listDefinitions } from "./loader.js";
export type { IResolveOptions } from "./loader.js";
