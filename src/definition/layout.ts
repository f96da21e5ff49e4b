/**
 * Layout token parsing. The accepted strings are exactly tmux's layout names.
 */

import { LAYOUTS } from "../types/definition.js";
import type { Layout } from "../types/definition.js";
import { MalformedDefinitionError } from "../types/errors.js";

export function isLayout(value: string): value is Layout {
  return LAYOUTS.some((layout) => layout === value);
}

/**
 * Describe why `value` is not a layout, or return undefined when it is one.
 */
export function describeLayoutIssue(value: string): string | undefined {
  if (isLayout(value)) {
    return undefined;
  }
  return `unknown layout "${value}" (expected one of: ${LAYOUTS.join(", ")})`;
}

export function parseLayout(value: string): Layout {
  if (isLayout(value)) {
    return value;
  }
  throw new MalformedDefinitionError("layout", [describeLayoutIssue(value) ?? value]);
}

export function formatLayout(layout: Layout): string {
  return layout;
}
