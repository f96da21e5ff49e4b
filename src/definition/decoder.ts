/**
 * Definition decoder — YAML text to a validated ISessionDefinition.
 * Structure is checked with zod; layout tokens and the cmd/panes rule are
 * checked afterwards so every problem in a file is reported at once.
 */

import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { expandHome } from "../utils/pathResolver.js";
import { describeLayoutIssue, parseLayout } from "./layout.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import { MalformedDefinitionError } from "../types/errors.js";
import { PLACEHOLDER_WINDOW_NAME } from "../types/definition.js";
import type {
  IPaneDefinition,
  ISessionDefinition,
  IWindowDefinition,
  Layout,
} from "../types/definition.js";

// ── Zod Schema ──────────────────────────────────────────────────────────

const optionalText = z.string().nullish();

// `- ` with nothing after it decodes to null: an idle pane.
const paneSchema = z.string().nullable();

const windowSchema = z.object({
  name: optionalText,
  layout: optionalText,
  root: optionalText,
  cmd: optionalText,
  panes: z.array(paneSchema).nullish(),
});

export const sessionNameSchema = z
  .string()
  .min(1, "Session name must not be empty")
  // tmux rewrites these characters, which would break every later target.
  .regex(/^[^:.]*$/, 'Session name must not contain ":" or "."');

const sessionSchema = z.object({
  name: sessionNameSchema,
  root: optionalText,
  windows: z.array(windowSchema).nullish(),
});

type RawWindow = z.infer<typeof windowSchema>;

export interface IDecodeOptions {
  /** Shown in error messages, usually the file path. */
  readonly source?: string;
  readonly defaultLayout?: Layout;
  /** Home directory used to expand `~` in roots. */
  readonly home?: string;
}

// ── Decoding ────────────────────────────────────────────────────────────

export function decodeDefinition(raw: unknown, options: IDecodeOptions = {}): ISessionDefinition {
  const source = options.source ?? "<definition>";
  const result = sessionSchema.safeParse(raw);

  if (!result.success) {
    throw new MalformedDefinitionError(source, result.error.issues.map(formatIssue));
  }

  const issues: string[] = [];
  const rawWindows = result.data.windows ?? [];
  rawWindows.forEach((window, index) => {
    issues.push(...checkWindow(window, `windows.${index}`));
  });

  if (issues.length > 0) {
    throw new MalformedDefinitionError(source, issues);
  }

  const home = options.home ?? homedir();
  const defaultLayout = options.defaultLayout ?? DEFAULT_CONFIG.defaultLayout;
  const root = presentText(result.data.root);

  return {
    name: result.data.name,
    ...(root !== undefined ? { root: expandHome(root, home) } : {}),
    windows: rawWindows.map((window) => toWindow(window, defaultLayout, home)),
  };
}

/**
 * Check a session name given outside a definition file, such as an alias.
 */
export function validateSessionName(name: string, source: string): string {
  const result = sessionNameSchema.safeParse(name);
  if (!result.success) {
    throw new MalformedDefinitionError(
      source,
      result.error.issues.map((issue) => `name: ${issue.message}`),
    );
  }
  return result.data;
}

export function parseDefinition(text: string, options: IDecodeOptions = {}): ISessionDefinition {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedDefinitionError(
      options.source ?? "<definition>",
      [`invalid YAML: ${message}`],
      { cause: error },
    );
  }

  return decodeDefinition(raw, options);
}

// ── Helpers ─────────────────────────────────────────────────────────────

function checkWindow(window: RawWindow, path: string): string[] {
  const issues: string[] = [];

  if (window.name === PLACEHOLDER_WINDOW_NAME) {
    issues.push(`${path}.name: "${PLACEHOLDER_WINDOW_NAME}" is reserved for the placeholder window`);
  }

  const layout = presentText(window.layout);
  if (layout !== undefined) {
    const layoutIssue = describeLayoutIssue(layout);
    if (layoutIssue) {
      issues.push(`${path}.layout: ${layoutIssue}`);
    }
  }

  if (presentText(window.cmd) !== undefined && window.panes !== undefined && window.panes !== null) {
    issues.push(`${path}: a window takes either "cmd" or "panes", not both`);
  }

  return issues;
}

function toWindow(window: RawWindow, defaultLayout: Layout, home: string): IWindowDefinition {
  const name = presentText(window.name);
  const layout = presentText(window.layout);
  const root = presentText(window.root);
  const cmd = presentText(window.cmd);

  return {
    ...(name !== undefined ? { name } : {}),
    layout: layout !== undefined ? parseLayout(layout) : defaultLayout,
    ...(root !== undefined ? { root: expandHome(root, home) } : {}),
    ...(cmd !== undefined ? { cmd } : {}),
    ...(window.panes !== undefined && window.panes !== null
      ? { panes: window.panes.map(toPane) }
      : {}),
  };
}

function toPane(pane: string | null): IPaneDefinition {
  const command = presentText(pane);
  return command !== undefined ? { command } : {};
}

/** Blank strings count as absent. */
function presentText(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined || value.trim().length === 0) {
    return undefined;
  }
  return value;
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
  return `${path}: ${issue.message}`;
}
