/**
 * Typed error hierarchy.
 * Every error carries a stable code and a user-facing message; the underlying
 * failure, when there is one, travels as the standard `cause`.
 */

export interface IErrorContext {
  readonly diagnosticMessage?: string | undefined;
  readonly suggestedRecovery?: string | undefined;
  readonly cause?: unknown;
}

export abstract class SproutError extends Error {
  abstract readonly code: string;
  abstract readonly userMessage: string;
  diagnosticMessage?: string | undefined;
  suggestedRecovery?: string | undefined;

  constructor(message: string, context?: IErrorContext) {
    super(message, context?.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = this.constructor.name;
    this.diagnosticMessage = context?.diagnosticMessage;
    this.suggestedRecovery = context?.suggestedRecovery;
  }
}

// ── Definition Errors ────────────────────────────────────────────────────

export class MalformedDefinitionError extends SproutError {
  readonly code = "SPROUT_DEFINITION_MALFORMED_001" as const;
  readonly userMessage: string;
  readonly issues: readonly string[];

  constructor(source: string, issues: readonly string[], context?: IErrorContext) {
    super(`Malformed session definition (${source}): ${issues.join("; ")}`, context);
    this.issues = issues;
    this.userMessage = `The session definition in ${source} is invalid.`;
    this.suggestedRecovery = "Fix the listed fields and start the session again.";
  }
}

export class DefinitionNotFoundError extends SproutError {
  readonly code = "SPROUT_DEFINITION_NOTFOUND_001" as const;
  readonly userMessage: string;
  readonly path: string;

  constructor(path: string, context?: IErrorContext) {
    super(`Cannot read session definition: ${path}`, context);
    this.path = path;
    this.userMessage = `No session definition could be read from ${path}.`;
    this.suggestedRecovery = "Pass a file with -f, or run `sprout list` to see the known sessions.";
  }
}

// ── Multiplexer Errors ───────────────────────────────────────────────────

export class ControlOperationFailedError extends SproutError {
  readonly code = "SPROUT_TMUX_OPERATION_001" as const;
  readonly userMessage: string;
  readonly operation: string;
  readonly argv: readonly string[];

  constructor(operation: string, argv: readonly string[], context?: IErrorContext) {
    super(`tmux ${operation} failed: ${argv.join(" ")}`, context);
    this.operation = operation;
    this.argv = argv;
    this.userMessage = `tmux could not complete "${operation}". The session may be partially created.`;
    this.suggestedRecovery = "Inspect it with `tmux ls` and remove it with `tmux kill-session -t <name>`.";
  }
}

// ── Config Errors ────────────────────────────────────────────────────────

export class InvalidConfigError extends SproutError {
  readonly code = "SPROUT_CONFIG_INVALID_001" as const;
  readonly userMessage: string;

  constructor(path: string, reason: string, context?: IErrorContext) {
    super(`Invalid configuration in ${path}: ${reason}`, context);
    this.userMessage = `Invalid configuration in ${path}: ${reason}`;
  }
}

/**
 * Render an error and its `cause` chain, outermost first.
 */
export function formatErrorChain(error: unknown): string[] {
  const lines: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      lines.push(current.message);
      current = current.cause;
    } else {
      lines.push(String(current));
      current = undefined;
    }
  }

  return lines;
}
