/**
 * CLI flag definitions and option readers
 */

import { InvalidArgumentError } from "commander";

export interface IGlobalFlags {
  readonly verbose: boolean;
}

export interface IStartFlags {
  readonly file?: string | undefined;
  readonly attach: boolean;
  readonly baseIndex?: number | undefined;
}

export function parseBaseIndex(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Base index must be a non-negative integer.");
  }
  return Number(value);
}

export function readGlobalFlags(options: Record<string, unknown>): IGlobalFlags {
  return {
    verbose: options["verbose"] === true,
  };
}

export function readStartFlags(options: Record<string, unknown>): IStartFlags {
  const file = options["file"];
  const baseIndex = options["baseIndex"];
  return {
    ...(typeof file === "string" ? { file } : {}),
    // commander stores `--no-attach` as attach: false
    attach: options["attach"] !== false,
    ...(typeof baseIndex === "number" ? { baseIndex } : {}),
  };
}
