/**
 * Definition file lookup and loading.
 *
 * Lookup order when starting a session:
 *   1. an explicit file (`-f <file>`)
 *   2. `<config dir>/<session>.yaml` (or `.yml`), the config dir being
 *      `$XDG_CONFIG_HOME/sprout` or `~/.config/sprout`
 *   3. `./.session.yaml`
 */

import { existsSync } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import { basename, extname, resolve } from "node:path";
import { parseDefinition } from "./decoder.js";
import type { IDecodeOptions } from "./decoder.js";
import { logger } from "../utils/logger.js";
import {
  getConfigDir,
  getDefinitionPath,
  getLocalDefinitionPath,
} from "../utils/pathResolver.js";
import { DefinitionNotFoundError } from "../types/errors.js";
import type { ISessionDefinition } from "../types/definition.js";

const DEFINITION_EXTENSIONS = [".yaml", ".yml"] as const;

export interface IResolveOptions {
  readonly file?: string | undefined;
  readonly sessionName?: string | undefined;
  readonly cwd?: string;
  readonly env?: Readonly<Record<string, string | undefined>>;
}

export function resolveDefinitionPath(options: IResolveOptions = {}): string {
  const cwd = options.cwd ?? process.cwd();

  if (options.file !== undefined) {
    return resolve(cwd, options.file);
  }

  if (options.sessionName !== undefined) {
    const yamlPath = getDefinitionPath(options.sessionName, options.env);
    if (!existsSync(yamlPath)) {
      const ymlPath = yamlPath.replace(/\.yaml$/, ".yml");
      if (existsSync(ymlPath)) {
        return ymlPath;
      }
    }
    return yamlPath;
  }

  return getLocalDefinitionPath(cwd);
}

export async function loadDefinition(
  path: string,
  options: Omit<IDecodeOptions, "source"> = {},
): Promise<ISessionDefinition> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error: unknown) {
    throw new DefinitionNotFoundError(path, { cause: error });
  }

  const definition = parseDefinition(text, { ...options, source: path });
  logger.info(
    { path, session: definition.name, windows: definition.windows.length },
    "Session definition loaded",
  );
  return definition;
}

/**
 * Names of the definitions stored in the config directory, sorted.
 */
export async function listDefinitions(dir: string = getConfigDir()): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error: unknown) {
    if (!isMissingPath(error)) {
      throw error;
    }
    logger.debug({ dir }, "Definition directory does not exist");
    return [];
  }

  const names = new Set<string>();
  for (const entry of entries) {
    const extension = extname(entry);
    if (DEFINITION_EXTENSIONS.some((candidate) => candidate === extension)) {
      names.add(basename(entry, extension));
    }
  }

  return [...names].sort();
}

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
