/**
 * Configuration store — loads `config.json` from the config directory with
 * Zod validation and merges it over the defaults.
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import { getConfigPath } from "../utils/pathResolver.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import type { ISproutConfig } from "../types/config.js";
import { LAYOUTS } from "../types/definition.js";
import { InvalidConfigError } from "../types/errors.js";

// ── Zod Schema ──────────────────────────────────────────────────────────

const ConfigSchema = z
  .object({
    baseIndex: z.number().int().nonnegative(),
    defaultLayout: z.enum(LAYOUTS),
    tmuxBinary: z.string().min(1),
    attach: z.boolean(),
  })
  .partial();

type ConfigOverrides = z.infer<typeof ConfigSchema>;

export class ConfigStore {
  private current: ISproutConfig = DEFAULT_CONFIG;

  get config(): ISproutConfig {
    return this.current;
  }

  load(
    configPath?: string,
    env: Readonly<Record<string, string | undefined>> = process.env,
  ): ISproutConfig {
    const resolvedPath = configPath ?? getConfigPath(env);

    if (!existsSync(resolvedPath)) {
      logger.info({ path: resolvedPath }, "Config not found, using defaults");
      this.current = DEFAULT_CONFIG;
      return this.current;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(resolvedPath, "utf-8"));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InvalidConfigError(resolvedPath, message, { cause: error });
    }

    const validated = ConfigSchema.safeParse(parsed);
    if (!validated.success) {
      const reason = validated.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      throw new InvalidConfigError(resolvedPath, reason);
    }

    this.current = this.applyDefaults(validated.data);
    logger.info({ path: resolvedPath }, "Config loaded");
    return this.current;
  }

  private applyDefaults(overrides: ConfigOverrides): ISproutConfig {
    return {
      baseIndex: overrides.baseIndex ?? DEFAULT_CONFIG.baseIndex,
      defaultLayout: overrides.defaultLayout ?? DEFAULT_CONFIG.defaultLayout,
      tmuxBinary: overrides.tmuxBinary ?? DEFAULT_CONFIG.tmuxBinary,
      attach: overrides.attach ?? DEFAULT_CONFIG.attach,
    };
  }
}
