/**
 * Path handling: XDG config directory, definition lookup locations, `~` expansion.
 */

import { homedir } from "node:os";
import { join } from "node:path";

type Env = Readonly<Record<string, string | undefined>>;

const APP_DIR_NAME = "sprout";
const LOCAL_DEFINITION_FILE = ".session.yaml";

// ── Config directory ─────────────────────────────────────────────────────

export function getConfigDir(env: Env = process.env): string {
  const override = env["SPROUT_CONFIG_DIR"];
  if (override !== undefined && override.length > 0) {
    return override;
  }

  const xdg = env["XDG_CONFIG_HOME"];
  const base = xdg !== undefined && xdg.length > 0 ? xdg : join(homedir(), ".config");
  return join(base, APP_DIR_NAME);
}

export function getConfigPath(env: Env = process.env): string {
  return join(getConfigDir(env), "config.json");
}

// ── Definitions ──────────────────────────────────────────────────────────

export function getDefinitionPath(sessionName: string, env: Env = process.env): string {
  return join(getConfigDir(env), `${sessionName}.yaml`);
}

export function getLocalDefinitionPath(cwd: string = process.cwd()): string {
  return join(cwd, LOCAL_DEFINITION_FILE);
}

// ── Home expansion ───────────────────────────────────────────────────────

export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") {
    return home;
  }
  if (path.startsWith("~/")) {
    return join(home, path.slice(2));
  }
  return path;
}
