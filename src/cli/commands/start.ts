/**
 * `sprout start` — build a tmux session from its definition and attach to it.
 */

import { Command } from "commander";
import { validateSessionName } from "../../definition/decoder.js";
import { loadDefinition, resolveDefinitionPath } from "../../definition/loader.js";
import { TmuxControl } from "../../multiplexer/tmux-control.js";
import type { IMultiplexerControl } from "../../multiplexer/types.js";
import { SessionRenderer } from "../../renderer/session-renderer.js";
import type { IRenderSummary } from "../../renderer/session-renderer.js";
import { ConfigStore } from "../../storage/config-store.js";
import { logger } from "../../utils/logger.js";
import { parseBaseIndex, readStartFlags } from "../flags.js";
import type { IStartFlags } from "../flags.js";

export interface IStartRequest extends IStartFlags {
  readonly sessionName?: string | undefined;
  /** Session name to use instead of the one in the definition. */
  readonly alias?: string | undefined;
}

export interface IStartDependencies {
  readonly control?: IMultiplexerControl;
  readonly configPath?: string;
  readonly cwd?: string;
  readonly env?: Readonly<Record<string, string | undefined>>;
}

export async function startSession(
  request: IStartRequest,
  deps: IStartDependencies = {},
): Promise<IRenderSummary> {
  const config = new ConfigStore().load(deps.configPath, deps.env);
  const alias = request.alias !== undefined
    ? validateSessionName(request.alias, "alias")
    : undefined;

  const path = resolveDefinitionPath({
    file: request.file,
    sessionName: request.sessionName,
    ...(deps.cwd !== undefined ? { cwd: deps.cwd } : {}),
    ...(deps.env !== undefined ? { env: deps.env } : {}),
  });
  const definition = await loadDefinition(path, { defaultLayout: config.defaultLayout });
  const session = alias !== undefined
    ? { ...definition, name: alias }
    : definition;

  const control = deps.control ?? new TmuxControl({
    binary: config.tmuxBinary,
    ...(deps.env !== undefined ? { env: deps.env } : {}),
  });
  const renderer = new SessionRenderer(control, {
    baseIndex: request.baseIndex ?? config.baseIndex,
    attach: request.attach && config.attach,
  });

  logger.info({ path, session: session.name }, "Starting session");
  return renderer.render(session);
}

export function createStartCommand(): Command {
  return new Command("start")
    .description("Start a new tmux session")
    .argument("[session]", "Session name, matching <config dir>/<session>.yaml; ./.session.yaml when omitted")
    .argument("[alias]", "Name for the started session, when it should differ from the definition")
    .option("-f, --file <path>", "Definition file to load")
    .option("--no-attach", "Leave the session detached")
    .option("--base-index <index>", "tmux base-index of the first window", parseBaseIndex)
    .action(async (
      sessionName: string | undefined,
      alias: string | undefined,
      options: Record<string, unknown>,
    ) => {
      await startSession({ ...readStartFlags(options), sessionName, alias });
    });
}
