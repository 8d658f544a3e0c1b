import { homedir, hostname as osHostname } from "node:os";
import { join, resolve } from "node:path";

import { RemoteHost } from "@core";
import type { PullOptions } from "@core";
import type { PullCommandOptions } from "./options";

export const DEFAULT_ROOT_NAME = ".history-sync";

export interface Machine {
  readonly homeRoot: string;
  readonly hostname: string;
}

/**
 * Resolve the process-wide identity once, at the edge. Everything below
 * takes these as parameters.
 */
export const resolveMachine = (options: { home?: string; hostname?: string }): Machine => ({
  homeRoot: resolve(options.home ?? homedir()),
  hostname: options.hostname ?? osHostname()
});

export const resolveOutputDir = (output: string | undefined, homeRoot: string = homedir()): string =>
  output !== undefined ? resolve(output) : join(homeRoot, DEFAULT_ROOT_NAME);

/**
 * Parse "user@host" or "host" into a RemoteHost. Only the first "@"
 * separates the user.
 */
export const parseHostSpec = (
  spec: string,
  connection: { port?: number; identityFile?: string } = {}
): RemoteHost => {
  const at = spec.indexOf("@");
  const user = at >= 0 ? spec.slice(0, at) : undefined;
  const hostname = at >= 0 ? spec.slice(at + 1) : spec;

  return new RemoteHost({
    hostname,
    user,
    port: connection.port,
    identityFile: connection.identityFile
  });
};

export const parsePullOptions = (options: PullCommandOptions) => ({
  hosts: options.hosts.map((spec) =>
    parseHostSpec(spec, { port: options.port, identityFile: options.identity })
  ),
  root: resolveOutputDir(options.output),
  pull: {
    claudeCode: !options.noClaude,
    cursor: !options.noCursor,
    dryRun: options.dryRun
  } satisfies PullOptions
});
