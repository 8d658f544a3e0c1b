import { Args, Options } from "@effect/cli";

export const output = Options.text("output").pipe(
  Options.withAlias("o"),
  Options.withDescription("Consolidated history directory (default: ~/.history-sync)"),
  Options.optional
);

export const home = Options.directory("home").pipe(
  Options.withDescription("Home directory to scan instead of the current user's"),
  Options.optional
);

export const hostname = Options.text("hostname").pipe(
  Options.withDescription("Name to file local histories under (default: this machine's hostname)"),
  Options.optional
);

export const json = Options.boolean("json").pipe(
  Options.withDescription("Print the discovery report as JSON"),
  Options.withDefault(false)
);

export const force = Options.boolean("force").pipe(
  Options.withAlias("f"),
  Options.withDescription("Replace whatever already occupies a link path"),
  Options.withDefault(false)
);

export const list = Options.boolean("list").pipe(
  Options.withAlias("l"),
  Options.withDescription("List consolidated histories instead of linking"),
  Options.withDefault(false)
);

export const port = Options.integer("port").pipe(
  Options.withAlias("p"),
  Options.withDescription("SSH port"),
  Options.withDefault(22)
);

export const identity = Options.file("identity").pipe(
  Options.withAlias("i"),
  Options.withDescription("SSH identity file"),
  Options.optional
);

export const dryRun = Options.boolean("dry-run").pipe(
  Options.withAlias("n"),
  Options.withDescription("Show what would be synced without syncing"),
  Options.withDefault(false)
);

export const noClaude = Options.boolean("no-claude").pipe(
  Options.withDescription("Skip Claude Code histories"),
  Options.withDefault(false)
);

export const noCursor = Options.boolean("no-cursor").pipe(
  Options.withDescription("Skip Cursor histories"),
  Options.withDefault(false)
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);

export const hosts = Args.text({ name: "host" }).pipe(
  Args.withDescription("Remote host to pull from (user@host or host)"),
  Args.atLeast(1)
);

export interface DiscoverOptions {
  readonly json: boolean;
  readonly home: string | undefined;
  readonly hostname: string | undefined;
}

export interface ConsolidateOptions {
  readonly output: string | undefined;
  readonly home: string | undefined;
  readonly hostname: string | undefined;
  readonly force: boolean;
  readonly list: boolean;
  readonly debug?: boolean;
}

export interface PullCommandOptions {
  readonly hosts: ReadonlyArray<string>;
  readonly output: string | undefined;
  readonly port: number;
  readonly identity: string | undefined;
  readonly dryRun: boolean;
  readonly noClaude: boolean;
  readonly noCursor: boolean;
  readonly debug?: boolean;
}
