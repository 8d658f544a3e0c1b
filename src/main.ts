/**
 * history-sync CLI
 *
 * Finds Claude Code and Cursor session histories and gathers them from this
 * machine and remote machines into one directory tree.
 *
 * Commands:
 *   discover    - Report where histories live on this machine
 *   consolidate - Link local histories into the consolidated directory
 *   pull        - Mirror histories from remote hosts over ssh/rsync
 *
 * Example:
 *   $ history-sync discover --json
 *   $ history-sync consolidate --force
 *   $ history-sync pull alice@devbox buildhost --dry-run
 */

import { Command } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect, Logger, LogLevel, Option } from "effect";

import * as Opts from "@cli/options";
import { AppLive, runConsolidate, runDiscover, runList, runPull, withErrorHandling } from "@cli/handler";

// =============================================================================
// Discover subcommand
// =============================================================================

const discoverCommand = Command.make(
  "discover",
  {
    json: Opts.json,
    home: Opts.home,
    hostname: Opts.hostname
  },
  (opts) =>
    withErrorHandling(
      runDiscover({
        json: opts.json,
        home: Option.getOrUndefined(opts.home),
        hostname: Option.getOrUndefined(opts.hostname)
      })
    ).pipe(Effect.provide(AppLive))
).pipe(Command.withDescription("Report Claude Code and Cursor history locations"));

// =============================================================================
// Consolidate subcommand
// =============================================================================

const consolidateCommand = Command.make(
  "consolidate",
  {
    output: Opts.output,
    home: Opts.home,
    hostname: Opts.hostname,
    force: Opts.force,
    list: Opts.list,
    debug: Opts.debug
  },
  (opts) => {
    const options = {
      output: Option.getOrUndefined(opts.output),
      home: Option.getOrUndefined(opts.home),
      hostname: Option.getOrUndefined(opts.hostname),
      force: opts.force,
      list: opts.list,
      debug: opts.debug
    };

    return withErrorHandling(options.list ? runList(options) : runConsolidate(options)).pipe(
      Effect.provide(Logger.minimumLogLevel(opts.debug ? LogLevel.Debug : LogLevel.Info)),
      Effect.provide(AppLive)
    );
  }
).pipe(Command.withDescription("Link local histories into the consolidated directory"));

// =============================================================================
// Pull subcommand
// =============================================================================

const pullCommand = Command.make(
  "pull",
  {
    hosts: Opts.hosts,
    output: Opts.output,
    port: Opts.port,
    identity: Opts.identity,
    dryRun: Opts.dryRun,
    noClaude: Opts.noClaude,
    noCursor: Opts.noCursor,
    debug: Opts.debug
  },
  (opts) =>
    withErrorHandling(
      runPull({
        hosts: opts.hosts,
        output: Option.getOrUndefined(opts.output),
        port: opts.port,
        identity: Option.getOrUndefined(opts.identity),
        dryRun: opts.dryRun,
        noClaude: opts.noClaude,
        noCursor: opts.noCursor,
        debug: opts.debug
      })
    ).pipe(
      Effect.provide(Logger.minimumLogLevel(opts.debug ? LogLevel.Debug : LogLevel.Info)),
      Effect.provide(AppLive)
    )
).pipe(Command.withDescription("Mirror histories from remote hosts"));

// =============================================================================
// Root command
// =============================================================================

const rootCommand = Command.make("history-sync", {}).pipe(
  Command.withSubcommands([discoverCommand, consolidateCommand, pullCommand]),
  Command.withDescription("Gather Claude Code and Cursor histories into one tree")
);

// =============================================================================
// Run CLI
// =============================================================================

const cli = Command.run(rootCommand, {
  name: "history-sync",
  version: "0.1.0"
});

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
