import { Console, Effect, pipe } from "effect";

import type { ConsolidateOptions, DiscoverOptions, PullCommandOptions } from "./options";
import { parsePullOptions, resolveMachine, resolveOutputDir } from "./optionParsing";
import { fromDomainError } from "./errors";

import { AppLive, locationsFor, toReport } from "@core";
import { DiscoveryServiceTag } from "@services/DiscoveryService";
import { LocalConsolidatorTag } from "@services/LocalConsolidator";
import { ConsolidationRootTag } from "@services/ConsolidationRoot";
import { RemoteOrchestratorTag } from "@services/RemoteOrchestrator";
import { LoggerServiceTag } from "@services/LoggerService";

/**
 * Error handling wrapper for CLI commands
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) => {
      const appError = fromDomainError(error);
      return Console.error(`\n${appError.format()}`);
    }),
    Effect.asVoid
  );

/**
 * Run the discover command
 */
export const runDiscover = (options: DiscoverOptions) =>
  Effect.gen(function* () {
    const discovery = yield* DiscoveryServiceTag;
    const logger = yield* LoggerServiceTag;

    const machine = resolveMachine(options);
    const result = yield* discovery.discover(machine.homeRoot, machine.hostname);

    if (options.json) {
      yield* logger.discover.report(JSON.stringify(toReport(result), null, 2));
      return;
    }

    yield* logger.discover.header(result.hostname);
    yield* logger.discover.toolSection("claude-code", result.claudeBase, locationsFor(result, "claude-code"));
    yield* logger.discover.toolSection("cursor", result.cursorBase, locationsFor(result, "cursor"));
  });

/**
 * Run the consolidate command
 */
export const runConsolidate = (options: ConsolidateOptions) =>
  Effect.gen(function* () {
    const root = yield* ConsolidationRootTag;
    const discovery = yield* DiscoveryServiceTag;
    const consolidator = yield* LocalConsolidatorTag;
    const logger = yield* LoggerServiceTag;

    if (options.debug) {
      yield* Effect.logInfo("Debug logging enabled");
    }

    const machine = resolveMachine(options);
    const output = resolveOutputDir(options.output, machine.homeRoot);

    yield* logger.consolidate.header(output);
    yield* root.ensureRoot(output);
    yield* logger.consolidate.manifestWritten(yield* root.writeExclusionManifest(output));

    const result = yield* discovery.discover(machine.homeRoot, machine.hostname);

    yield* logger.consolidate.localHost(result.hostname);
    const { outcomes } = yield* consolidator.consolidateLocal(output, result, options.force);

    if (outcomes.length === 0) {
      yield* logger.consolidate.nothingToLink;
    }
    for (const outcome of outcomes) {
      switch (outcome._tag) {
        case "Linked":
          yield* logger.consolidate.linked(outcome.link, outcome.target);
          break;
        case "Skipped":
          yield* logger.consolidate.skipped(outcome.link);
          break;
        case "Occupied":
          yield* logger.consolidate.occupied(outcome.link);
          break;
        case "Failed":
          yield* logger.consolidate.linkFailed(outcome.link, outcome.reason);
          break;
      }
    }

    yield* logger.consolidate.complete(output);
  });

/**
 * Run consolidate --list
 */
export const runList = (options: ConsolidateOptions) =>
  Effect.gen(function* () {
    const root = yield* ConsolidationRootTag;
    const logger = yield* LoggerServiceTag;

    const machine = resolveMachine(options);
    const output = resolveOutputDir(options.output, machine.homeRoot);
    const listing = yield* root.enumerate(output);

    if (listing._tag === "Missing") {
      yield* logger.list.missing(listing.root);
      return;
    }

    yield* logger.list.header(listing.root);
    for (const host of listing.hosts) {
      yield* logger.list.host(host.name);
      for (const entry of host.entries) {
        yield* entry._tag === "Link"
          ? logger.list.link(entry.name, entry.target)
          : logger.list.materialized(entry.name, entry.fileCount);
      }
    }
  });

/**
 * Run the pull command
 */
export const runPull = (options: PullCommandOptions) =>
  Effect.gen(function* () {
    const orchestrator = yield* RemoteOrchestratorTag;

    if (options.debug) {
      yield* Effect.logInfo("Debug logging enabled");
    }

    const parsed = parsePullOptions(options);
    const [first, ...rest] = parsed.hosts;
    if (first === undefined) {
      return;
    }

    if (rest.length === 0) {
      const report = yield* orchestrator.pull(first, parsed.root, parsed.pull);
      yield* report.success
        ? Console.log(`\n✓ Pulled histories from ${report.hostname} into ${parsed.root}\n`)
        : Console.error(`\n✗ Pull from ${report.hostname} did not complete\n`);
      return;
    }

    yield* orchestrator.pullMany(parsed.hosts, parsed.root, parsed.pull);
  });

/**
 * Export the application layer for CLI
 */
export { AppLive };
