/**
 * LoggerService - formatted console output for discover, consolidate, and pull
 */

import { Console, Context, Effect, Layer } from "effect";

import type { HistoryLocation } from "@domain/HistoryLocation";
import { toolDisplayName, type ToolKind } from "@domain/Tool";

const RULE = "=".repeat(60);
const THIN_RULE = "-".repeat(50);

export interface HostOutcome {
  readonly hostname: string;
  readonly success: boolean;
}

export interface LoggerService {
  readonly discover: {
    readonly header: (hostname: string) => Effect.Effect<void>;
    readonly toolSection: (
      tool: ToolKind,
      base: string | undefined,
      locations: ReadonlyArray<HistoryLocation>
    ) => Effect.Effect<void>;
    readonly report: (json: string) => Effect.Effect<void>;
  };
  readonly consolidate: {
    readonly header: (root: string) => Effect.Effect<void>;
    readonly manifestWritten: (path: string) => Effect.Effect<void>;
    readonly localHost: (hostname: string) => Effect.Effect<void>;
    readonly linked: (link: string, target: string) => Effect.Effect<void>;
    readonly skipped: (link: string) => Effect.Effect<void>;
    readonly occupied: (link: string) => Effect.Effect<void>;
    readonly linkFailed: (link: string, reason: string) => Effect.Effect<void>;
    readonly nothingToLink: Effect.Effect<void>;
    readonly complete: (root: string) => Effect.Effect<void>;
  };
  readonly list: {
    readonly missing: (root: string) => Effect.Effect<void>;
    readonly header: (root: string) => Effect.Effect<void>;
    readonly host: (name: string) => Effect.Effect<void>;
    readonly link: (name: string, target: string) => Effect.Effect<void>;
    readonly materialized: (name: string, fileCount: number) => Effect.Effect<void>;
  };
  readonly pull: {
    readonly header: (sshTarget: string) => Effect.Effect<void>;
    readonly discovering: Effect.Effect<void>;
    readonly nothingFound: (hostname: string) => Effect.Effect<void>;
    readonly toolFound: (tool: ToolKind, remotePath: string) => Effect.Effect<void>;
    readonly toolNotFound: (tool: ToolKind) => Effect.Effect<void>;
    readonly syncing: (source: string, localPath: string, dryRun: boolean) => Effect.Effect<void>;
    readonly mirrorFailed: (tool: ToolKind) => Effect.Effect<void>;
    readonly multiHeader: (count: number) => Effect.Effect<void>;
    readonly hostFailed: (hostname: string, reason: string) => Effect.Effect<void>;
    readonly summary: (outcomes: ReadonlyArray<HostOutcome>) => Effect.Effect<void>;
  };
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

// =============================================================================
// Implementation
// =============================================================================

export const LoggerServiceLive = Layer.succeed(LoggerServiceTag, {
  discover: {
    header: (hostname) =>
      Effect.gen(function* () {
        yield* Console.log(`\n${RULE}`);
        yield* Console.log(`History Discovery Report - ${hostname}`);
        yield* Console.log(`${RULE}\n`);
      }),
    toolSection: (tool, base, locations) =>
      Effect.gen(function* () {
        const name = toolDisplayName(tool);
        if (base === undefined) {
          yield* Console.log(`${name}: Not found\n`);
          return;
        }
        yield* Console.log(`${name} Base: ${base}`);
        yield* Console.log(`  Found ${locations.length} location(s):`);
        for (const loc of locations) {
          yield* Console.log(`    - ${loc.label}: ${loc.unitCount} session(s)`);
        }
        yield* Console.log("");
      }),
    report: (json) => Console.log(json)
  },
  consolidate: {
    header: (root) =>
      Effect.gen(function* () {
        yield* Console.log(`\nConsolidating histories to: ${root}`);
        yield* Console.log(THIN_RULE);
      }),
    manifestWritten: (path) => Console.log(`Created .gitignore at ${path}`),
    localHost: (hostname) => Console.log(`\nLocal host: ${hostname}`),
    linked: (link, target) => Console.log(`  Created symlink: ${link} -> ${target}`),
    skipped: (link) => Console.log(`  Skipping ${link} (already exists)`),
    occupied: (link) => Console.error(`  ⚠️  ${link} is still occupied after removal, not linking`),
    linkFailed: (link, reason) => Console.error(`  ❌ Could not create symlink ${link}: ${reason}`),
    nothingToLink: Console.log("  No local histories found to link"),
    complete: (root) =>
      Effect.gen(function* () {
        yield* Console.log("\n✓ Consolidation complete!");
        yield* Console.log(`View histories at: ${root}\n`);
      })
  },
  list: {
    missing: (root) =>
      Effect.gen(function* () {
        yield* Console.log("No consolidated histories found.");
        yield* Console.log(`Run 'history-sync consolidate' to create them at ${root}`);
      }),
    header: (root) =>
      Effect.gen(function* () {
        yield* Console.log(`\nConsolidated Histories: ${root}`);
        yield* Console.log(RULE);
      }),
    host: (name) => Console.log(`\n${name}/`),
    link: (name, target) => Console.log(`  ${name} -> ${target} (symlink)`),
    materialized: (name, fileCount) => Console.log(`  ${name}/ (${fileCount} files)`)
  },
  pull: {
    header: (sshTarget) =>
      Effect.gen(function* () {
        yield* Console.log(`\nPulling from ${sshTarget}`);
        yield* Console.log(THIN_RULE);
      }),
    discovering: Console.log("🔍 Discovering remote histories..."),
    nothingFound: (hostname) => Console.error(`  ❌ No histories found on ${hostname}`),
    toolFound: (tool, remotePath) => Console.log(`\n${toolDisplayName(tool)} found at: ${remotePath}`),
    toolNotFound: (tool) => Console.log(`\n${toolDisplayName(tool)}: Not found on remote`),
    syncing: (source, localPath, dryRun) =>
      Console.log(`  ${dryRun ? "Would sync" : "Syncing"}: ${source} -> ${localPath}`),
    mirrorFailed: (tool) => Console.error(`  ❌ Failed to sync ${toolDisplayName(tool)}`),
    multiHeader: (count) =>
      Effect.gen(function* () {
        yield* Console.log(`\nPulling histories from ${count} host(s)`);
        yield* Console.log(RULE);
      }),
    hostFailed: (hostname, reason) => Console.error(`\n❌ Error pulling from ${hostname}: ${reason}`),
    summary: (outcomes) =>
      Effect.gen(function* () {
        yield* Console.log(`\n${RULE}`);
        yield* Console.log("Summary:");
        for (const outcome of outcomes) {
          yield* Console.log(`  ${outcome.success ? "✓" : "✗"} ${outcome.hostname}`);
        }
      })
  }
});
