/**
 * LocalConsolidator - links the local machine's history bases into its host
 * subtree. Only links are created; no history content is copied.
 */

import { Context, Data, Effect, Layer, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import { join } from "node:path";

import { baseFor, type DiscoveryResult } from "@domain/DiscoveryResult";
import { TOOL_KINDS, type ToolKind } from "@domain/Tool";

// =============================================================================
// Service errors
// =============================================================================

export class HostDirUnavailable extends Data.TaggedError("HostDirUnavailable")<{
  readonly path: string;
  readonly reason: string;
}> {}

export type ConsolidateError = HostDirUnavailable;

// =============================================================================
// Types
// =============================================================================

export type LinkOutcome = Data.TaggedEnum<{
  Linked: { readonly tool: ToolKind; readonly link: string; readonly target: string };
  /** Target already occupied and `force` was off */
  Skipped: { readonly tool: ToolKind; readonly link: string };
  /** Target still occupied after forced removal */
  Occupied: { readonly tool: ToolKind; readonly link: string };
  /** The link could not be created; later tools are still linked */
  Failed: { readonly tool: ToolKind; readonly link: string; readonly target: string; readonly reason: string };
}>;

export const LinkOutcome = Data.taggedEnum<LinkOutcome>();

export interface LocalConsolidation {
  readonly hostDir: string;
  readonly outcomes: ReadonlyArray<LinkOutcome>;
}

// =============================================================================
// Service interface
// =============================================================================

export interface LocalConsolidator {
  readonly consolidateLocal: (
    root: string,
    discovery: DiscoveryResult,
    force: boolean
  ) => Effect.Effect<LocalConsolidation, ConsolidateError>;
}

export class LocalConsolidatorTag extends Context.Tag("LocalConsolidator")<
  LocalConsolidatorTag,
  LocalConsolidator
>() {}

// =============================================================================
// Live implementation
// =============================================================================

export const LocalConsolidatorLive = Layer.effect(
  LocalConsolidatorTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const isSymlink = (path: string) =>
      pipe(fs.readLink(path), Effect.as(true), Effect.orElseSucceed(() => false));

    // A dangling symlink does not "exist" but still occupies the path
    const isOccupied = (path: string) =>
      Effect.zipWith(
        pipe(fs.exists(path), Effect.orElseSucceed(() => false)),
        isSymlink(path),
        (exists, symlink) => exists || symlink
      );

    const linkTool = (
      hostDir: string,
      tool: ToolKind,
      target: string,
      force: boolean
    ): Effect.Effect<LinkOutcome> =>
      Effect.gen(function* () {
        const link = join(hostDir, tool);

        if (yield* isOccupied(link)) {
          if (!force) {
            return LinkOutcome.Skipped({ tool, link });
          }
          yield* pipe(
            fs.remove(link, { recursive: true }),
            Effect.catchAll((e) => Effect.logWarning(`Could not remove ${link}: ${e.message}`))
          );
        }

        if (yield* isOccupied(link)) {
          return LinkOutcome.Occupied({ tool, link });
        }

        return yield* pipe(
          fs.symlink(target, link),
          Effect.as(LinkOutcome.Linked({ tool, link, target })),
          Effect.catchAll((e) =>
            Effect.succeed(LinkOutcome.Failed({ tool, link, target, reason: e.message }))
          )
        );
      });

    const consolidateLocal: LocalConsolidator["consolidateLocal"] = (root, discovery, force) =>
      Effect.gen(function* () {
        const hostDir = join(root, discovery.hostname);
        yield* pipe(
          fs.makeDirectory(hostDir, { recursive: true }),
          Effect.mapError((e) => new HostDirUnavailable({ path: hostDir, reason: e.message }))
        );

        const outcomes: LinkOutcome[] = [];
        for (const tool of TOOL_KINDS) {
          const base = baseFor(discovery, tool);
          if (base === undefined) continue;
          outcomes.push(yield* linkTool(hostDir, tool, base, force));
        }

        return { hostDir, outcomes };
      });

    return { consolidateLocal };
  })
);
