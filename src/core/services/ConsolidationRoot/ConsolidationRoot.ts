/**
 * ConsolidationRoot - owns the top-level consolidated directory, its
 * exclusion manifest, and the listing of what is consolidated under it.
 */

import { Context, Data, Effect, Layer, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import { join } from "node:path";

export const MANIFEST_FILE = ".gitignore";

/**
 * Materialized remote trees are regenerable; symlinks to local bases are
 * pointers worth keeping. The trailing slash only matches real directories.
 */
export const EXCLUSION_MANIFEST = `# Ignore remote history data (actual files, not symlinks)
# Keep symlinks for local histories

# Ignore all remote host directories (they contain actual data)
*/claude-code/
*/cursor/

# But don't ignore the symlinks (they're just pointers)
!*/claude-code
!*/cursor

# Ignore any pulled archives
*.tar.gz
*.zip

# Common patterns to ignore
.DS_Store
`;

// =============================================================================
// Service errors
// =============================================================================

export class RootNotWritable extends Data.TaggedError("RootNotWritable")<{
  readonly path: string;
  readonly reason: string;
}> {}

export class RootReadFailed extends Data.TaggedError("RootReadFailed")<{
  readonly path: string;
  readonly reason: string;
}> {}

export type RootError = RootNotWritable | RootReadFailed;

// =============================================================================
// Types
// =============================================================================

export type ToolEntry = Data.TaggedEnum<{
  Link: { readonly name: string; readonly target: string };
  Materialized: { readonly name: string; readonly fileCount: number };
}>;

export const ToolEntry = Data.taggedEnum<ToolEntry>();

export interface HostListing {
  readonly name: string;
  readonly entries: ReadonlyArray<ToolEntry>;
}

export type RootListing = Data.TaggedEnum<{
  Missing: { readonly root: string };
  Present: { readonly root: string; readonly hosts: ReadonlyArray<HostListing> };
}>;

export const RootListing = Data.taggedEnum<RootListing>();

// =============================================================================
// Service interface
// =============================================================================

export interface ConsolidationRoot {
  readonly ensureRoot: (path: string) => Effect.Effect<string, RootError>;
  /** Overwrites any existing manifest; returns the manifest path */
  readonly writeExclusionManifest: (path: string) => Effect.Effect<string, RootError>;
  readonly enumerate: (path: string) => Effect.Effect<RootListing, RootError>;
}

export class ConsolidationRootTag extends Context.Tag("ConsolidationRoot")<
  ConsolidationRootTag,
  ConsolidationRoot
>() {}

// =============================================================================
// Live implementation
// =============================================================================

export const ConsolidationRootLive = Layer.effect(
  ConsolidationRootTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const typeOf = (path: string) =>
      pipe(
        fs.stat(path),
        Effect.map((info) => info.type),
        Effect.option
      );

    const readNames = (dir: string) =>
      pipe(
        fs.readDirectory(dir),
        Effect.map((names) => [...names].sort()),
        Effect.mapError((e) => new RootReadFailed({ path: dir, reason: e.message }))
      );

    const countFiles = (dir: string) =>
      pipe(
        fs.readDirectory(dir, { recursive: true }),
        Effect.mapError((e) => new RootReadFailed({ path: dir, reason: e.message })),
        Effect.flatMap((relativePaths) =>
          Effect.filter(relativePaths, (relative) =>
            pipe(
              typeOf(join(dir, relative)),
              Effect.map((type) => type._tag === "Some" && type.value === "File")
            )
          )
        ),
        Effect.map((files) => files.length)
      );

    const describeEntry = (
      hostDir: string,
      name: string
    ): Effect.Effect<Array<ToolEntry>, RootReadFailed> =>
      Effect.gen(function* () {
        const path = join(hostDir, name);

        const linkText = yield* Effect.option(fs.readLink(path));
        if (linkText._tag === "Some") {
          const resolved = yield* pipe(fs.realPath(path), Effect.orElseSucceed(() => linkText.value));
          return [ToolEntry.Link({ name, target: resolved })];
        }

        const type = yield* typeOf(path);
        if (type._tag === "Some" && type.value === "Directory") {
          return [ToolEntry.Materialized({ name, fileCount: yield* countFiles(path) })];
        }

        return [];
      });

    const ensureRoot: ConsolidationRoot["ensureRoot"] = (path) =>
      pipe(
        fs.makeDirectory(path, { recursive: true }),
        Effect.mapError((e) => new RootNotWritable({ path, reason: e.message })),
        Effect.as(path)
      );

    const writeExclusionManifest: ConsolidationRoot["writeExclusionManifest"] = (path) => {
      const manifestPath = join(path, MANIFEST_FILE);
      return pipe(
        fs.writeFileString(manifestPath, EXCLUSION_MANIFEST),
        Effect.mapError((e) => new RootNotWritable({ path: manifestPath, reason: e.message })),
        Effect.as(manifestPath)
      );
    };

    const enumerate: ConsolidationRoot["enumerate"] = (path) =>
      Effect.gen(function* () {
        const rootType = yield* typeOf(path);
        if (rootType._tag === "None") {
          return RootListing.Missing({ root: path });
        }

        const hosts: HostListing[] = [];
        for (const name of yield* readNames(path)) {
          const hostDir = join(path, name);
          const type = yield* typeOf(hostDir);
          if (type._tag === "None" || type.value !== "Directory") continue;

          const entries = yield* Effect.forEach(yield* readNames(hostDir), (entry) =>
            describeEntry(hostDir, entry)
          );
          hosts.push({ name, entries: entries.flat() });
        }

        return RootListing.Present({ root: path, hosts });
      });

    return { ensureRoot, writeExclusionManifest, enumerate };
  })
);
