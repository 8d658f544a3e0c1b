import { Context, Effect, Layer, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import { join, sep } from "node:path";

import { CLAUDE_CODE_BASE, CURSOR_INSTALLS, type CursorInstall } from "@domain/ToolPaths";
import type { DiscoveryResult } from "@domain/DiscoveryResult";
import type { HistoryLocation } from "@domain/HistoryLocation";
import { HistoryLocatorTag } from "../HistoryLocator";

export interface DiscoveryService {
  /** Scan one home directory. Never fails; anything missing is recorded as absent. */
  readonly discover: (homeRoot: string, hostname: string) => Effect.Effect<DiscoveryResult>;
}

export class DiscoveryServiceTag extends Context.Tag("DiscoveryService")<
  DiscoveryServiceTag,
  DiscoveryService
>() {}

const isWithin = (path: string, dir: string): boolean => path === dir || path.startsWith(`${dir}${sep}`);

/**
 * The install root implied by the first Cursor location that sits under a
 * known install. Later locations are not consulted, even when a hybrid
 * machine has more than one install.
 */
export const resolveCursorBase = (
  homeRoot: string,
  cursorLocations: ReadonlyArray<HistoryLocation>,
  installs: ReadonlyArray<CursorInstall> = CURSOR_INSTALLS
): string | undefined => {
  for (const location of cursorLocations) {
    for (const install of installs) {
      const base = join(homeRoot, ...install.base);
      if (isWithin(location.path, base)) return base;
    }
  }
  return undefined;
};

export const DiscoveryServiceLive = Layer.effect(
  DiscoveryServiceTag,
  Effect.gen(function* () {
    const locator = yield* HistoryLocatorTag;
    const fs = yield* FileSystem.FileSystem;

    const discover: DiscoveryService["discover"] = (homeRoot, hostname) =>
      Effect.gen(function* () {
        const claudeLocations = yield* locator.locate("claude-code", homeRoot);
        const cursorLocations = yield* locator.locate("cursor", homeRoot);

        const claudeBase = join(homeRoot, ...CLAUDE_CODE_BASE);
        const hasClaudeBase = yield* pipe(
          fs.stat(claudeBase),
          Effect.map((info) => info.type === "Directory"),
          Effect.orElseSucceed(() => false)
        );

        return {
          hostname,
          claudeBase: hasClaudeBase ? claudeBase : undefined,
          cursorBase: resolveCursorBase(homeRoot, cursorLocations),
          locations: [...claudeLocations, ...cursorLocations]
        } satisfies DiscoveryResult;
      });

    return { discover };
  })
);
