/**
 * HistoryLocator - finds history stores under a home directory.
 *
 * Every candidate path is probed in a fixed order. Missing paths are
 * recorded as absence; an unreadable store degrades to a zero count with a
 * warning rather than failing the scan.
 */

import { Context, Effect, Layer, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import { join } from "node:path";

import {
  CLAUDE_CODE_BASE,
  CLAUDE_CODE_INDEX_FILE,
  CLAUDE_CODE_PROJECTS_DIR,
  CLAUDE_CODE_SESSION_EXT,
  CURSOR_HISTORY_DIR,
  CURSOR_HISTORY_PLATFORMS,
  CURSOR_INSTALLS,
  CURSOR_STATE_FILE,
  CURSOR_WORKSPACE_STORAGE_DIR,
  cursorInstall
} from "@domain/ToolPaths";
import {
  FILE_HISTORY_LABEL,
  INDEX_LABEL,
  countRecords,
  decodeProjectName,
  makeLocation,
  workspaceLabel,
  type HistoryLocation
} from "@domain/HistoryLocation";
import type { ToolKind } from "@domain/Tool";

export interface HistoryLocator {
  /** Locations for one tool, in enumeration order. Never fails. */
  readonly locate: (tool: ToolKind, homeRoot: string) => Effect.Effect<ReadonlyArray<HistoryLocation>>;
}

export class HistoryLocatorTag extends Context.Tag("HistoryLocator")<
  HistoryLocatorTag,
  HistoryLocator
>() {}

export const HistoryLocatorLive = Layer.effect(
  HistoryLocatorTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const isType = (path: string, type: FileSystem.File.Type) =>
      pipe(
        fs.stat(path),
        Effect.map((info) => info.type === type),
        Effect.orElseSucceed(() => false)
      );

    const isDirectory = (path: string) => isType(path, "Directory");
    const isFile = (path: string) => isType(path, "File");

    const pathExists = (path: string) => pipe(fs.exists(path), Effect.orElseSucceed(() => false));

    const listNames = (dir: string) =>
      pipe(
        fs.readDirectory(dir),
        Effect.map((names) => [...names].sort()),
        Effect.catchAll((e) =>
          pipe(
            Effect.logWarning(`Cannot list ${dir}: ${e.message}`),
            Effect.map((): string[] => [])
          )
        )
      );

    const subdirectories = (dir: string) =>
      pipe(
        listNames(dir),
        Effect.flatMap((names) => Effect.filter(names, (name) => isDirectory(join(dir, name))))
      );

    const countIndexRecords = (indexFile: string) =>
      pipe(
        fs.readFileString(indexFile),
        Effect.map(countRecords),
        Effect.catchAll((e) =>
          pipe(Effect.logWarning(`Cannot read ${indexFile}: ${e.message}`), Effect.as(0))
        )
      );

    const countSessionFiles = (projectDir: string) =>
      pipe(
        listNames(projectDir),
        Effect.map((names) => names.filter((name) => name.endsWith(CLAUDE_CODE_SESSION_EXT))),
        Effect.flatMap((names) => Effect.filter(names, (name) => isFile(join(projectDir, name)))),
        Effect.map((sessions) => sessions.length)
      );

    const locateClaudeCode = (homeRoot: string) =>
      Effect.gen(function* () {
        const base = join(homeRoot, ...CLAUDE_CODE_BASE);
        if (!(yield* isDirectory(base))) return [];

        const locations: HistoryLocation[] = [];

        const indexFile = join(base, CLAUDE_CODE_INDEX_FILE);
        if (yield* pathExists(indexFile)) {
          const records = yield* countIndexRecords(indexFile);
          locations.push(makeLocation("claude-code", indexFile, INDEX_LABEL, records));
        }

        const projectsDir = join(base, CLAUDE_CODE_PROJECTS_DIR);
        if (yield* isDirectory(projectsDir)) {
          for (const name of yield* subdirectories(projectsDir)) {
            if (name.startsWith(".")) continue;

            const projectDir = join(projectsDir, name);
            const sessions = yield* countSessionFiles(projectDir);
            if (sessions > 0) {
              locations.push(makeLocation("claude-code", projectDir, decodeProjectName(name), sessions));
            }
          }
        }

        yield* Effect.logDebug(`Claude Code: ${locations.length} location(s) under ${base}`);
        return locations;
      });

    const locateCursor = (homeRoot: string) =>
      Effect.gen(function* () {
        const locations: HistoryLocation[] = [];

        // Every install is scanned; a hybrid machine may have several
        for (const install of CURSOR_INSTALLS) {
          const storage = join(homeRoot, ...install.base, ...install.userDir, CURSOR_WORKSPACE_STORAGE_DIR);
          if (!(yield* isDirectory(storage))) continue;

          for (const name of yield* subdirectories(storage)) {
            const workspaceDir = join(storage, name);
            const hasState = yield* pathExists(join(workspaceDir, CURSOR_STATE_FILE));
            locations.push(makeLocation("cursor", workspaceDir, workspaceLabel(name), hasState ? 1 : 0));
          }
        }

        for (const platform of CURSOR_HISTORY_PLATFORMS) {
          const install = cursorInstall(platform);
          if (install === undefined) continue;

          const historyDir = join(homeRoot, ...install.base, ...install.userDir, CURSOR_HISTORY_DIR);
          if (!(yield* isDirectory(historyDir))) continue;

          const entries = yield* subdirectories(historyDir);
          if (entries.length > 0) {
            locations.push(makeLocation("cursor", historyDir, FILE_HISTORY_LABEL, entries.length));
          }
        }

        yield* Effect.logDebug(`Cursor: ${locations.length} location(s) under ${homeRoot}`);
        return locations;
      });

    return {
      locate: (tool, homeRoot) =>
        tool === "claude-code" ? locateClaudeCode(homeRoot) : locateCursor(homeRoot)
    };
  })
);
