/**
 * Where each tool keeps its state, relative to a home directory.
 *
 * Adding a platform is a data change: append a row to CURSOR_INSTALLS (and to
 * CURSOR_HISTORY_PLATFORMS if that install keeps a file history).
 */

import type { ToolKind } from "./Tool";

export const CLAUDE_CODE_BASE = [".claude"] as const;
export const CLAUDE_CODE_INDEX_FILE = "history.jsonl";
export const CLAUDE_CODE_PROJECTS_DIR = "projects";
export const CLAUDE_CODE_SESSION_EXT = ".jsonl";

export const CURSOR_WORKSPACE_STORAGE_DIR = "workspaceStorage";
export const CURSOR_STATE_FILE = "state.vscdb";
export const CURSOR_HISTORY_DIR = "History";

export type CursorPlatform = "linux-desktop" | "linux-server" | "macos";

export interface CursorInstall {
  readonly platform: CursorPlatform;
  /** Install root, the directory reported as the Cursor base */
  readonly base: ReadonlyArray<string>;
  /** User data directory below the install root */
  readonly userDir: ReadonlyArray<string>;
}

// Scan order for workspaceStorage
export const CURSOR_INSTALLS: ReadonlyArray<CursorInstall> = [
  { platform: "linux-desktop", base: [".config", "Cursor"], userDir: ["User"] },
  { platform: "linux-server", base: [".cursor-server"], userDir: ["data", "User"] },
  { platform: "macos", base: ["Library", "Application Support", "Cursor"], userDir: ["User"] }
];

// Scan order for the aggregate file history
export const CURSOR_HISTORY_PLATFORMS: ReadonlyArray<CursorPlatform> = [
  "linux-server",
  "linux-desktop"
];

export const cursorInstall = (platform: CursorPlatform): CursorInstall | undefined =>
  CURSOR_INSTALLS.find((install) => install.platform === platform);

/**
 * Base directories probed on a remote host, in order. `~` is left for the
 * remote shell to expand.
 */
export const REMOTE_CANDIDATES: Readonly<Record<ToolKind, ReadonlyArray<string>>> = {
  "claude-code": ["~/.claude"],
  cursor: ["~/.cursor-server", "~/.config/Cursor", "~/.cursor"]
};
