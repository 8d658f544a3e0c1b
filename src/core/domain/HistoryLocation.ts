import type { ToolKind } from "./Tool";

export interface HistoryLocation {
  readonly tool: ToolKind;
  readonly path: string;
  readonly label: string;
  /** Sessions or files backing this location; 0 when the store is empty or unreadable */
  readonly unitCount: number;
  readonly isRemote: boolean;
  readonly originHost: string | undefined;
}

export const INDEX_LABEL = "_index";
export const FILE_HISTORY_LABEL = "_file_history";

const WORKSPACE_LABEL_LENGTH = 12;

export const makeLocation = (
  tool: ToolKind,
  path: string,
  label: string,
  unitCount: number
): HistoryLocation => ({
  tool,
  path,
  label,
  unitCount,
  isRemote: false,
  originHost: undefined
});

/**
 * Claude Code stores each project under its absolute path with every `/`
 * replaced by `-`. Dashes that were part of the original path are decoded
 * as separators too, so the result does not round-trip.
 */
export const decodeProjectName = (directoryName: string): string => {
  const decoded = directoryName.replaceAll("-", "/");
  return decoded.startsWith("/") ? decoded.slice(1) : decoded;
};

export const workspaceLabel = (directoryName: string): string =>
  `${directoryName.slice(0, WORKSPACE_LABEL_LENGTH)}...`;

/**
 * Count newline-delimited records. An unterminated final line is a record.
 */
export const countRecords = (content: string): number => {
  if (content.length === 0) return 0;
  const terminated = content.split("\n").length - 1;
  return content.endsWith("\n") ? terminated : terminated + 1;
};
