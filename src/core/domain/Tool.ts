/**
 * The two assistants whose histories are tracked. A tool kind is also the
 * name of its directory under a host subtree of the consolidated root.
 */
export type ToolKind = "claude-code" | "cursor";

export const TOOL_KINDS: ReadonlyArray<ToolKind> = ["claude-code", "cursor"];

export const toolDisplayName = (tool: ToolKind): string =>
  tool === "claude-code" ? "Claude Code" : "Cursor";
