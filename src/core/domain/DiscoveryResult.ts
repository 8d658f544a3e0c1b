import { Schema } from "@effect/schema";

import type { HistoryLocation } from "./HistoryLocation";
import type { ToolKind } from "./Tool";

/**
 * One host's discovery snapshot. Built fresh on every scan and never
 * persisted; the consolidated tree is the only durable artifact.
 */
export interface DiscoveryResult {
  readonly hostname: string;
  readonly claudeBase: string | undefined;
  readonly cursorBase: string | undefined;
  /** Claude Code locations first, then Cursor locations */
  readonly locations: ReadonlyArray<HistoryLocation>;
}

export const baseFor = (result: DiscoveryResult, tool: ToolKind): string | undefined =>
  tool === "claude-code" ? result.claudeBase : result.cursorBase;

export const locationsFor = (
  result: DiscoveryResult,
  tool: ToolKind
): ReadonlyArray<HistoryLocation> => result.locations.filter((loc) => loc.tool === tool);

// =============================================================================
// Machine-readable report
// =============================================================================

const NullableString = Schema.transform(
  Schema.NullOr(Schema.String),
  Schema.UndefinedOr(Schema.String),
  {
    strict: true,
    decode: (value) => value ?? undefined,
    encode: (value) => value ?? null
  }
);

const LocationReport = Schema.Struct({
  tool: Schema.Literal("claude-code", "cursor"),
  path: Schema.String,
  label: Schema.propertySignature(Schema.String).pipe(Schema.fromKey("project_name")),
  unitCount: Schema.propertySignature(Schema.Number).pipe(Schema.fromKey("session_count")),
  isRemote: Schema.propertySignature(Schema.Boolean).pipe(Schema.fromKey("is_remote")),
  originHost: Schema.propertySignature(NullableString).pipe(Schema.fromKey("host"))
});

export const DiscoveryReport = Schema.Struct({
  hostname: Schema.String,
  claudeBase: Schema.propertySignature(NullableString).pipe(Schema.fromKey("claude_code_base")),
  cursorBase: Schema.propertySignature(NullableString).pipe(Schema.fromKey("cursor_base")),
  locations: Schema.Array(LocationReport)
});

export type DiscoveryReport = Schema.Schema.Encoded<typeof DiscoveryReport>;

export const toReport = (result: DiscoveryResult): DiscoveryReport =>
  Schema.encodeSync(DiscoveryReport)(result);
