import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { Effect, Layer, pipe } from "effect";
import { NodeContext } from "@effect/platform-node";

import { DiscoveryServiceLive, DiscoveryServiceTag, resolveCursorBase } from "./DiscoveryService";
import { HistoryLocatorLive, HistoryLocatorTag } from "../HistoryLocator";
import { makeLocation } from "@domain/HistoryLocation";
import { makeScratch, type Scratch } from "../../../test/fixtures";

const discover = (
  homeRoot: string,
  hostname: string,
  locator: Layer.Layer<HistoryLocatorTag> = pipe(HistoryLocatorLive, Layer.provide(NodeContext.layer))
) =>
  pipe(
    DiscoveryServiceTag,
    Effect.flatMap((svc) => svc.discover(homeRoot, hostname)),
    Effect.provide(pipe(DiscoveryServiceLive, Layer.provide(locator), Layer.provide(NodeContext.layer))),
    Effect.runPromise
  );

describe("resolveCursorBase", () => {
  test("uses the install root of the first location under a known install", () => {
    const locations = [
      makeLocation("cursor", "/h/.cursor-server/data/User/workspaceStorage/ws", "ws...", 1),
      makeLocation("cursor", "/h/.config/Cursor/User/History", "_file_history", 3)
    ];

    expect(resolveCursorBase("/h", locations)).toBe("/h/.cursor-server");
  });

  test("is undefined without locations", () => {
    expect(resolveCursorBase("/h", [])).toBeUndefined();
  });

  test("does not match a sibling directory sharing a prefix", () => {
    const locations = [makeLocation("cursor", "/h/.cursor-server-old/data/User/History", "_file_history", 1)];

    expect(resolveCursorBase("/h", locations)).toBeUndefined();
  });
});

describe("DiscoveryService (stub locator)", () => {
  let home: Scratch;

  beforeEach(() => {
    home = makeScratch("discover");
  });

  afterEach(() => {
    home.cleanup();
  });

  test("puts Claude Code locations before Cursor locations", async () => {
    const StubLocator = Layer.succeed(HistoryLocatorTag, {
      locate: (tool, homeRoot) =>
        Effect.succeed(
          tool === "claude-code"
            ? [makeLocation("claude-code", `${homeRoot}/.claude/history.jsonl`, "_index", 1)]
            : [makeLocation("cursor", `${homeRoot}/.config/Cursor/User/History`, "_file_history", 2)]
        )
    });

    const result = await discover(home.dir, "laptop", StubLocator);

    expect(result.hostname).toBe("laptop");
    expect(result.locations.map((loc) => loc.tool)).toEqual(["claude-code", "cursor"]);
    expect(result.cursorBase).toBe(home.path(".config", "Cursor"));
    // No .claude directory on disk, whatever the locator says
    expect(result.claudeBase).toBeUndefined();
  });
});

describe("DiscoveryService (real filesystem)", () => {
  let home: Scratch;

  beforeEach(() => {
    home = makeScratch("discover");
  });

  afterEach(() => {
    home.cleanup();
  });

  test("an empty home yields no bases and no locations", async () => {
    const result = await discover(home.dir, "empty-host");

    expect(result).toEqual({
      hostname: "empty-host",
      claudeBase: undefined,
      cursorBase: undefined,
      locations: []
    });
  });

  test("an empty .claude directory is still a base", async () => {
    home.mkdir(".claude");

    const result = await discover(home.dir, "laptop");

    expect(result.claudeBase).toBe(home.path(".claude"));
    expect(result.locations).toEqual([]);
  });

  test("reports both tools from a populated home", async () => {
    home.write(".claude/history.jsonl", "{}\n{}\n");
    home.write(".claude/projects/-work-app/s1.jsonl", "{}\n");
    home.write(".cursor-server/data/User/workspaceStorage/abc/state.vscdb", "");

    const result = await discover(home.dir, "devbox");

    expect(result.claudeBase).toBe(home.path(".claude"));
    expect(result.cursorBase).toBe(home.path(".cursor-server"));
    expect(result.locations.map((loc) => `${loc.tool}:${loc.label}:${loc.unitCount}`)).toEqual([
      "claude-code:_index:2",
      "claude-code:work/app:1",
      "cursor:abc...:1"
    ]);
  });

  test("an install with no locations does not set the Cursor base", async () => {
    home.mkdir(".config", "Cursor", "User");

    const result = await discover(home.dir, "laptop");

    expect(result.cursorBase).toBeUndefined();
  });
});
