/**
 * Integration tests for CLI handlers.
 *
 * Local commands run against a scratch home and output directory; pull runs
 * against the in-process transport from TestContext.
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest"
import { Effect, Layer, pipe } from "effect"
import { NodeContext } from "@effect/platform-node"
import { existsSync, readFileSync, readlinkSync } from "node:fs"

import { runConsolidate, runList, runPull, withErrorHandling } from "../cli/handler"
import { createTestContext } from "../test/TestContext"
import { makeScratch, type Scratch } from "../test/fixtures"
import { HistoryLocatorLive } from "@services/HistoryLocator"
import { DiscoveryServiceLive } from "@services/DiscoveryService"
import { LocalConsolidatorLive } from "@services/LocalConsolidator"
import { ConsolidationRootLive, EXCLUSION_MANIFEST } from "@services/ConsolidationRoot"
import { LoggerServiceLive } from "@services/LoggerService"
import { RemoteOrchestratorLive } from "@services/RemoteOrchestrator"

const LocalLayer = pipe(
  Layer.mergeAll(
    LoggerServiceLive,
    pipe(DiscoveryServiceLive, Layer.provide(HistoryLocatorLive)),
    LocalConsolidatorLive,
    ConsolidationRootLive
  ),
  Layer.provide(NodeContext.layer)
)

function buildPullLayer(ctx: ReturnType<typeof createTestContext>) {
  return pipe(RemoteOrchestratorLive, Layer.provide(ctx.layer))
}

let scratch: Scratch

beforeEach(() => {
  scratch = makeScratch("handlers")
})

afterEach(() => {
  scratch.cleanup()
})

// =============================================================================
// Tests: runConsolidate
// =============================================================================

describe("runConsolidate", () => {
  test("writes the manifest and links local bases", async () => {
    scratch.write("home/.claude/history.jsonl", "{}\n")
    scratch.mkdir("home", ".config", "Cursor", "User", "History", "a")

    await pipe(
      runConsolidate({
        output: scratch.path("out"),
        home: scratch.path("home"),
        hostname: "laptop",
        force: false,
        list: false,
      }),
      Effect.provide(LocalLayer),
      Effect.runPromise
    )

    expect(readFileSync(scratch.path("out", ".gitignore"), "utf8")).toBe(EXCLUSION_MANIFEST)
    expect(readlinkSync(scratch.path("out", "laptop", "claude-code"))).toBe(scratch.path("home", ".claude"))
    expect(readlinkSync(scratch.path("out", "laptop", "cursor"))).toBe(scratch.path("home", ".config", "Cursor"))
  })

  test("an empty home still prepares the root", async () => {
    scratch.mkdir("home")

    await pipe(
      runConsolidate({
        output: scratch.path("out"),
        home: scratch.path("home"),
        hostname: "laptop",
        force: false,
        list: false,
      }),
      Effect.provide(LocalLayer),
      Effect.runPromise
    )

    expect(existsSync(scratch.path("out", ".gitignore"))).toBe(true)
    expect(existsSync(scratch.path("out", "laptop"))).toBe(true)
    expect(existsSync(scratch.path("out", "laptop", "claude-code"))).toBe(false)
  })

  test("errors are reported instead of thrown", async () => {
    scratch.mkdir("home", ".claude")
    scratch.write("out", "a file where the root should be")

    await expect(
      pipe(
        runConsolidate({
          output: scratch.path("out"),
          home: scratch.path("home"),
          hostname: "laptop",
          force: false,
          list: false,
        }),
        withErrorHandling,
        Effect.provide(LocalLayer),
        Effect.runPromise
      )
    ).resolves.toBeUndefined()
  })
})

// =============================================================================
// Tests: runList
// =============================================================================

describe("runList", () => {
  test("does not create a missing root", async () => {
    await pipe(
      runList({ output: scratch.path("out"), home: scratch.path("home"), hostname: "laptop", force: false, list: true }),
      Effect.provide(LocalLayer),
      Effect.runPromise
    )

    expect(existsSync(scratch.path("out"))).toBe(false)
  })
})

// =============================================================================
// Tests: runPull
// =============================================================================

describe("runPull", () => {
  const pullOptions = (hosts: string[]) => ({
    hosts,
    output: scratch.path("out"),
    port: 22,
    identity: undefined,
    dryRun: false,
    noClaude: false,
    noCursor: false,
  })

  test("a single host is pulled into the output root", async () => {
    const ctx = createTestContext()
    ctx.addRemoteDir("alice@devbox", "~/.claude", { "history.jsonl": "{}\n" })

    await pipe(runPull(pullOptions(["alice@devbox"])), Effect.provide(buildPullLayer(ctx)), Effect.runPromise)

    expect(readFileSync(scratch.path("out", "devbox", "claude-code", "history.jsonl"), "utf8")).toBe("{}\n")
  })

  test("several hosts continue past an unreachable one", async () => {
    const ctx = createTestContext()
    ctx.markUnreachable("devbox")
    ctx.addRemoteDir("buildbox", "~/.cursor-server", { "data/User/History/h/1.txt": "x" })

    await pipe(
      runPull(pullOptions(["devbox", "buildbox"])),
      Effect.provide(buildPullLayer(ctx)),
      Effect.runPromise
    )

    expect(ctx.calls.commands.map((c) => c.target)).toContain("buildbox")
    expect(existsSync(scratch.path("out", "buildbox", "cursor", "data", "User", "History", "h", "1.txt"))).toBe(true)
  })

  test("tool opt-outs apply to every host", async () => {
    const ctx = createTestContext()
    ctx.addRemoteDir("devbox", "~/.claude", { "history.jsonl": "{}\n" })
    ctx.addRemoteDir("buildbox", "~/.claude", { "history.jsonl": "{}\n" })

    await pipe(
      runPull({ ...pullOptions(["devbox", "buildbox"]), noClaude: true }),
      Effect.provide(buildPullLayer(ctx)),
      Effect.runPromise
    )

    expect(ctx.calls.mirrors).toEqual([])
  })
})
