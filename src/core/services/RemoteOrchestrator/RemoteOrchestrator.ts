/**
 * RemoteOrchestrator - pulls a remote host's histories into its host subtree.
 *
 * Each pull is a small state machine:
 *
 *   Discovering ──▶ NothingFound            (terminal, nothing created)
 *        │
 *        └────────▶ Found ──▶ Done          (terminal)
 *
 * The host directory is only created on the Found → Done step, so a host
 * with no histories leaves no trace under the root.
 */

import { Cause, Context, Data, Effect, Layer, Option, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import { join } from "node:path";

import type { RemoteHost } from "@domain/RemoteHost";
import { TOOL_KINDS, type ToolKind } from "@domain/Tool";
import { REMOTE_CANDIDATES } from "@domain/ToolPaths";
import { LoggerServiceTag, type HostOutcome } from "../LoggerService";
import {
  MirrorDestinationUnavailable,
  RemoteTransportTag,
  describeRemoteError,
  type RemoteError
} from "../RemoteTransport";

// =============================================================================
// Types
// =============================================================================

export interface PullOptions {
  readonly claudeCode: boolean;
  readonly cursor: boolean;
  readonly dryRun: boolean;
}

/** Remote base path per tool, undefined when no candidate exists */
export type RemoteDiscovery = Readonly<Record<ToolKind, string | undefined>>;

export type ToolPull = Data.TaggedEnum<{
  NotRequested: { readonly tool: ToolKind };
  NotFound: { readonly tool: ToolKind };
  Mirrored: { readonly tool: ToolKind; readonly remotePath: string; readonly localPath: string };
  MirrorFailed: { readonly tool: ToolKind; readonly remotePath: string; readonly localPath: string };
}>;

export const ToolPull = Data.taggedEnum<ToolPull>();

export type PullState = Data.TaggedEnum<{
  Discovering: { readonly host: RemoteHost };
  NothingFound: { readonly host: RemoteHost };
  Found: { readonly host: RemoteHost; readonly discovery: RemoteDiscovery };
  Done: { readonly host: RemoteHost; readonly tools: ReadonlyArray<ToolPull> };
}>;

export const PullState = Data.taggedEnum<PullState>();

export type TerminalState = Extract<PullState, { readonly _tag: "NothingFound" | "Done" }>;

export interface PullReport {
  readonly hostname: string;
  readonly success: boolean;
  readonly state: TerminalState;
  readonly tools: ReadonlyArray<ToolPull>;
}

// =============================================================================
// Service interface
// =============================================================================

export interface RemoteOrchestrator {
  /** Probe the fixed candidate paths; the first existing one wins per tool */
  readonly discoverRemote: (host: RemoteHost) => Effect.Effect<RemoteDiscovery, RemoteError>;

  readonly pull: (
    host: RemoteHost,
    root: string,
    options: PullOptions
  ) => Effect.Effect<PullReport, RemoteError>;

  /** Hosts are pulled one at a time, in order; a failing host never stops the rest */
  readonly pullMany: (
    hosts: ReadonlyArray<RemoteHost>,
    root: string,
    options: PullOptions
  ) => Effect.Effect<ReadonlyArray<HostOutcome>>;
}

export class RemoteOrchestratorTag extends Context.Tag("RemoteOrchestrator")<
  RemoteOrchestratorTag,
  RemoteOrchestrator
>() {}

export const probeCommand = (path: string): string => `test -d ${path} && echo exists`;

const isRequested = (tool: ToolKind, options: PullOptions): boolean =>
  tool === "claude-code" ? options.claudeCode : options.cursor;

const isTerminal = (state: PullState): state is TerminalState =>
  state._tag === "NothingFound" || state._tag === "Done";

const toolSucceeded = (result: ToolPull): boolean =>
  result._tag === "Mirrored" || result._tag === "NotRequested";

const describeFailure = (cause: Cause.Cause<RemoteError>): string =>
  pipe(
    Cause.failureOption(cause),
    Option.match({
      onNone: () => Cause.pretty(cause),
      onSome: describeRemoteError
    })
  );

// =============================================================================
// Live implementation
// =============================================================================

export const RemoteOrchestratorLive = Layer.effect(
  RemoteOrchestratorTag,
  Effect.gen(function* () {
    const transport = yield* RemoteTransportTag;
    const logger = yield* LoggerServiceTag;
    const fs = yield* FileSystem.FileSystem;

    const probe = (host: RemoteHost, candidates: ReadonlyArray<string>) =>
      Effect.gen(function* () {
        for (const path of candidates) {
          const result = yield* transport.runRemoteCommand(host, probeCommand(path));
          if (result.stdout.includes("exists")) return path;
        }
        return undefined;
      });

    const discoverRemote: RemoteOrchestrator["discoverRemote"] = (host) =>
      Effect.gen(function* () {
        const claudeCode = yield* probe(host, REMOTE_CANDIDATES["claude-code"]);
        const cursor = yield* probe(host, REMOTE_CANDIDATES.cursor);
        return { "claude-code": claudeCode, cursor };
      });

    const syncTool = (
      host: RemoteHost,
      hostDir: string,
      tool: ToolKind,
      remotePath: string | undefined,
      options: PullOptions
    ): Effect.Effect<ToolPull, RemoteError> =>
      Effect.gen(function* () {
        if (!isRequested(tool, options)) {
          return ToolPull.NotRequested({ tool });
        }
        if (remotePath === undefined) {
          yield* logger.pull.toolNotFound(tool);
          return ToolPull.NotFound({ tool });
        }

        const localPath = join(hostDir, tool);
        yield* logger.pull.toolFound(tool, remotePath);
        yield* logger.pull.syncing(`${host.sshTarget}:${remotePath}`, localPath, options.dryRun);

        // Only an unreachable host stops the pull; anything else fails this tool alone
        const mirrored = yield* pipe(
          transport.mirrorDirectory(host, remotePath, localPath, options.dryRun),
          Effect.catchTags({
            MirrorDestinationUnavailable: (e) =>
              pipe(Effect.logWarning(describeRemoteError(e)), Effect.as(false)),
            RemoteCommandFailed: (e) => pipe(Effect.logWarning(describeRemoteError(e)), Effect.as(false))
          })
        );
        if (!mirrored) {
          yield* logger.pull.mirrorFailed(tool);
          return ToolPull.MirrorFailed({ tool, remotePath, localPath });
        }
        return ToolPull.Mirrored({ tool, remotePath, localPath });
      });

    const advance = (
      state: PullState,
      root: string,
      options: PullOptions
    ): Effect.Effect<PullState, RemoteError> => {
      switch (state._tag) {
        case "Discovering":
          return Effect.gen(function* () {
            yield* logger.pull.discovering;
            const discovery = yield* discoverRemote(state.host);

            if (TOOL_KINDS.every((tool) => discovery[tool] === undefined)) {
              yield* logger.pull.nothingFound(state.host.hostname);
              return PullState.NothingFound({ host: state.host });
            }
            return PullState.Found({ host: state.host, discovery });
          });

        case "Found":
          return Effect.gen(function* () {
            const hostDir = join(root, state.host.hostname);
            if (!options.dryRun) {
              yield* pipe(
                fs.makeDirectory(hostDir, { recursive: true }),
                Effect.mapError((e) => new MirrorDestinationUnavailable({ path: hostDir, reason: e.message }))
              );
            }

            // Every requested tool is attempted, even after one has failed
            const tools = yield* Effect.forEach(TOOL_KINDS, (tool) =>
              syncTool(state.host, hostDir, tool, state.discovery[tool], options)
            );
            return PullState.Done({ host: state.host, tools });
          });

        case "NothingFound":
        case "Done":
          return Effect.succeed(state);
      }
    };

    const runToCompletion = (
      state: PullState,
      root: string,
      options: PullOptions
    ): Effect.Effect<TerminalState, RemoteError> =>
      isTerminal(state)
        ? Effect.succeed(state)
        : Effect.flatMap(advance(state, root, options), (next) => runToCompletion(next, root, options));

    const pull: RemoteOrchestrator["pull"] = (host, root, options) =>
      Effect.gen(function* () {
        yield* logger.pull.header(host.sshTarget);

        const final = yield* runToCompletion(PullState.Discovering({ host }), root, options);
        const tools: ReadonlyArray<ToolPull> = final._tag === "Done" ? final.tools : [];

        return {
          hostname: host.hostname,
          success: final._tag === "Done" && tools.every(toolSucceeded),
          state: final,
          tools
        } satisfies PullReport;
      });

    const pullMany: RemoteOrchestrator["pullMany"] = (hosts, root, options) =>
      Effect.gen(function* () {
        yield* logger.pull.multiHeader(hosts.length);

        const outcomes = yield* Effect.forEach(hosts, (host) =>
          pipe(
            pull(host, root, options),
            Effect.map((report) => report.success),
            Effect.catchAllCause((cause) =>
              pipe(logger.pull.hostFailed(host.hostname, describeFailure(cause)), Effect.as(false))
            ),
            Effect.map((success): HostOutcome => ({ hostname: host.hostname, success }))
          )
        );

        yield* logger.pull.summary(outcomes);
        return outcomes;
      });

    return { discoverRemote, pull, pullMany };
  })
);
