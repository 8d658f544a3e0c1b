/**
 * RemoteTransport - the two remote primitives the orchestrator sequences:
 * running a command on a host and mirroring a remote directory locally.
 *
 * SshTransport implements them with ssh and rsync through ShellService.
 */

import { Context, Data, Effect, Layer, Match, pipe } from "effect";
import { FileSystem } from "@effect/platform";

import type { RemoteHost } from "@domain/RemoteHost";
import { DEFAULT_SSH_PORT } from "@domain/RemoteHost";
import { ShellServiceTag, renderCommand, type ShellResult } from "../ShellService";

// =============================================================================
// Errors
// =============================================================================

export class RemoteUnreachable extends Data.TaggedError("RemoteUnreachable")<{
  readonly host: string;
  readonly reason: string;
}> {}

export class RemoteCommandFailed extends Data.TaggedError("RemoteCommandFailed")<{
  readonly host: string;
  readonly command: string;
  readonly reason: string;
}> {}

export class MirrorDestinationUnavailable extends Data.TaggedError("MirrorDestinationUnavailable")<{
  readonly path: string;
  readonly reason: string;
}> {}

export type RemoteError = RemoteUnreachable | RemoteCommandFailed | MirrorDestinationUnavailable;

export const describeRemoteError = Match.typeTags<RemoteError>()({
  RemoteUnreachable: (e) => `${e.host} is unreachable: ${e.reason}`,
  RemoteCommandFailed: (e) => `command "${e.command}" failed on ${e.host}: ${e.reason}`,
  MirrorDestinationUnavailable: (e) => `cannot prepare ${e.path}: ${e.reason}`
});

// =============================================================================
// Service interface
// =============================================================================

export interface RemoteTransport {
  readonly runRemoteCommand: (
    host: RemoteHost,
    command: string
  ) => Effect.Effect<ShellResult, RemoteError>;

  /**
   * Make `localPath` hold exactly the contents of `remotePath`, deleting
   * extraneous local entries. Resolves to whether the mirror succeeded.
   */
  readonly mirrorDirectory: (
    host: RemoteHost,
    remotePath: string,
    localPath: string,
    dryRun: boolean
  ) => Effect.Effect<boolean, RemoteError>;
}

export class RemoteTransportTag extends Context.Tag("RemoteTransport")<
  RemoteTransportTag,
  RemoteTransport
>() {}

// =============================================================================
// ssh / rsync command generation
// =============================================================================

// ssh reserves this exit status for its own connection errors
const SSH_CONNECTION_ERROR = 255;

const sshOptions = (host: RemoteHost): string[] => [
  ...(host.port !== DEFAULT_SSH_PORT ? ["-p", String(host.port)] : []),
  ...(host.identityFile !== undefined ? ["-i", host.identityFile] : [])
];

export const buildSshArgs = (host: RemoteHost, command: string): string[] => [
  ...sshOptions(host),
  host.sshTarget,
  command
];

export const buildRsyncArgs = (
  host: RemoteHost,
  remotePath: string,
  localPath: string,
  dryRun: boolean
): string[] => {
  const remoteShell = sshOptions(host);

  // Trailing slashes: copy the contents of the source, not the directory itself
  const src = remotePath.endsWith("/") ? remotePath : `${remotePath}/`;
  const dst = localPath.endsWith("/") ? localPath : `${localPath}/`;

  return [
    "-avz", // archive, verbose, compress
    "--delete",
    ...(dryRun ? ["--dry-run"] : []),
    ...(remoteShell.length > 0 ? ["-e", ["ssh", ...remoteShell].join(" ")] : []),
    `${host.sshTarget}:${src}`,
    dst
  ];
};

// =============================================================================
// ssh / rsync implementation
// =============================================================================

export const SshTransport = Layer.effect(
  RemoteTransportTag,
  Effect.gen(function* () {
    const shell = yield* ShellServiceTag;
    const fs = yield* FileSystem.FileSystem;

    const runRemoteCommand: RemoteTransport["runRemoteCommand"] = (host, command) =>
      pipe(
        shell.run("ssh", buildSshArgs(host, command)),
        Effect.mapError(
          (e) => new RemoteCommandFailed({ host: host.sshTarget, command, reason: e.message })
        ),
        Effect.flatMap((result) =>
          result.exitCode === SSH_CONNECTION_ERROR
            ? Effect.fail(
                new RemoteUnreachable({
                  host: host.sshTarget,
                  reason: result.stderr.trim() || `ssh exited with ${SSH_CONNECTION_ERROR}`
                })
              )
            : Effect.succeed(result)
        )
      );

    const mirrorDirectory: RemoteTransport["mirrorDirectory"] = (host, remotePath, localPath, dryRun) =>
      Effect.gen(function* () {
        if (!dryRun) {
          yield* pipe(
            fs.makeDirectory(localPath, { recursive: true }),
            Effect.mapError((e) => new MirrorDestinationUnavailable({ path: localPath, reason: e.message }))
          );
        }

        const args = buildRsyncArgs(host, remotePath, localPath, dryRun);
        const result = yield* pipe(
          shell.run("rsync", args),
          Effect.mapError(
            (e) =>
              new RemoteCommandFailed({
                host: host.sshTarget,
                command: renderCommand("rsync", args),
                reason: e.message
              })
          )
        );

        yield* Effect.logDebug(result.stdout);
        if (result.exitCode !== 0) {
          yield* Effect.logWarning(`rsync exited with ${result.exitCode}: ${result.stderr.trim()}`);
        }

        return result.exitCode === 0;
      });

    return { runRemoteCommand, mirrorDirectory };
  })
);
