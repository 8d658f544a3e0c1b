import { Match } from "effect";

import type {
  RemoteUnreachable,
  RemoteCommandFailed,
  MirrorDestinationUnavailable
} from "@services/RemoteTransport";
import type { HostDirUnavailable } from "@services/LocalConsolidator";
import type { RootNotWritable, RootReadFailed } from "@services/ConsolidationRoot";

type RemoteError = RemoteUnreachable | RemoteCommandFailed | MirrorDestinationUnavailable;

type RootError = RootNotWritable | RootReadFailed;

type DomainError = RemoteError | HostDirUnavailable | RootError;

export class AppError extends Error {
  readonly _tag = "AppError";

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`);
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`
    ].join("\n");
  }
}

const errors = {
  remoteUnreachable: (host: string, reason: string) =>
    new AppError(
      "Remote host unreachable",
      `Could not connect to "${host}": ${reason}`,
      `Check that you can run 'ssh ${host}' without a password prompt, and pass --port or --identity if needed.`
    ),

  remoteCommandFailed: (host: string, command: string, reason: string) =>
    new AppError(
      "Remote command failed",
      `Running "${command}" against "${host}" failed: ${reason}`,
      `Make sure ssh and rsync are installed on both machines.`
    ),

  mirrorDestinationUnavailable: (path: string, reason: string) =>
    new AppError(
      "Cannot prepare local copy",
      `Failed to create "${path}": ${reason}`,
      `Check that you have write permission to the output directory, or choose another with --output.`
    ),

  hostDirUnavailable: (path: string, reason: string) =>
    new AppError(
      "Cannot create host directory",
      `Failed to create "${path}": ${reason}`,
      `Check that you have write permission to the output directory, or choose another with --output.`
    ),

  rootNotWritable: (path: string, reason: string) =>
    new AppError(
      "Cannot write consolidated directory",
      `Failed to write "${path}": ${reason}`,
      `Check that you have write permission, or choose another directory with --output.`
    ),

  rootReadFailed: (path: string, reason: string) =>
    new AppError(
      "Cannot read consolidated directory",
      `Failed to read "${path}": ${reason}`,
      `Check that you have read permission on the consolidated directory.`
    ),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`),

  permissionDenied: (message: string) =>
    new AppError(
      "Permission denied",
      message,
      `Check that you have the required permissions on the home and output directories.`
    )
};

const matchDomainError = Match.typeTags<DomainError>()({
  RemoteUnreachable: (e) => errors.remoteUnreachable(e.host, e.reason),
  RemoteCommandFailed: (e) => errors.remoteCommandFailed(e.host, e.command, e.reason),
  MirrorDestinationUnavailable: (e) => errors.mirrorDestinationUnavailable(e.path, e.reason),

  HostDirUnavailable: (e) => errors.hostDirUnavailable(e.path, e.reason),

  RootNotWritable: (e) => errors.rootNotWritable(e.path, e.reason),
  RootReadFailed: (e) => errors.rootReadFailed(e.path, e.reason)
});

const DOMAIN_TAGS: ReadonlySet<string> = new Set([
  "RemoteUnreachable",
  "RemoteCommandFailed",
  "MirrorDestinationUnavailable",
  "HostDirUnavailable",
  "RootNotWritable",
  "RootReadFailed"
]);

const isDomainError = (e: unknown): e is DomainError =>
  typeof e === "object" &&
  e !== null &&
  "_tag" in e &&
  typeof e._tag === "string" &&
  DOMAIN_TAGS.has(e._tag);

const isPermissionError = (message: string): boolean =>
  message.toLowerCase().includes("permission denied") ||
  message.toLowerCase().includes("eacces") ||
  message.toLowerCase().includes("operation not permitted") ||
  message.toLowerCase().includes("eperm");

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (isDomainError(error)) {
    return matchDomainError(error);
  }

  if (error instanceof Error) {
    return isPermissionError(error.message)
      ? errors.permissionDenied(error.message)
      : errors.unexpected(error.message);
  }

  return errors.unexpected(String(error));
};

export const {
  remoteUnreachable,
  remoteCommandFailed,
  mirrorDestinationUnavailable,
  hostDirUnavailable,
  rootNotWritable,
  rootReadFailed,
  unexpected,
  permissionDenied
} = errors;
